/**
 * Timeline and Rebuild Commands
 *
 * Inspect and repair stored sessions. Both read the SQLite database, since
 * in-memory sessions do not outlive the process that created them.
 *
 * Usage:
 * ```bash
 * npm run cli -- timeline sess_...
 * npm run cli -- rebuild sess_...
 * ```
 */

import type { Runtime } from '../../bootstrap';
import { bold, dim, formatSeparator, formatTimelineEvent, green, printBlankLine } from '../utils/terminal';

export async function runTimelineCommand(runtime: Runtime, sessionId: string): Promise<void> {
  const events = await runtime.orchestrator.getTimeline(sessionId);

  printBlankLine();
  console.log(bold(`Timeline of ${sessionId}`) + dim(` (${events.length} events)`));
  console.log(formatSeparator(80));
  for (const event of events) {
    console.log(formatTimelineEvent(event));
  }
  printBlankLine();
}

export async function runRebuildCommand(runtime: Runtime, sessionId: string): Promise<void> {
  const state = await runtime.orchestrator.rebuildSession(sessionId);

  printBlankLine();
  console.log(green(`Rebuilt ${sessionId} from its timeline.`));
  console.log(`  Beat:          ${state.beat}`);
  console.log(`  Turns:         ${state.turns.length}`);
  console.log(`  Output clock:  ${state.outputClockSec}s`);
  console.log(`  Parked:        ${state.questionStack.length} question(s)`);
  console.log(`  Updated at:    ${dim(state.updatedAt.toISOString())}`);
  printBlankLine();
}
