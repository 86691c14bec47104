/**
 * Chat Command Handler
 *
 * Runs an interactive practice session in the terminal:
 *
 * 1. Starts a session on the chosen catalog entry
 * 2. Shows the diagnostic questions and, with --debug, the opening plan
 * 3. Sends each typed line through the turn pipeline and prints the reply
 * 4. Handles slash commands (/quit, /state, /help)
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- chat opportunity-cost --debug
 * npm run cli -- chat opportunity-cost --mode generate --director delegated
 * ```
 */

import * as readline from 'readline';
import type { Runtime } from '../../bootstrap';
import type { EventResponse } from '../../core/orchestrator';
import {
  bold,
  dim,
  formatPlanSummary,
  formatRoleLine,
  printBlankLine,
  printChatBanner,
  printCommandsHelp,
  red,
  yellow,
} from '../utils/terminal';

export interface ChatOptions {
  debug: boolean;
}

export async function runChatCommand(runtime: Runtime, entryId: string, options: ChatOptions): Promise<void> {
  const { orchestrator, catalog } = runtime;
  const entry = catalog.get(entryId);

  const { sessionId, state, diagnose } = await orchestrator.startSession(entry.entryId);
  printChatBanner(entry.title, sessionId, state.availableRoles);

  if (diagnose.length > 0) {
    console.log(bold('Before we start:'));
    for (const question of diagnose) {
      console.log(`  ${question.prompt}`);
      question.options.forEach((option, index) => console.log(dim(`    ${index + 1}. ${option}`)));
    }
    printBlankLine();
  }

  if (options.debug) {
    const opening = await orchestrator.openingInstructions(sessionId);
    console.log(formatPlanSummary(opening.directorPlan));
    console.log(dim(opening.actorPrompt.instructions));
    printBlankLine();
  }

  await runInteractiveLoop(runtime, sessionId, options);
}

function printReply(response: EventResponse, debug: boolean): void {
  printBlankLine();
  if (debug) {
    console.log(formatPlanSummary(response.debug.directorPlan));
  }
  console.log(formatRoleLine(response.assistant.role, response.assistant.text));
  if (response.assistant.needUserAction) {
    console.log(yellow(`  → ${response.assistant.needUserAction.prompt}`));
  }
  const { quiz } = response.assistant;
  if (quiz) {
    console.log(yellow(`  ? ${quiz.prompt}`));
    quiz.options.forEach((option, index) => console.log(yellow(`    ${index + 1}. ${option}`)));
  }
  printBlankLine();
}

/**
 * Reads lines until /quit or end of input. Lines are processed one at a
 * time, in order.
 */
async function runInteractiveLoop(runtime: Runtime, sessionId: string, options: ChatOptions): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('You: '),
  });

  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();

    if (input === '/quit' || input === '/exit') {
      break;
    }

    try {
      if (input === '/help') {
        printCommandsHelp();
      } else if (input === '/state') {
        const state = await runtime.orchestrator.getSession(sessionId);
        console.log(
          dim(
            `beat=${state.beat} clock=${state.outputClockSec}s turns=${state.turns.length} parked=${state.questionStack.length}`
          )
        );
      } else if (input.startsWith('/')) {
        console.log(yellow(`Unknown command ${input}. Type /help.`));
      } else if (input) {
        const response = await runtime.orchestrator.onEvent(sessionId, { text: input });
        printReply(response, options.debug);
      }
    } catch (error) {
      console.log(red('\nError processing your message:'));
      console.log(dim(error instanceof Error ? error.message : String(error)));
      printBlankLine();
    }

    rl.prompt();
  }

  rl.close();
  console.log(dim(`\nSession ${sessionId} ended.`));
}
