/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers and the formatters the CLI commands share.
 * In non-TTY environments the codes pass through harmlessly.
 *
 * Usage:
 * ```typescript
 * import { bold, formatRoleLine } from './terminal';
 *
 * console.log(bold('Dialogue Director'));
 * console.log(formatRoleLine('host', 'Welcome back.'));
 * ```
 */

import type { DirectorPlan, TimelineEvent } from '../../core/models';

// =============================================================================
// Styles and Colors
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const magenta = (s: string): string => `\x1b[35m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * A spoken line, labelled with the role that said it.
 *
 * @example
 * formatRoleLine('skeptic', 'Does that always hold?');
 * // "skeptic: Does that always hold?" with the label in magenta
 */
export function formatRoleLine(role: string, text: string): string {
  return `${magenta(bold(`${role}:`))} ${cyan(text)}`;
}

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * One-line summary of a plan for --debug output.
 */
export function formatPlanSummary(plan: DirectorPlan): string {
  const parts = [
    `beat=${plan.nextBeat}`,
    `role=${plan.nextRole}`,
    `action=${plan.outputAction}`,
    `flow=${plan.flowMode}`,
    `intent=${plan.intent}`,
    `mind=${plan.userMindState.join('+')}`,
    `source=${plan.debug.source}`,
  ];
  if (plan.debug.fallbackReason) parts.push(`fallback=${plan.debug.fallbackReason}`);
  if (plan.debug.guardrails?.length) parts.push(`guardrails=${plan.debug.guardrails.join(',')}`);
  return dim(`[plan] ${parts.join(' ')}`);
}

/**
 * One timeline event per line: seq, time, type and what was said or decided.
 */
export function formatTimelineEvent(event: TimelineEvent): string {
  const seq = String(event.seq).padStart(4);
  const time = dim(event.serverTimestamp.toISOString());
  const type = yellow(event.type.padEnd(16));

  let detail: string;
  if (event.directorPlan) {
    detail = `${event.directorPlan.nextBeat} → ${event.directorPlan.nextRole} (${event.directorPlan.outputAction})`;
  } else if (event.type === 'session_started') {
    detail = `entry ${event.entryId ?? '?'}`;
  } else if (event.role) {
    detail = `${event.role}: ${event.text}`;
  } else {
    detail = event.answer !== undefined ? `answer ${event.answer}` : event.text;
  }

  return `${seq}  ${time}  ${type} ${detail}`;
}

export function printBlankLine(): void {
  console.log();
}

export function printChatBanner(title: string, sessionId: string, roles: readonly string[]): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Dialogue Director - Practice Session'));
  console.log(formatSeparator(60));
  console.log(`  Topic:   ${green(title)}`);
  console.log(`  Cast:    ${yellow(roles.join(', ') || 'default roles')}`);
  console.log(`  Session: ${dim(sessionId)}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(dim('  Commands: /quit (exit) | /state | /help'));
  printBlankLine();
}

export function printCommandsHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/quit', 'End the session and exit'));
  console.log(formatCommandHelp('/state', 'Show beat, output clock and parked questions'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  printBlankLine();
}
