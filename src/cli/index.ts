/**
 * CLI Entry Point
 *
 * Parses command-line arguments with commander, builds the runtime from the
 * environment configuration, and routes to the command handlers.
 *
 * Available Commands:
 * - `entries` - List the topics in the catalog
 * - `chat <entryId>` - Run an interactive practice session
 * - `timeline <sessionId>` - Print a stored session's timeline
 * - `rebuild <sessionId>` - Replay a stored session's timeline into a fresh snapshot
 *
 * Usage:
 * ```bash
 * npm run cli -- entries
 * npm run cli -- chat opportunity-cost --debug
 * npm run cli -- chat opportunity-cost --mode generate --director delegated
 * npm run cli -- timeline sess_...
 * npm run cli -- rebuild sess_...
 * ```
 *
 * `chat` uses the configured storage driver; `timeline` and `rebuild` always
 * open the SQLite database at DATABASE_PATH.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { config, ConfigValidationError, validateConfig, type Config } from '../config';
import { createRuntime } from '../bootstrap';
import { EngineError } from '../core/errors';
import { runChatCommand } from './commands/chat';
import { runEntriesCommand } from './commands/entries';
import { runRebuildCommand, runTimelineCommand } from './commands/timeline';
import { dim, red } from './utils/terminal';

const chatOptionsSchema = z.object({
  mode: z.enum(['stub', 'generate']).optional(),
  director: z.enum(['heuristic', 'delegated']).optional(),
  debug: z.boolean().default(false),
});

/**
 * Applies the chat flags on top of the environment configuration.
 */
function withChatOverrides(base: Config, options: z.infer<typeof chatOptionsSchema>): Config {
  return {
    ...base,
    orchestrator: { ...base.orchestrator, responseMode: options.mode ?? base.orchestrator.responseMode },
    director: { ...base.director, mode: options.director ?? base.director.mode },
  };
}

function withSqliteStorage(base: Config): Config {
  return { ...base, storage: { ...base.storage, driver: 'sqlite' } };
}

function createProgram(): Command {
  const program = new Command('dialogue-director')
    .description('Multi-role spoken tutoring sessions, driven from the terminal')
    .version('0.1.0');

  program
    .command('entries')
    .description('List the topics a session can be started on')
    .action(async () => {
      await runEntriesCommand(config.storage.entriesPath);
    });

  program
    .command('chat')
    .description('Run an interactive practice session')
    .argument('<entryId>', 'Catalog entry to practise')
    .addOption(new Option('-m, --mode <mode>', 'How replies are produced').choices(['stub', 'generate']))
    .addOption(
      new Option('-d, --director <director>', 'Which Director decides each turn').choices([
        'heuristic',
        'delegated',
      ])
    )
    .option('--debug', 'Print each plan and the opening instructions', false)
    .action(async (entryId: string, rawOptions: unknown) => {
      const options = chatOptionsSchema.parse(rawOptions);
      const cfg = withChatOverrides(config, options);
      validateConfig(cfg);
      const runtime = await createRuntime(cfg);
      await runChatCommand(runtime, entryId, { debug: options.debug });
    });

  program
    .command('timeline')
    .description('Print the timeline of a session stored in SQLite')
    .argument('<sessionId>', 'Session id (sess_...)')
    .action(async (sessionId: string) => {
      const runtime = await createRuntime(withSqliteStorage(config));
      await runTimelineCommand(runtime, sessionId);
    });

  program
    .command('rebuild')
    .description('Rebuild the snapshot of a session stored in SQLite from its timeline')
    .argument('<sessionId>', 'Session id (sess_...)')
    .action(async (sessionId: string) => {
      const runtime = await createRuntime(withSqliteStorage(config));
      await runRebuildCommand(runtime, sessionId);
    });

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof EngineError || error instanceof ConfigValidationError) {
    console.error(red(`Error: ${error.message}`));
  } else {
    console.error(red('An unexpected error occurred:'));
    console.error(dim(error instanceof Error ? (error.stack ?? error.message) : String(error)));
  }
  process.exit(1);
});
