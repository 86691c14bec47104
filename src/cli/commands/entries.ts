/**
 * Entries Command
 *
 * Lists the topics in the catalog.
 *
 * Usage:
 * ```bash
 * npm run cli -- entries
 * ```
 */

import { EntryCatalog } from '../../core/catalog/entry-catalog';
import { bold, dim, green, printBlankLine } from '../utils/terminal';

export async function runEntriesCommand(entriesPath: string): Promise<void> {
  const catalog = await EntryCatalog.load(entriesPath);
  const entries = catalog.list();

  if (entries.length === 0) {
    console.log(dim(`No entries in ${entriesPath}.`));
    return;
  }

  printBlankLine();
  console.log(bold('Available entries:'));
  printBlankLine();
  for (const entry of entries) {
    console.log(`  ${green(entry.entryId.padEnd(24))} ${entry.title} ${dim(`(${entry.domain})`)}`);
    if (entry.subtitle) {
      console.log(`  ${' '.repeat(24)} ${dim(entry.subtitle)}`);
    }
  }
  printBlankLine();
  console.log(dim('Start one with: npm run cli -- chat <entryId>'));
}
