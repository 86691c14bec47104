/**
 * Entry Catalog
 *
 * The read-only list of topics a session can be started on, loaded from a
 * JSON file and validated with zod.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Entry } from '@/core/models';
import { InternalError, NotFoundError } from '@/core/errors';

const quizQuestionSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  options: z.array(z.string()),
});

const entrySchema = z.object({
  entryId: z.string().min(1),
  domain: z.string().min(1),
  title: z.string().min(1),
  subtitle: z.string().default(''),
  description: z.string().default(''),
  keywords: z.array(z.string()).default([]),
  metaphor: z.string().optional(),
  roles: z.array(z.string().min(1)).default([]),
  diagnose: z.object({ questions: z.array(quizQuestionSchema) }).default({ questions: [] }),
});

const catalogSchema = z.object({
  entries: z.array(entrySchema),
});

export class EntryCatalog {
  private readonly byId: ReadonlyMap<string, Entry>;

  constructor(entries: readonly Entry[]) {
    this.byId = new Map(entries.map((entry) => [entry.entryId, entry]));
  }

  /**
   * Reads and validates a catalog file.
   *
   * @throws {InternalError} If the file is unreadable or does not match the schema
   *
   * @example
   * ```typescript
   * const catalog = await EntryCatalog.load('./data/entries.json');
   * const entry = catalog.get('opportunity-cost');
   * ```
   */
  static async load(path: string): Promise<EntryCatalog> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new InternalError(`Cannot read entry catalog ${path}`, error);
    }
    return EntryCatalog.fromJSON(raw, path);
  }

  /**
   * Validates an already-parsed catalog document.
   */
  static fromJSON(raw: unknown, source: string = 'catalog'): EntryCatalog {
    const result = catalogSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new InternalError(`Invalid entry catalog ${source}: ${issues}`);
    }
    return new EntryCatalog(result.data.entries);
  }

  /**
   * @throws {NotFoundError} If no entry has the id
   */
  get(entryId: string): Entry {
    const entry = this.byId.get(entryId);
    if (!entry) {
      throw new NotFoundError('Entry', entryId);
    }
    return entry;
  }

  find(entryId: string): Entry | undefined {
    return this.byId.get(entryId);
  }

  list(): Entry[] {
    return [...this.byId.values()];
  }
}
