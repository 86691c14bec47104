/**
 * Template Library
 *
 * Holds the role and beat documents, keyed by file name without `.md`:
 *
 *   <promptsDir>/roles/host.md   -> role 'host'
 *   <promptsDir>/beats/twist.md  -> beat 'twist'
 *
 * Loading is all-or-nothing: an unreadable directory, or a directory without
 * a single template, raises TemplateLoadError so the engine refuses to start.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { TemplateLoadError, type TemplateKind } from './errors';

export class TemplateLibrary {
  private constructor(
    private readonly roles: ReadonlyMap<string, string>,
    private readonly beats: ReadonlyMap<string, string>
  ) {}

  /**
   * Reads every template under `promptsDir`.
   *
   * @throws {TemplateLoadError} If either directory cannot be read or holds no templates
   *
   * @example
   * ```typescript
   * const library = await TemplateLibrary.load(config.actor.promptsDir);
   * console.log(library.roleNames); // ['economist', 'host', 'skeptic']
   * ```
   */
  static async load(promptsDir: string): Promise<TemplateLibrary> {
    const roles = await readTemplateDir(join(promptsDir, 'roles'), 'role');
    const beats = await readTemplateDir(join(promptsDir, 'beats'), 'beat');
    console.log(`[Actor] Loaded ${roles.size} role and ${beats.size} beat templates from ${promptsDir}`);
    return new TemplateLibrary(roles, beats);
  }

  /**
   * Builds a library from in-memory documents, with the same emptiness rule
   * as `load`.
   */
  static fromTemplates(
    roles: Record<string, string>,
    beats: Record<string, string>
  ): TemplateLibrary {
    const roleMap = new Map(Object.entries(roles));
    const beatMap = new Map(Object.entries(beats));
    if (roleMap.size === 0 || beatMap.size === 0) {
      throw new TemplateLoadError('At least one role and one beat template are required');
    }
    return new TemplateLibrary(roleMap, beatMap);
  }

  getRole(name: string): string | undefined {
    return this.roles.get(name);
  }

  getBeat(name: string): string | undefined {
    return this.beats.get(name);
  }

  get roleNames(): string[] {
    return [...this.roles.keys()].sort();
  }

  get beatNames(): string[] {
    return [...this.beats.keys()].sort();
  }
}

async function readTemplateDir(dir: string, kind: TemplateKind): Promise<Map<string, string>> {
  let fileNames: string[];
  try {
    fileNames = await readdir(dir);
  } catch (error) {
    throw new TemplateLoadError(`Cannot read ${kind} templates from ${dir}`, error);
  }

  const templates = new Map<string, string>();
  for (const fileName of fileNames.filter((name) => name.endsWith('.md')).sort()) {
    const path = join(dir, fileName);
    try {
      templates.set(fileName.slice(0, -'.md'.length), await readFile(path, 'utf-8'));
    } catch (error) {
      throw new TemplateLoadError(`Cannot read ${kind} template ${path}`, error);
    }
  }

  if (templates.size === 0) {
    throw new TemplateLoadError(`No ${kind} templates found in ${dir}`);
  }
  return templates;
}
