import { existsSync } from 'fs';
import { resolve } from 'path';

import type { CompileCommandEntry } from './compdbTypes.js';
import type { CompdbSettings, SourceExtension } from './settings.js';
import { DEFAULT_SETTINGS } from './settings.js';

export function matchSourceExtension(
  arg: string,
  extensions: readonly SourceExtension[],
): SourceExtension | undefined {
  return extensions.find((e) => arg.length > e.ext.length && arg.endsWith(e.ext));
}

/**
 * Companion headers that exist next to `sourcePath`. Only the same directory
 * and basename are considered.
 */
export function findCompanionHeaders(
  sourcePath: string,
  source: SourceExtension,
  cwd: string,
): string[] {
  const stem = sourcePath.slice(0, -source.ext.length);
  return source.headers
    .map((h) => `${stem}${h}`)
    .filter((candidate) => existsSync(resolve(cwd, candidate)));
}

/**
 * Turns one (already filtered) compiler invocation into database entries:
 * one per source argument, followed by a synthetic entry for each companion
 * header, compiled with the same flags.
 *
 * Link steps and flag-only queries have no source argument and yield `[]`.
 */
export function synthesizeEntries(
  argv: readonly string[],
  cwd: string,
  settings: Pick<CompdbSettings, 'sourceExtensions'> = DEFAULT_SETTINGS,
): CompileCommandEntry[] {
  const entries: CompileCommandEntry[] = [];
  const command = argv.join(' ');

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    const source = matchSourceExtension(arg, settings.sourceExtensions);
    if (!source) continue;

    entries.push({ directory: cwd, command, file: arg });

    for (const header of findCompanionHeaders(arg, source, cwd)) {
      const headerArgv = argv.map((a, idx) => (idx === i ? header : a));
      entries.push({ directory: cwd, command: headerArgv.join(' '), file: header });
    }
  }

  return entries;
}
