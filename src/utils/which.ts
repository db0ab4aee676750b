import { accessSync, constants, statSync } from 'fs';
import { delimiter, join, resolve } from 'path';

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves `cmd` on `searchPath` (defaults to `PATH`). Names containing a
 * slash are checked as given, relative to the current directory.
 */
export function which(cmd: string, searchPath: string | undefined = process.env.PATH): string | null {
  if (cmd.includes('/')) return isExecutableFile(cmd) ? resolve(cmd) : null;

  const dirs = (searchPath ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const full = join(dir, cmd);
    if (isExecutableFile(full)) return full;
  }
  return null;
}
