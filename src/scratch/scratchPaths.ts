import { createHash } from 'crypto';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * Scratch directory for builds started in `cwd`.
 *
 * Derived from the working directory only, so a configure step that bakes the
 * path into generated makefiles finds the same directory on later runs.
 */
export function getScratchDir(cwd: string = process.cwd(), root: string = tmpdir()): string {
  const hash = createHash('sha256').update(cwd).digest('hex').slice(0, 16);
  return join(root, `compdb-wrap-${hash}`);
}

/** Longest stem kept from the file path; the rest of the name must fit NAME_MAX. */
export const MAX_RECORD_STEM = 200;

export function sanitizeRecordName(file: string): string {
  const name = file.replace(/[\\/]/g, '_');
  if (name.length <= MAX_RECORD_STEM) return name;
  const hash = createHash('sha256').update(file).digest('hex').slice(0, 16);
  return `${name.slice(-(MAX_RECORD_STEM - hash.length - 1))}-${hash}`;
}

export function timestampToken(): string {
  return `${process.hrtime.bigint()}-${process.pid}`;
}

export function getRecordPath(scratchDir: string, file: string): string {
  return join(scratchDir, `${sanitizeRecordName(file)}.${timestampToken()}.json`);
}
