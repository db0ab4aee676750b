import { appendFileSync, mkdirSync, rmSync } from 'fs';

import type { CompileCommandEntry } from '../compdb/compdbTypes.js';
import { errorMessage } from '../dx/errors.js';
import { logDebug, logWarn } from '../dx/logger.js';
import { getRecordPath } from './scratchPaths.js';

/**
 * Writes each entry to its own record file. Throws when the scratch directory
 * is missing or not writable.
 */
export function writeLogRecords(scratchDir: string, entries: readonly CompileCommandEntry[]): string[] {
  const written: string[] = [];
  for (const entry of entries) {
    const path = getRecordPath(scratchDir, entry.file);
    appendFileSync(path, JSON.stringify(entry) + '\n', 'utf8');
    written.push(path);
  }
  logDebug('wrote scratch records', { scratchDir, count: written.length });
  return written;
}

/**
 * Runs `fn` with the scratch directory created, and removes it afterwards on
 * every exit path. Removal failures are reported, not thrown.
 */
export async function withScratchDir<T>(scratchDir: string, fn: (dir: string) => Promise<T>): Promise<T> {
  mkdirSync(scratchDir, { recursive: true });
  try {
    return await fn(scratchDir);
  } finally {
    try {
      rmSync(scratchDir, { recursive: true, force: true });
      logDebug('removed scratch directory', { scratchDir });
    } catch (err) {
      logWarn(`could not remove scratch directory ${scratchDir}: ${errorMessage(err)}`);
    }
  }
}
