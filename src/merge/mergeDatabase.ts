import { existsSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import type { ZodError } from 'zod';

import type { CompilationDatabase, CompileCommandEntry } from '../compdb/compdbTypes.js';
import { compilationDatabaseSchema, compileCommandEntrySchema } from '../compdb/compdbTypes.js';
import { errorMessage } from '../dx/errors.js';
import { logDebug, logWarn } from '../dx/logger.js';

export type MergeSummary = {
  /** Record files found in the scratch directory. */
  records: number;
  /** Records that could not be read or parsed. */
  skipped: number;
  /** Distinct file paths in this batch. */
  entries: number;
  /** Entries in the database after the merge. */
  total: number;
};

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/**
 * Reads every record in the scratch directory into a map keyed by `file`.
 *
 * When several records describe the same path the one enumerated last wins.
 * Enumeration order is whatever the filesystem returns, so which of several
 * concurrent records survives is unspecified.
 */
export function readScratchRecords(scratchDir: string): {
  batch: Map<string, CompileCommandEntry>;
  records: number;
  skipped: number;
} {
  const batch = new Map<string, CompileCommandEntry>();
  if (!existsSync(scratchDir)) return { batch, records: 0, skipped: 0 };

  const names = readdirSync(scratchDir, { withFileTypes: true })
    .filter((d) => d.isFile())
    .map((d) => d.name);

  let skipped = 0;
  for (const name of names) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(join(scratchDir, name), 'utf8'));
    } catch (err) {
      skipped++;
      logWarn(`skipping unreadable scratch record ${name}: ${errorMessage(err)}`);
      continue;
    }

    const result = compileCommandEntrySchema.safeParse(raw);
    if (!result.success) {
      skipped++;
      logWarn(`skipping malformed scratch record ${name}: ${formatIssues(result.error)}`);
      continue;
    }
    batch.set(result.data.file, result.data);
  }

  return { batch, records: names.length, skipped };
}

/** Missing or invalid database files load as an empty database. */
export function loadDatabase(databasePath: string): CompilationDatabase {
  if (!existsSync(databasePath)) return [];
  try {
    const result = compilationDatabaseSchema.safeParse(JSON.parse(readFileSync(databasePath, 'utf8')));
    if (result.success) return result.data;
    logWarn(`ignoring invalid compilation database ${databasePath}`);
  } catch (err) {
    logWarn(`ignoring unreadable compilation database ${databasePath}: ${errorMessage(err)}`);
  }
  return [];
}

/**
 * Writes the database through a temporary sibling so readers never see a
 * half-written file.
 */
export function saveDatabase(databasePath: string, db: CompilationDatabase): void {
  const tmp = join(dirname(databasePath), `.${basename(databasePath)}.${process.pid}.tmp`);
  writeFileSync(tmp, JSON.stringify(db, null, 2) + '\n', 'utf8');
  renameSync(tmp, databasePath);
}

/**
 * Existing entries whose path appears in `incoming` are dropped; the rest keep
 * their order and the incoming entries are appended.
 */
export function mergeEntries(
  existing: readonly CompileCommandEntry[],
  incoming: ReadonlyMap<string, CompileCommandEntry>,
): CompilationDatabase {
  return [...existing.filter((e) => !incoming.has(e.file)), ...incoming.values()];
}

export function mergeScratchIntoDatabase(scratchDir: string, databasePath: string): MergeSummary {
  const { batch, records, skipped } = readScratchRecords(scratchDir);
  const merged = mergeEntries(loadDatabase(databasePath), batch);
  saveDatabase(databasePath, merged);

  const summary: MergeSummary = { records, skipped, entries: batch.size, total: merged.length };
  logDebug('merged compilation database', { databasePath, ...summary });
  return summary;
}
