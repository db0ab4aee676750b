import type { CompdbSettings } from '../compdb/settings.js';
import { DEFAULT_SETTINGS } from '../compdb/settings.js';
import { filterCompilerArgs } from '../compdb/filterArgs.js';
import { synthesizeEntries } from '../compdb/synthesizeEntries.js';
import { logDebug } from '../dx/logger.js';
import { writeLogRecords } from '../scratch/logWriter.js';
import type { ProcessRunner } from './runProcess.js';
import { runProcess } from './runProcess.js';

export type LogInvocation = {
  scratchDir: string;
  compiler: string;
  compilerArgs: string[];
};

export type LogModeOptions = {
  cwd?: string;
  settings?: CompdbSettings;
  run?: ProcessRunner;
};

/**
 * Stand-in for the real compiler: records the invocation in the scratch
 * directory, then runs the compiler with its original arguments and returns
 * its exit code.
 *
 * The compile only starts once the records are written; a write failure
 * throws and the compile is never attempted.
 */
export async function runLogMode(invocation: LogInvocation, options: LogModeOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const run = options.run ?? runProcess;

  const argv = [invocation.compiler, ...invocation.compilerArgs];
  const filtered = filterCompilerArgs(argv, settings.dependencyFlags);
  const entries = synthesizeEntries(filtered, cwd, settings);

  if (entries.length) writeLogRecords(invocation.scratchDir, entries);
  else logDebug('no source arguments, nothing to record', { argv });

  return run(invocation.compiler, invocation.compilerArgs, { cwd });
}
