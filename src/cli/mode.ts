import type { LogInvocation } from '../build/logMode.js';
import { runLogMode } from '../build/logMode.js';
import type { BuildOptions } from '../build/runBuild.js';
import { runBuild } from '../build/runBuild.js';
import { loadOptionalConfig, resolveSettings } from '../dx/config.js';
import { CompdbError, errorMessage, UsageError } from '../dx/errors.js';
import { logDebug, logError } from '../dx/logger.js';

export type CliMode =
  | { kind: 'help' }
  | { kind: 'build'; makeArgs: string[] }
  | { kind: 'log'; invocation: LogInvocation };

export const LOG_FLAG = '--log';

export function usage(): string {
  return `compdb-wrap

Usage:
	compdb-wrap [make-args...]
	compdb-wrap --log <scratch-dir> <compiler> [compiler-args...]
	compdb-wrap --help

Runs make with CC and CXX pointed back at this tool, records every compile
step and merges the result into compile_commands.json in the current
directory. Files not rebuilt keep their previous entries.

Examples:
	compdb-wrap -j8
	compdb-wrap clean all

Notes:
	- --log is the mode make invokes for each compile; you rarely call it by hand
	- Optional settings live in compdb-wrap.config.js (databaseFile, make, cc, cxx, debug)
	- Set COMPDB_WRAP_DEBUG=1 for debug logs on stderr
`;
}

/** Decides the operating mode once, from the arguments after the script name. */
export function parseMode(args: readonly string[]): CliMode {
  const [first, ...rest] = args;

  if (first === '--help' || first === '-h') return { kind: 'help' };

  if (first === LOG_FLAG) {
    const [scratchDir, compiler, ...compilerArgs] = rest;
    if (!scratchDir || !compiler) {
      throw new UsageError(`${LOG_FLAG} needs a scratch directory and a compiler`);
    }
    return { kind: 'log', invocation: { scratchDir, compiler, compilerArgs } };
  }

  return { kind: 'build', makeArgs: [...args] };
}

export type CliIo = {
  out: (text: string) => void;
  buildOptions?: BuildOptions;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
};

/** Runs the CLI and resolves with the process exit code. */
export async function runCli(args: readonly string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const mode = parseMode(args);
    logDebug('mode', mode.kind);

    if (mode.kind === 'help') {
      io.out(usage());
      return 0;
    }
    if (mode.kind === 'log') return await runLogMode(mode.invocation);

    const settings = resolveSettings(await loadOptionalConfig());
    return await runBuild(mode.makeArgs, { settings, ...io.buildOptions });
  } catch (err) {
    logError(errorMessage(err));
    if (err instanceof UsageError) io.out(usage());
    else if (!(err instanceof CompdbError) && err instanceof Error && err.stack) logDebug(err.stack);
    return 1;
  }
}
