import { resolve } from 'path';

import type { CompdbSettings } from '../compdb/settings.js';
import { DEFAULT_SETTINGS } from '../compdb/settings.js';
import { errorMessage, PrerequisiteError } from '../dx/errors.js';
import { logDebug, logError } from '../dx/logger.js';
import { mergeScratchIntoDatabase } from '../merge/mergeDatabase.js';
import { withScratchDir } from '../scratch/logWriter.js';
import { getScratchDir } from '../scratch/scratchPaths.js';
import { shellJoin } from '../utils/shellQuote.js';
import { which } from '../utils/which.js';
import type { ProcessRunner } from './runProcess.js';
import { runProcess, UNKNOWN_EXIT_CODE } from './runProcess.js';

export type BuildPhase = 'locating' | 'build-running' | 'merging' | 'cleaning-up' | 'done';

export type Toolchain = {
  make: string;
  cc: string;
  cxx: string;
};

export type BuildOptions = {
  cwd?: string;
  settings?: CompdbSettings;
  /** Command that re-enters this tool, e.g. `[node, cli.js]`. */
  wrapperCommand?: readonly string[];
  /** Overrides the scratch location (tests). */
  scratchDir?: string;
  locate?: (name: string) => string | null;
  run?: ProcessRunner;
  onPhase?: (phase: BuildPhase) => void;
};

/** Node plus its loader flags plus the CLI script: how make calls us back. */
export function defaultWrapperCommand(): string[] {
  return [process.execPath, ...process.execArgv, process.argv[1]];
}

export function locateToolchain(
  settings: Pick<CompdbSettings, 'make' | 'cc' | 'cxx'>,
  locate: (name: string) => string | null = (name) => which(name),
): Toolchain {
  const find = (name: string) => {
    const resolved = locate(name);
    if (!resolved) throw new PrerequisiteError(name);
    return resolved;
  };
  return { make: find(settings.make), cc: find(settings.cc), cxx: find(settings.cxx) };
}

/**
 * `CC=...` / `CXX=...` assignments for make's command line. Command-line
 * variables take precedence over assignments inside the makefile.
 */
export function compilerOverrides(
  wrapperCommand: readonly string[],
  scratchDir: string,
  toolchain: Pick<Toolchain, 'cc' | 'cxx'>,
): string[] {
  const wrap = (compiler: string) => shellJoin([...wrapperCommand, '--log', scratchDir, compiler]);
  return [`CC=${wrap(toolchain.cc)}`, `CXX=${wrap(toolchain.cxx)}`];
}

/**
 * Runs make with the compilers redirected through log mode, then merges what
 * was logged into the compilation database.
 *
 * The merge is attempted and the scratch directory removed whatever make
 * returned. Resolves with make's exit code; a failed merge turns a
 * successful build into {@link UNKNOWN_EXIT_CODE}.
 */
export async function runBuild(makeArgs: readonly string[], options: BuildOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const run = options.run ?? runProcess;
  const onPhase = options.onPhase ?? (() => {});

  onPhase('locating');
  const toolchain = locateToolchain(settings, options.locate);
  logDebug('toolchain', toolchain);

  const scratchDir = options.scratchDir ?? getScratchDir(cwd);
  const databasePath = resolve(cwd, settings.databaseFile);
  const wrapperCommand = options.wrapperCommand ?? defaultWrapperCommand();

  const exitCode = await withScratchDir(scratchDir, async (dir) => {
    try {
      onPhase('build-running');
      const args = [...makeArgs, ...compilerOverrides(wrapperCommand, dir, toolchain)];
      const buildCode = await run(toolchain.make, args, { cwd, forwardSignals: true });

      onPhase('merging');
      try {
        mergeScratchIntoDatabase(dir, databasePath);
      } catch (err) {
        logError(`failed to update ${databasePath}: ${errorMessage(err)}`);
        return buildCode === 0 ? UNKNOWN_EXIT_CODE : buildCode;
      }
      return buildCode;
    } finally {
      onPhase('cleaning-up');
    }
  });

  onPhase('done');
  return exitCode;
}
