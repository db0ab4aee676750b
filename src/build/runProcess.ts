import { spawn } from 'child_process';

import { logDebug, logError } from '../dx/logger.js';

/** Exit code reported when a child's own code could not be obtained. */
export const UNKNOWN_EXIT_CODE = 1;

export type RunProcessOptions = {
  cwd?: string;
  /**
   * Forward SIGINT/SIGTERM to the child while it runs instead of letting them
   * terminate this process. Used by the driver so cleanup still happens.
   */
  forwardSignals?: boolean;
};

export type ProcessRunner = (command: string, args: readonly string[], options?: RunProcessOptions) => Promise<number>;

/**
 * Runs `command` with inherited stdio and resolves with its exit code, or
 * {@link UNKNOWN_EXIT_CODE} when it could not be started or died on a signal.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise<number>((resolve) => {
    logDebug('spawn', { command, args });
    const child = spawn(command, [...args], {
      stdio: 'inherit',
      cwd: options.cwd,
    });

    const forward = (signal: NodeJS.Signals) => {
      child.kill(signal);
    };
    if (options.forwardSignals) {
      process.on('SIGINT', forward);
      process.on('SIGTERM', forward);
    }
    const detach = () => {
      process.off('SIGINT', forward);
      process.off('SIGTERM', forward);
    };

    child.once('error', (err) => {
      detach();
      logError(`could not run ${command}: ${err.message}`);
      resolve(UNKNOWN_EXIT_CODE);
    });
    child.once('close', (code, signal) => {
      detach();
      if (code === null) {
        logDebug('child terminated by signal', { command, signal });
        resolve(UNKNOWN_EXIT_CODE);
        return;
      }
      resolve(code);
    });
  });
