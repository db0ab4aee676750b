export type CompdbErrorCode = 'MISSING_EXECUTABLE' | 'INVALID_CONFIG' | 'USAGE';

export class CompdbError extends Error {
  readonly code: CompdbErrorCode;

  constructor(code: CompdbErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required executable is not on PATH. Raised before any work is done. */
export class PrerequisiteError extends CompdbError {
  readonly executable: string;

  constructor(executable: string) {
    super('MISSING_EXECUTABLE', `Required executable not found on PATH: ${executable}`);
    this.executable = executable;
  }
}

export class ConfigError extends CompdbError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export class UsageError extends CompdbError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
