export type DependencyFlagDenylist = {
  /** Flags dropped on their own, e.g. `-MD`. */
  standalone: readonly string[];
  /** A flag starting with `prefix` and ending with `marker` is dropped (`-MMD`). */
  prefix: string;
  marker: string;
  /** Flags dropped together with the argument that follows them (`-MF out.d`). */
  withValue: readonly string[];
};

export type SourceExtension = {
  ext: string;
  headers: readonly string[];
};

export type CompdbSettings = {
  readonly databaseFile: string;
  readonly make: string;
  readonly cc: string;
  readonly cxx: string;
  readonly sourceExtensions: readonly SourceExtension[];
  readonly dependencyFlags: DependencyFlagDenylist;
};

export const DEFAULT_SETTINGS: CompdbSettings = Object.freeze({
  databaseFile: 'compile_commands.json',
  make: 'make',
  cc: 'cc',
  cxx: 'c++',
  sourceExtensions: Object.freeze([
    { ext: '.c', headers: ['.h'] },
    { ext: '.cc', headers: ['.h', '.hh'] },
    { ext: '.cpp', headers: ['.h', '.hpp'] },
    { ext: '.C', headers: ['.h', '.H'] },
  ]),
  dependencyFlags: Object.freeze({
    standalone: ['-MD'],
    prefix: '-M',
    marker: 'D',
    withValue: ['-MF'],
  }),
});
