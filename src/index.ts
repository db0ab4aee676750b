export type { CompilationDatabase, CompileCommandEntry } from './compdb/compdbTypes.js';
export { compilationDatabaseSchema, compileCommandEntrySchema } from './compdb/compdbTypes.js';
export type { CompdbSettings, DependencyFlagDenylist, SourceExtension } from './compdb/settings.js';
export { DEFAULT_SETTINGS } from './compdb/settings.js';
export { filterCompilerArgs } from './compdb/filterArgs.js';
export { synthesizeEntries } from './compdb/synthesizeEntries.js';
export { getScratchDir } from './scratch/scratchPaths.js';
export { withScratchDir, writeLogRecords } from './scratch/logWriter.js';
export type { MergeSummary } from './merge/mergeDatabase.js';
export { loadDatabase, mergeEntries, mergeScratchIntoDatabase } from './merge/mergeDatabase.js';
export type { LogInvocation } from './build/logMode.js';
export { runLogMode } from './build/logMode.js';
export type { BuildOptions, BuildPhase } from './build/runBuild.js';
export { runBuild } from './build/runBuild.js';
export type { CompdbRuntimeConfig } from './dx/config.js';
export { loadOptionalConfig, resolveSettings } from './dx/config.js';
export { CompdbError, ConfigError, PrerequisiteError, UsageError } from './dx/errors.js';
