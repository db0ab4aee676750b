import { z } from 'zod';

export const compileCommandEntrySchema = z.object({
  /** Absolute working directory the compiler ran in. */
  directory: z.string(),
  /** Filtered argument vector, space-joined. */
  command: z.string(),
  /** Source or header path as it appeared on the command line. */
  file: z.string(),
});

export const compilationDatabaseSchema = z.array(compileCommandEntrySchema);

export type CompileCommandEntry = z.infer<typeof compileCommandEntrySchema>;

export type CompilationDatabase = CompileCommandEntry[];
