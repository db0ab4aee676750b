import type { DependencyFlagDenylist } from './settings.js';
import { DEFAULT_SETTINGS } from './settings.js';

function isDependencyOutputFlag(arg: string, denylist: DependencyFlagDenylist): boolean {
  if (denylist.standalone.includes(arg)) return true;
  return (
    arg.length > denylist.prefix.length &&
    arg.startsWith(denylist.prefix) &&
    arg.endsWith(denylist.marker)
  );
}

/**
 * Drops the flags that make the compiler write a dependency file as a side
 * effect, so the recorded command can be re-run by analysis tools without
 * touching the build tree.
 *
 * Argument 0 (the compiler) is always kept. `-MF out.d` is dropped as a pair;
 * the joined spelling `-MFout.d` is dropped on its own.
 */
export function filterCompilerArgs(
  argv: readonly string[],
  denylist: DependencyFlagDenylist = DEFAULT_SETTINGS.dependencyFlags,
): string[] {
  if (!argv.length) return [];

  const out = [argv[0]];
  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (denylist.withValue.includes(arg)) {
      i++;
      continue;
    }
    if (denylist.withValue.some((f) => arg.startsWith(f))) continue;
    if (isDependencyOutputFlag(arg, denylist)) continue;
    out.push(arg);
  }
  return out;
}
