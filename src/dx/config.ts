import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import type { CompdbSettings } from '../compdb/settings.js';
import { DEFAULT_SETTINGS } from '../compdb/settings.js';
import { ConfigError } from './errors.js';
import { logDebug, setDebugEnabled } from './logger.js';

export const CONFIG_FILE = 'compdb-wrap.config.js';

export const runtimeConfigSchema = z
  .object({
    /** Database filename, relative to the project root. */
    databaseFile: z.string().min(1).optional(),
    /** Build orchestrator to run instead of `make`. */
    make: z.string().min(1).optional(),
    /** Real C compiler to wrap (looked up on PATH). */
    cc: z.string().min(1).optional(),
    /** Real C++ compiler to wrap (looked up on PATH). */
    cxx: z.string().min(1).optional(),
    /** Enable debug logs without env var */
    debug: z.boolean().optional(),
  })
  .strict();

export type CompdbRuntimeConfig = z.infer<typeof runtimeConfigSchema>;

let cached:
  | { loaded: true; config: CompdbRuntimeConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE);
}

/**
 * Loads optional `compdb-wrap.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 * - Validated: an unknown key or wrong type throws ConfigError
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<CompdbRuntimeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const mod: unknown = await import(pathToFileURL(resolve(p)).href);
  const exported =
    typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const result = runtimeConfigSchema.safeParse(exported);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid ${CONFIG_FILE} at ${p}: ${issues.join('; ')}`);
  }

  if (result.data.debug) setDebugEnabled(true);
  cached = { loaded: true, config: result.data };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** Folds an optional config over the defaults into a frozen settings value. */
export function resolveSettings(config: CompdbRuntimeConfig | null): CompdbSettings {
  return Object.freeze({
    ...DEFAULT_SETTINGS,
    databaseFile: config?.databaseFile ?? DEFAULT_SETTINGS.databaseFile,
    make: config?.make ?? DEFAULT_SETTINGS.make,
    cc: config?.cc ?? DEFAULT_SETTINGS.cc,
    cxx: config?.cxx ?? DEFAULT_SETTINGS.cxx,
  });
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
