import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigurationError } from '../signature/signatureTypes.js';
import { logDebug } from './logger.js';

export type BindingConfig = {
  /** Enable debug logs without the env var. */
  debug?: boolean;
  /** Module specifier the generated module imports implementations from. */
  implModule?: string;
  /** Default output path for `enginebind gen`. */
  outFile?: string;
  /** Module specifier the generated module imports the glue runtime from. */
  runtimeModule?: string;
};

export const CONFIG_FILE_NAME = 'enginebind.config.js';

let cached:
  | { loaded: true; config: BindingConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function readString(raw: Record<string, unknown>, key: keyof BindingConfig): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v) {
    throw new ConfigurationError(`${CONFIG_FILE_NAME}: \`${key}\` must be a non-empty string`);
  }
  return v;
}

/** Checks a loaded config object field by field. */
export function validateConfig(raw: unknown): BindingConfig {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`${CONFIG_FILE_NAME}: default export must be an object`);
  }
  const record: Record<string, unknown> = { ...raw };

  const known = new Set(['debug', 'implModule', 'outFile', 'runtimeModule']);
  for (const key of Object.keys(record)) {
    if (!known.has(key)) {
      throw new ConfigurationError(`${CONFIG_FILE_NAME}: unknown key \`${key}\``);
    }
  }

  const cfg: BindingConfig = {};
  if (record.debug !== undefined) {
    if (typeof record.debug !== 'boolean') {
      throw new ConfigurationError(`${CONFIG_FILE_NAME}: \`debug\` must be a boolean`);
    }
    cfg.debug = record.debug;
  }
  const implModule = readString(record, 'implModule');
  if (implModule !== undefined) cfg.implModule = implModule;
  const outFile = readString(record, 'outFile');
  if (outFile !== undefined) cfg.outFile = outFile;
  const runtimeModule = readString(record, 'runtimeModule');
  if (runtimeModule !== undefined) cfg.runtimeModule = runtimeModule;
  return cfg;
}

/**
 * Loads optional `enginebind.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<BindingConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported =
    mod !== null && typeof mod === 'object' && 'default' in mod ? mod.default : mod;
  const cfg = validateConfig(exported);
  cached = { loaded: true, config: cfg };
  logDebug('loaded config', { path: p });
  return cfg;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
