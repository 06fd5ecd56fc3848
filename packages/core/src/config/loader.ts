// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { MembankConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { type MembankConfigInput, validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.membank.yml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .membank.yml > defaults.
 *
 * Defaults come from the schema, so a missing file or a partial one
 * still yields a complete config.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: MembankConfigInput;
  skipFile?: boolean;
}): MembankConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = {};

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (fileConfig !== null && fileConfig !== undefined) {
      if (!isPlainObject(fileConfig)) {
        throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
      }
      merged = deepMerge(merged, fileConfig);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

export { deepMerge };
