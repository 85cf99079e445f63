// packages/core/src/config/loader.ts

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ConfigOverrides, ProjectConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.docsift.yml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; `undefined` source values are skipped so
 * unset CLI flags never clobber file settings.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .docsift.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .docsift.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

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
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

/** Write a ProjectConfig to .docsift.yml in the given directory. Returns the file path. */
export function writeConfig(config: ProjectConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
  return configPath;
}

/**
 * Read the API key from the variable named by `model.apiKeyEnv`.
 * The only place the environment is consulted for credentials.
 */
export function resolveApiKey(
  config: ProjectConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env[config.model.apiKeyEnv]?.trim();
  if (!value) {
    throw new ConfigError(
      `Missing API key: set ${config.model.apiKeyEnv} in your environment`,
      'model.apiKeyEnv',
    );
  }
  return value;
}

export { deepMerge };
