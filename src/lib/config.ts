/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to find, load and validate padkit config files.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { readJsonFile, JsonFileError } from './fs.js';
import { bundledSchemaPath, loadSchema, validateWithSchema } from './schema.js';
import { CONFIG_FILE_NAME, CONFIG_VERSION } from './branding.js';
import { DEFAULT_ALIGNMENT, DEFAULT_SYMBOL } from '../constants/catalog.js';
import type { PadkitConfig } from '../types/config.js';

export { CONFIG_FILE_NAME };

/**
 * Configuration used when no config file exists.
 */
export const DEFAULT_CONFIG: PadkitConfig = {
  version: CONFIG_VERSION,
  defaults: {
    alignment: DEFAULT_ALIGNMENT,
    symbol: DEFAULT_SYMBOL,
  },
  warn_on_truncate: true,
};

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up.
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Validates a parsed config object against the bundled config schema.
 *
 * @throws {ConfigError} If the object does not match the schema
 */
export async function validateConfig(config: unknown, configPath?: string): Promise<PadkitConfig> {
  const schema = await loadSchema(bundledSchemaPath('config'));
  const result = validateWithSchema<PadkitConfig>(config, schema);
  if (!result.data) {
    throw new ConfigError(
      `Invalid configuration file: ${result.errors.join('; ')}`,
      configPath
    );
  }
  return result.data;
}

/**
 * Loads and validates a padkit configuration file.
 *
 * @param configPath - Explicit path (no search). When omitted, searches upward
 *                     from `startDir` and falls back to {@link DEFAULT_CONFIG}.
 * @throws {ConfigError} If an explicit file is missing, or any file is unreadable or invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const explicit = await loadConfig('/path/to/padkit.config.json');
 * ```
 */
export async function loadConfig(configPath?: string, startDir?: string): Promise<PadkitConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile(startDir);
  if (!resolvedPath) {
    return DEFAULT_CONFIG;
  }

  let rawConfig: unknown;
  try {
    rawConfig = await readJsonFile(resolvedPath);
  } catch (error) {
    if (error instanceof JsonFileError) {
      throw new ConfigError(
        `Failed to read configuration file: ${error.message}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  return validateConfig(rawConfig, resolvedPath);
}
