/**
 * `padkit init`: write a default padkit.config.json.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../lib/config.js';
import { writeJsonFile } from '../lib/fs.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * @returns Path of the written config file
 * @throws Error if the file exists and `force` is not set
 */
export async function initCommand(options: { force?: boolean; dir?: string }): Promise<string> {
  const configPath = join(options.dir ?? process.cwd(), CONFIG_FILE_NAME);
  if (!options.force && (await exists(configPath))) {
    throw new Error(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
  }
  await writeJsonFile(configPath, DEFAULT_CONFIG);
  return configPath;
}
