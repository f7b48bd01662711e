/**
 * JSON file helpers for configuration files.
 *
 * Writes go through write-tmp-fsync-rename so a config file is never left
 * half written.
 */

import { open, rename, unlink, readFile } from 'node:fs/promises';

/**
 * Error thrown when a JSON file cannot be read, parsed or written.
 */
export class JsonFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'JsonFileError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically writes JSON data with a 2-space indent and trailing newline.
 *
 * @throws {JsonFileError} If the write fails
 *
 * @example
 * ```typescript
 * await writeJsonFile('padkit.config.json', DEFAULT_CONFIG);
 * ```
 */
export async function writeJsonFile<T>(filePath: string, data: T): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';

    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // The tmp file may not exist yet.
    await unlink(tmpPath).catch(() => undefined);

    throw new JsonFileError(
      `Failed to write JSON to ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads and parses a JSON file. The result is untyped; validate it before use.
 *
 * @throws {JsonFileError} If the file cannot be read or parsed
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new JsonFileError(
      `Failed to read JSON from ${filePath}: ${describe(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}
