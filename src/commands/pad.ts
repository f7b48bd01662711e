/**
 * `padkit pad`: pad each argument, or each stdin line, to a fixed width.
 */

import { loadConfig } from '../lib/config.js';
import { padWithDiagnostics } from '../lib/diagnostics.js';
import { parseAlignment, parseSymbol, readPadRequest } from '../lib/tags.js';
import { TextBuffer } from '../lib/text.js';
import { consoleIO } from './io.js';
import type { CommandIO } from './io.js';
import type { PadkitConfig } from '../types/config.js';
import type { PadRequest } from '../types/pad.js';

export interface PadCommandOptions {
  texts: string[];
  width?: string;
  alignment?: string;
  symbol?: string;
  /** JSON file holding a pad request */
  request?: string;
  configPath?: string;
  quiet?: boolean;
}

export function parseWidth(value: string): number {
  const width = Number(value);
  if (value.trim() === '' || !Number.isSafeInteger(width) || width < 0) {
    throw new Error(`Invalid width: ${value}. Must be a non-negative integer.`);
  }
  return width;
}

/**
 * Resolves the effective request: flags win over the request file, which
 * wins over config defaults.
 */
export async function resolvePadRequest(options: PadCommandOptions, config: PadkitConfig): Promise<PadRequest> {
  const fromFile = options.request ? await readPadRequest(options.request) : undefined;

  const width = options.width !== undefined ? parseWidth(options.width) : fromFile?.width ?? config.defaults.width;
  if (width === undefined) {
    throw new Error('No width given. Pass --width, --request, or set defaults.width in the config file.');
  }

  return {
    width,
    alignment: options.alignment
      ? parseAlignment(options.alignment)
      : fromFile?.alignment ?? config.defaults.alignment,
    symbol: options.symbol ? parseSymbol(options.symbol) : fromFile?.symbol ?? config.defaults.symbol,
  };
}

export async function padCommand(options: PadCommandOptions, io: CommandIO = consoleIO): Promise<void> {
  const config = await loadConfig(options.configPath);
  const request = await resolvePadRequest(options, config);
  const enabled = config.warn_on_truncate && !options.quiet;

  const lines = options.texts.length > 0 ? options.texts : await io.readLines();
  const buffer = new TextBuffer();
  let truncated = 0;

  for (const line of lines) {
    const outcome = padWithDiagnostics(line, request, { warn: io.warn, enabled });
    if (outcome.truncated) truncated++;
    buffer.push(outcome.text);
    buffer.push('\n');
  }

  io.write(buffer.toString());
  if (truncated > 1 && enabled) {
    io.warn(`${truncated} of ${lines.length} lines were truncated to width ${request.width}`);
  }
}
