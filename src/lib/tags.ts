/**
 * Textual tags for the alignment and symbol enums.
 *
 * Structured data and CLI flags carry `"Right"`, `"Whitespace"` and so on;
 * this module maps them onto the enums. The engine itself never parses text.
 */

import { ALIGNMENTS, DEFAULT_ALIGNMENT, DEFAULT_SYMBOL, PAD_SYMBOLS } from '../constants/catalog.js';
import { bundledSchemaPath, loadSchema, validateWithSchema } from './schema.js';
import { readJsonFile } from './fs.js';
import type { Alignment, PadRequest, PadSymbol } from '../types/pad.js';

const ALIGNMENT_SET: ReadonlySet<string> = new Set(ALIGNMENTS);
const SYMBOL_SET: ReadonlySet<string> = new Set(PAD_SYMBOLS);

/**
 * Error thrown when a tag names no known alignment or symbol, or when a pad
 * request document is malformed.
 */
export class TagError extends Error {
  constructor(
    message: string,
    public readonly tag?: string
  ) {
    super(message);
    this.name = 'TagError';
  }
}

export function isAlignment(value: unknown): value is Alignment {
  return typeof value === 'string' && ALIGNMENT_SET.has(value);
}

export function isPadSymbol(value: unknown): value is PadSymbol {
  return typeof value === 'string' && SYMBOL_SET.has(value);
}

/**
 * @throws {TagError} If the tag is not one of `Left`, `Right`, `Center`
 */
export function parseAlignment(tag: string): Alignment {
  if (isAlignment(tag)) {
    return tag;
  }
  throw new TagError(`Unknown alignment '${tag}'. Expected one of: ${ALIGNMENTS.join(', ')}`, tag);
}

/**
 * @throws {TagError} If the tag names no symbol in the catalog
 */
export function parseSymbol(tag: string): PadSymbol {
  if (isPadSymbol(tag)) {
    return tag;
  }
  throw new TagError(`Unknown symbol '${tag}'. Expected one of: ${PAD_SYMBOLS.join(', ')}`, tag);
}

interface PadRequestDocument {
  width: number;
  alignment?: Alignment;
  symbol?: PadSymbol;
}

/**
 * Decodes a pad request document, filling in the default alignment and
 * symbol.
 *
 * @param data - Parsed JSON, e.g. `{ "width": 8, "symbol": "Zero" }`
 * @param schema - The `pad_request` schema
 * @throws {TagError} If the document does not match the schema
 */
export function decodePadRequest(data: unknown, schema: object): PadRequest {
  const result = validateWithSchema<PadRequestDocument>(data, schema);
  if (!result.data) {
    throw new TagError(`Invalid pad request: ${result.errors.join('; ')}`);
  }
  return {
    width: result.data.width,
    alignment: result.data.alignment ?? DEFAULT_ALIGNMENT,
    symbol: result.data.symbol ?? DEFAULT_SYMBOL,
  };
}

/**
 * Reads and decodes a pad request file against the bundled schema.
 */
export async function readPadRequest(filePath: string): Promise<PadRequest> {
  const [data, schema] = await Promise.all([
    readJsonFile(filePath),
    loadSchema(bundledSchemaPath('pad_request')),
  ]);
  return decodePadRequest(data, schema);
}
