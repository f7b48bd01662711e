/**
 * padkit library entry point.
 *
 * This module exports the padding engine and its configuration helpers.
 */

export * from '../types/index.js';

export {
  ALIGNMENTS,
  PAD_SYMBOLS,
  SYMBOL_CHARS,
  DEFAULT_ALIGNMENT,
  DEFAULT_SYMBOL,
} from '../constants/catalog.js';

export { splitPadding } from './alignment.js';
export { truncationWindow } from './truncate.js';

export {
  symbolToChar,
  symbolToByte,
  symbolToCharSlice,
  symbolToByteSlice,
  charCodec,
  byteCodec,
} from './symbol.js';

export {
  padSequence,
  sliceSequence,
  assertWidth,
  PaddableSequence,
  type SequenceKind,
  type SequenceWriter,
} from './sequence.js';

export { PaddableText, TextBuffer, textKind, codePointLength, sliceCodePoints } from './text.js';
export { PaddableBytes, ByteBuffer, byteKind } from './bytes.js';
export { PaddableArray, arrayKind } from './array.js';

export {
  pad,
  sliceToFit,
  padAndPushToBuffer,
  whitespace,
  zeros,
  padIntoBytes,
} from './pad.js';

export {
  parseAlignment,
  parseSymbol,
  isAlignment,
  isPadSymbol,
  decodePadRequest,
  readPadRequest,
  TagError,
} from './tags.js';

export {
  loadSchema,
  validateWithSchema,
  bundledSchemaPath,
  type ValidationResult,
  type BundledSchema,
} from './schema.js';

export {
  loadConfig,
  findConfigFile,
  validateConfig,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from './config.js';

export { readJsonFile, writeJsonFile, JsonFileError } from './fs.js';

export {
  padWithDiagnostics,
  type DiagnosticsOptions,
  type PadOutcome,
  type WarnFn,
} from './diagnostics.js';

export {
  runBenchmarks,
  formatBenchTable,
  DEFAULT_BENCH_CASES,
  type BenchCase,
  type BenchResult,
  type BenchOptions,
} from './bench.js';
