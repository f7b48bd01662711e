/**
 * padkit type definitions.
 */

export { Alignment, PadSymbol } from './pad.js';

export type {
  PaddingSplit,
  TruncationWindow,
  SymbolCodec,
  Paddable,
  PadRequest,
} from './pad.js';

export type { PadkitConfig, PadDefaultsConfig } from './config.js';
