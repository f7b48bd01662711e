/**
 * TypeScript interfaces for padkit.config.json.
 */

import type { Alignment, PadSymbol } from './pad.js';

/**
 * Defaults applied when a command does not name them.
 */
export interface PadDefaultsConfig {
  /** Target width when `--width` is not given */
  width?: number;
  alignment: Alignment;
  symbol: PadSymbol;
}

/**
 * Root configuration object.
 */
export interface PadkitConfig {
  /** Configuration format version */
  version: string;
  defaults: PadDefaultsConfig;
  /** Print a warning when a source is truncated to fit */
  warn_on_truncate: boolean;
}
