/**
 * Single source of truth for the alignment and symbol catalogs.
 *
 * The JSON schemas under `schemas/` repeat these lists as enums.
 *
 * @see tests/schema/S001-catalog-parity.test.ts - enforces parity with schema
 */

import { Alignment, PadSymbol } from '../types/pad.js';

export const ALIGNMENTS = [Alignment.Left, Alignment.Right, Alignment.Center] as const;

export const DEFAULT_ALIGNMENT = Alignment.Right;
export const DEFAULT_SYMBOL = PadSymbol.Whitespace;

/**
 * Fill character for every symbol. All entries are single ASCII characters.
 */
export const SYMBOL_CHARS: Readonly<Record<PadSymbol, string>> = {
  [PadSymbol.Whitespace]: ' ',
  [PadSymbol.Zero]: '0',
  [PadSymbol.One]: '1',
  [PadSymbol.Two]: '2',
  [PadSymbol.Three]: '3',
  [PadSymbol.Four]: '4',
  [PadSymbol.Five]: '5',
  [PadSymbol.Six]: '6',
  [PadSymbol.Seven]: '7',
  [PadSymbol.Eight]: '8',
  [PadSymbol.Nine]: '9',
  [PadSymbol.Hyphen]: '-',
  [PadSymbol.Underscore]: '_',
  [PadSymbol.Period]: '.',
  [PadSymbol.Comma]: ',',
  [PadSymbol.Colon]: ':',
  [PadSymbol.Semicolon]: ';',
  [PadSymbol.Exclamation]: '!',
  [PadSymbol.Question]: '?',
  [PadSymbol.Asterisk]: '*',
  [PadSymbol.Plus]: '+',
  [PadSymbol.Equals]: '=',
  [PadSymbol.Hash]: '#',
  [PadSymbol.Slash]: '/',
  [PadSymbol.Backslash]: '\\',
  [PadSymbol.Pipe]: '|',
  [PadSymbol.Tilde]: '~',
};

/**
 * All symbols in declaration order.
 */
export const PAD_SYMBOLS: readonly PadSymbol[] = Object.values(PadSymbol);
