/**
 * Symbol catalog conversions.
 *
 * Every symbol converts to a character, a byte, or a one-element slice of
 * either. Conversions are total; there is no way back from an element to a
 * symbol.
 */

import { SYMBOL_CHARS } from '../constants/catalog.js';
import type { PadSymbol, SymbolCodec } from '../types/pad.js';

export function symbolToChar(symbol: PadSymbol): string {
  return SYMBOL_CHARS[symbol];
}

export function symbolToByte(symbol: PadSymbol): number {
  return SYMBOL_CHARS[symbol].charCodeAt(0);
}

export function symbolToCharSlice(symbol: PadSymbol): string[] {
  return [symbolToChar(symbol)];
}

export function symbolToByteSlice(symbol: PadSymbol): Uint8Array {
  return Uint8Array.of(symbolToByte(symbol));
}

/** Fill elements for code-point sequences (`string[]`). */
export const charCodec: SymbolCodec<string> = {
  fromSymbol: symbolToChar,
};

/** Fill elements for byte sequences (`Uint8Array`, `number[]`). */
export const byteCodec: SymbolCodec<number> = {
  fromSymbol: symbolToByte,
};
