import { describe, it, expect } from 'vitest';
import {
  byteCodec,
  charCodec,
  symbolToByte,
  symbolToByteSlice,
  symbolToChar,
  symbolToCharSlice,
} from '@/lib/symbol.js';
import { PAD_SYMBOLS } from '@/constants/catalog.js';
import { PadSymbol } from '@/types/pad.js';

describe('symbol catalog', () => {
  it('maps common symbols to their characters and bytes', () => {
    expect(symbolToChar(PadSymbol.Whitespace)).toBe(' ');
    expect(symbolToByte(PadSymbol.Whitespace)).toBe(32);
    expect(symbolToChar(PadSymbol.Zero)).toBe('0');
    expect(symbolToByte(PadSymbol.Zero)).toBe(48);
    expect(symbolToChar(PadSymbol.Nine)).toBe('9');
    expect(symbolToChar(PadSymbol.Hyphen)).toBe('-');
    expect(symbolToChar(PadSymbol.Underscore)).toBe('_');
    expect(symbolToChar(PadSymbol.Backslash)).toBe('\\');
  });

  it('maps every symbol to a distinct single ASCII character', () => {
    const chars = new Set<string>();
    for (const symbol of PAD_SYMBOLS) {
      const char = symbolToChar(symbol);
      expect(char).toHaveLength(1);
      expect(symbolToByte(symbol)).toBe(char.charCodeAt(0));
      expect(symbolToByte(symbol)).toBeLessThan(128);
      chars.add(char);
    }
    expect(chars.size).toBe(PAD_SYMBOLS.length);
  });

  it('covers whitespace, the ten digits, hyphen and underscore', () => {
    const chars = PAD_SYMBOLS.map(symbolToChar);
    for (const expected of [' ', '0', '1', '2', '3', '4', '5', '6', '7', '8', '9', '-', '_']) {
      expect(chars).toContain(expected);
    }
  });

  it('returns fresh one-element slices', () => {
    const a = symbolToCharSlice(PadSymbol.Plus);
    const b = symbolToCharSlice(PadSymbol.Plus);
    expect(a).toEqual(['+']);
    expect(a).not.toBe(b);

    const bytes = symbolToByteSlice(PadSymbol.Plus);
    expect(Array.from(bytes)).toEqual([43]);
    expect(bytes).not.toBe(symbolToByteSlice(PadSymbol.Plus));
  });

  it('exposes codecs for chars and bytes', () => {
    expect(charCodec.fromSymbol(PadSymbol.Hash)).toBe('#');
    expect(byteCodec.fromSymbol(PadSymbol.Hash)).toBe(35);
  });
});
