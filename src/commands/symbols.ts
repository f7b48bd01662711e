/**
 * `padkit symbols`: list the fill symbol catalog.
 */

import { PAD_SYMBOLS } from '../constants/catalog.js';
import { pad } from '../lib/pad.js';
import { symbolToByte, symbolToChar } from '../lib/symbol.js';
import { Alignment, PadSymbol } from '../types/pad.js';
import { consoleIO } from './io.js';
import type { CommandIO } from './io.js';

export interface SymbolEntry {
  symbol: PadSymbol;
  char: string;
  byte: number;
}

export function listSymbols(): SymbolEntry[] {
  return PAD_SYMBOLS.map((symbol) => ({
    symbol,
    char: symbolToChar(symbol),
    byte: symbolToByte(symbol),
  }));
}

export function symbolsCommand(options: { json?: boolean }, io: CommandIO = consoleIO): void {
  const entries = listSymbols();
  if (options.json) {
    io.write(JSON.stringify(entries, null, 2) + '\n');
    return;
  }

  const lines = entries.map(
    (entry) =>
      `${pad(entry.symbol, 12, Alignment.Left, PadSymbol.Whitespace)} '${entry.char}' ` +
      pad(String(entry.byte), 3, Alignment.Right, PadSymbol.Zero)
  );
  io.write(lines.join('\n') + '\n');
}
