/**
 * Container-agnostic entry points.
 *
 * Each function forwards to the {@link Paddable} realization matching the
 * source: `string` → {@link PaddableText}, `Uint8Array` →
 * {@link PaddableBytes}, arrays → {@link PaddableArray}. Number arrays default
 * to the byte codec; other element types need an explicit codec.
 *
 * @example
 * ```typescript
 * pad('9184', 8, Alignment.Right, PadSymbol.Zero); // '00009184'
 *
 * const buffer = new TextBuffer();
 * padAndPushToBuffer('abc', 4, Alignment.Center, PadSymbol.Underscore, buffer);
 * buffer.toString(); // 'abc_'
 * ```
 */

import { DEFAULT_ALIGNMENT, DEFAULT_SYMBOL } from '../constants/catalog.js';
import { PaddableArray } from './array.js';
import { ByteBuffer, PaddableBytes } from './bytes.js';
import { byteCodec } from './symbol.js';
import { PaddableText, TextBuffer } from './text.js';
import { PadSymbol } from '../types/pad.js';
import type { Alignment, SymbolCodec } from '../types/pad.js';

type Source = string | Uint8Array | readonly unknown[];

function bufferMismatch(expected: string): TypeError {
  return new TypeError(`Buffer does not match the source container: expected ${expected}`);
}

function arraySource(source: readonly unknown[], codec: SymbolCodec<unknown> | undefined): PaddableArray<unknown> {
  return new PaddableArray(source, codec ?? byteCodec);
}

export function pad(source: string, width: number, alignment?: Alignment, symbol?: PadSymbol): string;
export function pad(source: Uint8Array, width: number, alignment?: Alignment, symbol?: PadSymbol): Uint8Array;
export function pad(
  source: readonly number[],
  width: number,
  alignment?: Alignment,
  symbol?: PadSymbol,
  codec?: SymbolCodec<number>
): number[];
export function pad<E>(
  source: readonly E[],
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  codec: SymbolCodec<E>
): E[];
export function pad(
  source: Source,
  width: number,
  alignment: Alignment = DEFAULT_ALIGNMENT,
  symbol: PadSymbol = DEFAULT_SYMBOL,
  codec?: SymbolCodec<unknown>
): string | Uint8Array | unknown[] {
  if (typeof source === 'string') {
    return new PaddableText(source).pad(width, alignment, symbol);
  }
  if (source instanceof Uint8Array) {
    return new PaddableBytes(source).pad(width, alignment, symbol);
  }
  return arraySource(source, codec).pad(width, alignment, symbol);
}

/**
 * Keeps the `width`-element window of the source chosen by `alignment`.
 * Sources that already fit are copied unchanged.
 */
export function sliceToFit(source: string, width: number, alignment?: Alignment): string;
export function sliceToFit(source: Uint8Array, width: number, alignment?: Alignment): Uint8Array;
export function sliceToFit<E>(source: readonly E[], width: number, alignment?: Alignment): E[];
export function sliceToFit(
  source: Source,
  width: number,
  alignment: Alignment = DEFAULT_ALIGNMENT
): string | Uint8Array | unknown[] {
  if (typeof source === 'string') {
    return new PaddableText(source).sliceToFit(width, alignment);
  }
  if (source instanceof Uint8Array) {
    return new PaddableBytes(source).sliceToFit(width, alignment);
  }
  // Windowing never needs a fill element.
  return arraySource(source, undefined).sliceToFit(width, alignment);
}

/**
 * Pads the source and appends the result to a caller-owned buffer. The
 * buffer is only ever extended.
 */
export function padAndPushToBuffer(
  source: string,
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  buffer: TextBuffer
): void;
export function padAndPushToBuffer(
  source: Uint8Array,
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  buffer: ByteBuffer
): void;
export function padAndPushToBuffer(
  source: readonly number[],
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  buffer: number[],
  codec?: SymbolCodec<number>
): void;
export function padAndPushToBuffer<E>(
  source: readonly E[],
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  buffer: E[],
  codec: SymbolCodec<E>
): void;
export function padAndPushToBuffer(
  source: Source,
  width: number,
  alignment: Alignment,
  symbol: PadSymbol,
  buffer: TextBuffer | ByteBuffer | unknown[],
  codec?: SymbolCodec<unknown>
): void {
  if (typeof source === 'string') {
    if (!(buffer instanceof TextBuffer)) {
      throw bufferMismatch('TextBuffer');
    }
    new PaddableText(source).padAndPushToBuffer(width, alignment, symbol, buffer);
  } else if (source instanceof Uint8Array) {
    if (!(buffer instanceof ByteBuffer)) {
      throw bufferMismatch('ByteBuffer');
    }
    new PaddableBytes(source).padAndPushToBuffer(width, alignment, symbol, buffer);
  } else {
    if (!Array.isArray(buffer)) {
      throw bufferMismatch('an array');
    }
    arraySource(source, codec).padAndPushToBuffer(width, alignment, symbol, buffer);
  }
}

/** Pads text with whitespace. */
export function whitespace(text: string, width: number, alignment: Alignment): string {
  return pad(text, width, alignment, PadSymbol.Whitespace);
}

/** Pads text with zeros. */
export function zeros(text: string, width: number, alignment: Alignment): string {
  return pad(text, width, alignment, PadSymbol.Zero);
}

const encoder = new TextEncoder();

/**
 * Pads text and returns its UTF-8 encoding.
 */
export function padIntoBytes(
  text: string,
  width: number,
  alignment: Alignment = DEFAULT_ALIGNMENT,
  symbol: PadSymbol = DEFAULT_SYMBOL
): Uint8Array {
  return encoder.encode(pad(text, width, alignment, symbol));
}
