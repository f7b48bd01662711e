/**
 * Generic pad/truncate algorithm shared by every backing container.
 *
 * A container plugs in through a {@link SequenceKind}: it reports its length,
 * copies and windows itself, resolves its fill element from a symbol and
 * hands out a writer sized to the exact output width. The algorithm itself
 * lives here once.
 */

import { splitPadding } from './alignment.js';
import { truncationWindow } from './truncate.js';
import type { Alignment, PadSymbol, Paddable } from '../types/pad.js';

/**
 * Append-only output of exactly the width it was allocated for.
 */
export interface SequenceWriter<S, E, Out> {
  fill(element: E, count: number): void;
  write(source: S): void;
  finish(): Out;
}

/**
 * Container adapter used by {@link padSequence} and {@link sliceSequence}.
 */
export interface SequenceKind<S, E, Out> {
  length(source: S): number;
  copy(source: S): Out;
  window(source: S, start: number, end: number): Out;
  fillElement(symbol: PadSymbol): E;
  allocate(width: number): SequenceWriter<S, E, Out>;
}

/**
 * Rejects widths that are not non-negative safe integers.
 *
 * @throws {RangeError} If the width cannot be an element count
 */
export function assertWidth(width: number): void {
  if (!Number.isSafeInteger(width) || width < 0) {
    throw new RangeError(`Pad width must be a non-negative integer, got ${width}`);
  }
}

/**
 * Keeps the `width`-element window of `source` chosen by the alignment.
 * Widths at or above the source length return a copy.
 */
export function sliceSequence<S, E, Out>(
  kind: SequenceKind<S, E, Out>,
  source: S,
  width: number,
  alignment: Alignment
): Out {
  assertWidth(width);
  const length = kind.length(source);
  if (width >= length) {
    return kind.copy(source);
  }
  const { start, end } = truncationWindow(length, width, alignment);
  return kind.window(source, start, end);
}

/**
 * Pads `source` to exactly `width` elements, or truncates it when it is
 * longer than `width`.
 */
export function padSequence<S, E, Out>(
  kind: SequenceKind<S, E, Out>,
  source: S,
  width: number,
  alignment: Alignment,
  symbol: PadSymbol
): Out {
  assertWidth(width);
  const length = kind.length(source);
  if (width < length) {
    return sliceSequence(kind, source, width, alignment);
  }

  const diff = width - length;
  if (diff === 0) {
    return kind.copy(source);
  }

  const { leading, trailing } = splitPadding(diff, alignment);
  const element = kind.fillElement(symbol);

  const writer = kind.allocate(width);
  writer.fill(element, leading);
  writer.write(source);
  writer.fill(element, trailing);
  return writer.finish();
}

/**
 * Base for the container realizations of {@link Paddable}.
 *
 * Subclasses supply the container adapter and how a result lands in their
 * buffer type.
 */
export abstract class PaddableSequence<S, E, Out, Buf> implements Paddable<Out, Buf> {
  protected constructor(
    protected readonly source: S,
    protected readonly kind: SequenceKind<S, E, Out>
  ) {}

  get length(): number {
    return this.kind.length(this.source);
  }

  pad(width: number, alignment: Alignment, symbol: PadSymbol): Out {
    return padSequence(this.kind, this.source, width, alignment, symbol);
  }

  sliceToFit(width: number, alignment: Alignment): Out {
    return sliceSequence(this.kind, this.source, width, alignment);
  }

  padAndPushToBuffer(width: number, alignment: Alignment, symbol: PadSymbol, buffer: Buf): void {
    this.push(buffer, this.pad(width, alignment, symbol));
  }

  protected abstract push(buffer: Buf, output: Out): void;
}
