/**
 * Element-vector realization of the padding engine, generic over any element
 * type with a {@link SymbolCodec}.
 */

import { PaddableSequence } from './sequence.js';
import type { SequenceKind, SequenceWriter } from './sequence.js';
import type { SymbolCodec } from '../types/pad.js';

class ArrayWriter<E> implements SequenceWriter<readonly E[], E, E[]> {
  private readonly out: E[];
  private offset = 0;

  constructor(width: number) {
    this.out = new Array<E>(width);
  }

  fill(element: E, count: number): void {
    this.out.fill(element, this.offset, this.offset + count);
    this.offset += count;
  }

  write(source: readonly E[]): void {
    for (const element of source) {
      this.out[this.offset++] = element;
    }
  }

  finish(): E[] {
    return this.out;
  }
}

export function arrayKind<E>(codec: SymbolCodec<E>): SequenceKind<readonly E[], E, E[]> {
  return {
    length: (source) => source.length,
    copy: (source) => source.slice(),
    window: (source, start, end) => source.slice(start, end),
    fillElement: (symbol) => codec.fromSymbol(symbol),
    allocate: (width) => new ArrayWriter<E>(width),
  };
}

export class PaddableArray<E> extends PaddableSequence<readonly E[], E, E[], E[]> {
  constructor(source: readonly E[], codec: SymbolCodec<E>) {
    super(source, arrayKind(codec));
  }

  protected push(buffer: E[], output: E[]): void {
    for (const element of output) {
      buffer.push(element);
    }
  }
}
