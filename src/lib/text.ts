/**
 * Text realization of the padding engine.
 *
 * Text is measured in Unicode code points. Strings without surrogate pairs
 * take the `length`/`slice` fast path.
 */

import { symbolToChar } from './symbol.js';
import { PaddableSequence } from './sequence.js';
import type { SequenceKind, SequenceWriter } from './sequence.js';

const SURROGATE = /[\uD800-\uDFFF]/;

export function codePointLength(text: string): number {
  if (!SURROGATE.test(text)) {
    return text.length;
  }
  let count = 0;
  for (const _ of text) {
    count++;
  }
  return count;
}

export function sliceCodePoints(text: string, start: number, end: number): string {
  if (!SURROGATE.test(text)) {
    return text.slice(start, end);
  }
  return Array.from(text).slice(start, end).join('');
}

class TextWriter implements SequenceWriter<string, string, string> {
  private out = '';

  fill(element: string, count: number): void {
    if (count > 0) {
      this.out += element.repeat(count);
    }
  }

  write(source: string): void {
    this.out += source;
  }

  finish(): string {
    return this.out;
  }
}

export const textKind: SequenceKind<string, string, string> = {
  length: codePointLength,
  // Strings are immutable; the copy is the value itself.
  copy: (source) => source,
  window: sliceCodePoints,
  fillElement: symbolToChar,
  allocate: () => new TextWriter(),
};

/**
 * Caller-owned, append-only text accumulator.
 *
 * Chunks are joined only when the content is read.
 */
export class TextBuffer {
  private chunks: string[] = [];
  private size = 0;

  constructor(initial = '') {
    if (initial !== '') {
      this.push(initial);
    }
  }

  /** Length in code points */
  get length(): number {
    return this.size;
  }

  push(text: string): void {
    this.chunks.push(text);
    this.size += codePointLength(text);
  }

  toString(): string {
    if (this.chunks.length > 1) {
      this.chunks = [this.chunks.join('')];
    }
    return this.chunks[0] ?? '';
  }
}

export class PaddableText extends PaddableSequence<string, string, string, TextBuffer> {
  constructor(source: string) {
    super(source, textKind);
  }

  protected push(buffer: TextBuffer, output: string): void {
    buffer.push(output);
  }
}
