/**
 * Byte-slice realization of the padding engine.
 *
 * Padded output is one `Uint8Array` of exactly the target width; windows are
 * copied out of the source so the result never aliases it.
 */

import { symbolToByte } from './symbol.js';
import { PaddableSequence } from './sequence.js';
import type { SequenceKind, SequenceWriter } from './sequence.js';

class ByteWriter implements SequenceWriter<Uint8Array, number, Uint8Array> {
  private readonly out: Uint8Array;
  private offset = 0;

  constructor(width: number) {
    this.out = new Uint8Array(width);
  }

  fill(element: number, count: number): void {
    this.out.fill(element, this.offset, this.offset + count);
    this.offset += count;
  }

  write(source: Uint8Array): void {
    this.out.set(source, this.offset);
    this.offset += source.length;
  }

  finish(): Uint8Array {
    return this.out;
  }
}

export const byteKind: SequenceKind<Uint8Array, number, Uint8Array> = {
  length: (source) => source.length,
  copy: (source) => source.slice(),
  window: (source, start, end) => source.slice(start, end),
  fillElement: symbolToByte,
  allocate: (width) => new ByteWriter(width),
};

/**
 * Growable byte vector owned by the caller.
 *
 * Capacity at least doubles when an append does not fit.
 */
export class ByteBuffer {
  private bytes: Uint8Array;
  private size = 0;

  constructor(capacity = 0) {
    this.bytes = new Uint8Array(capacity);
  }

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  extend(chunk: Uint8Array): void {
    const required = this.size + chunk.length;
    if (required > this.bytes.length) {
      const grown = new Uint8Array(Math.max(required, this.bytes.length * 2));
      grown.set(this.bytes.subarray(0, this.size));
      this.bytes = grown;
    }
    this.bytes.set(chunk, this.size);
    this.size = required;
  }

  /** Copy of the written bytes */
  toUint8Array(): Uint8Array {
    return this.bytes.slice(0, this.size);
  }
}

export class PaddableBytes extends PaddableSequence<Uint8Array, number, Uint8Array, ByteBuffer> {
  constructor(source: Uint8Array) {
    super(source, byteKind);
  }

  protected push(buffer: ByteBuffer, output: Uint8Array): void {
    buffer.extend(output);
  }
}
