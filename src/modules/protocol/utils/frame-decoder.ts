/**
 * Incremental Frame Decoder
 * Retains partial frames across reads in one reusable buffer with a read cursor
 */

import type { DecodeOptions, Frame } from '../types';
import { decodeFrame } from './frame-codec';

const DEFAULT_INITIAL_CAPACITY = 4 * 1024;
const MAX_RETAINED_CAPACITY = 64 * 1024;

export class FrameDecoder {
  private buffer: Buffer;
  private readCursor = 0;
  private writeCursor = 0;
  private readonly initialCapacity: number;
  private readonly options: DecodeOptions;

  constructor(options: DecodeOptions = {}, initialCapacity = DEFAULT_INITIAL_CAPACITY) {
    this.options = options;
    this.initialCapacity = initialCapacity;
    this.buffer = Buffer.allocUnsafe(initialCapacity);
  }

  /**
   * Bytes received but not yet consumed by a complete frame
   */
  get bufferedBytes(): number {
    return this.writeCursor - this.readCursor;
  }

  /**
   * Size of the retained buffer
   */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Append bytes read from the transport
   */
  push(chunk: Uint8Array): void {
    if (chunk.length === 0) {
      return;
    }

    this.ensureCapacity(chunk.length);
    this.buffer.set(chunk, this.writeCursor);
    this.writeCursor += chunk.length;
  }

  /**
   * Next complete frame, or undefined until more bytes arrive.
   * Throws ProtocolError on a malformed frame; the decoder is unusable afterwards.
   */
  next(): Frame | undefined {
    if (this.bufferedBytes === 0) {
      return undefined;
    }

    const result = decodeFrame(this.buffer.subarray(0, this.writeCursor), this.readCursor, this.options);
    if (result.status === 'incomplete') {
      return undefined;
    }

    this.readCursor += result.bytesConsumed;
    if (this.readCursor === this.writeCursor) {
      this.rewind();
    } else {
      this.shrinkIfOversized();
    }

    return result.frame;
  }

  /**
   * Drop everything buffered
   */
  reset(): void {
    this.rewind();
  }

  private rewind(): void {
    this.readCursor = 0;
    this.writeCursor = 0;

    // Give back memory grown for one large frame
    if (this.buffer.length > MAX_RETAINED_CAPACITY) {
      this.buffer = Buffer.allocUnsafe(this.initialCapacity);
    }
  }

  /**
   * Move a small unread tail out of a buffer grown for an earlier large frame
   */
  private shrinkIfOversized(): void {
    const buffered = this.bufferedBytes;
    if (this.buffer.length <= MAX_RETAINED_CAPACITY || buffered > MAX_RETAINED_CAPACITY / 2) {
      return;
    }

    const shrunk = Buffer.allocUnsafe(this.capacityFor(buffered));
    this.buffer.copy(shrunk, 0, this.readCursor, this.writeCursor);
    this.buffer = shrunk;
    this.readCursor = 0;
    this.writeCursor = buffered;
  }

  private capacityFor(required: number): number {
    let capacity = Math.max(this.initialCapacity, 1);
    while (capacity < required) {
      capacity *= 2;
    }
    return capacity;
  }

  private ensureCapacity(incoming: number): void {
    if (this.writeCursor + incoming <= this.buffer.length) {
      return;
    }

    const buffered = this.bufferedBytes;

    // Compact first: slide unread bytes to the front
    if (this.readCursor > 0) {
      this.buffer.copy(this.buffer, 0, this.readCursor, this.writeCursor);
      this.readCursor = 0;
      this.writeCursor = buffered;
    }

    const required = buffered + incoming;
    if (required <= this.buffer.length) {
      return;
    }

    const grown = Buffer.allocUnsafe(this.capacityFor(required));
    this.buffer.copy(grown, 0, 0, buffered);
    this.buffer = grown;
  }
}
