/**
 * Frame Writer
 * Single writer per connection: buffers are written one at a time, in submission
 * order, so frames queued from timers and data callbacks never interleave.
 */

import { CloseCode } from '../config';
import { WebSocketErrorKind, type Transport } from '../types';
import { ProtocolError } from '../utils';

interface PendingWrite {
  data: Buffer | string;
  size: number;
  resolve: (written: boolean) => void;
}

/**
 * Bounds on what may sit in the queue, counting the write in flight.
 * A single write into an empty queue is always accepted.
 */
export interface WriteQueueLimits {
  maxBytes: number;
  maxFrames: number;
}

export class FrameWriter {
  private readonly queue: PendingWrite[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private writing = false;
  private closed = false;
  private bytes = 0;
  private readonly transport: Transport;
  private readonly onError: (error: Error) => void;
  private readonly limits: WriteQueueLimits;

  constructor(transport: Transport, onError: (error: Error) => void, limits: Partial<WriteQueueLimits> = {}) {
    this.transport = transport;
    this.onError = onError;
    this.limits = {
      maxBytes: Number.POSITIVE_INFINITY,
      maxFrames: Number.POSITIVE_INFINITY,
      ...limits,
    };
  }

  /**
   * Writes queued or in flight
   */
  get pending(): number {
    return this.queue.length + (this.writing ? 1 : 0);
  }

  /**
   * Bytes queued or in flight
   */
  get pendingBytes(): number {
    return this.bytes;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue bytes for the transport.
   * Resolves true once the transport accepted them, false if the writer is closed
   * or the write failed (the failure itself goes to onError, once).
   * A write past the queue limits closes the writer and reports a BACKPRESSURE
   * ProtocolError: the peer is not reading.
   */
  write(data: Buffer | string): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const size = typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.length;
    if (this.exceedsLimits(size)) {
      const error = new ProtocolError(
        `Outbound queue limit exceeded (${this.pending} frames, ${this.bytes} bytes)`,
        CloseCode.POLICY_VIOLATION,
        WebSocketErrorKind.BACKPRESSURE
      );
      this.close();
      this.onError(error);
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      this.queue.push({ data, size, resolve });
      this.bytes += size;
      this.flush();
    });
  }

  /**
   * Resolves when nothing is queued or in flight
   */
  drain(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting writes; anything still queued resolves false
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const pending of this.queue.splice(0)) {
      this.bytes -= pending.size;
      pending.resolve(false);
    }
    if (!this.writing) {
      this.notifyIdle();
    }
  }

  private flush(): void {
    if (this.writing) {
      return;
    }

    const next = this.queue.shift();
    if (!next) {
      this.notifyIdle();
      return;
    }

    this.writing = true;
    try {
      this.transport.write(next.data, (error) => this.onWritten(next, error));
    } catch (error) {
      this.onWritten(next, error instanceof Error ? error : new Error(String(error)));
    }
  }

  private exceedsLimits(size: number): boolean {
    const { maxBytes, maxFrames } = this.limits;
    return this.pending > 0 && (this.pending >= maxFrames || this.bytes + size > maxBytes);
  }

  private onWritten(write: PendingWrite, error: Error | null | undefined): void {
    this.writing = false;
    this.bytes -= write.size;

    if (error) {
      write.resolve(false);
      if (!this.closed) {
        this.close();
        this.onError(error);
      }
      this.notifyIdle();
      return;
    }

    write.resolve(true);
    if (this.closed) {
      this.notifyIdle();
      return;
    }
    this.flush();
  }

  private notifyIdle(): void {
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
