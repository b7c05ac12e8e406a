/**
 * In-process transport stand-in
 * Records every write and acknowledges it on the next microtask, like a socket would
 */

import { EventEmitter } from 'events';
import { decodeFrame, type Frame, type Transport } from '@/modules/protocol';

type WriteCallback = (error?: Error | null) => void;

export class FakeTransport extends EventEmitter implements Transport {
  readonly writes: Array<Buffer | string> = [];
  destroyed = false;
  ended = false;

  // When false, write callbacks wait for acknowledgeWrites()
  autoAcknowledge = true;
  private pendingCallbacks: WriteCallback[] = [];
  private failNextWrite: Error | undefined;

  write(chunk: Buffer | string, callback: WriteCallback): boolean {
    this.writes.push(chunk);

    const error = this.failNextWrite;
    this.failNextWrite = undefined;

    if (error) {
      void Promise.resolve().then(() => callback(error));
      return false;
    }

    if (this.autoAcknowledge) {
      void Promise.resolve().then(() => callback());
    } else {
      this.pendingCallbacks.push(callback);
    }
    return true;
  }

  end(chunk?: Buffer | string): this {
    if (chunk !== undefined) {
      this.writes.push(chunk);
    }
    this.ended = true;
    return this;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }

  /**
   * Simulate bytes arriving from the client
   */
  receive(chunk: Buffer): void {
    this.emit('data', chunk);
  }

  failNext(error: Error): void {
    this.failNextWrite = error;
  }

  acknowledgeWrites(): void {
    for (const callback of this.pendingCallbacks.splice(0)) {
      callback();
    }
  }

  /**
   * Text written before any frame (handshake response or HTTP rejection)
   */
  get httpResponse(): string | undefined {
    const first = this.writes[0];
    return typeof first === 'string' ? first : undefined;
  }

  /**
   * Every binary write decoded as a server frame
   */
  sentFrames(): Frame[] {
    const frames: Frame[] = [];
    for (const chunk of this.writes) {
      if (typeof chunk === 'string') {
        continue;
      }
      const result = decodeFrame(chunk);
      if (result.status !== 'frame') {
        throw new Error(`Incomplete frame written (${chunk.length} bytes)`);
      }
      frames.push(result.frame);
    }
    return frames;
  }
}

/**
 * Let queued write acknowledgements and promise chains settle
 */
export async function flushMicrotasks(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
