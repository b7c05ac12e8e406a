/**
 * Message Reassembler
 * Aggregates a data frame and its continuation frames into one message
 */

import { CloseCode } from '../config';
import {
  Opcode,
  ReassemblyState,
  type DataOpcode,
  type Frame,
  type MessageType,
  type ReassemblyResult,
} from '../types';

function messageTypeFor(opcode: DataOpcode): MessageType {
  return opcode === Opcode.TEXT ? 'text' : 'binary';
}

export class MessageReassembler {
  private state: ReassemblyState = ReassemblyState.IDLE;
  private messageType: MessageType | undefined;
  private fragments: Buffer[] = [];
  private accumulatedBytes = 0;
  private readonly maxMessageSize: number;

  constructor(maxMessageSize: number) {
    this.maxMessageSize = maxMessageSize;
  }

  getState(): ReassemblyState {
    return this.state;
  }

  /**
   * Bytes held for the in-progress message
   */
  getAccumulatedBytes(): number {
    return this.accumulatedBytes;
  }

  /**
   * Feed one data or continuation frame.
   * Control frames never reach here and leave the in-progress message untouched.
   */
  push(frame: Frame): ReassemblyResult {
    switch (frame.opcode) {
      case Opcode.TEXT:
      case Opcode.BINARY:
        return this.startMessage(frame.opcode, frame);

      case Opcode.CONTINUATION:
        return this.continueMessage(frame);

      case Opcode.CLOSE:
      case Opcode.PING:
      case Opcode.PONG:
        return {
          status: 'error',
          closeCode: CloseCode.INTERNAL_ERROR,
          reason: 'Control frame routed to reassembler',
        };

      default: {
        const unreachable: never = frame.opcode;
        return {
          status: 'error',
          closeCode: CloseCode.PROTOCOL_ERROR,
          reason: `Unhandled opcode ${String(unreachable)}`,
        };
      }
    }
  }

  /**
   * Discard any partial message
   */
  reset(): void {
    this.state = ReassemblyState.IDLE;
    this.messageType = undefined;
    this.fragments = [];
    this.accumulatedBytes = 0;
  }

  private startMessage(opcode: DataOpcode, frame: Frame): ReassemblyResult {
    if (this.state === ReassemblyState.ACCUMULATING) {
      return this.fail(CloseCode.PROTOCOL_ERROR, 'New data frame while a fragmented message is in progress');
    }

    if (frame.payload.length > this.maxMessageSize) {
      return this.fail(CloseCode.MESSAGE_TOO_BIG, 'Message exceeds maximum size');
    }

    const type = messageTypeFor(opcode);

    if (frame.fin) {
      return {
        status: 'complete',
        message: { type, payload: frame.payload, complete: true },
      };
    }

    this.state = ReassemblyState.ACCUMULATING;
    this.messageType = type;
    this.fragments = [frame.payload];
    this.accumulatedBytes = frame.payload.length;
    return { status: 'pending' };
  }

  private continueMessage(frame: Frame): ReassemblyResult {
    if (this.state === ReassemblyState.IDLE || this.messageType === undefined) {
      return this.fail(CloseCode.PROTOCOL_ERROR, 'Continuation frame without a message in progress');
    }

    this.accumulatedBytes += frame.payload.length;
    if (this.accumulatedBytes > this.maxMessageSize) {
      return this.fail(CloseCode.MESSAGE_TOO_BIG, 'Message exceeds maximum size');
    }

    this.fragments.push(frame.payload);

    if (!frame.fin) {
      return { status: 'pending' };
    }

    const type = this.messageType;
    const payload = Buffer.concat(this.fragments, this.accumulatedBytes);
    this.reset();

    return {
      status: 'complete',
      message: { type, payload, complete: true },
    };
  }

  private fail(closeCode: CloseCode, reason: string): ReassemblyResult {
    this.reset();
    return { status: 'error', closeCode, reason };
  }
}
