/**
 * Application Message Types
 */

import type { CloseCode } from '../config';

export type MessageType = 'text' | 'binary';

export interface Message {
  type: MessageType;     // Fixed by the first frame's opcode
  payload: Buffer;
  complete: boolean;
}

export enum ReassemblyState {
  IDLE = 'idle',
  ACCUMULATING = 'accumulating',
}

export type ReassemblyResult =
  | { status: 'complete'; message: Message }
  | { status: 'pending' }
  | { status: 'error'; closeCode: CloseCode; reason: string };
