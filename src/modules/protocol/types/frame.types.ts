/**
 * Wire Frame Types
 */

// ============================================================================
// Opcodes
// ============================================================================

export enum Opcode {
  CONTINUATION = 0x0,
  TEXT = 0x1,
  BINARY = 0x2,
  CLOSE = 0x8,
  PING = 0x9,
  PONG = 0xa,
}

export type DataOpcode = Opcode.TEXT | Opcode.BINARY;
export type ControlOpcode = Opcode.CLOSE | Opcode.PING | Opcode.PONG;

/**
 * Narrow a raw 4-bit value; 0x3-0x7 and 0xB-0xF are reserved
 */
export function toOpcode(value: number): Opcode | undefined {
  switch (value) {
    case Opcode.CONTINUATION:
    case Opcode.TEXT:
    case Opcode.BINARY:
    case Opcode.CLOSE:
    case Opcode.PING:
    case Opcode.PONG:
      return value;
    default:
      return undefined;
  }
}

export function isControlOpcode(opcode: Opcode): opcode is ControlOpcode {
  return opcode === Opcode.CLOSE || opcode === Opcode.PING || opcode === Opcode.PONG;
}

// ============================================================================
// Frame
// ============================================================================

export interface Frame {
  fin: boolean;
  rsv1: boolean;
  rsv2: boolean;
  rsv3: boolean;
  opcode: Opcode;
  masked: boolean;
  payloadLength: number;
  maskingKey?: Buffer;  // Present iff masked
  payload: Buffer;      // Already unmasked
}

// ============================================================================
// Codec results
// ============================================================================

export type DecodeResult =
  | { status: 'frame'; frame: Frame; bytesConsumed: number }
  | { status: 'incomplete' };

export interface DecodeOptions {
  // Frames announcing a longer payload fail with 1009 before it is buffered
  maxPayloadLength?: number;
}

export interface EncodeOptions {
  fin?: boolean;
}
