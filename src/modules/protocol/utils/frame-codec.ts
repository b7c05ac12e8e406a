/**
 * Frame Codec
 * Encodes and decodes single RFC 6455 frames (§5.2)
 *
 *    0                   1                   2                   3
 *    0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *   +-+-+-+-+-------+-+-------------+-------------------------------+
 *   |F|R|R|R| opcode|M| Payload len |    Extended payload length    |
 *   |I|S|S|S|  (4)  |A|     (7)     |             (16/64)           |
 *   |N|V|V|V|       |S|             |   (if payload len==126/127)   |
 *   | |1|2|3|       |K|             |                               |
 *   +-+-+-+-+-------+-+-------------+ - - - - - - - - - - - - - - - +
 *   |     Extended payload length continued, if payload len == 127  |
 *   + - - - - - - - - - - - - - - - +-------------------------------+
 *   |                               |Masking-key, if MASK set to 1  |
 *   +-------------------------------+-------------------------------+
 *   | Masking-key (continued)       |          Payload Data         |
 *   +-------------------------------- - - - - - - - - - - - - - - - +
 */

import { CloseCode, FRAME_CONSTANTS } from '../config';
import {
  Opcode,
  toOpcode,
  isControlOpcode,
  type DecodeOptions,
  type DecodeResult,
  type EncodeOptions,
} from '../types';
import { ProtocolError } from './protocol-error';

const TWO_POW_32 = 2 ** 32;

const INCOMPLETE: DecodeResult = { status: 'incomplete' };

/**
 * XOR each byte with maskingKey[i mod 4]. Applying it twice with the same key
 * returns the original bytes.
 */
export function unmask(payload: Uint8Array, maskingKey: Uint8Array): Buffer {
  if (maskingKey.length !== FRAME_CONSTANTS.MASKING_KEY_BYTES) {
    throw new RangeError(`Masking key must be 4 bytes, got ${maskingKey.length}`);
  }

  const output = Buffer.allocUnsafe(payload.length);
  for (let i = 0; i < payload.length; i++) {
    output[i] = payload[i] ^ maskingKey[i & 3];
  }
  return output;
}

/**
 * Decode one frame starting at `offset`.
 * Returns `incomplete` when the buffer ends before the frame does; the caller
 * retries once more bytes arrive. Malformed frames throw a ProtocolError.
 */
export function decodeFrame(buffer: Buffer, offset = 0, options: DecodeOptions = {}): DecodeResult {
  const available = buffer.length - offset;
  if (available < 2) {
    return INCOMPLETE;
  }

  const first = buffer[offset];
  const second = buffer[offset + 1];

  const fin = (first & FRAME_CONSTANTS.FIN_BIT) !== 0;
  const rsv1 = (first & FRAME_CONSTANTS.RSV1_BIT) !== 0;
  const rsv2 = (first & FRAME_CONSTANTS.RSV2_BIT) !== 0;
  const rsv3 = (first & FRAME_CONSTANTS.RSV3_BIT) !== 0;

  // No extension is ever negotiated, so every reserved bit must be clear
  if (rsv1 || rsv2 || rsv3) {
    throw new ProtocolError('Reserved bits set without a negotiated extension');
  }

  const rawOpcode = first & FRAME_CONSTANTS.OPCODE_MASK;
  const opcode = toOpcode(rawOpcode);
  if (opcode === undefined) {
    throw new ProtocolError(`Invalid opcode 0x${rawOpcode.toString(16)}`);
  }

  const masked = (second & FRAME_CONSTANTS.MASK_BIT) !== 0;
  const lengthField = second & FRAME_CONSTANTS.LENGTH_MASK;

  if (isControlOpcode(opcode)) {
    if (!fin) {
      throw new ProtocolError('Control frames must not be fragmented');
    }
    if (lengthField > FRAME_CONSTANTS.MAX_CONTROL_PAYLOAD) {
      throw new ProtocolError('Control frame payload exceeds 125 bytes');
    }
  }

  let headerLength = 2;
  let payloadLength = lengthField;

  if (lengthField === FRAME_CONSTANTS.LENGTH_16BIT_MARKER) {
    if (available < 4) {
      return INCOMPLETE;
    }
    payloadLength = buffer.readUInt16BE(offset + 2);
    headerLength = 4;
  } else if (lengthField === FRAME_CONSTANTS.LENGTH_64BIT_MARKER) {
    if (available < 10) {
      return INCOMPLETE;
    }
    const high = buffer.readUInt32BE(offset + 2);
    const low = buffer.readUInt32BE(offset + 6);
    if (high >= 0x80000000) {
      throw new ProtocolError('Most significant bit of 64-bit payload length is set');
    }
    payloadLength = high * TWO_POW_32 + low;
    if (!Number.isSafeInteger(payloadLength)) {
      throw new ProtocolError('Payload length exceeds addressable size', CloseCode.MESSAGE_TOO_BIG);
    }
    headerLength = 10;
  }

  if (options.maxPayloadLength !== undefined && payloadLength > options.maxPayloadLength) {
    throw new ProtocolError(
      `Frame payload of ${payloadLength} bytes exceeds limit of ${options.maxPayloadLength}`,
      CloseCode.MESSAGE_TOO_BIG
    );
  }

  let maskingKey: Buffer | undefined;
  if (masked) {
    if (available < headerLength + FRAME_CONSTANTS.MASKING_KEY_BYTES) {
      return INCOMPLETE;
    }
    maskingKey = Buffer.from(
      buffer.subarray(offset + headerLength, offset + headerLength + FRAME_CONSTANTS.MASKING_KEY_BYTES)
    );
    headerLength += FRAME_CONSTANTS.MASKING_KEY_BYTES;
  }

  const frameLength = headerLength + payloadLength;
  if (available < frameLength) {
    return INCOMPLETE;
  }

  const payloadStart = offset + headerLength;
  const raw = buffer.subarray(payloadStart, payloadStart + payloadLength);

  // Copy out so the frame never aliases the decoder's reusable buffer
  const payload = maskingKey ? unmask(raw, maskingKey) : Buffer.from(raw);

  return {
    status: 'frame',
    frame: {
      fin,
      rsv1,
      rsv2,
      rsv3,
      opcode,
      masked,
      payloadLength,
      maskingKey,
      payload,
    },
    bytesConsumed: frameLength,
  };
}

/**
 * Encode a server frame: never masked, reserved bits clear, minimal length encoding.
 * Control frames over 125 bytes or without FIN are a caller bug and throw.
 */
export function encodeFrame(opcode: Opcode, payload: Buffer, options: EncodeOptions = {}): Buffer {
  const fin = options.fin ?? true;
  const length = payload.length;

  if (isControlOpcode(opcode)) {
    if (length > FRAME_CONSTANTS.MAX_CONTROL_PAYLOAD) {
      throw new RangeError(`Control frame payload of ${length} bytes exceeds 125`);
    }
    if (!fin) {
      throw new RangeError('Control frames cannot be fragmented');
    }
  }

  const firstByte = (fin ? FRAME_CONSTANTS.FIN_BIT : 0) | opcode;

  if (length <= FRAME_CONSTANTS.MAX_7BIT_LENGTH) {
    const frame = Buffer.allocUnsafe(2 + length);
    frame[0] = firstByte;
    frame[1] = length;
    payload.copy(frame, 2);
    return frame;
  }

  if (length <= FRAME_CONSTANTS.MAX_16BIT_LENGTH) {
    const frame = Buffer.allocUnsafe(4 + length);
    frame[0] = firstByte;
    frame[1] = FRAME_CONSTANTS.LENGTH_16BIT_MARKER;
    frame.writeUInt16BE(length, 2);
    payload.copy(frame, 4);
    return frame;
  }

  const frame = Buffer.allocUnsafe(10 + length);
  frame[0] = firstByte;
  frame[1] = FRAME_CONSTANTS.LENGTH_64BIT_MARKER;
  frame.writeUInt32BE(Math.floor(length / TWO_POW_32), 2);
  frame.writeUInt32BE(length >>> 0, 6);
  payload.copy(frame, 10);
  return frame;
}
