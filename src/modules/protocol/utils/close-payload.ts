/**
 * Close Frame Payload
 * 2-byte big-endian status code followed by an optional UTF-8 reason (RFC 6455 §5.5.1)
 */

import { CloseCode, FRAME_CONSTANTS } from '../config';
import type { CloseInfo } from '../types';
import { ProtocolError } from './protocol-error';
import { decodeUtf8 } from './utf8';

/**
 * Whether a status code may appear in a close frame on the wire.
 * 1004-1006 and 1015 are reserved, 1016-2999 unassigned, 3000-4999 for
 * libraries and applications.
 */
export function isValidCloseCode(code: number): boolean {
  if (!Number.isInteger(code)) {
    return false;
  }
  if (code >= 1000 && code <= 1014) {
    return code !== 1004 && code !== CloseCode.NO_STATUS && code !== CloseCode.ABNORMAL;
  }
  return code >= 3000 && code <= 4999;
}

/**
 * Parse a received close payload. An empty payload reports NO_STATUS.
 */
export function parseClosePayload(payload: Buffer): CloseInfo {
  if (payload.length === 0) {
    return { code: CloseCode.NO_STATUS, reason: '' };
  }

  if (payload.length < 2) {
    throw new ProtocolError('Close payload must carry a 2-byte status code');
  }

  const code = payload.readUInt16BE(0);
  if (!isValidCloseCode(code)) {
    throw new ProtocolError(`Invalid close code ${code}`);
  }

  const reason = decodeUtf8(payload.subarray(2));
  if (reason === undefined) {
    throw new ProtocolError('Close reason is not valid UTF-8', CloseCode.INVALID_PAYLOAD);
  }

  return { code, reason };
}

/**
 * Build a close payload to send
 */
export function encodeClosePayload(code: number, reason = ''): Buffer {
  if (!isValidCloseCode(code)) {
    throw new RangeError(`Close code ${code} cannot be sent`);
  }

  const reasonBytes = Buffer.from(reason, 'utf-8');
  if (reasonBytes.length > FRAME_CONSTANTS.MAX_CLOSE_REASON_BYTES) {
    throw new RangeError(`Close reason of ${reasonBytes.length} bytes exceeds 123`);
  }

  const payload = Buffer.allocUnsafe(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return payload;
}

/**
 * Trim a reason to the 123-byte budget without splitting a UTF-8 sequence
 */
export function truncateCloseReason(reason: string): string {
  const bytes = Buffer.from(reason, 'utf-8');
  if (bytes.length <= FRAME_CONSTANTS.MAX_CLOSE_REASON_BYTES) {
    return reason;
  }

  let end = FRAME_CONSTANTS.MAX_CLOSE_REASON_BYTES;
  // Back up over continuation bytes (10xxxxxx)
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf-8');
}
