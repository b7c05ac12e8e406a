/**
 * Transport Error Classification
 * Separates routine peer hang-ups from failures worth a warning
 */

import { WebSocketErrorKind, type ClassifiedTransportError } from '../types';

// Codes Node's net layer reports when the peer goes away mid-stream
const PEER_GONE_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Extract the errno-style string code Node attaches to system errors
 */
function extractErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function classifyTransportError(error: unknown): ClassifiedTransportError {
  if (!(error instanceof Error)) {
    return {
      kind: WebSocketErrorKind.TRANSPORT,
      message: String(error),
      expected: false,
    };
  }

  const code = extractErrorCode(error);

  if (code && TIMEOUT_CODES.has(code)) {
    return {
      kind: WebSocketErrorKind.TIMEOUT,
      message: 'Transport timed out',
      code,
      expected: true,
    };
  }

  if (code && PEER_GONE_CODES.has(code)) {
    return {
      kind: WebSocketErrorKind.TRANSPORT,
      message: 'Peer closed the connection',
      code,
      expected: true,
    };
  }

  return {
    kind: WebSocketErrorKind.TRANSPORT,
    message: error.message || 'Unknown transport error',
    code,
    expected: false,
  };
}
