/**
 * Protocol Error
 * Raised by the codec and encoder contract checks; the session turns it into a close frame
 */

import { CloseCode } from '../config';
import { WebSocketErrorKind } from '../types';

export class ProtocolError extends Error {
  readonly kind: WebSocketErrorKind;
  readonly closeCode: CloseCode;

  constructor(message: string, closeCode: CloseCode = CloseCode.PROTOCOL_ERROR, kind?: WebSocketErrorKind) {
    super(message);
    this.name = 'ProtocolError';
    this.closeCode = closeCode;
    this.kind = kind ?? kindForCloseCode(closeCode);
  }
}

/**
 * Error kind surfaced to the application for a close code the server sends
 */
export function kindForCloseCode(code: CloseCode): WebSocketErrorKind {
  switch (code) {
    case CloseCode.MESSAGE_TOO_BIG:
      return WebSocketErrorKind.PAYLOAD_TOO_LARGE;
    case CloseCode.INVALID_PAYLOAD:
    case CloseCode.UNSUPPORTED_DATA:
      return WebSocketErrorKind.INVALID_PAYLOAD;
    case CloseCode.GOING_AWAY:
      return WebSocketErrorKind.TIMEOUT;
    case CloseCode.INTERNAL_ERROR:
      return WebSocketErrorKind.INTERNAL;
    default:
      return WebSocketErrorKind.PROTOCOL_VIOLATION;
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
