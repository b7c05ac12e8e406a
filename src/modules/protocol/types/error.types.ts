/**
 * WebSocket Error Types
 */

export enum WebSocketErrorKind {
  HANDSHAKE_REJECTED = 'handshake_rejected',
  PROTOCOL_VIOLATION = 'protocol_violation',
  INVALID_PAYLOAD = 'invalid_payload',
  PAYLOAD_TOO_LARGE = 'payload_too_large',
  TRANSPORT = 'transport',
  TIMEOUT = 'timeout',
  BACKPRESSURE = 'backpressure', // Peer stopped reading; outbound queue hit its limit
  INTERNAL = 'internal',
}

export interface ClassifiedTransportError {
  kind: WebSocketErrorKind;
  message: string;
  code?: string;
  expected: boolean; // Peer hang-ups are routine; anything else is worth a warning
}
