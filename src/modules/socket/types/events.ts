/**
 * Application Event Envelope
 * Binary messages carry MessagePack-encoded envelopes of this shape
 */

export const SOCKET_EVENTS = {
  ECHO: 'echo',
  STATS: 'stats',
} as const;

export type SocketEventType = (typeof SOCKET_EVENTS)[keyof typeof SOCKET_EVENTS];

export enum ErrorCode {
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  UNKNOWN_EVENT = 'UNKNOWN_EVENT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface EventMessage<TPayload = unknown> {
  eventType: string;
  eventId: string;
  connectionId?: string;
  payload?: TPayload;
}

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export interface AckPayload {
  success: boolean;
  data?: unknown;
}

/**
 * Event type used to answer a failed request of `requestType`
 */
export function toErrorEventType(requestType: string): string {
  return `${requestType}.error`;
}

export function isSocketEventType(value: string): value is SocketEventType {
  return value === SOCKET_EVENTS.ECHO || value === SOCKET_EVENTS.STATS;
}
