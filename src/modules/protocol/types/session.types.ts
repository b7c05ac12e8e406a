/**
 * Connection Session Types
 */

import type { Logger } from '@/shared/utils';
import type { HandshakeOptions } from './handshake.types';
import type { MessageType } from './message.types';
import type { WebSocketErrorKind } from './error.types';

// ============================================================================
// Connection State
// ============================================================================

export enum ConnectionState {
  CONNECTING = 'connecting',             // Waiting for the upgrade request
  OPEN = 'open',                         // Handshake accepted, frames flowing
  CLOSING_SENT = 'closing_sent',         // We sent a close frame, awaiting the echo
  CLOSING_RECEIVED = 'closing_received', // Peer sent a close frame, echo in flight
  CLOSED = 'closed',                     // Transport released
}

export interface CloseInfo {
  code: number;
  reason: string;
}

// ============================================================================
// Transport (the connected byte stream; net.Socket satisfies it)
// ============================================================================

export interface Transport {
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  write(chunk: Buffer | string, callback: (error?: Error | null) => void): boolean;
  end(): unknown;
  destroy(): unknown;
  readonly destroyed: boolean;
}

// ============================================================================
// Application callbacks
// ============================================================================

/**
 * Invoked from the connection's own data/timer callbacks, never concurrently
 * for the same connection
 */
export interface ConnectionHandlers {
  onOpen?: () => void;
  onMessage?: (type: MessageType, payload: Buffer) => void;
  onPong?: (payload: Buffer) => void;
  onClose?: (code: number, reason: string) => void;
  onError?: (kind: WebSocketErrorKind, error: Error) => void;
}

// ============================================================================
// Session Configuration
// ============================================================================

export interface ConnectionSessionOptions {
  id: string;
  maxMessageSize: number;  // Bytes; larger messages close with 1009
  pingInterval: number;    // Silence before a ping is sent (ms, 0 disables)
  pongTimeout: number;     // Silence after that ping before closing with 1001 (ms)
  closeTimeout: number;    // Wait for the peer's close echo (ms, 0 waits forever)
  maxQueuedBytes: number;  // Outbound bytes waiting on a peer that is not reading
  maxQueuedFrames: number; // Outbound frames waiting on a peer that is not reading
  handshake?: HandshakeOptions;
  logger?: Logger;
}

export const DEFAULT_CONNECTION_OPTIONS: Omit<ConnectionSessionOptions, 'id'> = {
  maxMessageSize: 10 * 1024 * 1024,
  pingInterval: 30 * 1000,
  pongTimeout: 10 * 1000,
  closeTimeout: 5 * 1000,
  maxQueuedBytes: 32 * 1024 * 1024,
  maxQueuedFrames: 1024,
};
