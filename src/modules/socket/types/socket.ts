/**
 * Socket Server Types
 */

import type { Server as HTTPServer } from 'http';
import type { HandshakeOptions } from '@/modules/protocol';
import type { ConnectionService, SessionService } from '../services';
import type { SessionStats } from './session';

export interface SocketServerOptions {
  path: string;              // Upgrade path; anything else gets 404
  maxConnections: number;    // Upgrades beyond this get 503
  maxMessageSize: number;
  maxQueuedBytes: number;    // Per-connection outbound limits; a peer that stops reading is dropped
  maxQueuedFrames: number;
  pingInterval: number;
  pongTimeout: number;
  closeTimeout: number;
  shutdownTimeout: number;
  selectProtocol?: HandshakeOptions['selectProtocol'];
}

export interface SocketStats {
  totalConnections: number;
  sessionStats: SessionStats;
}

/**
 * Upgrade acceptor bound to one HTTP server; owns its connection and session registries
 */
export interface SocketServer {
  readonly httpServer: HTTPServer;
  readonly options: SocketServerOptions;
  readonly connections: ConnectionService;
  readonly sessions: SessionService;
  detach(): void;
}
