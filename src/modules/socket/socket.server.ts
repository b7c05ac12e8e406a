/**
 * WebSocket Server Initialization
 * Accepts HTTP upgrades on the configured path and hands each socket to a ConnectionSession
 */

import type { IncomingMessage, Server as HTTPServer } from 'http';
import type { Duplex } from 'stream';
import { logger, generateId } from '@/shared/utils';
import { websocketConfig, websocketTimeoutConfig } from '@/shared/config';
import {
  CloseCode,
  ConnectionSession,
  ConnectionState,
  createHandshakeRequest,
  rejectHandshake,
  serializeHandshakeResponse,
} from '@/modules/protocol';
import { ConnectionService, SessionService } from './services';
import { handleConnectionError, handleWebSocketMessage } from './handlers';
import type { SocketServer, SocketServerOptions, SocketStats } from './types';

function defaultSocketServerOptions(): SocketServerOptions {
  return {
    path: websocketConfig.path,
    maxConnections: websocketConfig.maxConnections,
    maxMessageSize: websocketConfig.maxMessageSize,
    maxQueuedBytes: websocketConfig.maxQueuedBytes,
    maxQueuedFrames: websocketConfig.maxQueuedFrames,
    pingInterval: websocketTimeoutConfig.pingInterval,
    pongTimeout: websocketTimeoutConfig.pongTimeout,
    closeTimeout: websocketTimeoutConfig.closeTimeout,
    shutdownTimeout: websocketTimeoutConfig.shutdownTimeout,
  };
}

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  overrides: Partial<SocketServerOptions> = {}
): SocketServer {
  const options: SocketServerOptions = { ...defaultSocketServerOptions(), ...overrides };

  logger.info('Initializing WebSocket server', {
    path: options.path,
    maxConnections: options.maxConnections,
    maxMessageSize: options.maxMessageSize,
  });

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
    handleUpgrade(server, request, socket, head);
  };

  const server: SocketServer = {
    httpServer,
    options,
    connections: new ConnectionService(),
    sessions: new SessionService(),
    detach: () => {
      httpServer.off('upgrade', onUpgrade);
    },
  };

  httpServer.on('upgrade', onUpgrade);

  logger.info('WebSocket server initialized successfully');

  return server;
}

/**
 * Write a plain HTTP rejection and close the socket without creating a session
 */
function refuseUpgrade(socket: Duplex, statusCode: number, reason: string): void {
  socket.on('error', (error: Error) => {
    logger.debug('Socket error while refusing upgrade', { error: error.message });
  });
  socket.end(serializeHandshakeResponse(rejectHandshake(statusCode, reason)));
}

function requestPath(url: string | undefined): string {
  return new URL(url ?? '/', 'http://localhost').pathname;
}

/**
 * Handle an HTTP upgrade request
 */
function handleUpgrade(server: SocketServer, request: IncomingMessage, socket: Duplex, head: Buffer): void {
  const { options, connections, sessions } = server;
  const path = requestPath(request.url);

  if (path !== options.path) {
    logger.warn('Upgrade on unknown path', { path });
    refuseUpgrade(socket, 404, 'Not Found');
    return;
  }

  if (connections.getActiveCount() >= options.maxConnections) {
    logger.warn('Connection limit reached, refusing upgrade', {
      active: connections.getActiveCount(),
      maxConnections: options.maxConnections,
    });
    refuseUpgrade(socket, 503, 'Server at capacity');
    return;
  }

  const connectionId = generateId();
  const clientIP = request.socket?.remoteAddress ?? 'unknown';
  const userAgent = request.headers['user-agent'] ?? 'unknown';

  logger.info('Client connecting', { connectionId, clientIP, userAgent });

  const connection = new ConnectionSession(
    socket,
    {
      onOpen: () => {
        sessions.updateSessionState(connectionId, ConnectionState.OPEN);
      },
      onMessage: (type, payload) => {
        sessions.recordReceived(connectionId);
        handleWebSocketMessage(
          { connection, sessions, getStats: () => getSocketStats(server) },
          type,
          payload
        ).catch((error: unknown) => {
          logger.error('Unhandled error in message handler', { connectionId, error });
        });
      },
      onPong: () => {
        sessions.touchSession(connectionId);
      },
      onError: (kind, error) => {
        handleConnectionError(connectionId, kind, error);
      },
      onClose: (code, reason) => {
        handleDisconnect(server, connectionId, code, reason);
      },
    },
    {
      id: connectionId,
      maxMessageSize: options.maxMessageSize,
      maxQueuedBytes: options.maxQueuedBytes,
      maxQueuedFrames: options.maxQueuedFrames,
      pingInterval: options.pingInterval,
      pongTimeout: options.pongTimeout,
      closeTimeout: options.closeTimeout,
      handshake: { selectProtocol: options.selectProtocol },
    }
  );

  sessions.createSession(connectionId, { ipAddress: clientIP, userAgent, path });
  connections.registerConnection(connection);

  const result = connection.handshake(
    createHandshakeRequest(request.method ?? 'GET', request.url ?? '/', request.headers),
    head
  );

  if (!result.accepted) {
    sessions.deleteSession(connectionId);
    connections.removeConnection(connectionId);
    return;
  }

  if (result.protocol !== undefined) {
    sessions.updateSession(connectionId, { metadata: { protocol: result.protocol } });
  }
}

/**
 * Handle WebSocket disconnection
 */
function handleDisconnect(server: SocketServer, connectionId: string, code: number, reason: string): void {
  const session = server.sessions.getSession(connectionId);

  logger.info('Client disconnected', {
    connectionId,
    code,
    reason,
    duration: session ? Date.now() - session.createdAt : undefined,
  });

  server.sessions.deleteSession(connectionId);
  server.connections.removeConnection(connectionId);
}

/**
 * Get socket server statistics
 * Exposed for health checks and monitoring
 */
export function getSocketStats(server: SocketServer): SocketStats {
  server.connections.getAllConnections().forEach((connection) => {
    server.sessions.updateSessionState(connection.id, connection.getState());
  });

  return {
    totalConnections: server.connections.getActiveCount(),
    sessionStats: server.sessions.getStats(),
  };
}

/**
 * Graceful shutdown for WebSocket server
 * Sends 1001 to every connection, waits for the closing handshakes, then drops the rest
 */
export async function shutdownSocketServer(server: SocketServer): Promise<void> {
  const { connections, sessions, options } = server;

  logger.info('Shutting down WebSocket server', { connections: connections.getActiveCount() });

  server.detach();

  const closed = Promise.all(
    connections.getAllConnections().map((connection) => connections.waitForClose(connection.id))
  );

  connections.closeAll(CloseCode.GOING_AWAY, 'Server shutting down');

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(true), options.shutdownTimeout);
  });

  const forced = await Promise.race([closed.then(() => false), timedOut]);
  clearTimeout(timer);

  if (forced) {
    logger.warn('WebSocket server force closed after timeout', {
      remaining: connections.getActiveCount(),
    });
    connections.terminateAll();
  }

  sessions.cleanup();
  logger.info('WebSocket server closed');
}
