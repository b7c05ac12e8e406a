/**
 * Socket Module - Public API
 *
 * This is the public interface for the socket module.
 * Only export what other modules should use.
 */

// Server initialization and stats
export { initializeSocketServer, shutdownSocketServer, getSocketStats } from './socket.server';

export { ConnectionService, SessionService } from './services';
export { MessagePackHelper } from './utils';
export { handleWebSocketMessage } from './handlers';
export type { MessageContext } from './handlers';

export type {
  Session,
  SessionMetadata,
  SessionStats,
  SocketServer,
  SocketServerOptions,
  SocketStats,
  EventMessage,
  ErrorPayload,
  AckPayload,
  SocketEventType,
} from './types';

export { ErrorCode, SOCKET_EVENTS, isSocketEventType, toErrorEventType } from './types';
