/**
 * Centralized Error Handling for Socket Events
 */

import { logger } from '@/shared/utils';
import { WebSocketErrorKind, classifyTransportError, type ConnectionSession } from '@/modules/protocol';
import { ErrorCode } from '../types';
import { MessagePackHelper } from '../utils';

/**
 * Send error envelope to client
 * @param requestType - The original request event type (e.g., "echo")
 * @param requestEventId - Optional request eventId for correlation
 */
export async function sendError(
  connection: ConnectionSession,
  code: ErrorCode,
  message: string,
  requestType: string,
  requestEventId?: string
): Promise<boolean> {
  const errorMessage = MessagePackHelper.packError(requestType, code, message, connection.id, requestEventId);

  logger.warn('Error sent to client', {
    connectionId: connection.id,
    code,
    message,
    requestType,
  });

  return connection.sendBinary(errorMessage);
}

/**
 * Log an error reported by the connection engine at a severity matching its kind
 */
export function handleConnectionError(connectionId: string, kind: WebSocketErrorKind, error: Error): void {
  switch (kind) {
    case WebSocketErrorKind.HANDSHAKE_REJECTED:
      logger.info('Upgrade rejected', { connectionId, reason: error.message });
      return;

    case WebSocketErrorKind.TRANSPORT: {
      const classified = classifyTransportError(error);
      if (classified.expected) {
        logger.debug('Transport closed', { connectionId, code: classified.code });
      } else {
        logger.error('Transport error', { connectionId, code: classified.code, error: classified.message });
      }
      return;
    }

    case WebSocketErrorKind.INTERNAL:
      logger.error('Connection internal error', { connectionId, error: error.message, stack: error.stack });
      return;

    case WebSocketErrorKind.PROTOCOL_VIOLATION:
    case WebSocketErrorKind.INVALID_PAYLOAD:
    case WebSocketErrorKind.PAYLOAD_TOO_LARGE:
    case WebSocketErrorKind.TIMEOUT:
    case WebSocketErrorKind.BACKPRESSURE:
      logger.warn('Connection failed', { connectionId, kind, reason: error.message });
      return;

    default: {
      const unreachable: never = kind;
      logger.error('Unknown connection error kind', { connectionId, kind: String(unreachable) });
    }
  }
}

/**
 * Handle invalid payload errors
 */
export function handleInvalidPayload(
  connection: ConnectionSession,
  eventType: string,
  reason: string,
  requestEventId?: string
): Promise<boolean> {
  logger.warn('Invalid payload received', {
    connectionId: connection.id,
    eventType,
    reason,
  });

  return sendError(
    connection,
    ErrorCode.INVALID_PAYLOAD,
    `Invalid payload for ${eventType}: ${reason}`,
    eventType,
    requestEventId
  );
}

/**
 * Handle internal errors
 */
export function handleInternalError(
  connection: ConnectionSession,
  error: Error,
  requestType: string,
  requestEventId?: string
): Promise<boolean> {
  logger.error('Internal error', {
    connectionId: connection.id,
    error: error.message,
    stack: error.stack,
    requestType,
  });

  return sendError(connection, ErrorCode.INTERNAL_ERROR, 'An internal error occurred', requestType, requestEventId);
}
