/**
 * WebSocket Message Handler
 * Text messages are echoed; binary messages are MessagePack envelopes routed by eventType
 */

import { unpack } from 'msgpackr';
import { logger } from '@/shared/utils';
import type { ConnectionSession, MessageType } from '@/modules/protocol';
import type { SessionService } from '../services';
import {
  ErrorCode,
  SOCKET_EVENTS,
  isSocketEventType,
  type EventMessage,
  type SocketEventType,
  type SocketStats,
} from '../types';
import { MessagePackHelper } from '../utils';
import { handleInternalError, handleInvalidPayload, sendError } from './error.handler';

const UNKNOWN_REQUEST_TYPE = 'unknown';

export interface MessageContext {
  connection: ConnectionSession;
  sessions: SessionService;
  getStats: () => SocketStats;
}

/**
 * Validate that unpacked message has the envelope structure
 */
function isValidEventMessage(data: unknown): data is EventMessage {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return false;
  }

  const eventType: unknown = Reflect.get(data, 'eventType');
  const eventId: unknown = Reflect.get(data, 'eventId');

  return typeof eventType === 'string' && eventType.length > 0 && typeof eventId === 'string';
}

function requestTypeOf(data: unknown): string {
  if (typeof data === 'object' && data !== null) {
    const eventType: unknown = Reflect.get(data, 'eventType');
    if (typeof eventType === 'string' && eventType.length > 0) {
      return eventType;
    }
  }
  return UNKNOWN_REQUEST_TYPE;
}

async function reply(context: MessageContext, data: string | Buffer): Promise<void> {
  const sent = await context.connection.send(data);
  if (sent) {
    context.sessions.recordSent(context.connection.id);
  }
}

export async function handleWebSocketMessage(
  context: MessageContext,
  type: MessageType,
  payload: Buffer
): Promise<void> {
  const { connection } = context;

  // Guard: the connection may have started closing while the message was queued
  if (!connection.isOpen()) {
    logger.warn('Connection not open, skipping message', {
      connectionId: connection.id,
      state: connection.getState(),
    });
    return;
  }

  if (type === 'text') {
    const text = payload.toString('utf-8');
    await reply(context, text === 'ping' ? 'pong' : text);
    return;
  }

  let data: EventMessage;
  try {
    const unpacked: unknown = unpack(payload);

    if (!isValidEventMessage(unpacked)) {
      logger.warn('Invalid message structure', { connectionId: connection.id });
      await sendError(connection, ErrorCode.INVALID_PAYLOAD, 'Invalid message structure', requestTypeOf(unpacked));
      return;
    }

    data = unpacked;
  } catch (error) {
    logger.warn('Failed to unpack MessagePack data', {
      connectionId: connection.id,
      error: error instanceof Error ? error.message : String(error),
    });
    await sendError(connection, ErrorCode.INVALID_PAYLOAD, 'Invalid message format', UNKNOWN_REQUEST_TYPE);
    return;
  }

  context.sessions.touchSession(connection.id);

  if (!isSocketEventType(data.eventType)) {
    logger.warn('Unknown event type', {
      connectionId: connection.id,
      eventType: data.eventType,
    });
    await sendError(
      connection,
      ErrorCode.UNKNOWN_EVENT,
      `Unknown event type: ${data.eventType}`,
      data.eventType,
      data.eventId
    );
    return;
  }

  try {
    await routeEvent(context, data.eventType, data);
  } catch (error) {
    await handleInternalError(
      connection,
      error instanceof Error ? error : new Error(String(error)),
      data.eventType,
      data.eventId
    );
  }
}

async function routeEvent(context: MessageContext, eventType: SocketEventType, data: EventMessage): Promise<void> {
  const { connection } = context;

  switch (eventType) {
    case SOCKET_EVENTS.ECHO: {
      if (data.payload === undefined) {
        await handleInvalidPayload(connection, eventType, 'payload is required', data.eventId);
        return;
      }
      await reply(context, MessagePackHelper.packAck(eventType, data.eventId, true, connection.id, data.payload));
      return;
    }

    case SOCKET_EVENTS.STATS:
      await reply(context, MessagePackHelper.packAck(eventType, data.eventId, true, connection.id, context.getStats()));
      return;

    default: {
      const unreachable: never = eventType;
      logger.error('Unrouted event type', { connectionId: connection.id, eventType: String(unreachable) });
    }
  }
}
