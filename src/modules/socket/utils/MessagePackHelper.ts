/**
 * MessagePack Helper
 * Static utility methods for packing application envelopes
 */

import { pack } from 'msgpackr';
import { generateId } from '@/shared/utils';
import { ErrorCode, toErrorEventType, type AckPayload, type ErrorPayload } from '../types';

export class MessagePackHelper {
  /**
   * Pack acknowledgment response
   * Response format: same eventType and eventId as the request
   * @param data - Optional result carried in the ack payload
   */
  static packAck(
    requestType: string,
    requestEventId: string,
    success: boolean,
    connectionId?: string,
    data?: unknown
  ): Buffer {
    const payload: AckPayload = data === undefined ? { success } : { success, data };
    return pack({
      eventType: requestType,
      eventId: requestEventId,
      connectionId,
      payload,
    });
  }

  /**
   * Pack a server-initiated event with a fresh eventId
   */
  static packEvent(eventType: string, payload: unknown, connectionId?: string): Buffer {
    return pack({
      eventType,
      eventId: generateId(),
      connectionId,
      payload,
    });
  }

  /**
   * Pack error response
   * eventType becomes `<requestType>.error`; eventId is echoed when the request had one
   */
  static packError(
    requestType: string,
    code: ErrorCode,
    message: string,
    connectionId?: string,
    requestEventId?: string
  ): Buffer {
    const payload: ErrorPayload = { code, message };
    return pack({
      eventType: toErrorEventType(requestType),
      eventId: requestEventId ?? generateId(),
      connectionId,
      requestType,
      payload,
    });
  }
}
