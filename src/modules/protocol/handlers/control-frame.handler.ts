/**
 * Control Frame Handler
 * Interprets ping, pong and close frames independently of message reassembly
 */

import { CloseCode } from '../config';
import {
  ConnectionState,
  Opcode,
  WebSocketErrorKind,
  type CloseInfo,
  type ControlAction,
  type Frame,
} from '../types';
import { isProtocolError, parseClosePayload } from '../utils';

function isClosing(state: ConnectionState): boolean {
  return state !== ConnectionState.OPEN;
}

export function handleControlFrame(frame: Frame, state: ConnectionState): ControlAction {
  switch (frame.opcode) {
    case Opcode.PING:
      if (isClosing(state)) {
        return { type: 'ignore', reason: 'ping while closing' };
      }
      // Pong payload must be byte-identical to the ping's
      return { type: 'pong', payload: frame.payload };

    case Opcode.PONG:
      // Unsolicited pongs are fine: they only prove the peer is alive
      return { type: 'liveness', payload: frame.payload };

    case Opcode.CLOSE:
      return handleClose(frame, state);

    case Opcode.CONTINUATION:
    case Opcode.TEXT:
    case Opcode.BINARY:
      return {
        type: 'fail',
        closeCode: CloseCode.INTERNAL_ERROR,
        reason: 'Data frame routed to control handler',
        kind: WebSocketErrorKind.INTERNAL,
      };

    default: {
      const unreachable: never = frame.opcode;
      return {
        type: 'fail',
        closeCode: CloseCode.PROTOCOL_ERROR,
        reason: `Unhandled opcode ${String(unreachable)}`,
        kind: WebSocketErrorKind.PROTOCOL_VIOLATION,
      };
    }
  }
}

function handleClose(frame: Frame, state: ConnectionState): ControlAction {
  let received: CloseInfo;
  try {
    received = parseClosePayload(frame.payload);
  } catch (error) {
    if (isProtocolError(error)) {
      return { type: 'fail', closeCode: error.closeCode, reason: error.message, kind: error.kind };
    }
    throw error;
  }

  switch (state) {
    case ConnectionState.OPEN:
      return {
        type: 'echo-close',
        received,
        // A close without a status is answered with a normal closure
        reply: received.code === CloseCode.NO_STATUS ? { code: CloseCode.NORMAL, reason: '' } : received,
      };

    case ConnectionState.CLOSING_SENT:
      return { type: 'complete-close', received };

    default:
      return { type: 'ignore', reason: `close frame in state ${state}` };
  }
}
