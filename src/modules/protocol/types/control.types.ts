/**
 * Control Frame Handling Types
 */

import type { CloseCode } from '../config';
import type { WebSocketErrorKind } from './error.types';
import type { CloseInfo } from './session.types';

/**
 * What the session must do in response to one control frame
 */
export type ControlAction =
  | { type: 'pong'; payload: Buffer }
  | { type: 'ignore'; reason: string }
  | { type: 'liveness'; payload: Buffer }
  | { type: 'echo-close'; received: CloseInfo; reply: CloseInfo }
  | { type: 'complete-close'; received: CloseInfo }
  | { type: 'fail'; closeCode: CloseCode; reason: string; kind: WebSocketErrorKind };
