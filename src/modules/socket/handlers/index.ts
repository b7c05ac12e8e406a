/**
 * Socket Handlers
 * Centralized exports for all socket event handlers
 */

export { handleWebSocketMessage } from './message.handler';
export type { MessageContext } from './message.handler';
export {
  sendError,
  handleConnectionError,
  handleInvalidPayload,
  handleInternalError,
} from './error.handler';
