/**
 * Protocol Handlers
 */

export { handleControlFrame } from './control-frame.handler';
