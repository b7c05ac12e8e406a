/**
 * Socket Utilities
 */

export { MessagePackHelper } from './MessagePackHelper';
