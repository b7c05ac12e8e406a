/**
 * Socket Module Types
 * Centralized exports for all socket-related types
 */

export * from './session';
export * from './socket';
export * from './events';
