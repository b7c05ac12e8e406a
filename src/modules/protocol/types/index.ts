/**
 * Protocol Module Types
 * Centralized exports for all protocol types
 */

export * from './frame.types';
export * from './message.types';
export * from './handshake.types';
export * from './session.types';
export * from './error.types';
export * from './control.types';
