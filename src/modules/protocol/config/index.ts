/**
 * Protocol Configuration Exports
 */

export * from './protocol.constants';
