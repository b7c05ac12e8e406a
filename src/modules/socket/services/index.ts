/**
 * Socket Services
 * Centralized exports for all socket-related services
 */

export { SessionService } from './session.service';
export { ConnectionService } from './connection.service';
