/**
 * WebSocket Configuration
 * Limits and timers for the upgrade endpoint and each connection session
 */

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/**
 * WebSocket server configuration
 */
export const websocketConfig = {
  // Upgrade requests on any other path are rejected with 404
  path: process.env.WS_PATH || '/ws',

  // Maximum reassembled message size (10 MB); larger messages close with 1009
  maxMessageSize: readInt('WS_MAX_MESSAGE_SIZE', 10 * 1024 * 1024),

  // Upgrades beyond this count are rejected with 503
  maxConnections: readInt('WS_MAX_CONNECTIONS', 1000),

  // Outbound data allowed to wait on a peer that is not reading (32 MB / 1024 frames)
  maxQueuedBytes: readInt('WS_MAX_QUEUED_BYTES', 32 * 1024 * 1024),
  maxQueuedFrames: readInt('WS_MAX_QUEUED_FRAMES', 1024),
} as const;

/**
 * Per-connection liveness and shutdown timers (milliseconds, 0 disables)
 */
export const websocketTimeoutConfig = {
  // Silence before the server sends a ping
  pingInterval: readInt('WS_PING_INTERVAL_MS', 30000),

  // Silence after that ping before the connection is closed with 1001
  pongTimeout: readInt('WS_PONG_TIMEOUT_MS', 10000),

  // How long to wait for the peer's close echo before dropping the socket
  closeTimeout: readInt('WS_CLOSE_TIMEOUT_MS', 5000),

  // Timeout for graceful server shutdown
  shutdownTimeout: readInt('WS_SHUTDOWN_TIMEOUT_MS', 5000),
} as const;
