import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { env, validateEnv, websocketConfig, websocketTimeoutConfig } from '@/shared/config';
import { logger } from '@/shared/utils';
import {
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
} from '@/modules/socket';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', error instanceof Error ? error : { error });
  process.exit(1);
}

// Create Express app
const app = express();

// Middleware
app.use(cors({ origin: env.CORS_ORIGIN }));
app.use(express.json());

// Create HTTP server
const httpServer = createServer(app);

// Attach the WebSocket upgrade handler
const socketServer = initializeSocketServer(httpServer, {
  path: websocketConfig.path,
  maxConnections: websocketConfig.maxConnections,
  maxMessageSize: websocketConfig.maxMessageSize,
  ...websocketTimeoutConfig,
});

// Health check endpoint
app.get('/health', (_req, res) => {
  const socketStats = getSocketStats(socketServer);

  res.json({
    status: 'ok',
    uptime: process.uptime(),
    sessions: socketStats.sessionStats,
    websocketServer: {
      path: socketServer.options.path,
      totalConnections: socketStats.totalConnections,
      maxConnections: socketServer.options.maxConnections,
    },
  });
});

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Step 1: Stop accepting new connections; upgraded sockets are closed in step 2
    const httpClosed = new Promise<void>((resolve) => {
      httpServer.close(() => {
        logger.info('HTTP server closed');
        resolve();
      });
    });

    // Step 2: Close every WebSocket with 1001 and wait for the closing handshakes
    await shutdownSocketServer(socketServer);

    await Promise.race([
      httpClosed,
      new Promise<void>((resolve) => {
        setTimeout(() => {
          logger.warn('HTTP server force closed after timeout');
          resolve();
        }, websocketTimeoutConfig.shutdownTimeout).unref();
      }),
    ]);

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error instanceof Error ? error : { error });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('WebSocket server started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    path: socketServer.options.path,
  });
});
