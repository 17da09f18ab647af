import type { ServerType } from '@hono/node-server';
import { logger } from './lib/logger';

const SHUTDOWN_TIMEOUT_MS = 10_000;

/** Stops accepting connections and waits for in-flight requests to finish */
function closeServer(server: Pick<ServerType, 'close'>): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function gracefulShutdown(server: ServerType, signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error(`Shutdown timed out after ${SHUTDOWN_TIMEOUT_MS / 1000}s, forcing exit`);
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    logger.info('Closing HTTP server');
    await closeServer(server);

    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(server: ServerType): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown(server, 'SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown(server, 'SIGINT');
  });
}
