import type { FastifyInstance } from 'fastify';
import { pool } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';

const FORCE_EXIT_AFTER_MS = 10_000;

export function gracefulShutdown(server: FastifyInstance) {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let shuttingDown = false;

  signals.forEach((signal) => {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);

      const forceExit = setTimeout(() => {
        logger.error('Shutdown timed out, forcing exit');
        process.exit(1);
      }, FORCE_EXIT_AFTER_MS);
      forceExit.unref();

      void (async () => {
        try {
          await server.close();
          await pool.end();
          logger.info('Server closed');
          process.exit(0);
        } catch (error) {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      })();
    });
  });
}
