import 'dotenv/config';
import { buildServer } from '@core/server.js';
import { config } from '@config/app.config.js';
import { convention } from '@config/convention.config.js';
import { logger } from '@shared/utils/logger.js';
import { gracefulShutdown } from '@core/shutdown.js';
import { getConventionPhase } from '@pricing';

async function main() {
  const server = await buildServer();

  await server.listen({ port: config.PORT, host: config.HOST });
  logger.info(
    { port: config.PORT, event: convention.eventName, phase: getConventionPhase() },
    'Registration server listening'
  );

  gracefulShutdown(server);
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start server');
  process.exit(1);
});
