import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import { config } from '@config/app.config.js';
import type { AppInstance } from '@shared/types/fastify.js';

// Stripe retries deliveries on its own schedule
const RATE_LIMIT_EXEMPT_PREFIXES = ['/api/webhooks/', '/health'];

export async function registerPlugins(app: AppInstance) {
  await app.register(sensible, {
    sharedSchemaId: 'HttpError',
  });

  await app.register(cors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
  });

  await app.register(helmet, {
    contentSecurityPolicy: config.isProduction,
  });

  await app.register(rateLimit, {
    max: config.security.rateLimit.max,
    timeWindow: config.security.rateLimit.timeWindow,
    allowList: (request) =>
      RATE_LIMIT_EXEMPT_PREFIXES.some((prefix) => request.url.startsWith(prefix)),
  });
}
