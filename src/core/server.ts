import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { registerPlugins } from './plugins.js';
import { registerHooks } from './hooks.js';
import { errorHandler } from '@shared/middleware/error.middleware.js';
import { sql } from 'drizzle-orm';
import { db } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';
import { usersRoutes, accessGroupsRoutes } from '@identity';
import { pricingPublicRoutes } from '@pricing';
import { attendeesRoutes, attendeesPublicRoutes } from '@attendees';
import { groupsRoutes } from '@groups';
import { receiptsRoutes, receiptsPublicRoutes, stripeWebhookRoutes } from '@receipts';
import { merchRoutes } from '@merch';
import { formsPublicRoutes } from '@forms';
import type { AppInstance } from '@shared/types/fastify.js';

export async function buildServer(): Promise<AppInstance> {
  const app = Fastify({
    loggerInstance: logger,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.decorate('db', db);

  // Register plugins (CORS, Helmet, Rate Limit)
  await registerPlugins(app);

  // Register lifecycle hooks
  registerHooks(app);

  // Health check with database connectivity
  app.get('/health', async (_request, reply) => {
    const checks: Record<string, 'connected' | 'disconnected'> = {
      database: 'disconnected',
    };

    try {
      await db.execute(sql`SELECT 1`);
      checks.database = 'connected';
    } catch (error) {
      logger.warn({ err: error }, 'Database health check failed');
    }

    const allHealthy = Object.values(checks).every((v) => v === 'connected');
    const status = allHealthy ? 'ok' : 'degraded';
    const statusCode = allHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Register module routes
  await app.register(usersRoutes, { prefix: '/api/users' });
  await app.register(accessGroupsRoutes, { prefix: '/api/access-groups' });
  await app.register(attendeesRoutes, { prefix: '/api/attendees' });
  await app.register(groupsRoutes, { prefix: '/api/groups' });
  await app.register(receiptsRoutes, { prefix: '/api/receipts' });
  await app.register(merchRoutes, { prefix: '/api/merch' });

  // Public routes
  await app.register(pricingPublicRoutes, { prefix: '/api/pricing' });
  await app.register(formsPublicRoutes, { prefix: '/api/forms' });
  await app.register(attendeesPublicRoutes, { prefix: '/api/public/attendees' });
  await app.register(receiptsPublicRoutes, { prefix: '/api/public/receipts' });

  // Stripe webhooks read the raw body in their own scope
  await app.register(stripeWebhookRoutes, { prefix: '/api/webhooks' });

  // Global error handler
  app.setErrorHandler(errorHandler);

  return app;
}
