import { getPricingOverview } from './pricing.service.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Public Routes (No Auth)
// ============================================================================

export async function pricingPublicRoutes(app: AppInstance): Promise<void> {
  // GET /api/pricing - Current badge prices and upcoming bumps
  app.get('/', async (_request, reply) => {
    return reply.send(getPricingOverview());
  });
}
