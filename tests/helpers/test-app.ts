import { buildServer } from '../../src/core/server.js';
import type { AppInstance } from '../../src/shared/types/fastify.js';

/**
 * Create a test Fastify instance. Import tests/mocks/database.js first so
 * routes run against the in-process database.
 */
export async function createTestApp(): Promise<AppInstance> {
  const app = await buildServer();
  await app.ready();
  return app;
}
