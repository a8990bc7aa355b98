import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { AccessGroup, User } from '../../database/schema.js';
import type { DbClient } from '../../database/client.js';

/**
 * Extended Fastify instance type with Zod type provider.
 * Uses generic parameters to be compatible with any logger type.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AppInstance = FastifyInstance<any, any, any, any, ZodTypeProvider>;

/**
 * Authenticated staff user with their access group, if any.
 */
export type AuthenticatedUser = User & { accessGroup: AccessGroup | null };

declare module 'fastify' {
  interface FastifyInstance {
    db: DbClient;
  }

  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}
