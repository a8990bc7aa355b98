import { randomUUID } from 'crypto';
import type { AppInstance } from '@shared/types/fastify.js';

// Accept caller-supplied ids only when they are short opaque tokens
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function registerHooks(app: AppInstance) {
  app.addHook('onRequest', async (request) => {
    const header = request.headers['x-request-id'];
    request.id = typeof header === 'string' && REQUEST_ID_PATTERN.test(header) ? header : randomUUID();
  });

  app.addHook('onSend', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });
}
