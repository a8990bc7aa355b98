import { constructWebhookEvent } from '@shared/services/stripe.service.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { handleStripeEvent } from './receipts.service.js';
import type { AppInstance } from '@shared/types/fastify.js';

/**
 * Stripe webhooks. Signature checks need the exact bytes Stripe sent, so
 * JSON bodies stay unparsed inside this plugin.
 */
export async function stripeWebhookRoutes(app: AppInstance): Promise<void> {
  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  // POST /api/webhooks/stripe
  app.post<{ Body: Buffer }>('/stripe', async (request, reply) => {
    const signature = request.headers['stripe-signature'];
    if (typeof signature !== 'string' || !signature) {
      throw new AppError(
        'Missing stripe-signature header',
        400,
        true,
        ErrorCodes.INVALID_WEBHOOK_SIGNATURE
      );
    }

    const event = constructWebhookEvent(request.body, signature);
    await handleStripeEvent(event);
    return reply.send({ received: true });
  });
}
