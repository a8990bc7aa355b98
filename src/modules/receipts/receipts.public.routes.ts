import { getOrCreateReceipt, startStripePayment } from './receipts.service.js';
import { summarizeReceipt } from './receipts.utils.js';
import {
  OwnerParamSchema,
  StartPaymentSchema,
  type OwnerParams,
  type StartPaymentInput,
} from './receipts.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Public Routes (No Auth - the owner id is the capability)
// ============================================================================

export async function receiptsPublicRoutes(app: AppInstance): Promise<void> {
  // GET /api/public/receipts/:ownerModel/:ownerId - What the owner owes
  app.get<{ Params: OwnerParams }>(
    '/:ownerModel/:ownerId',
    { schema: { params: OwnerParamSchema } },
    async (request, reply) => {
      const { ownerModel, ownerId } = request.params;
      const receipt = await getOrCreateReceipt(ownerModel, ownerId);
      return reply.send({
        id: receipt.id,
        items: receipt.items.map(({ desc, amount, count }) => ({ desc, amount, count })),
        summary: summarizeReceipt(receipt),
      });
    }
  );

  // POST /api/public/receipts/:ownerModel/:ownerId/payments - Pay online
  app.post<{ Params: OwnerParams; Body: StartPaymentInput }>(
    '/:ownerModel/:ownerId/payments',
    { schema: { params: OwnerParamSchema, body: StartPaymentSchema } },
    async (request, reply) => {
      const { ownerModel, ownerId } = request.params;
      const payment = await startStripePayment(ownerModel, ownerId, {
        receiptEmail: request.body.receiptEmail,
      });
      return reply.status(payment.reused ? 200 : 201).send(payment);
    }
  );
}
