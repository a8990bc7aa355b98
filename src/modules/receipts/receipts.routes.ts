import type { FastifyRequest } from 'fastify';
import { requireAuth, requireSection } from '@shared/middleware/auth.middleware.js';
import {
  addReceiptItem,
  cancelTransaction,
  checkPaidFromStripe,
  closeReceipt,
  getOrCreateReceipt,
  getReceiptById,
  listReceipts,
  recordManualTransaction,
  refundTransaction,
  startStripePayment,
  updateAmountRefunded,
} from './receipts.service.js';
import { summarizeReceipt } from './receipts.utils.js';
import {
  AddReceiptItemSchema,
  ListReceiptsQuerySchema,
  ManualTransactionSchema,
  OwnerParamSchema,
  ReceiptIdParamSchema,
  RefundTransactionSchema,
  StartPaymentSchema,
  TransactionIdParamSchema,
  type AddReceiptItemInput,
  type ListReceiptsQuery,
  type ManualTransactionInput,
  type OwnerParams,
  type RefundTransactionInput,
  type StartPaymentInput,
} from './receipts.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// Who to credit on ledger lines
function who(request: FastifyRequest): string {
  return request.user?.email ?? '';
}

export async function receiptsRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireSection('receipts'));

  // GET /api/receipts - List receipts with totals
  app.get<{ Querystring: ListReceiptsQuery }>(
    '/',
    { schema: { querystring: ListReceiptsQuerySchema } },
    async (request, reply) => {
      const result = await listReceipts(request.query);
      return reply.send(result);
    }
  );

  // GET /api/receipts/owners/:ownerModel/:ownerId - Open receipt for an owner
  app.get<{ Params: OwnerParams }>(
    '/owners/:ownerModel/:ownerId',
    { schema: { params: OwnerParamSchema } },
    async (request, reply) => {
      const { ownerModel, ownerId } = request.params;
      const receipt = await getOrCreateReceipt(ownerModel, ownerId, who(request));
      return reply.send({ ...receipt, summary: summarizeReceipt(receipt) });
    }
  );

  // POST /api/receipts/owners/:ownerModel/:ownerId/payments - Start a Stripe payment
  app.post<{ Params: OwnerParams; Body: StartPaymentInput }>(
    '/owners/:ownerModel/:ownerId/payments',
    { schema: { params: OwnerParamSchema, body: StartPaymentSchema } },
    async (request, reply) => {
      const { ownerModel, ownerId } = request.params;
      const payment = await startStripePayment(ownerModel, ownerId, {
        receiptEmail: request.body.receiptEmail,
        who: who(request),
      });
      return reply.status(payment.reused ? 200 : 201).send(payment);
    }
  );

  // GET /api/receipts/:id
  app.get<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: ReceiptIdParamSchema } },
    async (request, reply) => {
      const receipt = await getReceiptById(request.params.id);
      if (!receipt) {
        throw app.httpErrors.notFound('Receipt not found');
      }
      return reply.send(receipt);
    }
  );

  // POST /api/receipts/:id/items
  app.post<{ Params: { id: string }; Body: AddReceiptItemInput }>(
    '/:id/items',
    { schema: { params: ReceiptIdParamSchema, body: AddReceiptItemSchema } },
    async (request, reply) => {
      const item = await addReceiptItem(request.params.id, request.body, who(request));
      return reply.status(201).send(item);
    }
  );

  // POST /api/receipts/:id/transactions - Cash, terminal or manual entry
  app.post<{ Params: { id: string }; Body: ManualTransactionInput }>(
    '/:id/transactions',
    { schema: { params: ReceiptIdParamSchema, body: ManualTransactionSchema } },
    async (request, reply) => {
      const txn = await recordManualTransaction(request.params.id, request.body, who(request));
      return reply.status(201).send(txn);
    }
  );

  // POST /api/receipts/:id/close
  app.post<{ Params: { id: string } }>(
    '/:id/close',
    { schema: { params: ReceiptIdParamSchema } },
    async (request, reply) => {
      const receipt = await closeReceipt(request.params.id);
      return reply.send(receipt);
    }
  );

  // POST /api/receipts/transactions/:id/cancel
  app.post<{ Params: { id: string } }>(
    '/transactions/:id/cancel',
    { schema: { params: TransactionIdParamSchema } },
    async (request, reply) => {
      const txn = await cancelTransaction(request.params.id, who(request));
      return reply.send(txn);
    }
  );

  // POST /api/receipts/transactions/:id/refund
  app.post<{ Params: { id: string }; Body: RefundTransactionInput }>(
    '/transactions/:id/refund',
    { schema: { params: TransactionIdParamSchema, body: RefundTransactionSchema } },
    async (request, reply) => {
      const refund = await refundTransaction(request.params.id, request.body.amount, who(request));
      return reply.status(201).send(refund);
    }
  );

  // POST /api/receipts/transactions/:id/check-paid - Ask Stripe for the charge
  app.post<{ Params: { id: string } }>(
    '/transactions/:id/check-paid',
    { schema: { params: TransactionIdParamSchema } },
    async (request, reply) => {
      const txn = await checkPaidFromStripe(request.params.id);
      return reply.send(txn);
    }
  );

  // POST /api/receipts/transactions/:id/refresh-refunds
  app.post<{ Params: { id: string } }>(
    '/transactions/:id/refresh-refunds',
    { schema: { params: TransactionIdParamSchema } },
    async (request, reply) => {
      const txn = await updateAmountRefunded(request.params.id);
      return reply.send(txn);
    }
  );
}
