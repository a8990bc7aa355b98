import { z } from 'zod';
import { requireAuth, requireSection } from '@shared/middleware/auth.middleware.js';
import {
  getMerchDiscount,
  getSalesSummary,
  listArbitraryCharges,
  listMerchPickups,
  listMPointsForCash,
  listNoShirts,
  listOldMPointExchanges,
  listSales,
  recordArbitraryCharge,
  recordMerchPickup,
  recordMPointsForCash,
  recordNoShirt,
  recordOldMPointExchange,
  recordSale,
  useMerchDiscount,
} from './merch.service.js';
import {
  AttendeeIdParamSchema,
  ListMerchQuerySchema,
  RecordArbitraryChargeSchema,
  RecordMerchPickupSchema,
  RecordMPointsSchema,
  RecordNoShirtSchema,
  RecordSaleSchema,
  SalesSummaryQuerySchema,
  type ListMerchQuery,
  type RecordArbitraryChargeInput,
  type RecordMerchPickupInput,
  type RecordMPointsInput,
  type RecordNoShirtInput,
  type RecordSaleInput,
  type SalesSummaryQuery,
} from './merch.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

const AttendeeFilterSchema = z
  .object({
    attendeeId: z.string().uuid().optional(),
  })
  .strict();

type AttendeeFilter = z.infer<typeof AttendeeFilterSchema>;

export async function merchRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireSection('merch'));

  // ==========================================================================
  // Arbitrary charges
  // ==========================================================================

  app.post<{ Body: RecordArbitraryChargeInput }>(
    '/charges',
    { schema: { body: RecordArbitraryChargeSchema } },
    async (request, reply) => {
      const charge = await recordArbitraryCharge(request.body);
      return reply.status(201).send(charge);
    }
  );

  app.get<{ Querystring: ListMerchQuery }>(
    '/charges',
    { schema: { querystring: ListMerchQuerySchema } },
    async (request, reply) => {
      const result = await listArbitraryCharges(request.query);
      return reply.send(result);
    }
  );

  // ==========================================================================
  // Staff discount
  // ==========================================================================

  app.get<{ Params: { attendeeId: string } }>(
    '/discounts/:attendeeId',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const discount = await getMerchDiscount(request.params.attendeeId);
      return reply.send({ attendeeId: request.params.attendeeId, uses: discount?.uses ?? 0 });
    }
  );

  app.post<{ Params: { attendeeId: string } }>(
    '/discounts/:attendeeId',
    { schema: { params: AttendeeIdParamSchema } },
    async (request, reply) => {
      const discount = await useMerchDiscount(request.params.attendeeId);
      return reply.status(201).send(discount);
    }
  );

  // ==========================================================================
  // Pickups
  // ==========================================================================

  app.post<{ Body: RecordMerchPickupInput }>(
    '/pickups',
    { schema: { body: RecordMerchPickupSchema } },
    async (request, reply) => {
      const pickup = await recordMerchPickup(request.body);
      return reply.status(201).send(pickup);
    }
  );

  app.get<{ Querystring: AttendeeFilter }>(
    '/pickups',
    { schema: { querystring: AttendeeFilterSchema } },
    async (request, reply) => {
      const pickups = await listMerchPickups(request.query.attendeeId);
      return reply.send(pickups);
    }
  );

  // ==========================================================================
  // MPoints
  // ==========================================================================

  app.post<{ Body: RecordMPointsInput }>(
    '/mpoints-for-cash',
    { schema: { body: RecordMPointsSchema } },
    async (request, reply) => {
      const row = await recordMPointsForCash(request.body);
      return reply.status(201).send(row);
    }
  );

  app.get<{ Querystring: AttendeeFilter }>(
    '/mpoints-for-cash',
    { schema: { querystring: AttendeeFilterSchema } },
    async (request, reply) => {
      const rows = await listMPointsForCash(request.query.attendeeId);
      return reply.send(rows);
    }
  );

  app.post<{ Body: RecordMPointsInput }>(
    '/old-mpoint-exchanges',
    { schema: { body: RecordMPointsSchema } },
    async (request, reply) => {
      const row = await recordOldMPointExchange(request.body);
      return reply.status(201).send(row);
    }
  );

  app.get<{ Querystring: AttendeeFilter }>(
    '/old-mpoint-exchanges',
    { schema: { querystring: AttendeeFilterSchema } },
    async (request, reply) => {
      const rows = await listOldMPointExchanges(request.query.attendeeId);
      return reply.send(rows);
    }
  );

  // ==========================================================================
  // Out-of-stock shirts
  // ==========================================================================

  app.post<{ Body: RecordNoShirtInput }>(
    '/no-shirts',
    { schema: { body: RecordNoShirtSchema } },
    async (request, reply) => {
      const row = await recordNoShirt(request.body.attendeeId);
      return reply.status(201).send(row);
    }
  );

  app.get('/no-shirts', async (_request, reply) => {
    const rows = await listNoShirts();
    return reply.send(rows);
  });

  // ==========================================================================
  // Sales
  // ==========================================================================

  app.post<{ Body: RecordSaleInput }>(
    '/sales',
    { schema: { body: RecordSaleSchema } },
    async (request, reply) => {
      const sale = await recordSale(request.body);
      return reply.status(201).send(sale);
    }
  );

  app.get<{ Querystring: ListMerchQuery }>(
    '/sales',
    { schema: { querystring: ListMerchQuerySchema } },
    async (request, reply) => {
      const result = await listSales(request.query);
      return reply.send(result);
    }
  );

  app.get<{ Querystring: SalesSummaryQuery }>(
    '/sales/summary',
    { schema: { querystring: SalesSummaryQuerySchema } },
    async (request, reply) => {
      const summary = await getSalesSummary(request.query);
      return reply.send(summary);
    }
  );
}
