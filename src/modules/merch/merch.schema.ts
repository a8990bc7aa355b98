import { z } from 'zod';
import { SALE_METHODS } from '@shared/constants/convention.js';
import { PaginationQuerySchema } from '@shared/utils/pagination.js';

// ============================================================================
// Merch & Sales Schemas
// ============================================================================

const regStation = z.number().int().min(0).optional();

export const AttendeeIdParamSchema = z
  .object({
    attendeeId: z.string().uuid(),
  })
  .strict();

export const RecordArbitraryChargeSchema = z
  .object({
    // Cents
    amount: z.number().int().positive(),
    what: z.string().trim().min(1).max(255),
    regStation,
  })
  .strict();

export const RecordMerchPickupSchema = z
  .object({
    pickedUpById: z.string().uuid(),
    pickedUpForId: z.string().uuid(),
  })
  .strict();

export const RecordMPointsSchema = z
  .object({
    attendeeId: z.string().uuid(),
    amount: z.number().int().positive(),
  })
  .strict();

export const RecordNoShirtSchema = z
  .object({
    attendeeId: z.string().uuid(),
  })
  .strict();

export const RecordSaleSchema = z
  .object({
    attendeeId: z.string().uuid().nullable().default(null),
    what: z.string().trim().min(1).max(255),
    cash: z.number().int().min(0).default(0),
    mpoints: z.number().int().min(0).default(0),
    regStation,
    paymentMethod: z.enum(SALE_METHODS).default('MERCH'),
  })
  .strict()
  .refine((sale) => sale.cash > 0 || sale.mpoints > 0, {
    message: 'A sale needs a cash or MPoints amount',
    path: ['cash'],
  });

export const ListMerchQuerySchema = PaginationQuerySchema
  .extend({
    attendeeId: z.string().uuid().optional(),
    since: z.coerce.date().optional(),
    until: z.coerce.date().optional(),
  })
  .strict();

export const SalesSummaryQuerySchema = z
  .object({
    since: z.coerce.date().optional(),
    until: z.coerce.date().optional(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type RecordArbitraryChargeInput = z.infer<typeof RecordArbitraryChargeSchema>;
export type RecordMerchPickupInput = z.infer<typeof RecordMerchPickupSchema>;
export type RecordMPointsInput = z.infer<typeof RecordMPointsSchema>;
export type RecordNoShirtInput = z.infer<typeof RecordNoShirtSchema>;
export type RecordSaleInput = z.infer<typeof RecordSaleSchema>;
export type ListMerchQuery = z.infer<typeof ListMerchQuerySchema>;
export type SalesSummaryQuery = z.infer<typeof SalesSummaryQuerySchema>;
