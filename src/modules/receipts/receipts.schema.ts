import { z } from 'zod';
import { OWNER_MODELS, PAYMENT_METHODS, PaymentMethod } from '@shared/constants/convention.js';
import { PaginationQuerySchema } from '@shared/utils/pagination.js';

// ============================================================================
// Receipt Schemas
// ============================================================================

export const OwnerParamSchema = z
  .object({
    ownerModel: z.enum(OWNER_MODELS),
    ownerId: z.string().uuid(),
  })
  .strict();

export const ReceiptIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

export const TransactionIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

export const ListReceiptsQuerySchema = PaginationQuerySchema
  .extend({
    ownerModel: z.enum(OWNER_MODELS).optional(),
    open: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .optional(),
  })
  .strict();

export const AddReceiptItemSchema = z
  .object({
    // Cents; negative for credits
    amount: z.number().int(),
    count: z.number().int().min(1).default(1),
    desc: z.string().trim().min(1).max(255),
    revertChange: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const ManualTransactionSchema = z
  .object({
    // Cents; negative for refunds
    amount: z
      .number()
      .int()
      .refine((amount) => amount !== 0, 'Amount cannot be zero'),
    method: z
      .enum(PAYMENT_METHODS)
      .refine((method) => method !== PaymentMethod.STRIPE, 'Stripe payments must go through Stripe'),
    desc: z.string().trim().max(255).default(''),
  })
  .strict();

export const RefundTransactionSchema = z
  .object({
    // Defaults to everything not yet refunded
    amount: z.number().int().positive().optional(),
  })
  .strict();

export const StartPaymentSchema = z
  .object({
    receiptEmail: z.string().email().optional(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type OwnerParams = z.infer<typeof OwnerParamSchema>;
export type ListReceiptsQuery = z.infer<typeof ListReceiptsQuerySchema>;
export type AddReceiptItemInput = z.infer<typeof AddReceiptItemSchema>;
export type ManualTransactionInput = z.infer<typeof ManualTransactionSchema>;
export type RefundTransactionInput = z.infer<typeof RefundTransactionSchema>;
export type StartPaymentInput = z.infer<typeof StartPaymentSchema>;
