import { and, count, desc, eq, gte, lte, sum, type SQL } from 'drizzle-orm';
import type { PgColumn } from 'drizzle-orm/pg-core';
import { db } from '@/database/client.js';
import {
  arbitraryCharges,
  attendees,
  merchDiscounts,
  merchPickups,
  mpointsForCash,
  noShirts,
  oldMpointExchanges,
  sales,
  type ArbitraryCharge,
  type MerchDiscount,
  type MerchPickup,
  type MPointsForCash,
  type NoShirt,
  type OldMPointExchange,
  type Sale,
} from '@/database/schema.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import type { SaleMethodValue } from '@shared/constants/convention.js';
import { paginate, getOffset, type PaginatedResult } from '@shared/utils/pagination.js';
import { logger } from '@shared/utils/logger.js';
import type {
  ListMerchQuery,
  RecordArbitraryChargeInput,
  RecordMerchPickupInput,
  RecordMPointsInput,
  RecordSaleInput,
  SalesSummaryQuery,
} from './merch.schema.js';

export interface SalesSummaryRow {
  paymentMethod: SaleMethodValue;
  sales: number;
  cash: number;
  mpoints: number;
}

// ============================================================================
// Helpers
// ============================================================================

async function assertAttendeeExists(attendeeId: string): Promise<void> {
  const [row] = await db
    .select({ id: attendees.id })
    .from(attendees)
    .where(eq(attendees.id, attendeeId))
    .limit(1);
  if (!row) {
    throw new AppError('Attendee not found', 404, true, ErrorCodes.ATTENDEE_NOT_FOUND);
  }
}

function dateRange(column: PgColumn, since?: Date, until?: Date): SQL[] {
  const conditions: SQL[] = [];
  if (since) conditions.push(gte(column, since));
  if (until) conditions.push(lte(column, until));
  return conditions;
}

// ============================================================================
// Arbitrary Charges
// ============================================================================

export async function recordArbitraryCharge(input: RecordArbitraryChargeInput): Promise<ArbitraryCharge> {
  const [charge] = await db
    .insert(arbitraryCharges)
    .values({ amount: input.amount, what: input.what, regStation: input.regStation ?? null })
    .returning();
  logger.info({ chargeId: charge.id, amount: charge.amount }, 'Arbitrary charge recorded');
  return charge;
}

export async function listArbitraryCharges(
  query: ListMerchQuery
): Promise<PaginatedResult<ArbitraryCharge>> {
  const { page, limit, since, until } = query;
  const conditions = dateRange(arbitraryCharges.when, since, until);
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const [data, [{ total }]] = await Promise.all([
    db
      .select()
      .from(arbitraryCharges)
      .where(where)
      .orderBy(desc(arbitraryCharges.when))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(arbitraryCharges).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

// ============================================================================
// Staff Merch Discount
// ============================================================================

/**
 * Spend an attendee's single-use merch discount.
 */
export async function useMerchDiscount(attendeeId: string): Promise<MerchDiscount> {
  await assertAttendeeExists(attendeeId);

  const [existing] = await db
    .select()
    .from(merchDiscounts)
    .where(eq(merchDiscounts.attendeeId, attendeeId))
    .limit(1);
  if (existing && existing.uses > 0) {
    throw new AppError(
      'This attendee has already used their merch discount',
      409,
      true,
      ErrorCodes.MERCH_DISCOUNT_USED
    );
  }

  if (existing) {
    const [updated] = await db
      .update(merchDiscounts)
      .set({ uses: existing.uses + 1 })
      .where(eq(merchDiscounts.id, existing.id))
      .returning();
    return updated;
  }

  const [discount] = await db.insert(merchDiscounts).values({ attendeeId, uses: 1 }).returning();
  logger.info({ attendeeId }, 'Merch discount used');
  return discount;
}

export async function getMerchDiscount(attendeeId: string): Promise<MerchDiscount | null> {
  const [discount] = await db
    .select()
    .from(merchDiscounts)
    .where(eq(merchDiscounts.attendeeId, attendeeId))
    .limit(1);
  return discount ?? null;
}

// ============================================================================
// Merch Pickups
// ============================================================================

export async function recordMerchPickup(input: RecordMerchPickupInput): Promise<MerchPickup> {
  await assertAttendeeExists(input.pickedUpById);
  if (input.pickedUpForId !== input.pickedUpById) {
    await assertAttendeeExists(input.pickedUpForId);
  }

  const [existing] = await db
    .select({ id: merchPickups.id })
    .from(merchPickups)
    .where(eq(merchPickups.pickedUpForId, input.pickedUpForId))
    .limit(1);
  if (existing) {
    throw new AppError(
      "This attendee's merch has already been picked up",
      409,
      true,
      ErrorCodes.MERCH_ALREADY_PICKED_UP
    );
  }

  const [pickup] = await db.insert(merchPickups).values(input).returning();
  logger.info(
    { pickedUpById: input.pickedUpById, pickedUpForId: input.pickedUpForId },
    'Merch picked up'
  );
  return pickup;
}

export async function listMerchPickups(attendeeId?: string): Promise<MerchPickup[]> {
  return db
    .select()
    .from(merchPickups)
    .where(attendeeId ? eq(merchPickups.pickedUpById, attendeeId) : undefined);
}

// ============================================================================
// MPoints
// ============================================================================

export async function recordMPointsForCash(input: RecordMPointsInput): Promise<MPointsForCash> {
  await assertAttendeeExists(input.attendeeId);
  const [row] = await db.insert(mpointsForCash).values(input).returning();
  return row;
}

export async function listMPointsForCash(attendeeId?: string): Promise<MPointsForCash[]> {
  return db
    .select()
    .from(mpointsForCash)
    .where(attendeeId ? eq(mpointsForCash.attendeeId, attendeeId) : undefined)
    .orderBy(desc(mpointsForCash.when));
}

export async function recordOldMPointExchange(input: RecordMPointsInput): Promise<OldMPointExchange> {
  await assertAttendeeExists(input.attendeeId);
  const [row] = await db.insert(oldMpointExchanges).values(input).returning();
  return row;
}

export async function listOldMPointExchanges(attendeeId?: string): Promise<OldMPointExchange[]> {
  return db
    .select()
    .from(oldMpointExchanges)
    .where(attendeeId ? eq(oldMpointExchanges.attendeeId, attendeeId) : undefined)
    .orderBy(desc(oldMpointExchanges.when));
}

// ============================================================================
// Out-of-stock Shirts
// ============================================================================

export async function recordNoShirt(attendeeId: string): Promise<NoShirt> {
  await assertAttendeeExists(attendeeId);

  const [existing] = await db
    .select({ id: noShirts.id })
    .from(noShirts)
    .where(eq(noShirts.attendeeId, attendeeId))
    .limit(1);
  if (existing) {
    throw new AppError(
      'A missing shirt is already recorded for this attendee',
      409,
      true,
      ErrorCodes.NO_SHIRT_ALREADY_RECORDED
    );
  }

  const [row] = await db.insert(noShirts).values({ attendeeId }).returning();
  logger.info({ attendeeId }, 'Out-of-stock shirt recorded');
  return row;
}

export async function listNoShirts(): Promise<NoShirt[]> {
  return db.select().from(noShirts).orderBy(noShirts.createdAt);
}

// ============================================================================
// Sales
// ============================================================================

export async function recordSale(input: RecordSaleInput): Promise<Sale> {
  if (input.attendeeId) {
    await assertAttendeeExists(input.attendeeId);
  }

  const [sale] = await db
    .insert(sales)
    .values({
      attendeeId: input.attendeeId,
      what: input.what,
      cash: input.cash,
      mpoints: input.mpoints,
      regStation: input.regStation ?? null,
      paymentMethod: input.paymentMethod,
    })
    .returning();
  logger.info({ saleId: sale.id, paymentMethod: sale.paymentMethod }, 'Sale recorded');
  return sale;
}

export async function listSales(query: ListMerchQuery): Promise<PaginatedResult<Sale>> {
  const { page, limit, attendeeId, since, until } = query;
  const conditions = dateRange(sales.when, since, until);
  if (attendeeId) conditions.push(eq(sales.attendeeId, attendeeId));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const [data, [{ total }]] = await Promise.all([
    db
      .select()
      .from(sales)
      .where(where)
      .orderBy(desc(sales.when))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(sales).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

/**
 * Sale counts and totals per payment method.
 */
export async function getSalesSummary(query: SalesSummaryQuery = {}): Promise<SalesSummaryRow[]> {
  const conditions = dateRange(sales.when, query.since, query.until);
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select({
      paymentMethod: sales.paymentMethod,
      sales: count(),
      cash: sum(sales.cash).mapWith(Number),
      mpoints: sum(sales.mpoints).mapWith(Number),
    })
    .from(sales)
    .where(where)
    .groupBy(sales.paymentMethod)
    .orderBy(sales.paymentMethod);

  return rows;
}
