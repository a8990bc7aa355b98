import { and, count, desc, eq, isNotNull, isNull, sql, type SQL } from 'drizzle-orm';
import type Stripe from 'stripe';
import { db, type DbClient } from '@/database/client.js';
import {
  attendees,
  groups,
  modelReceipts,
  receiptItems,
  receiptTransactions,
  type Attendee,
  type ModelReceipt,
  type ReceiptItem,
  type ReceiptTransaction,
} from '@/database/schema.js';
import { convention } from '@config/convention.config.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import {
  BadgeStatus,
  OwnerModel,
  PaidStatus,
  PaymentMethod,
  type BadgeTypeValue,
  type OwnerModelValue,
} from '@shared/constants/convention.js';
import {
  cancelPaymentIntent,
  createPaymentIntent,
  createRefund,
  getLatestChargeId,
  getRefundedTotal,
  retrievePaymentIntent,
} from '@shared/services/stripe.service.js';
import { paginate, getOffset, type PaginatedResult } from '@shared/utils/pagination.js';
import { logger } from '@shared/utils/logger.js';
import { badgeCost } from '@modules/attendees/attendees.utils.js';
import { updateAttendee } from '@modules/attendees/attendees.service.js';
import { powerCost, tableCost } from '@modules/groups/groups.utils.js';
import {
  chargeDescriptionList,
  currentAmountOwed,
  itemTotal,
  lastIncompleteTxn,
  pendingTxns,
  stripeId,
  summarizeReceipt,
  txnTotal,
  type ReceiptSummary,
  type ReceiptWithLines,
} from './receipts.utils.js';
import type {
  AddReceiptItemInput,
  ListReceiptsQuery,
  ManualTransactionInput,
} from './receipts.schema.js';

// ============================================================================
// Types
// ============================================================================

export type ReceiptDetail = ReceiptWithLines & { summary: ReceiptSummary };

export type ReceiptListRow = ModelReceipt & {
  itemTotal: number;
  paymentTotal: number;
  refundTotal: number;
};

export interface StartedPayment {
  receiptId: string;
  transactionId: string;
  intentId: string;
  clientSecret: string | null;
  amount: number;
  reused: boolean;
}

type ItemSeed = Pick<ReceiptItem, 'amount' | 'count' | 'desc'>;

// ============================================================================
// Helpers
// ============================================================================

function receiptNotFound(): AppError {
  return new AppError('Receipt not found', 404, true, ErrorCodes.RECEIPT_NOT_FOUND);
}

function badgeItemDesc(badgeType: BadgeTypeValue): string {
  const words = badgeType
    .toLowerCase()
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1));
  return `${words.join(' ')} Badge`;
}

async function loadReceipt(database: DbClient, id: string): Promise<ReceiptWithLines | null> {
  const receipt = await database.query.modelReceipts.findFirst({
    where: eq(modelReceipts.id, id),
    with: {
      items: { orderBy: [receiptItems.added] },
      transactions: { orderBy: [receiptTransactions.added] },
    },
  });
  return receipt ?? null;
}

async function loadOpenReceipt(
  database: DbClient,
  ownerModel: OwnerModelValue,
  ownerId: string
): Promise<ReceiptWithLines | null> {
  const [open] = await database
    .select({ id: modelReceipts.id })
    .from(modelReceipts)
    .where(
      and(
        eq(modelReceipts.ownerModel, ownerModel),
        eq(modelReceipts.ownerId, ownerId),
        isNull(modelReceipts.closed)
      )
    )
    .orderBy(desc(modelReceipts.createdAt))
    .limit(1);
  return open ? loadReceipt(database, open.id) : null;
}

async function getTransactionOrThrow(database: DbClient, id: string): Promise<ReceiptTransaction> {
  const [txn] = await database
    .select()
    .from(receiptTransactions)
    .where(eq(receiptTransactions.id, id))
    .limit(1);
  if (!txn) {
    throw new AppError('Transaction not found', 404, true, ErrorCodes.TRANSACTION_NOT_FOUND);
  }
  return txn;
}

function attendeeItems(attendee: Attendee): ItemSeed[] {
  const items: ItemSeed[] = [];
  if (attendee.paid !== PaidStatus.PAID_BY_GROUP) {
    const cost = badgeCost(attendee);
    if (cost > 0) items.push({ desc: badgeItemDesc(attendee.badgeType), amount: cost, count: 1 });
  }
  if (attendee.amountExtra > 0) {
    items.push({ desc: 'Pre-ordered Merch', amount: attendee.amountExtra, count: 1 });
  }
  if (attendee.extraDonation > 0) {
    items.push({ desc: 'Extra Donation', amount: attendee.extraDonation, count: 1 });
  }
  return items;
}

async function groupItems(database: DbClient, groupId: string): Promise<ItemSeed[]> {
  const group = await database.query.groups.findFirst({
    where: eq(groups.id, groupId),
    with: { members: true },
  });
  if (!group) {
    throw new AppError('Group not found', 404, true, ErrorCodes.GROUP_NOT_FOUND);
  }

  const items: ItemSeed[] = [];
  const tables = tableCost(group);
  if (tables > 0) items.push({ desc: `${group.tables} Tables`, amount: tables, count: 1 });
  const power = powerCost(group);
  if (power > 0) items.push({ desc: 'Power', amount: power, count: 1 });

  // One line per badge price, counted
  const badgeCounts = new Map<number, number>();
  for (const member of group.members) {
    if (member.paid !== PaidStatus.PAID_BY_GROUP) continue;
    const cost = badgeCost(member);
    if (cost > 0) badgeCounts.set(cost, (badgeCounts.get(cost) ?? 0) + 1);
  }
  for (const [amount, badges] of badgeCounts) {
    items.push({ desc: 'Group Badge', amount, count: badges });
  }
  return items;
}

async function ownerItems(
  database: DbClient,
  ownerModel: OwnerModelValue,
  ownerId: string
): Promise<ItemSeed[]> {
  if (ownerModel === OwnerModel.GROUP) {
    return groupItems(database, ownerId);
  }
  const [attendee] = await database.select().from(attendees).where(eq(attendees.id, ownerId)).limit(1);
  if (!attendee) {
    throw new AppError('Attendee not found', 404, true, ErrorCodes.ATTENDEE_NOT_FOUND);
  }
  return attendeeItems(attendee);
}

// ============================================================================
// Receipts
// ============================================================================

/**
 * The owner's open receipt. A new receipt starts with the owner's current
 * cost lines.
 */
export async function getOrCreateReceipt(
  ownerModel: OwnerModelValue,
  ownerId: string,
  who = ''
): Promise<ReceiptWithLines> {
  return db.transaction(async (tx) => {
    const existing = await loadOpenReceipt(tx, ownerModel, ownerId);
    if (existing) return existing;

    const seeds = await ownerItems(tx, ownerModel, ownerId);
    const [receipt] = await tx.insert(modelReceipts).values({ ownerModel, ownerId }).returning();
    if (seeds.length > 0) {
      await tx
        .insert(receiptItems)
        .values(seeds.map((seed) => ({ ...seed, receiptId: receipt.id, who })));
    }

    logger.info({ receiptId: receipt.id, ownerModel, ownerId, items: seeds.length }, 'Receipt opened');
    const created = await loadReceipt(tx, receipt.id);
    if (!created) throw receiptNotFound();
    return created;
  });
}

export async function getReceiptById(id: string): Promise<ReceiptDetail | null> {
  const receipt = await loadReceipt(db, id);
  if (!receipt) return null;
  return { ...receipt, summary: summarizeReceipt(receipt) };
}

async function getOpenReceiptOrThrow(database: DbClient, id: string): Promise<ReceiptWithLines> {
  const receipt = await loadReceipt(database, id);
  if (!receipt) throw receiptNotFound();
  if (receipt.closed) {
    throw new AppError('Receipt is closed', 409, true, ErrorCodes.RECEIPT_CLOSED);
  }
  return receipt;
}

export async function addReceiptItem(
  receiptId: string,
  input: AddReceiptItemInput,
  who = ''
): Promise<ReceiptItem> {
  await getOpenReceiptOrThrow(db, receiptId);

  const [item] = await db
    .insert(receiptItems)
    .values({
      receiptId,
      amount: input.amount,
      count: input.count,
      desc: input.desc,
      revertChange: input.revertChange,
      who,
    })
    .returning();
  return item;
}

/**
 * Close a receipt and every item still open on it.
 */
export async function closeReceipt(receiptId: string): Promise<ReceiptDetail> {
  await db.transaction(async (tx) => {
    await getOpenReceiptOrThrow(tx, receiptId);
    const now = new Date();

    await tx
      .update(receiptItems)
      .set({ closed: now })
      .where(and(eq(receiptItems.receiptId, receiptId), isNull(receiptItems.closed)));
    await tx.update(modelReceipts).set({ closed: now }).where(eq(modelReceipts.id, receiptId));
  });

  const closed = await getReceiptById(receiptId);
  if (!closed) throw receiptNotFound();
  return closed;
}

/**
 * Receipts with payment and refund totals computed in SQL.
 * The payment total sums raw amounts of counted transactions, not receipt shares.
 */
export async function listReceipts(query: ListReceiptsQuery): Promise<PaginatedResult<ReceiptListRow>> {
  const { page, limit, ownerModel, open } = query;

  const conditions: SQL[] = [];
  if (ownerModel) conditions.push(eq(modelReceipts.ownerModel, ownerModel));
  if (open === true) conditions.push(isNull(modelReceipts.closed));
  if (open === false) conditions.push(isNotNull(modelReceipts.closed));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const itemTotalSql = sql<number>`coalesce((
    select sum(${receiptItems.amount} * ${receiptItems.count}) from ${receiptItems}
    where ${receiptItems.receiptId} = ${modelReceipts.id}
  ), 0)`.mapWith(Number);

  const paymentTotalSql = sql<number>`coalesce((
    select sum(${receiptTransactions.amount}) from ${receiptTransactions}
    where ${receiptTransactions.receiptId} = ${modelReceipts.id}
      and ${receiptTransactions.cancelled} is null
      and (${receiptTransactions.chargeId} is not null
        or (${receiptTransactions.method} <> ${PaymentMethod.STRIPE} and ${receiptTransactions.amount} > 0))
  ), 0)`.mapWith(Number);

  const refundTotalSql = sql<number>`coalesce((
    select sum(${receiptTransactions.amount}) * -1 from ${receiptTransactions}
    where ${receiptTransactions.receiptId} = ${modelReceipts.id}
      and ${receiptTransactions.amount} < 0
  ), 0)`.mapWith(Number);

  const [data, [{ total }]] = await Promise.all([
    db
      .select({
        id: modelReceipts.id,
        invoiceNum: modelReceipts.invoiceNum,
        ownerId: modelReceipts.ownerId,
        ownerModel: modelReceipts.ownerModel,
        closed: modelReceipts.closed,
        createdAt: modelReceipts.createdAt,
        itemTotal: itemTotalSql,
        paymentTotal: paymentTotalSql,
        refundTotal: refundTotalSql,
      })
      .from(modelReceipts)
      .where(where)
      .orderBy(desc(modelReceipts.createdAt))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(modelReceipts).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

// ============================================================================
// Transactions
// ============================================================================

/**
 * Once an attendee's receipt is settled, their badge is paid for.
 */
async function settleAttendeeIfPaid(receipt: ReceiptWithLines, who: string): Promise<void> {
  if (receipt.ownerModel !== OwnerModel.ATTENDEE) return;
  if (itemTotal(receipt) <= 0 || currentAmountOwed(receipt) > 0) return;

  const [attendee] = await db.select().from(attendees).where(eq(attendees.id, receipt.ownerId)).limit(1);
  if (!attendee || attendee.paid === PaidStatus.HAS_PAID) return;

  const promote =
    attendee.badgeStatus === BadgeStatus.NEW || attendee.badgeStatus === BadgeStatus.PENDING;
  await updateAttendee(
    attendee.id,
    {
      paid: PaidStatus.HAS_PAID,
      ...(promote && { badgeStatus: BadgeStatus.COMPLETED }),
    },
    { performedBy: who || undefined }
  );
  logger.info({ attendeeId: attendee.id, receiptId: receipt.id }, 'Attendee marked as paid');
}

/**
 * Record a payment or refund taken outside Stripe (cash, card terminal, comps).
 */
export async function recordManualTransaction(
  receiptId: string,
  input: ManualTransactionInput,
  who = ''
): Promise<ReceiptTransaction> {
  const receipt = await getOpenReceiptOrThrow(db, receiptId);

  if (input.amount < 0 && -input.amount > txnTotal(receipt)) {
    throw new AppError(
      'Cannot refund more than has been paid',
      400,
      true,
      ErrorCodes.REFUND_EXCEEDS_PAYMENT
    );
  }

  const [txn] = await db
    .insert(receiptTransactions)
    .values({ receiptId, method: input.method, amount: input.amount, desc: input.desc, who })
    .returning();

  logger.info({ receiptId, txnId: txn.id, method: txn.method, amount: txn.amount }, 'Manual transaction recorded');

  if (input.amount > 0) {
    const updated = await loadReceipt(db, receiptId);
    if (updated) await settleAttendeeIfPaid(updated, who);
  }
  return txn;
}

// Intent states Stripe still lets us cancel
const CANCELLABLE_INTENT_STATUSES: ReadonlySet<Stripe.PaymentIntent.Status> = new Set<Stripe.PaymentIntent.Status>([
  'requires_payment_method',
  'requires_confirmation',
  'requires_action',
  'requires_capture',
]);

type ReleaseOutcome = 'paid' | 'cancelled';

/**
 * Settle a pending transaction against what Stripe reports for its intent.
 * A charge that already went through is recorded instead of cancelled, and
 * an intent still processing blocks the release.
 */
async function releasePendingTxn(
  txn: ReceiptTransaction,
  knownIntent?: Stripe.PaymentIntent | null
): Promise<ReleaseOutcome> {
  if (txn.intentId) {
    const intent = knownIntent ?? (await retrievePaymentIntent(txn.intentId));
    const chargeId = intent ? getLatestChargeId(intent) : null;

    if (chargeId) {
      await markPaidFromIntentId(txn.intentId, chargeId);
      return 'paid';
    }
    if (intent && (intent.status === 'processing' || intent.status === 'succeeded')) {
      throw new AppError(
        'A payment for this receipt is still being processed',
        409,
        true,
        ErrorCodes.PAYMENT_IN_PROGRESS,
        { transactionId: txn.id, intentId: txn.intentId }
      );
    }
    if (!intent || CANCELLABLE_INTENT_STATUSES.has(intent.status)) {
      await cancelPaymentIntent(txn.intentId);
    }
  }

  await db
    .update(receiptTransactions)
    .set({ cancelled: new Date() })
    .where(and(eq(receiptTransactions.id, txn.id), isNull(receiptTransactions.cancelled)));
  return 'cancelled';
}

export async function cancelTransaction(txnId: string, who = ''): Promise<ReceiptTransaction> {
  const txn = await getTransactionOrThrow(db, txnId);
  if (txn.cancelled) {
    throw new AppError(
      'Transaction is already cancelled',
      409,
      true,
      ErrorCodes.TRANSACTION_ALREADY_CANCELLED
    );
  }
  if (txn.chargeId) {
    throw new AppError(
      'Completed payments must be refunded, not cancelled',
      400,
      true,
      ErrorCodes.BAD_REQUEST
    );
  }

  const outcome = await releasePendingTxn(txn);
  if (outcome === 'paid') {
    throw new AppError(
      'Stripe has already charged this payment; refund it instead',
      409,
      true,
      ErrorCodes.PAYMENT_ALREADY_CHARGED,
      { transactionId: txnId }
    );
  }

  logger.info({ txnId, who, intentId: txn.intentId }, 'Transaction cancelled');
  return getTransactionOrThrow(db, txnId);
}

/**
 * Start (or resume) a Stripe payment for whatever the owner still owes.
 * A pending intent for the same amount is reused; other pending intents
 * are reconciled with Stripe first, so a charge that landed without its
 * webhook is recorded instead of paid twice.
 */
export async function startStripePayment(
  ownerModel: OwnerModelValue,
  ownerId: string,
  options: { receiptEmail?: string; who?: string } = {}
): Promise<StartedPayment> {
  const who = options.who ?? '';
  let receipt = await getOrCreateReceipt(ownerModel, ownerId, who);
  let amount = currentAmountOwed(receipt);

  if (amount <= 0) {
    throw new AppError('There is nothing left to pay on this receipt', 400, true, ErrorCodes.NOTHING_OWED);
  }

  const latest = lastIncompleteTxn(receipt);
  let latestIntent: Stripe.PaymentIntent | null = null;
  if (latest?.intentId && latest.amount === amount) {
    latestIntent = await retrievePaymentIntent(latest.intentId);
    if (
      latestIntent &&
      !getLatestChargeId(latestIntent) &&
      latestIntent.status !== 'canceled' &&
      latestIntent.status !== 'succeeded'
    ) {
      return {
        receiptId: receipt.id,
        transactionId: latest.id,
        intentId: latestIntent.id,
        clientSecret: latestIntent.client_secret,
        amount,
        reused: true,
      };
    }
  }

  let charged = false;
  for (const stale of pendingTxns(receipt)) {
    const outcome = await releasePendingTxn(stale, stale.id === latest?.id ? latestIntent : null);
    if (outcome === 'paid') {
      charged = true;
      logger.info({ txnId: stale.id, intentId: stale.intentId }, 'Recorded charge on pending payment');
    } else {
      logger.info({ txnId: stale.id, intentId: stale.intentId }, 'Cancelled stale pending payment');
    }
  }

  if (charged) {
    const refreshed = await loadReceipt(db, receipt.id);
    if (!refreshed) throw receiptNotFound();
    receipt = refreshed;
    amount = currentAmountOwed(receipt);
    if (amount <= 0) {
      throw new AppError('There is nothing left to pay on this receipt', 400, true, ErrorCodes.NOTHING_OWED);
    }
  }

  const description = chargeDescriptionList(receipt) || convention.eventName;
  const intent = await createPaymentIntent({
    amount,
    currency: convention.currency,
    description,
    receiptEmail: options.receiptEmail,
    metadata: { receiptId: receipt.id, ownerModel, ownerId },
  });

  const [txn] = await db
    .insert(receiptTransactions)
    .values({
      receiptId: receipt.id,
      intentId: intent.id,
      method: PaymentMethod.STRIPE,
      amount,
      who,
      desc: description,
    })
    .returning();

  logger.info({ receiptId: receipt.id, intentId: intent.id, amount }, 'Stripe payment started');
  return {
    receiptId: receipt.id,
    transactionId: txn.id,
    intentId: intent.id,
    clientSecret: intent.clientSecret,
    amount,
    reused: false,
  };
}

/**
 * Record the charge on every uncharged transaction for an intent, then
 * settle any attendee whose receipt is now fully paid.
 */
export async function markPaidFromIntentId(
  intentId: string,
  chargeId: string
): Promise<ReceiptTransaction[]> {
  const updated = await db
    .update(receiptTransactions)
    .set({ chargeId })
    .where(and(eq(receiptTransactions.intentId, intentId), isNull(receiptTransactions.chargeId)))
    .returning();

  if (updated.length === 0) {
    logger.warn({ intentId }, 'No pending transactions found for payment intent');
    return updated;
  }

  const receiptIds = [...new Set(updated.flatMap((txn) => (txn.receiptId ? [txn.receiptId] : [])))];
  for (const receiptId of receiptIds) {
    const receipt = await loadReceipt(db, receiptId);
    if (receipt) await settleAttendeeIfPaid(receipt, updated[0].who);
  }

  logger.info({ intentId, chargeId, transactions: updated.length }, 'Payment intent marked as paid');
  return updated;
}

/**
 * Ask Stripe whether a pending transaction has been charged.
 */
export async function checkPaidFromStripe(txnId: string): Promise<ReceiptTransaction> {
  const txn = await getTransactionOrThrow(db, txnId);
  if (txn.chargeId || !txn.intentId) return txn;

  const intent = await retrievePaymentIntent(txn.intentId);
  const chargeId = intent ? getLatestChargeId(intent) : null;
  if (!chargeId) return txn;

  await markPaidFromIntentId(txn.intentId, chargeId);
  return getTransactionOrThrow(db, txnId);
}

/**
 * Sync `refunded` with the refunds Stripe holds for the transaction's intent.
 */
export async function updateAmountRefunded(txnId: string): Promise<ReceiptTransaction> {
  const txn = await getTransactionOrThrow(db, txnId);
  if (!txn.intentId) return txn;

  const refunded = await getRefundedTotal(txn.intentId);
  const [updated] = await db
    .update(receiptTransactions)
    .set({ refunded })
    .where(eq(receiptTransactions.id, txnId))
    .returning();
  return updated;
}

/**
 * Refund all or part of a charged Stripe transaction.
 */
export async function refundTransaction(
  txnId: string,
  amount: number | undefined,
  who = ''
): Promise<ReceiptTransaction> {
  const txn = await getTransactionOrThrow(db, txnId);
  if (txn.method !== PaymentMethod.STRIPE || !txn.intentId || !txn.chargeId || txn.cancelled) {
    throw new AppError(
      'Only completed Stripe payments can be refunded',
      400,
      true,
      ErrorCodes.NOT_REFUNDABLE
    );
  }

  const refundable = txn.amount - (txn.refunded ?? 0);
  const refundAmount = amount ?? refundable;
  if (refundAmount <= 0 || refundAmount > refundable) {
    throw new AppError(
      `Cannot refund more than the ${refundable} cents left on this payment`,
      400,
      true,
      ErrorCodes.REFUND_EXCEEDS_PAYMENT,
      { refundable }
    );
  }

  const refund: Stripe.Refund = await createRefund(txn.intentId, refundAmount);

  const refundTxn = await db.transaction(async (tx) => {
    const [created] = await tx
      .insert(receiptTransactions)
      .values({
        receiptId: txn.receiptId,
        refundId: refund.id,
        method: PaymentMethod.STRIPE,
        amount: -refundAmount,
        who,
        desc: `Refund of ${stripeId(txn) ?? txn.id}`,
      })
      .returning();
    await tx
      .update(receiptTransactions)
      .set({ refunded: (txn.refunded ?? 0) + refundAmount })
      .where(eq(receiptTransactions.id, txn.id));
    return created;
  });

  logger.info({ txnId, refundId: refund.id, amount: refundAmount }, 'Stripe refund issued');
  return refundTxn;
}

// ============================================================================
// Webhooks
// ============================================================================

async function cancelPendingForIntent(intentId: string): Promise<number> {
  const cancelled = await db
    .update(receiptTransactions)
    .set({ cancelled: new Date() })
    .where(
      and(
        eq(receiptTransactions.intentId, intentId),
        isNull(receiptTransactions.chargeId),
        isNull(receiptTransactions.cancelled)
      )
    )
    .returning({ id: receiptTransactions.id });
  return cancelled.length;
}

async function refreshRefundsForIntent(intentId: string): Promise<number> {
  const charged = await db
    .select({ id: receiptTransactions.id })
    .from(receiptTransactions)
    .where(and(eq(receiptTransactions.intentId, intentId), isNotNull(receiptTransactions.chargeId)));
  for (const txn of charged) {
    await updateAmountRefunded(txn.id);
  }
  return charged.length;
}

/**
 * Apply a verified Stripe event to the ledger.
 */
export async function handleStripeEvent(event: Stripe.Event): Promise<void> {
  logger.info({ eventId: event.id, type: event.type }, 'Stripe webhook received');

  switch (event.type) {
    case 'payment_intent.succeeded': {
      const intent = event.data.object;
      const chargeId = getLatestChargeId(intent);
      if (chargeId) {
        await markPaidFromIntentId(intent.id, chargeId);
      } else {
        logger.warn({ intentId: intent.id }, 'Succeeded payment intent has no charge');
      }
      return;
    }

    case 'charge.refunded': {
      const charge = event.data.object;
      const intentId =
        typeof charge.payment_intent === 'string' ? charge.payment_intent : charge.payment_intent?.id;
      if (intentId) await refreshRefundsForIntent(intentId);
      return;
    }

    case 'payment_intent.canceled': {
      const intent = event.data.object;
      const cancelled = await cancelPendingForIntent(intent.id);
      logger.info({ intentId: intent.id, cancelled }, 'Pending transactions cancelled by Stripe');
      return;
    }

    default:
      logger.debug({ type: event.type }, 'Ignoring unhandled Stripe event');
  }
}

