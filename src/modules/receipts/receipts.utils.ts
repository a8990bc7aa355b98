import { convention } from '@config/convention.config.js';
import { PaymentMethod } from '@shared/constants/convention.js';
import type { ModelReceipt, ReceiptItem, ReceiptTransaction } from '@/database/schema.js';

/**
 * A receipt with its line items and transactions loaded.
 */
export type ReceiptWithLines = ModelReceipt & {
  items: ReceiptItem[];
  transactions: ReceiptTransaction[];
};

export type LedgerEntry =
  | ({ kind: 'item' } & ReceiptItem)
  | ({ kind: 'transaction' } & ReceiptTransaction);

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: convention.currency,
});

export function formatCurrency(cents: number): string {
  return currencyFormatter.format(cents / 100);
}

// ============================================================================
// Items
// ============================================================================

export function itemTotalAmount(item: Pick<ReceiptItem, 'amount' | 'count'>): number {
  return item.amount * item.count;
}

export function itemTotal(receipt: Pick<ReceiptWithLines, 'items'>): number {
  return receipt.items.reduce((sum, item) => sum + itemTotalAmount(item), 0);
}

export function openReceiptItems(receipt: Pick<ReceiptWithLines, 'items'>): ReceiptItem[] {
  return receipt.items.filter((item) => !item.closed);
}

export function closedReceiptItems(receipt: Pick<ReceiptWithLines, 'items'>): ReceiptItem[] {
  return receipt.items.filter((item) => item.closed);
}

/**
 * "Badge x1, Donation x1": the open purchases, for payment descriptions.
 */
export function chargeDescriptionList(receipt: Pick<ReceiptWithLines, 'items'>): string {
  return openReceiptItems(receipt)
    .filter((item) => item.amount > 0)
    .map((item) => `${item.desc} x${item.count}`)
    .join(', ');
}

// ============================================================================
// Transactions
// ============================================================================

export function isPendingCharge(txn: ReceiptTransaction): boolean {
  return !!txn.intentId && !txn.chargeId && !txn.cancelled;
}

/**
 * Whether a transaction counts as money received.
 */
export function isCountedPayment(txn: ReceiptTransaction): boolean {
  if (txn.cancelled) return false;
  return !!txn.chargeId || (txn.method !== PaymentMethod.STRIPE && txn.amount > 0);
}

/**
 * The part of a payment that covers items already on the receipt when it was made.
 */
export function receiptShare(txn: ReceiptTransaction, items: ReceiptItem[]): number {
  const covered = items
    .filter((item) => item.added <= txn.added)
    .reduce((sum, item) => sum + itemTotalAmount(item), 0);
  return Math.min(txn.amount, covered);
}

export function stripeId(txn: Pick<ReceiptTransaction, 'chargeId' | 'intentId'>): string | null {
  return txn.chargeId || txn.intentId || null;
}

export function cancelledTxns(receipt: Pick<ReceiptWithLines, 'transactions'>): ReceiptTransaction[] {
  return receipt.transactions.filter((txn) => txn.cancelled);
}

export function pendingTxns(receipt: Pick<ReceiptWithLines, 'transactions'>): ReceiptTransaction[] {
  return receipt.transactions.filter(isPendingCharge);
}

export function pendingTotal(receipt: Pick<ReceiptWithLines, 'transactions'>): number {
  return pendingTxns(receipt).reduce((sum, txn) => sum + txn.amount, 0);
}

export function lastIncompleteTxn(
  receipt: Pick<ReceiptWithLines, 'transactions'>
): ReceiptTransaction | null {
  const pending = pendingTxns(receipt);
  if (pending.length === 0) return null;
  return pending.reduce((latest, txn) => (txn.added > latest.added ? txn : latest));
}

// ============================================================================
// Totals
// ============================================================================

export function paymentTotal(receipt: Pick<ReceiptWithLines, 'items' | 'transactions'>): number {
  return receipt.transactions
    .filter(isCountedPayment)
    .reduce((sum, txn) => sum + receiptShare(txn, receipt.items), 0);
}

/**
 * Every refund recorded against the receipt, as a positive number.
 */
export function refundTotal(receipt: Pick<ReceiptWithLines, 'transactions'>): number {
  const refunds = receipt.transactions
    .filter((txn) => txn.amount < 0)
    .reduce((sum, txn) => sum + txn.amount, 0);
  return refunds === 0 ? 0 : -refunds;
}

export function txnTotal(receipt: Pick<ReceiptWithLines, 'items' | 'transactions'>): number {
  return paymentTotal(receipt) - refundTotal(receipt);
}

export function currentReceiptAmount(
  receipt: Pick<ReceiptWithLines, 'items' | 'transactions'>
): number {
  return itemTotal(receipt) - txnTotal(receipt);
}

export function currentAmountOwed(
  receipt: Pick<ReceiptWithLines, 'items' | 'transactions'>
): number {
  return Math.max(0, currentReceiptAmount(receipt));
}

/**
 * "$65.00 in Purchases - $40.00 in Payments = They owe $25.00"
 */
export function totalStr(receipt: Pick<ReceiptWithLines, 'items' | 'transactions'>): string {
  const items = itemTotal(receipt);
  const txns = txnTotal(receipt);
  const balance = currentReceiptAmount(receipt);
  return (
    `${formatCurrency(items)} in ${items >= 0 ? 'Purchases' : 'Credit'} - ` +
    `${formatCurrency(txns)} in ${txns >= 0 ? 'Payments' : 'Refunds'} = ` +
    `${balance >= 0 ? 'They' : 'We'} owe ${formatCurrency(balance)}`
  );
}

/**
 * Items and transactions in the order they happened.
 */
export function allSortedItemsAndTxns(receipt: ReceiptWithLines): LedgerEntry[] {
  const entries: LedgerEntry[] = [
    ...receipt.items.map((item) => ({ kind: 'item' as const, ...item })),
    ...receipt.transactions.map((txn) => ({ kind: 'transaction' as const, ...txn })),
  ];
  return entries.sort((a, b) => a.added.getTime() - b.added.getTime());
}

export interface ReceiptSummary {
  itemTotal: number;
  paymentTotal: number;
  refundTotal: number;
  txnTotal: number;
  pendingTotal: number;
  currentReceiptAmount: number;
  currentAmountOwed: number;
  chargeDescription: string;
  totalStr: string;
}

export function summarizeReceipt(receipt: ReceiptWithLines): ReceiptSummary {
  return {
    itemTotal: itemTotal(receipt),
    paymentTotal: paymentTotal(receipt),
    refundTotal: refundTotal(receipt),
    txnTotal: txnTotal(receipt),
    pendingTotal: pendingTotal(receipt),
    currentReceiptAmount: currentReceiptAmount(receipt),
    currentAmountOwed: currentAmountOwed(receipt),
    chargeDescription: chargeDescriptionList(receipt),
    totalStr: totalStr(receipt),
  };
}
