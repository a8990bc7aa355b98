import { describe, it, expect } from 'vitest';
import {
  allSortedItemsAndTxns,
  chargeDescriptionList,
  currentAmountOwed,
  currentReceiptAmount,
  formatCurrency,
  isCountedPayment,
  itemTotal,
  lastIncompleteTxn,
  paymentTotal,
  pendingTotal,
  receiptShare,
  refundTotal,
  totalStr,
  txnTotal,
  type ReceiptWithLines,
} from './receipts.utils.js';
import {
  createMockReceipt,
  createMockReceiptItem,
  createMockReceiptTransaction,
} from '../../../tests/helpers/factories.js';
import type { ReceiptItem, ReceiptTransaction } from '@/database/schema.js';

function receiptWith(items: ReceiptItem[], transactions: ReceiptTransaction[]): ReceiptWithLines {
  return { ...createMockReceipt(), items, transactions };
}

const at = (time: string) => new Date(`2025-06-01T${time}:00.000Z`);

describe('Receipt Utils', () => {
  describe('formatCurrency', () => {
    it('should format cents in the configured currency', () => {
      expect(formatCurrency(6500)).toBe('$65.00');
      expect(formatCurrency(-1000)).toBe('-$10.00');
    });
  });

  describe('items', () => {
    it('should total amount times count', () => {
      const receipt = receiptWith(
        [createMockReceiptItem({ amount: 6500 }), createMockReceiptItem({ amount: 1000, count: 2 })],
        []
      );
      expect(itemTotal(receipt)).toBe(8500);
    });

    it('should describe only open purchases', () => {
      const receipt = receiptWith(
        [
          createMockReceiptItem({ desc: 'Attendee Badge', amount: 6500 }),
          createMockReceiptItem({ desc: 'Discount', amount: -500 }),
          createMockReceiptItem({ desc: 'Old Merch', amount: 100, closed: at('13:00') }),
          createMockReceiptItem({ desc: 'Group Badge', amount: 5000, count: 3 }),
        ],
        []
      );
      expect(chargeDescriptionList(receipt)).toBe('Attendee Badge x1, Group Badge x3');
    });
  });

  describe('isCountedPayment', () => {
    it('should count charged Stripe payments', () => {
      expect(isCountedPayment(createMockReceiptTransaction({ intentId: 'pi_1', chargeId: 'ch_1' }))).toBe(
        true
      );
    });

    it('should not count pending Stripe payments', () => {
      expect(isCountedPayment(createMockReceiptTransaction({ intentId: 'pi_1' }))).toBe(false);
    });

    it('should count positive manual payments', () => {
      expect(isCountedPayment(createMockReceiptTransaction({ method: 'CASH', amount: 2000 }))).toBe(true);
    });

    it('should not count manual refunds or cancelled payments', () => {
      expect(isCountedPayment(createMockReceiptTransaction({ method: 'CASH', amount: -2000 }))).toBe(
        false
      );
      expect(
        isCountedPayment(createMockReceiptTransaction({ method: 'CASH', cancelled: at('13:00') }))
      ).toBe(false);
    });
  });

  describe('receiptShare', () => {
    it('should cap a payment at the items added before it', () => {
      const txn = createMockReceiptTransaction({ amount: 10000, added: at('12:05') });
      const items = [
        createMockReceiptItem({ amount: 6500, added: at('12:00') }),
        createMockReceiptItem({ amount: 2000, added: at('13:00') }),
      ];
      expect(receiptShare(txn, items)).toBe(6500);
    });
  });

  describe('totals', () => {
    it('should net refunds against payments', () => {
      const receipt = receiptWith(
        [createMockReceiptItem({ amount: 6500, added: at('12:00') })],
        [
          createMockReceiptTransaction({
            intentId: 'pi_1',
            chargeId: 'ch_1',
            amount: 6500,
            added: at('12:05'),
          }),
          createMockReceiptTransaction({ refundId: 're_1', amount: -1000, added: at('13:00') }),
        ]
      );

      expect(paymentTotal(receipt)).toBe(6500);
      expect(refundTotal(receipt)).toBe(1000);
      expect(txnTotal(receipt)).toBe(5500);
      expect(currentReceiptAmount(receipt)).toBe(1000);
      expect(currentAmountOwed(receipt)).toBe(1000);
      expect(totalStr(receipt)).toBe('$65.00 in Purchases - $55.00 in Payments = They owe $10.00');
    });

    it('should report zero refunds as positive zero', () => {
      expect(Object.is(refundTotal(receiptWith([], [])), 0)).toBe(true);
    });

    it('should never owe a negative amount', () => {
      const receipt = receiptWith(
        [
          createMockReceiptItem({ amount: 6500, added: at('12:00') }),
          createMockReceiptItem({ amount: -500, added: at('12:10') }),
        ],
        [createMockReceiptTransaction({ method: 'CASH', amount: 6500, added: at('12:05') })]
      );

      expect(currentReceiptAmount(receipt)).toBe(-500);
      expect(currentAmountOwed(receipt)).toBe(0);
      expect(totalStr(receipt)).toBe('$60.00 in Purchases - $65.00 in Payments = We owe -$5.00');
    });
  });

  describe('pending transactions', () => {
    it('should pick the latest pending intent', () => {
      const older = createMockReceiptTransaction({ intentId: 'pi_old', amount: 4000, added: at('12:05') });
      const newer = createMockReceiptTransaction({ intentId: 'pi_new', amount: 6500, added: at('12:30') });
      const charged = createMockReceiptTransaction({
        intentId: 'pi_done',
        chargeId: 'ch_1',
        added: at('13:00'),
      });
      const receipt = receiptWith([], [older, newer, charged]);

      expect(lastIncompleteTxn(receipt)?.intentId).toBe('pi_new');
      expect(pendingTotal(receipt)).toBe(10500);
    });

    it('should return null without pending intents', () => {
      expect(lastIncompleteTxn(receiptWith([], []))).toBeNull();
    });
  });

  describe('allSortedItemsAndTxns', () => {
    it('should interleave lines by time', () => {
      const receipt = receiptWith(
        [
          createMockReceiptItem({ added: at('12:00') }),
          createMockReceiptItem({ added: at('12:10') }),
        ],
        [createMockReceiptTransaction({ added: at('12:05') })]
      );
      expect(allSortedItemsAndTxns(receipt).map((entry) => entry.kind)).toEqual([
        'item',
        'transaction',
        'item',
      ]);
    });
  });
});
