import { describe, it, expect } from 'vitest';
import '../../../tests/mocks/database.js';
import { seedAttendee } from '../../../tests/helpers/seed.js';
import {
  getMerchDiscount,
  getSalesSummary,
  listArbitraryCharges,
  listMPointsForCash,
  listNoShirts,
  listSales,
  recordArbitraryCharge,
  recordMerchPickup,
  recordMPointsForCash,
  recordNoShirt,
  recordOldMPointExchange,
  recordSale,
  useMerchDiscount,
} from './merch.service.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('Merch Service', () => {
  describe('arbitrary charges', () => {
    it('should record and list charges', async () => {
      await recordArbitraryCharge({ amount: 500, what: 'Lanyard', regStation: 3 });

      const result = await listArbitraryCharges({ page: 1, limit: 20 });

      expect(result.meta.total).toBe(1);
      expect(result.data[0]).toMatchObject({ amount: 500, what: 'Lanyard', regStation: 3 });
    });
  });

  describe('useMerchDiscount', () => {
    it('should allow the discount once', async () => {
      const staffer = await seedAttendee({ badgeType: 'STAFF' });

      const discount = await useMerchDiscount(staffer.id);

      expect(discount).toMatchObject({ attendeeId: staffer.id, uses: 1 });
      expect((await getMerchDiscount(staffer.id))?.uses).toBe(1);
    });

    it('should reject a second use', async () => {
      const staffer = await seedAttendee({ badgeType: 'STAFF' });
      await useMerchDiscount(staffer.id);

      await expect(useMerchDiscount(staffer.id)).rejects.toMatchObject({
        statusCode: 409,
        code: ErrorCodes.MERCH_DISCOUNT_USED,
      });
    });

    it('should reject an unknown attendee', async () => {
      await expect(useMerchDiscount(MISSING_ID)).rejects.toMatchObject({
        statusCode: 404,
        code: ErrorCodes.ATTENDEE_NOT_FOUND,
      });
    });
  });

  describe('recordMerchPickup', () => {
    it('should let one attendee pick up for another', async () => {
      const parent = await seedAttendee();
      const child = await seedAttendee();

      const pickup = await recordMerchPickup({ pickedUpById: parent.id, pickedUpForId: child.id });

      expect(pickup).toMatchObject({ pickedUpById: parent.id, pickedUpForId: child.id });
    });

    it('should reject a second pickup for the same attendee', async () => {
      const first = await seedAttendee();
      const second = await seedAttendee();
      await recordMerchPickup({ pickedUpById: first.id, pickedUpForId: first.id });

      await expect(
        recordMerchPickup({ pickedUpById: second.id, pickedUpForId: first.id })
      ).rejects.toMatchObject({ statusCode: 409, code: ErrorCodes.MERCH_ALREADY_PICKED_UP });
    });
  });

  describe('MPoints', () => {
    it('should record exchanges per attendee', async () => {
      const attendee = await seedAttendee();
      const other = await seedAttendee();
      await recordMPointsForCash({ attendeeId: attendee.id, amount: 1000 });
      await recordMPointsForCash({ attendeeId: other.id, amount: 2000 });
      const old = await recordOldMPointExchange({ attendeeId: attendee.id, amount: 300 });

      const rows = await listMPointsForCash(attendee.id);

      expect(rows.map((row) => row.amount)).toEqual([1000]);
      expect(old).toMatchObject({ attendeeId: attendee.id, amount: 300 });
    });
  });

  describe('recordNoShirt', () => {
    it('should record an out-of-stock shirt once', async () => {
      const attendee = await seedAttendee({ shirt: 3 });
      await recordNoShirt(attendee.id);

      await expect(recordNoShirt(attendee.id)).rejects.toMatchObject({
        statusCode: 409,
        code: ErrorCodes.NO_SHIRT_ALREADY_RECORDED,
      });
      expect((await listNoShirts()).map((row) => row.attendeeId)).toEqual([attendee.id]);
    });
  });

  describe('sales', () => {
    it('should record anonymous sales', async () => {
      const sale = await recordSale({
        attendeeId: null,
        what: 'Sticker',
        cash: 200,
        mpoints: 0,
        paymentMethod: 'CASH',
      });

      expect(sale).toMatchObject({ attendeeId: null, what: 'Sticker', cash: 200, regStation: null });
    });

    it('should filter sales by attendee', async () => {
      const attendee = await seedAttendee();
      await recordSale({ attendeeId: attendee.id, what: 'Hoodie', cash: 4000, mpoints: 0, paymentMethod: 'CREDIT' });
      await recordSale({ attendeeId: null, what: 'Pin', cash: 300, mpoints: 0, paymentMethod: 'CASH' });

      const result = await listSales({ page: 1, limit: 20, attendeeId: attendee.id });

      expect(result.data.map((sale) => sale.what)).toEqual(['Hoodie']);
    });

    it('should summarize sales by payment method', async () => {
      await recordSale({ attendeeId: null, what: 'Pin', cash: 300, mpoints: 0, paymentMethod: 'CASH' });
      await recordSale({ attendeeId: null, what: 'Poster', cash: 1200, mpoints: 0, paymentMethod: 'CASH' });
      await recordSale({ attendeeId: null, what: 'Mug', cash: 0, mpoints: 500, paymentMethod: 'MERCH' });

      const summary = await getSalesSummary();

      expect(summary).toEqual([
        { paymentMethod: 'CASH', sales: 2, cash: 1500, mpoints: 0 },
        { paymentMethod: 'MERCH', sales: 1, cash: 0, mpoints: 500 },
      ]);
    });
  });
});
