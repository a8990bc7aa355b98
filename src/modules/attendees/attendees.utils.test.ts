import { describe, it, expect } from 'vitest';
import {
  NOT_ATTENDING_COMPED_REASON,
  REPRINT_REVIEW_NOTE,
  ageDiscount,
  applyPresaveAdjustments,
  badgeCost,
  costBreakdown,
  isNotReadyToCheckin,
  needsPiiConsent,
  staffingOrWillBe,
} from './attendees.utils.js';
import { createMockAttendee } from '../../../tests/helpers/factories.js';

const PRE_CON = new Date('2025-06-01T12:00:00.000Z');
const AT_CON = new Date('2026-01-09T18:00:00.000Z');

describe('Attendee Utils', () => {
  describe('badgeCost', () => {
    it('should charge the attendee price in effect at registration', () => {
      expect(badgeCost(createMockAttendee(), PRE_CON)).toBe(6500);
      expect(
        badgeCost(createMockAttendee({ registered: new Date('2025-10-01T00:00:00.000Z') }), PRE_CON)
      ).toBe(7500);
    });

    it('should price one-day and presold day badges', () => {
      const oneDay = createMockAttendee({
        badgeType: 'ONE_DAY',
        registered: new Date('2025-12-02T00:00:00.000Z'),
      });
      expect(badgeCost(oneDay, PRE_CON)).toBe(5000);
      expect(badgeCost(createMockAttendee({ badgeType: 'FRIDAY' }), PRE_CON)).toBe(3500);
    });

    it('should use fixed badge type prices', () => {
      expect(badgeCost(createMockAttendee({ badgeType: 'SPONSOR' }), PRE_CON)).toBe(15000);
    });

    it('should honor an overridden price', () => {
      expect(badgeCost(createMockAttendee({ overriddenPrice: 1000 }), PRE_CON)).toBe(1000);
    });

    it('should charge comped attendees nothing but a sponsor upgrade', () => {
      expect(badgeCost(createMockAttendee({ paid: 'NEED_NOT_PAY' }), PRE_CON)).toBe(0);
      expect(
        badgeCost(createMockAttendee({ paid: 'NEED_NOT_PAY', badgeType: 'SPONSOR' }), PRE_CON)
      ).toBe(8500);
    });

    it('should apply age group discounts', () => {
      expect(badgeCost(createMockAttendee({ ageGroup: 'under_6' }), PRE_CON)).toBe(0);
      expect(badgeCost(createMockAttendee({ ageGroup: 'under_13' }), PRE_CON)).toBe(6500);
    });

    it('should give kids a door discount at the event', () => {
      const kid = createMockAttendee({ ageGroup: 'under_13' });

      expect(ageDiscount(kid, AT_CON)).toBe(-3300);
      expect(badgeCost(kid, AT_CON)).toBe(3200);
    });
  });

  describe('costBreakdown', () => {
    it('should add merch and donations to the badge', () => {
      const attendee = createMockAttendee({ amountExtra: 2000, extraDonation: 1000 });

      expect(costBreakdown(attendee, PRE_CON)).toEqual({
        badgeCost: 6500,
        ageDiscount: 0,
        amountExtra: 2000,
        extraDonation: 1000,
        totalCost: 9500,
      });
    });
  });

  describe('derived flags', () => {
    it('should treat volunteers and staff as staffing', () => {
      expect(staffingOrWillBe(createMockAttendee({ ribbons: ['VOLUNTEER'] }))).toBe(true);
      expect(staffingOrWillBe(createMockAttendee({ badgeType: 'STAFF' }))).toBe(true);
      expect(staffingOrWillBe(createMockAttendee())).toBe(false);
    });

    it('should need consent from placeholders and new registrations', () => {
      expect(needsPiiConsent(null)).toBe(true);
      expect(needsPiiConsent(createMockAttendee({ placeholder: true }))).toBe(true);
      expect(needsPiiConsent(createMockAttendee())).toBe(false);
    });

    it('should only check in paid, completed badges', () => {
      expect(isNotReadyToCheckin(createMockAttendee({ paid: 'HAS_PAID', badgeStatus: 'COMPLETED' }))).toBe(
        false
      );
      expect(isNotReadyToCheckin(createMockAttendee({ paid: 'NOT_PAID', badgeStatus: 'COMPLETED' }))).toBe(
        true
      );
    });
  });

  describe('applyPresaveAdjustments', () => {
    it('should comp badges marked not attending', () => {
      const result = applyPresaveAdjustments(
        createMockAttendee({ badgeStatus: 'NOT_ATTENDING' }),
        null,
        PRE_CON
      );

      expect(result.paid).toBe('NEED_NOT_PAY');
      expect(result.compedReason).toBe(NOT_ATTENDING_COMPED_REASON);
    });

    it('should mark paid, completed badges for printing before the event', () => {
      const result = applyPresaveAdjustments(
        createMockAttendee({ paid: 'HAS_PAID', badgeStatus: 'COMPLETED' }),
        null,
        PRE_CON
      );

      expect(result.printPending).toBe(true);
    });

    it('should queue a reprint when a printed badge name changes', () => {
      const original = createMockAttendee({ timesPrinted: 1, badgePrintedName: 'Old Name' });

      const result = applyPresaveAdjustments(
        { ...original, badgePrintedName: 'New Name' },
        original,
        PRE_CON
      );

      expect(result.printPending).toBe(true);
      expect(result.forReview).toBe(REPRINT_REVIEW_NOTE);
    });

    it('should comp staff and drop their volunteer ribbon', () => {
      const result = applyPresaveAdjustments(
        createMockAttendee({ badgeType: 'STAFF', ribbons: ['VOLUNTEER', 'PANELIST'] }),
        null,
        PRE_CON
      );

      expect(result).toMatchObject({ paid: 'NEED_NOT_PAY', staffing: true, ribbons: ['PANELIST'] });
    });

    it('should give volunteers a ribbon', () => {
      const result = applyPresaveAdjustments(createMockAttendee({ staffing: true }), null, PRE_CON);

      expect(result.ribbons).toEqual(['VOLUNTEER']);
    });

    it('should clear marketing consent while opt-in is disabled', () => {
      const result = applyPresaveAdjustments(createMockAttendee({ canSpam: true }), null, PRE_CON);

      expect(result.canSpam).toBe(false);
    });
  });
});
