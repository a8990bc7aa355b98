import { describe, it, expect } from 'vitest';
import {
  getAttendeePrice,
  getOnedayPrice,
  getPresoldOnedayPrice,
  getBadgeTypePrice,
  getTablePrice,
  getPowerPrice,
  getConventionPhase,
  getPricingOverview,
} from './pricing.service.js';

// Prices come from config/convention.json

describe('Pricing Service', () => {
  describe('getAttendeePrice', () => {
    it('should return the initial price before any bump', () => {
      expect(getAttendeePrice(new Date('2025-06-01T12:00:00.000Z'))).toBe(6500);
    });

    it('should apply a bump on its exact date', () => {
      expect(getAttendeePrice(new Date('2025-09-01T04:00:00.000Z'))).toBe(7500);
    });

    it('should use the latest bump that has passed', () => {
      expect(getAttendeePrice(new Date('2025-12-15T00:00:00.000Z'))).toBe(8500);
    });
  });

  describe('getOnedayPrice', () => {
    it('should follow the one-day bump schedule', () => {
      expect(getOnedayPrice(new Date('2025-11-30T00:00:00.000Z'))).toBe(4000);
      expect(getOnedayPrice(new Date('2025-12-02T00:00:00.000Z'))).toBe(5000);
    });
  });

  describe('getPresoldOnedayPrice', () => {
    it('should return the per-day price', () => {
      expect(getPresoldOnedayPrice('FRIDAY')).toBe(3500);
      expect(getPresoldOnedayPrice('SATURDAY')).toBe(4500);
      expect(getPresoldOnedayPrice('SUNDAY')).toBe(3000);
    });

    it('should fall back to the initial one-day price', () => {
      expect(getPresoldOnedayPrice('ONE_DAY')).toBe(4000);
    });
  });

  describe('getBadgeTypePrice', () => {
    it('should return fixed prices for sponsor-style badges', () => {
      expect(getBadgeTypePrice('SPONSOR')).toBe(15000);
      expect(getBadgeTypePrice('SHINY')).toBe(30000);
    });

    it('should return undefined for other badges', () => {
      expect(getBadgeTypePrice('ATTENDEE')).toBeUndefined();
    });
  });

  describe('getTablePrice / getPowerPrice', () => {
    it('should index the price list by the truncated count', () => {
      expect(getTablePrice(0)).toBe(0);
      expect(getTablePrice(1)).toBe(12500);
      expect(getTablePrice(2.5)).toBe(30000);
    });

    it('should use the last entry past the end of the list', () => {
      expect(getTablePrice(9)).toBe(75000);
      expect(getPowerPrice(5)).toBe(10000);
    });

    it('should price power levels', () => {
      expect(getPowerPrice(1)).toBe(5000);
    });
  });

  describe('getConventionPhase', () => {
    it('should report the phase around the event dates', () => {
      expect(getConventionPhase(new Date('2026-01-08T16:59:59.000Z'))).toBe('PRE_CON');
      expect(getConventionPhase(new Date('2026-01-08T17:00:00.000Z'))).toBe('AT_THE_CON');
      expect(getConventionPhase(new Date('2026-01-11T23:00:00.000Z'))).toBe('AT_THE_CON');
      expect(getConventionPhase(new Date('2026-01-11T23:00:01.000Z'))).toBe('POST_CON');
    });
  });

  describe('getPricingOverview', () => {
    it('should list current prices and the bumps still to come', () => {
      const overview = getPricingOverview(new Date('2025-10-01T00:00:00.000Z'));

      expect(overview.currency).toBe('USD');
      expect(overview.phase).toBe('PRE_CON');
      expect(overview.attendeePrice).toBe(7500);
      expect(overview.onedayPrice).toBe(4000);
      expect(overview.upcomingAttendeeBumps.map((bump) => bump.price)).toEqual([8500]);
      expect(overview.upcomingOnedayBumps.map((bump) => bump.price)).toEqual([5000]);
      expect(overview.tables[0]).toEqual({ tables: 1, label: '1 Table', price: 12500 });
      expect(overview.tables).toHaveLength(4);
    });
  });
});
