import { convention } from '@config/convention.config.js';
import type { BadgeTypeValue } from '@shared/constants/convention.js';
import type { PriceBump, PricingOverview } from './pricing.schema.js';

export type ConventionPhase = 'PRE_CON' | 'AT_THE_CON' | 'POST_CON';

// ============================================================================
// Price Schedule
// ============================================================================

/**
 * Walk a date-sorted bump list and return the price in effect at `when`.
 */
function priceAt(initial: number, bumps: PriceBump[], when: Date): number {
  let price = initial;
  for (const bump of bumps) {
    if (bump.date.getTime() > when.getTime()) break;
    price = bump.price;
  }
  return price;
}

/**
 * Full-weekend attendee price for a registration made at `registered`.
 */
export function getAttendeePrice(registered: Date = new Date()): number {
  const { initialAttendee, attendeeBumps } = convention.prices;
  return priceAt(initialAttendee, attendeeBumps, registered);
}

/**
 * Single-day badge price for a registration made at `registered`.
 */
export function getOnedayPrice(registered: Date = new Date()): number {
  const { initialOneday, onedayBumps } = convention.prices;
  return priceAt(initialOneday, onedayBumps, registered);
}

/**
 * Per-day price of a presold one-day badge. Days without their own
 * price sell at the initial one-day price.
 */
export function getPresoldOnedayPrice(badgeType: BadgeTypeValue): number {
  return convention.prices.presoldOneday[badgeType] ?? convention.prices.initialOneday;
}

export function getBadgeTypePrice(badgeType: BadgeTypeValue): number | undefined {
  return convention.prices.badgeTypes[badgeType];
}

export function hasBadgeTypePrice(badgeType: BadgeTypeValue): boolean {
  return getBadgeTypePrice(badgeType) !== undefined;
}

function indexedPrice(prices: number[], index: number): number {
  const position = Math.max(0, Math.trunc(index));
  return prices[position] ?? prices[prices.length - 1];
}

export function getTablePrice(tables: number): number {
  return indexedPrice(convention.prices.tables, tables);
}

export function getPowerPrice(level: number): number {
  return indexedPrice(convention.prices.power, level);
}

// ============================================================================
// Event Phase
// ============================================================================

export function getConventionPhase(now: Date = new Date()): ConventionPhase {
  if (now < convention.epoch) return 'PRE_CON';
  if (now > convention.eschaton) return 'POST_CON';
  return 'AT_THE_CON';
}

export function isPreCon(now: Date = new Date()): boolean {
  return getConventionPhase(now) === 'PRE_CON';
}

export function isAtTheCon(now: Date = new Date()): boolean {
  return getConventionPhase(now) === 'AT_THE_CON';
}

// ============================================================================
// Public Overview
// ============================================================================

/**
 * Prices a registrant sees right now, plus the bumps still to come.
 */
export function getPricingOverview(now: Date = new Date()): PricingOverview {
  const { prices } = convention;
  const upcoming = (bumps: PriceBump[]) => bumps.filter((bump) => bump.date > now);

  return {
    currency: convention.currency,
    phase: getConventionPhase(now),
    attendeePrice: getAttendeePrice(now),
    onedayPrice: getOnedayPrice(now),
    upcomingAttendeeBumps: upcoming(prices.attendeeBumps),
    upcomingOnedayBumps: upcoming(prices.onedayBumps),
    presoldOneday: prices.presoldOneday,
    badgeTypes: prices.badgeTypes,
    tables: convention.tableOptions.map((label, index) => ({
      tables: index + 1,
      label,
      price: getTablePrice(index + 1),
    })),
  };
}
