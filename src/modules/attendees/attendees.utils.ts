import { convention, type AgeGroup } from '@config/convention.config.js';
import {
  BadgeStatus,
  BadgeType,
  INVALID_BADGE_STATUSES,
  PaidStatus,
  PRESOLD_ONEDAY_BADGE_TYPES,
  Ribbon,
  type BadgeTypeValue,
} from '@shared/constants/convention.js';
import {
  getAttendeePrice,
  getBadgeTypePrice,
  getOnedayPrice,
  getPresoldOnedayPrice,
  isAtTheCon,
  isPreCon,
} from '@modules/pricing/pricing.service.js';
import type { Attendee } from '@/database/schema.js';

const SHIRT_BADGE_TYPES: readonly BadgeTypeValue[] = [BadgeType.SPONSOR, BadgeType.SHINY];

// Flat at-the-door discounts for kids 12 and under, in cents
const UNDER_THIRTEEN_AT_CON_DISCOUNTS: Partial<Record<BadgeTypeValue, number>> = {
  ATTENDEE: 3300,
  FRIDAY: 1300,
  SUNDAY: 1300,
  SATURDAY: 2000,
};

export const NOT_ATTENDING_COMPED_REASON = 'Automated: Not Attending badge status.';
export const REPRINT_REVIEW_NOTE =
  'Automated message: Badge marked for free reprint because we think this is a preregistered attendee who wanted a different badge name.';

// ============================================================================
// Derived Values
// ============================================================================

export function getAgeGroupConfig(ageGroup: string | null): AgeGroup | undefined {
  if (!ageGroup) return undefined;
  return convention.ageGroups.find((group) => group.id === ageGroup);
}

export function fullName(attendee: Pick<Attendee, 'firstName' | 'lastName'>): string {
  return `${attendee.firstName} ${attendee.lastName}`.trim();
}

export function isValid(attendee: Pick<Attendee, 'badgeStatus'>): boolean {
  return !INVALID_BADGE_STATUSES.includes(attendee.badgeStatus);
}

/**
 * True for a registration that has not been stored yet.
 */
export function isNew(attendee: Pick<Attendee, 'id'> | null): boolean {
  return !attendee?.id;
}

export function isPresoldOneday(attendee: Pick<Attendee, 'badgeType'>): boolean {
  return PRESOLD_ONEDAY_BADGE_TYPES.includes(attendee.badgeType);
}

export function paidForAShirt(attendee: Pick<Attendee, 'badgeType'>): boolean {
  return SHIRT_BADGE_TYPES.includes(attendee.badgeType);
}

export function staffingOrWillBe(
  attendee: Pick<Attendee, 'staffing' | 'badgeType' | 'ribbons'>
): boolean {
  return (
    attendee.staffing ||
    attendee.badgeType === BadgeType.STAFF ||
    attendee.ribbons.includes(Ribbon.VOLUNTEER) ||
    attendee.ribbons.includes(Ribbon.STAFF)
  );
}

export function needsPiiConsent(
  attendee: Pick<Attendee, 'id' | 'placeholder' | 'firstName'> | null
): boolean {
  if (!attendee || isNew(attendee)) return true;
  return attendee.placeholder || !attendee.firstName;
}

export function isNotReadyToCheckin(
  attendee: Pick<Attendee, 'placeholder' | 'paid' | 'badgeStatus'>
): boolean {
  return (
    attendee.placeholder ||
    attendee.paid === PaidStatus.NOT_PAID ||
    attendee.badgeStatus !== BadgeStatus.COMPLETED
  );
}

// ============================================================================
// Cost
// ============================================================================

export type CostFields = Pick<
  Attendee,
  'paid' | 'badgeType' | 'overriddenPrice' | 'registered' | 'ageGroup'
>;

/**
 * Negative adjustment applied to the badge price for the attendee's age group.
 * At the con, kids under 13 get the larger of the flat door discount and
 * their group's configured discount.
 */
export function ageDiscount(
  attendee: Pick<Attendee, 'ageGroup' | 'badgeType'>,
  now: Date = new Date()
): number {
  const ageGroup = getAgeGroupConfig(attendee.ageGroup);
  if (!ageGroup) return 0;

  if (ageGroup.underThirteen && isAtTheCon(now)) {
    const doorDiscount = UNDER_THIRTEEN_AT_CON_DISCOUNTS[attendee.badgeType];
    if (doorDiscount !== undefined && (!ageGroup.discount || ageGroup.discount < doorDiscount)) {
      return -doorDiscount;
    }
  }

  return ageGroup.discount ? -ageGroup.discount : 0;
}

export function badgeCost(attendee: CostFields, now: Date = new Date()): number {
  const { paid, badgeType, registered } = attendee;

  if (paid === PaidStatus.NEED_NOT_PAY && !SHIRT_BADGE_TYPES.includes(badgeType)) {
    return 0;
  }
  if (paid === PaidStatus.NEED_NOT_PAY) {
    // Comped sponsors still pay the upgrade over a regular badge
    return (getBadgeTypePrice(badgeType) ?? 0) - getAttendeePrice(registered);
  }
  if (attendee.overriddenPrice !== null) {
    return attendee.overriddenPrice;
  }
  if (badgeType === BadgeType.ONE_DAY) {
    return getOnedayPrice(registered);
  }
  if (isPresoldOneday(attendee)) {
    return Math.max(0, getPresoldOnedayPrice(badgeType) + ageDiscount(attendee, now));
  }

  const typePrice = getBadgeTypePrice(badgeType);
  if (typePrice !== undefined) {
    return typePrice;
  }

  const discount = ageDiscount(attendee, now);
  if (discount !== 0) {
    return Math.max(0, getAttendeePrice(registered) + discount);
  }
  return getAttendeePrice(registered);
}

export function totalCost(
  attendee: CostFields & Pick<Attendee, 'amountExtra' | 'extraDonation'>,
  now: Date = new Date()
): number {
  return badgeCost(attendee, now) + attendee.amountExtra + attendee.extraDonation;
}

export interface CostBreakdown {
  badgeCost: number;
  ageDiscount: number;
  amountExtra: number;
  extraDonation: number;
  totalCost: number;
}

export function costBreakdown(attendee: Attendee, now: Date = new Date()): CostBreakdown {
  return {
    badgeCost: badgeCost(attendee, now),
    ageDiscount: ageDiscount(attendee, now),
    amountExtra: attendee.amountExtra,
    extraDonation: attendee.extraDonation,
    totalCost: totalCost(attendee, now),
  };
}

// ============================================================================
// Pre-save Adjustments
// ============================================================================

function notAttendingNeedNotPay(attendee: Attendee): Attendee {
  if (attendee.badgeStatus !== BadgeStatus.NOT_ATTENDING) return attendee;
  return { ...attendee, paid: PaidStatus.NEED_NOT_PAY, compedReason: NOT_ATTENDING_COMPED_REASON };
}

function printReadyBeforeEvent(attendee: Attendee, now: Date): Attendee {
  if (
    isPreCon(now) &&
    attendee.badgeStatus === BadgeStatus.COMPLETED &&
    !isNotReadyToCheckin(attendee) &&
    attendee.timesPrinted < 1 &&
    !attendee.ribbons.includes(Ribbon.STAFF)
  ) {
    return { ...attendee, printPending: true };
  }
  return attendee;
}

function reprintPreregNameChange(attendee: Attendee, original: Attendee | null): Attendee {
  if (
    original &&
    attendee.timesPrinted >= 1 &&
    !original.checkedIn &&
    original.badgePrintedName !== attendee.badgePrintedName
  ) {
    return {
      ...attendee,
      printPending: true,
      forReview: attendee.forReview + REPRINT_REVIEW_NOTE,
    };
  }
  return attendee;
}

function staffingBadgeAndRibbonAdjustments(attendee: Attendee): Attendee {
  let { ribbons, staffing, paid } = attendee;

  if (attendee.badgeType === BadgeType.STAFF || ribbons.includes(Ribbon.STAFF)) {
    ribbons = ribbons.filter((ribbon) => ribbon !== Ribbon.VOLUNTEER);
  } else if (staffing && !ribbons.includes(Ribbon.VOLUNTEER)) {
    ribbons = [...ribbons, Ribbon.VOLUNTEER];
  }

  if (attendee.badgeType === BadgeType.STAFF || ribbons.includes(Ribbon.STAFF)) {
    staffing = true;
    if (
      !attendee.overriddenPrice &&
      (paid === PaidStatus.NOT_PAID || paid === PaidStatus.PAID_BY_GROUP)
    ) {
      paid = PaidStatus.NEED_NOT_PAY;
    }
  }

  return { ...attendee, ribbons, staffing, paid };
}

function neverSpam(attendee: Attendee): Attendee {
  if (convention.features.allowMarketingOptIn) return attendee;
  return { ...attendee, canSpam: false };
}

/**
 * Adjustments applied to every attendee write, in order.
 * `original` is the stored row for updates and null for new attendees.
 */
export function applyPresaveAdjustments(
  attendee: Attendee,
  original: Attendee | null,
  now: Date = new Date()
): Attendee {
  let next = notAttendingNeedNotPay(attendee);
  next = printReadyBeforeEvent(next, now);
  next = reprintPreregNameChange(next, original);
  next = staffingBadgeAndRibbonAdjustments(next);
  next = neverSpam(next);
  return next;
}
