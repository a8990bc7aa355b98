import { convention } from '@config/convention.config.js';
import {
  BadgeType,
  GroupStatus,
  PaidStatus,
} from '@shared/constants/convention.js';
import { getPowerPrice, getTablePrice } from '@modules/pricing/pricing.service.js';
import { badgeCost } from '@modules/attendees/attendees.utils.js';
import type { Attendee, Group } from '@/database/schema.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const BADGES_PER_TABLE = 3;
const MAX_DEALER_BADGES = 12;

// ============================================================================
// Costs
// ============================================================================

export function powerCost(group: Pick<Group, 'power' | 'powerFee'>): number {
  if (group.powerFee) return group.powerFee;
  return getPowerPrice(group.power);
}

export function tableCost(group: Pick<Group, 'tables' | 'tableFee'>): number {
  if (group.tableFee) return group.tableFee;
  return getTablePrice(group.tables);
}

/**
 * What the group owes: its table and power, plus the badges it pays for.
 */
export function defaultCost(
  group: Pick<Group, 'tables' | 'tableFee' | 'power' | 'powerFee'>,
  members: Attendee[],
  now: Date = new Date()
): number {
  const badges = members
    .filter((member) => member.paid === PaidStatus.PAID_BY_GROUP)
    .reduce((sum, member) => sum + badgeCost(member, now), 0);
  return tableCost(group) + powerCost(group) + badges;
}

// ============================================================================
// Dealers
// ============================================================================

export function dealerPaymentDue(group: Pick<Group, 'approved'>): Date | null {
  if (!group.approved) return null;
  return new Date(group.approved.getTime() + convention.dealerPaymentDays * DAY_MS);
}

export function dealerPaymentIsLate(
  group: Pick<Group, 'approved'>,
  now: Date = new Date()
): boolean {
  const due = dealerPaymentDue(group);
  return due !== null && now > due;
}

export function tablesRepr(group: Pick<Group, 'tables'>): string {
  const index = Math.trunc(group.tables) - 1;
  return convention.tableOptions[index] ?? 'No Table';
}

export function dealerMaxBadges(group: Pick<Group, 'tables'>): number {
  if (convention.maxDealers) return convention.maxDealers;
  return Math.min(Math.ceil(group.tables) * BADGES_PER_TABLE, MAX_DEALER_BADGES);
}

export interface GroupCosts {
  tableCost: number;
  powerCost: number;
  defaultCost: number;
  tablesRepr: string;
  dealerMaxBadges: number;
  dealerPaymentDue: Date | null;
  dealerPaymentIsLate: boolean;
}

export function groupCosts(group: Group, members: Attendee[], now: Date = new Date()): GroupCosts {
  return {
    tableCost: tableCost(group),
    powerCost: powerCost(group),
    defaultCost: defaultCost(group, members, now),
    tablesRepr: tablesRepr(group),
    dealerMaxBadges: dealerMaxBadges(group),
    dealerPaymentDue: dealerPaymentDue(group),
    dealerPaymentIsLate: dealerPaymentIsLate(group, now),
  };
}

// ============================================================================
// Pre-save Adjustments
// ============================================================================

export type GroupDraft = Pick<Group, 'status' | 'approved' | 'isDealer' | 'canAdd'>;

function guestGroupsApproved<T extends GroupDraft>(group: T, leader: Attendee | null): T {
  if (leader?.badgeType === BadgeType.GUEST && group.status === GroupStatus.UNAPPROVED) {
    return { ...group, status: GroupStatus.APPROVED };
  }
  return group;
}

function dealersAddBadges<T extends GroupDraft>(group: T, isNewGroup: boolean): T {
  if (isNewGroup && group.isDealer) {
    return { ...group, canAdd: true };
  }
  return group;
}

function stampApproval<T extends GroupDraft>(group: T, now: Date): T {
  if (group.status === GroupStatus.APPROVED && !group.approved) {
    return { ...group, approved: now };
  }
  return group;
}

/**
 * Adjustments applied to every group write, in order.
 */
export function applyGroupPresaveAdjustments<T extends GroupDraft>(
  group: T,
  options: { leader: Attendee | null; isNew: boolean; now?: Date }
): T {
  let next = guestGroupsApproved(group, options.leader);
  next = dealersAddBadges(next, options.isNew);
  next = stampApproval(next, options.now ?? new Date());
  return next;
}
