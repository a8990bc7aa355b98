// Registration vocabulary shared across modules.

export const BADGE_TYPES = [
  'ATTENDEE',
  'ONE_DAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
  'STAFF',
  'CONTRACTOR',
  'GUEST',
  'SPONSOR',
  'SHINY',
] as const;

export type BadgeTypeValue = (typeof BADGE_TYPES)[number];

export const BadgeType = {
  ATTENDEE: 'ATTENDEE',
  ONE_DAY: 'ONE_DAY',
  FRIDAY: 'FRIDAY',
  SATURDAY: 'SATURDAY',
  SUNDAY: 'SUNDAY',
  STAFF: 'STAFF',
  CONTRACTOR: 'CONTRACTOR',
  GUEST: 'GUEST',
  SPONSOR: 'SPONSOR',
  SHINY: 'SHINY',
} as const satisfies Record<string, BadgeTypeValue>;

/** Single-day badges sold ahead of time at a per-day price. */
export const PRESOLD_ONEDAY_BADGE_TYPES: readonly BadgeTypeValue[] = [
  BadgeType.FRIDAY,
  BadgeType.SATURDAY,
  BadgeType.SUNDAY,
];

export const BADGE_STATUSES = [
  'NEW',
  'PENDING',
  'COMPLETED',
  'INVALID',
  'IMPORTED',
  'REFUNDED',
  'DEFERRED',
  'NOT_ATTENDING',
  'WATCHED',
] as const;

export type BadgeStatusValue = (typeof BADGE_STATUSES)[number];

export const BadgeStatus = {
  NEW: 'NEW',
  PENDING: 'PENDING',
  COMPLETED: 'COMPLETED',
  INVALID: 'INVALID',
  IMPORTED: 'IMPORTED',
  REFUNDED: 'REFUNDED',
  DEFERRED: 'DEFERRED',
  NOT_ATTENDING: 'NOT_ATTENDING',
  WATCHED: 'WATCHED',
} as const satisfies Record<string, BadgeStatusValue>;

export const INVALID_BADGE_STATUSES: readonly BadgeStatusValue[] = [
  BadgeStatus.INVALID,
  BadgeStatus.IMPORTED,
  BadgeStatus.WATCHED,
];

export const PAID_STATUSES = [
  'NOT_PAID',
  'HAS_PAID',
  'NEED_NOT_PAY',
  'PAID_BY_GROUP',
  'REFUNDED',
] as const;

export type PaidStatusValue = (typeof PAID_STATUSES)[number];

export const PaidStatus = {
  NOT_PAID: 'NOT_PAID',
  HAS_PAID: 'HAS_PAID',
  NEED_NOT_PAY: 'NEED_NOT_PAY',
  PAID_BY_GROUP: 'PAID_BY_GROUP',
  REFUNDED: 'REFUNDED',
} as const satisfies Record<string, PaidStatusValue>;

export const RIBBONS = ['VOLUNTEER', 'STAFF', 'PANELIST', 'DEALER'] as const;

export type RibbonValue = (typeof RIBBONS)[number];

export const Ribbon = {
  VOLUNTEER: 'VOLUNTEER',
  STAFF: 'STAFF',
  PANELIST: 'PANELIST',
  DEALER: 'DEALER',
} as const satisfies Record<string, RibbonValue>;

export const PAYMENT_METHODS = ['STRIPE', 'CASH', 'SQUARE', 'MANUAL', 'GROUP'] as const;

export type PaymentMethodValue = (typeof PAYMENT_METHODS)[number];

export const PaymentMethod = {
  STRIPE: 'STRIPE',
  CASH: 'CASH',
  SQUARE: 'SQUARE',
  MANUAL: 'MANUAL',
  GROUP: 'GROUP',
} as const satisfies Record<string, PaymentMethodValue>;

export const SALE_METHODS = ['MERCH', 'CASH', 'CREDIT'] as const;

export type SaleMethodValue = (typeof SALE_METHODS)[number];

export const SaleMethod = {
  MERCH: 'MERCH',
  CASH: 'CASH',
  CREDIT: 'CREDIT',
} as const satisfies Record<string, SaleMethodValue>;

export const GROUP_STATUSES = [
  'UNAPPROVED',
  'APPROVED',
  'WAITLISTED',
  'DECLINED',
  'CANCELLED',
] as const;

export type GroupStatusValue = (typeof GROUP_STATUSES)[number];

export const GroupStatus = {
  UNAPPROVED: 'UNAPPROVED',
  APPROVED: 'APPROVED',
  WAITLISTED: 'WAITLISTED',
  DECLINED: 'DECLINED',
  CANCELLED: 'CANCELLED',
} as const satisfies Record<string, GroupStatusValue>;

export const OWNER_MODELS = ['Attendee', 'Group'] as const;

export type OwnerModelValue = (typeof OWNER_MODELS)[number];

export const OwnerModel = {
  ATTENDEE: 'Attendee',
  GROUP: 'Group',
} as const satisfies Record<string, OwnerModelValue>;
