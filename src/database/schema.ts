import { relations, sql } from 'drizzle-orm';
import {
  boolean,
  date,
  index,
  integer,
  jsonb,
  pgTable,
  real,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import {
  BADGE_STATUSES,
  BADGE_TYPES,
  GROUP_STATUSES,
  OWNER_MODELS,
  PAID_STATUSES,
  PAYMENT_METHODS,
  SALE_METHODS,
  type RibbonValue,
} from '@shared/constants/convention.js';

const createdAt = () => timestamp('created_at', { withTimezone: true }).notNull().defaultNow();
const updatedAt = () =>
  timestamp('updated_at', { withTimezone: true })
    .notNull()
    .defaultNow()
    .$onUpdate(() => new Date());

// ============================================================================
// Identity
// ============================================================================

export const accessGroups = pgTable('access_groups', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  sections: jsonb('sections').$type<string[]>().notNull().default([]),
  startTime: timestamp('start_time', { withTimezone: true }),
  endTime: timestamp('end_time', { withTimezone: true }),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const users = pgTable('users', {
  // Firebase uid
  id: text('id').primaryKey(),
  email: text('email').notNull().unique(),
  name: text('name').notNull(),
  role: integer('role').notNull().default(1),
  active: boolean('active').notNull().default(true),
  accessGroupId: uuid('access_group_id').references(() => accessGroups.id, {
    onDelete: 'set null',
  }),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const auditLogs = pgTable(
  'audit_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    entityType: text('entity_type').notNull(),
    entityId: text('entity_id').notNull(),
    action: text('action').notNull(),
    changes: jsonb('changes').$type<Record<string, { old: unknown; new: unknown }>>(),
    performedBy: text('performed_by'),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    createdAt: createdAt(),
  },
  (table) => ({
    entityIdx: index('audit_logs_entity_idx').on(table.entityType, table.entityId),
  })
);

// ============================================================================
// Groups & Attendees
// ============================================================================

export const groups = pgTable('groups', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  tables: real('tables').notNull().default(0),
  power: integer('power').notNull().default(0),
  powerFee: integer('power_fee').notNull().default(0),
  powerUsage: text('power_usage').notNull().default(''),
  location: text('location').notNull().default(''),
  tableFee: integer('table_fee').notNull().default(0),
  taxNumber: text('tax_number').notNull().default(''),
  status: text('status', { enum: GROUP_STATUSES }).notNull().default('UNAPPROVED'),
  approved: timestamp('approved', { withTimezone: true }),
  isDealer: boolean('is_dealer').notNull().default(false),
  canAdd: boolean('can_add').notNull().default(false),
  cost: integer('cost').notNull().default(0),
  autoRecalc: boolean('auto_recalc').notNull().default(true),
  leaderId: uuid('leader_id'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const attendees = pgTable(
  'attendees',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    groupId: uuid('group_id').references(() => groups.id, { onDelete: 'set null' }),
    placeholder: boolean('placeholder').notNull().default(false),

    // Personal info
    firstName: text('first_name').notNull().default(''),
    lastName: text('last_name').notNull().default(''),
    sameLegalName: boolean('same_legal_name').notNull().default(false),
    legalName: text('legal_name').notNull().default(''),
    email: text('email').notNull().default(''),
    cellphone: text('cellphone').notNull().default(''),
    noCellphone: boolean('no_cellphone').notNull().default(false),
    birthdate: date('birthdate', { mode: 'string' }),
    ageGroup: text('age_group'),
    ecName: text('ec_name').notNull().default(''),
    ecPhone: text('ec_phone').notNull().default(''),
    onsiteContact: text('onsite_contact').notNull().default(''),
    noOnsiteContact: boolean('no_onsite_contact').notNull().default(false),
    international: boolean('international').notNull().default(false),
    address1: text('address1').notNull().default(''),
    address2: text('address2').notNull().default(''),
    city: text('city').notNull().default(''),
    region: text('region').notNull().default(''),
    zipCode: text('zip_code').notNull().default(''),
    country: text('country').notNull().default(''),

    // Badge
    badgeType: text('badge_type', { enum: BADGE_TYPES }).notNull().default('ATTENDEE'),
    badgeStatus: text('badge_status', { enum: BADGE_STATUSES }).notNull().default('NEW'),
    badgePrintedName: text('badge_printed_name').notNull().default(''),
    ribbons: text('ribbons').array().$type<RibbonValue[]>().notNull().default(sql`'{}'::text[]`),
    paid: text('paid', { enum: PAID_STATUSES }).notNull().default('NOT_PAID'),
    overriddenPrice: integer('overridden_price'),
    amountExtra: integer('amount_extra').notNull().default(0),
    extraDonation: integer('extra_donation').notNull().default(0),
    shirt: integer('shirt').notNull().default(0),
    promoCode: text('promo_code').notNull().default(''),

    // Other info
    staffing: boolean('staffing').notNull().default(false),
    requestedDeptIds: integer('requested_dept_ids').array().notNull().default(sql`'{}'::integer[]`),
    requestedAccessibilityServices: boolean('requested_accessibility_services')
      .notNull()
      .default(false),
    interests: integer('interests').array().notNull().default(sql`'{}'::integer[]`),
    fursuiting: integer('fursuiting'),

    // Consents
    canSpam: boolean('can_spam').notNull().default(false),
    piiConsent: boolean('pii_consent').notNull().default(false),

    // Admin
    compedReason: text('comped_reason').notNull().default(''),
    forReview: text('for_review').notNull().default(''),
    printPending: boolean('print_pending').notNull().default(false),
    timesPrinted: integer('times_printed').notNull().default(0),
    checkedIn: timestamp('checked_in', { withTimezone: true }),
    registered: timestamp('registered', { withTimezone: true }).notNull().defaultNow(),

    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    groupIdx: index('attendees_group_id_idx').on(table.groupId),
    emailIdx: index('attendees_email_idx').on(table.email),
  })
);

// ============================================================================
// Receipts
// ============================================================================

export const modelReceipts = pgTable(
  'model_receipts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    invoiceNum: integer('invoice_num').notNull().default(0),
    ownerId: uuid('owner_id').notNull(),
    ownerModel: text('owner_model', { enum: OWNER_MODELS }).notNull(),
    closed: timestamp('closed', { withTimezone: true }),
    createdAt: createdAt(),
  },
  (table) => ({
    ownerIdx: index('model_receipts_owner_id_idx').on(table.ownerId),
  })
);

export const receiptItems = pgTable(
  'receipt_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    receiptId: uuid('receipt_id').references(() => modelReceipts.id, { onDelete: 'set null' }),
    amount: integer('amount').notNull(),
    count: integer('count').notNull().default(1),
    added: timestamp('added', { withTimezone: true }).notNull().defaultNow(),
    closed: timestamp('closed', { withTimezone: true }),
    who: text('who').notNull().default(''),
    desc: text('desc').notNull().default(''),
    revertChange: jsonb('revert_change').$type<Record<string, unknown>>().notNull().default({}),
  },
  (table) => ({
    receiptIdx: index('receipt_items_receipt_id_idx').on(table.receiptId),
  })
);

export const receiptTransactions = pgTable(
  'receipt_transactions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    receiptId: uuid('receipt_id').references(() => modelReceipts.id, { onDelete: 'set null' }),
    intentId: text('intent_id'),
    chargeId: text('charge_id'),
    refundId: text('refund_id'),
    method: text('method', { enum: PAYMENT_METHODS }).notNull().default('STRIPE'),
    amount: integer('amount').notNull(),
    refunded: integer('refunded'),
    added: timestamp('added', { withTimezone: true }).notNull().defaultNow(),
    cancelled: timestamp('cancelled', { withTimezone: true }),
    who: text('who').notNull().default(''),
    desc: text('desc').notNull().default(''),
  },
  (table) => ({
    receiptIdx: index('receipt_transactions_receipt_id_idx').on(table.receiptId),
    intentIdx: index('receipt_transactions_intent_id_idx').on(table.intentId),
  })
);

// ============================================================================
// Merch & Sales
// ============================================================================

export const arbitraryCharges = pgTable('arbitrary_charges', {
  id: uuid('id').primaryKey().defaultRandom(),
  amount: integer('amount').notNull(),
  what: text('what').notNull(),
  when: timestamp('when', { withTimezone: true }).notNull().defaultNow(),
  regStation: integer('reg_station'),
});

export const merchDiscounts = pgTable(
  'merch_discounts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    attendeeId: uuid('attendee_id')
      .notNull()
      .references(() => attendees.id, { onDelete: 'cascade' }),
    uses: integer('uses').notNull().default(0),
  },
  (table) => ({
    attendeeUnique: uniqueIndex('merch_discounts_attendee_id_key').on(table.attendeeId),
  })
);

export const merchPickups = pgTable(
  'merch_pickups',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    pickedUpById: uuid('picked_up_by_id')
      .notNull()
      .references(() => attendees.id, { onDelete: 'cascade' }),
    pickedUpForId: uuid('picked_up_for_id')
      .notNull()
      .references(() => attendees.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pickedUpForUnique: uniqueIndex('merch_pickups_picked_up_for_id_key').on(table.pickedUpForId),
  })
);

export const mpointsForCash = pgTable('mpoints_for_cash', {
  id: uuid('id').primaryKey().defaultRandom(),
  attendeeId: uuid('attendee_id')
    .notNull()
    .references(() => attendees.id, { onDelete: 'cascade' }),
  amount: integer('amount').notNull(),
  when: timestamp('when', { withTimezone: true }).notNull().defaultNow(),
});

export const oldMpointExchanges = pgTable('old_mpoint_exchanges', {
  id: uuid('id').primaryKey().defaultRandom(),
  attendeeId: uuid('attendee_id')
    .notNull()
    .references(() => attendees.id, { onDelete: 'cascade' }),
  amount: integer('amount').notNull(),
  when: timestamp('when', { withTimezone: true }).notNull().defaultNow(),
});

export const noShirts = pgTable(
  'no_shirts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    attendeeId: uuid('attendee_id')
      .notNull()
      .references(() => attendees.id, { onDelete: 'cascade' }),
    createdAt: createdAt(),
  },
  (table) => ({
    attendeeUnique: uniqueIndex('no_shirts_attendee_id_key').on(table.attendeeId),
  })
);

export const sales = pgTable('sales', {
  id: uuid('id').primaryKey().defaultRandom(),
  attendeeId: uuid('attendee_id').references(() => attendees.id, { onDelete: 'set null' }),
  what: text('what').notNull(),
  cash: integer('cash').notNull().default(0),
  mpoints: integer('mpoints').notNull().default(0),
  when: timestamp('when', { withTimezone: true }).notNull().defaultNow(),
  regStation: integer('reg_station'),
  paymentMethod: text('payment_method', { enum: SALE_METHODS }).notNull().default('MERCH'),
});

// ============================================================================
// Relations
// ============================================================================

export const accessGroupsRelations = relations(accessGroups, ({ many }) => ({
  users: many(users),
}));

export const usersRelations = relations(users, ({ one }) => ({
  accessGroup: one(accessGroups, {
    fields: [users.accessGroupId],
    references: [accessGroups.id],
  }),
}));

export const groupsRelations = relations(groups, ({ many }) => ({
  members: many(attendees),
}));

export const attendeesRelations = relations(attendees, ({ one }) => ({
  group: one(groups, {
    fields: [attendees.groupId],
    references: [groups.id],
  }),
}));

export const modelReceiptsRelations = relations(modelReceipts, ({ many }) => ({
  items: many(receiptItems),
  transactions: many(receiptTransactions),
}));

export const receiptItemsRelations = relations(receiptItems, ({ one }) => ({
  receipt: one(modelReceipts, {
    fields: [receiptItems.receiptId],
    references: [modelReceipts.id],
  }),
}));

export const receiptTransactionsRelations = relations(receiptTransactions, ({ one }) => ({
  receipt: one(modelReceipts, {
    fields: [receiptTransactions.receiptId],
    references: [modelReceipts.id],
  }),
}));

// ============================================================================
// Row Types
// ============================================================================

export type AccessGroup = typeof accessGroups.$inferSelect;
export type User = typeof users.$inferSelect;
export type Group = typeof groups.$inferSelect;
export type NewGroup = typeof groups.$inferInsert;
export type Attendee = typeof attendees.$inferSelect;
export type NewAttendee = typeof attendees.$inferInsert;
export type ModelReceipt = typeof modelReceipts.$inferSelect;
export type ReceiptItem = typeof receiptItems.$inferSelect;
export type ReceiptTransaction = typeof receiptTransactions.$inferSelect;
export type ArbitraryCharge = typeof arbitraryCharges.$inferSelect;
export type MerchDiscount = typeof merchDiscounts.$inferSelect;
export type MerchPickup = typeof merchPickups.$inferSelect;
export type MPointsForCash = typeof mpointsForCash.$inferSelect;
export type OldMPointExchange = typeof oldMpointExchanges.$inferSelect;
export type NoShirt = typeof noShirts.$inferSelect;
export type Sale = typeof sales.$inferSelect;
