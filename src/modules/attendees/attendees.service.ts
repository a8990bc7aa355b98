import { and, arrayContains, asc, count, eq, ilike, isNull, or, sql, type SQL } from 'drizzle-orm';
import { db, type DbClient } from '@/database/client.js';
import {
  attendees,
  modelReceipts,
  receiptItems,
  type Attendee,
} from '@/database/schema.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { BadgeType, OwnerModel, Ribbon } from '@shared/constants/convention.js';
import { auditLog, diffChanges } from '@shared/utils/audit.js';
import { paginate, getOffset, type PaginatedResult } from '@shared/utils/pagination.js';
import { logger } from '@shared/utils/logger.js';
import { syncGroupCost } from '@modules/groups/groups.service.js';
import { validateSection } from '@modules/forms/forms.service.js';
import type { FormFieldError, FormSection } from '@modules/forms/forms.schema.js';
import { applyPresaveAdjustments, costBreakdown, type CostBreakdown } from './attendees.utils.js';
import {
  AttendeeFormDataSchema,
  type AttendeeFormData,
  type CreateAttendeeInput,
  type ListAttendeesQuery,
  type SelfServiceSection,
  type UpdateAttendeeInput,
} from './attendees.schema.js';

// ============================================================================
// Types
// ============================================================================

export interface RequestMeta {
  performedBy?: string;
  ipAddress?: string;
  userAgent?: string;
}

const PREREG_SECTIONS: FormSection[] = [
  'personal_info',
  'badge_extras',
  'prereg_other_info',
  'consents',
];

type WritableAttendee = Omit<Attendee, 'id' | 'createdAt' | 'updatedAt'>;

const AUDITED_FIELDS: (keyof Attendee)[] = [
  'groupId',
  'placeholder',
  'firstName',
  'lastName',
  'legalName',
  'email',
  'badgeType',
  'badgeStatus',
  'badgePrintedName',
  'ribbons',
  'paid',
  'overriddenPrice',
  'amountExtra',
  'extraDonation',
  'shirt',
  'staffing',
  'compedReason',
  'printPending',
  'checkedIn',
];

// Columns the pre-save adjustments may touch
const PRESAVE_FIELDS: (keyof Attendee)[] = [
  'paid',
  'compedReason',
  'printPending',
  'forReview',
  'ribbons',
  'staffing',
  'canSpam',
];

// ============================================================================
// Helpers
// ============================================================================

function toWritable(attendee: Attendee): WritableAttendee {
  const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...values } = attendee;
  return values;
}

async function findAttendee(database: DbClient, id: string): Promise<Attendee | null> {
  const [attendee] = await database.select().from(attendees).where(eq(attendees.id, id)).limit(1);
  return attendee ?? null;
}

async function getAttendeeOrThrow(database: DbClient, id: string): Promise<Attendee> {
  const attendee = await findAttendee(database, id);
  if (!attendee) {
    throw new AppError('Attendee not found', 404, true, ErrorCodes.ATTENDEE_NOT_FOUND);
  }
  return attendee;
}

function formValidationError(errors: FormFieldError[]): AppError {
  return new AppError('Form validation failed', 400, true, ErrorCodes.FORM_VALIDATION_ERROR, {
    fieldErrors: errors,
  });
}

/**
 * Whether the attendee's open receipt already has charges on it.
 */
export async function hasActiveReceipt(attendeeId: string): Promise<boolean> {
  const [row] = await db
    .select({ items: count(receiptItems.id) })
    .from(modelReceipts)
    .innerJoin(receiptItems, eq(receiptItems.receiptId, modelReceipts.id))
    .where(
      and(
        eq(modelReceipts.ownerId, attendeeId),
        eq(modelReceipts.ownerModel, OwnerModel.ATTENDEE),
        isNull(modelReceipts.closed)
      )
    );
  return (row?.items ?? 0) > 0;
}

// ============================================================================
// CRUD Operations
// ============================================================================

/**
 * Insert an attendee, then apply the pre-save adjustments to the stored row
 * so they see every column default.
 */
export async function createAttendee(
  input: CreateAttendeeInput,
  meta: RequestMeta = {}
): Promise<Attendee> {
  return db.transaction(async (tx) => {
    const [inserted] = await tx.insert(attendees).values(input).returning();

    const adjusted = applyPresaveAdjustments(inserted, null);
    let attendee = inserted;
    if (diffChanges(inserted, adjusted, PRESAVE_FIELDS)) {
      [attendee] = await tx
        .update(attendees)
        .set(toWritable(adjusted))
        .where(eq(attendees.id, inserted.id))
        .returning();
    }

    await syncGroupCost(tx, attendee.groupId);
    await auditLog(tx, {
      entityType: 'Attendee',
      entityId: attendee.id,
      action: 'CREATE',
      ...meta,
    });

    logger.info({ attendeeId: attendee.id, badgeType: attendee.badgeType }, 'Attendee created');
    return attendee;
  });
}

/**
 * Public pre-registration. Every pre-registration section is validated
 * before anything is stored.
 */
export async function preregisterAttendee(
  data: Record<string, unknown>,
  meta: RequestMeta = {}
): Promise<Attendee> {
  const errors: FormFieldError[] = [];
  let validated: Record<string, unknown> = {};

  for (const section of PREREG_SECTIONS) {
    const result = validateSection(section, data, null);
    errors.push(...result.errors);
    validated = { ...validated, ...result.data };
  }

  if (errors.length > 0) {
    throw formValidationError(errors);
  }

  const values: AttendeeFormData = AttendeeFormDataSchema.parse(validated);
  return createAttendee(values, meta);
}

export async function getAttendeeById(id: string): Promise<Attendee | null> {
  return findAttendee(db, id);
}

export async function getAttendeeCost(id: string, now: Date = new Date()): Promise<CostBreakdown> {
  const attendee = await getAttendeeOrThrow(db, id);
  return costBreakdown(attendee, now);
}

export async function listAttendees(query: ListAttendeesQuery): Promise<PaginatedResult<Attendee>> {
  const { page, limit, search, badgeStatus, badgeType, groupId } = query;

  const conditions: SQL[] = [];
  if (badgeStatus) conditions.push(eq(attendees.badgeStatus, badgeStatus));
  if (badgeType) conditions.push(eq(attendees.badgeType, badgeType));
  if (groupId) conditions.push(eq(attendees.groupId, groupId));
  if (search) {
    const term = `%${search.trim()}%`;
    const searchCondition = or(
      ilike(attendees.firstName, term),
      ilike(attendees.lastName, term),
      ilike(attendees.email, term),
      ilike(sql`${attendees.firstName} || ' ' || ${attendees.lastName}`, term)
    );
    if (searchCondition) conditions.push(searchCondition);
  }
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const [data, [{ total }]] = await Promise.all([
    db
      .select()
      .from(attendees)
      .where(where)
      .orderBy(asc(attendees.lastName), asc(attendees.firstName))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(attendees).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

/**
 * Apply an edit, run the pre-save adjustments and record what changed.
 */
export async function updateAttendee(
  id: string,
  input: UpdateAttendeeInput,
  meta: RequestMeta = {}
): Promise<Attendee> {
  return db.transaction(async (tx) => {
    const existing = await getAttendeeOrThrow(tx, id);
    const adjusted = applyPresaveAdjustments({ ...existing, ...input }, existing);

    const [updated] = await tx
      .update(attendees)
      .set(toWritable(adjusted))
      .where(eq(attendees.id, id))
      .returning();

    await syncGroupCost(tx, updated.groupId);
    if (existing.groupId !== updated.groupId) {
      await syncGroupCost(tx, existing.groupId);
    }

    const changes = diffChanges(existing, updated, AUDITED_FIELDS);
    if (changes) {
      await auditLog(tx, {
        entityType: 'Attendee',
        entityId: id,
        action: 'UPDATE',
        changes,
        ...meta,
      });
    }

    return updated;
  });
}

/**
 * Attendee-facing edit of one form section. Fields the attendee may not
 * change are dropped before validation.
 */
export async function updateAttendeeSection(
  id: string,
  section: SelfServiceSection,
  data: Record<string, unknown>,
  meta: RequestMeta = {}
): Promise<Attendee> {
  const attendee = await getAttendeeOrThrow(db, id);
  const activeReceipt = await hasActiveReceipt(id);

  const result = validateSection(section, data, attendee, {
    isAdmin: false,
    hasActiveReceipt: activeReceipt,
  });
  if (!result.valid) {
    throw formValidationError(result.errors);
  }

  return updateAttendee(id, AttendeeFormDataSchema.parse(result.data), meta);
}

export async function deleteAttendee(id: string, meta: RequestMeta = {}): Promise<void> {
  await db.transaction(async (tx) => {
    const existing = await getAttendeeOrThrow(tx, id);

    await tx.delete(attendees).where(eq(attendees.id, id));
    await syncGroupCost(tx, existing.groupId);

    await auditLog(tx, {
      entityType: 'Attendee',
      entityId: id,
      action: 'DELETE',
      ...meta,
    });
  });
}

/**
 * Panelists, staff and guests, for the panels department.
 */
export async function listPanelists(): Promise<Attendee[]> {
  return db
    .select()
    .from(attendees)
    .where(
      or(
        arrayContains(attendees.ribbons, [Ribbon.PANELIST]),
        arrayContains(attendees.ribbons, [Ribbon.STAFF]),
        eq(attendees.badgeType, BadgeType.GUEST)
      )
    )
    .orderBy(asc(attendees.firstName), asc(attendees.lastName));
}
