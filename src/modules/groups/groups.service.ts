import { and, asc, count, eq, ilike, type SQL } from 'drizzle-orm';
import { db, type DbClient } from '@/database/client.js';
import { attendees, groups, type Attendee, type Group } from '@/database/schema.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { auditLog, diffChanges } from '@shared/utils/audit.js';
import { paginate, getOffset, type PaginatedResult } from '@shared/utils/pagination.js';
import { logger } from '@shared/utils/logger.js';
import { GroupStatus } from '@shared/constants/convention.js';
import {
  applyGroupPresaveAdjustments,
  defaultCost,
  groupCosts,
  type GroupCosts,
  type GroupDraft,
} from './groups.utils.js';
import type { CreateGroupInput, ListGroupsQuery, UpdateGroupInput } from './groups.schema.js';

// ============================================================================
// Types
// ============================================================================

export type GroupWithMembers = Group & { members: Attendee[] };

export type GroupDetail = GroupWithMembers & { costs: GroupCosts };

const AUDITED_FIELDS: (keyof Group)[] = [
  'name',
  'tables',
  'power',
  'powerFee',
  'location',
  'tableFee',
  'status',
  'approved',
  'isDealer',
  'canAdd',
  'cost',
  'autoRecalc',
  'leaderId',
];

// ============================================================================
// Helpers
// ============================================================================

async function findLeader(database: DbClient, leaderId: string | null | undefined): Promise<Attendee | null> {
  if (!leaderId) return null;
  const [leader] = await database.select().from(attendees).where(eq(attendees.id, leaderId)).limit(1);
  if (!leader) {
    throw new AppError('Group leader not found', 400, true, ErrorCodes.ATTENDEE_NOT_FOUND);
  }
  return leader;
}

async function findGroupWithMembers(
  database: DbClient,
  id: string
): Promise<GroupWithMembers | null> {
  const group = await database.query.groups.findFirst({
    where: eq(groups.id, id),
    with: { members: true },
  });
  return group ?? null;
}

/**
 * Keep an auto-recalculating group's cost in step with its members.
 * Call after any write that changes the group or who it pays for.
 */
export async function syncGroupCost(
  database: DbClient,
  groupId: string | null | undefined
): Promise<void> {
  if (!groupId) return;
  const group = await findGroupWithMembers(database, groupId);
  if (!group?.autoRecalc) return;

  const cost = defaultCost(group, group.members);
  if (cost !== group.cost) {
    await database.update(groups).set({ cost }).where(eq(groups.id, groupId));
    logger.debug({ groupId, from: group.cost, to: cost }, 'Group cost recalculated');
  }
}

// ============================================================================
// CRUD Operations
// ============================================================================

export async function createGroup(input: CreateGroupInput, performedBy?: string): Promise<Group> {
  return db.transaction(async (tx) => {
    const leader = await findLeader(tx, input.leaderId);
    const draft: CreateGroupInput & GroupDraft = {
      ...input,
      status: input.status ?? GroupStatus.UNAPPROVED,
      approved: null,
      isDealer: input.isDealer ?? false,
      canAdd: input.canAdd ?? false,
    };
    const values = applyGroupPresaveAdjustments(draft, { leader, isNew: true });

    const [group] = await tx.insert(groups).values(values).returning();

    if (leader && leader.groupId !== group.id) {
      await tx.update(attendees).set({ groupId: group.id }).where(eq(attendees.id, leader.id));
    }
    await syncGroupCost(tx, group.id);

    await auditLog(tx, {
      entityType: 'Group',
      entityId: group.id,
      action: 'CREATE',
      performedBy,
    });

    return getGroupOrThrow(tx, group.id);
  });
}

async function getGroupOrThrow(database: DbClient, id: string): Promise<Group> {
  const [group] = await database.select().from(groups).where(eq(groups.id, id)).limit(1);
  if (!group) {
    throw new AppError('Group not found', 404, true, ErrorCodes.GROUP_NOT_FOUND);
  }
  return group;
}

/**
 * Get a group with its members and the costs derived from them.
 */
export async function getGroupById(id: string, now: Date = new Date()): Promise<GroupDetail | null> {
  const group = await findGroupWithMembers(db, id);
  if (!group) return null;
  return { ...group, costs: groupCosts(group, group.members, now) };
}

export async function listGroups(query: ListGroupsQuery): Promise<PaginatedResult<Group>> {
  const { page, limit, search, status, isDealer } = query;

  const conditions: SQL[] = [];
  if (status) conditions.push(eq(groups.status, status));
  if (isDealer !== undefined) conditions.push(eq(groups.isDealer, isDealer));
  if (search) conditions.push(ilike(groups.name, `%${search}%`));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const [data, [{ total }]] = await Promise.all([
    db
      .select()
      .from(groups)
      .where(where)
      .orderBy(asc(groups.name))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(groups).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

export async function updateGroup(
  id: string,
  input: UpdateGroupInput,
  performedBy?: string
): Promise<Group> {
  return db.transaction(async (tx) => {
    const existing = await getGroupOrThrow(tx, id);
    const leaderId = input.leaderId !== undefined ? input.leaderId : existing.leaderId;
    const leader = await findLeader(tx, leaderId);

    const merged = applyGroupPresaveAdjustments({ ...existing, ...input }, { leader, isNew: false });
    const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...values } = merged;

    const [updated] = await tx.update(groups).set(values).where(eq(groups.id, id)).returning();
    await syncGroupCost(tx, id);

    const changes = diffChanges(existing, updated, AUDITED_FIELDS);
    if (changes) {
      await auditLog(tx, {
        entityType: 'Group',
        entityId: id,
        action: 'UPDATE',
        changes,
        performedBy,
      });
    }

    return getGroupOrThrow(tx, id);
  });
}

/**
 * Delete a group. Members stay registered, detached from the group.
 */
export async function deleteGroup(id: string, performedBy?: string): Promise<void> {
  await db.transaction(async (tx) => {
    await getGroupOrThrow(tx, id);

    await tx.update(attendees).set({ groupId: null }).where(eq(attendees.groupId, id));
    await tx.delete(groups).where(eq(groups.id, id));

    await auditLog(tx, {
      entityType: 'Group',
      entityId: id,
      action: 'DELETE',
      performedBy,
    });
  });
}

/**
 * Reset a group's cost to its default, whether or not it auto-recalculates.
 */
export async function recalculateGroupCost(id: string, performedBy?: string): Promise<Group> {
  return db.transaction(async (tx) => {
    const group = await findGroupWithMembers(tx, id);
    if (!group) {
      throw new AppError('Group not found', 404, true, ErrorCodes.GROUP_NOT_FOUND);
    }

    const cost = defaultCost(group, group.members);
    const [updated] = await tx.update(groups).set({ cost }).where(eq(groups.id, id)).returning();

    if (cost !== group.cost) {
      await auditLog(tx, {
        entityType: 'Group',
        entityId: id,
        action: 'RECALCULATE_COST',
        changes: { cost: { old: group.cost, new: cost } },
        performedBy,
      });
    }
    return updated;
  });
}
