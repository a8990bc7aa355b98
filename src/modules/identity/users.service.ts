import { and, count, desc, eq, ilike, or, type SQL } from 'drizzle-orm';
import { db } from '@/database/client.js';
import { accessGroups, users, type AccessGroup, type User } from '@/database/schema.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { createFirebaseUser, deleteFirebaseUser } from '@shared/services/firebase.service.js';
import { paginate, getOffset, type PaginatedResult } from '@shared/utils/pagination.js';
import { logger } from '@shared/utils/logger.js';
import { clearUserCache, invalidateUserCache } from '@shared/middleware/auth.middleware.js';
import type {
  CreateUserInput,
  UpdateUserInput,
  ListUsersQuery,
  CreateAccessGroupInput,
  UpdateAccessGroupInput,
} from './users.schema.js';

export type UserWithAccessGroup = User & { accessGroup: AccessGroup | null };

async function assertAccessGroupExists(accessGroupId: string): Promise<void> {
  const group = await getAccessGroupById(accessGroupId);
  if (!group) {
    throw new AppError('Invalid access group ID', 400, true, ErrorCodes.BAD_REQUEST);
  }
}

// ============================================================================
// Users
// ============================================================================

/**
 * Create a new user in Firebase Auth + in DB.
 */
export async function createUser(input: CreateUserInput): Promise<User> {
  const { email, password, name, role, accessGroupId } = input;

  const [existing] = await db.select().from(users).where(eq(users.email, email)).limit(1);
  if (existing) {
    throw new AppError('User with this email already exists', 409, true, ErrorCodes.CONFLICT);
  }

  if (accessGroupId) {
    await assertAccessGroupExists(accessGroupId);
  }

  const firebaseUser = await createFirebaseUser(email, password);

  try {
    const [user] = await db
      .insert(users)
      .values({
        id: firebaseUser.uid,
        email,
        name,
        role,
        accessGroupId: accessGroupId ?? null,
      })
      .returning();
    return user;
  } catch (error) {
    // Rollback: delete from Firebase if DB insert fails
    await deleteFirebaseUser(firebaseUser.uid).catch((cleanupError: unknown) => {
      logger.error({ err: cleanupError, uid: firebaseUser.uid }, 'Failed to roll back Firebase user');
    });
    throw error;
  }
}

/**
 * Get user by ID, with their access group.
 */
export async function getUserById(id: string): Promise<UserWithAccessGroup | null> {
  const user = await db.query.users.findFirst({
    where: eq(users.id, id),
    with: { accessGroup: true },
  });
  return user ?? null;
}

/**
 * Update user in database only.
 */
export async function updateUser(id: string, input: UpdateUserInput): Promise<UserWithAccessGroup> {
  const existing = await getUserById(id);
  if (!existing) {
    throw new AppError('User not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  if (input.accessGroupId) {
    await assertAccessGroupExists(input.accessGroupId);
  }

  await db
    .update(users)
    .set({
      ...(input.name !== undefined && { name: input.name }),
      ...(input.role !== undefined && { role: input.role }),
      ...(input.accessGroupId !== undefined && { accessGroupId: input.accessGroupId }),
      ...(input.active !== undefined && { active: input.active }),
    })
    .where(eq(users.id, id));
  invalidateUserCache(id);

  const updated = await getUserById(id);
  if (!updated) {
    throw new AppError('User not found', 404, true, ErrorCodes.NOT_FOUND);
  }
  return updated;
}

/**
 * List users with pagination and filters.
 */
export async function listUsers(query: ListUsersQuery): Promise<PaginatedResult<User>> {
  const { page, limit, role, active, search } = query;

  const conditions: SQL[] = [];
  if (role !== undefined) conditions.push(eq(users.role, role));
  if (active !== undefined) conditions.push(eq(users.active, active));
  if (search) {
    const term = `%${search}%`;
    const searchCondition = or(ilike(users.name, term), ilike(users.email, term));
    if (searchCondition) conditions.push(searchCondition);
  }
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const [data, [{ total }]] = await Promise.all([
    db
      .select()
      .from(users)
      .where(where)
      .orderBy(desc(users.createdAt))
      .limit(limit)
      .offset(getOffset({ page, limit })),
    db.select({ total: count() }).from(users).where(where),
  ]);

  return paginate(data, total, { page, limit });
}

/**
 * Delete user from Firebase Auth + database.
 */
export async function deleteUser(id: string): Promise<void> {
  const existing = await getUserById(id);
  if (!existing) {
    throw new AppError('User not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  await deleteFirebaseUser(id);
  await db.delete(users).where(eq(users.id, id));
  invalidateUserCache(id);
}

// ============================================================================
// Access Groups
// ============================================================================

export async function createAccessGroup(input: CreateAccessGroupInput): Promise<AccessGroup> {
  const [group] = await db
    .insert(accessGroups)
    .values({
      name: input.name,
      sections: input.sections,
      startTime: input.startTime ?? null,
      endTime: input.endTime ?? null,
    })
    .returning();
  return group;
}

export async function getAccessGroupById(id: string): Promise<AccessGroup | null> {
  const [group] = await db.select().from(accessGroups).where(eq(accessGroups.id, id)).limit(1);
  return group ?? null;
}

export async function listAccessGroups(): Promise<AccessGroup[]> {
  return db.select().from(accessGroups).orderBy(accessGroups.name);
}

export async function updateAccessGroup(
  id: string,
  input: UpdateAccessGroupInput
): Promise<AccessGroup> {
  const existing = await getAccessGroupById(id);
  if (!existing) {
    throw new AppError('Access group not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  const startTime = input.startTime !== undefined ? input.startTime : existing.startTime;
  const endTime = input.endTime !== undefined ? input.endTime : existing.endTime;
  if (startTime && endTime && startTime >= endTime) {
    throw new AppError('Start time must be before end time', 400, true, ErrorCodes.VALIDATION_ERROR);
  }

  const [group] = await db
    .update(accessGroups)
    .set({
      ...(input.name !== undefined && { name: input.name }),
      ...(input.sections !== undefined && { sections: input.sections }),
      startTime,
      endTime,
    })
    .where(eq(accessGroups.id, id))
    .returning();
  // Cached users carry their access group
  clearUserCache();
  return group;
}
