import type { AccessGroup } from '@/database/schema.js';

export const UserRole = {
  ADMIN: 0,
  STAFF: 1,
} as const;

export type UserRoleType = (typeof UserRole)[keyof typeof UserRole];

/**
 * Admin areas an access group can grant.
 */
export const ACCESS_SECTIONS = ['attendees', 'groups', 'receipts', 'merch', 'users'] as const;

export type AccessSection = (typeof ACCESS_SECTIONS)[number];

export function isAdmin(role: number): boolean {
  return role === UserRole.ADMIN;
}

export function canManageUsers(role: number): boolean {
  return role === UserRole.ADMIN;
}

export function getRoleName(role: number): string {
  switch (role) {
    case UserRole.ADMIN:
      return 'admin';
    case UserRole.STAFF:
      return 'staff';
    default:
      return 'unknown';
  }
}

/**
 * An access group only applies between its start and end time.
 * Either bound may be open.
 */
export function isAccessGroupActive(
  group: Pick<AccessGroup, 'startTime' | 'endTime'>,
  now: Date = new Date()
): boolean {
  if (group.startTime && now < group.startTime) return false;
  if (group.endTime && now > group.endTime) return false;
  return true;
}

/**
 * Admins reach every section; staff only what an active access group grants.
 */
export function canAccessSection(
  user: { role: number; accessGroup: Pick<AccessGroup, 'sections' | 'startTime' | 'endTime'> | null },
  section: AccessSection,
  now: Date = new Date()
): boolean {
  if (isAdmin(user.role)) return true;
  if (!user.accessGroup) return false;
  if (!isAccessGroupActive(user.accessGroup, now)) return false;
  return user.accessGroup.sections.includes(section);
}
