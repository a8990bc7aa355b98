import { auditLogs } from '@/database/schema.js';
import type { DbClient } from '@/database/client.js';

export interface AuditLogData {
  entityType: string;
  entityId: string;
  action: string;
  changes?: Record<string, { old: unknown; new: unknown }>;
  performedBy?: string;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Create an audit log entry.
 * Can be used with the pooled client or inside a transaction.
 */
export async function auditLog(database: DbClient, data: AuditLogData): Promise<void> {
  await database.insert(auditLogs).values({
    entityType: data.entityType,
    entityId: data.entityId,
    action: data.action,
    changes: data.changes ?? null,
    performedBy: data.performedBy ?? null,
    ipAddress: data.ipAddress ?? null,
    userAgent: data.userAgent ?? null,
  });
}

/**
 * Calculate changes between old and new objects for specified fields.
 * Returns undefined if no changes detected.
 */
export function diffChanges<T extends Record<string, unknown>>(
  old: T | null,
  updated: T,
  fields: (keyof T)[]
): Record<string, { old: unknown; new: unknown }> | undefined {
  const changes: Record<string, { old: unknown; new: unknown }> = {};

  for (const field of fields) {
    const oldVal = old?.[field];
    const newVal = updated[field];
    if (!isSameValue(oldVal, newVal)) {
      changes[String(field)] = { old: oldVal, new: newVal };
    }
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}

function isSameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, index) => value === b[index]);
  }
  return a === b;
}
