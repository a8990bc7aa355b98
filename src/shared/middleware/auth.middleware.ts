import type { FastifyRequest, FastifyReply } from "fastify";
import { eq } from "drizzle-orm";
import { verifyToken } from "@shared/services/firebase.service.js";
import { db } from "@/database/client.js";
import { users } from "@/database/schema.js";
import { AppError } from "@shared/errors/app-error.js";
import { ErrorCodes } from "@shared/errors/error-codes.js";
import {
  UserRole,
  canAccessSection,
  isAccessGroupActive,
  type AccessSection,
} from "@modules/identity/permissions.js";
import { TtlCache } from "@shared/utils/cache.js";
import type { AuthenticatedUser } from "@shared/types/fastify.js";

// Staff lookups are cached for a minute
const userCache = new TtlCache<AuthenticatedUser>({ ttlSeconds: 60 });

/**
 * Invalidate user cache entry (call when user is updated/deleted).
 */
export function invalidateUserCache(userId: string): void {
  userCache.invalidate(userId);
}

/**
 * Clear all user cache entries (useful for testing).
 */
export function clearUserCache(): void {
  userCache.clear();
}

async function loadUser(uid: string): Promise<AuthenticatedUser | undefined> {
  return userCache.getOrLoad(uid, () =>
    db.query.users.findFirst({
      where: eq(users.id, uid),
      with: { accessGroup: true },
    })
  );
}

/**
 * Middleware to require authentication.
 * Verifies Firebase ID token and attaches the staff user to request.
 */
export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const authHeader = request.headers.authorization;

  if (!authHeader?.startsWith("Bearer ")) {
    throw new AppError(
      "Missing or invalid authorization header",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }

  const token = authHeader.replace("Bearer ", "");

  try {
    const decoded = await verifyToken(token);
    const user = await loadUser(decoded.uid);

    if (!user) {
      throw new AppError(
        "User not found in database",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    if (!user.active) {
      throw new AppError(
        "User account is disabled",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    request.user = user;
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new AppError(
      "Invalid or expired token",
      401,
      true,
      ErrorCodes.INVALID_TOKEN,
    );
  }
}

/**
 * Factory function to create a middleware that checks for specific roles.
 * @param roles - Allowed role numbers (0 = admin, 1 = staff)
 */
export function requireRole(...roles: number[]) {
  return async (
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> => {
    if (!request.user) {
      throw new AppError(
        "Authentication required",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    if (!roles.includes(request.user.role)) {
      throw new AppError(
        "Insufficient permissions",
        403,
        true,
        ErrorCodes.FORBIDDEN,
      );
    }
  };
}

/**
 * Middleware that requires the admin role (role = 0).
 */
export const requireAdmin = requireRole(UserRole.ADMIN);

/**
 * Middleware factory gating an admin area by access group.
 * Admins pass; staff need an access group that grants the section
 * and is inside its time window.
 */
export function requireSection(section: AccessSection) {
  return async (
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> => {
    const user = request.user;
    if (!user) {
      throw new AppError(
        "Authentication required",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    const now = new Date();
    if (canAccessSection(user, section, now)) return;

    if (user.accessGroup && !isAccessGroupActive(user.accessGroup, now)) {
      throw new AppError(
        "Your access group is not active at this time",
        403,
        true,
        ErrorCodes.ACCESS_GROUP_INACTIVE,
      );
    }

    throw new AppError(
      `No access to ${section}`,
      403,
      true,
      ErrorCodes.FORBIDDEN,
    );
  };
}
