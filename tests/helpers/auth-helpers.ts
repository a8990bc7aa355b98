import { firebaseAuthMock, createMockDecodedToken } from '../mocks/firebase.js';
import { seedAccessGroup, seedUser } from './seed.js';
import { clearUserCache } from '@shared/middleware/auth.middleware.js';
import type { AccessSection } from '@modules/identity/permissions.js';
import type { User } from '@/database/schema.js';

// ============================================================================
// Types
// ============================================================================

export interface AuthenticatedUserOptions {
  role?: 0 | 1;
  sections?: AccessSection[];
  startTime?: Date | null;
  endTime?: Date | null;
  active?: boolean;
}

export interface AuthResult {
  user: User;
  token: string;
  headers: Record<string, string>;
}

// ============================================================================
// Auth Helpers
// ============================================================================

/**
 * Insert a user (and access group, for staff) and make their token verify.
 *
 * @example
 * const { headers } = await authenticateAs({ role: 0 }); // Admin
 * const response = await app.inject({ method: 'GET', url: '/api/users/me', headers });
 */
export async function authenticateAs(options: AuthenticatedUserOptions = {}): Promise<AuthResult> {
  clearUserCache();

  const role = options.role ?? 1;
  const accessGroup =
    role === 1
      ? await seedAccessGroup({
          sections: options.sections ?? [],
          startTime: options.startTime ?? null,
          endTime: options.endTime ?? null,
        })
      : null;

  const user = await seedUser({
    role,
    active: options.active ?? true,
    accessGroupId: accessGroup?.id ?? null,
  });

  const token = `test-token-${user.id}`;
  firebaseAuthMock.verifyIdToken.mockImplementation(async (candidate) => {
    if (candidate !== token) throw new Error('Invalid token');
    return createMockDecodedToken({ uid: user.id, sub: user.id, email: user.email });
  });

  return {
    user,
    token,
    headers: { authorization: `Bearer ${token}` },
  };
}
