import { vi } from 'vitest';
import type { DecodedIdToken, UserRecord } from 'firebase-admin/auth';

/**
 * Mock Firebase Auth service.
 * Provides mocked methods for token verification and user management.
 */
export const firebaseAuthMock = {
  verifyIdToken: vi.fn<(token: string) => Promise<DecodedIdToken>>(),
  createUser: vi.fn<(email: string, password: string) => Promise<Pick<UserRecord, 'uid'>>>(),
  deleteUser: vi.fn<(uid: string) => Promise<void>>(),
};

// Mock the firebase service module
vi.mock('@shared/services/firebase.service.js', () => ({
  firebaseAuth: firebaseAuthMock,
  verifyToken: firebaseAuthMock.verifyIdToken,
  createFirebaseUser: firebaseAuthMock.createUser,
  deleteFirebaseUser: firebaseAuthMock.deleteUser,
}));

/**
 * Helper to create a mock decoded token for testing.
 */
export function createMockDecodedToken(
  overrides: Partial<DecodedIdToken> = {}
): DecodedIdToken {
  return {
    uid: 'firebase-uid-123',
    email: 'test@example.com',
    email_verified: true,
    aud: 'demo-project',
    auth_time: Math.floor(Date.now() / 1000) - 3600,
    exp: Math.floor(Date.now() / 1000) + 3600,
    iat: Math.floor(Date.now() / 1000),
    iss: 'https://securetoken.google.com/demo-project',
    sub: 'firebase-uid-123',
    firebase: {
      identities: {},
      sign_in_provider: 'password',
    },
    ...overrides,
  };
}
