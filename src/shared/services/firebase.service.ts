import admin from 'firebase-admin';
import type { ServiceAccount } from 'firebase-admin/app';
import type { Auth } from 'firebase-admin/auth';
import { config } from '@config/app.config.js';

// Initialize Firebase Admin SDK
// Uses FIREBASE_SERVICE_ACCOUNT env var (JSON string) or falls back to GOOGLE_APPLICATION_CREDENTIALS
function getCredential() {
  if (config.firebase.serviceAccount) {
    const serviceAccount: ServiceAccount = JSON.parse(config.firebase.serviceAccount);
    return admin.credential.cert(serviceAccount);
  }
  // Fallback to application default (GOOGLE_APPLICATION_CREDENTIALS file path)
  return admin.credential.applicationDefault();
}

const app = admin.initializeApp({
  credential: getCredential(),
  projectId: config.firebase.projectId,
});

// Explicit type annotation fixes TypeScript inference error
export const firebaseAuth: Auth = app.auth();

/**
 * Verify Firebase ID token and return decoded token.
 */
export async function verifyToken(idToken: string) {
  return firebaseAuth.verifyIdToken(idToken);
}

/**
 * Create a new Firebase Auth user for a staff account.
 */
export async function createFirebaseUser(email: string, password: string) {
  return firebaseAuth.createUser({
    email,
    password,
    emailVerified: true, // Admin-created accounts are pre-verified
  });
}

/**
 * Delete a Firebase Auth user.
 */
export async function deleteFirebaseUser(uid: string): Promise<void> {
  await firebaseAuth.deleteUser(uid);
}
