import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import Stripe from 'stripe';
import { testDb } from '../mocks/database.js';
import '../mocks/firebase.js';
import { createTestApp } from '../helpers/test-app.js';
import { authenticateAs } from '../helpers/auth-helpers.js';
import { seedAttendee } from '../helpers/seed.js';
import { ErrorCodes } from '../../src/shared/errors/error-codes.js';
import { receiptTransactions } from '../../src/database/schema.js';
import { getOrCreateReceipt } from '../../src/modules/receipts/receipts.service.js';
import type { AppInstance } from '../../src/shared/types/fastify.js';

describe('Routes', () => {
  let app: AppInstance;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('staff routes', () => {
    it('should reject requests without a token', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/attendees' });

      expect(response.statusCode).toBe(401);
      expect(response.json().code).toBe(ErrorCodes.UNAUTHORIZED);
    });

    it('should reject staff without the section', async () => {
      const { headers } = await authenticateAs({ sections: ['groups'] });

      const response = await app.inject({ method: 'GET', url: '/api/attendees', headers });

      expect(response.statusCode).toBe(403);
    });

    it('should list attendees for staff with the section', async () => {
      const { headers } = await authenticateAs({ sections: ['attendees'] });
      await seedAttendee({ firstName: 'Robin', lastName: 'Lee' });

      const response = await app.inject({ method: 'GET', url: '/api/attendees?search=Robin', headers });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.meta.total).toBe(1);
      expect(body.data[0].lastName).toBe('Lee');
    });
  });

  describe('public routes', () => {
    it('should pre-register an attendee', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/public/attendees',
        payload: {
          data: {
            firstName: 'Robin',
            lastName: 'Lee',
            sameLegalName: true,
            email: 'robin@example.com',
            birthdate: '1990-05-17',
            ecName: 'Sam Lee',
            ecPhone: '555-555-0199',
            noOnsiteContact: true,
            address1: '1 Main St',
            city: 'Springfield',
            region: 'NY',
            zipCode: '10001',
            country: 'United States',
            piiConsent: true,
          },
        },
      });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body).toMatchObject({ firstName: 'Robin', badgeStatus: 'NEW', paid: 'NOT_PAID' });
      expect(body.compedReason).toBeUndefined();
    });

    it('should return field errors for an invalid registration', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/public/attendees',
        payload: { data: { firstName: 'Robin' } },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe(ErrorCodes.FORM_VALIDATION_ERROR);
    });

    it('should serve current prices', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/pricing' });

      expect(response.statusCode).toBe(200);
      expect(response.json().currency).toBe('USD');
    });
  });

  describe('stripe webhook', () => {
    it('should reject a delivery without a signature', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/webhooks/stripe',
        payload: { type: 'payment_intent.succeeded' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe(ErrorCodes.INVALID_WEBHOOK_SIGNATURE);
    });

    it('should record the charge from a signed delivery', async () => {
      const attendee = await seedAttendee();
      const receipt = await getOrCreateReceipt('Attendee', attendee.id);
      const [pending] = await testDb
        .insert(receiptTransactions)
        .values({ receiptId: receipt.id, intentId: 'pi_webhook', amount: 6500 })
        .returning();
      const payload = JSON.stringify({
        id: 'evt_webhook',
        object: 'event',
        type: 'payment_intent.succeeded',
        data: { object: { id: 'pi_webhook', object: 'payment_intent', latest_charge: 'ch_webhook' } },
      });
      const signature = Stripe.webhooks.generateTestHeaderString({
        payload,
        secret: 'whsec_test_placeholder',
      });

      const response = await app.inject({
        method: 'POST',
        url: '/api/webhooks/stripe',
        headers: { 'content-type': 'application/json', 'stripe-signature': signature },
        payload,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ received: true });
      const [row] = await testDb
        .select()
        .from(receiptTransactions)
        .where(eq(receiptTransactions.id, pending.id));
      expect(row.chargeId).toBe('ch_webhook');
    });

    it('should reject a delivery signed with another secret', async () => {
      const payload = JSON.stringify({ id: 'evt_forged', object: 'event', type: 'payment_intent.succeeded' });
      const signature = Stripe.webhooks.generateTestHeaderString({
        payload,
        secret: 'whsec_other_placeholder',
      });

      const response = await app.inject({
        method: 'POST',
        url: '/api/webhooks/stripe',
        headers: { 'content-type': 'application/json', 'stripe-signature': signature },
        payload,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe(ErrorCodes.INVALID_WEBHOOK_SIGNATURE);
    });
  });
});
