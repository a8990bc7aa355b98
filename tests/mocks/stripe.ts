import { vi } from 'vitest';
import type Stripe from 'stripe';
import type {
  CreatePaymentIntentInput,
  CreatedPaymentIntent,
} from '@shared/services/stripe.service.js';

/**
 * Mock Stripe payment service.
 * Every provider call is a vi.fn; set return values per test.
 */
export const stripeServiceMock = {
  createPaymentIntent: vi.fn<(input: CreatePaymentIntentInput) => Promise<CreatedPaymentIntent>>(),
  retrievePaymentIntent: vi.fn<(intentId: string) => Promise<Stripe.PaymentIntent | null>>(),
  cancelPaymentIntent: vi.fn<(intentId: string) => Promise<void>>(),
  getRefundedTotal: vi.fn<(intentId: string) => Promise<number>>(),
  createRefund: vi.fn<(intentId: string, amount: number) => Promise<Stripe.Refund>>(),
  constructWebhookEvent: vi.fn<(payload: Buffer | string, signature: string) => Stripe.Event>(),
};

vi.mock('@shared/services/stripe.service.js', () => ({
  ...stripeServiceMock,
  getLatestChargeId: (intent: Stripe.PaymentIntent): string | null => {
    const charge = intent.latest_charge;
    if (!charge) return null;
    return typeof charge === 'string' ? charge : charge.id;
  },
}));

/**
 * Minimal PaymentIntent carrying the fields the ledger reads.
 */
export function createMockPaymentIntent(
  overrides: Partial<Stripe.PaymentIntent> = {}
): Stripe.PaymentIntent {
  const intent: Partial<Stripe.PaymentIntent> = {
    id: 'pi_test_123',
    object: 'payment_intent',
    amount: 6500,
    currency: 'usd',
    status: 'requires_payment_method',
    latest_charge: null,
    client_secret: 'pi_test_123_secret_test',
    ...overrides,
  };
  // Tests only read the fields above.
  return intent as Stripe.PaymentIntent;
}

/**
 * Minimal Refund carrying the fields the ledger reads.
 */
export function createMockRefund(overrides: Partial<Stripe.Refund> = {}): Stripe.Refund {
  const refund: Partial<Stripe.Refund> = {
    id: 're_test_123',
    object: 'refund',
    amount: 1000,
    currency: 'usd',
    status: 'succeeded',
    payment_intent: 'pi_test_123',
    ...overrides,
  };
  return refund as Stripe.Refund;
}

// ============================================================================
// Webhook events
// ============================================================================

export function createMockIntentSucceededEvent(intent: Stripe.PaymentIntent): Stripe.Event {
  const event: Partial<Stripe.PaymentIntentSucceededEvent> = {
    id: 'evt_test_succeeded',
    object: 'event',
    type: 'payment_intent.succeeded',
    data: { object: intent },
  };
  return event as Stripe.Event;
}

export function createMockIntentCanceledEvent(intent: Stripe.PaymentIntent): Stripe.Event {
  const event: Partial<Stripe.PaymentIntentCanceledEvent> = {
    id: 'evt_test_canceled',
    object: 'event',
    type: 'payment_intent.canceled',
    data: { object: intent },
  };
  return event as Stripe.Event;
}

export function createMockChargeRefundedEvent(intentId: string): Stripe.Event {
  const charge: Partial<Stripe.Charge> = {
    id: 'ch_test_123',
    object: 'charge',
    payment_intent: intentId,
    amount_refunded: 1000,
  };
  const event: Partial<Stripe.ChargeRefundedEvent> = {
    id: 'evt_test_refunded',
    object: 'event',
    type: 'charge.refunded',
    data: { object: charge as Stripe.Charge },
  };
  return event as Stripe.Event;
}
