// =============================================================================
// STRIPE PAYMENT SERVICE
// PaymentIntents, refunds and webhook verification for the receipt ledger
// =============================================================================

import Stripe from 'stripe';
import { config } from '@config/app.config.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

const stripeClient = config.stripe.secretKey ? new Stripe(config.stripe.secretKey) : null;

function getStripe(): Stripe {
  if (!stripeClient) {
    throw new AppError(
      'Stripe payments are not configured',
      503,
      true,
      ErrorCodes.PAYMENT_PROVIDER_NOT_CONFIGURED
    );
  }
  return stripeClient;
}

function providerError(action: string, error: unknown): AppError {
  logger.error({ err: error }, `Stripe ${action} failed`);
  return new AppError(
    `Payment provider error while trying to ${action}`,
    502,
    true,
    ErrorCodes.PAYMENT_PROVIDER_ERROR
  );
}

// =============================================================================
// TYPES
// =============================================================================

export interface CreatePaymentIntentInput {
  amount: number;
  currency: string;
  description: string;
  receiptEmail?: string;
  metadata?: Record<string, string>;
}

export interface CreatedPaymentIntent {
  id: string;
  clientSecret: string | null;
}

// =============================================================================
// PAYMENT INTENTS
// =============================================================================

export async function createPaymentIntent(
  input: CreatePaymentIntentInput
): Promise<CreatedPaymentIntent> {
  try {
    const intent = await getStripe().paymentIntents.create({
      amount: input.amount,
      currency: input.currency.toLowerCase(),
      description: input.description,
      receipt_email: input.receiptEmail,
      metadata: input.metadata,
      automatic_payment_methods: { enabled: true },
    });
    return { id: intent.id, clientSecret: intent.client_secret };
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw providerError('create a payment', error);
  }
}

/**
 * Fetch a PaymentIntent. Lookup failures are logged and reported as null.
 */
export async function retrievePaymentIntent(intentId: string): Promise<Stripe.PaymentIntent | null> {
  try {
    return await getStripe().paymentIntents.retrieve(intentId);
  } catch (error) {
    if (error instanceof AppError) throw error;
    logger.error({ err: error, intentId }, 'Unable to retrieve Stripe payment intent');
    return null;
  }
}

export async function cancelPaymentIntent(intentId: string): Promise<void> {
  try {
    await getStripe().paymentIntents.cancel(intentId);
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw providerError('cancel a payment', error);
  }
}

/**
 * The id of the charge that settled an intent, if any.
 */
export function getLatestChargeId(intent: Stripe.PaymentIntent): string | null {
  const charge = intent.latest_charge;
  if (!charge) return null;
  return typeof charge === 'string' ? charge : charge.id;
}

// =============================================================================
// REFUNDS
// =============================================================================

/**
 * Sum of every refund issued against a PaymentIntent.
 */
export async function getRefundedTotal(intentId: string): Promise<number> {
  try {
    let total = 0;
    for await (const refund of getStripe().refunds.list({ payment_intent: intentId, limit: 100 })) {
      total += refund.amount;
    }
    return total;
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw providerError('list refunds', error);
  }
}

export async function createRefund(intentId: string, amount: number): Promise<Stripe.Refund> {
  try {
    return await getStripe().refunds.create({ payment_intent: intentId, amount });
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw providerError('refund a payment', error);
  }
}

// =============================================================================
// WEBHOOKS
// =============================================================================

/**
 * Verify a webhook payload against its Stripe-Signature header.
 */
export function constructWebhookEvent(payload: Buffer | string, signature: string): Stripe.Event {
  if (!config.stripe.webhookSecret) {
    throw new AppError(
      'Stripe webhooks are not configured',
      503,
      true,
      ErrorCodes.PAYMENT_PROVIDER_NOT_CONFIGURED
    );
  }

  try {
    return getStripe().webhooks.constructEvent(payload, signature, config.stripe.webhookSecret);
  } catch (error) {
    if (error instanceof AppError) throw error;
    logger.warn({ err: error }, 'Rejected Stripe webhook with invalid signature');
    throw new AppError(
      'Invalid webhook signature',
      400,
      true,
      ErrorCodes.INVALID_WEBHOOK_SIGNATURE
    );
  }
}
