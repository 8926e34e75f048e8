import type { SubscriptionStatus } from '../contracts/index.js';
import { createPlan, createProduct } from '../catalog/index.js';
import { openDatabase, type DatabaseHandle, type Plan, type RevenueDb } from '../db/index.js';
import { processWebhookEvent, type WebhookResult } from '../ingest/index.js';
import { RevenueLensError } from '../runner/errors.js';

export const NOW = '2024-06-15T12:00:00.000Z';
export const PERIOD_START = '2024-06-01T00:00:00.000Z';
export const PERIOD_END = '2024-07-01T00:00:00.000Z';
export const CATALOG_CREATED = '2024-01-01T00:00:00.000Z';

export function unix(iso: string): number {
  return Math.floor(new Date(iso).getTime() / 1000);
}

export function openTestDb(): DatabaseHandle {
  return openDatabase(':memory:');
}

/** Code of the RevenueLensError thrown by `fn`, or undefined when it does not throw. */
export function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof RevenueLensError ? err.code : `not a RevenueLensError: ${String(err)}`;
  }
  return undefined;
}

export interface TestCatalog {
  productId: number;
  starter: Plan;
  pro: Plan;
  enterprise: Plan;
}

/**
 * One product with three tiers:
 *   Starter    $29/mo   1,000 api_calls   price_starter
 *   Pro        $99/mo  10,000 api_calls   price_pro
 *   Enterprise $299/mo 100,000 api_calls  price_enterprise
 */
export function seedCatalog(db: RevenueDb): TestCatalog {
  const now = CATALOG_CREATED;
  const product = createProduct(db, { name: 'Analytics' }, { now });
  const plan = (name: string, cents: number, apiCalls: number, priceId: string): Plan =>
    createPlan(
      db,
      {
        product_id: product.id,
        name,
        price_monthly_cents: cents,
        limits: { api_calls: apiCalls },
        stripe_price_id: priceId,
      },
      { now },
    );

  return {
    productId: product.id,
    starter: plan('Starter', 2900, 1000, 'price_starter'),
    pro: plan('Pro', 9900, 10000, 'price_pro'),
    enterprise: plan('Enterprise', 29900, 100000, 'price_enterprise'),
  };
}

export interface SubscriptionFixture {
  id: string;
  customer: string;
  price: string;
  amount: number;
  status?: SubscriptionStatus;
  created?: string;
  quantity?: number;
  periodStart?: string;
  periodEnd?: string;
}

export function subscriptionObject(input: SubscriptionFixture): Record<string, unknown> {
  return {
    id: input.id,
    customer: input.customer,
    status: input.status ?? 'active',
    created: unix(input.created ?? CATALOG_CREATED),
    current_period_start: unix(input.periodStart ?? PERIOD_START),
    current_period_end: unix(input.periodEnd ?? PERIOD_END),
    items: {
      data: [
        {
          price: { id: input.price, unit_amount: input.amount, recurring: { interval: 'month', interval_count: 1 } },
          quantity: input.quantity ?? 1,
        },
      ],
    },
  };
}

export function webhook(type: string, eventId: string, object: Record<string, unknown>, occurredAt: string) {
  return { id: eventId, type, created: unix(occurredAt), data: { object } };
}

export type SubscriptionEventType =
  | 'customer.subscription.created'
  | 'customer.subscription.updated'
  | 'customer.subscription.deleted';

/** Apply a subscription webhook that occurred (and is processed) at `at`. */
export function sendSubscriptionEvent(
  db: RevenueDb,
  type: SubscriptionEventType,
  input: SubscriptionFixture,
  at: string,
  eventId = `evt_${input.id}_${type.split('.')[2] ?? type}_${unix(at)}`,
): WebhookResult {
  return processWebhookEvent(db, webhook(type, eventId, subscriptionObject(input), at), { now: at });
}

export function subscribe(db: RevenueDb, input: SubscriptionFixture): WebhookResult {
  return sendSubscriptionEvent(db, 'customer.subscription.created', input, input.created ?? CATALOG_CREATED);
}

export function failPayment(
  db: RevenueDb,
  opts: { eventId: string; subscription: string; attempt: number; amountDue: number; at: string },
): WebhookResult {
  return processWebhookEvent(
    db,
    webhook(
      'invoice.payment_failed',
      opts.eventId,
      { id: `in_${opts.eventId}`, subscription: opts.subscription, amount_due: opts.amountDue, attempt_count: opts.attempt },
      opts.at,
    ),
    { now: opts.at },
  );
}
