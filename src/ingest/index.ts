/**
 * Webhook ingestion.
 *
 * Turns Stripe-shaped webhook events into subscription rows and the
 * revenue-event ledger. Each event is applied in its own transaction and
 * at most once per webhook event id; applied ids are kept in
 * `processed_webhooks`.
 */

import { eq } from 'drizzle-orm';
import type { z, ZodTypeAny } from 'zod';
import {
  StripeInvoiceSchema,
  StripeSubscriptionSchema,
  WebhookEventSchema,
  type RevenueEventType,
  type StripeSubscription,
  type WebhookEvent,
} from '../contracts/index.js';
import {
  processedWebhooks,
  revenueEvents,
  subscriptions,
  type RevenueDb,
  type Subscription,
} from '../db/index.js';
import { findPlanByStripePriceId } from '../catalog/index.js';
import { RevenueLensError, formatZodIssues, wrapError } from '../runner/errors.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { fromUnixSeconds, toIsoTimestamp } from '../time/index.js';
import { calculateSubscriptionMrr } from './mrr.js';

export { calculateSubscriptionMrr, normalizeToMonthlyCents } from './mrr.js';

export const HANDLED_EVENT_TYPES = [
  'customer.subscription.created',
  'customer.subscription.updated',
  'customer.subscription.deleted',
  'invoice.payment_succeeded',
  'invoice.payment_failed',
] as const;

export type IngestOutcome = 'applied' | 'duplicate' | 'ignored' | 'skipped';

export interface WebhookResult {
  outcome: IngestOutcome;
  event_type: string;
  event_id?: string;
  reason?: string;
  subscription_id?: number;
  revenue_event_type?: RevenueEventType;
  mrr_delta_cents?: number;
}

export interface IngestOptions {
  /** Processing time; also the occurrence time of events without `created`. */
  now?: string;
  logger?: StructuredLogger;
}

interface EventContext {
  eventId: string | null;
  occurredAt: string;
  processedAt: string;
}

export function processWebhookEvent(
  db: RevenueDb,
  rawEvent: unknown,
  opts: IngestOptions = {},
): WebhookResult {
  const log = opts.logger ?? silentLogger;
  const parsed = WebhookEventSchema.safeParse(rawEvent);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid webhook event: ${formatZodIssues(parsed.error)}`);
  }
  const event = parsed.data;
  const processedAt = toIsoTimestamp(opts.now ?? new Date());
  const ctx: EventContext = {
    eventId: event.id ?? null,
    occurredAt: event.created !== undefined ? fromUnixSeconds(event.created) : processedAt,
    processedAt,
  };
  const base = { event_type: event.type, ...(event.id && { event_id: event.id }) };

  if (ctx.eventId !== null && isDuplicate(db, ctx.eventId)) {
    log.debug('ingest.duplicate', `Event ${ctx.eventId} already processed`);
    return { ...base, outcome: 'duplicate' };
  }

  const result = db.transaction((tx): Omit<WebhookResult, 'event_type' | 'event_id'> => {
    const applied = dispatch(tx, event, ctx);
    // Skipped and ignored events stay replayable: a later catalog sync or
    // subscription may make them applicable.
    if (applied.outcome === 'applied' && ctx.eventId !== null) {
      tx.insert(processedWebhooks)
        .values({ event_id: ctx.eventId, event_type: event.type, processed_at: ctx.processedAt })
        .run();
    }
    return applied;
  });

  log.info('ingest.event', `${event.type}: ${result.outcome}`, { ...base, ...result });
  return { ...base, ...result };
}

function dispatch(tx: RevenueDb, event: WebhookEvent, ctx: EventContext): Omit<WebhookResult, 'event_type' | 'event_id'> {
  switch (event.type) {
    case 'customer.subscription.created':
      return handleSubscriptionCreated(tx, parseObject(event, StripeSubscriptionSchema), ctx);
    case 'customer.subscription.updated':
      return handleSubscriptionUpdated(tx, parseObject(event, StripeSubscriptionSchema), ctx);
    case 'customer.subscription.deleted':
      return handleSubscriptionDeleted(tx, parseObject(event, StripeSubscriptionSchema), ctx);
    case 'invoice.payment_succeeded':
    case 'invoice.payment_failed':
      return handleInvoice(tx, event, ctx);
    default:
      return { outcome: 'ignored', reason: 'unhandled_event_type' };
  }
}

function isDuplicate(db: RevenueDb, eventId: string): boolean {
  const row = db
    .select({ event_id: processedWebhooks.event_id })
    .from(processedWebhooks)
    .where(eq(processedWebhooks.event_id, eventId))
    .get();
  return row !== undefined;
}

function parseObject<S extends ZodTypeAny>(event: WebhookEvent, schema: S): z.output<S> {
  const result = schema.safeParse(event.data.object);
  if (!result.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid ${event.type} payload: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

function findSubscription(tx: RevenueDb, stripeSubscriptionId: string): Subscription | undefined {
  return tx
    .select()
    .from(subscriptions)
    .where(eq(subscriptions.stripe_subscription_id, stripeSubscriptionId))
    .get();
}

function periodsOf(sub: StripeSubscription): { current_period_start?: string; current_period_end?: string } {
  return {
    ...(sub.current_period_start !== undefined && { current_period_start: fromUnixSeconds(sub.current_period_start) }),
    ...(sub.current_period_end !== undefined && { current_period_end: fromUnixSeconds(sub.current_period_end) }),
  };
}

function firstPriceId(sub: StripeSubscription): string | undefined {
  return sub.items.data[0]?.price.id;
}

function handleSubscriptionCreated(
  tx: RevenueDb,
  sub: StripeSubscription,
  ctx: EventContext,
): Omit<WebhookResult, 'event_type' | 'event_id'> {
  if (findSubscription(tx, sub.id)) {
    return handleSubscriptionUpdated(tx, sub, ctx);
  }

  const priceId = firstPriceId(sub);
  const plan = priceId ? findPlanByStripePriceId(tx, priceId) : undefined;
  if (!plan) {
    return { outcome: 'skipped', reason: 'plan_not_found' };
  }

  const mrr = calculateSubscriptionMrr(sub.items.data);
  const created = tx
    .insert(subscriptions)
    .values({
      stripe_subscription_id: sub.id,
      customer_id: sub.customer,
      plan_id: plan.id,
      status: sub.status,
      current_period_start: null,
      current_period_end: null,
      ...periodsOf(sub),
      mrr_cents: mrr,
      created_at: sub.created !== undefined ? fromUnixSeconds(sub.created) : ctx.occurredAt,
      updated_at: ctx.processedAt,
    })
    .returning()
    .get();

  tx.insert(revenueEvents)
    .values({
      subscription_id: created.id,
      event_type: 'subscription_created',
      stripe_event_id: ctx.eventId,
      amount_cents: mrr,
      currency: plan.currency,
      mrr_delta_cents: mrr,
      metadata: { plan_name: plan.name },
      occurred_at: ctx.occurredAt,
      processed_at: ctx.processedAt,
    })
    .run();

  return {
    outcome: 'applied',
    subscription_id: created.id,
    revenue_event_type: 'subscription_created',
    mrr_delta_cents: mrr,
  };
}

function handleSubscriptionUpdated(
  tx: RevenueDb,
  sub: StripeSubscription,
  ctx: EventContext,
): Omit<WebhookResult, 'event_type' | 'event_id'> {
  const existing = findSubscription(tx, sub.id);
  if (!existing) {
    return handleSubscriptionCreated(tx, sub, ctx);
  }

  const newMrr = calculateSubscriptionMrr(sub.items.data);
  const delta = newMrr - existing.mrr_cents;
  const priceId = firstPriceId(sub);
  const plan = priceId ? findPlanByStripePriceId(tx, priceId) : undefined;

  tx.update(subscriptions)
    .set({
      status: sub.status,
      mrr_cents: newMrr,
      ...periodsOf(sub),
      ...(plan && { plan_id: plan.id }),
      updated_at: ctx.processedAt,
    })
    .where(eq(subscriptions.id, existing.id))
    .run();

  if (delta === 0) {
    return { outcome: 'applied', subscription_id: existing.id, mrr_delta_cents: 0 };
  }

  const eventType: RevenueEventType = delta > 0 ? 'subscription_upgraded' : 'subscription_downgraded';
  tx.insert(revenueEvents)
    .values({
      subscription_id: existing.id,
      event_type: eventType,
      stripe_event_id: ctx.eventId,
      amount_cents: Math.abs(delta),
      currency: plan?.currency ?? 'USD',
      mrr_delta_cents: delta,
      metadata: { old_mrr_cents: existing.mrr_cents, new_mrr_cents: newMrr },
      occurred_at: ctx.occurredAt,
      processed_at: ctx.processedAt,
    })
    .run();

  return { outcome: 'applied', subscription_id: existing.id, revenue_event_type: eventType, mrr_delta_cents: delta };
}

function handleSubscriptionDeleted(
  tx: RevenueDb,
  sub: StripeSubscription,
  ctx: EventContext,
): Omit<WebhookResult, 'event_type' | 'event_id'> {
  const existing = findSubscription(tx, sub.id);
  if (!existing) {
    return { outcome: 'ignored', reason: 'subscription_not_found' };
  }
  if (existing.status === 'canceled') {
    return { outcome: 'ignored', reason: 'already_canceled', subscription_id: existing.id };
  }

  tx.update(subscriptions)
    .set({ status: 'canceled', canceled_at: ctx.occurredAt, mrr_cents: 0, updated_at: ctx.processedAt })
    .where(eq(subscriptions.id, existing.id))
    .run();

  tx.insert(revenueEvents)
    .values({
      subscription_id: existing.id,
      event_type: 'subscription_canceled',
      stripe_event_id: ctx.eventId,
      amount_cents: existing.mrr_cents,
      mrr_delta_cents: -existing.mrr_cents,
      metadata: { canceled_mrr_cents: existing.mrr_cents },
      occurred_at: ctx.occurredAt,
      processed_at: ctx.processedAt,
    })
    .run();

  return {
    outcome: 'applied',
    subscription_id: existing.id,
    revenue_event_type: 'subscription_canceled',
    mrr_delta_cents: -existing.mrr_cents,
  };
}

function handleInvoice(
  tx: RevenueDb,
  event: WebhookEvent,
  ctx: EventContext,
): Omit<WebhookResult, 'event_type' | 'event_id'> {
  const invoice = parseObject(event, StripeInvoiceSchema);
  if (!invoice.subscription) {
    return { outcome: 'ignored', reason: 'invoice_without_subscription' };
  }
  const existing = findSubscription(tx, invoice.subscription);
  if (!existing) {
    return { outcome: 'ignored', reason: 'subscription_not_found' };
  }

  const failed = event.type === 'invoice.payment_failed';
  const eventType: RevenueEventType = failed ? 'payment_failed' : 'payment_succeeded';

  tx.insert(revenueEvents)
    .values({
      subscription_id: existing.id,
      event_type: eventType,
      stripe_event_id: ctx.eventId,
      amount_cents: failed ? invoice.amount_due : invoice.amount_paid,
      currency: invoice.currency,
      mrr_delta_cents: 0,
      metadata: failed
        ? { attempt_count: invoice.attempt_count, ...(invoice.id && { invoice_id: invoice.id }) }
        : { ...(invoice.id && { invoice_id: invoice.id }) },
      occurred_at: ctx.occurredAt,
      processed_at: ctx.processedAt,
    })
    .run();

  return { outcome: 'applied', subscription_id: existing.id, revenue_event_type: eventType };
}

// ============================================================================
// Batch ingestion
// ============================================================================

export interface IngestBatchResult {
  results: WebhookResult[];
  errors: Array<{ index: number; event_id?: string; error: string }>;
  stats: {
    total: number;
    applied: number;
    duplicate: number;
    ignored: number;
    skipped: number;
    invalid: number;
    byType: Record<string, number>;
  };
}

/**
 * Apply events in order. Invalid events are collected with their index
 * instead of aborting the batch.
 */
export function ingestWebhookEvents(
  db: RevenueDb,
  rawEvents: readonly unknown[],
  opts: IngestOptions = {},
): IngestBatchResult {
  const log = opts.logger ?? silentLogger;
  const results: WebhookResult[] = [];
  const errors: IngestBatchResult['errors'] = [];
  const stats: IngestBatchResult['stats'] = {
    total: rawEvents.length,
    applied: 0,
    duplicate: 0,
    ignored: 0,
    skipped: 0,
    invalid: 0,
    byType: {},
  };

  rawEvents.forEach((raw, index) => {
    try {
      const result = processWebhookEvent(db, raw, opts);
      results.push(result);
      stats[result.outcome]++;
      stats.byType[result.event_type] = (stats.byType[result.event_type] ?? 0) + 1;
    } catch (err) {
      const envelope = wrapError(err);
      if (envelope.code !== 'VALIDATION_ERROR') throw err;
      stats.invalid++;
      const eventId = eventIdOf(raw);
      errors.push({ index, ...(eventId && { event_id: eventId }), error: envelope.userMessage });
      log.warn('ingest.invalid', `Event at index ${index} rejected`, { error: envelope.userMessage });
    }
  });

  log.info('ingest.batch', `Ingested ${stats.total} events`, { ...stats });
  return { results, errors, stats };
}

function eventIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return undefined;
}
