/**
 * Usage metering and support tickets.
 *
 * Usage records are attached to the customer's active subscription and
 * carry a copy of the plan limit in force when they were recorded.
 */

import { and, asc, eq, gte, lte } from 'drizzle-orm';
import {
  SupportTicketInputSchema,
  UsageInputSchema,
  type SupportTicketInput,
  type UsageInput,
} from '../contracts/index.js';
import {
  plans,
  subscriptions,
  supportTickets,
  usageRecords,
  type RevenueDb,
  type Subscription,
  type SupportTicket,
  type UsageRecord,
} from '../db/index.js';
import { RevenueLensError, formatZodIssues, wrapError } from '../runner/errors.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { addDays, toIsoTimestamp } from '../time/index.js';

export interface UsageOptions {
  now?: string;
  logger?: StructuredLogger;
}

export function findActiveSubscription(db: RevenueDb, customerId: string): Subscription | undefined {
  return db
    .select()
    .from(subscriptions)
    .where(and(eq(subscriptions.customer_id, customerId), eq(subscriptions.status, 'active')))
    .orderBy(asc(subscriptions.id))
    .get();
}

export function recordUsage(db: RevenueDb, input: UsageInput, opts: UsageOptions = {}): UsageRecord {
  const parsed = UsageInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid usage record: ${formatZodIssues(parsed.error)}`);
  }
  const data = parsed.data;

  const subscription = findActiveSubscription(db, data.customer_id);
  if (!subscription) {
    throw new RevenueLensError('NOT_FOUND', `No active subscription for customer ${data.customer_id}`);
  }

  const periodStart = data.period_start ?? subscription.current_period_start;
  const periodEnd = data.period_end ?? subscription.current_period_end;
  if (!periodStart || !periodEnd) {
    throw new RevenueLensError(
      'VALIDATION_ERROR',
      `Usage period required: subscription ${subscription.stripe_subscription_id} has no current period`,
    );
  }
  if (toIsoTimestamp(periodEnd) < toIsoTimestamp(periodStart)) {
    throw new RevenueLensError('VALIDATION_ERROR', 'period_end must not be before period_start');
  }

  const plan = db.select().from(plans).where(eq(plans.id, subscription.plan_id)).get();
  const limit = plan?.limits[data.metric_name];

  const record = db
    .insert(usageRecords)
    .values({
      subscription_id: subscription.id,
      metric_name: data.metric_name,
      quantity: data.quantity,
      limit: limit ?? null,
      period_start: toIsoTimestamp(periodStart),
      period_end: toIsoTimestamp(periodEnd),
      recorded_at: toIsoTimestamp(data.recorded_at ?? opts.now ?? new Date()),
    })
    .returning()
    .get();

  (opts.logger ?? silentLogger).debug('usage.recorded', `Recorded ${data.metric_name} for ${data.customer_id}`, {
    quantity: data.quantity,
    limit: limit ?? null,
  });
  return record;
}

export interface MetricSummary {
  total: number;
  limit: number | null;
  utilization: number;
}

/**
 * Per-metric totals for a subscription, optionally bounded to records
 * whose period lies inside [periodStart, periodEnd].
 */
export function getUsageSummary(
  db: RevenueDb,
  subscriptionId: number,
  opts: { periodStart?: string; periodEnd?: string } = {},
): Record<string, MetricSummary> {
  const records = db
    .select()
    .from(usageRecords)
    .where(
      and(
        eq(usageRecords.subscription_id, subscriptionId),
        ...(opts.periodStart ? [gte(usageRecords.period_start, toIsoTimestamp(opts.periodStart))] : []),
        ...(opts.periodEnd ? [lte(usageRecords.period_end, toIsoTimestamp(opts.periodEnd))] : []),
      ),
    )
    .orderBy(asc(usageRecords.recorded_at), asc(usageRecords.id))
    .all();

  return summarizeUsage(records);
}

/**
 * Sum quantities per metric. The limit is the one on the most recent
 * record, so a plan change mid-period is judged against the new plan.
 */
export function summarizeUsage(records: readonly UsageRecord[]): Record<string, MetricSummary> {
  const summary: Record<string, MetricSummary> = {};
  for (const record of records) {
    const entry = summary[record.metric_name] ?? { total: 0, limit: null, utilization: 0 };
    entry.total += record.quantity;
    entry.limit = record.limit;
    summary[record.metric_name] = entry;
  }
  for (const entry of Object.values(summary)) {
    entry.utilization = entry.limit !== null && entry.limit > 0 ? entry.total / entry.limit : 0;
  }
  return summary;
}

export interface BulkImportResult {
  imported: number;
  errors: Array<{ index: number; customer_id?: string; error: string }>;
}

/**
 * Record every row; rows that fail are reported and the rest still land.
 */
export function bulkImportUsage(
  db: RevenueDb,
  rows: readonly unknown[],
  opts: UsageOptions = {},
): BulkImportResult {
  const log = opts.logger ?? silentLogger;
  const result: BulkImportResult = { imported: 0, errors: [] };

  rows.forEach((row, index) => {
    try {
      const parsed = UsageInputSchema.safeParse(row);
      if (!parsed.success) {
        throw new RevenueLensError('VALIDATION_ERROR', formatZodIssues(parsed.error));
      }
      recordUsage(db, parsed.data, opts);
      result.imported++;
    } catch (err) {
      const envelope = wrapError(err);
      if (envelope.code === 'INTERNAL_ERROR') throw err;
      const customerId = customerIdOf(row);
      result.errors.push({ index, ...(customerId && { customer_id: customerId }), error: envelope.userMessage });
    }
  });

  log.info('usage.import', `Imported ${result.imported}/${rows.length} usage rows`, {
    imported: result.imported,
    failed: result.errors.length,
  });
  return result;
}

function customerIdOf(row: unknown): string | undefined {
  if (typeof row === 'object' && row !== null && 'customer_id' in row && typeof row.customer_id === 'string') {
    return row.customer_id;
  }
  return undefined;
}

/**
 * Relative change between the mean quantity of the older and newer half
 * of `records` (split at floor(n/2), ordered by recorded_at).
 * 0 when there are fewer than two records or the older half averages 0.
 */
export function calculateUsageTrend(records: readonly Pick<UsageRecord, 'quantity' | 'recorded_at'>[]): number {
  if (records.length < 2) return 0;

  const sorted = [...records].sort((a, b) => a.recorded_at.localeCompare(b.recorded_at));
  const mid = Math.floor(sorted.length / 2);
  const mean = (xs: typeof sorted): number => xs.reduce((sum, r) => sum + r.quantity, 0) / xs.length;

  const firstAvg = mean(sorted.slice(0, mid));
  const secondAvg = mean(sorted.slice(mid));
  if (firstAvg === 0) return 0;

  return (secondAvg - firstAvg) / firstAvg;
}

/** Records for a subscription with recorded_at in [now - days, now]. */
export function loadRecentUsage(db: RevenueDb, subscriptionId: number, days: number, now: string): UsageRecord[] {
  return db
    .select()
    .from(usageRecords)
    .where(
      and(
        eq(usageRecords.subscription_id, subscriptionId),
        gte(usageRecords.recorded_at, addDays(toIsoTimestamp(now), -days)),
        lte(usageRecords.recorded_at, toIsoTimestamp(now)),
      ),
    )
    .orderBy(asc(usageRecords.recorded_at), asc(usageRecords.id))
    .all();
}

/** Every usage record of a subscription, oldest first. */
export function loadUsage(db: RevenueDb, subscriptionId: number): UsageRecord[] {
  return db
    .select()
    .from(usageRecords)
    .where(eq(usageRecords.subscription_id, subscriptionId))
    .orderBy(asc(usageRecords.recorded_at), asc(usageRecords.id))
    .all();
}

// ============================================================================
// Support tickets
// ============================================================================

export function recordSupportTicket(
  db: RevenueDb,
  input: SupportTicketInput,
  opts: UsageOptions = {},
): SupportTicket {
  const parsed = SupportTicketInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid support ticket: ${formatZodIssues(parsed.error)}`);
  }
  const data = parsed.data;
  const subscription = findActiveSubscription(db, data.customer_id);

  return db
    .insert(supportTickets)
    .values({
      customer_id: data.customer_id,
      subscription_id: subscription?.id ?? null,
      severity: data.severity,
      subject: data.subject ?? null,
      opened_at: toIsoTimestamp(data.opened_at ?? opts.now ?? new Date()),
      resolved_at: data.resolved_at ? toIsoTimestamp(data.resolved_at) : null,
    })
    .returning()
    .get();
}

/** Tickets opened by the customer in the `days` days before `now`. */
export function countRecentTickets(db: RevenueDb, customerId: string, days: number, now: string): number {
  return db
    .select({ id: supportTickets.id })
    .from(supportTickets)
    .where(
      and(
        eq(supportTickets.customer_id, customerId),
        gte(supportTickets.opened_at, addDays(toIsoTimestamp(now), -days)),
        lte(supportTickets.opened_at, toIsoTimestamp(now)),
      ),
    )
    .all().length;
}
