/**
 * Revenue risk detection.
 *
 * Each detector looks back a fixed window from `now` and raises alerts
 * through the alert store, which keeps one open alert per customer and
 * type. A scan returns only the alerts it newly created.
 */

import { and, asc, desc, eq, gte, inArray, lte } from 'drizzle-orm';
import { DEFAULT_THRESHOLDS, type AlertSeverity, type Thresholds } from '../contracts/index.js';
import {
  customerScores,
  mrrSnapshots,
  revenueEvents,
  subscriptions,
  supportTickets,
  type Alert,
  type RevenueDb,
  type Subscription,
} from '../db/index.js';
import { raiseAlert, type AlertInput, type DedupeScope } from '../alerts/index.js';
import { calculateUsageTrend, loadRecentUsage } from '../usage/index.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { addDays, isoDate, toIsoTimestamp } from '../time/index.js';

export const USAGE_LOOKBACK_DAYS = 30;
export const PAYMENT_LOOKBACK_DAYS = 7;
export const DOWNGRADE_LOOKBACK_DAYS = 30;
export const MRR_LOOKBACK_DAYS = 7;
export const TICKET_LOOKBACK_DAYS = 30;
/** Attempt count from which a failed payment is critical. */
export const CRITICAL_PAYMENT_ATTEMPTS = 3;
export const MIN_TICKETS_FOR_SPIKE = 2;

export interface RiskOptions {
  now?: string;
  thresholds?: Thresholds;
  logger?: StructuredLogger;
}

export interface RiskScanResult {
  critical: Alert[];
  warning: Alert[];
  informational: Alert[];
  stats: {
    declining_usage: number;
    payment_retry: number;
    plan_downgrade: number;
    mrr_decline: number;
    support_ticket_spike: number;
    churn_risk: number;
    total: number;
  };
}

interface ResolvedOptions {
  now: string;
  thresholds: Thresholds;
}

function resolve(opts: RiskOptions): ResolvedOptions {
  return {
    now: toIsoTimestamp(opts.now ?? new Date()),
    thresholds: opts.thresholds ?? DEFAULT_THRESHOLDS,
  };
}

function raiseIfNew(db: RevenueDb, input: AlertInput, dedupeBy: DedupeScope, now: string): Alert[] {
  const { alert, created } = raiseAlert(db, input, { dedupeBy, now });
  return created ? [alert] : [];
}

function activeSubscriptions(db: RevenueDb): Subscription[] {
  return db
    .select()
    .from(subscriptions)
    .where(eq(subscriptions.status, 'active'))
    .orderBy(asc(subscriptions.id))
    .all();
}

function subscriptionsById(db: RevenueDb, ids: number[]): Map<number, Subscription> {
  if (ids.length === 0) return new Map();
  const rows = db.select().from(subscriptions).where(inArray(subscriptions.id, ids)).all();
  return new Map(rows.map((s) => [s.id, s]));
}

function dollars(cents: number): string {
  return (cents / 100).toFixed(2);
}

export function detectDecliningUsage(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now, thresholds } = resolve(opts);
  const created: Alert[] = [];

  for (const sub of activeSubscriptions(db)) {
    const trend = calculateUsageTrend(loadRecentUsage(db, sub.id, USAGE_LOOKBACK_DAYS, now));
    if (trend >= thresholds.declining_usage_trend) continue;

    created.push(
      ...raiseIfNew(
        db,
        {
          alert_type: 'declining_usage',
          severity: 'warning',
          subscription_id: sub.id,
          customer_id: sub.customer_id,
          title: `Declining Usage: ${sub.customer_id}`,
          description: `Usage declined ${(Math.abs(trend) * 100).toFixed(1)}% over ${USAGE_LOOKBACK_DAYS} days`,
          data: { trend, lookback_days: USAGE_LOOKBACK_DAYS },
          recommended_action: 'Reach out to understand usage decline',
        },
        'customer',
        now,
      ),
    );
  }
  return created;
}

function attemptCountOf(metadata: Record<string, unknown>): number {
  const value = metadata['attempt_count'];
  return typeof value === 'number' && Number.isFinite(value) ? value : 1;
}

export function detectPaymentIssues(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now } = resolve(opts);
  const failures = db
    .select()
    .from(revenueEvents)
    .where(
      and(
        eq(revenueEvents.event_type, 'payment_failed'),
        gte(revenueEvents.occurred_at, addDays(now, -PAYMENT_LOOKBACK_DAYS)),
        lte(revenueEvents.occurred_at, now),
      ),
    )
    .orderBy(desc(revenueEvents.occurred_at), desc(revenueEvents.id))
    .all();
  const subs = subscriptionsById(db, [...new Set(failures.map((e) => e.subscription_id))]);
  const created: Alert[] = [];

  // Newest failure first, so the open alert reflects the latest attempt count.
  for (const event of failures) {
    const sub = subs.get(event.subscription_id);
    if (!sub) continue;
    const attempts = attemptCountOf(event.metadata);
    const severity: AlertSeverity = attempts < CRITICAL_PAYMENT_ATTEMPTS ? 'warning' : 'critical';

    created.push(
      ...raiseIfNew(
        db,
        {
          alert_type: 'payment_retry',
          severity,
          subscription_id: sub.id,
          customer_id: sub.customer_id,
          title: `Payment Issue: ${sub.customer_id}`,
          description: `Payment failed (attempt ${attempts})`,
          data: { retry_count: attempts, amount_cents: event.amount_cents },
          recommended_action: 'Contact customer about payment method',
        },
        'customer',
        now,
      ),
    );
  }
  return created;
}

export function detectDowngrades(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now } = resolve(opts);
  const downgrades = db
    .select()
    .from(revenueEvents)
    .where(
      and(
        eq(revenueEvents.event_type, 'subscription_downgraded'),
        gte(revenueEvents.occurred_at, addDays(now, -DOWNGRADE_LOOKBACK_DAYS)),
        lte(revenueEvents.occurred_at, now),
      ),
    )
    .orderBy(desc(revenueEvents.occurred_at), desc(revenueEvents.id))
    .all();
  const subs = subscriptionsById(db, [...new Set(downgrades.map((e) => e.subscription_id))]);
  const created: Alert[] = [];

  for (const event of downgrades) {
    const sub = subs.get(event.subscription_id);
    if (!sub) continue;

    created.push(
      ...raiseIfNew(
        db,
        {
          alert_type: 'plan_downgrade',
          severity: 'warning',
          subscription_id: sub.id,
          customer_id: sub.customer_id,
          title: `Recent Downgrade: ${sub.customer_id}`,
          description: `Plan downgraded, MRR decreased by $${dollars(Math.abs(event.mrr_delta_cents))}`,
          data: { mrr_delta_cents: event.mrr_delta_cents, occurred_at: event.occurred_at },
          recommended_action: 'Follow up to understand reason for downgrade',
        },
        'customer',
        now,
      ),
    );
  }
  return created;
}

/**
 * Compare the newest snapshot of the last week with the oldest one in
 * the same window.
 */
export function detectMrrDecline(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now, thresholds } = resolve(opts);
  const snapshots = db
    .select()
    .from(mrrSnapshots)
    .where(
      and(
        gte(mrrSnapshots.date, isoDate(addDays(now, -MRR_LOOKBACK_DAYS))),
        lte(mrrSnapshots.date, isoDate(now)),
      ),
    )
    .orderBy(desc(mrrSnapshots.date))
    .limit(MRR_LOOKBACK_DAYS)
    .all();

  const latest = snapshots[0];
  const earliest = snapshots[snapshots.length - 1];
  if (snapshots.length < 2 || !latest || !earliest || earliest.total_mrr_cents === 0) return [];

  const changePercent = ((latest.total_mrr_cents - earliest.total_mrr_cents) / earliest.total_mrr_cents) * 100;
  const decline = -changePercent;

  let severity: AlertSeverity;
  if (decline > thresholds.mrr_decline_critical_percent) {
    severity = 'critical';
  } else if (decline > thresholds.mrr_decline_warning_percent) {
    severity = 'warning';
  } else {
    return [];
  }

  return raiseIfNew(
    db,
    {
      alert_type: 'mrr_decline',
      severity,
      title: 'MRR Decline Alert',
      description: `MRR declined ${decline.toFixed(1)}% over ${MRR_LOOKBACK_DAYS} days`,
      data: {
        decline_percent: changePercent,
        current_mrr_cents: latest.total_mrr_cents,
        previous_mrr_cents: earliest.total_mrr_cents,
        churned_mrr_cents: latest.churned_mrr_cents,
        new_mrr_cents: latest.new_mrr_cents,
      },
      recommended_action: 'Review churn reasons and retention strategy',
    },
    'type',
    now,
  );
}

/**
 * Customers opening far more tickets than the customer base does: at
 * least MIN_TICKETS_FOR_SPIKE tickets and at least the spike threshold
 * times the mean over customers with an active subscription.
 */
export function detectSupportTicketSpike(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now, thresholds } = resolve(opts);
  const active = activeSubscriptions(db);
  const customers = [...new Set(active.map((s) => s.customer_id))];
  if (customers.length === 0) return [];

  const tickets = db
    .select({ customer_id: supportTickets.customer_id })
    .from(supportTickets)
    .where(
      and(
        inArray(supportTickets.customer_id, customers),
        gte(supportTickets.opened_at, addDays(now, -TICKET_LOOKBACK_DAYS)),
        lte(supportTickets.opened_at, now),
      ),
    )
    .all();

  const counts = new Map<string, number>(customers.map((c) => [c, 0]));
  for (const t of tickets) counts.set(t.customer_id, (counts.get(t.customer_id) ?? 0) + 1);
  const mean = tickets.length / customers.length;
  const created: Alert[] = [];

  for (const sub of active) {
    const count = counts.get(sub.customer_id) ?? 0;
    if (count < MIN_TICKETS_FOR_SPIKE || count < thresholds.support_ticket_spike_threshold * mean) continue;

    created.push(
      ...raiseIfNew(
        db,
        {
          alert_type: 'support_ticket_spike',
          severity: 'warning',
          subscription_id: sub.id,
          customer_id: sub.customer_id,
          title: `Support Ticket Spike: ${sub.customer_id}`,
          description: `${count} tickets in ${TICKET_LOOKBACK_DAYS} days (average ${mean.toFixed(1)})`,
          data: { ticket_count: count, average_ticket_count: mean, lookback_days: TICKET_LOOKBACK_DAYS },
          recommended_action: 'Review open tickets and schedule a check-in',
        },
        'customer',
        now,
      ),
    );
  }
  return created;
}

/** Customers whose last expansion score put them in likely_to_churn. */
export function detectChurnRisk(db: RevenueDb, opts: RiskOptions = {}): Alert[] {
  const { now } = resolve(opts);
  const scores = db
    .select()
    .from(customerScores)
    .where(eq(customerScores.expansion_category, 'likely_to_churn'))
    .orderBy(asc(customerScores.customer_id))
    .all();
  const active = new Map(activeSubscriptions(db).map((s) => [s.customer_id, s]));
  const created: Alert[] = [];

  for (const score of scores) {
    const sub = active.get(score.customer_id);
    if (!sub) continue;

    created.push(
      ...raiseIfNew(
        db,
        {
          alert_type: 'churn_risk',
          severity: 'warning',
          subscription_id: sub.id,
          customer_id: sub.customer_id,
          title: `Churn Risk: ${sub.customer_id}`,
          description: `Usage trend ${(score.usage_trend * 100).toFixed(1)}% with expansion score ${score.expansion_score}`,
          data: { expansion_score: score.expansion_score, usage_trend: score.usage_trend, calculated_at: score.calculated_at },
          recommended_action: 'Prioritize a retention conversation',
        },
        'customer',
        now,
      ),
    );
  }
  return created;
}

export function scanAllRisks(db: RevenueDb, opts: RiskOptions = {}): RiskScanResult {
  const log = opts.logger ?? silentLogger;
  const byDetector = {
    declining_usage: detectDecliningUsage(db, opts),
    payment_retry: detectPaymentIssues(db, opts),
    plan_downgrade: detectDowngrades(db, opts),
    mrr_decline: detectMrrDecline(db, opts),
    support_ticket_spike: detectSupportTicketSpike(db, opts),
    churn_risk: detectChurnRisk(db, opts),
  };

  const result: RiskScanResult = {
    critical: [],
    warning: [],
    informational: [],
    stats: {
      declining_usage: byDetector.declining_usage.length,
      payment_retry: byDetector.payment_retry.length,
      plan_downgrade: byDetector.plan_downgrade.length,
      mrr_decline: byDetector.mrr_decline.length,
      support_ticket_spike: byDetector.support_ticket_spike.length,
      churn_risk: byDetector.churn_risk.length,
      total: 0,
    },
  };

  for (const alert of Object.values(byDetector).flat()) {
    result[alert.severity].push(alert);
    result.stats.total++;
  }

  log.info('risk.scan', `Risk scan created ${result.stats.total} alerts`, { ...result.stats });
  return result;
}
