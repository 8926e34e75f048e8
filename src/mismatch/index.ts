/**
 * Usage-versus-price mismatch detection.
 *
 * Compares what each active subscription uses in its current period
 * against its plan limits:
 * - heavy use of a low tier is an upgrade candidate (underpriced)
 * - light use of a high tier means the customer may be overpaying
 */

import { and, asc, eq, gte, lte } from 'drizzle-orm';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../contracts/index.js';
import {
  plans,
  subscriptions,
  usageRecords,
  type Plan,
  type RevenueDb,
  type Subscription,
} from '../db/index.js';
import { raiseAlert } from '../alerts/index.js';
import { findUpgradePlan } from '../catalog/index.js';
import { summarizeUsage, type MetricSummary } from '../usage/index.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { toIsoTimestamp } from '../time/index.js';

export type MismatchType = 'underpriced' | 'overpriced' | 'appropriate' | 'no_data';

export interface SubscriptionMismatch {
  type: MismatchType;
  subscription_id: number;
  customer_id: string;
  plan_name: string;
  mrr_cents: number;
  /** Mean of per-metric utilization, 0 when there is no usable metric. */
  utilization: number;
  usage_details: Record<string, MetricSummary>;
  recommendation?: string;
  alert_id?: number;
}

export interface MismatchAnalysis {
  upgrade_candidates: SubscriptionMismatch[];
  overpriced_customers: SubscriptionMismatch[];
  stats: {
    analyzed: number;
    underpriced: number;
    overpriced: number;
    appropriate: number;
    no_data: number;
    alerts_created: number;
  };
}

export interface FeatureMispricing {
  plan_id: number;
  plan_name: string;
  high_usage_percentage: number;
  total_customers: number;
  recommendation: string;
}

export interface MismatchOptions {
  thresholds?: Thresholds;
  now?: string;
  logger?: StructuredLogger;
}

function dollars(cents: number): string {
  return (cents / 100).toFixed(2);
}

/**
 * Usage of the subscription's current billing period, limited to metrics
 * with a positive limit.
 */
export function currentPeriodUsage(db: RevenueDb, subscription: Subscription): Record<string, MetricSummary> {
  if (!subscription.current_period_start || !subscription.current_period_end) return {};

  const records = db
    .select()
    .from(usageRecords)
    .where(
      and(
        eq(usageRecords.subscription_id, subscription.id),
        gte(usageRecords.period_start, subscription.current_period_start),
        lte(usageRecords.period_end, subscription.current_period_end),
      ),
    )
    .all();

  const summary = summarizeUsage(records);
  return Object.fromEntries(
    Object.entries(summary).filter(([, metric]) => metric.limit !== null && metric.limit > 0),
  );
}

export function overallUtilization(usage: Record<string, MetricSummary>): number {
  const metrics = Object.values(usage);
  if (metrics.length === 0) return 0;
  return metrics.reduce((sum, m) => sum + m.utilization, 0) / metrics.length;
}

export function suggestUpgrade(db: RevenueDb, plan: Plan): string {
  const next = findUpgradePlan(db, plan);
  if (!next) {
    return 'No higher tier available - consider custom pricing';
  }
  const increase = next.price_monthly_cents - plan.price_monthly_cents;
  return `Upgrade to ${next.name} ($${dollars(next.price_monthly_cents)}/mo) for $${dollars(increase)} additional MRR`;
}

export function analyzeSubscription(
  db: RevenueDb,
  subscription: Subscription,
  opts: MismatchOptions = {},
): SubscriptionMismatch & { alert_created: boolean } {
  const threshold = (opts.thresholds ?? DEFAULT_THRESHOLDS).usage_mismatch_threshold;
  const now = toIsoTimestamp(opts.now ?? new Date());
  const plan = db.select().from(plans).where(eq(plans.id, subscription.plan_id)).get();
  const usage = currentPeriodUsage(db, subscription);
  const utilization = overallUtilization(usage);

  const result = {
    subscription_id: subscription.id,
    customer_id: subscription.customer_id,
    plan_name: plan?.name ?? 'unknown',
    mrr_cents: subscription.mrr_cents,
    utilization,
    usage_details: usage,
  };

  if (Object.keys(usage).length === 0) {
    return { ...result, type: 'no_data', alert_created: false };
  }

  const percent = (utilization * 100).toFixed(1);

  if (utilization > threshold) {
    const { alert, created } = raiseAlert(
      db,
      {
        alert_type: 'usage_mismatch_high',
        severity: 'warning',
        subscription_id: subscription.id,
        customer_id: subscription.customer_id,
        title: `Upgrade Candidate: ${subscription.customer_id}`,
        description: `Customer is using ${percent}% of plan limits`,
        data: { utilization, usage },
        recommended_action: plan ? suggestUpgrade(db, plan) : null,
      },
      { dedupeBy: 'subscription', now },
    );
    return {
      ...result,
      type: 'underpriced',
      recommendation: 'Upgrade candidate - high usage',
      alert_id: alert.id,
      alert_created: created,
    };
  }

  if (utilization < 1 - threshold) {
    const { alert, created } = raiseAlert(
      db,
      {
        alert_type: 'usage_mismatch_low',
        severity: 'informational',
        subscription_id: subscription.id,
        customer_id: subscription.customer_id,
        title: `Low Utilization: ${subscription.customer_id}`,
        description: `Customer is only using ${percent}% of plan limits`,
        data: { utilization, usage },
        recommended_action: 'Consider offering a more appropriate plan',
      },
      { dedupeBy: 'subscription', now },
    );
    return {
      ...result,
      type: 'overpriced',
      recommendation: 'Customer may be overpaying',
      alert_id: alert.id,
      alert_created: created,
    };
  }

  return { ...result, type: 'appropriate', alert_created: false };
}

export function analyzeAllSubscriptions(db: RevenueDb, opts: MismatchOptions = {}): MismatchAnalysis {
  const log = opts.logger ?? silentLogger;
  const active = db
    .select()
    .from(subscriptions)
    .where(eq(subscriptions.status, 'active'))
    .orderBy(asc(subscriptions.id))
    .all();

  const analysis: MismatchAnalysis = {
    upgrade_candidates: [],
    overpriced_customers: [],
    stats: { analyzed: active.length, underpriced: 0, overpriced: 0, appropriate: 0, no_data: 0, alerts_created: 0 },
  };

  for (const subscription of active) {
    const { alert_created, ...mismatch } = analyzeSubscription(db, subscription, opts);
    analysis.stats[mismatch.type]++;
    if (alert_created) analysis.stats.alerts_created++;
    if (mismatch.type === 'underpriced') analysis.upgrade_candidates.push(mismatch);
    if (mismatch.type === 'overpriced') analysis.overpriced_customers.push(mismatch);
  }

  log.info('mismatch.analyzed', `Analyzed ${active.length} subscriptions`, { ...analysis.stats });
  return analysis;
}

/**
 * Plans where more than half of the active subscriptions run above the
 * high-usage ratio: the limits (or the price) are probably set too low.
 */
export function detectFeatureMispricing(db: RevenueDb, opts: MismatchOptions = {}): FeatureMispricing[] {
  const highUsageRatio = (opts.thresholds ?? DEFAULT_THRESHOLDS).feature_high_usage_ratio;
  const activePlans = db.select().from(plans).where(eq(plans.is_active, true)).all();
  const results: FeatureMispricing[] = [];

  for (const plan of activePlans) {
    const subs = db
      .select()
      .from(subscriptions)
      .where(and(eq(subscriptions.plan_id, plan.id), eq(subscriptions.status, 'active')))
      .all();
    if (subs.length === 0) continue;

    let highUsage = 0;
    for (const sub of subs) {
      const usage = currentPeriodUsage(db, sub);
      if (Object.keys(usage).length > 0 && overallUtilization(usage) > highUsageRatio) {
        highUsage++;
      }
    }

    const share = highUsage / subs.length;
    if (share > 0.5) {
      results.push({
        plan_id: plan.id,
        plan_name: plan.name,
        high_usage_percentage: share * 100,
        total_customers: subs.length,
        recommendation: 'Consider increasing limits or price for this plan',
      });
    }
  }

  return results;
}
