/**
 * Expansion readiness scoring.
 *
 * A 0-100 heuristic built from tenure, the 30-day usage trend and how much
 * of the plan limits the customer actually uses. Customers whose usage is
 * falling sharply are flagged likely_to_churn whatever their score.
 */

import { asc, eq } from 'drizzle-orm';
import type { ExpansionCategory } from '../contracts/index.js';
import { customerScores, subscriptions, type CustomerScore, type RevenueDb, type UsageRecord } from '../db/index.js';
import { RevenueLensError, wrapError } from '../runner/errors.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { daysBetween, toIsoTimestamp } from '../time/index.js';
import {
  calculateUsageTrend,
  countRecentTickets,
  findActiveSubscription,
  loadRecentUsage,
  loadUsage,
} from '../usage/index.js';

export const TREND_LOOKBACK_DAYS = 30;
export const TICKET_LOOKBACK_DAYS = 30;
export const CHURN_TREND = -0.2;
export const CHURN_PENALTY = 30;

export interface ScoreOptions {
  now?: string;
  logger?: StructuredLogger;
}

export function tenurePoints(tenureDays: number): number {
  if (tenureDays > 365) return 30;
  if (tenureDays > 180) return 20;
  if (tenureDays > 90) return 10;
  return 0;
}

export function trendPoints(trend: number): number {
  if (trend > 0.5) return 40;
  if (trend > 0.2) return 25;
  if (trend > 0) return 10;
  return 0;
}

/** Mean quantity/limit over records that carry a positive limit. */
export function engagementRatio(records: readonly Pick<UsageRecord, 'quantity' | 'limit'>[]): number {
  const ratios: number[] = [];
  for (const r of records) {
    if (r.limit !== null && r.limit > 0) ratios.push(r.quantity / r.limit);
  }
  if (ratios.length === 0) return 0;
  return ratios.reduce((sum, x) => sum + x, 0) / ratios.length;
}

export function categorize(score: number): ExpansionCategory {
  if (score >= 70) return 'safe_to_upsell';
  if (score >= 40) return 'neutral';
  return 'do_not_touch';
}

export interface ExpansionFactors {
  tenure_days: number;
  usage_trend: number;
  engagement: number;
}

/** Score and category from the raw factors; the score is rounded to an integer. */
export function computeExpansionScore(factors: ExpansionFactors): { score: number; category: ExpansionCategory } {
  let score =
    tenurePoints(factors.tenure_days) +
    trendPoints(factors.usage_trend) +
    Math.min(30, factors.engagement * 30);
  let category = categorize(score);

  if (factors.usage_trend < CHURN_TREND) {
    category = 'likely_to_churn';
    score = Math.max(0, score - CHURN_PENALTY);
  }
  return { score: Math.round(score), category };
}

export function scoreCustomer(db: RevenueDb, customerId: string, opts: ScoreOptions = {}): CustomerScore {
  const now = toIsoTimestamp(opts.now ?? new Date());
  const subscription = findActiveSubscription(db, customerId);
  if (!subscription) {
    throw new RevenueLensError('NOT_FOUND', `No active subscription for customer ${customerId}`);
  }

  const factors: ExpansionFactors = {
    tenure_days: Math.max(0, daysBetween(subscription.created_at, now)),
    usage_trend: calculateUsageTrend(loadRecentUsage(db, subscription.id, TREND_LOOKBACK_DAYS, now)),
    engagement: engagementRatio(loadUsage(db, subscription.id)),
  };
  const { score, category } = computeExpansionScore(factors);

  const values = {
    subscription_id: subscription.id,
    expansion_score: score,
    expansion_category: category,
    tenure_days: factors.tenure_days,
    usage_trend: factors.usage_trend,
    support_ticket_count: countRecentTickets(db, customerId, TICKET_LOOKBACK_DAYS, now),
    engagement_score: factors.engagement,
    calculated_at: now,
  };

  const row = db
    .insert(customerScores)
    .values({ customer_id: customerId, ...values })
    .onConflictDoUpdate({ target: customerScores.customer_id, set: values })
    .returning()
    .get();

  (opts.logger ?? silentLogger).debug('expansion.scored', `Scored ${customerId}`, {
    expansion_score: score,
    expansion_category: category,
  });
  return row;
}

export interface ScoreAllResult {
  scores: CustomerScore[];
  by_category: Record<ExpansionCategory, number>;
  errors: Array<{ customer_id: string; error: string }>;
}

export function scoreAllCustomers(db: RevenueDb, opts: ScoreOptions = {}): ScoreAllResult {
  const log = opts.logger ?? silentLogger;
  const customers = [
    ...new Set(
      db
        .select({ customer_id: subscriptions.customer_id })
        .from(subscriptions)
        .where(eq(subscriptions.status, 'active'))
        .orderBy(asc(subscriptions.customer_id))
        .all()
        .map((row) => row.customer_id),
    ),
  ];

  const result: ScoreAllResult = {
    scores: [],
    by_category: { safe_to_upsell: 0, neutral: 0, do_not_touch: 0, likely_to_churn: 0 },
    errors: [],
  };

  for (const customerId of customers) {
    try {
      const score = scoreCustomer(db, customerId, opts);
      result.scores.push(score);
      result.by_category[score.expansion_category]++;
    } catch (err) {
      const envelope = wrapError(err);
      if (envelope.code === 'INTERNAL_ERROR') throw err;
      result.errors.push({ customer_id: customerId, error: envelope.userMessage });
    }
  }

  log.info('expansion.scored_all', `Scored ${result.scores.length} customers`, { ...result.by_category });
  return result;
}

export function getCustomerScore(db: RevenueDb, customerId: string): CustomerScore | undefined {
  return db.select().from(customerScores).where(eq(customerScores.customer_id, customerId)).get();
}

export function listCustomerScores(db: RevenueDb, opts: { category?: ExpansionCategory } = {}): CustomerScore[] {
  return db
    .select()
    .from(customerScores)
    .where(opts.category ? eq(customerScores.expansion_category, opts.category) : undefined)
    .orderBy(asc(customerScores.customer_id))
    .all();
}
