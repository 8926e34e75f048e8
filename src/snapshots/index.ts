/**
 * Daily MRR snapshots.
 *
 * A snapshot records the MRR of active subscriptions on a UTC calendar
 * day, plus that day's movements from the revenue-event ledger split
 * into new / expansion / contraction / churn.
 */

import { and, asc, desc, eq, gte, lt } from 'drizzle-orm';
import { DateSchema } from '../contracts/index.js';
import {
  mrrSnapshots,
  plans,
  products,
  revenueEvents,
  subscriptions,
  type MrrSnapshot,
  type RevenueDb,
} from '../db/index.js';
import { RevenueLensError } from '../runner/errors.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { addDays, isoDate, startOfDay, toIsoTimestamp } from '../time/index.js';

export interface SnapshotOptions {
  /** `YYYY-MM-DD`; defaults to the UTC date of `now`. */
  date?: string;
  now?: string;
  logger?: StructuredLogger;
}

export interface MrrMovements {
  new_mrr_cents: number;
  expansion_mrr_cents: number;
  contraction_mrr_cents: number;
  churned_mrr_cents: number;
}

export function getCurrentMrr(db: RevenueDb): number {
  return db
    .select({ mrr: subscriptions.mrr_cents })
    .from(subscriptions)
    .where(eq(subscriptions.status, 'active'))
    .all()
    .reduce((sum, row) => sum + row.mrr, 0);
}

/** Active MRR per product name. */
export function getProductBreakdown(db: RevenueDb): Record<string, number> {
  const rows = db
    .select({ product: products.name, mrr: subscriptions.mrr_cents })
    .from(subscriptions)
    .innerJoin(plans, eq(subscriptions.plan_id, plans.id))
    .innerJoin(products, eq(plans.product_id, products.id))
    .where(eq(subscriptions.status, 'active'))
    .all();

  const breakdown: Record<string, number> = {};
  for (const row of rows) {
    breakdown[row.product] = (breakdown[row.product] ?? 0) + row.mrr;
  }
  return breakdown;
}

/** Movements from revenue events with occurred_at in [from, to). */
export function calculateMovements(db: RevenueDb, from: string, to: string): MrrMovements {
  const events = db
    .select({ type: revenueEvents.event_type, delta: revenueEvents.mrr_delta_cents })
    .from(revenueEvents)
    .where(and(gte(revenueEvents.occurred_at, from), lt(revenueEvents.occurred_at, to)))
    .all();

  const movements: MrrMovements = {
    new_mrr_cents: 0,
    expansion_mrr_cents: 0,
    contraction_mrr_cents: 0,
    churned_mrr_cents: 0,
  };

  for (const event of events) {
    switch (event.type) {
      case 'subscription_created':
        movements.new_mrr_cents += event.delta;
        break;
      case 'subscription_upgraded':
        movements.expansion_mrr_cents += event.delta;
        break;
      case 'subscription_downgraded':
        movements.contraction_mrr_cents += Math.abs(event.delta);
        break;
      case 'subscription_canceled':
        movements.churned_mrr_cents += Math.abs(event.delta);
        break;
      default:
        break;
    }
  }
  return movements;
}

/**
 * Create the snapshot for a day. Idempotent: an existing snapshot for
 * the date is returned unchanged.
 */
export function calculateDailySnapshot(db: RevenueDb, opts: SnapshotOptions = {}): MrrSnapshot {
  const log = opts.logger ?? silentLogger;
  const now = toIsoTimestamp(opts.now ?? new Date());
  const date = opts.date ?? isoDate(now);
  if (!DateSchema.safeParse(date).success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid snapshot date "${date}", expected YYYY-MM-DD`);
  }

  const existing = db.select().from(mrrSnapshots).where(eq(mrrSnapshots.date, date)).get();
  if (existing) {
    log.info('snapshot.exists', `Snapshot for ${date} already exists`);
    return existing;
  }

  const dayStart = startOfDay(date);
  const snapshot = db
    .insert(mrrSnapshots)
    .values({
      date,
      total_mrr_cents: getCurrentMrr(db),
      ...calculateMovements(db, dayStart, addDays(dayStart, 1)),
      product_breakdown: getProductBreakdown(db),
      created_at: now,
    })
    .returning()
    .get();

  log.info('snapshot.created', `Snapshot for ${date}`, {
    total_mrr_cents: snapshot.total_mrr_cents,
    new_mrr_cents: snapshot.new_mrr_cents,
    churned_mrr_cents: snapshot.churned_mrr_cents,
  });
  return snapshot;
}

export function getLatestSnapshot(db: RevenueDb): MrrSnapshot | undefined {
  return db.select().from(mrrSnapshots).orderBy(desc(mrrSnapshots.date)).get();
}

export interface MrrOverview {
  current_mrr_cents: number;
  active_subscriptions: number;
  latest_snapshot: MrrSnapshot | null;
}

export function getMrrOverview(db: RevenueDb): MrrOverview {
  const active = db
    .select({ mrr: subscriptions.mrr_cents })
    .from(subscriptions)
    .where(eq(subscriptions.status, 'active'))
    .all();
  return {
    current_mrr_cents: active.reduce((sum, row) => sum + row.mrr, 0),
    active_subscriptions: active.length,
    latest_snapshot: getLatestSnapshot(db) ?? null,
  };
}

/** Snapshots dated within the last `days` days of `now`, oldest first. */
export function listSnapshots(db: RevenueDb, opts: { days?: number; now?: string } = {}): MrrSnapshot[] {
  const days = opts.days ?? 30;
  const since = isoDate(addDays(toIsoTimestamp(opts.now ?? new Date()), -days));
  return db
    .select()
    .from(mrrSnapshots)
    .where(gte(mrrSnapshots.date, since))
    .orderBy(asc(mrrSnapshots.date))
    .all();
}
