/**
 * Alert store.
 *
 * Detectors call `raiseAlert`, which refuses to open a second unresolved
 * alert of the same type for the same subscription or customer.
 */

import { and, desc, eq, isNull, type SQL } from 'drizzle-orm';
import type { AlertSeverity, AlertType } from '../contracts/index.js';
import { alerts, type Alert, type RevenueDb } from '../db/index.js';
import { RevenueLensError } from '../runner/errors.js';
import { toIsoTimestamp } from '../time/index.js';

export interface AlertInput {
  alert_type: AlertType;
  severity: AlertSeverity;
  title: string;
  description: string;
  subscription_id?: number | null;
  customer_id?: string | null;
  data?: Record<string, unknown>;
  recommended_action?: string | null;
}

/**
 * - `subscription`: one open alert per (type, subscription)
 * - `customer`: one open alert per (type, customer)
 * - `type`: one open alert per type (account-wide conditions)
 */
export type DedupeScope = 'subscription' | 'customer' | 'type';

export interface RaiseAlertResult {
  alert: Alert;
  created: boolean;
}

export function findOpenAlert(db: RevenueDb, input: AlertInput, dedupeBy: DedupeScope): Alert | undefined {
  const conditions: SQL[] = [eq(alerts.alert_type, input.alert_type), eq(alerts.is_resolved, false)];
  if (dedupeBy === 'subscription') {
    conditions.push(
      input.subscription_id != null ? eq(alerts.subscription_id, input.subscription_id) : isNull(alerts.subscription_id),
    );
  } else if (dedupeBy === 'customer') {
    conditions.push(input.customer_id != null ? eq(alerts.customer_id, input.customer_id) : isNull(alerts.customer_id));
  }
  return db.select().from(alerts).where(and(...conditions)).get();
}

export function raiseAlert(
  db: RevenueDb,
  input: AlertInput,
  opts: { dedupeBy: DedupeScope; now?: string },
): RaiseAlertResult {
  const open = findOpenAlert(db, input, opts.dedupeBy);
  if (open) {
    return { alert: open, created: false };
  }

  const alert = db
    .insert(alerts)
    .values({
      alert_type: input.alert_type,
      severity: input.severity,
      subscription_id: input.subscription_id ?? null,
      customer_id: input.customer_id ?? null,
      title: input.title,
      description: input.description,
      data: input.data ?? {},
      recommended_action: input.recommended_action ?? null,
      is_resolved: false,
      resolved_at: null,
      created_at: toIsoTimestamp(opts.now ?? new Date()),
    })
    .returning()
    .get();

  return { alert, created: true };
}

export type AlertStatusFilter = 'active' | 'resolved' | 'all';

export function listAlerts(
  db: RevenueDb,
  opts: { status?: AlertStatusFilter; limit?: number; type?: AlertType } = {},
): Alert[] {
  const { status = 'active', limit = 100 } = opts;
  const conditions: SQL[] = [];
  if (status !== 'all') conditions.push(eq(alerts.is_resolved, status === 'resolved'));
  if (opts.type) conditions.push(eq(alerts.alert_type, opts.type));

  return db
    .select()
    .from(alerts)
    .where(and(...conditions))
    .orderBy(desc(alerts.created_at), desc(alerts.id))
    .limit(limit)
    .all();
}

export function resolveAlert(db: RevenueDb, alertId: number, opts: { now?: string } = {}): Alert {
  const existing = db.select().from(alerts).where(eq(alerts.id, alertId)).get();
  if (!existing) {
    throw new RevenueLensError('NOT_FOUND', `Alert ${alertId} not found`);
  }
  if (existing.is_resolved) {
    return existing;
  }

  return db
    .update(alerts)
    .set({ is_resolved: true, resolved_at: toIsoTimestamp(opts.now ?? new Date()) })
    .where(eq(alerts.id, alertId))
    .returning()
    .get();
}

/** Severity counts over a set of alerts. */
export function countBySeverity(list: readonly Alert[]): Record<AlertSeverity, number> {
  const counts: Record<AlertSeverity, number> = { informational: 0, warning: 0, critical: 0 };
  for (const alert of list) counts[alert.severity]++;
  return counts;
}
