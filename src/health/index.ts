/**
 * Health and capability metadata for `revlens health`.
 */

import { count, eq } from 'drizzle-orm';
import {
  TABLE_NAMES,
  alerts,
  experiments,
  listExistingTables,
  plans,
  subscriptions,
  type DatabaseHandle,
} from '../db/index.js';
import { toIsoTimestamp } from '../time/index.js';

export const MODULE_ID = 'revenue-lens';
export const MODULE_VERSION = '0.1.0';
export const SCHEMA_VERSION = '1.0.0';

export const CAPABILITIES = [
  'webhook_ingest',
  'stripe_catalog_sync',
  'plan_versioning',
  'usage_metering',
  'mrr_snapshots',
  'usage_mismatch',
  'feature_pricing',
  'risk_scan',
  'expansion_scoring',
  'pricing_experiments',
] as const;

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  module_id: string;
  module_version: string;
  schema_version: string;
  timestamp: string;
  checks: {
    database: boolean;
    tables_present: string[];
    tables_missing: string[];
  };
  counts?: {
    plans: number;
    subscriptions: number;
    open_alerts: number;
    experiments: number;
  };
  capabilities: readonly string[];
  error?: string;
}

/**
 * - healthy: database reachable and every table present
 * - degraded: reachable but tables missing
 * - unhealthy: the database cannot be queried
 */
export function getHealthStatus(handle: DatabaseHandle, opts: { now?: string } = {}): HealthStatus {
  const base = {
    module_id: MODULE_ID,
    module_version: MODULE_VERSION,
    schema_version: SCHEMA_VERSION,
    timestamp: toIsoTimestamp(opts.now ?? new Date()),
    capabilities: CAPABILITIES,
  };

  let present: string[];
  try {
    present = listExistingTables(handle.sqlite);
  } catch (err) {
    return {
      ...base,
      status: 'unhealthy',
      checks: { database: false, tables_present: [], tables_missing: [...TABLE_NAMES] },
      error: err instanceof Error ? err.message : String(err),
    };
  }

  const missing = TABLE_NAMES.filter((t) => !present.includes(t));
  if (missing.length > 0) {
    return { ...base, status: 'degraded', checks: { database: true, tables_present: present, tables_missing: missing } };
  }

  const { db } = handle;
  const countOf = (rows: Array<{ n: number }>): number => rows[0]?.n ?? 0;

  return {
    ...base,
    status: 'healthy',
    checks: { database: true, tables_present: present, tables_missing: [] },
    counts: {
      plans: countOf(db.select({ n: count() }).from(plans).all()),
      subscriptions: countOf(db.select({ n: count() }).from(subscriptions).all()),
      open_alerts: countOf(db.select({ n: count() }).from(alerts).where(eq(alerts.is_resolved, false)).all()),
      experiments: countOf(db.select({ n: count() }).from(experiments).all()),
    },
  };
}
