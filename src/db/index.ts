/**
 * Database access: opening the SQLite file, applying the schema, and the
 * Drizzle handle every module queries through.
 *
 * One database file holds one tenant's data.
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import * as schema from './schema.js';
import { RevenueLensError } from '../runner/errors.js';

export * from './schema.js';

/**
 * Query surface shared by the database handle and its transactions, so
 * every module function can run inside `db.transaction`.
 */
export type RevenueDb = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseHandle {
  db: BetterSQLite3Database<typeof schema>;
  sqlite: Database.Database;
  close: () => void;
}

/**
 * Must match the Drizzle tables in ./schema.ts.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS products (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  description TEXT,
  stripe_product_id TEXT UNIQUE,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS plans (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  product_id INTEGER NOT NULL REFERENCES products(id),
  name TEXT NOT NULL,
  version INTEGER NOT NULL DEFAULT 1,
  price_monthly_cents INTEGER NOT NULL,
  price_annual_cents INTEGER,
  currency TEXT NOT NULL DEFAULT 'USD',
  limits TEXT NOT NULL DEFAULT '{}',
  features TEXT NOT NULL DEFAULT '[]',
  effective_from TEXT NOT NULL,
  effective_until TEXT,
  stripe_price_id TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_plans_product ON plans(product_id);
CREATE INDEX IF NOT EXISTS idx_plans_stripe_price ON plans(stripe_price_id);

CREATE TABLE IF NOT EXISTS subscriptions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  stripe_subscription_id TEXT NOT NULL UNIQUE,
  customer_id TEXT NOT NULL,
  plan_id INTEGER NOT NULL REFERENCES plans(id),
  status TEXT NOT NULL,
  current_period_start TEXT,
  current_period_end TEXT,
  mrr_cents INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  canceled_at TEXT
);
CREATE INDEX IF NOT EXISTS idx_subscriptions_customer ON subscriptions(customer_id);
CREATE INDEX IF NOT EXISTS idx_subscriptions_status ON subscriptions(status);

CREATE TABLE IF NOT EXISTS revenue_events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  subscription_id INTEGER NOT NULL REFERENCES subscriptions(id),
  event_type TEXT NOT NULL,
  stripe_event_id TEXT UNIQUE,
  amount_cents INTEGER NOT NULL DEFAULT 0,
  currency TEXT NOT NULL DEFAULT 'USD',
  mrr_delta_cents INTEGER NOT NULL DEFAULT 0,
  metadata TEXT NOT NULL DEFAULT '{}',
  occurred_at TEXT NOT NULL,
  processed_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_revenue_events_type_occurred ON revenue_events(event_type, occurred_at);
CREATE INDEX IF NOT EXISTS idx_revenue_events_subscription ON revenue_events(subscription_id);

CREATE TABLE IF NOT EXISTS processed_webhooks (
  event_id TEXT PRIMARY KEY,
  event_type TEXT NOT NULL,
  processed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS mrr_snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date TEXT NOT NULL UNIQUE,
  total_mrr_cents INTEGER NOT NULL,
  new_mrr_cents INTEGER NOT NULL DEFAULT 0,
  expansion_mrr_cents INTEGER NOT NULL DEFAULT 0,
  contraction_mrr_cents INTEGER NOT NULL DEFAULT 0,
  churned_mrr_cents INTEGER NOT NULL DEFAULT 0,
  product_breakdown TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS usage_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  subscription_id INTEGER NOT NULL REFERENCES subscriptions(id),
  metric_name TEXT NOT NULL,
  quantity REAL NOT NULL,
  "limit" REAL,
  period_start TEXT NOT NULL,
  period_end TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_usage_subscription_recorded ON usage_records(subscription_id, recorded_at);

CREATE TABLE IF NOT EXISTS support_tickets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  customer_id TEXT NOT NULL,
  subscription_id INTEGER REFERENCES subscriptions(id),
  severity TEXT NOT NULL DEFAULT 'normal',
  subject TEXT,
  opened_at TEXT NOT NULL,
  resolved_at TEXT
);
CREATE INDEX IF NOT EXISTS idx_tickets_customer_opened ON support_tickets(customer_id, opened_at);

CREATE TABLE IF NOT EXISTS alerts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  alert_type TEXT NOT NULL,
  severity TEXT NOT NULL,
  subscription_id INTEGER REFERENCES subscriptions(id),
  customer_id TEXT,
  title TEXT NOT NULL,
  description TEXT NOT NULL,
  data TEXT NOT NULL DEFAULT '{}',
  recommended_action TEXT,
  is_resolved INTEGER NOT NULL DEFAULT 0,
  resolved_at TEXT,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_alerts_open ON alerts(is_resolved, alert_type);

CREATE TABLE IF NOT EXISTS experiments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  hypothesis TEXT,
  affected_segment TEXT NOT NULL DEFAULT '{}',
  control_group_size INTEGER,
  variant_group_size INTEGER,
  change_description TEXT,
  metric_tracked TEXT NOT NULL,
  baseline_value REAL,
  target_value REAL,
  actual_value REAL,
  outcome TEXT,
  status TEXT NOT NULL DEFAULT 'draft',
  started_at TEXT,
  ended_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS customer_scores (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  customer_id TEXT NOT NULL,
  subscription_id INTEGER REFERENCES subscriptions(id),
  expansion_score INTEGER NOT NULL,
  expansion_category TEXT NOT NULL,
  tenure_days INTEGER NOT NULL,
  usage_trend REAL NOT NULL,
  support_ticket_count INTEGER NOT NULL DEFAULT 0,
  engagement_score REAL NOT NULL,
  calculated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_customer_scores_customer ON customer_scores(customer_id);
`;

export const TABLE_NAMES: readonly string[] = [
  'products',
  'plans',
  'subscriptions',
  'revenue_events',
  'processed_webhooks',
  'mrr_snapshots',
  'usage_records',
  'support_tickets',
  'alerts',
  'experiments',
  'customer_scores',
];

/** Create every table and index that does not exist yet. */
export function initSchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}

/**
 * Open (creating when missing) the database at `path` and apply the
 * schema. `:memory:` gives a private in-process database.
 */
export function openDatabase(path: string): DatabaseHandle {
  const openError = (err: unknown): RevenueLensError => {
    const reason = err instanceof Error ? err.message : String(err);
    return new RevenueLensError('IO_ERROR', `Cannot open database at ${path}: ${reason}`, { cause: err });
  };

  let sqlite: Database.Database;
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(resolve(path)), { recursive: true });
    }
    sqlite = new Database(path);
  } catch (err) {
    throw openError(err);
  }

  // A file that is not SQLite opens fine and only fails on first use.
  try {
    sqlite.pragma('foreign_keys = ON');
    if (path !== ':memory:') {
      sqlite.pragma('journal_mode = WAL');
    }
    initSchema(sqlite);
  } catch (err) {
    sqlite.close();
    throw openError(err);
  }

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}

/** Names of the expected tables that exist in the open database. */
export function listExistingTables(sqlite: Database.Database): string[] {
  const rows: unknown[] = sqlite
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table'`)
    .all();
  const present = new Set<string>();
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
      present.add(row.name);
    }
  }
  return TABLE_NAMES.filter((t) => present.has(t));
}
