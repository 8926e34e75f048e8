import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type {
  AlertSeverity,
  AlertType,
  ExpansionCategory,
  ExperimentMetric,
  ExperimentSegment,
  ExperimentStatus,
  PlanLimits,
  RevenueEventType,
  SubscriptionStatus,
  TicketSeverity,
} from '../contracts/index.js';

// ============================================================================
// CATALOG
// ============================================================================

export const products = sqliteTable('products', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  description: text('description'),
  stripe_product_id: text('stripe_product_id').unique(),
  created_at: text('created_at').notNull(),
  updated_at: text('updated_at').notNull(),
});

// A plan row is one price version. Revising a price closes the current row
// (effective_until) and inserts version + 1.
export const plans = sqliteTable(
  'plans',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    product_id: integer('product_id')
      .notNull()
      .references(() => products.id),
    name: text('name').notNull(),
    version: integer('version').notNull().default(1),
    price_monthly_cents: integer('price_monthly_cents').notNull(),
    price_annual_cents: integer('price_annual_cents'),
    currency: text('currency').notNull().default('USD'),
    limits: text('limits', { mode: 'json' }).$type<PlanLimits>().notNull(),
    features: text('features', { mode: 'json' }).$type<string[]>().notNull(),
    effective_from: text('effective_from').notNull(),
    effective_until: text('effective_until'),
    stripe_price_id: text('stripe_price_id'),
    is_active: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    productIdx: index('idx_plans_product').on(table.product_id),
    stripePriceIdx: index('idx_plans_stripe_price').on(table.stripe_price_id),
  })
);

// ============================================================================
// BILLING STATE
// ============================================================================

export const subscriptions = sqliteTable(
  'subscriptions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    stripe_subscription_id: text('stripe_subscription_id').notNull().unique(),
    customer_id: text('customer_id').notNull(),
    plan_id: integer('plan_id')
      .notNull()
      .references(() => plans.id),
    status: text('status').$type<SubscriptionStatus>().notNull(),
    current_period_start: text('current_period_start'),
    current_period_end: text('current_period_end'),
    mrr_cents: integer('mrr_cents').notNull().default(0),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
    canceled_at: text('canceled_at'),
  },
  (table) => ({
    customerIdx: index('idx_subscriptions_customer').on(table.customer_id),
    statusIdx: index('idx_subscriptions_status').on(table.status),
  })
);

// Append-only ledger of revenue movements.
export const revenueEvents = sqliteTable(
  'revenue_events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    subscription_id: integer('subscription_id')
      .notNull()
      .references(() => subscriptions.id),
    event_type: text('event_type').$type<RevenueEventType>().notNull(),
    stripe_event_id: text('stripe_event_id').unique(),
    amount_cents: integer('amount_cents').notNull().default(0),
    currency: text('currency').notNull().default('USD'),
    mrr_delta_cents: integer('mrr_delta_cents').notNull().default(0),
    metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    occurred_at: text('occurred_at').notNull(),
    processed_at: text('processed_at').notNull(),
  },
  (table) => ({
    typeOccurredIdx: index('idx_revenue_events_type_occurred').on(table.event_type, table.occurred_at),
    subscriptionIdx: index('idx_revenue_events_subscription').on(table.subscription_id),
  })
);

// Every applied webhook event id, including events that wrote no revenue event.
export const processedWebhooks = sqliteTable('processed_webhooks', {
  event_id: text('event_id').primaryKey(),
  event_type: text('event_type').notNull(),
  processed_at: text('processed_at').notNull(),
});

export const mrrSnapshots = sqliteTable('mrr_snapshots', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  date: text('date').notNull().unique(),
  total_mrr_cents: integer('total_mrr_cents').notNull(),
  new_mrr_cents: integer('new_mrr_cents').notNull().default(0),
  expansion_mrr_cents: integer('expansion_mrr_cents').notNull().default(0),
  contraction_mrr_cents: integer('contraction_mrr_cents').notNull().default(0),
  churned_mrr_cents: integer('churned_mrr_cents').notNull().default(0),
  product_breakdown: text('product_breakdown', { mode: 'json' }).$type<Record<string, number>>().notNull(),
  created_at: text('created_at').notNull(),
});

// ============================================================================
// USAGE AND SUPPORT
// ============================================================================

export const usageRecords = sqliteTable(
  'usage_records',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    subscription_id: integer('subscription_id')
      .notNull()
      .references(() => subscriptions.id),
    metric_name: text('metric_name').notNull(),
    quantity: real('quantity').notNull(),
    limit: real('limit'),
    period_start: text('period_start').notNull(),
    period_end: text('period_end').notNull(),
    recorded_at: text('recorded_at').notNull(),
  },
  (table) => ({
    subscriptionRecordedIdx: index('idx_usage_subscription_recorded').on(table.subscription_id, table.recorded_at),
  })
);

export const supportTickets = sqliteTable(
  'support_tickets',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    customer_id: text('customer_id').notNull(),
    subscription_id: integer('subscription_id').references(() => subscriptions.id),
    severity: text('severity').$type<TicketSeverity>().notNull().default('normal'),
    subject: text('subject'),
    opened_at: text('opened_at').notNull(),
    resolved_at: text('resolved_at'),
  },
  (table) => ({
    customerOpenedIdx: index('idx_tickets_customer_opened').on(table.customer_id, table.opened_at),
  })
);

// ============================================================================
// DERIVED INSIGHTS
// ============================================================================

export const alerts = sqliteTable(
  'alerts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    alert_type: text('alert_type').$type<AlertType>().notNull(),
    severity: text('severity').$type<AlertSeverity>().notNull(),
    subscription_id: integer('subscription_id').references(() => subscriptions.id),
    customer_id: text('customer_id'),
    title: text('title').notNull(),
    description: text('description').notNull(),
    data: text('data', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    recommended_action: text('recommended_action'),
    is_resolved: integer('is_resolved', { mode: 'boolean' }).notNull().default(false),
    resolved_at: text('resolved_at'),
    created_at: text('created_at').notNull(),
  },
  (table) => ({
    openIdx: index('idx_alerts_open').on(table.is_resolved, table.alert_type),
  })
);

export const experiments = sqliteTable('experiments', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  hypothesis: text('hypothesis'),
  affected_segment: text('affected_segment', { mode: 'json' }).$type<ExperimentSegment>().notNull(),
  control_group_size: integer('control_group_size'),
  variant_group_size: integer('variant_group_size'),
  change_description: text('change_description'),
  metric_tracked: text('metric_tracked').$type<ExperimentMetric>().notNull(),
  baseline_value: real('baseline_value'),
  target_value: real('target_value'),
  actual_value: real('actual_value'),
  outcome: text('outcome'),
  status: text('status').$type<ExperimentStatus>().notNull().default('draft'),
  started_at: text('started_at'),
  ended_at: text('ended_at'),
  created_at: text('created_at').notNull(),
  updated_at: text('updated_at').notNull(),
});

export const customerScores = sqliteTable(
  'customer_scores',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    customer_id: text('customer_id').notNull(),
    subscription_id: integer('subscription_id').references(() => subscriptions.id),
    expansion_score: integer('expansion_score').notNull(),
    expansion_category: text('expansion_category').$type<ExpansionCategory>().notNull(),
    tenure_days: integer('tenure_days').notNull(),
    usage_trend: real('usage_trend').notNull(),
    support_ticket_count: integer('support_ticket_count').notNull().default(0),
    engagement_score: real('engagement_score').notNull(),
    calculated_at: text('calculated_at').notNull(),
  },
  (table) => ({
    customerIdx: uniqueIndex('idx_customer_scores_customer').on(table.customer_id),
  })
);

// ============================================================================
// ROW TYPES
// ============================================================================

export type Product = typeof products.$inferSelect;
export type Plan = typeof plans.$inferSelect;
export type NewPlan = typeof plans.$inferInsert;
export type Subscription = typeof subscriptions.$inferSelect;
export type NewSubscription = typeof subscriptions.$inferInsert;
export type RevenueEvent = typeof revenueEvents.$inferSelect;
export type NewRevenueEvent = typeof revenueEvents.$inferInsert;
export type ProcessedWebhook = typeof processedWebhooks.$inferSelect;
export type MrrSnapshot = typeof mrrSnapshots.$inferSelect;
export type UsageRecord = typeof usageRecords.$inferSelect;
export type SupportTicket = typeof supportTickets.$inferSelect;
export type Alert = typeof alerts.$inferSelect;
export type NewAlert = typeof alerts.$inferInsert;
export type Experiment = typeof experiments.$inferSelect;
export type CustomerScore = typeof customerScores.$inferSelect;
