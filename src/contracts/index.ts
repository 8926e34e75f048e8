/**
 * Core domain contracts and Zod schemas.
 *
 * Money is always integer cents. Timestamps crossing this boundary are
 * ISO 8601 strings; payment-provider payloads keep their unix seconds
 * until ingestion converts them.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Types
// ============================================================================

export const CustomerIdSchema = z.string().min(1);
export const TimestampSchema = z.string().datetime({ offset: true });
export const DateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine((d) => {
    const parsed = new Date(`${d}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === d;
  }, 'Not a calendar date');

/** Unix seconds up to 9999-12-31T23:59:59Z, the last instant an ISO timestamp can hold. */
export const MAX_UNIX_SECONDS = 253_402_300_799;
export const UnixSecondsSchema = z.number().int().nonnegative().max(MAX_UNIX_SECONDS);
export const CurrencySchema = z.string().regex(/^[A-Za-z]{3}$/).transform((c) => c.toUpperCase());
export const CentsSchema = z.number().int().min(0);

// ============================================================================
// Enumerations
// ============================================================================

export const SubscriptionStatusSchema = z.enum([
  'active',
  'trialing',
  'past_due',
  'canceled',
  'unpaid',
  'incomplete',
  'incomplete_expired',
  'paused',
]);

export const RevenueEventTypeSchema = z.enum([
  'subscription_created',
  'subscription_canceled',
  'subscription_upgraded',
  'subscription_downgraded',
  'payment_succeeded',
  'payment_failed',
  'mrr_delta',
]);

export const AlertTypeSchema = z.enum([
  'declining_usage',
  'support_ticket_spike',
  'payment_retry',
  'plan_downgrade',
  'usage_mismatch_high',
  'usage_mismatch_low',
  'mrr_decline',
  'churn_risk',
]);

export const AlertSeveritySchema = z.enum(['informational', 'warning', 'critical']);

export const ExperimentStatusSchema = z.enum(['draft', 'running', 'completed', 'canceled']);

export const ExperimentMetricSchema = z.enum(['arpu', 'mrr', 'churn_rate', 'conversion_rate']);

export const ExpansionCategorySchema = z.enum([
  'safe_to_upsell',
  'neutral',
  'do_not_touch',
  'likely_to_churn',
]);

export const TicketSeveritySchema = z.enum(['low', 'normal', 'high', 'urgent']);

export type SubscriptionStatus = z.infer<typeof SubscriptionStatusSchema>;
export type RevenueEventType = z.infer<typeof RevenueEventTypeSchema>;
export type AlertType = z.infer<typeof AlertTypeSchema>;
export type AlertSeverity = z.infer<typeof AlertSeveritySchema>;
export type ExperimentStatus = z.infer<typeof ExperimentStatusSchema>;
export type ExperimentMetric = z.infer<typeof ExperimentMetricSchema>;
export type ExpansionCategory = z.infer<typeof ExpansionCategorySchema>;
export type TicketSeverity = z.infer<typeof TicketSeveritySchema>;

// ============================================================================
// Webhook payloads (Stripe-shaped)
// ============================================================================

export const WebhookEventSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1),
  created: UnixSecondsSchema.optional(),
  data: z.object({
    object: z.record(z.unknown()),
  }),
});

export type WebhookEvent = z.infer<typeof WebhookEventSchema>;

const ExpandableIdSchema = z.union([
  z.string().min(1),
  z.object({ id: z.string().min(1) }).transform((o) => o.id),
]);

export const BillingIntervalSchema = z.enum(['day', 'week', 'month', 'year']);
export type BillingInterval = z.infer<typeof BillingIntervalSchema>;

export const SubscriptionItemSchema = z.object({
  price: z.object({
    id: z.string().min(1),
    unit_amount: z.number().int().nullable().default(null),
    recurring: z
      .object({
        interval: BillingIntervalSchema,
        interval_count: z.number().int().positive().default(1),
      })
      .nullable()
      .default(null),
  }),
  quantity: z.number().int().nonnegative().default(1),
});

export const StripeSubscriptionSchema = z.object({
  id: z.string().min(1),
  customer: ExpandableIdSchema,
  status: SubscriptionStatusSchema.default('active'),
  created: UnixSecondsSchema.optional(),
  current_period_start: UnixSecondsSchema.optional(),
  current_period_end: UnixSecondsSchema.optional(),
  items: z.object({ data: z.array(SubscriptionItemSchema) }).default({ data: [] }),
});

export const StripeInvoiceSchema = z.object({
  id: z.string().optional(),
  subscription: ExpandableIdSchema.nullable().optional(),
  amount_paid: z.number().int().default(0),
  amount_due: z.number().int().default(0),
  currency: CurrencySchema.default('usd'),
  attempt_count: z.number().int().nonnegative().default(1),
});

export type SubscriptionItem = z.infer<typeof SubscriptionItemSchema>;
export type StripeSubscription = z.infer<typeof StripeSubscriptionSchema>;
export type StripeInvoice = z.infer<typeof StripeInvoiceSchema>;

// ============================================================================
// Catalog
// ============================================================================

export const PlanLimitsSchema = z.record(z.number().nonnegative());
export type PlanLimits = z.infer<typeof PlanLimitsSchema>;

export const ProductInputSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  stripe_product_id: z.string().min(1).optional(),
});

export const PlanInputSchema = z.object({
  product_id: z.number().int().positive(),
  name: z.string().min(1),
  price_monthly_cents: CentsSchema,
  price_annual_cents: CentsSchema.nullable().optional(),
  currency: CurrencySchema.default('USD'),
  limits: PlanLimitsSchema.default({}),
  features: z.array(z.string()).default([]),
  effective_from: TimestampSchema.optional(),
  stripe_price_id: z.string().min(1).optional(),
});

export type ProductInput = z.input<typeof ProductInputSchema>;
export type PlanInput = z.input<typeof PlanInputSchema>;

// ============================================================================
// Usage and support
// ============================================================================

export const UsageInputSchema = z.object({
  customer_id: CustomerIdSchema,
  metric_name: z.string().min(1),
  quantity: z.number().nonnegative(),
  period_start: TimestampSchema.optional(),
  period_end: TimestampSchema.optional(),
  recorded_at: TimestampSchema.optional(),
});

export type UsageInput = z.input<typeof UsageInputSchema>;

export const SupportTicketInputSchema = z.object({
  customer_id: CustomerIdSchema,
  severity: TicketSeveritySchema.default('normal'),
  subject: z.string().optional(),
  opened_at: TimestampSchema.optional(),
  resolved_at: TimestampSchema.optional(),
});

export type SupportTicketInput = z.input<typeof SupportTicketInputSchema>;

// ============================================================================
// Experiments
// ============================================================================

export const ExperimentSegmentSchema = z
  .object({
    plan_id: z.number().int().positive().optional(),
  })
  .strict();

export type ExperimentSegment = z.infer<typeof ExperimentSegmentSchema>;

export const ExperimentInputSchema = z.object({
  name: z.string().min(1),
  hypothesis: z.string().optional(),
  change_description: z.string().optional(),
  metric_tracked: ExperimentMetricSchema,
  affected_segment: ExperimentSegmentSchema.default({}),
  baseline_value: z.number().optional(),
  target_value: z.number().optional(),
});

export type ExperimentInput = z.input<typeof ExperimentInputSchema>;

// ============================================================================
// Thresholds
// ============================================================================

export const ThresholdsSchema = z.object({
  mrr_decline_warning_percent: z.number().positive().default(5),
  mrr_decline_critical_percent: z.number().positive().default(15),
  usage_mismatch_threshold: z.number().gt(0.5).lt(1).default(0.7),
  support_ticket_spike_threshold: z.number().positive().default(3),
  feature_high_usage_ratio: z.number().gt(0).lte(1).default(0.8),
  declining_usage_trend: z.number().lt(0).default(-0.2),
});

export type Thresholds = z.infer<typeof ThresholdsSchema>;

export const DEFAULT_THRESHOLDS: Thresholds = ThresholdsSchema.parse({});
