/**
 * revenue-lens
 *
 * Revenue intelligence over a SaaS billing history: Stripe-shaped webhooks
 * land in SQLite, and the analysis modules turn them into MRR snapshots,
 * usage-mismatch and risk alerts, expansion scores and experiment reports.
 *
 * Boundary Statement:
 * - One SQLite file per tenant, no shared server
 * - Webhook payloads arrive as files or direct calls, no HTTP listener
 * - Stripe is only read (catalog sync), never written
 * - Operational insights only, no automated billing changes
 */

// Contracts
export {
  SubscriptionStatusSchema,
  RevenueEventTypeSchema,
  AlertTypeSchema,
  AlertSeveritySchema,
  ExperimentStatusSchema,
  ExperimentMetricSchema,
  ExpansionCategorySchema,
  TicketSeveritySchema,
  WebhookEventSchema,
  StripeSubscriptionSchema,
  StripeInvoiceSchema,
  PlanInputSchema,
  ProductInputSchema,
  UsageInputSchema,
  SupportTicketInputSchema,
  ExperimentInputSchema,
  ThresholdsSchema,
  DEFAULT_THRESHOLDS,
} from './contracts/index.js';

export type {
  SubscriptionStatus,
  RevenueEventType,
  AlertType,
  AlertSeverity,
  ExperimentStatus,
  ExperimentMetric,
  ExpansionCategory,
  TicketSeverity,
  WebhookEvent,
  PlanInput,
  ProductInput,
  UsageInput,
  SupportTicketInput,
  ExperimentInput,
  ExperimentSegment,
  Thresholds,
} from './contracts/index.js';

// Storage
export { openDatabase, initSchema, TABLE_NAMES } from './db/index.js';
export type {
  RevenueDb,
  DatabaseHandle,
  Product,
  Plan,
  Subscription,
  RevenueEvent,
  MrrSnapshot,
  UsageRecord,
  SupportTicket,
  Alert,
  Experiment,
  CustomerScore,
} from './db/index.js';

// Configuration
export { loadConfig, DEFAULT_DATABASE_PATH, type AppConfig } from './config/index.js';

// Catalog
export {
  createProduct,
  listProducts,
  getProduct,
  createPlan,
  getPlan,
  listPlans,
  findPlanByStripePriceId,
  findUpgradePlan,
  revisePlanPrice,
  getPlanHistory,
  syncCatalog,
  type CatalogSource,
  type CatalogSyncResult,
} from './catalog/index.js';
export { createStripeClient, createStripeCatalogSource, mapStripeError } from './stripe/client.js';

// Ingestion
export {
  processWebhookEvent,
  ingestWebhookEvents,
  calculateSubscriptionMrr,
  normalizeToMonthlyCents,
  type WebhookResult,
  type IngestBatchResult,
} from './ingest/index.js';

// Usage and support
export {
  recordUsage,
  bulkImportUsage,
  getUsageSummary,
  calculateUsageTrend,
  recordSupportTicket,
  countRecentTickets,
  type MetricSummary,
} from './usage/index.js';

// MRR
export {
  calculateDailySnapshot,
  calculateMovements,
  getCurrentMrr,
  getMrrOverview,
  getLatestSnapshot,
  listSnapshots,
} from './snapshots/index.js';

// Alerts and analysis
export { raiseAlert, listAlerts, resolveAlert, countBySeverity } from './alerts/index.js';
export {
  analyzeSubscription,
  analyzeAllSubscriptions,
  detectFeatureMispricing,
  type MismatchAnalysis,
  type SubscriptionMismatch,
} from './mismatch/index.js';
export {
  scanAllRisks,
  detectDecliningUsage,
  detectPaymentIssues,
  detectDowngrades,
  detectMrrDecline,
  detectSupportTicketSpike,
  detectChurnRisk,
  type RiskScanResult,
} from './risk/index.js';
export { scoreCustomer, scoreAllCustomers, computeExpansionScore, getCustomerScore } from './expansion/index.js';

// Experiments
export {
  createExperiment,
  startExperiment,
  recordResult,
  cancelExperiment,
  getActiveExperiments,
  getExperimentHistory,
  analyzeExperiment,
  calculateMetric,
  summarizeExperiments,
  reportExperiment,
  getLearnings,
} from './experiments/index.js';

// Health
export { getHealthStatus, type HealthStatus } from './health/index.js';

// Runner
export {
  createLogger,
  createArtifactWriter,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  withRetry,
  redact,
  RevenueLensError,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type StructuredLogger,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './runner/index.js';

// CLI
export { buildProgram, run, type CliIo } from './cli.js';
