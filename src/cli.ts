/**
 * revlens CLI
 *
 * Commands:
 *   revlens init | health
 *   revlens ingest --events <file>
 *   revlens usage import|record, ticket record
 *   revlens sync-stripe, catalog product-add|plan-add|plan-list|plan-revise
 *   revlens calculate-mrr | mrr | snapshots
 *   revlens analyze-mismatches | feature-pricing | scan-risks
 *   revlens alerts list|resolve, score-customer | score-all
 *   revlens experiment create|list|start|analyze|complete|cancel|summary|learnings
 *   revlens run --out <dir>
 *
 * Exit codes:
 *   0 - success
 *   2 - validation error (bad input, unknown id, wrong state)
 *   3 - external dependency failure (IO, Stripe, unhealthy database)
 *   4 - unexpected bug
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import type { ZodType } from 'zod';
import {
  AlertTypeSchema,
  ExperimentMetricSchema,
  ExperimentStatusSchema,
  PlanLimitsSchema,
  TicketSeveritySchema,
  type PlanLimits,
} from './contracts/index.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { openDatabase, type DatabaseHandle, type RevenueDb } from './db/index.js';
import { getHealthStatus } from './health/index.js';
import { ingestWebhookEvents } from './ingest/index.js';
import { bulkImportUsage, recordSupportTicket, recordUsage } from './usage/index.js';
import {
  createPlan,
  createProduct,
  getProduct,
  listPlans,
  revisePlanPrice,
  syncCatalog,
  type CatalogSource,
} from './catalog/index.js';
import { createStripeCatalogSource, createStripeClient, isRetryableStripeError, mapStripeError } from './stripe/client.js';
import { calculateDailySnapshot, getMrrOverview, listSnapshots } from './snapshots/index.js';
import { analyzeAllSubscriptions, detectFeatureMispricing } from './mismatch/index.js';
import { scanAllRisks } from './risk/index.js';
import { listAlerts, resolveAlert, type AlertStatusFilter } from './alerts/index.js';
import { scoreAllCustomers, scoreCustomer } from './expansion/index.js';
import {
  analyzeExperiment,
  cancelExperiment,
  createExperiment,
  getLearnings,
  listExperiments,
  recordResult,
  startExperiment,
  summarizeExperiments,
} from './experiments/index.js';
import {
  EXIT_DEPENDENCY,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  RevenueLensError,
  buildIdempotencyKey,
  createArtifactWriter,
  createLogger,
  exitCodeFor,
  formatZodIssues,
  withRetry,
  wrapError,
  type ArtifactSummary,
  type ArtifactWriter,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from './runner/index.js';
import { safeJsonParse, validateSafePath } from './security/index.js';
import { isoDate, toIsoTimestamp } from './time/index.js';

export const CLI_NAME = 'revlens';
export const CLI_VERSION = '0.1.0';

// ---------------------------------------------------------------------------
// IO and shared context
// ---------------------------------------------------------------------------

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  /** Catalog source for sync-stripe; defaults to the live Stripe API. */
  createCatalogSource?: (apiKey: string) => CatalogSource;
}

export function processIo(): CliIo {
  return {
    stdout: (text) => { process.stdout.write(text + '\n'); },
    stderr: (text) => { process.stderr.write(text + '\n'); },
    env: process.env,
  };
}

export interface CliState {
  exitCode: number;
}

type GlobalOptions = {
  db?: string;
  config?: string;
  verbose?: boolean;
  now?: string;
};

interface CommandContext {
  config: AppConfig;
  handle: DatabaseHandle;
  db: RevenueDb;
  log: StructuredLogger;
  now: string;
}

interface JsonOption {
  json?: boolean;
}

async function withContext<T>(
  cmd: Command,
  io: CliIo,
  fn: (ctx: CommandContext) => T | Promise<T>,
  logTo?: { filePath: string; runId: string },
): Promise<T> {
  const globals = cmd.optsWithGlobals<GlobalOptions>();
  const config = loadConfig({ env: io.env, configPath: globals.config, databasePath: globals.db });
  const log = createLogger({
    module: CLI_NAME,
    minLevel: globals.verbose ? 'debug' : config.logLevel,
    json: globals.verbose,
    sink: io.stderr,
    ...(logTo && { filePath: logTo.filePath, runId: logTo.runId }),
  });
  const now = globals.now ?? toIsoTimestamp(new Date());

  const handle = openDatabase(config.databasePath);
  try {
    return await fn({ config, handle, db: handle.db, log, now });
  } catch (err) {
    if (logTo) {
      const envelope = wrapError(err);
      log.error(`${cmd.name()}.error`, envelope.userMessage, { code: envelope.code });
    }
    throw err;
  } finally {
    handle.close();
  }
}

function emit(io: CliIo, json: boolean | undefined, data: unknown, lines: () => string[]): void {
  if (json) {
    io.stdout(JSON.stringify(data, null, 2));
    return;
  }
  for (const line of lines()) io.stdout(line);
}

function money(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer id.');
  return n;
}

function parseCents(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative amount in cents.');
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError('Expected a number.');
  return n;
}

function parseTimestamp(value: string): string {
  try {
    return toIsoTimestamp(value);
  } catch {
    throw new InvalidArgumentError('Expected an ISO 8601 timestamp.');
  }
}

function parseWith<T>(schema: ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid ${label}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

function readJsonFile(path: string): unknown {
  const check = validateSafePath(path);
  if (!check.valid) {
    throw new RevenueLensError('SECURITY_ERROR', check.error ?? 'Invalid path');
  }
  const resolved = resolve(path);
  if (!existsSync(resolved)) {
    throw new RevenueLensError('NOT_FOUND', `File not found: ${resolved}`);
  }
  const parsed = safeJsonParse(readFileSync(resolved, 'utf-8'));
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', parsed.error);
  }
  return parsed.data;
}

function readJsonArray(path: string): unknown[] {
  const data = readJsonFile(path);
  if (!Array.isArray(data)) {
    throw new RevenueLensError('VALIDATION_ERROR', `${path} must contain a JSON array`);
  }
  return data;
}

// ---------------------------------------------------------------------------
// Full analysis (`run`)
// ---------------------------------------------------------------------------

function runFullAnalysis(ctx: CommandContext, aw: ArtifactWriter, date?: string): Record<string, unknown> {
  const { db, log, now } = ctx;
  const thresholds = ctx.config.thresholds;

  const snapshot = calculateDailySnapshot(db, { date, now, logger: log.child('snapshots') });
  aw.writeEvidence('snapshot', snapshot);

  const mismatches = analyzeAllSubscriptions(db, { thresholds, now, logger: log.child('mismatch') });
  aw.writeEvidence('mismatches', mismatches);

  const featurePricing = detectFeatureMispricing(db, { thresholds, now });
  aw.writeEvidence('feature_pricing', featurePricing);

  // Scores first so the churn-risk detector sees this run's categories.
  const scores = scoreAllCustomers(db, { now, logger: log.child('expansion') });
  aw.writeEvidence('scores', scores);

  const risks = scanAllRisks(db, { thresholds, now, logger: log.child('risk') });
  aw.writeEvidence('risks', risks);

  return {
    snapshot_date: snapshot.date,
    total_mrr_cents: snapshot.total_mrr_cents,
    upgrade_candidates: mismatches.upgrade_candidates.length,
    overpriced_customers: mismatches.overpriced_customers.length,
    mispriced_plans: featurePricing.length,
    customers_scored: scores.scores.length,
    alerts_created: mismatches.stats.alerts_created + risks.stats.total,
  };
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function buildProgram(io: CliIo, state: CliState = { exitCode: EXIT_SUCCESS }): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Revenue intelligence: MRR, usage mismatches, risk alerts and pricing experiments')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout(s.trimEnd()),
      writeErr: (s) => io.stderr(s.trimEnd()),
    })
    .option('--db <path>', 'SQLite database path (overrides DATABASE_PATH)')
    .option('--config <path>', 'JSON config file with threshold overrides')
    .option('--now <timestamp>', 'Reference time for look-back windows', parseTimestamp)
    .option('--verbose', 'Echo structured logs to stderr');

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  program
    .command('init')
    .description('Create the database and its tables')
    .action((_opts: unknown, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        io.stdout(`Initialized database at ${ctx.config.databasePath}`);
      }),
    );

  program
    .command('health')
    .description('Check the database and list capabilities')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const health = getHealthStatus(ctx.handle, { now: ctx.now });
        if (health.status !== 'healthy') state.exitCode = EXIT_DEPENDENCY;
        emit(io, opts.json, health, () => [
          `Status: ${health.status}`,
          `Module: ${health.module_id}@${health.module_version} (schema ${health.schema_version})`,
          `Tables: ${health.checks.tables_present.length} present, ${health.checks.tables_missing.length} missing`,
          ...(health.counts
            ? [
                `Plans: ${health.counts.plans}, subscriptions: ${health.counts.subscriptions}, ` +
                  `open alerts: ${health.counts.open_alerts}, experiments: ${health.counts.experiments}`,
              ]
            : []),
          `Capabilities: ${health.capabilities.join(', ')}`,
        ]);
      }),
    );

  // -------------------------------------------------------------------------
  // Ingestion
  // -------------------------------------------------------------------------

  program
    .command('ingest')
    .description('Apply billing webhook events from a JSON array file')
    .addHelpText('after', `\nExample:\n  ${CLI_NAME} ingest --events ./webhooks.json\n`)
    .requiredOption('--events <file>', 'JSON file with an array of webhook events')
    .option('--json', 'Emit JSON')
    .action((opts: { events: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const events = readJsonArray(opts.events);
        const result = ingestWebhookEvents(ctx.db, events, { now: ctx.now, logger: ctx.log.child('ingest') });
        if (result.errors.length > 0) state.exitCode = EXIT_VALIDATION;
        emit(io, opts.json, { stats: result.stats, errors: result.errors.slice(0, 20) }, () => [
          `Events: ${result.stats.total}`,
          `  applied: ${result.stats.applied}, duplicate: ${result.stats.duplicate}, ` +
            `ignored: ${result.stats.ignored}, skipped: ${result.stats.skipped}, invalid: ${result.stats.invalid}`,
          ...result.errors.slice(0, 5).map((e) => `  [${e.index}] ${e.error}`),
          ...(result.errors.length > 5 ? [`  ... and ${result.errors.length - 5} more`] : []),
        ]);
      }),
    );

  const usage = program.command('usage').description('Usage metering');

  usage
    .command('import')
    .description('Record usage rows from a JSON array file')
    .requiredOption('--file <file>', 'JSON file with an array of usage rows')
    .option('--json', 'Emit JSON')
    .action((opts: { file: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const rows = readJsonArray(opts.file);
        const result = bulkImportUsage(ctx.db, rows, { now: ctx.now, logger: ctx.log.child('usage') });
        if (result.errors.length > 0) state.exitCode = EXIT_VALIDATION;
        emit(io, opts.json, result, () => [
          `Imported ${result.imported}/${rows.length} usage rows`,
          ...result.errors.slice(0, 5).map((e) => `  [${e.index}] ${e.error}`),
        ]);
      }),
    );

  usage
    .command('record')
    .description('Record one usage measurement for a customer')
    .requiredOption('--customer <id>', 'Customer id')
    .requiredOption('--metric <name>', 'Metric name, e.g. api_calls')
    .requiredOption('--quantity <n>', 'Quantity used', parseNumber)
    .option('--period-start <timestamp>', 'Usage period start (defaults to the billing period)')
    .option('--period-end <timestamp>', 'Usage period end')
    .option('--recorded-at <timestamp>', 'Measurement time')
    .option('--json', 'Emit JSON')
    .action(
      (
        opts: {
          customer: string;
          metric: string;
          quantity: number;
          periodStart?: string;
          periodEnd?: string;
          recordedAt?: string;
        } & JsonOption,
        cmd: Command,
      ) =>
        withContext(cmd, io, (ctx) => {
          const record = recordUsage(
            ctx.db,
            {
              customer_id: opts.customer,
              metric_name: opts.metric,
              quantity: opts.quantity,
              period_start: opts.periodStart,
              period_end: opts.periodEnd,
              recorded_at: opts.recordedAt,
            },
            { now: ctx.now, logger: ctx.log.child('usage') },
          );
          emit(io, opts.json, record, () => [
            `Recorded ${record.quantity} ${record.metric_name} for ${opts.customer}` +
              (record.limit !== null ? ` (limit ${record.limit})` : ''),
          ]);
        }),
    );

  program
    .command('ticket')
    .description('Support tickets')
    .command('record')
    .description('Record a support ticket for a customer')
    .requiredOption('--customer <id>', 'Customer id')
    .option('--severity <level>', 'low | normal | high | urgent', 'normal')
    .option('--subject <text>', 'Ticket subject')
    .option('--opened-at <timestamp>', 'When the ticket was opened')
    .option('--json', 'Emit JSON')
    .action(
      (opts: { customer: string; severity: string; subject?: string; openedAt?: string } & JsonOption, cmd: Command) =>
        withContext(cmd, io, (ctx) => {
          const ticket = recordSupportTicket(
            ctx.db,
            {
              customer_id: opts.customer,
              severity: parseWith(TicketSeveritySchema, opts.severity, 'severity'),
              subject: opts.subject,
              opened_at: opts.openedAt,
            },
            { now: ctx.now },
          );
          emit(io, opts.json, ticket, () => [`Recorded ticket ${ticket.id} for ${ticket.customer_id}`]);
        }),
    );

  // -------------------------------------------------------------------------
  // Catalog
  // -------------------------------------------------------------------------

  program
    .command('sync-stripe')
    .description('Import active products and prices from Stripe')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, async (ctx) => {
        const apiKey = ctx.config.stripeApiKey;
        if (!apiKey) {
          throw new RevenueLensError('VALIDATION_ERROR', 'STRIPE_API_KEY is not set');
        }
        const source = io.createCatalogSource
          ? io.createCatalogSource(apiKey)
          : createStripeCatalogSource(createStripeClient(apiKey));

        const attempt = await withRetry(
          () => syncCatalog(ctx.db, source, { now: ctx.now, logger: ctx.log.child('catalog') }),
          { isRetryable: isRetryableStripeError, logger: ctx.log },
        );
        if (!attempt.success || attempt.value === undefined) {
          throw mapStripeError(attempt.lastError);
        }
        const result = attempt.value;
        emit(io, opts.json, result, () => [
          `Products: ${result.products_created} created, ${result.products_linked} linked, ${result.products_existing} existing`,
          `Plans: ${result.plans_created} created, ${result.plans_existing} existing, ${result.prices_skipped} prices skipped`,
        ]);
      }),
    );

  const catalog = program.command('catalog').description('Products and versioned plans');

  catalog
    .command('product-add')
    .description('Create a product')
    .requiredOption('--name <name>', 'Product name')
    .option('--description <text>', 'Description')
    .option('--stripe-product-id <id>', 'Linked Stripe product id')
    .option('--json', 'Emit JSON')
    .action((opts: { name: string; description?: string; stripeProductId?: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const product = createProduct(
          ctx.db,
          { name: opts.name, description: opts.description, stripe_product_id: opts.stripeProductId },
          { now: ctx.now },
        );
        emit(io, opts.json, product, () => [`Created product ${product.id}: ${product.name}`]);
      }),
    );

  catalog
    .command('plan-add')
    .description('Create a plan (version 1) under a product')
    .requiredOption('--product <id>', 'Product id', parseId)
    .requiredOption('--name <name>', 'Plan name')
    .requiredOption('--price <cents>', 'Monthly price in cents', parseCents)
    .option('--annual <cents>', 'Annual price in cents', parseCents)
    .option('--currency <code>', 'ISO currency code', 'USD')
    .option('--limits <json>', 'Usage limits, e.g. \'{"api_calls":10000}\'')
    .option('--features <list>', 'Comma-separated feature list')
    .option('--stripe-price-id <id>', 'Linked Stripe price id')
    .option('--json', 'Emit JSON')
    .action(
      (
        opts: {
          product: number;
          name: string;
          price: number;
          annual?: number;
          currency: string;
          limits?: string;
          features?: string;
          stripePriceId?: string;
        } & JsonOption,
        cmd: Command,
      ) =>
        withContext(cmd, io, (ctx) => {
          let limits: PlanLimits = {};
          if (opts.limits !== undefined) {
            const parsed = safeJsonParse(opts.limits);
            if (!parsed.success) throw new RevenueLensError('VALIDATION_ERROR', parsed.error);
            limits = parseWith(PlanLimitsSchema, parsed.data, 'limits');
          }
          const plan = createPlan(
            ctx.db,
            {
              product_id: opts.product,
              name: opts.name,
              price_monthly_cents: opts.price,
              price_annual_cents: opts.annual,
              currency: opts.currency,
              limits,
              features: opts.features ? opts.features.split(',').map((f) => f.trim()).filter(Boolean) : [],
              stripe_price_id: opts.stripePriceId,
            },
            { now: ctx.now },
          );
          emit(io, opts.json, plan, () => [
            `Created plan ${plan.id}: ${plan.name} v${plan.version} at ${money(plan.price_monthly_cents)}/mo`,
          ]);
        }),
    );

  catalog
    .command('plan-list')
    .description('List plans')
    .option('--all', 'Include retired plan versions')
    .option('--product <id>', 'Only plans of this product', parseId)
    .option('--json', 'Emit JSON')
    .action((opts: { all?: boolean; product?: number } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        if (opts.product !== undefined) getProduct(ctx.db, opts.product);
        const list = listPlans(ctx.db, { activeOnly: !opts.all, productId: opts.product });
        emit(io, opts.json, list, () =>
          list.length === 0
            ? ['No plans']
            : list.map(
                (p) =>
                  `${p.id}\t${p.name} v${p.version}\t${money(p.price_monthly_cents)}/mo\t` +
                  `${p.is_active ? 'active' : `retired ${p.effective_until ?? ''}`}`,
              ),
        );
      }),
    );

  catalog
    .command('plan-revise')
    .description('Close the current plan version and open a new one at a new price')
    .argument('<planId>', 'Plan id', parseId)
    .requiredOption('--price <cents>', 'New monthly price in cents', parseCents)
    .option('--annual <cents>', 'New annual price in cents', parseCents)
    .option('--effective-from <timestamp>', 'When the new price applies')
    .option('--stripe-price-id <id>', 'Stripe price id of the new version')
    .option('--json', 'Emit JSON')
    .action(
      (
        planId: number,
        opts: { price: number; annual?: number; effectiveFrom?: string; stripePriceId?: string } & JsonOption,
        cmd: Command,
      ) =>
        withContext(cmd, io, (ctx) => {
          const plan = revisePlanPrice(ctx.db, planId, {
            priceMonthlyCents: opts.price,
            ...(opts.annual !== undefined && { priceAnnualCents: opts.annual }),
            effectiveFrom: opts.effectiveFrom,
            stripePriceId: opts.stripePriceId,
            now: ctx.now,
          });
          emit(io, opts.json, plan, () => [
            `Plan ${plan.name} is now v${plan.version} (id ${plan.id}) at ${money(plan.price_monthly_cents)}/mo`,
          ]);
        }),
    );

  // -------------------------------------------------------------------------
  // MRR
  // -------------------------------------------------------------------------

  program
    .command('calculate-mrr')
    .description('Store the MRR snapshot for a day')
    .option('--date <date>', 'YYYY-MM-DD (defaults to today, UTC)')
    .option('--json', 'Emit JSON')
    .action((opts: { date?: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const s = calculateDailySnapshot(ctx.db, { date: opts.date, now: ctx.now, logger: ctx.log.child('snapshots') });
        emit(io, opts.json, s, () => [
          `MRR snapshot ${s.date}: ${money(s.total_mrr_cents)}`,
          `  new ${money(s.new_mrr_cents)}, expansion ${money(s.expansion_mrr_cents)}, ` +
            `contraction ${money(s.contraction_mrr_cents)}, churned ${money(s.churned_mrr_cents)}`,
        ]);
      }),
    );

  program
    .command('mrr')
    .description('Current MRR and the latest snapshot')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const overview = getMrrOverview(ctx.db);
        emit(io, opts.json, overview, () => [
          `Current MRR: ${money(overview.current_mrr_cents)}`,
          `Active subscriptions: ${overview.active_subscriptions}`,
          overview.latest_snapshot
            ? `Latest snapshot: ${overview.latest_snapshot.date} (${money(overview.latest_snapshot.total_mrr_cents)})`
            : 'No snapshots yet',
        ]);
      }),
    );

  program
    .command('snapshots')
    .description('MRR snapshots of recent days')
    .option('--days <n>', 'Look-back window in days', parseId, 30)
    .option('--json', 'Emit JSON')
    .action((opts: { days: number } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const list = listSnapshots(ctx.db, { days: opts.days, now: ctx.now });
        emit(io, opts.json, list, () =>
          list.length === 0
            ? [`No snapshots in the last ${opts.days} days`]
            : list.map(
                (s) =>
                  `${s.date}\t${money(s.total_mrr_cents)}\t+${money(s.new_mrr_cents + s.expansion_mrr_cents)}\t` +
                  `-${money(s.contraction_mrr_cents + s.churned_mrr_cents)}`,
              ),
        );
      }),
    );

  // -------------------------------------------------------------------------
  // Analysis
  // -------------------------------------------------------------------------

  program
    .command('analyze-mismatches')
    .description('Compare current-period usage with plan limits')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const analysis = analyzeAllSubscriptions(ctx.db, {
          thresholds: ctx.config.thresholds,
          now: ctx.now,
          logger: ctx.log.child('mismatch'),
        });
        emit(io, opts.json, analysis, () => [
          `Analyzed ${analysis.stats.analyzed} subscriptions`,
          `  underpriced: ${analysis.stats.underpriced}, overpriced: ${analysis.stats.overpriced}, ` +
            `appropriate: ${analysis.stats.appropriate}, no data: ${analysis.stats.no_data}`,
          ...analysis.upgrade_candidates.map(
            (m) => `  UPGRADE ${m.customer_id} (${m.plan_name}) at ${pct(m.utilization * 100)}`,
          ),
          ...analysis.overpriced_customers.map(
            (m) => `  LOW ${m.customer_id} (${m.plan_name}) at ${pct(m.utilization * 100)}`,
          ),
        ]);
      }),
    );

  program
    .command('feature-pricing')
    .description('Plans where most customers run close to their limits')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const results = detectFeatureMispricing(ctx.db, { thresholds: ctx.config.thresholds, now: ctx.now });
        emit(io, opts.json, results, () =>
          results.length === 0
            ? ['No mispriced plans detected']
            : results.map(
                (r) =>
                  `${r.plan_name}: ${pct(r.high_usage_percentage)} of ${r.total_customers} customers near limits. ` +
                  r.recommendation,
              ),
        );
      }),
    );

  program
    .command('scan-risks')
    .description('Run every risk detector and raise alerts')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const result = scanAllRisks(ctx.db, {
          thresholds: ctx.config.thresholds,
          now: ctx.now,
          logger: ctx.log.child('risk'),
        });
        emit(io, opts.json, result, () => [
          `New alerts: ${result.stats.total} ` +
            `(critical ${result.critical.length}, warning ${result.warning.length}, ` +
            `informational ${result.informational.length})`,
          ...[...result.critical, ...result.warning, ...result.informational].map(
            (a) => `  [${a.severity.toUpperCase()}] ${a.title}: ${a.description}`,
          ),
        ]);
      }),
    );

  const alerts = program.command('alerts').description('Revenue alerts');

  alerts
    .command('list')
    .description('List alerts, newest first')
    .option('--resolved', 'Only resolved alerts')
    .option('--all', 'Resolved and unresolved alerts')
    .option('--type <type>', 'Only this alert type')
    .option('--limit <n>', 'Maximum rows', parseId, 100)
    .option('--json', 'Emit JSON')
    .action(
      (opts: { resolved?: boolean; all?: boolean; type?: string; limit: number } & JsonOption, cmd: Command) =>
        withContext(cmd, io, (ctx) => {
          const status: AlertStatusFilter = opts.all ? 'all' : opts.resolved ? 'resolved' : 'active';
          const type = opts.type === undefined ? undefined : parseWith(AlertTypeSchema, opts.type, 'alert type');
          const list = listAlerts(ctx.db, { status, limit: opts.limit, type });
          emit(io, opts.json, list, () =>
            list.length === 0
              ? ['No alerts']
              : list.map(
                  (a) =>
                    `${a.id}\t[${a.severity.toUpperCase()}]\t${a.title}\t${a.description}` +
                    (a.is_resolved ? '\t(resolved)' : ''),
                ),
          );
        }),
    );

  alerts
    .command('resolve')
    .description('Mark an alert resolved')
    .argument('<id>', 'Alert id', parseId)
    .option('--json', 'Emit JSON')
    .action((id: number, opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const alert = resolveAlert(ctx.db, id, { now: ctx.now });
        emit(io, opts.json, alert, () => [`Resolved alert ${alert.id}: ${alert.title}`]);
      }),
    );

  program
    .command('score-customer')
    .description('Compute the expansion score of one customer')
    .argument('<customerId>', 'Customer id')
    .option('--json', 'Emit JSON')
    .action((customerId: string, opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const score = scoreCustomer(ctx.db, customerId, { now: ctx.now, logger: ctx.log.child('expansion') });
        emit(io, opts.json, score, () => [
          `${score.customer_id}: ${score.expansion_score}/100 (${score.expansion_category})`,
          `  tenure ${score.tenure_days} days, usage trend ${pct(score.usage_trend * 100)}, ` +
            `engagement ${pct(score.engagement_score * 100)}, tickets ${score.support_ticket_count}`,
        ]);
      }),
    );

  program
    .command('score-all')
    .description('Compute expansion scores for every active customer')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const result = scoreAllCustomers(ctx.db, { now: ctx.now, logger: ctx.log.child('expansion') });
        emit(io, opts.json, result, () => [
          `Scored ${result.scores.length} customers`,
          ...Object.entries(result.by_category).map(([category, n]) => `  ${category}: ${n}`),
        ]);
      }),
    );

  // -------------------------------------------------------------------------
  // Experiments
  // -------------------------------------------------------------------------

  const experiment = program.command('experiment').description('Pricing and packaging experiments');

  experiment
    .command('create')
    .description('Create a draft experiment')
    .requiredOption('--name <name>', 'Experiment name')
    .requiredOption('--metric <metric>', 'arpu | mrr | churn_rate | conversion_rate')
    .option('--hypothesis <text>', 'What you expect to happen')
    .option('--change <text>', 'The pricing or packaging change')
    .option('--plan <id>', 'Limit the segment to one plan', parseId)
    .option('--baseline <n>', 'Baseline value (computed at start when omitted)', parseNumber)
    .option('--target <n>', 'Target value', parseNumber)
    .option('--json', 'Emit JSON')
    .action(
      (
        opts: {
          name: string;
          metric: string;
          hypothesis?: string;
          change?: string;
          plan?: number;
          baseline?: number;
          target?: number;
        } & JsonOption,
        cmd: Command,
      ) =>
        withContext(cmd, io, (ctx) => {
          const created = createExperiment(
            ctx.db,
            {
              name: opts.name,
              metric_tracked: parseWith(ExperimentMetricSchema, opts.metric, 'metric'),
              hypothesis: opts.hypothesis,
              change_description: opts.change,
              affected_segment: opts.plan !== undefined ? { plan_id: opts.plan } : {},
              baseline_value: opts.baseline,
              target_value: opts.target,
            },
            { now: ctx.now, logger: ctx.log.child('experiments') },
          );
          emit(io, opts.json, created, () => [`Created experiment ${created.id}: ${created.name} (draft)`]);
        }),
    );

  experiment
    .command('list')
    .description('List experiments')
    .option('--status <status>', 'draft | running | completed | canceled')
    .option('--json', 'Emit JSON')
    .action((opts: { status?: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const status =
          opts.status === undefined ? undefined : parseWith(ExperimentStatusSchema, opts.status, 'status');
        const list = listExperiments(ctx.db, { status });
        emit(io, opts.json, list, () =>
          list.length === 0
            ? ['No experiments']
            : list.map((e) => `${e.id}\t${e.status}\t${e.metric_tracked}\t${e.name}`),
        );
      }),
    );

  experiment
    .command('start')
    .description('Start a draft experiment')
    .argument('<id>', 'Experiment id', parseId)
    .option('--json', 'Emit JSON')
    .action((id: number, opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const started = startExperiment(ctx.db, id, { now: ctx.now, logger: ctx.log.child('experiments') });
        emit(io, opts.json, started, () => [
          `Started experiment ${started.id}: baseline ${started.baseline_value ?? 0}, ` +
            `control ${started.control_group_size ?? 0}, variant ${started.variant_group_size ?? 0}`,
        ]);
      }),
    );

  experiment
    .command('analyze')
    .description('Compare the tracked metric with the baseline')
    .argument('<id>', 'Experiment id', parseId)
    .option('--json', 'Emit JSON')
    .action((id: number, opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const analysis = analyzeExperiment(ctx.db, id, { now: ctx.now });
        emit(io, opts.json, analysis, () =>
          analysis.status === 'not_ready'
            ? [`Experiment ${analysis.experiment_id}: ${analysis.message}`]
            : [
                `${analysis.name} (${analysis.metric}), ${analysis.days_running} days`,
                `  baseline ${analysis.baseline_value}, current ${analysis.current_value}, ` +
                  `change ${pct(analysis.improvement_percent)}`,
                `  target ${analysis.target_value ?? 'none'}: ${analysis.target_met ? 'met' : 'not met'}`,
              ],
        );
      }),
    );

  experiment
    .command('complete')
    .description('Record the result of a running experiment')
    .argument('<id>', 'Experiment id', parseId)
    .requiredOption('--actual <n>', 'Measured value of the tracked metric', parseNumber)
    .requiredOption('--outcome <text>', 'What was learned')
    .option('--json', 'Emit JSON')
    .action((id: number, opts: { actual: number; outcome: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const done = recordResult(ctx.db, id, opts.actual, opts.outcome, {
          now: ctx.now,
          logger: ctx.log.child('experiments'),
        });
        emit(io, opts.json, done, () => [`Completed experiment ${done.id}: ${done.name}`]);
      }),
    );

  experiment
    .command('cancel')
    .description('Cancel a draft or running experiment')
    .argument('<id>', 'Experiment id', parseId)
    .option('--json', 'Emit JSON')
    .action((id: number, opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const canceled = cancelExperiment(ctx.db, id, { now: ctx.now });
        emit(io, opts.json, canceled, () => [`Canceled experiment ${canceled.id}: ${canceled.name}`]);
      }),
    );

  experiment
    .command('summary')
    .description('Experiment counts and success rate')
    .option('--json', 'Emit JSON')
    .action((opts: JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const summary = summarizeExperiments(ctx.db);
        emit(io, opts.json, summary, () => [
          `Experiments: ${summary.total_experiments}`,
          ...Object.entries(summary.by_status).map(([status, n]) => `  ${status}: ${n}`),
          `Successful: ${summary.successful_experiments} (${pct(summary.success_rate)})`,
        ]);
      }),
    );

  experiment
    .command('learnings')
    .description('Results of completed experiments')
    .option('--metric <metric>', 'Only experiments tracking this metric')
    .option('--json', 'Emit JSON')
    .action((opts: { metric?: string } & JsonOption, cmd: Command) =>
      withContext(cmd, io, (ctx) => {
        const metric = opts.metric === undefined ? undefined : parseWith(ExperimentMetricSchema, opts.metric, 'metric');
        const learnings = getLearnings(ctx.db, metric);
        emit(io, opts.json, learnings, () =>
          learnings.length === 0
            ? ['No completed experiments with results']
            : learnings.map((l) => `${l.name}: ${pct(l.improvement_percent)}${l.outcome ? ` - ${l.outcome}` : ''}`),
        );
      }),
    );

  // -------------------------------------------------------------------------
  // run: full analysis with artifacts
  // -------------------------------------------------------------------------

  program
    .command('run')
    .description('Snapshot, mismatches, scores and risks in one pass, with artifacts')
    .addHelpText('after', `\nExample:\n  ${CLI_NAME} run --out ./reports\n`)
    .requiredOption('--out <dir>', 'Directory that receives artifacts/<runId>/')
    .option('--date <date>', 'Snapshot date, YYYY-MM-DD')
    .option('--json', 'Emit the run summary as JSON')
    .action(async (opts: { out: string; date?: string } & JsonOption, cmd: Command) => {
      const check = validateSafePath(opts.out);
      if (!check.valid) {
        throw new RevenueLensError('SECURITY_ERROR', check.error ?? 'Invalid output path');
      }
      const startedAt = toIsoTimestamp(new Date());
      const aw = createArtifactWriter(resolve(opts.out));

      let summary: ArtifactSummary;
      try {
        summary = await withContext(
          cmd,
          io,
          (ctx) => {
            ctx.log.info('run.start', `Full analysis for ${ctx.config.databasePath}`);
            const stats = runFullAnalysis(ctx, aw, opts.date);
            return aw.finalize({
              command: 'run',
              startedAt,
              exitCode: EXIT_SUCCESS,
              idempotencyKey: buildIdempotencyKey(['run', ctx.config.databasePath, opts.date ?? isoDate(ctx.now)]),
              stats,
            });
          },
          { filePath: aw.logsPath, runId: aw.runId },
        );
      } catch (err) {
        const envelope: RunnerErrorEnvelope = wrapError(err);
        aw.finalize({
          command: 'run',
          startedAt,
          exitCode: exitCodeFor(envelope.code),
          idempotencyKey: '',
          error: envelope,
        });
        throw err;
      }

      emit(io, opts.json, summary, () => [
        `Run ${summary.run_id} complete`,
        ...Object.entries(summary.stats ?? {}).map(([k, v]) => `  ${k}: ${String(v)}`),
        `Artifacts: ${summary.artifact_dir}`,
      ]);
    });

  return program;
}

function printEnvelope(io: CliIo, envelope: RunnerErrorEnvelope, json: boolean): void {
  if (json) {
    io.stderr(JSON.stringify({ error: envelope }, null, 2));
    return;
  }
  io.stderr(`Error [${envelope.code}]: ${envelope.userMessage}`);
  if (io.env['DEBUG'] && envelope.cause) {
    io.stderr(`  cause: ${envelope.cause}`);
  }
}

/**
 * Parse and execute `argv` (arguments after the executable and script),
 * returning the process exit code.
 */
export async function run(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  const state: CliState = { exitCode: EXIT_SUCCESS };
  const program = buildProgram(io, state);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return state.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_SUCCESS : EXIT_VALIDATION;
    }
    const envelope = wrapError(err);
    printEnvelope(io, envelope, argv.includes('--json'));
    return exitCodeFor(envelope.code);
  }
}
