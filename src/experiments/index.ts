/**
 * Pricing and packaging experiments.
 *
 * An experiment moves draft -> running -> completed (or canceled). The
 * baseline is taken from live data when the experiment starts, unless it
 * was given up front, so later analysis always has something to compare
 * against.
 */

import { and, desc, eq, gte, inArray, lte, type SQL } from 'drizzle-orm';
import {
  ExperimentInputSchema,
  type ExperimentInput,
  type ExperimentMetric,
  type ExperimentSegment,
  type ExperimentStatus,
} from '../contracts/index.js';
import { experiments, subscriptions, type Experiment, type RevenueDb } from '../db/index.js';
import { RevenueLensError, formatZodIssues } from '../runner/errors.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { addDays, daysBetween, toIsoTimestamp } from '../time/index.js';

export const CHURN_LOOKBACK_DAYS = 30;

export interface ExperimentOptions {
  now?: string;
  logger?: StructuredLogger;
}

function nowOf(opts: ExperimentOptions): string {
  return toIsoTimestamp(opts.now ?? new Date());
}

export function getExperiment(db: RevenueDb, experimentId: number): Experiment {
  const experiment = db.select().from(experiments).where(eq(experiments.id, experimentId)).get();
  if (!experiment) {
    throw new RevenueLensError('NOT_FOUND', `Experiment ${experimentId} not found`);
  }
  return experiment;
}

function requireStatus(experiment: Experiment, allowed: readonly ExperimentStatus[], action: string): void {
  if (!allowed.includes(experiment.status)) {
    throw new RevenueLensError(
      'CONFLICT',
      `Cannot ${action} experiment ${experiment.id}: status is ${experiment.status}, expected ${allowed.join(' or ')}`,
      { context: { experiment_id: experiment.id, status: experiment.status } },
    );
  }
}

export function createExperiment(db: RevenueDb, input: ExperimentInput, opts: ExperimentOptions = {}): Experiment {
  const parsed = ExperimentInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid experiment: ${formatZodIssues(parsed.error)}`);
  }
  const data = parsed.data;
  const now = nowOf(opts);

  const experiment = db
    .insert(experiments)
    .values({
      name: data.name,
      hypothesis: data.hypothesis ?? null,
      change_description: data.change_description ?? null,
      metric_tracked: data.metric_tracked,
      affected_segment: data.affected_segment,
      baseline_value: data.baseline_value ?? null,
      target_value: data.target_value ?? null,
      status: 'draft',
      created_at: now,
      updated_at: now,
    })
    .returning()
    .get();

  (opts.logger ?? silentLogger).info('experiment.created', `Created experiment "${experiment.name}"`, {
    experiment_id: experiment.id,
    metric: experiment.metric_tracked,
  });
  return experiment;
}

// ============================================================================
// Metrics
// ============================================================================

function segmentConditions(segment: ExperimentSegment): SQL[] {
  return segment.plan_id !== undefined ? [eq(subscriptions.plan_id, segment.plan_id)] : [];
}

function segmentSubscriptions(db: RevenueDb, segment: ExperimentSegment, statuses: Array<'active' | 'trialing'>) {
  return db
    .select({ status: subscriptions.status, mrr_cents: subscriptions.mrr_cents })
    .from(subscriptions)
    .where(and(inArray(subscriptions.status, statuses), ...segmentConditions(segment)))
    .all();
}

/**
 * Current value of a metric over the segment's active subscriptions.
 * An empty segment yields 0 for every metric.
 */
export function calculateMetric(
  db: RevenueDb,
  metric: ExperimentMetric,
  segment: ExperimentSegment,
  opts: { now?: string } = {},
): number {
  const now = nowOf(opts);

  if (metric === 'conversion_rate') {
    const rows = segmentSubscriptions(db, segment, ['active', 'trialing']);
    const active = rows.filter((r) => r.status === 'active').length;
    return rows.length > 0 ? (active / rows.length) * 100 : 0;
  }

  const active = segmentSubscriptions(db, segment, ['active']);
  if (active.length === 0) return 0;
  const totalMrr = active.reduce((sum, s) => sum + s.mrr_cents, 0);

  switch (metric) {
    case 'arpu':
      return totalMrr / active.length;
    case 'mrr':
      return totalMrr;
    case 'churn_rate': {
      const churned = db
        .select({ id: subscriptions.id })
        .from(subscriptions)
        .where(
          and(
            eq(subscriptions.status, 'canceled'),
            gte(subscriptions.canceled_at, addDays(now, -CHURN_LOOKBACK_DAYS)),
            lte(subscriptions.canceled_at, now),
            ...segmentConditions(segment),
          ),
        )
        .all().length;
      return (churned / active.length) * 100;
    }
  }
}

/** Control gets the smaller half of the segment. */
export function splitGroups(segmentSize: number): { control: number; variant: number } {
  const control = Math.floor(segmentSize / 2);
  return { control, variant: segmentSize - control };
}

// ============================================================================
// Lifecycle
// ============================================================================

export function startExperiment(db: RevenueDb, experimentId: number, opts: ExperimentOptions = {}): Experiment {
  const now = nowOf(opts);
  const experiment = getExperiment(db, experimentId);
  requireStatus(experiment, ['draft'], 'start');

  const baseline =
    experiment.baseline_value ?? calculateMetric(db, experiment.metric_tracked, experiment.affected_segment, { now });
  const { control, variant } = splitGroups(segmentSubscriptions(db, experiment.affected_segment, ['active']).length);

  const started = db
    .update(experiments)
    .set({
      baseline_value: baseline,
      control_group_size: control,
      variant_group_size: variant,
      status: 'running',
      started_at: now,
      updated_at: now,
    })
    .where(eq(experiments.id, experimentId))
    .returning()
    .get();

  (opts.logger ?? silentLogger).info('experiment.started', `Started experiment "${started.name}"`, {
    experiment_id: started.id,
    baseline_value: baseline,
    control_group_size: control,
    variant_group_size: variant,
  });
  return started;
}

export function recordResult(
  db: RevenueDb,
  experimentId: number,
  actualValue: number,
  outcome: string,
  opts: ExperimentOptions = {},
): Experiment {
  if (!Number.isFinite(actualValue)) {
    throw new RevenueLensError('VALIDATION_ERROR', 'Actual value must be a finite number');
  }
  const now = nowOf(opts);
  requireStatus(getExperiment(db, experimentId), ['running'], 'complete');

  const completed = db
    .update(experiments)
    .set({ actual_value: actualValue, outcome, status: 'completed', ended_at: now, updated_at: now })
    .where(eq(experiments.id, experimentId))
    .returning()
    .get();

  (opts.logger ?? silentLogger).info('experiment.completed', `Completed experiment "${completed.name}"`, {
    experiment_id: completed.id,
    actual_value: actualValue,
  });
  return completed;
}

export function cancelExperiment(db: RevenueDb, experimentId: number, opts: ExperimentOptions = {}): Experiment {
  const now = nowOf(opts);
  requireStatus(getExperiment(db, experimentId), ['draft', 'running'], 'cancel');

  return db
    .update(experiments)
    .set({ status: 'canceled', ended_at: now, updated_at: now })
    .where(eq(experiments.id, experimentId))
    .returning()
    .get();
}

export function getActiveExperiments(db: RevenueDb): Experiment[] {
  return db
    .select()
    .from(experiments)
    .where(eq(experiments.status, 'running'))
    .orderBy(desc(experiments.started_at), desc(experiments.id))
    .all();
}

export function listExperiments(db: RevenueDb, opts: { status?: ExperimentStatus } = {}): Experiment[] {
  return db
    .select()
    .from(experiments)
    .where(opts.status ? eq(experiments.status, opts.status) : undefined)
    .orderBy(desc(experiments.created_at), desc(experiments.id))
    .all();
}

/** Completed experiments, most recently ended first. */
export function getExperimentHistory(
  db: RevenueDb,
  opts: { metric?: ExperimentMetric; limit?: number } = {},
): Experiment[] {
  return db
    .select()
    .from(experiments)
    .where(
      and(
        eq(experiments.status, 'completed'),
        ...(opts.metric ? [eq(experiments.metric_tracked, opts.metric)] : []),
      ),
    )
    .orderBy(desc(experiments.ended_at), desc(experiments.id))
    .limit(opts.limit ?? 50)
    .all();
}

// ============================================================================
// Analysis and reporting
// ============================================================================

/**
 * Whether `value` reaches the target, moving in the direction the target
 * sets relative to the baseline.
 */
export function isTargetMet(baseline: number, target: number | null, value: number): boolean {
  if (target === null) return false;
  return target > baseline ? value >= target : value <= target;
}

export interface ExperimentAnalysis {
  status: 'running' | 'completed';
  experiment_id: number;
  name: string;
  metric: ExperimentMetric;
  baseline_value: number;
  current_value: number;
  target_value: number | null;
  improvement: number;
  improvement_percent: number;
  target_met: boolean;
  days_running: number;
}

export type AnalyzeResult = ExperimentAnalysis | { status: 'not_ready'; experiment_id: number; message: string };

export function analyzeExperiment(db: RevenueDb, experimentId: number, opts: { now?: string } = {}): AnalyzeResult {
  const now = nowOf(opts);
  const experiment = getExperiment(db, experimentId);
  if (experiment.status !== 'running' && experiment.status !== 'completed') {
    return { status: 'not_ready', experiment_id: experiment.id, message: 'Experiment not yet started' };
  }

  const current = calculateMetric(db, experiment.metric_tracked, experiment.affected_segment, { now });
  const baseline = experiment.baseline_value ?? 0;
  const improvement = baseline > 0 ? current - baseline : 0;

  return {
    status: experiment.status,
    experiment_id: experiment.id,
    name: experiment.name,
    metric: experiment.metric_tracked,
    baseline_value: baseline,
    current_value: current,
    target_value: experiment.target_value,
    improvement,
    improvement_percent: baseline > 0 ? (improvement / baseline) * 100 : 0,
    target_met: isTargetMet(baseline, experiment.target_value, current),
    days_running: experiment.started_at ? Math.max(0, daysBetween(experiment.started_at, now)) : 0,
  };
}

export interface ExperimentSummary {
  total_experiments: number;
  by_status: Partial<Record<ExperimentStatus, number>>;
  successful_experiments: number;
  success_rate: number;
}

function isSuccessful(e: Experiment): boolean {
  return (
    e.status === 'completed' &&
    e.actual_value !== null &&
    e.baseline_value !== null &&
    isTargetMet(e.baseline_value, e.target_value, e.actual_value)
  );
}

export function summarizeExperiments(db: RevenueDb): ExperimentSummary {
  const all = db.select().from(experiments).all();
  const byStatus: Partial<Record<ExperimentStatus, number>> = {};
  let successful = 0;

  for (const e of all) {
    byStatus[e.status] = (byStatus[e.status] ?? 0) + 1;
    if (isSuccessful(e)) successful++;
  }

  return {
    total_experiments: all.length,
    by_status: byStatus,
    successful_experiments: successful,
    success_rate: all.length > 0 ? (successful / all.length) * 100 : 0,
  };
}

export interface ExperimentReport {
  experiment_id: number;
  name: string;
  status: ExperimentStatus;
  metric: ExperimentMetric;
  hypothesis: string | null;
  change_description: string | null;
  baseline_value: number | null;
  target_value: number | null;
  actual_value: number | null;
  /** Null until there is an actual value and a positive baseline. */
  improvement_percent: number | null;
  target_met: boolean;
  outcome: string | null;
  started_at: string | null;
  ended_at: string | null;
}

function improvementPercent(baseline: number | null, actual: number | null): number | null {
  if (baseline === null || baseline <= 0 || actual === null) return null;
  return ((actual - baseline) / baseline) * 100;
}

export function reportExperiment(db: RevenueDb, experimentId: number): ExperimentReport {
  const e = getExperiment(db, experimentId);
  return {
    experiment_id: e.id,
    name: e.name,
    status: e.status,
    metric: e.metric_tracked,
    hypothesis: e.hypothesis,
    change_description: e.change_description,
    baseline_value: e.baseline_value,
    target_value: e.target_value,
    actual_value: e.actual_value,
    improvement_percent: improvementPercent(e.baseline_value, e.actual_value),
    target_met: isSuccessful(e),
    outcome: e.outcome,
    started_at: e.started_at,
    ended_at: e.ended_at,
  };
}

export interface Learning {
  experiment_id: number;
  name: string;
  metric: ExperimentMetric;
  hypothesis: string | null;
  change: string | null;
  improvement_percent: number;
  outcome: string | null;
  ended_at: string | null;
}

/** What completed experiments with a measurable result showed. */
export function getLearnings(db: RevenueDb, metric?: ExperimentMetric): Learning[] {
  const learnings: Learning[] = [];
  const completed = db
    .select()
    .from(experiments)
    .where(and(eq(experiments.status, 'completed'), ...(metric ? [eq(experiments.metric_tracked, metric)] : [])))
    .orderBy(desc(experiments.ended_at), desc(experiments.id))
    .all();

  for (const e of completed) {
    const improvement = improvementPercent(e.baseline_value, e.actual_value);
    if (improvement === null) continue;
    learnings.push({
      experiment_id: e.id,
      name: e.name,
      metric: e.metric_tracked,
      hypothesis: e.hypothesis,
      change: e.change_description,
      improvement_percent: improvement,
      outcome: e.outcome,
      ended_at: e.ended_at,
    });
  }
  return learnings;
}
