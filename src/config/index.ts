/**
 * Application configuration.
 *
 * Values come from the environment (the CLI loads `.env` through dotenv
 * first) and an optional JSON file whose `thresholds` block overrides
 * individual thresholds. The file wins over the environment.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ThresholdsSchema, type Thresholds } from '../contracts/index.js';
import type { LogLevel } from '../runner/logger.js';
import { RevenueLensError, formatZodIssues } from '../runner/errors.js';
import { safeJsonParse, validateSafePath } from '../security/index.js';

export const DEFAULT_DATABASE_PATH = './revenue-lens.db';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

const optionalNumber = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.coerce.number().optional(),
);

const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).optional(),
  STRIPE_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
  MRR_DECLINE_WARNING_PERCENT: optionalNumber,
  MRR_DECLINE_CRITICAL_PERCENT: optionalNumber,
  USAGE_MISMATCH_THRESHOLD: optionalNumber,
  SUPPORT_TICKET_SPIKE_THRESHOLD: optionalNumber,
});

export const ConfigFileSchema = z
  .object({
    database_path: z.string().min(1).optional(),
    log_level: LogLevelSchema.optional(),
    thresholds: ThresholdsSchema.partial().default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AppConfig {
  databasePath: string;
  stripeApiKey?: string;
  logLevel: LogLevel;
  thresholds: Thresholds;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  configPath?: string;
  /** CLI `--db`, wins over everything else. */
  databasePath?: string;
}

export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
  const envResult = EnvSchema.safeParse(opts.env ?? process.env);
  if (!envResult.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid environment: ${formatZodIssues(envResult.error)}`);
  }
  const env = envResult.data;
  const file = opts.configPath ? readConfigFile(opts.configPath) : undefined;

  const thresholdsResult = ThresholdsSchema.safeParse({
    mrr_decline_warning_percent: env.MRR_DECLINE_WARNING_PERCENT,
    mrr_decline_critical_percent: env.MRR_DECLINE_CRITICAL_PERCENT,
    usage_mismatch_threshold: env.USAGE_MISMATCH_THRESHOLD,
    support_ticket_spike_threshold: env.SUPPORT_TICKET_SPIKE_THRESHOLD,
    ...file?.thresholds,
  });
  if (!thresholdsResult.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid thresholds: ${formatZodIssues(thresholdsResult.error)}`);
  }
  const thresholds = thresholdsResult.data;

  if (thresholds.mrr_decline_critical_percent < thresholds.mrr_decline_warning_percent) {
    throw new RevenueLensError(
      'VALIDATION_ERROR',
      'mrr_decline_critical_percent must not be lower than mrr_decline_warning_percent',
    );
  }

  return {
    databasePath: opts.databasePath ?? file?.database_path ?? env.DATABASE_PATH ?? DEFAULT_DATABASE_PATH,
    ...(env.STRIPE_API_KEY && { stripeApiKey: env.STRIPE_API_KEY }),
    logLevel: file?.log_level ?? env.LOG_LEVEL ?? 'info',
    thresholds,
  };
}

function readConfigFile(configPath: string): ConfigFile {
  const pathCheck = validateSafePath(configPath);
  if (!pathCheck.valid) {
    throw new RevenueLensError('SECURITY_ERROR', pathCheck.error ?? 'Invalid config path');
  }

  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    throw new RevenueLensError('NOT_FOUND', `Config file not found: ${resolved}`);
  }

  const parsed = safeJsonParse(readFileSync(resolved, 'utf-8'));
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', parsed.error);
  }

  const result = ConfigFileSchema.safeParse(parsed.data);
  if (!result.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid config file: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
