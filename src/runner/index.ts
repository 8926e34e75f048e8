/**
 * Runner infrastructure shared by every command: structured logging,
 * artifact layout, error envelopes, redaction and retry.
 */

// Artifacts
export {
  createArtifactWriter,
  generateRunId,
  buildIdempotencyKey,
  type ArtifactWriter,
  type ArtifactSummary,
} from './artifacts.js';

// Logger
export {
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  RevenueLensError,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  formatZodIssues,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactString,
  REDACTED,
  REDACT_DENYLIST_KEYS,
} from './redact.js';

// Retry
export {
  withRetry,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryResult,
  type RetryOptions,
} from './retry.js';
