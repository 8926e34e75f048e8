import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  redact,
  redactString,
  REDACT_DENYLIST_KEYS,
  REDACTED,
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  formatZodIssues,
  RevenueLensError,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  createArtifactWriter,
  generateRunId,
  buildIdempotencyKey,
  createLogger,
  withRetry,
} from '../runner/index.js';

// Built at runtime so no literal key-shaped string sits in the source.
const STRIPE_KEY = ['sk', 'test', 'placeholderplaceholder'].join('_');
const WEBHOOK_SECRET = ['whsec', 'placeholderplaceholder'].join('_');

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

describe('Redaction', () => {
  it('redacts denylist keys in nested objects', () => {
    const result = redact({
      name: 'test',
      stripe_api_key: 'anything',
      nested: { webhook_secret: 'test-secret', safe: 'visible' },
    });
    expect(result).toEqual({
      name: 'test',
      stripe_api_key: REDACTED,
      nested: { webhook_secret: REDACTED, safe: 'visible' },
    });
  });

  it('redacts Stripe keys, signing secrets and e-mails by value', () => {
    expect(redact(STRIPE_KEY)).toBe(REDACTED);
    expect(redact(WEBHOOK_SECRET)).toBe(REDACTED);
    expect(redact('billing@example.com')).toBe(REDACTED);
  });

  it('leaves ordinary billing values alone', () => {
    expect(redact('cus_123')).toBe('cus_123');
    expect(redact({ amount_cents: 500, support_ticket_count: 2 })).toEqual({ amount_cents: 500, support_ticket_count: 2 });
  });

  it('redacts values in arrays', () => {
    expect(redact(['safe', STRIPE_KEY])).toEqual(['safe', REDACTED]);
  });

  it('handles null and undefined', () => {
    expect(redact(null)).toBe(null);
    expect(redact(undefined)).toBe(undefined);
  });

  it('replaces inline secrets but keeps the surrounding text', () => {
    expect(redactString(`Stripe rejected ${STRIPE_KEY} today`)).toBe(`Stripe rejected ${REDACTED} today`);
  });

  it('denylist covers the credential keys', () => {
    for (const key of ['password', 'secret', 'token', 'api_key', 'webhook_secret']) {
      expect(REDACT_DENYLIST_KEYS).toContain(key);
    }
  });
});

// ---------------------------------------------------------------------------
// Error envelopes
// ---------------------------------------------------------------------------

describe('Error envelopes', () => {
  it('creates envelope with correct fields', () => {
    const env = createErrorEnvelope('VALIDATION_ERROR', 'Bad input');
    expect(env).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Bad input',
      userMessage: 'Bad input',
      retryable: false,
      cause: undefined,
      context: undefined,
    });
  });

  it('marks upstream and IO failures retryable, conflicts not', () => {
    expect(createErrorEnvelope('UPSTREAM_ERROR', 'Stripe down').retryable).toBe(true);
    expect(createErrorEnvelope('IO_ERROR', 'Disk full').retryable).toBe(true);
    expect(createErrorEnvelope('CONFLICT', 'Already running').retryable).toBe(false);
  });

  it('redacts secrets from userMessage', () => {
    const env = createErrorEnvelope('INTERNAL_ERROR', `Key ${STRIPE_KEY} leaked`);
    expect(env.userMessage).toBe(`Key ${REDACTED} leaked`);
  });

  it('keeps the code and context of domain errors', () => {
    const env = wrapError(new RevenueLensError('NOT_FOUND', 'Plan 9 not found', { context: { plan_id: 9 } }));
    expect(env.code).toBe('NOT_FOUND');
    expect(env.message).toBe('Plan 9 not found');
    expect(env.context).toEqual({ plan_id: 9 });
  });

  it('maps zod errors to VALIDATION_ERROR', () => {
    const parsed = z.object({ quantity: z.number() }).safeParse({ quantity: 'x' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(formatZodIssues(parsed.error)).toBe('quantity: Expected number, received string');
    const env = wrapError(parsed.error);
    expect(env.code).toBe('VALIDATION_ERROR');
    expect(env.message).toBe('quantity: Expected number, received string');
  });

  it('wraps unknown errors', () => {
    expect(wrapError(new Error('boom')).code).toBe('INTERNAL_ERROR');
    expect(wrapError('string error').message).toBe('string error');
  });
});

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

describe('Exit codes', () => {
  it('maps codes to exit statuses', () => {
    expect(exitCodeFor('VALIDATION_ERROR')).toBe(EXIT_VALIDATION);
    expect(exitCodeFor('NOT_FOUND')).toBe(EXIT_VALIDATION);
    expect(exitCodeFor('CONFLICT')).toBe(EXIT_VALIDATION);
    expect(exitCodeFor('UPSTREAM_ERROR')).toBe(EXIT_DEPENDENCY);
    expect(exitCodeFor('IO_ERROR')).toBe(EXIT_DEPENDENCY);
    expect(exitCodeFor('INTERNAL_ERROR')).toBe(EXIT_BUG);
  });

  it('constants are correct', () => {
    expect([EXIT_SUCCESS, EXIT_VALIDATION, EXIT_DEPENDENCY, EXIT_BUG]).toEqual([0, 2, 3, 4]);
  });
});

// ---------------------------------------------------------------------------
// Artifacts
// ---------------------------------------------------------------------------

describe('Artifacts', () => {
  let tmpBase: string;

  beforeEach(() => {
    tmpBase = mkdtempSync(join(tmpdir(), 'revlens-artifacts-'));
  });

  afterEach(() => {
    rmSync(tmpBase, { recursive: true, force: true });
  });

  it('generates UTC run ids', () => {
    expect(generateRunId(new Date('2024-03-05T07:08:09Z'))).toMatch(/^20240305-070809-[a-f0-9]{8}$/);
    expect(generateRunId()).not.toBe(generateRunId());
  });

  it('builds deterministic idempotency keys', () => {
    const key1 = buildIdempotencyKey(['run', 'db.sqlite', '2024-03-05']);
    expect(buildIdempotencyKey(['run', 'db.sqlite', '2024-03-05'])).toBe(key1);
    expect(buildIdempotencyKey(['run', 'db.sqlite', '2024-03-06'])).not.toBe(key1);
    expect(buildIdempotencyKey(['ab', 'c'])).not.toBe(buildIdempotencyKey(['a', 'bc']));
    expect(key1).toMatch(/^[a-f0-9]{64}$/);
  });

  it('creates artifacts/<runId>/evidence', () => {
    const aw = createArtifactWriter(tmpBase, 'run-1');
    expect(aw.dir).toBe(join(tmpBase, 'artifacts', 'run-1'));
    expect(existsSync(join(aw.dir, 'evidence'))).toBe(true);
    expect(aw.logsPath).toBe(join(aw.dir, 'logs.jsonl'));
  });

  it('writes evidence files with redaction and a safe name', () => {
    const aw = createArtifactWriter(tmpBase, 'run-1');
    const path = aw.writeEvidence('risk scan', { safe: 'value', api_key: 'test-secret' });
    expect(path).toBe(join(aw.dir, 'evidence', 'risk_scan.json'));
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ safe: 'value', api_key: REDACTED });
  });

  it('writes summary.json on finalize', () => {
    const aw = createArtifactWriter(tmpBase, 'run-1');
    aw.writeEvidence('snapshot', { total_mrr_cents: 100 });

    const summary = aw.finalize({
      command: 'run',
      startedAt: '2024-03-05T00:00:00.000Z',
      exitCode: 0,
      idempotencyKey: 'test-key',
      stats: { alerts_created: 1 },
    });

    expect(summary.run_id).toBe('run-1');
    expect(summary.files).toEqual(['logs.jsonl', 'evidence/snapshot.json', 'summary.json']);
    expect(summary.stats).toEqual({ alerts_created: 1 });

    const onDisk = JSON.parse(readFileSync(join(aw.dir, 'summary.json'), 'utf-8'));
    expect(onDisk.idempotency_key).toBe('test-key');
    expect(onDisk.error).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Structured Logger
// ---------------------------------------------------------------------------

describe('Structured Logger', () => {
  let tmpBase: string;

  beforeEach(() => {
    tmpBase = mkdtempSync(join(tmpdir(), 'revlens-logger-'));
  });

  afterEach(() => {
    rmSync(tmpBase, { recursive: true, force: true });
  });

  it('writes JSONL entries to file', () => {
    const logPath = join(tmpBase, 'logs.jsonl');
    const logger = createLogger({ module: 'revlens', filePath: logPath, runId: 'run-1', sink: () => undefined });

    logger.info('ingest.batch', 'Ingested 2 events');
    logger.warn('ingest.invalid', 'Event rejected');

    const lines = readFileSync(logPath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.level).toBe('info');
    expect(entry.module).toBe('revlens');
    expect(entry.action).toBe('ingest.batch');
    expect(entry.run_id).toBe('run-1');
  });

  it('respects minLevel', () => {
    const logger = createLogger({ module: 'test', minLevel: 'warn', sink: () => undefined });
    logger.debug('d', 'debug');
    logger.info('i', 'info');
    logger.warn('w', 'warn');
    logger.error('e', 'error');
    expect(logger.entries().map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('redacts data in log entries', () => {
    const logger = createLogger({ module: 'test', sink: () => undefined });
    logger.info('config.loaded', 'Loaded', { stripe_api_key: STRIPE_KEY, database_path: './db.sqlite' });
    expect(logger.entries()[0]?.data).toEqual({ stripe_api_key: REDACTED, database_path: './db.sqlite' });
  });

  it('child loggers share the buffer under a dotted module', () => {
    const logger = createLogger({ module: 'revlens', sink: () => undefined });
    logger.child('risk').info('risk.scan', 'done');
    expect(logger.entries()[0]?.module).toBe('revlens.risk');
  });

  it('sends only errors to the sink unless json is set', () => {
    const quiet: string[] = [];
    const q = createLogger({ module: 'test', sink: (l) => quiet.push(l) });
    q.info('a', 'info');
    q.error('b', 'error');
    expect(quiet).toHaveLength(1);

    const loud: string[] = [];
    const l = createLogger({ module: 'test', json: true, sink: (line) => loud.push(line) });
    l.info('a', 'info');
    expect(loud).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

describe('Retry', () => {
  it('succeeds on first attempt', async () => {
    const result = await withRetry(() => 42);
    expect(result).toEqual({ success: true, value: 42, attempts: 1, errors: [] });
  });

  it('backs off exponentially between attempts', async () => {
    const waits: number[] = [];
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error('rate limited');
        return 'ok';
      },
      { sleep: async (ms) => { waits.push(ms); } },
    );
    expect(result.success).toBe(true);
    expect(result.value).toBe('ok');
    expect(result.attempts).toBe(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it('stops at the first non-retryable error', async () => {
    const bad = new RevenueLensError('SECURITY_ERROR', 'bad key');
    const result = await withRetry(
      () => { throw bad; },
      { isRetryable: () => false, sleep: async () => undefined },
    );
    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.lastError).toBe(bad);
  });

  it('fails after max attempts', async () => {
    const result = await withRetry(
      () => { throw new Error('always fail'); },
      {
        policy: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1, backoffFactor: 2 },
        sleep: async () => undefined,
      },
    );
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['attempt 1: always fail', 'attempt 2: always fail']);
  });
});
