/**
 * Artifact layout manager for `revlens run`.
 *
 *   <base>/artifacts/<runId>/logs.jsonl
 *   <base>/artifacts/<runId>/evidence/*.json
 *   <base>/artifacts/<runId>/summary.json
 */

import { mkdirSync, writeFileSync } from 'fs';
import { resolve, join } from 'path';
import { createHash, randomUUID } from 'crypto';
import { redact } from './redact.js';
import type { RunnerErrorEnvelope } from './errors.js';

export interface ArtifactSummary {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  exit_code: number;
  idempotency_key: string;
  artifact_dir: string;
  files: string[];
  error?: RunnerErrorEnvelope;
  stats?: Record<string, unknown>;
}

export interface ArtifactWriter {
  readonly dir: string;
  readonly runId: string;
  readonly logsPath: string;

  /** Write a redacted JSON evidence file into evidence/. */
  writeEvidence(name: string, data: unknown): string;

  /** Write summary.json and return it. */
  finalize(opts: {
    command: string;
    startedAt: string;
    exitCode: number;
    idempotencyKey: string;
    error?: RunnerErrorEnvelope;
    stats?: Record<string, unknown>;
  }): ArtifactSummary;
}

/**
 * Run id of the form YYYYMMDD-HHmmss-<short-uuid>, in UTC.
 */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}-${time}-${randomUUID().slice(0, 8)}`;
}

/**
 * SHA-256 over the command name and its inputs, usable as a file-safe
 * dedup token.
 */
export function buildIdempotencyKey(parts: string[]): string {
  const hash = createHash('sha256');
  for (const p of parts) hash.update(p).update('\u0000');
  return hash.digest('hex');
}

export function createArtifactWriter(base: string, runId?: string): ArtifactWriter {
  const id = runId ?? generateRunId();
  const dir = resolve(base, 'artifacts', id);
  const evidenceDir = join(dir, 'evidence');
  const logsPath = join(dir, 'logs.jsonl');

  mkdirSync(evidenceDir, { recursive: true });

  const evidenceFiles: string[] = [];

  return {
    dir,
    runId: id,
    logsPath,

    writeEvidence(name: string, data: unknown): string {
      const safeName = name.replace(/[^a-zA-Z0-9_-]/g, '_');
      const filePath = join(evidenceDir, `${safeName}.json`);
      writeFileSync(filePath, JSON.stringify(redact(data), null, 2), 'utf-8');
      evidenceFiles.push(`evidence/${safeName}.json`);
      return filePath;
    },

    finalize(opts): ArtifactSummary {
      const summary: ArtifactSummary = {
        run_id: id,
        command: opts.command,
        started_at: opts.startedAt,
        finished_at: new Date().toISOString(),
        exit_code: opts.exitCode,
        idempotency_key: opts.idempotencyKey,
        artifact_dir: dir,
        files: ['logs.jsonl', ...evidenceFiles, 'summary.json'],
        ...(opts.error && { error: opts.error }),
        ...(opts.stats && { stats: opts.stats }),
      };

      writeFileSync(join(dir, 'summary.json'), JSON.stringify(summary, null, 2), 'utf-8');
      return summary;
    },
  };
}
