/**
 * Denylist-based redaction for logs, evidence files and CLI output.
 *
 * Billing payloads carry customer e-mails and, in configuration, API
 * keys; neither may leave the process in clear text.
 */

/** Key fragments that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'stripe_key',
  'stripeapikey',
  'authorization',
  'credential',
  'private_key',
  'signing_key',
  'webhook_secret',
  'card_number',
  'cvc',
];

/** Value patterns matched regardless of key name. */
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /\b(?:sk|rk)_(?:live|test)_[0-9a-zA-Z]{16,}/,   // Stripe secret / restricted key
  /\bwhsec_[0-9a-zA-Z]{16,}/,                    // Stripe webhook signing secret
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/, // Email (PII)
];

/** Inline `name_key=value` style assignments found inside free text. */
const INLINE_ASSIGNMENT_PATTERNS: readonly RegExp[] = [
  /[a-zA-Z0-9_]+_key\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi,
  /[a-zA-Z0-9_]+_token\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi,
  /[a-zA-Z0-9_]+_secret\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi,
];

export const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return SENSITIVE_VALUE_PATTERNS.some((p) => p.test(value));
}

/**
 * Deep-redact a value: denylisted keys become `[REDACTED]`, and so does
 * any string matching a sensitive pattern. Never mutates the input.
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Replace inline secrets within a longer string, keeping the rest.
 */
export function redactString(input: string): string {
  let result = input;
  for (const pattern of SENSITIVE_VALUE_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, 'g'), REDACTED);
  }
  for (const pattern of INLINE_ASSIGNMENT_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}
