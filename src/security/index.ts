/**
 * Input hygiene for files handed to the CLI.
 *
 * - Reject paths with traversal sequences or null bytes
 * - Bound JSON input size before parsing
 */

export interface PathCheck {
  valid: boolean;
  sanitized?: string;
  error?: string;
}

/**
 * Validates a user-supplied file path. Absolute paths are accepted
 * (database files and exports usually live outside the working tree);
 * `..` segments are not.
 */
export function validateSafePath(inputPath: string): PathCheck {
  if (inputPath.length === 0) {
    return { valid: false, error: 'Path is empty' };
  }

  if (inputPath.includes('\0')) {
    return { valid: false, error: 'Path contains null bytes' };
  }

  const segments = inputPath.replace(/\\/g, '/').split('/');
  if (segments.includes('..')) {
    return { valid: false, error: 'Path traversal detected' };
  }

  return { valid: true, sanitized: inputPath };
}

export const DEFAULT_MAX_JSON_BYTES = 10 * 1024 * 1024;

/**
 * Parses JSON with a size limit. The result is `unknown`; callers
 * validate it with a schema.
 */
export function safeJsonParse(
  input: string,
  options: { maxSize?: number } = {},
): { success: true; data: unknown } | { success: false; error: string } {
  const { maxSize = DEFAULT_MAX_JSON_BYTES } = options;

  if (Buffer.byteLength(input, 'utf-8') > maxSize) {
    return { success: false, error: `Input exceeds maximum size of ${maxSize} bytes` };
  }

  try {
    const data: unknown = JSON.parse(input);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Invalid JSON';
    return { success: false, error: `JSON parse error: ${message}` };
  }
}
