import { describe, it, expect } from 'vitest';
import { safeJsonParse, validateSafePath } from '../security/index.js';

describe('Security', () => {
  // ---------------------------------------------------------------------------
  // Paths
  // ---------------------------------------------------------------------------

  describe('validateSafePath', () => {
    it('should accept relative and absolute paths', () => {
      expect(validateSafePath('webhooks.json')).toEqual({ valid: true, sanitized: 'webhooks.json' });
      expect(validateSafePath('/var/data/events.json').valid).toBe(true);
      expect(validateSafePath('exports/file..json').valid).toBe(true);
    });

    it('should reject traversal', () => {
      expect(validateSafePath('../etc/passwd')).toEqual({ valid: false, error: 'Path traversal detected' });
      expect(validateSafePath('data/../../secrets.json').valid).toBe(false);
      expect(validateSafePath('data\\..\\secrets.json').valid).toBe(false);
    });

    it('should reject empty paths and null bytes', () => {
      expect(validateSafePath('')).toEqual({ valid: false, error: 'Path is empty' });
      expect(validateSafePath('events.json\0.txt')).toEqual({ valid: false, error: 'Path contains null bytes' });
    });
  });

  // ---------------------------------------------------------------------------
  // JSON
  // ---------------------------------------------------------------------------

  describe('safeJsonParse', () => {
    it('should parse valid JSON', () => {
      expect(safeJsonParse('[{"id":"evt_1"}]')).toEqual({ success: true, data: [{ id: 'evt_1' }] });
    });

    it('should report parse errors', () => {
      const result = safeJsonParse('{ not json');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.startsWith('JSON parse error: ')).toBe(true);
    });

    it('should enforce the size limit before parsing', () => {
      expect(safeJsonParse('{"a":1}', { maxSize: 3 })).toEqual({
        success: false,
        error: 'Input exceeds maximum size of 3 bytes',
      });
    });
  });
});
