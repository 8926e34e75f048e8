import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { countBySeverity, listAlerts, raiseAlert, resolveAlert, type AlertInput } from '../alerts/index.js';
import type { DatabaseHandle } from '../db/index.js';
import { NOW, errorCodeOf, openTestDb, seedCatalog, subscribe } from './fixtures.js';

describe('Alerts', () => {
  let handle: DatabaseHandle;
  let subscriptionId: number;

  const payment: AlertInput = {
    alert_type: 'payment_retry',
    severity: 'warning',
    customer_id: 'cus_1',
    title: 'Payment Issue: cus_1',
    description: 'Payment failed (attempt 1)',
  };

  beforeEach(() => {
    handle = openTestDb();
    seedCatalog(handle.db);
    subscriptionId = subscribe(handle.db, { id: 'sub_1', customer: 'cus_1', price: 'price_pro', amount: 9900 })
      .subscription_id ?? 0;
  });

  afterEach(() => {
    handle.close();
  });

  // ---------------------------------------------------------------------------
  // Deduplication
  // ---------------------------------------------------------------------------

  describe('raiseAlert', () => {
    it('should store the alert with defaults', () => {
      const { alert, created } = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: NOW });
      expect(created).toBe(true);
      expect(alert).toMatchObject({
        alert_type: 'payment_retry',
        severity: 'warning',
        customer_id: 'cus_1',
        subscription_id: null,
        data: {},
        recommended_action: null,
        is_resolved: false,
        created_at: NOW,
      });
    });

    it('should keep one open alert per customer and type', () => {
      const first = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: NOW });
      const again = raiseAlert(handle.db, { ...payment, severity: 'critical' }, { dedupeBy: 'customer', now: NOW });
      expect(again).toEqual({ alert: first.alert, created: false });

      expect(raiseAlert(handle.db, { ...payment, customer_id: 'cus_2' }, { dedupeBy: 'customer' }).created).toBe(true);
      expect(raiseAlert(handle.db, { ...payment, alert_type: 'plan_downgrade' }, { dedupeBy: 'customer' }).created).toBe(
        true,
      );
    });

    it('should keep one open alert per subscription and type', () => {
      const input: AlertInput = { ...payment, alert_type: 'usage_mismatch_high', subscription_id: subscriptionId };
      expect(raiseAlert(handle.db, input, { dedupeBy: 'subscription' }).created).toBe(true);
      expect(raiseAlert(handle.db, input, { dedupeBy: 'subscription' }).created).toBe(false);
    });

    it('should keep one open account-wide alert per type', () => {
      const input: AlertInput = { alert_type: 'mrr_decline', severity: 'warning', title: 'MRR Decline Alert', description: 'x' };
      expect(raiseAlert(handle.db, input, { dedupeBy: 'type' }).created).toBe(true);
      expect(raiseAlert(handle.db, { ...input, severity: 'critical' }, { dedupeBy: 'type' }).created).toBe(false);
    });

    it('should open a new alert once the previous one is resolved', () => {
      const first = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: NOW });
      resolveAlert(handle.db, first.alert.id, { now: NOW });
      const second = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: NOW });
      expect(second.created).toBe(true);
      expect(second.alert.id).not.toBe(first.alert.id);
    });
  });

  // ---------------------------------------------------------------------------
  // Listing and resolving
  // ---------------------------------------------------------------------------

  describe('listAlerts', () => {
    it('should filter by status and type, newest first', () => {
      const older = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: '2024-06-01T00:00:00.000Z' }).alert;
      const newer = raiseAlert(
        handle.db,
        { ...payment, alert_type: 'plan_downgrade', title: 'Recent Downgrade: cus_1' },
        { dedupeBy: 'customer', now: '2024-06-02T00:00:00.000Z' },
      ).alert;
      const done = raiseAlert(
        handle.db,
        { ...payment, customer_id: 'cus_2' },
        { dedupeBy: 'customer', now: '2024-06-03T00:00:00.000Z' },
      ).alert;
      resolveAlert(handle.db, done.id, { now: NOW });

      expect(listAlerts(handle.db).map((a) => a.id)).toEqual([newer.id, older.id]);
      expect(listAlerts(handle.db, { status: 'resolved' }).map((a) => a.id)).toEqual([done.id]);
      expect(listAlerts(handle.db, { status: 'all' }).map((a) => a.id)).toEqual([done.id, newer.id, older.id]);
      expect(listAlerts(handle.db, { type: 'plan_downgrade' }).map((a) => a.id)).toEqual([newer.id]);
      expect(listAlerts(handle.db, { status: 'all', limit: 1 }).map((a) => a.id)).toEqual([done.id]);
    });
  });

  describe('resolveAlert', () => {
    it('should mark the alert resolved once', () => {
      const { alert } = raiseAlert(handle.db, payment, { dedupeBy: 'customer', now: NOW });
      const resolved = resolveAlert(handle.db, alert.id, { now: '2024-06-16T00:00:00.000Z' });
      expect(resolved.is_resolved).toBe(true);
      expect(resolved.resolved_at).toBe('2024-06-16T00:00:00.000Z');

      const again = resolveAlert(handle.db, alert.id, { now: '2024-06-20T00:00:00.000Z' });
      expect(again.resolved_at).toBe('2024-06-16T00:00:00.000Z');
    });

    it('should report unknown alerts', () => {
      expect(errorCodeOf(() => resolveAlert(handle.db, 404))).toBe('NOT_FOUND');
    });
  });

  it('should count alerts by severity', () => {
    raiseAlert(handle.db, payment, { dedupeBy: 'customer' });
    raiseAlert(handle.db, { ...payment, customer_id: 'cus_2', severity: 'critical' }, { dedupeBy: 'customer' });
    raiseAlert(handle.db, { ...payment, customer_id: 'cus_3', severity: 'critical' }, { dedupeBy: 'customer' });
    expect(countBySeverity(listAlerts(handle.db))).toEqual({ informational: 0, warning: 1, critical: 2 });
  });
});
