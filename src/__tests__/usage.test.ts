import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  bulkImportUsage,
  calculateUsageTrend,
  countRecentTickets,
  getUsageSummary,
  loadRecentUsage,
  recordSupportTicket,
  recordUsage,
} from '../usage/index.js';
import type { DatabaseHandle } from '../db/index.js';
import { NOW, PERIOD_END, PERIOD_START, errorCodeOf, openTestDb, seedCatalog, subscribe } from './fixtures.js';

describe('Usage', () => {
  let handle: DatabaseHandle;
  let subscriptionId: number;

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
  // Recording
  // ---------------------------------------------------------------------------

  describe('recordUsage', () => {
    it('should attach the plan limit and the billing period', () => {
      const record = recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 2500 }, { now: NOW });
      expect(record.subscription_id).toBe(subscriptionId);
      expect(record.limit).toBe(10000);
      expect(record.period_start).toBe(PERIOD_START);
      expect(record.period_end).toBe(PERIOD_END);
      expect(record.recorded_at).toBe(NOW);
    });

    it('should leave the limit empty for metrics the plan does not limit', () => {
      const record = recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'exports', quantity: 3 }, { now: NOW });
      expect(record.limit).toBeNull();
    });

    it('should require an active subscription', () => {
      expect(
        errorCodeOf(() => recordUsage(handle.db, { customer_id: 'cus_none', metric_name: 'api_calls', quantity: 1 })),
      ).toBe('NOT_FOUND');
    });

    it('should reject negative quantities and inverted periods', () => {
      expect(
        errorCodeOf(() => recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: -1 })),
      ).toBe('VALIDATION_ERROR');
      expect(
        errorCodeOf(() =>
          recordUsage(handle.db, {
            customer_id: 'cus_1',
            metric_name: 'api_calls',
            quantity: 1,
            period_start: PERIOD_END,
            period_end: PERIOD_START,
          }),
        ),
      ).toBe('VALIDATION_ERROR');
    });
  });

  describe('getUsageSummary', () => {
    it('should total quantities per metric with utilization', () => {
      recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 3000 }, { now: NOW });
      recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 2000 }, { now: NOW });
      recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'exports', quantity: 4 }, { now: NOW });

      expect(getUsageSummary(handle.db, subscriptionId)).toEqual({
        api_calls: { total: 5000, limit: 10000, utilization: 0.5 },
        exports: { total: 4, limit: null, utilization: 0 },
      });
    });

    it('should bound records to a period', () => {
      recordUsage(handle.db, {
        customer_id: 'cus_1',
        metric_name: 'api_calls',
        quantity: 700,
        period_start: '2024-05-01T00:00:00.000Z',
        period_end: '2024-06-01T00:00:00.000Z',
      });
      recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 100 }, { now: NOW });

      const summary = getUsageSummary(handle.db, subscriptionId, { periodStart: PERIOD_START, periodEnd: PERIOD_END });
      expect(summary['api_calls']?.total).toBe(100);
    });
  });

  describe('bulkImportUsage', () => {
    it('should import valid rows and report the rest', () => {
      const result = bulkImportUsage(
        handle.db,
        [
          { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 10 },
          { customer_id: 'cus_none', metric_name: 'api_calls', quantity: 1 },
          { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 'lots' },
        ],
        { now: NOW },
      );

      expect(result.imported).toBe(1);
      expect(result.errors).toEqual([
        { index: 1, customer_id: 'cus_none', error: 'No active subscription for customer cus_none' },
        { index: 2, customer_id: 'cus_1', error: 'quantity: Expected number, received string' },
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Trend
  // ---------------------------------------------------------------------------

  describe('calculateUsageTrend', () => {
    const at = (day: number): string => `2024-06-${String(day).padStart(2, '0')}T00:00:00.000Z`;

    it('should compare the newer half with the older half', () => {
      const records = [
        { quantity: 50, recorded_at: at(10) },
        { quantity: 100, recorded_at: at(1) },
        { quantity: 50, recorded_at: at(12) },
        { quantity: 100, recorded_at: at(3) },
      ];
      expect(calculateUsageTrend(records)).toBe(-0.5);
    });

    it('should put the extra record of an odd count in the newer half', () => {
      const records = [
        { quantity: 10, recorded_at: at(1) },
        { quantity: 20, recorded_at: at(2) },
        { quantity: 30, recorded_at: at(3) },
      ];
      expect(calculateUsageTrend(records)).toBe(1.5);
    });

    it('should be 0 with too few records or an idle start', () => {
      expect(calculateUsageTrend([])).toBe(0);
      expect(calculateUsageTrend([{ quantity: 5, recorded_at: at(1) }])).toBe(0);
      expect(
        calculateUsageTrend([
          { quantity: 0, recorded_at: at(1) },
          { quantity: 10, recorded_at: at(2) },
        ]),
      ).toBe(0);
    });
  });

  describe('loadRecentUsage', () => {
    it('should keep records between the look-back start and now', () => {
      for (const recorded_at of ['2024-05-01T00:00:00.000Z', '2024-06-10T00:00:00.000Z', '2024-06-20T00:00:00.000Z']) {
        recordUsage(handle.db, { customer_id: 'cus_1', metric_name: 'api_calls', quantity: 10, recorded_at }, { now: NOW });
      }

      expect(loadRecentUsage(handle.db, subscriptionId, 30, NOW).map((r) => r.recorded_at)).toEqual([
        '2024-06-10T00:00:00.000Z',
      ]);
    });
  });
});

// ---------------------------------------------------------------------------
// Support tickets
// ---------------------------------------------------------------------------

describe('Support tickets', () => {
  let handle: DatabaseHandle;

  beforeEach(() => {
    handle = openTestDb();
    seedCatalog(handle.db);
    subscribe(handle.db, { id: 'sub_1', customer: 'cus_1', price: 'price_pro', amount: 9900 });
  });

  afterEach(() => {
    handle.close();
  });

  it('should link tickets to the active subscription', () => {
    const ticket = recordSupportTicket(handle.db, { customer_id: 'cus_1', subject: 'Export failing' }, { now: NOW });
    expect(ticket.severity).toBe('normal');
    expect(ticket.subscription_id).not.toBeNull();
    expect(ticket.opened_at).toBe(NOW);

    const orphan = recordSupportTicket(handle.db, { customer_id: 'cus_prospect', severity: 'low' }, { now: NOW });
    expect(orphan.subscription_id).toBeNull();
  });

  it('should reject unparseable timestamps', () => {
    expect(
      errorCodeOf(() => recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: 'yesterday' })),
    ).toBe('VALIDATION_ERROR');
  });

  it('should count tickets inside the look-back window', () => {
    recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-06-14T00:00:00.000Z' });
    recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-06-01T00:00:00.000Z' });
    recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-04-01T00:00:00.000Z' });
    recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-06-20T00:00:00.000Z' });

    expect(countRecentTickets(handle.db, 'cus_1', 30, NOW)).toBe(2);
    expect(countRecentTickets(handle.db, 'cus_1', 7, NOW)).toBe(1);
  });
});
