import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  categorize,
  computeExpansionScore,
  engagementRatio,
  getCustomerScore,
  listCustomerScores,
  scoreAllCustomers,
  scoreCustomer,
} from '../expansion/index.js';
import { recordSupportTicket, recordUsage } from '../usage/index.js';
import type { DatabaseHandle } from '../db/index.js';
import { NOW, errorCodeOf, openTestDb, seedCatalog, sendSubscriptionEvent, subscribe } from './fixtures.js';

describe('Expansion scoring', () => {
  // ---------------------------------------------------------------------------
  // Heuristic
  // ---------------------------------------------------------------------------

  describe('computeExpansionScore', () => {
    it('should add tenure, trend and engagement points', () => {
      expect(computeExpansionScore({ tenure_days: 400, usage_trend: 0.6, engagement: 1.2 })).toEqual({
        score: 100,
        category: 'safe_to_upsell',
      });
      expect(computeExpansionScore({ tenure_days: 200, usage_trend: 0.3, engagement: 0 })).toEqual({
        score: 45,
        category: 'neutral',
      });
      expect(computeExpansionScore({ tenure_days: 100, usage_trend: 0.1, engagement: 0.5 })).toEqual({
        score: 35,
        category: 'do_not_touch',
      });
    });

    it('should flag falling usage as likely_to_churn with a penalty', () => {
      expect(computeExpansionScore({ tenure_days: 400, usage_trend: -0.5, engagement: 0.5 })).toEqual({
        score: 15,
        category: 'likely_to_churn',
      });
      expect(computeExpansionScore({ tenure_days: 10, usage_trend: -0.5, engagement: 0 })).toEqual({
        score: 0,
        category: 'likely_to_churn',
      });
    });

    it('should categorize on the 70 and 40 boundaries', () => {
      expect(categorize(70)).toBe('safe_to_upsell');
      expect(categorize(69.9)).toBe('neutral');
      expect(categorize(40)).toBe('neutral');
      expect(categorize(39)).toBe('do_not_touch');
    });

    it('should average usage over limit where a limit exists', () => {
      expect(
        engagementRatio([
          { quantity: 500, limit: 1000 },
          { quantity: 1000, limit: 1000 },
          { quantity: 7, limit: null },
          { quantity: 3, limit: 0 },
        ]),
      ).toBe(0.75);
      expect(engagementRatio([])).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  describe('scoreCustomer', () => {
    let handle: DatabaseHandle;

    const useOn = (day: string, quantity: number): void => {
      recordUsage(handle.db, {
        customer_id: 'cus_1',
        metric_name: 'api_calls',
        quantity,
        recorded_at: `2024-06-${day}T00:00:00.000Z`,
      });
    };

    beforeEach(() => {
      handle = openTestDb();
      seedCatalog(handle.db);
      subscribe(handle.db, {
        id: 'sub_1',
        customer: 'cus_1',
        price: 'price_pro',
        amount: 9900,
        created: '2023-01-01T00:00:00.000Z',
      });
      subscribe(handle.db, {
        id: 'sub_2',
        customer: 'cus_2',
        price: 'price_starter',
        amount: 2900,
        created: '2024-06-01T00:00:00.000Z',
      });
    });

    afterEach(() => {
      handle.close();
    });

    it('should score from tenure, usage trend and engagement', () => {
      useOn('01', 2000);
      useOn('05', 2000);
      useOn('10', 6000);
      useOn('14', 6000);
      recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-06-02T00:00:00.000Z' });
      recordSupportTicket(handle.db, { customer_id: 'cus_1', opened_at: '2024-06-03T00:00:00.000Z' });

      const score = scoreCustomer(handle.db, 'cus_1', { now: NOW });
      expect(score).toMatchObject({
        customer_id: 'cus_1',
        expansion_score: 82,
        expansion_category: 'safe_to_upsell',
        tenure_days: 531,
        usage_trend: 2,
        support_ticket_count: 2,
        calculated_at: NOW,
      });
      expect(score.engagement_score).toBeCloseTo(0.4);
    });

    it('should keep one row per customer', () => {
      scoreCustomer(handle.db, 'cus_1', { now: NOW });
      const later = scoreCustomer(handle.db, 'cus_1', { now: '2024-06-20T00:00:00.000Z' });
      expect(listCustomerScores(handle.db).filter((s) => s.customer_id === 'cus_1')).toHaveLength(1);
      expect(getCustomerScore(handle.db, 'cus_1')?.calculated_at).toBe(later.calculated_at);
    });

    it('should require an active subscription', () => {
      expect(errorCodeOf(() => scoreCustomer(handle.db, 'cus_unknown', { now: NOW }))).toBe('NOT_FOUND');
    });

    it('should score every active customer', () => {
      useOn('01', 2000);
      useOn('05', 2000);
      useOn('10', 6000);
      useOn('14', 6000);
      subscribe(handle.db, { id: 'sub_3', customer: 'cus_3', price: 'price_pro', amount: 9900 });
      sendSubscriptionEvent(
        handle.db,
        'customer.subscription.deleted',
        { id: 'sub_3', customer: 'cus_3', price: 'price_pro', amount: 9900 },
        '2024-06-05T00:00:00.000Z',
      );

      const result = scoreAllCustomers(handle.db, { now: NOW });
      expect(result.scores.map((s) => s.customer_id)).toEqual(['cus_1', 'cus_2']);
      expect(result.by_category).toEqual({ safe_to_upsell: 1, neutral: 0, do_not_touch: 1, likely_to_churn: 0 });
      expect(result.errors).toEqual([]);
      expect(listCustomerScores(handle.db, { category: 'do_not_touch' }).map((s) => s.customer_id)).toEqual(['cus_2']);
    });
  });
});
