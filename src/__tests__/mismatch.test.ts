import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { analyzeAllSubscriptions, detectFeatureMispricing, overallUtilization, suggestUpgrade } from '../mismatch/index.js';
import { listAlerts } from '../alerts/index.js';
import { recordUsage } from '../usage/index.js';
import { DEFAULT_THRESHOLDS } from '../contracts/index.js';
import type { DatabaseHandle } from '../db/index.js';
import { NOW, openTestDb, seedCatalog, subscribe, type TestCatalog } from './fixtures.js';

describe('Usage mismatch', () => {
  let handle: DatabaseHandle;
  let catalog: TestCatalog;

  const use = (customer: string, quantity: number, metric = 'api_calls'): void => {
    recordUsage(handle.db, { customer_id: customer, metric_name: metric, quantity }, { now: NOW });
  };

  // cus_high: Starter at 90%   cus_low: Pro at 10%
  // cus_mid:  Pro at 50%       cus_none: Enterprise, no limited usage
  beforeEach(() => {
    handle = openTestDb();
    catalog = seedCatalog(handle.db);
    subscribe(handle.db, { id: 'sub_high', customer: 'cus_high', price: 'price_starter', amount: 2900 });
    subscribe(handle.db, { id: 'sub_low', customer: 'cus_low', price: 'price_pro', amount: 9900 });
    subscribe(handle.db, { id: 'sub_mid', customer: 'cus_mid', price: 'price_pro', amount: 9900 });
    subscribe(handle.db, { id: 'sub_none', customer: 'cus_none', price: 'price_enterprise', amount: 29900 });
    use('cus_high', 600);
    use('cus_high', 300);
    use('cus_low', 1000);
    use('cus_mid', 5000);
    use('cus_none', 12, 'exports');
  });

  afterEach(() => {
    handle.close();
  });

  it('should classify every active subscription', () => {
    const analysis = analyzeAllSubscriptions(handle.db, { now: NOW });

    expect(analysis.stats).toEqual({
      analyzed: 4,
      underpriced: 1,
      overpriced: 1,
      appropriate: 1,
      no_data: 1,
      alerts_created: 2,
    });
    expect(analysis.upgrade_candidates.map((m) => [m.customer_id, m.plan_name])).toEqual([['cus_high', 'Starter']]);
    expect(analysis.upgrade_candidates[0]?.utilization).toBeCloseTo(0.9);
    expect(analysis.upgrade_candidates[0]?.usage_details['api_calls']?.total).toBe(900);
    expect(analysis.overpriced_customers.map((m) => m.customer_id)).toEqual(['cus_low']);
  });

  it('should raise one alert per subscription and direction', () => {
    analyzeAllSubscriptions(handle.db, { now: NOW });

    const high = listAlerts(handle.db, { type: 'usage_mismatch_high' });
    expect(high).toHaveLength(1);
    expect(high[0]).toMatchObject({
      severity: 'warning',
      customer_id: 'cus_high',
      title: 'Upgrade Candidate: cus_high',
      description: 'Customer is using 90.0% of plan limits',
      recommended_action: 'Upgrade to Pro ($99.00/mo) for $70.00 additional MRR',
    });

    const low = listAlerts(handle.db, { type: 'usage_mismatch_low' });
    expect(low[0]).toMatchObject({
      severity: 'informational',
      title: 'Low Utilization: cus_low',
      description: 'Customer is only using 10.0% of plan limits',
    });

    expect(analyzeAllSubscriptions(handle.db, { now: NOW }).stats.alerts_created).toBe(0);
    expect(listAlerts(handle.db)).toHaveLength(2);
  });

  it('should honor a custom mismatch threshold', () => {
    const analysis = analyzeAllSubscriptions(handle.db, {
      now: NOW,
      thresholds: { ...DEFAULT_THRESHOLDS, usage_mismatch_threshold: 0.95 },
    });
    expect(analysis.stats).toMatchObject({ underpriced: 0, overpriced: 0, appropriate: 3 });
  });

  it('should suggest custom pricing on the top tier', () => {
    expect(suggestUpgrade(handle.db, catalog.enterprise)).toBe('No higher tier available - consider custom pricing');
  });

  it('should average utilization across limited metrics', () => {
    expect(
      overallUtilization({
        api_calls: { total: 900, limit: 1000, utilization: 0.9 },
        seats: { total: 1, limit: 10, utilization: 0.1 },
      }),
    ).toBeCloseTo(0.5);
    expect(overallUtilization({})).toBe(0);
  });

  // ---------------------------------------------------------------------------
  // Feature pricing
  // ---------------------------------------------------------------------------

  describe('feature mispricing', () => {
    it('should flag plans where most customers run near their limits', () => {
      expect(detectFeatureMispricing(handle.db)).toEqual([
        {
          plan_id: catalog.starter.id,
          plan_name: 'Starter',
          high_usage_percentage: 100,
          total_customers: 1,
          recommendation: 'Consider increasing limits or price for this plan',
        },
      ]);
    });

    it('should not flag a plan where only half the customers are near limits', () => {
      use('cus_mid', 4000);
      expect(detectFeatureMispricing(handle.db).map((r) => r.plan_name)).toEqual(['Starter']);
    });
  });
});
