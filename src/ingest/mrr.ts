/**
 * Monthly normalization of subscription prices.
 */

import type { BillingInterval, SubscriptionItem } from '../contracts/index.js';

const MONTHS_PER_INTERVAL: Record<BillingInterval, number> = {
  day: 12 / 365,
  week: 12 / 52,
  month: 1,
  year: 12,
};

/**
 * Convert an amount charged every `intervalCount` intervals to its
 * monthly equivalent. Returns fractional cents; round once at the end.
 */
export function normalizeToMonthlyCents(
  amountCents: number,
  interval: BillingInterval,
  intervalCount = 1,
): number {
  return amountCents / (MONTHS_PER_INTERVAL[interval] * intervalCount);
}

/**
 * MRR of a subscription: every recurring item's unit amount times its
 * quantity, normalized to a month. Items without a recurring price or
 * unit amount contribute nothing.
 */
export function calculateSubscriptionMrr(items: readonly SubscriptionItem[]): number {
  let total = 0;
  for (const item of items) {
    const { unit_amount, recurring } = item.price;
    if (unit_amount === null || recurring === null) continue;
    total += normalizeToMonthlyCents(unit_amount * item.quantity, recurring.interval, recurring.interval_count);
  }
  return Math.round(total);
}
