/**
 * Catalog sync from the payment provider.
 *
 * The provider is reached through a CatalogSource so sync logic can run
 * against the live Stripe API or an in-memory fixture alike.
 */

import { eq } from 'drizzle-orm';
import type { BillingInterval, PlanLimits } from '../contracts/index.js';
import { plans, products, type RevenueDb } from '../db/index.js';
import { silentLogger, type StructuredLogger } from '../runner/logger.js';
import { fromUnixSeconds, toIsoTimestamp } from '../time/index.js';

export interface SourceProduct {
  id: string;
  name: string;
  description: string | null;
}

export interface SourcePrice {
  id: string;
  nickname: string | null;
  unit_amount: number | null;
  currency: string;
  recurring: { interval: BillingInterval; interval_count: number } | null;
  metadata: Record<string, string>;
  /** Unix seconds. */
  created: number;
}

export interface CatalogSource {
  listActiveProducts(): AsyncIterable<SourceProduct>;
  listActivePrices(productId: string): AsyncIterable<SourcePrice>;
}

export interface CatalogSyncResult {
  products_created: number;
  products_linked: number;
  products_existing: number;
  plans_created: number;
  plans_existing: number;
  prices_skipped: number;
}

/**
 * Numeric price metadata becomes plan limits: `{ api_calls: "10000" }`
 * limits the api_calls metric to 10000 per period.
 */
export function parsePlanLimits(metadata: Record<string, string>): PlanLimits {
  const limits: PlanLimits = {};
  for (const [key, raw] of Object.entries(metadata)) {
    if (raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isFinite(value) && value >= 0) {
      limits[key] = value;
    }
  }
  return limits;
}

/** Monthly and annual list prices derived from a recurring price. */
export function planPricesFromSource(price: SourcePrice): {
  price_monthly_cents: number;
  price_annual_cents: number | null;
} {
  const unit = price.unit_amount ?? 0;
  if (price.recurring?.interval === 'year') {
    return { price_monthly_cents: Math.round(unit / 12), price_annual_cents: unit };
  }
  return { price_monthly_cents: unit, price_annual_cents: null };
}

export async function syncCatalog(
  db: RevenueDb,
  source: CatalogSource,
  opts: { now?: string; logger?: StructuredLogger } = {},
): Promise<CatalogSyncResult> {
  const log = opts.logger ?? silentLogger;
  const now = toIsoTimestamp(opts.now ?? new Date());
  const result: CatalogSyncResult = {
    products_created: 0,
    products_linked: 0,
    products_existing: 0,
    plans_created: 0,
    plans_existing: 0,
    prices_skipped: 0,
  };

  for await (const sourceProduct of source.listActiveProducts()) {
    const productId = upsertProduct(db, sourceProduct, now, result);

    for await (const price of source.listActivePrices(sourceProduct.id)) {
      if (!price.recurring) {
        result.prices_skipped++;
        log.debug('catalog.sync.skip', `Skipping one-time price ${price.id}`);
        continue;
      }

      const known = db.select({ id: plans.id }).from(plans).where(eq(plans.stripe_price_id, price.id)).get();
      if (known) {
        result.plans_existing++;
        continue;
      }

      db.insert(plans)
        .values({
          product_id: productId,
          name: price.nickname ?? `Plan ${price.id.slice(0, 8)}`,
          version: 1,
          ...planPricesFromSource(price),
          currency: price.currency.toUpperCase(),
          limits: parsePlanLimits(price.metadata),
          features: [],
          effective_from: fromUnixSeconds(price.created),
          effective_until: null,
          stripe_price_id: price.id,
          is_active: true,
          created_at: now,
          updated_at: now,
        })
        .run();
      result.plans_created++;
      log.info('catalog.sync.plan', `Created plan for price ${price.id}`, { product: sourceProduct.name });
    }
  }

  log.info('catalog.sync.done', 'Catalog sync finished', { ...result });
  return result;
}

function upsertProduct(db: RevenueDb, source: SourceProduct, now: string, result: CatalogSyncResult): number {
  const byStripeId = db
    .select({ id: products.id })
    .from(products)
    .where(eq(products.stripe_product_id, source.id))
    .get();
  if (byStripeId) {
    result.products_existing++;
    return byStripeId.id;
  }

  // Same name created by hand before the first sync: link instead of duplicating.
  const byName = db.select().from(products).where(eq(products.name, source.name)).get();
  if (byName && byName.stripe_product_id === null) {
    db.update(products)
      .set({ stripe_product_id: source.id, updated_at: now })
      .where(eq(products.id, byName.id))
      .run();
    result.products_linked++;
    return byName.id;
  }

  const created = db
    .insert(products)
    .values({
      name: byName ? `${source.name} (${source.id})` : source.name,
      description: source.description,
      stripe_product_id: source.id,
      created_at: now,
      updated_at: now,
    })
    .returning({ id: products.id })
    .get();
  result.products_created++;
  return created.id;
}
