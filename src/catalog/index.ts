/**
 * Product and plan catalog.
 *
 * Plans are versioned: a price change never edits a plan row in place,
 * so subscriptions created under an old price keep pointing at the
 * version they were sold.
 */

import { and, asc, desc, eq, gt, isNull, ne } from 'drizzle-orm';
import {
  PlanInputSchema,
  ProductInputSchema,
  type PlanInput,
  type ProductInput,
} from '../contracts/index.js';
import { plans, products, type Plan, type Product, type RevenueDb } from '../db/index.js';
import { RevenueLensError, formatZodIssues } from '../runner/errors.js';
import { toIsoTimestamp } from '../time/index.js';

export interface CatalogOptions {
  now?: string;
}

export function createProduct(db: RevenueDb, input: ProductInput, opts: CatalogOptions = {}): Product {
  const parsed = ProductInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid product: ${formatZodIssues(parsed.error)}`);
  }
  const now = toIsoTimestamp(opts.now ?? new Date());

  const existing = db.select().from(products).where(eq(products.name, parsed.data.name)).get();
  if (existing) {
    throw new RevenueLensError('CONFLICT', `Product "${parsed.data.name}" already exists`, {
      context: { product_id: existing.id },
    });
  }

  return db
    .insert(products)
    .values({
      name: parsed.data.name,
      description: parsed.data.description ?? null,
      stripe_product_id: parsed.data.stripe_product_id ?? null,
      created_at: now,
      updated_at: now,
    })
    .returning()
    .get();
}

export function listProducts(db: RevenueDb): Product[] {
  return db.select().from(products).orderBy(asc(products.name)).all();
}

export function getProduct(db: RevenueDb, productId: number): Product {
  const product = db.select().from(products).where(eq(products.id, productId)).get();
  if (!product) {
    throw new RevenueLensError('NOT_FOUND', `Product ${productId} not found`);
  }
  return product;
}

export function createPlan(db: RevenueDb, input: PlanInput, opts: CatalogOptions = {}): Plan {
  const parsed = PlanInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RevenueLensError('VALIDATION_ERROR', `Invalid plan: ${formatZodIssues(parsed.error)}`);
  }
  const data = parsed.data;
  getProduct(db, data.product_id);
  const now = toIsoTimestamp(opts.now ?? new Date());

  return db
    .insert(plans)
    .values({
      product_id: data.product_id,
      name: data.name,
      version: 1,
      price_monthly_cents: data.price_monthly_cents,
      price_annual_cents: data.price_annual_cents ?? null,
      currency: data.currency,
      limits: data.limits,
      features: data.features,
      effective_from: data.effective_from ? toIsoTimestamp(data.effective_from) : now,
      effective_until: null,
      stripe_price_id: data.stripe_price_id ?? null,
      is_active: true,
      created_at: now,
      updated_at: now,
    })
    .returning()
    .get();
}

export function getPlan(db: RevenueDb, planId: number): Plan {
  const plan = db.select().from(plans).where(eq(plans.id, planId)).get();
  if (!plan) {
    throw new RevenueLensError('NOT_FOUND', `Plan ${planId} not found`);
  }
  return plan;
}

export function listPlans(
  db: RevenueDb,
  opts: { activeOnly?: boolean; productId?: number } = {},
): Plan[] {
  const { activeOnly = true, productId } = opts;
  const conditions = [
    ...(activeOnly ? [eq(plans.is_active, true)] : []),
    ...(productId !== undefined ? [eq(plans.product_id, productId)] : []),
  ];
  return db
    .select()
    .from(plans)
    .where(and(...conditions))
    .orderBy(asc(plans.product_id), asc(plans.price_monthly_cents), asc(plans.version))
    .all();
}

export function findPlanByStripePriceId(db: RevenueDb, stripePriceId: string): Plan | undefined {
  return db
    .select()
    .from(plans)
    .where(eq(plans.stripe_price_id, stripePriceId))
    .orderBy(desc(plans.version))
    .get();
}

/**
 * Cheapest active plan of the same product priced above `plan`, other
 * than a later version of `plan` itself.
 */
export function findUpgradePlan(db: RevenueDb, plan: Plan): Plan | undefined {
  return db
    .select()
    .from(plans)
    .where(
      and(
        eq(plans.product_id, plan.product_id),
        eq(plans.is_active, true),
        ne(plans.name, plan.name),
        gt(plans.price_monthly_cents, plan.price_monthly_cents),
      ),
    )
    .orderBy(asc(plans.price_monthly_cents))
    .get();
}

export interface RevisePriceOptions extends CatalogOptions {
  priceMonthlyCents: number;
  priceAnnualCents?: number | null;
  effectiveFrom?: string;
  stripePriceId?: string;
}

/**
 * Close the current version of a plan and open version + 1 at a new
 * price. Limits, features and currency carry over.
 */
export function revisePlanPrice(db: RevenueDb, planId: number, opts: RevisePriceOptions): Plan {
  if (!Number.isInteger(opts.priceMonthlyCents) || opts.priceMonthlyCents < 0) {
    throw new RevenueLensError('VALIDATION_ERROR', 'priceMonthlyCents must be a non-negative integer');
  }
  const now = toIsoTimestamp(opts.now ?? new Date());
  const effectiveFrom = opts.effectiveFrom ? toIsoTimestamp(opts.effectiveFrom) : now;

  return db.transaction((tx) => {
    const current = tx
      .select()
      .from(plans)
      .where(and(eq(plans.id, planId), isNull(plans.effective_until)))
      .get();
    if (!current) {
      const exists = tx.select({ id: plans.id }).from(plans).where(eq(plans.id, planId)).get();
      if (!exists) throw new RevenueLensError('NOT_FOUND', `Plan ${planId} not found`);
      throw new RevenueLensError('CONFLICT', `Plan ${planId} is not the current version and cannot be revised`);
    }
    if (effectiveFrom < current.effective_from) {
      throw new RevenueLensError(
        'VALIDATION_ERROR',
        `effectiveFrom ${effectiveFrom} is before version ${current.version} took effect (${current.effective_from})`,
      );
    }

    tx.update(plans)
      .set({ effective_until: effectiveFrom, is_active: false, updated_at: now })
      .where(eq(plans.id, current.id))
      .run();

    return tx
      .insert(plans)
      .values({
        product_id: current.product_id,
        name: current.name,
        version: current.version + 1,
        price_monthly_cents: opts.priceMonthlyCents,
        price_annual_cents: opts.priceAnnualCents === undefined ? current.price_annual_cents : opts.priceAnnualCents,
        currency: current.currency,
        limits: current.limits,
        features: current.features,
        effective_from: effectiveFrom,
        effective_until: null,
        stripe_price_id: opts.stripePriceId ?? null,
        is_active: true,
        created_at: now,
        updated_at: now,
      })
      .returning()
      .get();
  });
}

/** Every version of the plan family `planId` belongs to, oldest first. */
export function getPlanHistory(db: RevenueDb, planId: number): Plan[] {
  const plan = getPlan(db, planId);
  return db
    .select()
    .from(plans)
    .where(and(eq(plans.product_id, plan.product_id), eq(plans.name, plan.name)))
    .orderBy(asc(plans.version))
    .all();
}

export {
  syncCatalog,
  type CatalogSource,
  type SourceProduct,
  type SourcePrice,
  type CatalogSyncResult,
} from './sync.js';
