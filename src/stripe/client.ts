/**
 * Stripe API access: client construction, error mapping, and the
 * CatalogSource used by `sync-stripe`.
 */

import Stripe from 'stripe';
import type { CatalogSource, SourcePrice, SourceProduct } from '../catalog/sync.js';
import { RevenueLensError } from '../runner/errors.js';

export const STRIPE_API_VERSION = '2025-02-24.acacia';

/**
 * @param apiKey - secret or restricted key (sk_... / rk_...)
 */
export function createStripeClient(apiKey: string): Stripe {
  if (!/^(sk|rk)_/.test(apiKey)) {
    throw new RevenueLensError('VALIDATION_ERROR', 'Invalid Stripe API key format. Expected a key starting with sk_ or rk_');
  }

  return new Stripe(apiKey, {
    apiVersion: STRIPE_API_VERSION,
    typescript: true,
    maxNetworkRetries: 2,
  });
}

/**
 * Translate Stripe SDK failures into envelope codes. Authentication and
 * permission problems are not worth retrying; everything else from the
 * API is treated as an upstream outage.
 */
export function mapStripeError(error: unknown): RevenueLensError {
  if (error instanceof RevenueLensError) return error;

  if (error instanceof Stripe.errors.StripeAuthenticationError || error instanceof Stripe.errors.StripePermissionError) {
    return new RevenueLensError('SECURITY_ERROR', `Stripe rejected the API key: ${error.message}`, { cause: error });
  }
  if (error instanceof Stripe.errors.StripeInvalidRequestError) {
    return new RevenueLensError('VALIDATION_ERROR', `Stripe rejected the request: ${error.message}`, { cause: error });
  }
  if (error instanceof Stripe.errors.StripeError) {
    return new RevenueLensError('UPSTREAM_ERROR', `Stripe API error: ${error.message}`, {
      cause: error,
      context: { stripe_error_type: error.type },
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RevenueLensError('UPSTREAM_ERROR', `Stripe request failed: ${message}`, { cause: error });
}

/** Only upstream failures are worth another attempt. */
export function isRetryableStripeError(error: unknown): boolean {
  return mapStripeError(error).code === 'UPSTREAM_ERROR';
}

export function createStripeCatalogSource(stripe: Stripe): CatalogSource {
  return {
    async *listActiveProducts(): AsyncIterable<SourceProduct> {
      try {
        for await (const product of stripe.products.list({ active: true, limit: 100 })) {
          yield { id: product.id, name: product.name, description: product.description };
        }
      } catch (error) {
        throw mapStripeError(error);
      }
    },

    async *listActivePrices(productId: string): AsyncIterable<SourcePrice> {
      try {
        for await (const price of stripe.prices.list({ product: productId, active: true, limit: 100 })) {
          yield {
            id: price.id,
            nickname: price.nickname,
            unit_amount: price.unit_amount,
            currency: price.currency,
            recurring: price.recurring
              ? { interval: price.recurring.interval, interval_count: price.recurring.interval_count }
              : null,
            metadata: price.metadata,
            created: price.created,
          };
        }
      } catch (error) {
        throw mapStripeError(error);
      }
    },
  };
}
