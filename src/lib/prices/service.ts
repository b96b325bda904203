import type { AppConfig } from '@/lib/config';
import type { PriceQuotes } from '@/lib/types';
import { CoinGeckoProvider, type PriceProvider, type PriceRequestOptions } from './providers';

export function createPriceProvider(config: AppConfig): PriceProvider {
  return new CoinGeckoProvider(config.currency, config.priceApiUrl, config.priceTimeoutMs);
}

export function normalizeCoinIds(coinIds: Iterable<string | null | undefined>): string[] {
  const set = new Set<string>();
  for (const id of coinIds) {
    const s = (id ?? '').trim().toLowerCase();
    if (s) set.add(s);
  }
  return Array.from(set);
}

/**
 * Fetches current quotes for a set of coin ids in a single provider call.
 * There is no retry and no cache. A transport failure surfaces as PriceFetchError.
 */
export async function getPrices(
  coinIds: Iterable<string | null | undefined>,
  provider: PriceProvider,
  opts?: PriceRequestOptions
): Promise<PriceQuotes> {
  const ids = normalizeCoinIds(coinIds);
  if (!ids.length) return {};
  const prices = await provider.getPrices(ids, opts);
  const missing = ids.filter((id) => !(id in prices));
  if (missing.length) {
    console.warn(`[Prices] No ${provider.currency.toUpperCase()} quote from ${provider.name} for: ${missing.join(', ')}`);
  }
  return prices;
}
