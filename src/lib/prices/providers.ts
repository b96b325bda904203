import axios from 'axios';
import type { PriceQuotes } from '@/lib/types';
import { PriceFetchError, errorMessage } from '@/lib/errors';

export type PriceRequestOptions = { signal?: AbortSignal };

export interface PriceProvider {
  name: string;
  currency: string;
  /** One batched request. Ids without a usable quote are left out of the result. */
  getPrices(coinIds: string[], opts?: PriceRequestOptions): Promise<PriceQuotes>;
}

type SimplePriceResponse = Record<string, Record<string, unknown> | undefined>;

export class CoinGeckoProvider implements PriceProvider {
  name = 'coingecko';

  constructor(
    readonly currency: string,
    private readonly baseUrl = 'https://api.coingecko.com/api/v3',
    private readonly timeoutMs = 10_000
  ) {}

  async getPrices(coinIds: string[], opts: PriceRequestOptions = {}): Promise<PriceQuotes> {
    if (!coinIds.length) return {};
    const vs = this.currency.toLowerCase();
    let data: SimplePriceResponse;
    try {
      const resp = await axios.get<SimplePriceResponse>(`${this.baseUrl}/simple/price`, {
        params: { ids: coinIds.join(','), vs_currencies: vs },
        timeout: this.timeoutMs,
        signal: opts.signal,
      });
      data = resp.data || {};
    } catch (error) {
      throw new PriceFetchError(`${this.name} price request failed: ${errorMessage(error)}`, { cause: error });
    }
    const out: PriceQuotes = {};
    for (const id of coinIds) {
      const quote = data[id]?.[vs];
      if (typeof quote === 'number' && Number.isFinite(quote) && quote > 0) out[id] = quote;
    }
    return out;
  }
}
