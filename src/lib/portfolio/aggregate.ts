import type { AggregateRow, CoinCategory, Lot, PriceQuotes } from '@/lib/types';
import { DEFAULT_PRECISION, type Precision } from '@/lib/config';
import type { PriceProvider, PriceRequestOptions } from '@/lib/prices/providers';
import { getPrices, normalizeCoinIds } from '@/lib/prices/service';

export type AggregateOptions = {
  groupByWallet?: boolean;
  precision?: Precision;
};

type LotGroup = {
  coinId: string;
  symbol: string;
  wallet: string | null;
  lots: Lot[];
};

export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  const f = 10 ** decimals;
  const r = Math.round((Math.abs(value) + Number.EPSILON) * f) / f;
  return value < 0 ? -r : r;
}

/**
 * Partitions lots by (coinId, symbol) or (coinId, symbol, wallet).
 * Groups come out in the order their key was first seen; every lot lands in exactly one group.
 */
export function groupLots(lots: Lot[], groupByWallet = false): LotGroup[] {
  const groups = new Map<string, LotGroup>();
  for (const lot of lots) {
    const wallet = groupByWallet ? lot.wallet : null;
    const key = JSON.stringify([lot.coinId, lot.symbol, wallet]);
    let group = groups.get(key);
    if (!group) {
      group = { coinId: lot.coinId, symbol: lot.symbol, wallet, lots: [] };
      groups.set(key, group);
    }
    group.lots.push(lot);
  }
  return Array.from(groups.values());
}

/** Most frequent category; ties go to the one seen first. */
export function modeCategory(lots: Lot[]): CoinCategory {
  const counts = new Map<CoinCategory, number>();
  for (const lot of lots) counts.set(lot.category, (counts.get(lot.category) ?? 0) + 1);
  let best: CoinCategory = 'classic';
  let bestCount = 0;
  for (const [category, count] of counts) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

function aggregateGroup(group: LotGroup, prices: PriceQuotes, precision: Precision): AggregateRow {
  const purchases = group.lots.filter((l) => l.entryKind !== 'staking');

  let totalAmount = 0;
  for (const lot of group.lots) totalAmount += lot.amount;

  let purchasedAmount = 0;
  let costSum = 0;
  let feeBuySum = 0;
  let feeSellSum = 0;
  let investedValue = 0;
  for (const lot of purchases) {
    purchasedAmount += lot.amount;
    costSum += lot.buyPrice * lot.amount;
    feeBuySum += lot.feeBuyPct * lot.amount;
    feeSellSum += lot.feeSellPct * lot.amount;
    // summed per lot, never derived from the rounded average
    investedValue += lot.buyPrice * lot.amount * (1 + lot.feeBuyPct / 100);
  }

  const avgBuyPrice = purchasedAmount ? costSum / purchasedAmount : 0;
  const avgFeeBuyPct = purchasedAmount ? feeBuySum / purchasedAmount : 0;
  const avgFeeSellPct = purchasedAmount ? feeSellSum / purchasedAmount : 0;

  const quote = prices[group.coinId.toLowerCase()];
  const currentPrice = typeof quote === 'number' && Number.isFinite(quote) && quote > 0 ? quote : 0;
  const priceMissing = currentPrice === 0;

  const currentValueNet = currentPrice * totalAmount * (1 - avgFeeSellPct / 100);
  const pctChangeNet = investedValue > 0 ? ((currentValueNet - investedValue) / investedValue) * 100 : 0;

  return {
    coinId: group.coinId,
    symbol: group.symbol,
    wallet: group.wallet,
    lotCount: group.lots.length,
    totalAmount,
    purchasedAmount,
    avgBuyPrice: roundTo(avgBuyPrice, precision.price),
    avgFeeBuyPct: roundTo(avgFeeBuyPct, precision.fee),
    avgFeeSellPct: roundTo(avgFeeSellPct, precision.fee),
    investedValue: roundTo(investedValue, precision.currency),
    currentPrice,
    priceMissing,
    currentValueNet: roundTo(currentValueNet, precision.currency),
    pctChangeNet: roundTo(pctChangeNet, precision.percent),
    categoryLabel: modeCategory(group.lots),
  };
}

/** Pure valuation over already-fetched quotes. */
export function computeAggregates(lots: Lot[], prices: PriceQuotes, opts: AggregateOptions = {}): AggregateRow[] {
  const precision = opts.precision ?? DEFAULT_PRECISION;
  const rows = groupLots(lots, opts.groupByWallet).map((g) => aggregateGroup(g, prices, precision));
  const unpriced = rows.filter((r) => r.priceMissing && r.totalAmount > 0);
  if (unpriced.length) {
    console.warn(`[Analysis] Valued at 0 for lack of a price: ${unpriced.map((r) => r.symbol).join(', ')}`);
  }
  return rows;
}

/**
 * Aggregates lots into per-coin rows, fetching every needed quote in one call.
 * An empty lot list returns [] without touching the provider.
 */
export async function aggregate(
  lots: Lot[],
  provider: PriceProvider,
  opts: AggregateOptions & PriceRequestOptions = {}
): Promise<AggregateRow[]> {
  if (!lots.length) return [];
  const prices = await getPrices(normalizeCoinIds(lots.map((l) => l.coinId)), provider, { signal: opts.signal });
  return computeAggregates(lots, prices, opts);
}
