import { describe, expect, it } from 'vitest';
import type { AggregateRow, Lot } from '@/lib/types';
import { calculatePnL, summarizeAggregates, summarizeLots } from './summary';

function lot(id: number, coinId: string, symbol: string, amount: number, wallet: string | null): Lot {
  return {
    id,
    coinId,
    symbol,
    amount,
    buyPrice: 1,
    feeBuyPct: 0,
    feeSellPct: 0,
    category: 'classic',
    wallet,
    entryKind: 'purchase',
  };
}

function row(coinId: string, investedValue: number, currentValueNet: number, wallet: string | null = null): AggregateRow {
  return {
    coinId,
    symbol: coinId.toUpperCase(),
    wallet,
    lotCount: 1,
    totalAmount: 1,
    purchasedAmount: 1,
    avgBuyPrice: investedValue,
    avgFeeBuyPct: 0,
    avgFeeSellPct: 0,
    investedValue,
    currentPrice: currentValueNet,
    priceMissing: false,
    currentValueNet,
    pctChangeNet: 0,
    categoryLabel: 'classic',
  };
}

describe('calculatePnL', () => {
  it('reports zero percent without a cost basis', () => {
    expect(calculatePnL(50, 0)).toEqual({ pnl: 50, pnlPercent: 0 });
    expect(calculatePnL(150, 100)).toEqual({ pnl: 50, pnlPercent: 50 });
  });
});

describe('summarizeAggregates', () => {
  it('totals rows and counts each coin once across wallets', () => {
    expect(summarizeAggregates([row('btc', 100, 130, 'a'), row('btc', 100, 90, 'b'), row('eth', 200, 180)])).toEqual({
      totalInvested: 400,
      totalValueNet: 400,
      totalPnl: 0,
      totalPctChangeNet: 0,
      coinCount: 2,
    });
  });

  it('rounds with the given precision', () => {
    const precision = { price: 6, fee: 4, currency: 0, percent: 1 };
    expect(summarizeAggregates([row('btc', 300, 400.4), row('eth', 0.3, 0.3)], precision)).toEqual({
      totalInvested: 300,
      totalValueNet: 401,
      totalPnl: 100,
      totalPctChangeNet: 33.4,
      coinCount: 2,
    });
  });

  it('returns zeros for no rows', () => {
    expect(summarizeAggregates([])).toEqual({
      totalInvested: 0,
      totalValueNet: 0,
      totalPnl: 0,
      totalPctChangeNet: 0,
      coinCount: 0,
    });
  });
});

describe('summarizeLots', () => {
  it('groups lots per wallet in first-seen order', () => {
    const summary = summarizeLots([
      lot(1, 'bitcoin', 'BTC', 1, 'ledger'),
      lot(2, 'ethereum', 'ETH', 2, null),
      lot(3, 'bitcoin', 'BTC', 0.5, 'ledger'),
      lot(4, 'solana', 'SOL', 10, 'ledger'),
    ]);
    expect(summary).toEqual({
      lotCount: 4,
      uniqueCoins: 3,
      walletCount: 1,
      totalAmount: 13.5,
      byWallet: [
        { wallet: 'ledger', totalAmount: 11.5, lotCount: 3, symbols: ['BTC', 'SOL'] },
        { wallet: null, totalAmount: 2, lotCount: 1, symbols: ['ETH'] },
      ],
    });
  });
});
