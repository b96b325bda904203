import type { AggregateRow, Lot } from '@/lib/types';
import { DEFAULT_PRECISION, type Precision } from '@/lib/config';
import { roundTo } from './aggregate';

export interface AnalysisSummary {
  totalInvested: number;
  totalValueNet: number;
  totalPnl: number;
  totalPctChangeNet: number;
  coinCount: number;
}

export interface WalletSummary {
  wallet: string | null;
  totalAmount: number;
  lotCount: number;
  symbols: string[];
}

export interface LotsSummary {
  lotCount: number;
  uniqueCoins: number;
  walletCount: number;
  totalAmount: number;
  byWallet: WalletSummary[];
}

export const calculatePnL = (currentValue: number, costBasis: number): { pnl: number; pnlPercent: number } => {
  const pnl = currentValue - costBasis;
  const pnlPercent = costBasis > 0 ? (pnl / costBasis) * 100 : 0;
  return { pnl, pnlPercent };
};

// Totals over rounded rows, rounded again with the currency and percent precision.
export function summarizeAggregates(rows: AggregateRow[], precision: Precision = DEFAULT_PRECISION): AnalysisSummary {
  const totalInvested = rows.reduce((sum, r) => sum + r.investedValue, 0);
  const totalValueNet = rows.reduce((sum, r) => sum + r.currentValueNet, 0);
  const { pnl, pnlPercent } = calculatePnL(totalValueNet, totalInvested);
  return {
    totalInvested: roundTo(totalInvested, precision.currency),
    totalValueNet: roundTo(totalValueNet, precision.currency),
    totalPnl: roundTo(pnl, precision.currency),
    totalPctChangeNet: roundTo(pnlPercent, precision.percent),
    coinCount: new Set(rows.map((r) => r.coinId)).size,
  };
}

/** Lot counts and quantities per wallet, for the portfolio overview. */
export function summarizeLots(lots: Lot[]): LotsSummary {
  const wallets = new Map<string | null, WalletSummary>();
  for (const lot of lots) {
    let entry = wallets.get(lot.wallet);
    if (!entry) {
      entry = { wallet: lot.wallet, totalAmount: 0, lotCount: 0, symbols: [] };
      wallets.set(lot.wallet, entry);
    }
    entry.totalAmount += lot.amount;
    entry.lotCount += 1;
    if (!entry.symbols.includes(lot.symbol)) entry.symbols.push(lot.symbol);
  }
  return {
    lotCount: lots.length,
    uniqueCoins: new Set(lots.map((l) => l.coinId)).size,
    walletCount: Array.from(wallets.keys()).filter((w) => w !== null).length,
    totalAmount: lots.reduce((sum, l) => sum + l.amount, 0),
    byWallet: Array.from(wallets.values()),
  };
}
