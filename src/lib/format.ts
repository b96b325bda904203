import type { AggregateRow, HistoryEntry, Lot } from '@/lib/types';
import type { SeriesPoint } from '@/lib/history/log';
import type { WalletSummary } from '@/lib/portfolio/summary';

export const formatCurrency = (value: number, decimals: number = 2): string => {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
};

export const formatPercent = (value: number): string => `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

/** Plain records for console.table; column names carry the reporting currency. */
export function toTableRows(rows: AggregateRow[], currency: string): Array<Record<string, string | number>> {
  const cur = currency.toUpperCase();
  return rows.map((r) => ({
    ...(r.wallet !== null ? { Wallet: r.wallet } : {}),
    Coin: r.symbol,
    Amount: r.totalAmount,
    [`Avg Buy ${cur}`]: r.avgBuyPrice,
    [`Price ${cur}`]: r.priceMissing ? 'n/a' : r.currentPrice,
    [`Invested ${cur}`]: formatCurrency(r.investedValue),
    [`Value ${cur} (net)`]: formatCurrency(r.currentValueNet),
    'Change net': formatPercent(r.pctChangeNet),
    Type: r.categoryLabel,
  }));
}

export function lotTableRows(lots: Lot[]): Array<Record<string, string | number>> {
  return lots.map((l) => ({
    ID: l.id,
    Coin: l.coinId,
    Symbol: l.symbol,
    Amount: l.amount,
    'Buy price': l.buyPrice,
    'Fee buy %': l.feeBuyPct,
    'Fee sell %': l.feeSellPct,
    Type: l.category,
    Wallet: l.wallet ?? '',
    Kind: l.entryKind,
  }));
}

export function walletTableRows(wallets: WalletSummary[]): Array<Record<string, string | number>> {
  return wallets.map((w) => ({
    Wallet: w.wallet ?? '(none)',
    Lots: w.lotCount,
    Amount: w.totalAmount,
    Coins: w.symbols.join(', '),
  }));
}

export function historyTableRows(entries: HistoryEntry[]): Array<Record<string, string | number>> {
  return entries.map((e) => ({
    Time: e.timestamp,
    Coin: e.symbol,
    Wallet: e.wallet ?? '',
    Price: e.currentPrice,
    'Value (net)': formatCurrency(e.currentValueNet),
    'Change net': formatPercent(e.pctChangeNet),
  }));
}

const CHART_WIDTH = 30;

/** Series as rows with a text bar scaled to the largest value. */
export function seriesTableRows(points: SeriesPoint[]): Array<Record<string, string | number>> {
  const max = Math.max(0, ...points.map((p) => p.currentValueNet));
  return points.map((p) => ({
    Time: p.timestamp,
    'Value (net)': formatCurrency(p.currentValueNet),
    Chart: max > 0 ? '#'.repeat(Math.round((Math.max(p.currentValueNet, 0) / max) * CHART_WIDTH)) : '',
  }));
}
