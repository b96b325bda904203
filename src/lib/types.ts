export const COIN_CATEGORIES = ['classic', 'risk', 'stable'] as const;
export type CoinCategory = (typeof COIN_CATEGORIES)[number];

export const ENTRY_KINDS = ['purchase', 'staking'] as const;
export type EntryKind = (typeof ENTRY_KINDS)[number];

export type Lot = {
  id: number;
  coinId: string;
  symbol: string;
  amount: number;
  buyPrice: number;
  feeBuyPct: number;
  feeSellPct: number;
  category: CoinCategory;
  wallet: string | null;
  entryKind: EntryKind;
};

export type AggregateRow = {
  coinId: string;
  symbol: string;
  // null unless the run groups by wallet
  wallet: string | null;
  lotCount: number;
  totalAmount: number;
  purchasedAmount: number;
  avgBuyPrice: number;
  avgFeeBuyPct: number;
  avgFeeSellPct: number;
  investedValue: number;
  currentPrice: number;
  priceMissing: boolean;
  currentValueNet: number;
  pctChangeNet: number;
  categoryLabel: CoinCategory;
};

export type HistoryEntry = {
  id: number;
  timestamp: string;
  coinId: string;
  symbol: string;
  wallet: string | null;
  currentPrice: number;
  currentValueNet: number;
  pctChangeNet: number;
};

export type AlertKind = 'take-profit' | 'stop-loss';

export type Alert = {
  kind: AlertKind;
  coinId: string;
  symbol: string;
  wallet: string | null;
  pctChangeNet: number;
  threshold: number;
};

export type PriceQuotes = Record<string, number>;
