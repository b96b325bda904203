import { loadConfig, type AppConfig } from '@/lib/config';
import { getDb, type Db } from '@/lib/db';
import { LotStore } from '@/lib/lots/store';
import { HistoryLog } from '@/lib/history/log';
import { createPriceProvider } from '@/lib/prices/service';
import type { PriceProvider } from '@/lib/prices/providers';
import { Analyzer } from '@/lib/analysis/analyzer';

export type PortfolioContext = {
  config: AppConfig;
  db: Db;
  lots: LotStore;
  history: HistoryLog;
  provider: PriceProvider;
  analyzer: Analyzer;
};

/** Wires the stores, price provider and analyzer around one database. */
export function createContext(overrides: { config?: AppConfig; db?: Db; provider?: PriceProvider } = {}): PortfolioContext {
  const config = overrides.config ?? loadConfig();
  const db = overrides.db ?? getDb(config.dbFile);
  const lots = new LotStore(db);
  const history = new HistoryLog(db);
  const provider = overrides.provider ?? createPriceProvider(config);
  const analyzer = new Analyzer({ lots, history, provider, config });
  return { config, db, lots, history, provider, analyzer };
}
