import { isValid, parseISO } from 'date-fns';
import type { Db } from '@/lib/db';
import type { AggregateRow, HistoryEntry } from '@/lib/types';
import { InputError, withPersistence } from '@/lib/errors';

type HistoryRow = {
  id: number;
  timestamp: string;
  coin_id: string;
  symbol: string;
  wallet: string | null;
  current_price: number;
  current_value_net: number;
  pct_change_net: number;
};

export type HistoryFilter = {
  coinId?: string;
  symbol?: string;
  since?: Date | string;
};

export type SeriesPoint = { timestamp: string; currentValueNet: number };

function toEntry(row: HistoryRow): HistoryEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    coinId: row.coin_id,
    symbol: row.symbol,
    wallet: row.wallet,
    currentPrice: row.current_price,
    currentValueNet: row.current_value_net,
    pctChangeNet: row.pct_change_net,
  };
}

function toDate(v: Date | string): Date {
  const d = typeof v === 'string' ? parseISO(v) : v;
  if (!isValid(d)) throw new InputError(`Invalid date: ${String(v)}`, { since: ['must be an ISO-8601 date'] });
  return d;
}

/** Append-only log of analysis snapshots, one row per aggregate per run. */
export class HistoryLog {
  constructor(private readonly db: Db) {}

  /**
   * Writes one entry per row under a single timestamp taken before the first insert.
   * The inserts share one transaction: either every row lands or none does.
   */
  appendSnapshot(rows: AggregateRow[], opts: { now?: Date } = {}): HistoryEntry[] {
    const timestamp = (opts.now ?? new Date()).toISOString();
    if (!rows.length) return [];
    const entries = withPersistence('append history snapshot', () => {
      const insert = this.db.prepare(
        `INSERT INTO history (timestamp, coin_id, symbol, wallet, current_price, current_value_net, pct_change_net)
         VALUES (@timestamp, @coin_id, @symbol, @wallet, @current_price, @current_value_net, @pct_change_net)`
      );
      const writeAll = this.db.transaction((batch: AggregateRow[]) =>
        batch.map((row) => {
          const params = {
            timestamp,
            coin_id: row.coinId.toLowerCase(),
            symbol: row.symbol,
            wallet: row.wallet,
            current_price: row.currentPrice,
            current_value_net: row.currentValueNet,
            pct_change_net: row.pctChangeNet,
          };
          const info = insert.run(params);
          return toEntry({ id: Number(info.lastInsertRowid), ...params });
        })
      );
      return writeAll(rows);
    });
    console.log(`[History] Appended ${entries.length} rows at ${timestamp}`);
    return entries;
  }

  listHistory(filter: HistoryFilter = {}): HistoryEntry[] {
    const where: string[] = [];
    const params: Record<string, string> = {};
    if (filter.coinId) {
      where.push('coin_id = @coin_id');
      params.coin_id = filter.coinId.toLowerCase();
    }
    if (filter.symbol) {
      where.push('symbol = @symbol');
      params.symbol = filter.symbol;
    }
    if (filter.since !== undefined) {
      where.push('timestamp >= @since');
      params.since = toDate(filter.since).toISOString();
    }
    const sql = `SELECT * FROM history ${where.length ? `WHERE ${where.join(' AND ')}` : ''} ORDER BY timestamp, id`;
    const rows = withPersistence('read history', () => {
      const stmt = this.db.prepare(sql);
      return (where.length ? stmt.all(params) : stmt.all()) as HistoryRow[];
    });
    return rows.map(toEntry);
  }

  /** Symbols that have history, in the order they first appeared. */
  listHistorySymbols(): string[] {
    const rows = withPersistence('read history symbols', () =>
      this.db.prepare('SELECT symbol, MIN(id) AS first_id FROM history GROUP BY symbol ORDER BY first_id').all() as Array<{
        symbol: string;
      }>
    );
    return rows.map((r) => r.symbol);
  }

  /** Net value over time for one symbol, summed across wallets within a run. */
  getSymbolSeries(symbol: string): SeriesPoint[] {
    const rows = withPersistence('read symbol series', () =>
      this.db
        .prepare(
          `SELECT timestamp, SUM(current_value_net) AS value FROM history
           WHERE symbol = ? GROUP BY timestamp ORDER BY timestamp`
        )
        .all(symbol) as Array<{ timestamp: string; value: number }>
    );
    return rows.map((r) => ({ timestamp: r.timestamp, currentValueNet: r.value }));
  }
}
