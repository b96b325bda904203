import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type Db } from '@/lib/db';
import { InputError, PersistenceError } from '@/lib/errors';
import type { AggregateRow } from '@/lib/types';
import { HistoryLog } from './log';

let db: Db;
let log: HistoryLog;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  db = openDatabase(':memory:');
  log = new HistoryLog(db);
});

afterEach(() => {
  if (db.open) db.close();
});

function row(coinId: string, symbol: string, currentValueNet: number, wallet: string | null = null): AggregateRow {
  return {
    coinId,
    symbol,
    wallet,
    lotCount: 1,
    totalAmount: 1,
    purchasedAmount: 1,
    avgBuyPrice: 1,
    avgFeeBuyPct: 0,
    avgFeeSellPct: 0,
    investedValue: 100,
    currentPrice: currentValueNet,
    priceMissing: false,
    currentValueNet,
    pctChangeNet: currentValueNet - 100,
    categoryLabel: 'classic',
  };
}

const count = () => (db.prepare('SELECT COUNT(*) AS n FROM history').get() as { n: number }).n;

describe('HistoryLog.appendSnapshot', () => {
  it('writes one row per aggregate under a shared timestamp', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const entries = log.appendSnapshot([row('Bitcoin', 'BTC', 120), row('ethereum', 'ETH', 90, 'ledger')], { now });
    expect(count()).toBe(2);
    expect(entries.map((e) => e.timestamp)).toEqual(['2026-03-01T12:00:00.000Z', '2026-03-01T12:00:00.000Z']);
    expect(entries[0]).toMatchObject({ coinId: 'bitcoin', symbol: 'BTC', wallet: null, currentValueNet: 120, pctChangeNet: 20 });
    expect(entries[1]).toMatchObject({ coinId: 'ethereum', symbol: 'ETH', wallet: 'ledger' });
    expect(log.listHistory()).toEqual(entries);
  });

  it('writes nothing for an empty snapshot', () => {
    expect(log.appendSnapshot([])).toEqual([]);
    expect(count()).toBe(0);
  });

  it('rolls back the whole snapshot when one insert fails', () => {
    const bad = { ...row('solana', 'SOL', 5), symbol: null } as unknown as AggregateRow;
    expect(() => log.appendSnapshot([row('bitcoin', 'BTC', 1), bad])).toThrow(PersistenceError);
    expect(count()).toBe(0);
  });
});

describe('HistoryLog queries', () => {
  beforeEach(() => {
    log.appendSnapshot([row('bitcoin', 'BTC', 100, 'a'), row('bitcoin', 'BTC', 50, 'b'), row('solana', 'SOL', 10)], {
      now: new Date('2026-01-01T00:00:00.000Z'),
    });
    log.appendSnapshot([row('bitcoin', 'BTC', 110, 'a'), row('bitcoin', 'BTC', 60, 'b')], {
      now: new Date('2026-02-01T00:00:00.000Z'),
    });
  });

  it('filters by coin and date', () => {
    expect(log.listHistory({ coinId: 'BITCOIN' })).toHaveLength(4);
    expect(log.listHistory({ symbol: 'SOL' })).toHaveLength(1);
    expect(log.listHistory({ since: '2026-01-15' }).map((e) => e.currentValueNet)).toEqual([110, 60]);
  });

  it('rejects an unreadable date', () => {
    expect(() => log.listHistory({ since: 'last week' })).toThrow(InputError);
  });

  it('lists symbols in first-seen order', () => {
    expect(log.listHistorySymbols()).toEqual(['BTC', 'SOL']);
  });

  it('sums wallets per run for the symbol series', () => {
    expect(log.getSymbolSeries('BTC')).toEqual([
      { timestamp: '2026-01-01T00:00:00.000Z', currentValueNet: 150 },
      { timestamp: '2026-02-01T00:00:00.000Z', currentValueNet: 170 },
    ]);
  });
});
