import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type Db } from '@/lib/db';
import { InputError } from '@/lib/errors';
import { HistoryLog } from '@/lib/history/log';
import type { AggregateRow } from '@/lib/types';
import { runHistoryCommand } from './history';

let db: Db;
let history: HistoryLog;

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

const run = (...argv: string[]) => runHistoryCommand({ history, db }, argv);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  db = openDatabase(':memory:');
  history = new HistoryLog(db);
  history.appendSnapshot([row('bitcoin', 'BTC', 100, 'a'), row('bitcoin', 'BTC', 50, 'b'), row('solana', 'SOL', 10)], {
    now: new Date('2026-01-01T00:00:00.000Z'),
  });
  history.appendSnapshot([row('bitcoin', 'BTC', 110, 'a'), row('bitcoin', 'BTC', 60, 'b')], {
    now: new Date('2026-02-01T00:00:00.000Z'),
  });
});

afterEach(() => {
  if (db.open) db.close();
});

describe('history commands', () => {
  it('lists symbols with history', () => {
    expect(run('symbols')).toEqual({ lines: ['BTC, SOL'] });
  });

  it('charts one symbol summed across wallets', () => {
    expect(run('series', 'BTC')).toEqual({
      lines: ['2 point(s) for BTC'],
      table: [
        { Time: '2026-01-01T00:00:00.000Z', 'Value (net)': '150.00', Chart: '#'.repeat(26) },
        { Time: '2026-02-01T00:00:00.000Z', 'Value (net)': '170.00', Chart: '#'.repeat(30) },
      ],
    });
    expect(run('series', 'XRP')).toEqual({ lines: ['No history for XRP.'] });
  });

  it('filters entries by coin and date', () => {
    expect(run('list', '--coin', 'solana').lines).toEqual(['1 entry']);
    const recent = run('list', '--since', '2026-01-15');
    expect(recent.lines).toEqual(['2 entries']);
    expect(recent.table?.map((r) => r['Value (net)'])).toEqual(['110.00', '60.00']);
    expect(() => run('list', '--since', 'yesterday')).toThrow(InputError);
  });

  it('vacuums the database', () => {
    expect(run('vacuum')).toEqual({ lines: ['Database vacuumed.'] });
    expect(history.listHistory()).toHaveLength(5);
  });

  it('rejects unknown commands', () => {
    expect(() => run('plot')).toThrow(InputError);
  });
});
