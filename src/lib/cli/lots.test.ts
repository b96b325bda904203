import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type Db } from '@/lib/db';
import { InputError, NotFoundError } from '@/lib/errors';
import { LotStore } from '@/lib/lots/store';
import { runLotsCommand } from './lots';

let db: Db;
let store: LotStore;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  db = openDatabase(':memory:');
  store = new LotStore(db);
});

afterEach(() => {
  if (db.open) db.close();
});

const run = (...argv: string[]) => runLotsCommand(store, argv);

describe('lots add / stake', () => {
  it('adds a purchase from positionals and flags', () => {
    expect(run('add', 'bitcoin', 'BTC', '0.5', '50000', '--fee-buy', '1', '--wallet=ledger', '--category', 'risk')).toEqual({
      lines: ['Added lot 1: 0.5 BTC at 50000'],
    });
    expect(store.getLot(1)).toMatchObject({ feeBuyPct: 1, feeSellPct: 0, wallet: 'ledger', category: 'risk', entryKind: 'purchase' });
  });

  it('adds a staking gain at zero cost', () => {
    expect(run('stake', 'cardano', 'ADA', '12', '--wallet', 'yoroi').lines).toEqual(['Added staking gain 1: 12 ADA']);
    expect(store.getLot(1)).toMatchObject({ entryKind: 'staking', buyPrice: 0, wallet: 'yoroi' });
  });

  it('names the missing arguments', () => {
    expect(() => run('add', 'bitcoin')).toThrow('Missing <symbol> <amount> <buy-price>');
    expect(store.listLots()).toEqual([]);
  });
});

describe('lots edit / delete', () => {
  beforeEach(() => {
    run('add', 'bitcoin', 'BTC', '0.5', '50000', '--wallet', 'ledger');
  });

  it('changes only the given fields', () => {
    const out = run('edit', '1', '--amount', '0.75');
    expect(out.lines).toEqual(['Updated lot 1']);
    expect(out.table).toEqual([
      {
        ID: 1,
        Coin: 'bitcoin',
        Symbol: 'BTC',
        Amount: 0.75,
        'Buy price': 50000,
        'Fee buy %': 0,
        'Fee sell %': 0,
        Type: 'classic',
        Wallet: 'ledger',
        Kind: 'purchase',
      },
    ]);
  });

  it('rejects ids that are not positive integers', () => {
    expect(() => run('edit', 'abc', '--amount', '1')).toThrow(InputError);
    expect(() => run('delete', '0')).toThrow(InputError);
  });

  it('deletes by id and reports a missing one', () => {
    expect(run('delete', '1').lines).toEqual(['Deleted lot 1']);
    expect(() => run('delete', '1')).toThrow(NotFoundError);
  });
});

describe('lots list / wallets', () => {
  it('reports an empty portfolio', () => {
    expect(run('list')).toEqual({ lines: ['No lots recorded.'] });
    expect(run('wallets')).toEqual({ lines: ['No wallets recorded.'] });
  });

  it('lists one wallet and summarizes every wallet', () => {
    run('add', 'bitcoin', 'BTC', '1', '50000', '--wallet', 'ledger');
    run('add', 'ethereum', 'ETH', '2', '3000', '--wallet', 'exchange');
    run('stake', 'solana', 'SOL', '3', '--wallet', 'ledger');
    run('add', 'cardano', 'ADA', '4', '1');

    const list = run('list', '--wallet', 'ledger');
    expect(list.lines).toEqual(['2 lot(s), 2 coin(s), 1 wallet(s)']);
    expect(list.table?.map((r) => r.Symbol)).toEqual(['BTC', 'SOL']);

    const wallets = run('wallets');
    expect(wallets.lines).toEqual(['2 wallet(s): ledger, exchange']);
    expect(wallets.table).toEqual([
      { Wallet: 'ledger', Lots: 2, Amount: 4, Coins: 'BTC, SOL' },
      { Wallet: 'exchange', Lots: 1, Amount: 2, Coins: 'ETH' },
      { Wallet: '(none)', Lots: 1, Amount: 4, Coins: 'ADA' },
    ]);
  });

  it('rejects unknown commands and options', () => {
    expect(() => run('sell', '1')).toThrow('Unknown command: sell');
    expect(() => run('list', '--colour', 'red')).toThrow('Unknown option --colour');
  });
});
