import type { Db } from '@/lib/db';
import type { Lot } from '@/lib/types';
import { NotFoundError, withPersistence } from '@/lib/errors';
import {
  isBlank,
  normalizeCategory,
  normalizeEntryKind,
  validateLotInput,
  type LotInput,
  type LotPatch,
  type ValidLotInput,
} from './schema';

type LotRow = {
  id: number;
  coin_id: string;
  symbol: string;
  amount: number;
  buy_price: number | null;
  fee_buy_pct: number | null;
  fee_sell_pct: number | null;
  category: string | null;
  wallet: string | null;
  entry_kind: string | null;
};

function toLot(row: LotRow): Lot {
  return {
    id: row.id,
    coinId: row.coin_id,
    symbol: row.symbol,
    amount: row.amount,
    buyPrice: row.buy_price ?? 0,
    feeBuyPct: row.fee_buy_pct ?? 0,
    feeSellPct: row.fee_sell_pct ?? 0,
    category: normalizeCategory(row.category) ?? 'classic',
    wallet: row.wallet && row.wallet.trim() !== '' ? row.wallet : null,
    entryKind: normalizeEntryKind(row.entry_kind),
  };
}

function toParams(lot: ValidLotInput) {
  return {
    coin_id: lot.coinId,
    symbol: lot.symbol,
    amount: lot.amount,
    buy_price: lot.buyPrice,
    fee_buy_pct: lot.feeBuyPct,
    fee_sell_pct: lot.feeSellPct,
    category: lot.category,
    wallet: lot.wallet,
    entry_kind: lot.entryKind,
  };
}

function keep<T>(value: T | null | undefined, fallback: T): T {
  return value == null || isBlank(value) ? fallback : value;
}

export type StakingGainInput = Pick<LotInput, 'coinId' | 'symbol' | 'amount' | 'category' | 'wallet'>;

/**
 * Durable table of purchase and staking lots.
 *
 * The store is single-writer; every call runs synchronously against the
 * connection it was built with.
 */
export class LotStore {
  constructor(private readonly db: Db) {}

  private insert(lot: ValidLotInput): number {
    const info = this.db
      .prepare(
        `INSERT INTO portfolio (coin_id, symbol, amount, buy_price, fee_buy_pct, fee_sell_pct, category, wallet, entry_kind)
         VALUES (@coin_id, @symbol, @amount, @buy_price, @fee_buy_pct, @fee_sell_pct, @category, @wallet, @entry_kind)`
      )
      .run(toParams(lot));
    return Number(info.lastInsertRowid);
  }

  addLot(input: LotInput): Lot {
    const lot = validateLotInput(input);
    return withPersistence('add lot', () => {
      const id = this.insert(lot);
      console.log(`[Lots] Added ${lot.entryKind} lot ${id}: ${lot.amount} ${lot.symbol}`);
      return this.getLot(id);
    });
  }

  /** Adds every lot in one transaction. Nothing is written unless all of them validate and insert. */
  addLots(inputs: LotInput[]): Lot[] {
    const valid = inputs.map((input) => validateLotInput(input));
    if (!valid.length) return [];
    const ids = withPersistence('add lots', () => {
      const insertAll = this.db.transaction((batch: ValidLotInput[]) => batch.map((l) => this.insert(l)));
      return insertAll(valid);
    });
    console.log(`[Lots] Added ${ids.length} lots`);
    return ids.map((id) => this.getLot(id));
  }

  /** Records a zero-cost quantity increase. */
  addStakingGain(input: StakingGainInput): Lot {
    return this.addLot({ ...input, buyPrice: 0, feeBuyPct: 0, feeSellPct: 0, entryKind: 'staking' });
  }

  getLot(id: number): Lot {
    const row = withPersistence('read lot', () =>
      this.db.prepare('SELECT * FROM portfolio WHERE id = ?').get(id) as LotRow | undefined
    );
    if (!row) throw new NotFoundError(id);
    return toLot(row);
  }

  /** Merges `patch` over the stored row and replaces it. Blank fields keep their value. */
  updateLot(id: number, patch: LotPatch): Lot {
    const current = this.getLot(id);
    const merged = validateLotInput(
      {
        coinId: keep(patch.coinId, current.coinId),
        symbol: keep(patch.symbol, current.symbol),
        amount: keep(patch.amount, current.amount),
        buyPrice: keep(patch.buyPrice, current.buyPrice),
        feeBuyPct: keep(patch.feeBuyPct, current.feeBuyPct),
        feeSellPct: keep(patch.feeSellPct, current.feeSellPct),
        category: keep(patch.category, current.category),
        wallet: current.wallet === null ? patch.wallet ?? null : keep(patch.wallet, current.wallet),
        entryKind: keep(patch.entryKind, current.entryKind),
      },
      current.category
    );
    return withPersistence('update lot', () => {
      this.db
        .prepare(
          `UPDATE portfolio
           SET coin_id = @coin_id, symbol = @symbol, amount = @amount, buy_price = @buy_price,
               fee_buy_pct = @fee_buy_pct, fee_sell_pct = @fee_sell_pct, category = @category,
               wallet = @wallet, entry_kind = @entry_kind
           WHERE id = @id`
        )
        .run({ ...toParams(merged), id });
      console.log(`[Lots] Updated lot ${id}`);
      return this.getLot(id);
    });
  }

  deleteLot(id: number): void {
    const info = withPersistence('delete lot', () => this.db.prepare('DELETE FROM portfolio WHERE id = ?').run(id));
    if (info.changes === 0) throw new NotFoundError(id);
    console.log(`[Lots] Deleted lot ${id}`);
  }

  listLots(): Lot[] {
    const rows = withPersistence('list lots', () =>
      this.db.prepare('SELECT * FROM portfolio ORDER BY id').all() as LotRow[]
    );
    return rows.map(toLot);
  }

  listLotsForWallet(wallet: string): Lot[] {
    const rows = withPersistence('list wallet lots', () =>
      this.db.prepare('SELECT * FROM portfolio WHERE wallet = ? ORDER BY id').all(wallet.trim()) as LotRow[]
    );
    return rows.map(toLot);
  }

  /** Distinct non-empty wallet labels, in first-recorded order. */
  listWallets(): string[] {
    const rows = withPersistence('list wallets', () =>
      this.db
        .prepare(
          `SELECT wallet, MIN(id) AS first_id FROM portfolio
           WHERE wallet IS NOT NULL AND TRIM(wallet) <> ''
           GROUP BY wallet ORDER BY first_id`
        )
        .all() as Array<{ wallet: string }>
    );
    return rows.map((r) => r.wallet);
  }
}
