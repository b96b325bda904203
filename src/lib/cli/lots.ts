import type { LotStore } from '@/lib/lots/store';
import { parseLotId, type LotPatch } from '@/lib/lots/schema';
import { summarizeLots } from '@/lib/portfolio/summary';
import { lotTableRows, walletTableRows } from '@/lib/format';
import { InputError } from '@/lib/errors';
import { flagValue, parseArgv, requirePositional } from './args';
import type { CommandOutput } from './output';

export const LOTS_USAGE = `Usage:
  lots add <coin-id> <symbol> <amount> <buy-price> [--fee-buy pct] [--fee-sell pct] [--category c] [--wallet w]
  lots stake <coin-id> <symbol> <amount> [--category c] [--wallet w]
  lots edit <id> [--coin-id id] [--symbol s] [--amount n] [--buy-price n] [--fee-buy pct] [--fee-sell pct] [--category c] [--wallet w]
  lots delete <id>
  lots list [--wallet w]
  lots wallets`;

const LOT_FLAGS = ['coin-id', 'symbol', 'amount', 'buy-price', 'fee-buy', 'fee-sell', 'category', 'wallet'] as const;

/** Runs one `lots` subcommand against the store. Bad arguments throw InputError. */
export function runLotsCommand(store: LotStore, argv: string[]): CommandOutput {
  const [command, ...rest] = argv;
  const args = parseArgv(rest, { values: LOT_FLAGS });

  switch (command) {
    case 'add': {
      const [coinId, symbol, amount, buyPrice] = requirePositional(args, ['coin-id', 'symbol', 'amount', 'buy-price']);
      const lot = store.addLot({
        coinId,
        symbol,
        amount,
        buyPrice,
        feeBuyPct: flagValue(args, 'fee-buy'),
        feeSellPct: flagValue(args, 'fee-sell'),
        category: flagValue(args, 'category'),
        wallet: flagValue(args, 'wallet'),
      });
      return { lines: [`Added lot ${lot.id}: ${lot.amount} ${lot.symbol} at ${lot.buyPrice}`] };
    }
    case 'stake': {
      const [coinId, symbol, amount] = requirePositional(args, ['coin-id', 'symbol', 'amount']);
      const lot = store.addStakingGain({
        coinId,
        symbol,
        amount,
        category: flagValue(args, 'category'),
        wallet: flagValue(args, 'wallet'),
      });
      return { lines: [`Added staking gain ${lot.id}: ${lot.amount} ${lot.symbol}`] };
    }
    case 'edit': {
      const [rawId] = requirePositional(args, ['id']);
      const id = parseLotId(rawId);
      const patch: LotPatch = {
        coinId: flagValue(args, 'coin-id'),
        symbol: flagValue(args, 'symbol'),
        amount: flagValue(args, 'amount'),
        buyPrice: flagValue(args, 'buy-price'),
        feeBuyPct: flagValue(args, 'fee-buy'),
        feeSellPct: flagValue(args, 'fee-sell'),
        category: flagValue(args, 'category'),
        wallet: flagValue(args, 'wallet'),
      };
      const lot = store.updateLot(id, patch);
      return { lines: [`Updated lot ${id}`], table: lotTableRows([lot]) };
    }
    case 'delete': {
      const [rawId] = requirePositional(args, ['id']);
      const id = parseLotId(rawId);
      store.deleteLot(id);
      return { lines: [`Deleted lot ${id}`] };
    }
    case 'list': {
      const wallet = flagValue(args, 'wallet');
      const lots = wallet ? store.listLotsForWallet(wallet) : store.listLots();
      if (!lots.length) return { lines: [wallet ? `No lots in wallet ${wallet}.` : 'No lots recorded.'] };
      const s = summarizeLots(lots);
      return {
        lines: [`${s.lotCount} lot(s), ${s.uniqueCoins} coin(s), ${s.walletCount} wallet(s)`],
        table: lotTableRows(lots),
      };
    }
    case 'wallets': {
      const wallets = store.listWallets();
      if (!wallets.length) return { lines: ['No wallets recorded.'] };
      return {
        lines: [`${wallets.length} wallet(s): ${wallets.join(', ')}`],
        table: walletTableRows(summarizeLots(store.listLots()).byWallet),
      };
    }
    default:
      throw new InputError(`Unknown command: ${command ?? '(none)'}`, { command: ['unknown command'] });
  }
}
