import type { HistoryLog } from '@/lib/history/log';
import { vacuumDatabase, type Db } from '@/lib/db';
import { historyTableRows, seriesTableRows } from '@/lib/format';
import { InputError } from '@/lib/errors';
import { flagValue, parseArgv, requirePositional } from './args';
import type { CommandOutput } from './output';

export const HISTORY_USAGE = `Usage:
  history symbols
  history series <symbol>
  history list [--coin id] [--symbol s] [--since yyyy-mm-dd]
  history vacuum`;

export function runHistoryCommand(deps: { history: HistoryLog; db: Db }, argv: string[]): CommandOutput {
  const [command, ...rest] = argv;
  const args = parseArgv(rest, { values: ['coin', 'symbol', 'since'] });

  switch (command) {
    case 'symbols': {
      const symbols = deps.history.listHistorySymbols();
      return { lines: [symbols.length ? symbols.join(', ') : 'No history recorded.'] };
    }
    case 'series': {
      const symbol = requirePositional(args, ['symbol'])[0].trim();
      const points = deps.history.getSymbolSeries(symbol);
      if (!points.length) return { lines: [`No history for ${symbol}.`] };
      return { lines: [`${points.length} point(s) for ${symbol}`], table: seriesTableRows(points) };
    }
    case 'list': {
      const entries = deps.history.listHistory({
        coinId: flagValue(args, 'coin'),
        symbol: flagValue(args, 'symbol'),
        since: flagValue(args, 'since'),
      });
      return { lines: [`${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`], table: historyTableRows(entries) };
    }
    case 'vacuum':
      vacuumDatabase(deps.db);
      return { lines: ['Database vacuumed.'] };
    default:
      throw new InputError(`Unknown command: ${command ?? '(none)'}`, { command: ['unknown command'] });
  }
}
