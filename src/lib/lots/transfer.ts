import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import type { Lot } from '@/lib/types';
import { InputError, errorMessage } from '@/lib/errors';
import { validateLotInput, type ValidLotInput } from './schema';

export const CSV_HEADER = [
  'id',
  'coin_id',
  'symbol',
  'amount',
  'buy_price',
  'fee_buy_pct',
  'fee_sell_pct',
  'category',
  'wallet',
  'entry_kind',
] as const;

export type CsvImportResult = {
  lots: ValidLotInput[];
  errors: Array<{ line: number; message: string }>;
};

export function exportLotsJson(lots: Lot[]): string {
  return JSON.stringify(lots, null, 2);
}

function csvCell(v: string | number | null): string {
  if (v === null) return '';
  if (typeof v === 'number') return String(v);
  return `"${v.replace(/"/g, '""')}"`;
}

export function exportLotsCsv(lots: Lot[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const l of lots) {
    const vals = [l.id, l.coinId, l.symbol, l.amount, l.buyPrice, l.feeBuyPct, l.feeSellPct, l.category, l.wallet, l.entryKind];
    lines.push(vals.map(csvCell).join(','));
  }
  return lines.join('\n');
}

const str = (v: unknown): string | undefined => (v == null || String(v).trim() === '' ? undefined : String(v));

// `info.lines` is the file line on which the record ends
const CsvRecordsSchema = z.array(
  z.object({
    info: z.object({ lines: z.number() }),
    record: z.record(z.string()),
  })
);

/**
 * Parses lots from CSV with a header row using the export column names.
 * Bad rows are skipped and reported by file line; the `id` column is ignored.
 */
export function parseLotsCsv(text: string): CsvImportResult {
  let parsed: unknown;
  try {
    parsed = parseCsv(text, { bom: true, columns: true, info: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new InputError(`Unreadable CSV: ${errorMessage(error)}`);
  }
  const records = CsvRecordsSchema.parse(parsed);

  const result: CsvImportResult = { lots: [], errors: [] };
  for (const { info, record: r } of records) {
    try {
      const entryKind = str(r.entry_kind)?.toLowerCase() === 'staking' ? 'staking' : 'purchase';
      result.lots.push(
        validateLotInput({
          coinId: r.coin_id ?? '',
          symbol: r.symbol ?? '',
          amount: r.amount ?? '',
          buyPrice: str(r.buy_price),
          feeBuyPct: str(r.fee_buy_pct),
          feeSellPct: str(r.fee_sell_pct),
          category: str(r.category),
          wallet: str(r.wallet),
          entryKind,
        })
      );
    } catch (error) {
      result.errors.push({ line: info.lines, message: errorMessage(error) });
    }
  }
  return result;
}
