import { z } from 'zod';
import { COIN_CATEGORIES, ENTRY_KINDS, type CoinCategory, type EntryKind } from '@/lib/types';
import { InputError, type FieldErrors } from '@/lib/errors';

export function parseFloatSafe(v: unknown): number | null {
  if (v == null) return null;
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  const s = String(v).trim().replace(/[+$,]/g, '');
  if (s === '' || s.toLowerCase() === 'nan' || s.toLowerCase() === 'none') return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function isBlank(v: unknown): boolean {
  return v == null || (typeof v === 'string' && v.trim() === '');
}

const numeric = (label: string) =>
  z.union([z.number(), z.string()]).transform((v, ctx) => {
    const n = parseFloatSafe(v);
    if (n === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a number` });
      return z.NEVER;
    }
    return n;
  });

const feePct = (label: string) => numeric(label).pipe(z.number().min(0).max(100));

export function normalizeCategory(v: unknown): CoinCategory | null {
  const s = String(v ?? '').trim().toLowerCase();
  return (COIN_CATEGORIES as readonly string[]).includes(s) ? (s as CoinCategory) : null;
}

// Rows written before staking support store 'buy' or nothing at all.
export function normalizeEntryKind(v: unknown): EntryKind {
  const s = String(v ?? '').trim().toLowerCase();
  return s === 'staking' ? 'staking' : 'purchase';
}

export const LotInputSchema = z.object({
  coinId: z.string().trim().min(1, 'coinId is required').transform((s) => s.toLowerCase()),
  symbol: z.string().trim().min(1, 'symbol is required'),
  amount: numeric('amount').pipe(z.number().nonnegative()),
  buyPrice: numeric('buyPrice').pipe(z.number().nonnegative()).default(0),
  feeBuyPct: feePct('feeBuyPct').default(0),
  feeSellPct: feePct('feeSellPct').default(0),
  category: z.unknown().optional(),
  wallet: z
    .string()
    .nullable()
    .optional()
    .transform((w) => (w == null || w.trim() === '' ? null : w.trim())),
  entryKind: z.enum(ENTRY_KINDS).default('purchase'),
});

export type LotInput = z.input<typeof LotInputSchema>;
export type ValidLotInput = Omit<z.output<typeof LotInputSchema>, 'category'> & { category: CoinCategory };

// Blank or missing fields in a patch keep the stored value.
export type LotPatch = {
  coinId?: string | null;
  symbol?: string | null;
  amount?: number | string | null;
  buyPrice?: number | string | null;
  feeBuyPct?: number | string | null;
  feeSellPct?: number | string | null;
  category?: string | null;
  wallet?: string | null;
  entryKind?: EntryKind | null;
};

function toFieldErrors(error: z.ZodError): FieldErrors {
  const flat = error.flatten();
  const out: FieldErrors = {};
  for (const [key, msgs] of Object.entries(flat.fieldErrors)) {
    if (msgs && msgs.length) out[key] = msgs;
  }
  if (flat.formErrors.length) out._form = flat.formErrors;
  return out;
}

/**
 * Validates raw lot input. Numeric fields may arrive as strings from the command line
 * or a CSV cell. An unknown category falls back to `fallbackCategory`.
 */
export function validateLotInput(input: LotInput, fallbackCategory: CoinCategory = 'classic'): ValidLotInput {
  const parsed = LotInputSchema.safeParse(input);
  if (!parsed.success) {
    const fieldErrors = toFieldErrors(parsed.error);
    const fields = Object.keys(fieldErrors).join(', ');
    throw new InputError(`Invalid lot: ${fields}`, fieldErrors);
  }
  const category = normalizeCategory(parsed.data.category);
  if (category === null && !isBlank(parsed.data.category)) {
    console.warn(`[Lots] Unknown category "${String(parsed.data.category)}", using ${fallbackCategory}`);
  }
  return { ...parsed.data, category: category ?? fallbackCategory };
}

export function parseLotId(input: unknown): number {
  const s = typeof input === 'number' ? String(input) : String(input ?? '').trim();
  if (!/^\d+$/.test(s) || Number(s) <= 0) {
    throw new InputError(`Invalid lot id: ${String(input)}`, { id: ['must be a positive integer'] });
  }
  return Number(s);
}
