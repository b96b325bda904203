import { z } from 'zod';
import { COIN_CATEGORIES, type CoinCategory } from '@/lib/types';

export type AlertThresholds = {
  riskCategory: CoinCategory;
  takeProfitPct: number;
  stopLossPct: number;
};

export type Precision = {
  price: number;
  fee: number;
  currency: number;
  percent: number;
};

export type AppConfig = {
  dbFile: string;
  currency: string;
  priceApiUrl: string;
  priceTimeoutMs: number;
  alerts: AlertThresholds;
  precision: Precision;
};

// Two threshold pairs have been used for risk coins; both stay selectable.
export const ALERT_PRESETS = {
  standard: { takeProfitPct: 20, stopLossPct: -15 },
  wide: { takeProfitPct: 50, stopLossPct: -30 },
} as const;

export type AlertPreset = keyof typeof ALERT_PRESETS;

export const DEFAULT_PRECISION: Precision = { price: 6, fee: 4, currency: 2, percent: 2 };

const optionalNumber = z.coerce.number().finite().optional();

const EnvSchema = z.object({
  PORTFOLIO_DB_FILE: z.string().min(1).default('crypto_portfolio.db'),
  PORTFOLIO_CURRENCY: z.string().min(3).default('cad').transform((s) => s.toLowerCase()),
  PRICE_API_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  PRICE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RISK_CATEGORY: z.enum(COIN_CATEGORIES).default('risk'),
  ALERT_PRESET: z.enum(['standard', 'wide']).default('standard'),
  TAKE_PROFIT_PCT: optionalNumber,
  STOP_LOSS_PCT: optionalNumber,
  PRICE_DECIMALS: z.coerce.number().int().min(0).max(12).default(DEFAULT_PRECISION.price),
  FEE_DECIMALS: z.coerce.number().int().min(0).max(12).default(DEFAULT_PRECISION.fee),
  CURRENCY_DECIMALS: z.coerce.number().int().min(0).max(12).default(DEFAULT_PRECISION.currency),
  PERCENT_DECIMALS: z.coerce.number().int().min(0).max(12).default(DEFAULT_PRECISION.percent),
});

const ThresholdsSchema = z
  .object({ takeProfitPct: z.number(), stopLossPct: z.number() })
  .superRefine((t, ctx) => {
    if (t.takeProfitPct <= t.stopLossPct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TAKE_PROFIT_PCT'],
        message: `take-profit (${t.takeProfitPct}) must be above stop-loss (${t.stopLossPct})`,
      });
    }
  });

function describeIssues(error: z.ZodError): string {
  return Object.entries(error.flatten().fieldErrors)
    .map(([key, msgs]) => `${key}: ${(msgs ?? []).join(', ')}`)
    .join('; ');
}

function blankToUndefined(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = v === undefined || v.trim() === '' ? undefined : v;
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) throw new Error(`Invalid configuration: ${describeIssues(parsed.error)}`);
  const e = parsed.data;
  const preset = ALERT_PRESETS[e.ALERT_PRESET];
  const thresholds = ThresholdsSchema.safeParse({
    takeProfitPct: e.TAKE_PROFIT_PCT ?? preset.takeProfitPct,
    stopLossPct: e.STOP_LOSS_PCT ?? preset.stopLossPct,
  });
  if (!thresholds.success) throw new Error(`Invalid configuration: ${describeIssues(thresholds.error)}`);
  return {
    dbFile: e.PORTFOLIO_DB_FILE,
    currency: e.PORTFOLIO_CURRENCY,
    priceApiUrl: e.PRICE_API_URL.replace(/\/+$/, ''),
    priceTimeoutMs: e.PRICE_TIMEOUT_MS,
    alerts: {
      riskCategory: e.RISK_CATEGORY,
      takeProfitPct: thresholds.data.takeProfitPct,
      stopLossPct: thresholds.data.stopLossPct,
    },
    precision: {
      price: e.PRICE_DECIMALS,
      fee: e.FEE_DECIMALS,
      currency: e.CURRENCY_DECIMALS,
      percent: e.PERCENT_DECIMALS,
    },
  };
}
