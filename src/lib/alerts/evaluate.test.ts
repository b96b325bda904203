import { describe, expect, it } from 'vitest';
import type { AggregateRow, CoinCategory } from '@/lib/types';
import { ALERT_PRESETS } from '@/lib/config';
import { describeAlert, evaluateAlerts } from './evaluate';

function row(symbol: string, pctChangeNet: number, categoryLabel: CoinCategory = 'risk'): AggregateRow {
  return {
    coinId: symbol.toLowerCase(),
    symbol,
    wallet: null,
    lotCount: 1,
    totalAmount: 1,
    purchasedAmount: 1,
    avgBuyPrice: 100,
    avgFeeBuyPct: 0,
    avgFeeSellPct: 0,
    investedValue: 100,
    currentPrice: 100 + pctChangeNet,
    priceMissing: false,
    currentValueNet: 100 + pctChangeNet,
    pctChangeNet,
    categoryLabel,
  };
}

describe('evaluateAlerts', () => {
  it('raises take-profit at +25 with the standard thresholds', () => {
    const alerts = evaluateAlerts([row('PEPE', 25)]);
    expect(alerts).toEqual([
      { kind: 'take-profit', coinId: 'pepe', symbol: 'PEPE', wallet: null, pctChangeNet: 25, threshold: 20 },
    ]);
  });

  it('raises stop-loss at -20', () => {
    const alerts = evaluateAlerts([row('PEPE', -20)]);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].kind).toBe('stop-loss');
    expect(alerts[0].threshold).toBe(-15);
  });

  it('stays quiet inside the band', () => {
    expect(evaluateAlerts([row('PEPE', 5)])).toEqual([]);
  });

  it('treats the thresholds as inclusive', () => {
    expect(evaluateAlerts([row('A', 20), row('B', -15)]).map((a) => a.kind)).toEqual(['take-profit', 'stop-loss']);
  });

  it('ignores rows outside the risk category', () => {
    expect(evaluateAlerts([row('BTC', 80, 'classic'), row('USDC', -40, 'stable')])).toEqual([]);
  });

  it('honours the wide preset', () => {
    const wide = { riskCategory: 'risk' as const, ...ALERT_PRESETS.wide };
    expect(evaluateAlerts([row('A', 25), row('B', -20)], wide)).toEqual([]);
    expect(evaluateAlerts([row('A', 55), row('B', -31)], wide).map((a) => a.kind)).toEqual(['take-profit', 'stop-loss']);
  });

  it('re-fires the same breach on every evaluation', () => {
    const rows = [row('PEPE', 30)];
    expect(evaluateAlerts(rows)).toHaveLength(1);
    expect(evaluateAlerts(rows)).toHaveLength(1);
  });
});

describe('describeAlert', () => {
  it('formats both kinds', () => {
    const [up, down] = evaluateAlerts([row('PEPE', 25), { ...row('DOGE', -20), wallet: 'hot' }]);
    expect(describeAlert(up)).toBe('PEPE: +25.0% - consider taking profit');
    expect(describeAlert(down)).toBe('DOGE (hot): -20.0% - stop loss triggered');
  });
});
