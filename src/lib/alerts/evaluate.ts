import type { AggregateRow, Alert } from '@/lib/types';
import { ALERT_PRESETS, type AlertThresholds } from '@/lib/config';

export const DEFAULT_THRESHOLDS: AlertThresholds = { riskCategory: 'risk', ...ALERT_PRESETS.standard };

/**
 * Take-profit / stop-loss scan over rows of the risk category.
 * Each row yields at most one alert; nothing is remembered between runs.
 */
export function evaluateAlerts(rows: AggregateRow[], thresholds: AlertThresholds = DEFAULT_THRESHOLDS): Alert[] {
  const alerts: Alert[] = [];
  for (const row of rows) {
    if (row.categoryLabel !== thresholds.riskCategory) continue;
    const base = { coinId: row.coinId, symbol: row.symbol, wallet: row.wallet, pctChangeNet: row.pctChangeNet };
    if (row.pctChangeNet >= thresholds.takeProfitPct) {
      alerts.push({ kind: 'take-profit', ...base, threshold: thresholds.takeProfitPct });
    } else if (row.pctChangeNet <= thresholds.stopLossPct) {
      alerts.push({ kind: 'stop-loss', ...base, threshold: thresholds.stopLossPct });
    }
  }
  return alerts;
}

export function describeAlert(alert: Alert): string {
  const where = alert.wallet ? ` (${alert.wallet})` : '';
  const pct = `${alert.pctChangeNet > 0 ? '+' : ''}${alert.pctChangeNet.toFixed(1)}%`;
  return alert.kind === 'take-profit'
    ? `${alert.symbol}${where}: ${pct} - consider taking profit`
    : `${alert.symbol}${where}: ${pct} - stop loss triggered`;
}
