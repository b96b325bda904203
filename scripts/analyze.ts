#!/usr/bin/env tsx
/**
 * Runs one portfolio analysis, prints the table and any risk alerts,
 * and appends the snapshot to history.
 *
 * Usage:
 *   npx tsx scripts/analyze.ts [--by-wallet]
 */

import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { describeAlert } from '@/lib/alerts/evaluate';
import { formatCurrency, formatPercent, toTableRows } from '@/lib/format';
import { toLogObject } from '@/lib/errors';

async function main() {
  const groupByWallet = process.argv.includes('--by-wallet');
  const { analyzer, config } = createContext();

  const result = await analyzer.run({ groupByWallet });
  if (!result.rows.length) {
    console.log('Portfolio is empty, nothing to analyze.');
    return;
  }

  console.table(toTableRows(result.rows, config.currency));
  const cur = config.currency.toUpperCase();
  console.log(
    `\nInvested: ${formatCurrency(result.summary.totalInvested)} ${cur} | ` +
      `Value (net): ${formatCurrency(result.summary.totalValueNet)} ${cur} | ` +
      `Change: ${formatPercent(result.summary.totalPctChangeNet)}`
  );

  if (result.alerts.length) {
    console.log('\nRisk alerts:');
    result.alerts.forEach((a) => console.log(`  - ${describeAlert(a)}`));
  }
}

main()
  .catch((error) => {
    console.error('Analysis failed:', toLogObject(error));
    process.exitCode = 1;
  })
  .finally(() => closeDb());
