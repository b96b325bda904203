#!/usr/bin/env tsx
/**
 * Repeats the analysis every N minutes until Ctrl+C.
 *
 * Usage:
 *   npx tsx scripts/watch.ts <minutes> [--by-wallet]
 */

import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { watchAnalysis } from '@/lib/analysis/watch';
import { describeAlert } from '@/lib/alerts/evaluate';
import { toTableRows } from '@/lib/format';
import { toLogObject } from '@/lib/errors';

async function main() {
  const minutes = Number(process.argv[2]);
  const groupByWallet = process.argv.includes('--by-wallet');
  const { analyzer, config } = createContext();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nStopping after the current step...');
    controller.abort();
  });

  console.log(`Analyzing every ${minutes} minute(s). Press Ctrl+C to stop.`);
  await watchAnalysis(analyzer, {
    intervalMinutes: minutes,
    signal: controller.signal,
    groupByWallet,
    onResult: (result) => {
      console.log(`\n=== ${result.timestamp} ===`);
      console.table(toTableRows(result.rows, config.currency));
      result.alerts.forEach((a) => console.log(`  ! ${describeAlert(a)}`));
    },
  });
}

main()
  .catch((error) => {
    console.error('Repeat analysis failed:', toLogObject(error));
    process.exitCode = 1;
  })
  .finally(() => closeDb());
