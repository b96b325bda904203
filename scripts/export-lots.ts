#!/usr/bin/env tsx
/**
 * Writes every lot to stdout as CSV (default) or JSON.
 *
 * Usage:
 *   npx tsx scripts/export-lots.ts [--json] > lots.csv
 */

import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { exportLotsCsv, exportLotsJson } from '@/lib/lots/transfer';
import { toLogObject } from '@/lib/errors';

try {
  const { lots } = createContext();
  const all = lots.listLots();
  process.stdout.write(process.argv.includes('--json') ? exportLotsJson(all) : exportLotsCsv(all));
  process.stdout.write('\n');
} catch (error) {
  console.error('Export failed:', toLogObject(error));
  process.exitCode = 1;
} finally {
  closeDb();
}
