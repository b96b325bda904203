#!/usr/bin/env tsx
/**
 * Adds, edits, removes and lists lots.
 *
 * Usage:
 *   npx tsx scripts/lots.ts add bitcoin BTC 0.5 50000 --fee-buy 1 --fee-sell 1 --category risk --wallet ledger
 *   npx tsx scripts/lots.ts stake cardano ADA 12 --wallet yoroi
 *   npx tsx scripts/lots.ts edit 3 --amount 0.75
 *   npx tsx scripts/lots.ts delete 3
 *   npx tsx scripts/lots.ts list [--wallet ledger]
 *   npx tsx scripts/lots.ts wallets
 */

import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { InputError, toLogObject } from '@/lib/errors';
import { LOTS_USAGE, runLotsCommand } from '@/lib/cli/lots';
import { printOutput } from '@/lib/cli/output';

try {
  const { lots } = createContext();
  printOutput(runLotsCommand(lots, process.argv.slice(2)));
} catch (error) {
  console.error('Lots command failed:', toLogObject(error));
  if (error instanceof InputError) console.error(LOTS_USAGE);
  process.exitCode = 1;
} finally {
  closeDb();
}
