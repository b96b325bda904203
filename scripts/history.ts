#!/usr/bin/env tsx
/**
 * Reads the analysis history and maintains the database file.
 *
 * Usage:
 *   npx tsx scripts/history.ts symbols
 *   npx tsx scripts/history.ts series BTC
 *   npx tsx scripts/history.ts list [--coin bitcoin] [--since 2026-01-01]
 *   npx tsx scripts/history.ts vacuum
 */

import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { InputError, toLogObject } from '@/lib/errors';
import { HISTORY_USAGE, runHistoryCommand } from '@/lib/cli/history';
import { printOutput } from '@/lib/cli/output';

try {
  const { history, db } = createContext();
  printOutput(runHistoryCommand({ history, db }, process.argv.slice(2)));
} catch (error) {
  console.error('History command failed:', toLogObject(error));
  if (error instanceof InputError) console.error(HISTORY_USAGE);
  process.exitCode = 1;
} finally {
  closeDb();
}
