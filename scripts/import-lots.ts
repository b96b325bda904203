#!/usr/bin/env tsx
/**
 * Imports lots from a CSV file using the export column layout.
 *
 * Usage:
 *   npx tsx scripts/import-lots.ts <file.csv>
 */

import fs from 'fs';
import { createContext } from '@/lib/context';
import { closeDb } from '@/lib/db';
import { parseLotsCsv } from '@/lib/lots/transfer';
import { toLogObject } from '@/lib/errors';

function main() {
  const csvPath = process.argv[2];
  if (!csvPath || !fs.existsSync(csvPath)) {
    console.error('CSV not found at', csvPath);
    process.exitCode = 1;
    return;
  }
  const { lots } = createContext();
  const parsed = parseLotsCsv(fs.readFileSync(csvPath, 'utf8'));
  const added = lots.addLots(parsed.lots);

  console.log(`Imported ${added.length} lot(s)`);
  if (parsed.errors.length) {
    console.log(`Skipped ${parsed.errors.length} row(s):`);
    parsed.errors.forEach((e) => console.error(`  - line ${e.line}: ${e.message}`));
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  console.error('Import failed:', toLogObject(error));
  process.exitCode = 1;
} finally {
  closeDb();
}
