import Database from 'better-sqlite3';
import { withPersistence } from '@/lib/errors';

export type Db = Database.Database;

let shared: Db | null = null;

function ensureColumn(db: Db, table: string, column: string, ddl: string) {
  const cols = (db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>).map((r) => r.name);
  if (!cols.includes(column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${ddl}`);
    console.warn(`[DB] Added column ${table}.${column}`);
  }
}

export function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS portfolio (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      coin_id TEXT NOT NULL,
      symbol TEXT NOT NULL,
      amount REAL NOT NULL,
      buy_price REAL NOT NULL DEFAULT 0,
      fee_buy_pct REAL NOT NULL DEFAULT 0,
      fee_sell_pct REAL NOT NULL DEFAULT 0,
      category TEXT NOT NULL DEFAULT 'classic',
      wallet TEXT,
      entry_kind TEXT DEFAULT 'purchase'
    );

    CREATE TABLE IF NOT EXISTS history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      coin_id TEXT NOT NULL,
      symbol TEXT NOT NULL,
      wallet TEXT,
      current_price REAL NOT NULL,
      current_value_net REAL NOT NULL,
      pct_change_net REAL NOT NULL
    );
  `);
  // Older databases predate wallets and staking entries.
  ensureColumn(db, 'portfolio', 'wallet', 'wallet TEXT');
  ensureColumn(db, 'portfolio', 'entry_kind', "entry_kind TEXT DEFAULT 'purchase'");
  ensureColumn(db, 'history', 'wallet', 'wallet TEXT');
  db.exec(`CREATE INDEX IF NOT EXISTS idx_history_symbol_timestamp ON history(symbol, timestamp)`);
}

/**
 * Opens (or creates) a portfolio database and brings its schema up to date.
 * Pass `:memory:` for a throwaway database.
 */
export function openDatabase(file: string): Db {
  return withPersistence(`open database ${file}`, () => {
    const db = new Database(file);
    if (file !== ':memory:') db.pragma('journal_mode = WAL');
    initSchema(db);
    return db;
  });
}

export function getDb(file: string): Db {
  if (!shared) shared = openDatabase(file);
  return shared;
}

export function closeDb(): void {
  if (shared) {
    shared.close();
    shared = null;
  }
}

export function vacuumDatabase(db: Db): void {
  withPersistence('vacuum database', () => db.exec('VACUUM'));
}
