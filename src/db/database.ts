import Database from 'better-sqlite3';
import { env } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

/** 새 연결 + 스키마 보장. ':memory:'는 테스트용 */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  initSchema(db);
  log.info({ path }, 'Database initialized');
  return db;
}

export function getDb(): Database.Database {
  if (!_db) {
    _db = openDatabase(env('DB_PATH', './data/hedge.db'));
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS orders (
      idempotency_key     TEXT PRIMARY KEY,
      mode                TEXT,
      hedge_side          TEXT NOT NULL,
      symbol              TEXT NOT NULL,
      side                TEXT NOT NULL,
      intent              TEXT NOT NULL,
      leg_index           INTEGER NOT NULL,
      notional_usd        REAL NOT NULL,
      reduce_only         INTEGER NOT NULL,
      status              TEXT NOT NULL,
      order_id            TEXT,
      filled_notional_usd REAL,
      avg_price           REAL,
      reason              TEXT,
      created_at          INTEGER NOT NULL,
      updated_at          INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      mode       TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(hedge_side, status);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
  `);
}
