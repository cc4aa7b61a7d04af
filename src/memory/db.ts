import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.signal-engine', 'signals.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS signals (
      id TEXT PRIMARY KEY,
      instrument_id TEXT NOT NULL,
      timeframe TEXT,
      direction TEXT NOT NULL CHECK(direction IN ('BUY', 'SELL', 'NEUTRAL')),
      signal_type TEXT NOT NULL CHECK(signal_type IN (
        'STRONG_SELL', 'SELL', 'WEAK_SELL', 'NEUTRAL', 'WEAK_BUY', 'BUY', 'STRONG_BUY'
      )),
      strength REAL NOT NULL CHECK(strength >= 0 AND strength <= 1),
      confidence REAL NOT NULL CHECK(confidence >= 0 AND confidence <= 1),
      rationale TEXT NOT NULL,
      components_json TEXT,
      created_at TEXT NOT NULL
    )
  `);
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_signals_instrument_created
    ON signals(instrument_id, created_at)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS dedupe_entries (
      dedupe_key TEXT PRIMARY KEY,
      last_emitted_at_ms INTEGER NOT NULL,
      last_seen_at_ms INTEGER NOT NULL,
      ttl_ms INTEGER NOT NULL CHECK(ttl_ms > 0)
    )
  `);
}

export function resolveDbPath(dbPath?: string): string {
  return dbPath ?? process.env.SIGNAL_ENGINE_DB_PATH ?? DEFAULT_DB_PATH;
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = resolveDbPath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  if (resolvedPath !== ':memory:') {
    ensureDirectory(resolvedPath);
  }

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  applySchema(db);

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDbPath(dbPath);
  const db = INSTANCES.get(resolvedPath);
  if (!db) return;
  INSTANCES.delete(resolvedPath);
  db.close();
}
