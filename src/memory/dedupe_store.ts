import type Database from 'better-sqlite3';

import { isExpired, type CacheEntry, type DedupeStore } from '../signals/dedupe.js';
import { openDatabase } from './db.js';

interface DedupeRow {
  key: string;
  lastEmittedAtMs: number;
  lastSeenAtMs: number;
  ttlMs: number;
}

/**
 * SQLite-backed dedupe store. Each claim runs in its own transaction so two
 * processes sharing the file cannot both emit the same key.
 */
export class SqliteDedupeStore implements DedupeStore {
  private readonly db: Database.Database;

  constructor(dbOrPath?: Database.Database | string) {
    this.db = typeof dbOrPath === 'object' ? dbOrPath : openDatabase(dbOrPath);
  }

  claim(key: string, nowMs: number, ttlMs: number): boolean {
    return this.db
      .transaction((): boolean => {
        const existing = this.get(key);
        if (existing && !isExpired(existing, nowMs)) {
          this.db
            .prepare('UPDATE dedupe_entries SET last_seen_at_ms = ? WHERE dedupe_key = ?')
            .run(nowMs, key);
          return false;
        }
        this.db
          .prepare(
            `
            INSERT INTO dedupe_entries (dedupe_key, last_emitted_at_ms, last_seen_at_ms, ttl_ms)
            VALUES (@key, @nowMs, @nowMs, @ttlMs)
            ON CONFLICT(dedupe_key) DO UPDATE SET
              last_emitted_at_ms = excluded.last_emitted_at_ms,
              last_seen_at_ms = excluded.last_seen_at_ms,
              ttl_ms = excluded.ttl_ms
          `
          )
          .run({ key, nowMs, ttlMs });
        return true;
      })
      .immediate();
  }

  get(key: string): CacheEntry | undefined {
    const row = this.db
      .prepare(
        `
        SELECT
          dedupe_key AS key,
          last_emitted_at_ms AS lastEmittedAtMs,
          last_seen_at_ms AS lastSeenAtMs,
          ttl_ms AS ttlMs
        FROM dedupe_entries
        WHERE dedupe_key = ?
      `
      )
      .get(key) as DedupeRow | undefined;
    return row ? { ...row } : undefined;
  }

  clear(): void {
    this.db.prepare('DELETE FROM dedupe_entries').run();
  }
}
