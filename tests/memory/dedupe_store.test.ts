import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { closeDatabase } from '../../src/memory/db.js';
import { SqliteDedupeStore } from '../../src/memory/dedupe_store.js';
import { DeduplicationCache } from '../../src/signals/dedupe.js';

const MINUTE = 60 * 1000;
const openedPaths: string[] = [];

function isolatedDbPath(name: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'signal-engine-dedupe-'));
  const path = join(dir, `${name}.sqlite`);
  openedPaths.push(path);
  return path;
}

afterEach(() => {
  for (const path of openedPaths.splice(0)) {
    closeDatabase(path);
  }
});

describe('SqliteDedupeStore', () => {
  it('claims a key once per window', () => {
    const store = new SqliteDedupeStore(isolatedDbPath('claim'));

    expect(store.claim('AAPL|BUY|1h', 0, 30 * MINUTE)).toBe(true);
    expect(store.claim('AAPL|BUY|1h', 10 * MINUTE, 30 * MINUTE)).toBe(false);
    expect(store.get('AAPL|BUY|1h')).toEqual({
      key: 'AAPL|BUY|1h',
      lastEmittedAtMs: 0,
      lastSeenAtMs: 10 * MINUTE,
      ttlMs: 30 * MINUTE,
    });

    expect(store.claim('AAPL|BUY|1h', 31 * MINUTE, 30 * MINUTE)).toBe(true);
    expect(store.get('AAPL|BUY|1h')?.lastEmittedAtMs).toBe(31 * MINUTE);
  });

  it('shares state between stores on the same file', () => {
    const path = isolatedDbPath('shared');
    const first = new SqliteDedupeStore(path);
    const second = new SqliteDedupeStore(path);

    expect(first.claim('MSFT|SELL|4h', 0, MINUTE)).toBe(true);
    expect(second.claim('MSFT|SELL|4h', 1000, MINUTE)).toBe(false);
  });

  it('backs a DeduplicationCache with an injected clock', () => {
    let nowMs = 5_000;
    const cache = new DeduplicationCache({
      store: new SqliteDedupeStore(isolatedDbPath('cache')),
      now: () => nowMs,
    });

    expect(cache.shouldEmit('AAPL', 'STRONG_BUY', '1h')).toBe(true);
    expect(cache.shouldEmit('AAPL', 'STRONG_BUY', '1h')).toBe(false);
    nowMs += 31 * MINUTE;
    expect(cache.shouldEmit('AAPL', 'STRONG_BUY', '1h')).toBe(true);
  });

  it('clears every entry', () => {
    const store = new SqliteDedupeStore(isolatedDbPath('clear'));
    store.claim('AAPL|BUY|1h', 0, MINUTE);
    store.clear();

    expect(store.get('AAPL|BUY|1h')).toBeUndefined();
  });
});
