import type { Logger } from '../core/logger.js';
import type { SignalType } from './types.js';

export const DEFAULT_DEDUPE_TTL_MS = 30 * 60 * 1000;

export interface DedupeKey {
  instrumentId: string;
  signalType: SignalType;
  timeframe: string;
}

export interface CacheEntry {
  key: string;
  lastEmittedAtMs: number;
  lastSeenAtMs: number;
  ttlMs: number;
}

/**
 * Backing store for the cache. `claim` must be atomic per key: either the key
 * holds a live entry (refresh `lastSeenAtMs`, return false) or it does not
 * (write a fresh entry, return true).
 */
export interface DedupeStore {
  claim(key: string, nowMs: number, ttlMs: number): boolean;
  get(key: string): CacheEntry | undefined;
  clear(): void;
}

/** JSON-encoded so ids containing separators cannot collide. */
export function dedupeKeyOf(key: DedupeKey): string {
  return JSON.stringify([key.instrumentId, key.signalType, key.timeframe]);
}

export function isExpired(entry: CacheEntry, nowMs: number): boolean {
  return nowMs - entry.lastEmittedAtMs >= entry.ttlMs;
}

export class MemoryDedupeStore implements DedupeStore {
  private readonly entries = new Map<string, CacheEntry>();

  claim(key: string, nowMs: number, ttlMs: number): boolean {
    const existing = this.entries.get(key);
    if (existing && !isExpired(existing, nowMs)) {
      this.entries.set(key, { ...existing, lastSeenAtMs: nowMs });
      return false;
    }
    this.entries.set(key, { key, lastEmittedAtMs: nowMs, lastSeenAtMs: nowMs, ttlMs });
    return true;
  }

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface DeduplicationCacheOptions {
  ttlMs?: number;
  /** Decision when the store throws. */
  failOpen?: boolean;
  store?: DedupeStore;
  now?: () => number;
  logger?: Pick<Logger, 'warn'>;
}

/**
 * Time-windowed suppression of repeat emissions per
 * (instrument, signal type, timeframe). Expired entries are overwritten on the
 * next lookup; nothing sweeps in the background.
 */
export class DeduplicationCache {
  readonly ttlMs: number;
  readonly failOpen: boolean;
  private readonly store: DedupeStore;
  private readonly now: () => number;
  private readonly logger?: Pick<Logger, 'warn'>;

  constructor(options: DeduplicationCacheOptions = {}) {
    const ttl = options.ttlMs ?? DEFAULT_DEDUPE_TTL_MS;
    this.ttlMs = Number.isFinite(ttl) && ttl > 0 ? ttl : DEFAULT_DEDUPE_TTL_MS;
    this.failOpen = options.failOpen ?? true;
    this.store = options.store ?? new MemoryDedupeStore();
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  shouldEmit(instrumentId: string, signalType: SignalType, timeframe: string): boolean {
    const key = dedupeKeyOf({ instrumentId, signalType, timeframe });
    try {
      return this.store.claim(key, this.now(), this.ttlMs);
    } catch (error) {
      this.logger?.warn(
        `Dedupe store failed for ${instrumentId}/${signalType}/${timeframe}; ${this.failOpen ? 'emitting' : 'suppressing'}`,
        error
      );
      return this.failOpen;
    }
  }

  peek(instrumentId: string, signalType: SignalType, timeframe: string): CacheEntry | undefined {
    return this.store.get(dedupeKeyOf({ instrumentId, signalType, timeframe }));
  }

  clear(): void {
    this.store.clear();
  }
}
