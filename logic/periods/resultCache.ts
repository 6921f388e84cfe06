import { createHash } from 'crypto';

import type { DayPeriodResult } from './types';

/**
 * Result Cache
 *
 * Per-day memo of finished period results. An entry is only reused while the
 * hash of everything the day's computation reads is unchanged; a new hash
 * replaces the entry as a whole. Stored results are frozen, so a caller
 * cannot change what later lookups return.
 */

export interface CacheEntry {
  readonly hash: string;
  readonly result: DayPeriodResult;
}

export interface PeriodResultCache {
  /**
   * Get a stored result
   * @param key - Cache key (direction and date)
   * @param hash - Hash of the current inputs
   * @returns The stored result when the hash matches, otherwise undefined
   */
  lookup(key: string, hash: string): DayPeriodResult | undefined;
  /** Replace the entry of a key */
  store(key: string, hash: string, result: DayPeriodResult): void;
  /** Drop all entries */
  invalidate(): void;
}

/**
 * Build the cache key of a day
 * @param direction - Period direction
 * @param date - Local date (YYYY-MM-DD)
 * @returns Cache key
 */
export function getCacheKey(direction: string, date: string): string {
  return `${direction}:${date}`;
}

/**
 * Serialize a value to JSON with object keys in sorted order
 * @param value - JSON-compatible value
 * @returns Deterministic JSON text
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Hash the inputs of a day's computation
 * @param input - Everything the computation reads
 * @returns SHA-256 hex digest
 */
export function computeInputHash(input: unknown): string {
  return createHash('sha256').update(stableStringify(input)).digest('hex');
}

/**
 * Freeze a result together with its periods and statistics
 * @param result - Result to freeze in place
 * @returns The same result
 */
export function freezeResult(result: DayPeriodResult): DayPeriodResult {
  result.periods.forEach((period) => Object.freeze(period));
  Object.freeze(result.periods);
  Object.freeze(result.stats);
  return Object.freeze(result);
}

/**
 * Map-backed cache, one entry per key
 */
export class InMemoryPeriodResultCache implements PeriodResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  lookup(key: string, hash: string): DayPeriodResult | undefined {
    const entry = this.entries.get(key);
    return entry && entry.hash === hash ? entry.result : undefined;
  }

  store(key: string, hash: string, result: DayPeriodResult): void {
    this.entries.set(key, Object.freeze({ hash, result: freezeResult(result) }));
  }

  invalidate(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Inspect the raw entry of a key
   * @param key - Cache key
   * @returns Entry or undefined
   */
  getEntry(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }
}
