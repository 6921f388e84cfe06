import type { DayOutcome, PeriodDirection, PeriodSummary, PriceInterval } from '../logic/periods/types';
import { calculatePeriods } from '../logic/periods/calculatePeriods';
import type { PeriodResultCache } from '../logic/periods/resultCache';
import { InMemoryPeriodResultCache } from '../logic/periods/resultCache';
import { convertPriceEntries } from '../logic/prices/priceConversion';
import type { PriceDataEntry, PriceDataSource } from '../logic/prices/priceSource';
import { DEFAULT_INTERVAL_MINUTES } from '../logic/periods/constants';
import { extractErrorMessage } from '../logic/utils/errorUtils';
import type { Logger } from '../logic/utils/logger';
import { consoleLogger } from '../logic/utils/logger';
import type { SettingsStore } from './settings';
import { getTimezone, readPeriodCriteria } from './settings';

/**
 * Period management module: fetches prices, runs the period engine for both
 * directions and keeps the latest results for queries.
 */

export interface PeriodSnapshot {
  /** Number of the refresh that produced this snapshot */
  generation: number;
  computedAt: number;
  timezone: string;
  best: Map<string, DayOutcome>;
  peak: Map<string, DayOutcome>;
}

export interface PeriodManagerOptions {
  source: PriceDataSource;
  settings: SettingsStore;
  logger?: Logger;
  cache?: PeriodResultCache;
  intervalMinutes?: number;
  now?: () => number;
}

/**
 * Collect the periods of all successfully computed days
 * @param outcomes - Outcome per day
 * @returns Periods in chronological order
 */
export function collectPeriods(outcomes: Map<string, DayOutcome>): Array<PeriodSummary> {
  const periods: Array<PeriodSummary> = [];
  for (const outcome of outcomes.values()) {
    if (outcome.status === 'ok') {
      periods.push(...outcome.result.periods);
    }
  }
  return periods.sort((a, b) => a.start - b.start);
}

export class PeriodManager {
  private readonly source: PriceDataSource;
  private readonly settings: SettingsStore;
  private readonly logger: Logger;
  private readonly cache: PeriodResultCache;
  private readonly intervalMinutes: number;
  private readonly now: () => number;

  private generation = 0;
  private snapshot: PeriodSnapshot | null = null;

  constructor(options: PeriodManagerOptions) {
    this.source = options.source;
    this.settings = options.settings;
    this.logger = options.logger ?? consoleLogger;
    this.cache = options.cache ?? new InMemoryPeriodResultCache();
    this.intervalMinutes = options.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetch prices and recompute periods.
   * - When a newer refresh was started while this one waited for prices,
   *   this refresh's result is discarded.
   * - When fetching or converting fails, the previous snapshot stays in place.
   * @returns The snapshot produced by this refresh, or the current one if it was discarded or failed
   */
  async refresh(): Promise<PeriodSnapshot | null> {
    this.generation += 1;
    const generation = this.generation;

    let entries: Array<PriceDataEntry>;
    try {
      entries = await this.source.fetch();
    } catch (error: unknown) {
      this.logger.error('[PRICES] Failed to fetch prices:', extractErrorMessage(error));
      return this.snapshot;
    }

    if (generation !== this.generation) {
      this.logger.log(`[PERIODS] Discarding refresh #${generation}, refresh #${this.generation} is newer`);
      return this.snapshot;
    }

    let intervals: Array<PriceInterval>;
    try {
      intervals = convertPriceEntries(entries, this.intervalMinutes);
    } catch (error: unknown) {
      this.logger.error('[PRICES] Invalid price data:', extractErrorMessage(error));
      return this.snapshot;
    }
    this.logger.log(`[PRICES] Received ${entries.length} price entries (${this.intervalMinutes}-minute intervals)`);

    const timezone = getTimezone(this.settings, this.logger);
    const options = { timezone, cache: this.cache, logger: this.logger };

    this.snapshot = {
      generation,
      computedAt: this.now(),
      timezone,
      best: calculatePeriods(intervals, readPeriodCriteria(this.settings, 'best'), options),
      peak: calculatePeriods(intervals, readPeriodCriteria(this.settings, 'peak'), options),
    };
    return this.snapshot;
  }

  /**
   * Drop cached day results, e.g. after settings changed
   */
  invalidate(): void {
    this.cache.invalidate();
    this.logger.log('[CACHE] Period cache cleared');
  }

  getSnapshot(): PeriodSnapshot | null {
    return this.snapshot;
  }

  /**
   * Find the period covering a point in time
   * @param direction - Best or peak
   * @param now - Timestamp to check (defaults to the manager's clock)
   * @returns Active period or null
   */
  getActivePeriod(direction: PeriodDirection, now: number = this.now()): PeriodSummary | null {
    if (!this.snapshot) {
      return null;
    }
    return collectPeriods(this.snapshot[direction]).find((p) => p.start <= now && now < p.end) ?? null;
  }

  /**
   * Find the next period that has not started yet
   * @param direction - Best or peak
   * @param now - Timestamp to check (defaults to the manager's clock)
   * @returns Upcoming period or null
   */
  getNextPeriod(direction: PeriodDirection, now: number = this.now()): PeriodSummary | null {
    if (!this.snapshot) {
      return null;
    }
    return collectPeriods(this.snapshot[direction]).find((p) => p.start > now) ?? null;
  }
}
