import type { PriceInterval } from '../periods/types';
import type { PriceDataEntry } from './priceSource';
import { DEFAULT_INTERVAL_MINUTES } from '../periods/constants';
import { MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';
import { InputError } from '../utils/errorUtils';

/**
 * Convert price entries into engine intervals
 * - Entries are sorted by start time; duplicates keep the last entry
 * - Entries without a level are classified as NORMAL
 * @param entries - Entries from a price data source
 * @param intervalMinutes - Duration of one interval (default: 15 minutes)
 * @returns Interval series sorted by start
 * @throws InputError when a date cannot be parsed
 */
export function convertPriceEntries(
  entries: ReadonlyArray<PriceDataEntry>,
  intervalMinutes: number = DEFAULT_INTERVAL_MINUTES,
): Array<PriceInterval> {
  const durationMs = intervalMinutes * MILLISECONDS_PER_MINUTE;
  const byStart = new Map<number, PriceInterval>();

  for (const entry of entries) {
    const start = new Date(entry.date).getTime();
    if (Number.isNaN(start)) {
      throw new InputError(`Invalid price entry date "${entry.date}"`);
    }
    const interval: PriceInterval = {
      start,
      end: start + durationMs,
      price: entry.price,
      level: entry.level ?? 'NORMAL',
    };
    if (entry.rating) {
      interval.rating = entry.rating;
    }
    byStart.set(start, interval);
  }

  return [...byStart.values()].sort((a, b) => a.start - b.start);
}
