import type {
  DayBucket,
  DayOutcome,
  DayPeriodResult,
  PeriodCriteria,
  PriceInterval,
  SmoothedInterval,
  SmoothingOptions,
} from './types';
import {
  CROSS_DAY_LATE_PERIOD_START_HOUR,
  CROSS_DAY_MAX_EXTENSION_HOUR,
  DEFAULT_SMOOTHING_OPTIONS,
} from './constants';
import { normalizeCriteria } from './criteria';
import { groupIntervalsByDay, validateIntervalSeries } from './dayBuckets';
import { smoothOutliers } from './outlierSmoothing';
import type { DayWindow } from './periodBuilding';
import { getMinPeriodIntervals } from './periodBuilding';
import { findSupersededPeriods } from './periodMerging';
import { relaxDay } from './relaxation';
import { buildPeriodSummaries, renumberPeriods } from './periodStatistics';
import type { PeriodResultCache } from './resultCache';
import { computeInputHash, getCacheKey } from './resultCache';
import { formatTimeRange, getLocalHour, isValidTimezone } from '../utils/dateUtils';
import { ConfigurationError, extractErrorMessage, PeriodEngineError } from '../utils/errorUtils';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

/**
 * Period Calculation
 *
 * Entry point of the engine: splits the interval series into local days and
 * runs smoothing, criteria, level filter and relaxation for each day.
 * - Days are processed in chronological order. A period starting at 20:00
 *   or later may run past midnight up to 08:00; the following day does not
 *   reuse the intervals it covers.
 * - Best-price periods starting late in the evening are dropped when the
 *   next morning has a clearly cheaper period.
 * - A configuration or input problem only fails the affected day.
 * - With a cache, a day whose inputs are unchanged is not recomputed.
 */

export interface CalculatePeriodsOptions {
  /** IANA time zone defining the calendar day */
  timezone: string;
  smoothing?: SmoothingOptions;
  cache?: PeriodResultCache;
  logger?: Logger;
}

interface PreparedDay {
  bucket: DayBucket;
  intervalMinutes: number;
  smoothed: Array<SmoothedInterval>;
}

function prepareDay(bucket: DayBucket, smoothing: SmoothingOptions): PreparedDay {
  const intervalMinutes = validateIntervalSeries(bucket.intervals);
  return { bucket, intervalMinutes, smoothed: smoothOutliers(bucket.intervals, smoothing) };
}

function serializeIntervals(intervals: ReadonlyArray<PriceInterval>): Array<[number, number, number, string]> {
  return intervals.map(({ start, end, price, level }) => [start, end, price, level]);
}

function isContiguous(day: PreparedDay, next: PreparedDay): boolean {
  const { intervals } = day.bucket;
  return next.intervalMinutes === day.intervalMinutes
    && next.bucket.intervals[0].start === intervals[intervals.length - 1].end;
}

/**
 * Early morning intervals of the next day that a late period may continue into
 * @param next - Prepared next day
 * @param timezone - IANA time zone
 * @returns Leading intervals before 08:00 local time
 */
function getLookahead(next: PreparedDay, timezone: string): Array<SmoothedInterval> {
  const end = next.smoothed.findIndex(
    (interval) => getLocalHour(interval.start, timezone) >= CROSS_DAY_MAX_EXTENSION_HOUR,
  );
  return end < 0 ? next.smoothed : next.smoothed.slice(0, end);
}

/**
 * First day index from which a period may continue past midnight
 * @param intervals - Intervals of the day
 * @param timezone - IANA time zone
 * @returns Index of the first interval starting at 20:00 or later, or the day length
 */
function getExtendableFrom(intervals: ReadonlyArray<PriceInterval>, timezone: string): number {
  const index = intervals.findIndex(
    (interval) => getLocalHour(interval.start, timezone) >= CROSS_DAY_LATE_PERIOD_START_HOUR,
  );
  return index < 0 ? intervals.length : index;
}

/**
 * Drop late best-price periods that the following morning beats
 * @param today - Result of a day
 * @param tomorrow - Result of the directly following day
 * @param minPeriods - Target number of periods per day
 * @param timezone - IANA time zone
 * @param logger - Logger
 * @returns The day's result, replaced when periods were dropped
 */
function applySupersession(
  today: DayPeriodResult,
  tomorrow: DayPeriodResult,
  minPeriods: number,
  timezone: string,
  logger: Logger,
): DayPeriodResult {
  const superseded = findSupersededPeriods(today.periods, tomorrow.periods, timezone);
  if (superseded.length === 0) {
    return today;
  }

  for (const { superseded: period, replacement, improvementPct } of superseded) {
    logger.log(
      `[PERIODS] best ${today.date}: ${formatTimeRange(period.start, period.end, timezone)} superseded by `
      + `${tomorrow.date} ${formatTimeRange(replacement.start, replacement.end, timezone)} `
      + `(${improvementPct.toFixed(1)}% cheaper)`,
    );
  }

  const dropped = new Set(superseded.map((entry) => entry.superseded));
  const periods = renumberPeriods(today.periods.filter((period) => !dropped.has(period)));
  return {
    ...today,
    periods,
    targetMet: today.targetMet && periods.length >= minPeriods,
    standaloneCount: periods.length,
    supersededCount: today.supersededCount + superseded.length,
  };
}

/**
 * Count the leading intervals of a day that are covered by a period of the previous day
 * @param previous - Result of the previous day
 * @param intervals - Intervals of the day
 * @returns Number of blocked intervals
 */
function countClaimedIntervals(previous: DayPeriodResult | undefined, intervals: ReadonlyArray<PriceInterval>): number {
  if (!previous || previous.periods.length === 0) {
    return 0;
  }
  const claimedUntil = previous.periods[previous.periods.length - 1].end;
  let count = 0;
  while (count < intervals.length && intervals[count].start < claimedUntil) {
    count++;
  }
  return count;
}

/**
 * Detect periods for every day of an interval series
 * @param intervals - Ordered interval series, usually today and tomorrow
 * @param criteria - Criteria of one direction
 * @param options - Time zone, smoothing options, cache and logger
 * @returns Outcome per local date, in chronological order
 * @throws ConfigurationError when the time zone is unknown
 */
export function calculatePeriods(
  intervals: ReadonlyArray<PriceInterval>,
  criteria: PeriodCriteria,
  options: CalculatePeriodsOptions,
): Map<string, DayOutcome> {
  if (!isValidTimezone(options.timezone)) {
    throw new ConfigurationError('timezone', `unknown time zone "${options.timezone}"`);
  }

  const logger = options.logger ?? silentLogger;
  const smoothing = options.smoothing ?? DEFAULT_SMOOTHING_OPTIONS;
  const buckets = groupIntervalsByDay(intervals, options.timezone)
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const prepared = new Map<string, PreparedDay | Error>();
  const getPrepared = (bucket: DayBucket): PreparedDay | Error => {
    let entry = prepared.get(bucket.date);
    if (!entry) {
      try {
        entry = prepareDay(bucket, smoothing);
      } catch (error: unknown) {
        if (!(error instanceof PeriodEngineError)) {
          throw error;
        }
        entry = error;
      }
      prepared.set(bucket.date, entry);
    }
    return entry;
  };

  const outcomes = new Map<string, DayOutcome>();
  let previous: DayPeriodResult | undefined;

  buckets.forEach((bucket, index) => {
    const label = `${criteria.direction} ${bucket.date}: `;
    try {
      const day = getPrepared(bucket);
      if (day instanceof Error) {
        throw day;
      }

      const normalized = normalizeCriteria(criteria);
      if (getMinPeriodIntervals(normalized.minPeriodMinutes, day.intervalMinutes) > bucket.intervals.length) {
        throw new ConfigurationError(
          'minPeriodMinutes',
          `${normalized.minPeriodMinutes} minutes do not fit into ${bucket.date}`,
        );
      }

      let lookahead: Array<SmoothedInterval> = [];
      const next = index + 1 < buckets.length ? getPrepared(buckets[index + 1]) : undefined;
      if (next && !(next instanceof Error) && isContiguous(day, next)) {
        lookahead = getLookahead(next, options.timezone);
      }

      const blockedCount = countClaimedIntervals(previous, bucket.intervals);

      const hash = computeInputHash({
        criteria: normalized,
        smoothing,
        timezone: options.timezone,
        day: serializeIntervals(bucket.intervals),
        lookahead: serializeIntervals(lookahead),
        blockedCount,
      });
      const cacheKey = getCacheKey(normalized.direction, bucket.date);
      const cached = options.cache?.lookup(cacheKey, hash);

      let result: DayPeriodResult;
      if (cached) {
        logger.log(`[CACHE] ${label}inputs unchanged, reusing ${cached.periods.length} periods`);
        result = cached;
      } else {
        if (bucket.degenerate) {
          logger.log(`[PERIODS] ${label}all prices are equal (${bucket.stats.avg}), no distinct periods expected`);
        }

        const window: DayWindow = {
          intervals: [...day.smoothed, ...lookahead],
          dayLength: bucket.intervals.length,
          blockedCount,
          stats: bucket.stats,
          extendableFrom: getExtendableFrom(bucket.intervals, options.timezone),
          intervalMinutes: day.intervalMinutes,
        };
        const relaxation = relaxDay(window, normalized, logger, label);

        result = {
          date: bucket.date,
          direction: normalized.direction,
          periods: buildPeriodSummaries(
            relaxation.candidates,
            window.intervals,
            normalized,
            bucket.stats,
            window.dayLength,
          ),
          relaxationActive: relaxation.relaxationActive,
          targetMet: relaxation.targetMet,
          outcome: relaxation.outcome,
          attemptsUsed: relaxation.attemptsUsed,
          appliedFlex: relaxation.appliedFlex,
          standaloneCount: relaxation.candidates.length,
          supersededCount: 0,
          degenerate: bucket.degenerate,
          stats: bucket.stats,
        };
        options.cache?.store(cacheKey, hash, result);

        const ranges = result.periods.map((p) => formatTimeRange(p.start, p.end, options.timezone)).join(', ');
        logger.log(`[PERIODS] ${label}${result.periods.length} periods (${result.outcome})${ranges ? `: ${ranges}` : ''}`);
      }

      outcomes.set(bucket.date, { status: 'ok', result });
      previous = result;
    } catch (error: unknown) {
      if (!(error instanceof PeriodEngineError)) {
        throw error;
      }
      logger.error(`[PERIODS] ${label}skipped:`, extractErrorMessage(error));
      outcomes.set(bucket.date, { status: 'error', error });
      previous = undefined;
    }
  });

  if (criteria.direction === 'best') {
    buckets.forEach((bucket, index) => {
      const today = outcomes.get(bucket.date);
      const nextBucket = buckets[index + 1];
      const tomorrow = nextBucket ? outcomes.get(nextBucket.date) : undefined;
      if (!today || today.status !== 'ok' || !tomorrow || tomorrow.status !== 'ok') {
        return;
      }
      const day = getPrepared(bucket);
      const next = getPrepared(nextBucket);
      if (day instanceof Error || next instanceof Error || !isContiguous(day, next)) {
        return;
      }
      outcomes.set(bucket.date, {
        status: 'ok',
        result: applySupersession(
          today.result,
          tomorrow.result,
          normalizeCriteria(criteria).minPeriods,
          options.timezone,
          logger,
        ),
      });
    });
  }

  return outcomes;
}
