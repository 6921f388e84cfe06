import type {
  DayStats,
  IntervalMark,
  LevelFilter,
  PeriodCandidate,
  PeriodDirection,
  Provenance,
  SmoothedInterval,
} from './types';
import { evaluateIntervalCriteria } from './intervalCriteria';
import { applyLevelFilter } from './levelFilter';
import { isWithinVariationLimit } from './priceVariation';

/**
 * Period Building
 *
 * Runs criteria and level filter over a day window and turns the surviving
 * runs into period candidates.
 *
 * The window holds the day's own intervals followed by the next day's early
 * morning intervals (when available) so that a period starting late in the
 * evening can continue past midnight. The next day's intervals are judged
 * against the statistics of the day the period starts in. A run only
 * continues into the next day when it starts at or after `extendableFrom`
 * and its prices stay within the variation limit.
 */

export interface DayWindow {
  /** The day's intervals followed by the look-ahead intervals */
  intervals: ReadonlyArray<SmoothedInterval>;
  /** Number of intervals that belong to the day itself */
  dayLength: number;
  /** Leading day intervals already claimed by the previous day's last period */
  blockedCount: number;
  stats: DayStats;
  /** First day index from which a run may continue into the look-ahead */
  extendableFrom: number;
  intervalMinutes: number;
}

export interface PassCriteria {
  direction: PeriodDirection;
  flex: number;
  minDistanceFromAvg: number;
  levelFilter: LevelFilter;
  gapTolerance: number;
  minPeriodMinutes: number;
}

/**
 * Count smoothed intervals within window bounds
 * @param intervals - Window intervals
 * @param startIndex - First index
 * @param endIndex - Last index (inclusive)
 * @returns Number of smoothed intervals
 */
export function countSmoothed(
  intervals: ReadonlyArray<SmoothedInterval>,
  startIndex: number,
  endIndex: number,
): number {
  let count = 0;
  for (let i = startIndex; i <= endIndex; i++) {
    if (intervals[i].smoothed) {
      count++;
    }
  }
  return count;
}

/**
 * Minimum run length in intervals
 * @param minPeriodMinutes - Configured minimum period length
 * @param intervalMinutes - Interval duration
 * @returns Minimum number of intervals
 */
export function getMinPeriodIntervals(minPeriodMinutes: number, intervalMinutes: number): number {
  return Math.max(1, Math.ceil(minPeriodMinutes / intervalMinutes));
}

/**
 * Check whether the run crossing midnight may keep its look-ahead part
 * @param window - Day window
 * @param accepted - Criteria result per window interval
 * @returns False when a crossing run starts too early or varies too much
 */
export function allowsCrossDayRun(window: DayWindow, accepted: ReadonlyArray<boolean>): boolean {
  const { dayLength } = window;
  if (dayLength === 0 || !accepted[dayLength - 1] || !accepted[dayLength]) {
    return true;
  }

  let startIndex = dayLength - 1;
  while (startIndex > 0 && accepted[startIndex - 1]) {
    startIndex--;
  }
  let endIndex = dayLength;
  while (endIndex + 1 < accepted.length && accepted[endIndex + 1]) {
    endIndex++;
  }

  return startIndex >= window.extendableFrom
    && isWithinVariationLimit(window.intervals, startIndex, endIndex);
}

/**
 * Compute the interval marks of one pass over the window
 * @param window - Day window
 * @param criteria - Criteria of the pass
 * @returns Mark per window interval
 */
export function markWindow(window: DayWindow, criteria: PassCriteria): Array<IntervalMark> {
  const accepted = window.intervals.map((interval, i) => (
    i >= window.blockedCount
    && evaluateIntervalCriteria(interval.smoothedPrice, window.stats, criteria).accepted
  ));

  if (!allowsCrossDayRun(window, accepted)) {
    for (let i = window.dayLength; i < accepted.length; i++) {
      accepted[i] = false;
    }
  }

  return applyLevelFilter(
    accepted,
    window.intervals.map((interval) => interval.level),
    {
      direction: criteria.direction,
      levelFilter: criteria.levelFilter,
      gapTolerance: criteria.gapTolerance,
      intervalMinutes: window.intervalMinutes,
    },
  );
}

/**
 * Turn interval marks into period candidates
 * @param window - Day window
 * @param marks - Mark per window interval
 * @param minIntervals - Minimum run length
 * @param provenance - Provenance stamped on every candidate
 * @returns Candidates starting within the day, sorted by start
 */
export function buildCandidates(
  window: DayWindow,
  marks: ReadonlyArray<IntervalMark>,
  minIntervals: number,
  provenance: Provenance,
): Array<PeriodCandidate> {
  const candidates: Array<PeriodCandidate> = [];
  let runStart = -1;

  for (let i = 0; i <= marks.length; i++) {
    const inRun = i < marks.length && marks[i] !== 'rejected';
    if (inRun && runStart < 0) {
      runStart = i;
      continue;
    }
    if (inRun || runStart < 0) {
      continue;
    }

    const startIndex = runStart;
    const endIndex = i - 1;
    runStart = -1;

    if (startIndex >= window.dayLength || endIndex - startIndex + 1 < minIntervals) {
      continue;
    }

    const gapIndices: Array<number> = [];
    for (let j = startIndex; j <= endIndex; j++) {
      if (marks[j] === 'gap') {
        gapIndices.push(j);
      }
    }

    candidates.push({
      start: window.intervals[startIndex].start,
      end: window.intervals[endIndex].end,
      startIndex,
      endIndex,
      provenance,
      smoothedCount: countSmoothed(window.intervals, startIndex, endIndex),
      gapCount: gapIndices.length,
      gapIndices,
    });
  }

  return candidates;
}

/**
 * Find the period candidates of one pass
 * @param window - Day window
 * @param criteria - Criteria of the pass
 * @param provenance - Provenance stamped on every candidate
 * @returns Candidates sorted by start
 */
export function findPeriodCandidates(
  window: DayWindow,
  criteria: PassCriteria,
  provenance: Provenance,
): Array<PeriodCandidate> {
  const marks = markWindow(window, criteria);
  const minIntervals = getMinPeriodIntervals(criteria.minPeriodMinutes, window.intervalMinutes);
  return buildCandidates(window, marks, minIntervals, provenance);
}
