import type { IntervalMark, LevelFilter, PeriodDirection, PriceLevel } from './types';
import {
  MAX_GAP_SHARE,
  MIN_GAP_SPACING,
  MIN_MINUTES_FOR_GAP_TOLERANCE,
  PRICE_LEVEL_ORDINAL,
} from './constants';

/**
 * Level Filter
 *
 * Restricts criteria-accepted runs to intervals whose price level passes the
 * configured threshold. An interval exactly one level step off may remain in
 * a period as a "gap", within the gap tolerance; anything further off splits
 * the run.
 */

export interface LevelFilterOptions {
  direction: PeriodDirection;
  levelFilter: LevelFilter;
  gapTolerance: number;
  intervalMinutes: number;
}

type LevelClass = 'meets' | 'gap' | 'fail';

/**
 * Classify a level against the threshold
 * @param level - Interval price level
 * @param filter - Level threshold
 * @param direction - Best accepts levels at or below, peak at or above
 * @returns Whether the level meets the threshold, misses it by one step, or fails
 */
export function classifyLevel(level: PriceLevel, filter: PriceLevel, direction: PeriodDirection): LevelClass {
  const distance = direction === 'best'
    ? PRICE_LEVEL_ORDINAL[level] - PRICE_LEVEL_ORDINAL[filter]
    : PRICE_LEVEL_ORDINAL[filter] - PRICE_LEVEL_ORDINAL[level];

  if (distance <= 0) {
    return 'meets';
  }
  return distance === 1 ? 'gap' : 'fail';
}

/**
 * Maximum number of gaps a segment of the given length may contain
 * @param length - Segment length in intervals
 * @param gapTolerance - Configured gap tolerance
 * @param intervalMinutes - Interval duration
 * @returns Allowed gap count (0 for segments shorter than 90 minutes)
 */
export function getMaxGaps(length: number, gapTolerance: number, intervalMinutes: number): number {
  if (length * intervalMinutes < MIN_MINUTES_FOR_GAP_TOLERANCE) {
    return 0;
  }
  return Math.min(gapTolerance, Math.ceil(MAX_GAP_SHARE * length));
}

/**
 * Minimum number of qualifying intervals required between two gaps
 * @param length - Segment length in intervals
 * @param maxGaps - Allowed gap count (> 0)
 * @returns Required spacing
 */
export function getMinGapSpacing(length: number, maxGaps: number): number {
  return Math.max(MIN_GAP_SPACING, Math.floor(length / maxGaps / 2));
}

/**
 * Check a set of gap positions against the gap limits of a segment
 * @param length - Segment length in intervals
 * @param gapPositions - Sorted gap positions inside the segment
 * @param gapTolerance - Configured gap tolerance
 * @param intervalMinutes - Interval duration
 * @returns True when the gaps are allowed
 */
export function isGapPatternAllowed(
  length: number,
  gapPositions: ReadonlyArray<number>,
  gapTolerance: number,
  intervalMinutes: number,
): boolean {
  if (gapPositions.length === 0) {
    return true;
  }
  const maxGaps = getMaxGaps(length, gapTolerance, intervalMinutes);
  if (maxGaps === 0 || gapPositions.length > maxGaps) {
    return false;
  }
  const spacing = getMinGapSpacing(length, maxGaps);
  for (let i = 1; i < gapPositions.length; i++) {
    if (gapPositions[i] - gapPositions[i - 1] - 1 < spacing) {
      return false;
    }
  }
  return true;
}

/**
 * Longest run of at least two consecutive gaps (earliest on ties)
 */
function findLongestGapRun(classes: ReadonlyArray<LevelClass>, from: number, to: number): [number, number] | null {
  let best: [number, number] | null = null;
  let runStart = -1;
  for (let i = from; i <= to + 1; i++) {
    const isGap = i <= to && classes[i] === 'gap';
    if (isGap && runStart < 0) {
      runStart = i;
    } else if (!isGap && runStart >= 0) {
      const length = i - runStart;
      if (length >= 2 && (!best || length > best[1] - best[0] + 1)) {
        best = [runStart, i - 1];
      }
      runStart = -1;
    }
  }
  return best;
}

function evaluateSegment(
  classes: ReadonlyArray<LevelClass>,
  marks: Array<IntervalMark>,
  from: number,
  to: number,
  options: LevelFilterOptions,
): void {
  let start = from;
  let end = to;
  while (start <= end && classes[start] === 'gap') {
    start++;
  }
  while (end >= start && classes[end] === 'gap') {
    end--;
  }
  if (start > end) {
    return;
  }

  const gaps: Array<number> = [];
  for (let i = start; i <= end; i++) {
    if (classes[i] === 'gap') {
      gaps.push(i - start);
    }
  }

  if (isGapPatternAllowed(end - start + 1, gaps, options.gapTolerance, options.intervalMinutes)) {
    for (let i = start; i <= end; i++) {
      marks[i] = classes[i] === 'gap' ? 'gap' : 'accepted';
    }
    return;
  }

  const run = findLongestGapRun(classes, start, end);
  if (run) {
    evaluateSegment(classes, marks, start, run[0] - 1, options);
    evaluateSegment(classes, marks, run[1] + 1, end, options);
    return;
  }

  // No multi-gap run: every gap splits
  let pieceStart = start;
  for (let i = start; i <= end + 1; i++) {
    if (i > end || classes[i] === 'gap') {
      for (let j = pieceStart; j < i; j++) {
        marks[j] = 'accepted';
      }
      pieceStart = i + 1;
    }
  }
}

/**
 * Apply the level filter to a criteria mask
 * @param accepted - Criteria result per interval of the window
 * @param levels - Price level per interval of the window
 * @param options - Direction, threshold, gap tolerance and interval duration
 * @returns Mark per interval; `rejected` for everything outside a valid segment
 */
export function applyLevelFilter(
  accepted: ReadonlyArray<boolean>,
  levels: ReadonlyArray<PriceLevel>,
  options: LevelFilterOptions,
): Array<IntervalMark> {
  const { levelFilter } = options;
  if (levelFilter === 'any') {
    return accepted.map((ok) => (ok ? 'accepted' : 'rejected'));
  }

  const marks: Array<IntervalMark> = accepted.map(() => 'rejected');

  const classes: Array<LevelClass> = accepted.map((ok, i) => (
    ok ? classifyLevel(levels[i], levelFilter, options.direction) : 'fail'
  ));

  let segmentStart = -1;
  for (let i = 0; i <= classes.length; i++) {
    const usable = i < classes.length && classes[i] !== 'fail';
    if (usable && segmentStart < 0) {
      segmentStart = i;
    } else if (!usable && segmentStart >= 0) {
      evaluateSegment(classes, marks, segmentStart, i - 1, options);
      segmentStart = -1;
    }
  }

  return marks;
}
