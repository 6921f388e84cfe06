import type {
  DayStats,
  PeriodCandidate,
  PeriodCriteria,
  PeriodSummary,
  PriceLevel,
  PriceRating,
  SmoothedInterval,
  Volatility,
} from './types';
import { PRICE_LEVEL_ORDINAL, PRICE_LEVELS, VOLATILITY_THRESHOLDS } from './constants';
import { calculateCoefficientOfVariation, roundTo } from './priceVariation';
import { describeProvenance } from './relaxation';
import { MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

/**
 * Period Statistics
 *
 * Builds the consumer-facing summary of each period. Price statistics are
 * always computed from the original prices, so a smoothed spike still shows
 * up in the reported maximum.
 */

export { calculateCoefficientOfVariation, roundTo } from './priceVariation';

const RATING_ORDINAL: Record<PriceRating, number> = { LOW: -1, NORMAL: 0, HIGH: 1 };
const RATINGS: ReadonlyArray<PriceRating> = ['LOW', 'NORMAL', 'HIGH'];

/**
 * Median of a list (mean of the two middle values for even lengths)
 * @param values - Non-empty list
 * @returns Median
 */
export function calculateMedian(values: ReadonlyArray<number>): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Classify a coefficient of variation
 * @param cv - Coefficient of variation in percent
 * @returns Volatility class
 */
export function classifyVolatility(cv: number): Volatility {
  for (const [limit, volatility] of VOLATILITY_THRESHOLDS) {
    if (cv < limit) {
      return volatility;
    }
  }
  return 'very_high';
}

/**
 * Aggregate the levels of a period (median ordinal, upper middle for even counts)
 * @param levels - Non-empty list of levels
 * @returns Representative level
 */
export function aggregateLevels(levels: ReadonlyArray<PriceLevel>): PriceLevel {
  const ordinals = levels.map((level) => PRICE_LEVEL_ORDINAL[level]).sort((a, b) => a - b);
  const median = ordinals[Math.floor(ordinals.length / 2)];
  return PRICE_LEVELS.find((level) => PRICE_LEVEL_ORDINAL[level] === median) ?? 'NORMAL';
}

function aggregateRatings(ratings: ReadonlyArray<PriceRating | undefined>): PriceRating | null {
  const ordinals = ratings
    .filter((rating): rating is PriceRating => rating !== undefined)
    .map((rating) => RATING_ORDINAL[rating])
    .sort((a, b) => a - b);
  if (ordinals.length === 0) {
    return null;
  }
  const median = ordinals[Math.floor(ordinals.length / 2)];
  return RATINGS.find((rating) => RATING_ORDINAL[rating] === median) ?? null;
}

/**
 * Build the summaries of a day's periods
 * @param candidates - Final candidates, sorted by start
 * @param intervals - Window intervals the candidate indices refer to
 * @param criteria - Normalized criteria of the day
 * @param stats - Statistics of the day
 * @param dayLength - Number of window intervals that belong to the day itself
 * @returns One summary per candidate, with position metadata
 */
export function buildPeriodSummaries(
  candidates: ReadonlyArray<PeriodCandidate>,
  intervals: ReadonlyArray<SmoothedInterval>,
  criteria: PeriodCriteria,
  stats: DayStats,
  dayLength: number = intervals.length,
): Array<PeriodSummary> {
  const total = candidates.length;
  const reference = roundTo(criteria.direction === 'best' ? stats.min : stats.max, 4);
  const originalPct = roundTo(criteria.flex * 100, 2);

  return candidates.map((candidate, index) => {
    const members = intervals.slice(candidate.startIndex, candidate.endIndex + 1);
    const prices = members.map((interval) => interval.price);

    const priceMean = roundTo(prices.reduce((sum, p) => sum + p, 0) / prices.length, 4);
    const priceMin = roundTo(Math.min(...prices), 4);
    const priceMax = roundTo(Math.max(...prices), 4);
    const coefficientOfVariation = calculateCoefficientOfVariation(prices);
    const priceDiffFromRef = roundTo(priceMean - reference, 4);

    const { provenance, extendedBy } = candidate;
    let appliedFlex = criteria.flex;
    if (extendedBy) {
      appliedFlex = extendedBy.flex;
    } else if (provenance.kind === 'relaxed') {
      appliedFlex = provenance.flex;
    }

    return {
      start: candidate.start,
      end: candidate.end,
      durationMinutes: (candidate.end - candidate.start) / MILLISECONDS_PER_MINUTE,
      intervalCount: members.length,
      priceMean,
      priceMedian: roundTo(calculateMedian(prices), 4),
      priceMin,
      priceMax,
      priceSpread: roundTo(priceMax - priceMin, 4),
      coefficientOfVariation,
      volatility: classifyVolatility(coefficientOfVariation),
      level: aggregateLevels(members.map((interval) => interval.level)),
      rating: aggregateRatings(members.map((interval) => interval.rating)),
      priceDiffFromRef,
      priceDiffFromRefPct: reference === 0 ? null : roundTo((priceDiffFromRef / Math.abs(reference)) * 100, 2),
      relaxationActive: provenance.kind === 'relaxed',
      relaxationLevel: describeProvenance(provenance, criteria.levelFilter),
      relaxationThresholdOriginalPct: originalPct,
      relaxationThresholdAppliedPct: roundTo(appliedFlex * 100, 2),
      extendedByRelaxation: extendedBy !== undefined,
      smoothedCount: candidate.smoothedCount,
      levelGapCount: candidate.gapCount,
      crossDayIntervals: Math.max(0, candidate.endIndex - Math.max(candidate.startIndex, dayLength) + 1),
      position: index + 1,
      total,
      remaining: total - index - 1,
    };
  });
}

/**
 * Recompute position metadata after periods were removed
 * @param periods - Remaining periods, sorted by start
 * @returns New summaries with position, total and remaining updated
 */
export function renumberPeriods(periods: ReadonlyArray<PeriodSummary>): Array<PeriodSummary> {
  return periods.map((period, index) => ({
    ...period,
    position: index + 1,
    total: periods.length,
    remaining: periods.length - index - 1,
  }));
}
