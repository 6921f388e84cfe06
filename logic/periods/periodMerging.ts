import type { PeriodCandidate, PeriodSummary, SmoothedInterval } from './types';
import {
  CROSS_DAY_LATE_PERIOD_START_HOUR,
  CROSS_DAY_MAX_EXTENSION_HOUR,
  SUPERSESSION_PRICE_IMPROVEMENT_PCT,
} from './constants';
import { isGapPatternAllowed } from './levelFilter';
import { countSmoothed } from './periodBuilding';
import { isWithinVariationLimit } from './priceVariation';
import { getLocalHour } from '../utils/dateUtils';

/**
 * Period Merging
 *
 * Folds the candidates of a relaxation pass into the accumulated list:
 * - identical bounds: ignored
 * - overlapping or touching exactly one period: united with it, keeping the
 *   existing period's provenance (a baseline period is extended in place);
 *   the union must pass the gap rules and the variation limit, and may only
 *   cross midnight when it starts late in the evening
 * - inside an existing period: ignored
 * - overlapping or touching two or more periods: dropped, periods are never bridged
 * - otherwise: added as a standalone period
 * The list stays sorted, non-overlapping and never shrinks.
 */

export interface MergeContext {
  intervals: ReadonlyArray<SmoothedInterval>;
  gapTolerance: number;
  intervalMinutes: number;
  /** Number of window intervals that belong to the day itself */
  dayLength: number;
  /** First day index from which a period may continue past midnight */
  extendableFrom: number;
}

function touches(a: PeriodCandidate, b: PeriodCandidate): boolean {
  return a.startIndex <= b.endIndex + 1 && b.startIndex <= a.endIndex + 1;
}

function unite(existing: PeriodCandidate, incoming: PeriodCandidate, context: MergeContext): PeriodCandidate | null {
  const startIndex = Math.min(existing.startIndex, incoming.startIndex);
  const endIndex = Math.max(existing.endIndex, incoming.endIndex);

  const gapIndices = [
    ...existing.gapIndices,
    ...incoming.gapIndices.filter((index) => index < existing.startIndex || index > existing.endIndex),
  ].sort((a, b) => a - b);

  const allowed = isGapPatternAllowed(
    endIndex - startIndex + 1,
    gapIndices.map((index) => index - startIndex),
    context.gapTolerance,
    context.intervalMinutes,
  );
  if (!allowed) {
    return null;
  }
  if (endIndex >= context.dayLength && startIndex < context.extendableFrom) {
    return null;
  }
  if (!isWithinVariationLimit(context.intervals, startIndex, endIndex)) {
    return null;
  }

  return {
    start: context.intervals[startIndex].start,
    end: context.intervals[endIndex].end,
    startIndex,
    endIndex,
    provenance: existing.provenance,
    extendedBy: incoming.provenance.kind === 'relaxed' ? incoming.provenance : existing.extendedBy,
    smoothedCount: countSmoothed(context.intervals, startIndex, endIndex),
    gapCount: gapIndices.length,
    gapIndices,
  };
}

/**
 * Merge new candidates into an accumulated list
 * @param accumulated - Current periods (not modified)
 * @param incoming - Candidates of the latest pass
 * @param context - Window intervals and gap limits
 * @returns New sorted list
 */
export function mergeCandidates(
  accumulated: ReadonlyArray<PeriodCandidate>,
  incoming: ReadonlyArray<PeriodCandidate>,
  context: MergeContext,
): Array<PeriodCandidate> {
  const result = [...accumulated];

  for (const candidate of incoming) {
    const duplicate = result.some(
      (p) => p.startIndex === candidate.startIndex && p.endIndex === candidate.endIndex,
    );
    if (duplicate) {
      continue;
    }

    const related = result.filter((p) => touches(p, candidate));
    if (related.length === 0) {
      result.push(candidate);
      continue;
    }
    if (related.length > 1) {
      continue;
    }

    const existing = related[0];
    if (candidate.startIndex >= existing.startIndex && candidate.endIndex <= existing.endIndex) {
      continue;
    }

    const united = unite(existing, candidate, context);
    if (united) {
      result[result.indexOf(existing)] = united;
    }
  }

  return result.sort((a, b) => a.start - b.start);
}

export interface Supersession {
  superseded: PeriodSummary;
  replacement: PeriodSummary;
  improvementPct: number;
}

/**
 * Find late evening periods of a day that the next day's early morning beats
 *
 * A period starting at or after 20:00 is superseded when the cheapest period
 * of the next day starting before 08:00 has a mean at least 10 % lower.
 * @param today - Best-price periods of the day
 * @param tomorrow - Best-price periods of the following day
 * @param timezone - IANA time zone of the day boundaries
 * @returns The superseded periods with their replacement
 */
export function findSupersededPeriods(
  today: ReadonlyArray<PeriodSummary>,
  tomorrow: ReadonlyArray<PeriodSummary>,
  timezone: string,
): Array<Supersession> {
  const early = tomorrow.filter((p) => getLocalHour(p.start, timezone) < CROSS_DAY_MAX_EXTENSION_HOUR);
  if (early.length === 0) {
    return [];
  }
  const replacement = early.reduce((best, p) => (p.priceMean < best.priceMean ? p : best));

  const result: Array<Supersession> = [];
  for (const period of today) {
    if (getLocalHour(period.start, timezone) < CROSS_DAY_LATE_PERIOD_START_HOUR) {
      continue;
    }
    const improvementPct = period.priceMean > 0
      ? ((period.priceMean - replacement.priceMean) / period.priceMean) * 100
      : 0;
    if (improvementPct >= SUPERSESSION_PRICE_IMPROVEMENT_PCT) {
      result.push({ superseded: period, replacement, improvementPct });
    }
  }
  return result;
}
