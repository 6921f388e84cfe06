import type { LevelFilter, PeriodCandidate, PeriodCriteria, Provenance, RelaxationOutcome } from './types';
import { MAX_FLEX, RELAXATION_FLEX_STEP } from './constants';
import { scaleMinDistance } from './intervalCriteria';
import type { DayWindow, PassCriteria } from './periodBuilding';
import { findPeriodCandidates } from './periodBuilding';
import { mergeCandidates } from './periodMerging';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';

/**
 * Relaxation
 *
 * Per-day search that loosens the criteria step by step until the day has
 * the requested number of periods:
 * 1. Baseline with the configured criteria.
 * 2. Attempt k widens |flex| to |base| + k * 3% (capped at 50%) and, above 20%
 *    flex, scales the distance requirement down. Each attempt first keeps the
 *    level filter, then drops it.
 * 3. The search ends as soon as the target is met, after the configured
 *    number of attempts, or after the attempt that reached the flex ceiling.
 */

export interface RelaxationResult {
  candidates: Array<PeriodCandidate>;
  outcome: RelaxationOutcome;
  targetMet: boolean;
  relaxationActive: boolean;
  attemptsUsed: number;
  /** Signed flex of the last evaluated pass */
  appliedFlex: number;
}

/**
 * Flex of a relaxation attempt
 * @param baseFlex - Signed configured flex
 * @param attempt - Attempt number (1-based)
 * @returns Signed flex, rounded to 4 decimals and capped at 50%
 */
export function getRelaxedFlex(baseFlex: number, attempt: number): number {
  const absFlex = Math.min(Math.abs(baseFlex) + attempt * RELAXATION_FLEX_STEP, MAX_FLEX);
  const rounded = Math.round(absFlex * 10000) / 10000;
  return baseFlex < 0 ? -rounded : rounded;
}

/**
 * Human-readable description of how a period was found
 * @param provenance - Candidate provenance
 * @param configuredFilter - Level filter of the criteria
 * @returns Descriptor like "flex=18.0% +level_any", or null for baseline periods
 */
export function describeProvenance(provenance: Provenance, configuredFilter: LevelFilter): string | null {
  if (provenance.kind === 'baseline') {
    return null;
  }
  const flexText = `flex=${(Math.abs(provenance.flex) * 100).toFixed(1)}%`;
  const levelDropped = provenance.levelFilter === 'any' && configuredFilter !== 'any';
  return levelDropped ? `${flexText} +level_any` : flexText;
}

function toPassCriteria(criteria: PeriodCriteria, flex: number, minDistanceFromAvg: number, levelFilter: LevelFilter): PassCriteria {
  return {
    direction: criteria.direction,
    flex,
    minDistanceFromAvg,
    levelFilter,
    gapTolerance: criteria.gapTolerance,
    minPeriodMinutes: criteria.minPeriodMinutes,
  };
}

/**
 * Find the periods of one day, relaxing the criteria when needed
 * @param window - Day window (the day plus its look-ahead)
 * @param criteria - Normalized criteria
 * @param logger - Logger for progress messages
 * @param label - Prefix identifying the day and direction in log lines
 * @returns Final candidates and relaxation bookkeeping
 */
export function relaxDay(
  window: DayWindow,
  criteria: PeriodCriteria,
  logger: Logger = silentLogger,
  label = '',
): RelaxationResult {
  const target = criteria.minPeriods;
  const mergeContext = {
    intervals: window.intervals,
    gapTolerance: criteria.gapTolerance,
    intervalMinutes: window.intervalMinutes,
    dayLength: window.dayLength,
    extendableFrom: window.extendableFrom,
  };

  let candidates = findPeriodCandidates(
    window,
    toPassCriteria(criteria, criteria.flex, criteria.minDistanceFromAvg, criteria.levelFilter),
    { kind: 'baseline' },
  );

  if (candidates.length >= target || !criteria.enableRelaxation) {
    return {
      candidates,
      outcome: 'baseline',
      targetMet: candidates.length >= target,
      relaxationActive: false,
      attemptsUsed: 0,
      appliedFlex: criteria.flex,
    };
  }

  logger.log(`[RELAXATION] ${label}baseline found ${candidates.length}/${target} periods, relaxing`);

  const filters: Array<LevelFilter> = criteria.levelFilter === 'any' ? ['any'] : [criteria.levelFilter, 'any'];
  let appliedFlex = criteria.flex;
  let attemptsUsed = 0;

  for (let attempt = 1; attempt <= criteria.maxRelaxationAttempts; attempt++) {
    const flex = getRelaxedFlex(criteria.flex, attempt);
    const distance = scaleMinDistance(flex, criteria.minDistanceFromAvg);
    appliedFlex = flex;
    attemptsUsed = attempt;

    for (const levelFilter of filters) {
      const found = findPeriodCandidates(
        window,
        toPassCriteria(criteria, flex, distance, levelFilter),
        { kind: 'relaxed', attempt, flex, levelFilter },
      );
      candidates = mergeCandidates(candidates, found, mergeContext);

      if (candidates.length >= target) {
        logger.log(
          `[RELAXATION] ${label}target met at attempt ${attempt} `
          + `(${describeProvenance({ kind: 'relaxed', attempt, flex, levelFilter }, criteria.levelFilter)})`,
        );
        return {
          candidates,
          outcome: 'relaxed',
          targetMet: true,
          relaxationActive: true,
          attemptsUsed,
          appliedFlex,
        };
      }
    }

    if (Math.abs(flex) >= MAX_FLEX) {
      break;
    }
  }

  logger.log(
    `[RELAXATION] ${label}exhausted after ${attemptsUsed} attempts, ${candidates.length}/${target} periods`,
  );
  return {
    candidates,
    outcome: 'exhausted',
    targetMet: false,
    relaxationActive: true,
    attemptsUsed,
    appliedFlex,
  };
}
