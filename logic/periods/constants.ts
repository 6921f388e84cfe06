import type { PeriodCriteria, PeriodDirection, PriceLevel, SmoothingOptions, Volatility } from './types';

/**
 * Ordinal values of price levels
 */
export const PRICE_LEVEL_ORDINAL: Record<PriceLevel, number> = {
  VERY_CHEAP: -2,
  CHEAP: -1,
  NORMAL: 0,
  EXPENSIVE: 1,
  VERY_EXPENSIVE: 2,
};

export const PRICE_LEVELS: ReadonlyArray<PriceLevel> = [
  'VERY_CHEAP',
  'CHEAP',
  'NORMAL',
  'EXPENSIVE',
  'VERY_EXPENSIVE',
];

/** Flex added per relaxation attempt (3 percentage points) */
export const RELAXATION_FLEX_STEP = 0.03;

/** Hard ceiling for |flex| */
export const MAX_FLEX = 0.5;

/** Above this |flex| the minimum distance is scaled down during relaxation */
export const DISTANCE_SCALING_THRESHOLD = 0.2;
export const DISTANCE_SCALING_FACTOR = 2.5;
export const DISTANCE_SCALING_MIN = 0.25;

export const MAX_DISTANCE_PERCENT = 50;
export const MAX_GAP_TOLERANCE = 8;
export const MAX_MIN_PERIODS = 10;
export const MAX_RELAXATION_ATTEMPTS = 12;

/** Segments shorter than this get no gap tolerance */
export const MIN_MINUTES_FOR_GAP_TOLERANCE = 90;

/** Share of a segment that may consist of gaps (rounded up) */
export const MAX_GAP_SHARE = 0.25;

export const MIN_GAP_SPACING = 2;

export const DEFAULT_INTERVAL_MINUTES = 15;

/** Highest coefficient of variation (percent) a united or cross-day period may have */
export const PERIOD_MAX_CV = 25;

/** Only periods starting at or after this local hour may continue past midnight */
export const CROSS_DAY_LATE_PERIOD_START_HOUR = 20;

/** A period never continues past this local hour of the next day */
export const CROSS_DAY_MAX_EXTENSION_HOUR = 8;

/** A late period is dropped when the next early morning is at least this much cheaper (percent) */
export const SUPERSESSION_PRICE_IMPROVEMENT_PCT = 10;

/** Relative spread below which a day is considered degenerate */
export const DEGENERATE_SPREAD_EPSILON = 1e-6;

export const DEFAULT_SMOOTHING_OPTIONS: SmoothingOptions = {
  minContextSize: 3,
  confidenceLevel: 2.0,
  symmetryThreshold: 1.5,
  relativeVolatilityThreshold: 2.0,
  minRelativeDeviation: 0.05,
  maxClusterSize: 4,
};

export const DEFAULT_CRITERIA: Record<PeriodDirection, PeriodCriteria> = {
  best: {
    direction: 'best',
    flex: 0.15,
    minDistanceFromAvg: 5,
    minPeriodMinutes: 60,
    levelFilter: 'CHEAP',
    gapTolerance: 1,
    enableRelaxation: true,
    minPeriods: 2,
    maxRelaxationAttempts: 11,
  },
  peak: {
    direction: 'peak',
    flex: -0.2,
    minDistanceFromAvg: 5,
    minPeriodMinutes: 30,
    levelFilter: 'EXPENSIVE',
    gapTolerance: 1,
    enableRelaxation: true,
    minPeriods: 2,
    maxRelaxationAttempts: 11,
  },
};

/** Upper bounds (exclusive) of the coefficient of variation, in percent */
export const VOLATILITY_THRESHOLDS: ReadonlyArray<[number, Volatility]> = [
  [15, 'low'],
  [30, 'moderate'],
  [50, 'high'],
];
