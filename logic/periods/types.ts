/**
 * Shared types of the period engine.
 */

export type PriceLevel = 'VERY_CHEAP' | 'CHEAP' | 'NORMAL' | 'EXPENSIVE' | 'VERY_EXPENSIVE';

export type PriceRating = 'LOW' | 'NORMAL' | 'HIGH';

/** A level threshold, or `any` to disable level filtering */
export type LevelFilter = PriceLevel | 'any';

export type PeriodDirection = 'best' | 'peak';

export interface PriceInterval {
  /** Interval start, Unix timestamp in milliseconds */
  start: number;
  /** Interval end (exclusive), Unix timestamp in milliseconds */
  end: number;
  /** Original price, never modified by the engine */
  price: number;
  level: PriceLevel;
  rating?: PriceRating;
}

export interface SmoothedInterval extends PriceInterval {
  /** Price used for criteria evaluation; equals `price` unless `smoothed` */
  readonly smoothedPrice: number;
  readonly smoothed: boolean;
}

export interface DayStats {
  min: number;
  max: number;
  avg: number;
}

export interface DayBucket {
  /** Local calendar date, YYYY-MM-DD */
  date: string;
  intervals: Array<PriceInterval>;
  stats: DayStats;
  /** True when all prices are (nearly) equal */
  degenerate: boolean;
}

export interface PeriodCriteria {
  direction: PeriodDirection;
  /** Signed fraction: >= 0 for best, <= 0 for peak */
  flex: number;
  /** Minimum distance from the daily average, in percent */
  minDistanceFromAvg: number;
  minPeriodMinutes: number;
  levelFilter: LevelFilter;
  gapTolerance: number;
  enableRelaxation: boolean;
  /** Target number of periods per day */
  minPeriods: number;
  maxRelaxationAttempts: number;
}

export interface SmoothingOptions {
  minContextSize: number;
  confidenceLevel: number;
  symmetryThreshold: number;
  relativeVolatilityThreshold: number;
  minRelativeDeviation: number;
  maxClusterSize: number;
}

export type Provenance =
  | { kind: 'baseline' }
  | { kind: 'relaxed'; attempt: number; flex: number; levelFilter: LevelFilter };

export type RelaxedProvenance = Extract<Provenance, { kind: 'relaxed' }>;

export interface PeriodCandidate {
  start: number;
  end: number;
  /** Index of the first interval in the day window */
  startIndex: number;
  /** Index of the last interval (inclusive) in the day window */
  endIndex: number;
  provenance: Provenance;
  /** Latest relaxation pass that widened this period after it was found */
  extendedBy?: RelaxedProvenance;
  smoothedCount: number;
  gapCount: number;
  /** Window indices of the intervals that only passed as level gaps */
  gapIndices: Array<number>;
}

/** Per-interval outcome of the level filter */
export type IntervalMark = 'accepted' | 'gap' | 'rejected';

export type Volatility = 'low' | 'moderate' | 'high' | 'very_high';

export interface PeriodSummary {
  start: number;
  end: number;
  durationMinutes: number;
  intervalCount: number;
  priceMean: number;
  priceMedian: number;
  priceMin: number;
  priceMax: number;
  priceSpread: number;
  /** Coefficient of variation in percent */
  coefficientOfVariation: number;
  volatility: Volatility;
  level: PriceLevel;
  rating: PriceRating | null;
  /** Mean price minus the daily minimum (best) or maximum (peak) */
  priceDiffFromRef: number;
  priceDiffFromRefPct: number | null;
  relaxationActive: boolean;
  /** e.g. "flex=18.0%" or "flex=18.0% +level_any"; null for baseline periods */
  relaxationLevel: string | null;
  relaxationThresholdOriginalPct: number;
  /** Flex that found the period, or that last widened it */
  relaxationThresholdAppliedPct: number;
  /** True when a relaxation pass widened a period found earlier */
  extendedByRelaxation: boolean;
  smoothedCount: number;
  levelGapCount: number;
  /** Intervals of the next day the period continues into */
  crossDayIntervals: number;
  /** 1-based position among the day's periods */
  position: number;
  total: number;
  remaining: number;
}

export type RelaxationOutcome = 'baseline' | 'relaxed' | 'exhausted';

export interface DayPeriodResult {
  date: string;
  direction: PeriodDirection;
  periods: Array<PeriodSummary>;
  relaxationActive: boolean;
  targetMet: boolean;
  outcome: RelaxationOutcome;
  attemptsUsed: number;
  /** Signed flex of the last evaluated attempt (the base flex when not relaxed) */
  appliedFlex: number;
  standaloneCount: number;
  /** Late periods dropped because the next morning is cheaper */
  supersededCount: number;
  degenerate: boolean;
  stats: DayStats;
}

export type DayOutcome =
  | { status: 'ok'; result: DayPeriodResult }
  | { status: 'error'; error: Error };
