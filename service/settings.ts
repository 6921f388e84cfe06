import type { LevelFilter, PeriodCriteria, PeriodDirection } from '../logic/periods/types';
import { DEFAULT_CRITERIA } from '../logic/periods/constants';
import { isLevelFilter } from '../logic/periods/criteria';
import type { PriceDataSource } from '../logic/prices/priceSource';
import { TibberPriceSource } from './sources/tibber';
import { isValidTimezone } from '../logic/utils/dateUtils';
import { ConfigurationError } from '../logic/utils/errorUtils';
import type { Logger } from '../logic/utils/logger';

/**
 * Settings helper functions
 * Read user settings with typed defaults and turn them into period criteria.
 */

export interface SettingsStore {
  get(key: string): unknown;
}

/**
 * Settings store backed by a plain object
 * @param values - Setting values by key
 * @returns Read-only settings store
 */
export function createSettingsStore(values: Record<string, unknown>): SettingsStore {
  const snapshot = new Map(Object.entries(values));
  return { get: (key) => snapshot.get(key) };
}

const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';

/**
 * Get setting value with default fallback
 * @param settings - Settings store
 * @param key - Setting key to retrieve
 * @param defaultValue - Default value if setting is not found or has the wrong type
 * @param isValid - Type guard for the setting value
 * @returns Setting value or default value
 */
export function getSettingWithDefault<T>(
  settings: SettingsStore,
  key: string,
  defaultValue: T,
  isValid: (value: unknown) => value is T,
): T {
  const value = settings.get(key);
  return isValid(value) ? value : defaultValue;
}

/**
 * Setting keys per direction.
 * Flex and distance are stored in percent, lengths in minutes, levels in lower case.
 */
export const SETTING_KEYS: Record<PeriodDirection, Record<Exclude<keyof PeriodCriteria, 'direction'>, string>> = {
  best: {
    flex: 'best_price_flex',
    minDistanceFromAvg: 'best_price_min_distance_from_avg',
    minPeriodMinutes: 'best_price_min_period_length',
    levelFilter: 'best_price_max_level',
    gapTolerance: 'best_price_max_level_gap_count',
    enableRelaxation: 'enable_min_periods_best',
    minPeriods: 'min_periods_best',
    maxRelaxationAttempts: 'relaxation_attempts_best',
  },
  peak: {
    flex: 'peak_price_flex',
    minDistanceFromAvg: 'peak_price_min_distance_from_avg',
    minPeriodMinutes: 'peak_price_min_period_length',
    levelFilter: 'peak_price_min_level',
    gapTolerance: 'peak_price_max_level_gap_count',
    enableRelaxation: 'enable_min_periods_peak',
    minPeriods: 'min_periods_peak',
    maxRelaxationAttempts: 'relaxation_attempts_peak',
  },
};

/**
 * Parse a level setting ("cheap", "VERY_EXPENSIVE", "any")
 * @param value - Raw setting value
 * @returns Level filter, or undefined when the value is not a known level
 */
export function parseLevelFilter(value: unknown): LevelFilter | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase() === 'any' ? 'any' : value.trim().toUpperCase();
  return isLevelFilter(normalized) ? normalized : undefined;
}

/**
 * Build the criteria of one direction from settings
 * @param settings - Settings store
 * @param direction - Best or peak
 * @returns Criteria with defaults for missing values (flex converted from percent)
 */
export function readPeriodCriteria(settings: SettingsStore, direction: PeriodDirection): PeriodCriteria {
  const keys = SETTING_KEYS[direction];
  const defaults = DEFAULT_CRITERIA[direction];
  const flexPercent = getSettingWithDefault<number | null>(settings, keys.flex, null, isNumber);

  return {
    direction,
    flex: flexPercent === null ? defaults.flex : flexPercent / 100,
    minDistanceFromAvg: getSettingWithDefault(settings, keys.minDistanceFromAvg, defaults.minDistanceFromAvg, isNumber),
    minPeriodMinutes: getSettingWithDefault(settings, keys.minPeriodMinutes, defaults.minPeriodMinutes, isNumber),
    levelFilter: parseLevelFilter(settings.get(keys.levelFilter)) ?? defaults.levelFilter,
    gapTolerance: getSettingWithDefault(settings, keys.gapTolerance, defaults.gapTolerance, isNumber),
    enableRelaxation: getSettingWithDefault(settings, keys.enableRelaxation, defaults.enableRelaxation, isBoolean),
    minPeriods: getSettingWithDefault(settings, keys.minPeriods, defaults.minPeriods, isNumber),
    maxRelaxationAttempts: getSettingWithDefault(
      settings,
      keys.maxRelaxationAttempts,
      defaults.maxRelaxationAttempts,
      isNumber,
    ),
  };
}

/**
 * Get the time zone used for calendar days
 * @param settings - Settings store
 * @param logger - Logger for fallback messages
 * @returns Configured zone, else the system zone, else UTC
 */
export function getTimezone(settings: SettingsStore, logger: Logger): string {
  const configured = getSettingWithDefault(settings, 'price_timezone', '', isString);
  if (configured !== '') {
    if (isValidTimezone(configured)) {
      return configured;
    }
    logger.log(`[TIMEZONE] Unknown time zone "${configured}", using system default`);
  }
  // Fallback to system timezone
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

/**
 * Create the configured price data source
 * @param settings - Settings store
 * @returns Tibber source using the configured token
 * @throws ConfigurationError when no token is configured
 */
export function createPriceSource(settings: SettingsStore): PriceDataSource {
  const token = getSettingWithDefault(settings, 'tibber_token', '', isString).trim();
  if (token === '') {
    throw new ConfigurationError('tibber_token', 'no Tibber access token configured');
  }
  return new TibberPriceSource(token);
}
