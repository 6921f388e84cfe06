export * from './logic/periods/types';
export { DEFAULT_CRITERIA, DEFAULT_SMOOTHING_OPTIONS, PRICE_LEVEL_ORDINAL } from './logic/periods/constants';
export { normalizeCriteria } from './logic/periods/criteria';
export { groupIntervalsByDay, validateIntervalSeries } from './logic/periods/dayBuckets';
export { smoothOutliers } from './logic/periods/outlierSmoothing';
export { evaluateIntervalCriteria, scaleMinDistance } from './logic/periods/intervalCriteria';
export { applyLevelFilter } from './logic/periods/levelFilter';
export { findPeriodCandidates } from './logic/periods/periodBuilding';
export { mergeCandidates } from './logic/periods/periodMerging';
export { relaxDay, getRelaxedFlex } from './logic/periods/relaxation';
export { buildPeriodSummaries } from './logic/periods/periodStatistics';
export { calculatePeriods } from './logic/periods/calculatePeriods';
export type { CalculatePeriodsOptions } from './logic/periods/calculatePeriods';
export { InMemoryPeriodResultCache } from './logic/periods/resultCache';
export type { PeriodResultCache } from './logic/periods/resultCache';
export type { PriceDataEntry, PriceDataSource } from './logic/prices/priceSource';
export { convertPriceEntries } from './logic/prices/priceConversion';
export { TibberPriceSource, parseTibberPriceInfo } from './service/sources/tibber';
export { ConfigurationError, InputError, PeriodEngineError, extractErrorMessage } from './logic/utils/errorUtils';
export type { Logger } from './logic/utils/logger';
export { consoleLogger, silentLogger } from './logic/utils/logger';
export { PeriodManager, collectPeriods } from './service/periodManager';
export type { PeriodSnapshot, PeriodManagerOptions } from './service/periodManager';
export { createPriceSource, createSettingsStore, readPeriodCriteria } from './service/settings';
export type { SettingsStore } from './service/settings';
