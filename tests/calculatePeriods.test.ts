/**
 * Tests for the period calculation entry point
 */

import { calculatePeriods } from '../logic/periods/calculatePeriods';
import type { DayOutcome, DayPeriodResult, PeriodCriteria, PriceInterval, PriceLevel } from '../logic/periods/types';
import { MILLISECONDS_PER_DAY } from '../logic/utils/dateUtils';
import { ConfigurationError, InputError } from '../logic/utils/errorUtils';
import {
  at,
  bestCriteria,
  buildIntervals,
  DAY_START,
  FLAT_DAY_PRICES,
  peakCriteria,
  SCENARIO_A_PRICES,
  SPIKE_DAY_PRICES,
} from './periodTestUtils';

const NEXT_DAY_START = DAY_START + MILLISECONDS_PER_DAY;

function createLogger() {
  return { log: jest.fn(), error: jest.fn() };
}

function getResult(outcomes: Map<string, DayOutcome>, date: string): DayPeriodResult {
  const outcome = outcomes.get(date);
  if (outcome?.status !== 'ok') {
    throw new Error(`No result for ${date}`);
  }
  return outcome.result;
}

function ranges(result: DayPeriodResult): Array<[number, number]> {
  return result.periods.map((p) => [p.start, p.end]);
}

function run(intervals: Array<PriceInterval>, criteria: PeriodCriteria): DayPeriodResult {
  return getResult(calculatePeriods(intervals, criteria, { timezone: 'UTC' }), '2025-03-10');
}

describe('calculatePeriods', () => {
  describe('single day', () => {
    test('finds the cheap night and evening', () => {
      const result = run(buildIntervals(SCENARIO_A_PRICES), bestCriteria());

      expect(ranges(result)).toEqual([[at(0), at(3)], [at(21), at(24)]]);
      expect(result).toMatchObject({
        date: '2025-03-10',
        direction: 'best',
        outcome: 'baseline',
        targetMet: true,
        relaxationActive: false,
        standaloneCount: 2,
        degenerate: false,
      });
      expect(result.stats).toEqual({ min: 18, max: 35, avg: 632 / 24 });
    });

    test('keeps baseline periods when relaxation cannot reach the target', () => {
      const result = run(
        buildIntervals(SCENARIO_A_PRICES),
        bestCriteria({ enableRelaxation: true, minPeriods: 3, maxRelaxationAttempts: 3 }),
      );

      expect(ranges(result)).toEqual([[at(0), at(3)], [at(19), at(24)]]);
      expect(result.periods.map((p) => p.relaxationActive)).toEqual([false, false]);
      expect(result.periods.map((p) => p.extendedByRelaxation)).toEqual([false, true]);
      expect(result.periods.map((p) => p.relaxationThresholdAppliedPct)).toEqual([15, 24]);
      expect(result).toMatchObject({
        outcome: 'exhausted',
        targetMet: false,
        relaxationActive: true,
        attemptsUsed: 3,
        appliedFlex: 0.24,
      });
    });

    test('finds nothing on a flat day without relaxation', () => {
      const result = run(buildIntervals(FLAT_DAY_PRICES), bestCriteria());

      expect(result.periods).toEqual([]);
      expect(result).toMatchObject({ outcome: 'baseline', targetMet: false, relaxationActive: false });
    });

    test('reports exhaustion on a flat day with relaxation', () => {
      const result = run(
        buildIntervals(FLAT_DAY_PRICES),
        bestCriteria({ enableRelaxation: true, maxRelaxationAttempts: 12 }),
      );

      expect(result.periods).toEqual([]);
      expect(result).toMatchObject({ outcome: 'exhausted', attemptsUsed: 12, appliedFlex: 0.5 });
    });

    test('marks periods found by relaxation', () => {
      const prices = Array.from({ length: 24 }, (_, i) => (i >= 10 && i <= 12 ? 20 : 20.2));

      const result = run(buildIntervals(prices), bestCriteria({ enableRelaxation: true, maxRelaxationAttempts: 12 }));

      expect(ranges(result)).toEqual([[at(10), at(13)]]);
      expect(result.periods[0]).toMatchObject({
        relaxationActive: true,
        relaxationLevel: 'flex=45.0%',
        relaxationThresholdOriginalPct: 15,
        relaxationThresholdAppliedPct: 45,
      });
      expect(result.outcome).toBe('relaxed');
    });

    test('keeps a smoothed spike inside the period', () => {
      const result = run(buildIntervals(SPIKE_DAY_PRICES), bestCriteria());

      expect(ranges(result)).toEqual([[at(3), at(10)]]);
      expect(result.periods[0]).toMatchObject({ smoothedCount: 1, priceMax: 35, intervalCount: 7 });
    });

    test('does not modify the input and returns the same result twice', () => {
      const intervals = buildIntervals(SPIKE_DAY_PRICES);
      const copy = intervals.map((interval) => ({ ...interval }));

      const first = calculatePeriods(intervals, bestCriteria(), { timezone: 'UTC' });
      const second = calculatePeriods(intervals, bestCriteria(), { timezone: 'UTC' });

      expect(intervals).toEqual(copy);
      expect(second).toEqual(first);
    });

    test('never finds fewer periods with relaxation enabled', () => {
      const intervals = buildIntervals(SCENARIO_A_PRICES);
      const plain = run(intervals, bestCriteria({ minPeriods: 4 }));
      const relaxed = run(intervals, bestCriteria({ minPeriods: 4, enableRelaxation: true }));

      expect(relaxed.periods.length).toBeGreaterThanOrEqual(plain.periods.length);
    });

    test('logs the periods of a day', () => {
      const logger = createLogger();

      calculatePeriods(buildIntervals(SCENARIO_A_PRICES), bestCriteria(), { timezone: 'UTC', logger });

      expect(logger.log).toHaveBeenCalledWith('[PERIODS] best 2025-03-10: 2 periods (baseline): 00:00-03:00, 21:00-00:00');
    });

    test('logs days with equal prices', () => {
      const logger = createLogger();

      const outcomes = calculatePeriods(
        buildIntervals(Array.from({ length: 24 }, () => 20)),
        bestCriteria(),
        { timezone: 'UTC', logger },
      );

      expect(getResult(outcomes, '2025-03-10')).toMatchObject({ degenerate: true, periods: [] });
      expect(logger.log).toHaveBeenCalledWith(
        '[PERIODS] best 2025-03-10: all prices are equal (20), no distinct periods expected',
      );
      expect(logger.log).toHaveBeenCalledWith('[PERIODS] best 2025-03-10: 0 periods (baseline)');
    });
  });

  describe('several days', () => {
    const nextDayPrices = [17, 17.5, 18, ...Array.from({ length: 18 }, () => 30), 17, 17, 17];

    test('continues an evening period past midnight and blocks its intervals', () => {
      const intervals = [
        ...buildIntervals(SCENARIO_A_PRICES),
        ...buildIntervals(nextDayPrices, { start: NEXT_DAY_START }),
      ];

      const outcomes = calculatePeriods(intervals, bestCriteria(), { timezone: 'UTC' });

      expect([...outcomes.keys()]).toEqual(['2025-03-10', '2025-03-11']);
      expect(ranges(getResult(outcomes, '2025-03-10'))).toEqual([[at(0), at(3)], [at(21), at(27)]]);
      expect(getResult(outcomes, '2025-03-10').periods[1].crossDayIntervals).toBe(3);
      expect(ranges(getResult(outcomes, '2025-03-11'))).toEqual([[at(45), at(48)]]);
    });

    test('ends a period continuing past midnight at 08:00', () => {
      const firstDay = Array.from({ length: 24 }, (_, i) => (i === 23 ? 20 : 30));
      const secondDay = Array.from({ length: 24 }, (_, i) => (i >= 10 && i <= 12 ? 10 : 19));

      const outcomes = calculatePeriods(
        [...buildIntervals(firstDay), ...buildIntervals(secondDay, { start: NEXT_DAY_START })],
        bestCriteria(),
        { timezone: 'UTC' },
      );

      const firstResult = getResult(outcomes, '2025-03-10');
      expect(ranges(firstResult)).toEqual([[at(23), at(32)]]);
      expect(firstResult.periods[0]).toMatchObject({ durationMinutes: 540, crossDayIntervals: 8 });
      expect(ranges(getResult(outcomes, '2025-03-11'))).toEqual([[at(34), at(37)]]);
    });

    test('does not continue a period that starts before 20:00', () => {
      const firstDay = Array.from({ length: 24 }, (_, i) => (i >= 19 ? 20 : 30));
      const secondDay = Array.from({ length: 24 }, (_, i) => (i < 12 ? 19 : 30));

      const outcomes = calculatePeriods(
        [...buildIntervals(firstDay), ...buildIntervals(secondDay, { start: NEXT_DAY_START })],
        bestCriteria(),
        { timezone: 'UTC' },
      );

      expect(ranges(getResult(outcomes, '2025-03-10'))).toEqual([[at(19), at(24)]]);
      expect(ranges(getResult(outcomes, '2025-03-11'))).toEqual([[at(24), at(36)]]);
    });

    test('drops a late period when the next morning is clearly cheaper', () => {
      const nextMorning = [30, 30, 30, 30, 15, 15, 15, ...Array.from({ length: 17 }, () => 30)];
      const logger = createLogger();

      const outcomes = calculatePeriods(
        [...buildIntervals(SCENARIO_A_PRICES), ...buildIntervals(nextMorning, { start: NEXT_DAY_START })],
        bestCriteria(),
        { timezone: 'UTC', logger },
      );

      const today = getResult(outcomes, '2025-03-10');
      expect(ranges(today)).toEqual([[at(0), at(3)]]);
      expect(today).toMatchObject({ supersededCount: 1, standaloneCount: 1, targetMet: true });
      expect(today.periods[0]).toMatchObject({ position: 1, total: 1, remaining: 0 });
      expect(ranges(getResult(outcomes, '2025-03-11'))).toEqual([[at(28), at(31)]]);
      expect(logger.log).toHaveBeenCalledWith(
        '[PERIODS] best 2025-03-10: 21:00-00:00 superseded by 2025-03-11 04:00-07:00 (21.1% cheaper)',
      );
    });

    test('keeps a late period when the next morning is only slightly cheaper', () => {
      const nextMorning = [30, 30, 30, 30, 18, 18, 18, ...Array.from({ length: 17 }, () => 30)];

      const outcomes = calculatePeriods(
        [...buildIntervals(SCENARIO_A_PRICES), ...buildIntervals(nextMorning, { start: NEXT_DAY_START })],
        bestCriteria(),
        { timezone: 'UTC' },
      );

      // (19 - 18) / 19 = 5.3 %
      expect(ranges(getResult(outcomes, '2025-03-10'))).toEqual([[at(0), at(3)], [at(21), at(24)]]);
      expect(getResult(outcomes, '2025-03-10').supersededCount).toBe(0);
    });

    test('never drops late peak periods', () => {
      const firstDay = Array.from({ length: 24 }, (_, i) => (i >= 21 ? 40 : 20));
      const secondDay = Array.from({ length: 24 }, (_, i) => (i >= 4 && i <= 6 ? 30 : 20));

      const outcomes = calculatePeriods(
        [...buildIntervals(firstDay), ...buildIntervals(secondDay, { start: NEXT_DAY_START })],
        peakCriteria(),
        { timezone: 'UTC' },
      );

      expect(ranges(getResult(outcomes, '2025-03-10'))).toEqual([[at(21), at(24)]]);
      expect(getResult(outcomes, '2025-03-10').supersededCount).toBe(0);
      expect(ranges(getResult(outcomes, '2025-03-11'))).toEqual([[at(28), at(31)]]);
    });

    test('keeps level gaps within limits over relaxed days', () => {
      const prices = Array.from({ length: 24 }, (_, i) => {
        if (i >= 4 && i <= 15) {
          return 10;
        }
        return i === 19 || i === 20 ? 12 : 30;
      });
      const levels = prices.map((price, i): PriceLevel => (price < 30 && i !== 7 && i !== 12 ? 'CHEAP' : 'NORMAL'));
      const intervals = [
        ...buildIntervals(prices, { levels }),
        ...buildIntervals(prices, { levels, start: NEXT_DAY_START }),
      ];
      const criteria = bestCriteria({ levelFilter: 'CHEAP', gapTolerance: 2, enableRelaxation: true, minPeriods: 2 });

      const outcomes = calculatePeriods(intervals, criteria, { timezone: 'UTC' });

      const days = [getResult(outcomes, '2025-03-10'), getResult(outcomes, '2025-03-11')];
      expect(ranges(days[0])).toEqual([[at(4), at(16)], [at(19), at(21)]]);
      expect(ranges(days[1])).toEqual([[at(28), at(40)], [at(43), at(45)]]);
      expect(days[0].periods.map((p) => [p.intervalCount, p.levelGapCount])).toEqual([[12, 2], [2, 0]]);
      expect(days[0].periods[1]).toMatchObject({ relaxationActive: true, relaxationLevel: 'flex=21.0%' });
      expect(days.map((day) => day.outcome)).toEqual(['relaxed', 'relaxed']);

      const periods = days.flatMap((day) => day.periods);
      for (const period of periods) {
        expect(period.levelGapCount).toBeLessThanOrEqual(Math.min(2, Math.ceil(0.25 * period.intervalCount)));
      }
      for (let i = 1; i < periods.length; i++) {
        expect(periods[i].start).toBeGreaterThanOrEqual(periods[i - 1].end);
      }
    });

    test('only fails the day with invalid data', () => {
      const nextDay = buildIntervals(nextDayPrices, { start: NEXT_DAY_START });
      nextDay.splice(5, 1);
      const logger = createLogger();

      const outcomes = calculatePeriods(
        [...buildIntervals(SCENARIO_A_PRICES), ...nextDay],
        bestCriteria(),
        { timezone: 'UTC', logger },
      );

      expect(ranges(getResult(outcomes, '2025-03-10'))).toEqual([[at(0), at(3)], [at(21), at(24)]]);
      const failed = outcomes.get('2025-03-11');
      expect(failed?.status).toBe('error');
      expect(failed?.status === 'error' && failed.error).toBeInstanceOf(InputError);
      expect(logger.error).toHaveBeenCalledWith(
        '[PERIODS] best 2025-03-11: skipped:',
        'Interval series is not contiguous at 2025-03-11T06:00:00.000Z',
      );
    });

    test('groups days by the configured time zone', () => {
      // 23:00 UTC on March 9th is midnight in Berlin
      const intervals = buildIntervals(SCENARIO_A_PRICES, { start: at(-1) });

      const outcomes = calculatePeriods(intervals, bestCriteria(), { timezone: 'Europe/Berlin' });

      expect([...outcomes.keys()]).toEqual(['2025-03-10']);
    });
  });

  describe('configuration', () => {
    test('rejects an unknown time zone', () => {
      expect(() => calculatePeriods(buildIntervals(SCENARIO_A_PRICES), bestCriteria(), { timezone: 'Mars/Olympus' }))
        .toThrow(ConfigurationError);
    });

    test('fails a day that cannot hold the minimum period length', () => {
      const outcomes = calculatePeriods(
        buildIntervals(SCENARIO_A_PRICES),
        bestCriteria({ minPeriodMinutes: 1500 }),
        { timezone: 'UTC' },
      );

      const outcome = outcomes.get('2025-03-10');
      expect(outcome?.status === 'error' && outcome.error.message)
        .toBe('Invalid minPeriodMinutes: 1500 minutes do not fit into 2025-03-10');
    });
  });
});
