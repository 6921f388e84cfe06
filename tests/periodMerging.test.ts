/**
 * Tests for merging relaxation candidates into the accumulated periods
 */

import { smoothOutliers } from '../logic/periods/outlierSmoothing';
import { mergeCandidates } from '../logic/periods/periodMerging';
import type { MergeContext } from '../logic/periods/periodMerging';
import type { PeriodCandidate, Provenance, RelaxedProvenance } from '../logic/periods/types';
import { buildIntervals, SPIKE_DAY_PRICES } from './periodTestUtils';

const intervals = smoothOutliers(buildIntervals(SPIKE_DAY_PRICES));
const context: MergeContext = {
  intervals,
  gapTolerance: 1,
  intervalMinutes: 60,
  dayLength: intervals.length,
  extendableFrom: intervals.length,
};

const BASELINE: Provenance = { kind: 'baseline' };
const relaxed = (attempt: number): RelaxedProvenance => ({ kind: 'relaxed', attempt, flex: 0.15 + attempt * 0.03, levelFilter: 'any' });

function candidate(
  startIndex: number,
  endIndex: number,
  provenance: Provenance = BASELINE,
  gapIndices: Array<number> = [],
): PeriodCandidate {
  return {
    start: intervals[startIndex].start,
    end: intervals[endIndex].end,
    startIndex,
    endIndex,
    provenance,
    smoothedCount: 0,
    gapCount: gapIndices.length,
    gapIndices,
  };
}

function bounds(candidates: Array<PeriodCandidate>): Array<[number, number]> {
  return candidates.map((c) => [c.startIndex, c.endIndex]);
}

describe('mergeCandidates', () => {
  test('ignores candidates with identical bounds', () => {
    const existing = [candidate(0, 2)];
    const result = mergeCandidates(existing, [candidate(0, 2, relaxed(1))], context);

    expect(result).toHaveLength(1);
    expect(result[0].provenance).toEqual(BASELINE);
  });

  test('adds separate candidates as standalone periods in start order', () => {
    const result = mergeCandidates([candidate(10, 12)], [candidate(0, 2, relaxed(1))], context);
    expect(bounds(result)).toEqual([[0, 2], [10, 12]]);
    expect(result[0].provenance).toEqual(relaxed(1));
  });

  test('extends a baseline period in place', () => {
    const result = mergeCandidates([candidate(14, 16)], [candidate(13, 18, relaxed(2))], context);

    expect(bounds(result)).toEqual([[13, 18]]);
    expect(result[0].provenance).toEqual(BASELINE);
    expect(result[0].extendedBy).toEqual(relaxed(2));
    expect(result[0].start).toBe(intervals[13].start);
    expect(result[0].end).toBe(intervals[18].end);
  });

  test('extends a period that is only touched', () => {
    const result = mergeCandidates([candidate(14, 16)], [candidate(17, 18, relaxed(1))], context);
    expect(bounds(result)).toEqual([[14, 18]]);
  });

  test('ignores candidates inside an existing period', () => {
    const existing = [candidate(12, 20)];
    const result = mergeCandidates(existing, [candidate(14, 16, relaxed(1))], context);
    expect(result[0]).toBe(existing[0]);
  });

  test('never bridges two periods', () => {
    const result = mergeCandidates([candidate(0, 2), candidate(6, 8)], [candidate(2, 6, relaxed(1))], context);
    expect(bounds(result)).toEqual([[0, 2], [6, 8]]);
  });

  test('keeps the earlier provenance when a relaxed period is replaced', () => {
    const result = mergeCandidates([candidate(14, 15, relaxed(1))], [candidate(13, 17, relaxed(2))], context);

    expect(bounds(result)).toEqual([[13, 17]]);
    expect(result[0].provenance).toEqual(relaxed(1));
    expect(result[0].extendedBy).toEqual(relaxed(2));
  });

  test('keeps the earlier extension when a baseline candidate widens a period', () => {
    const extended = { ...candidate(14, 16), extendedBy: relaxed(1) };
    const result = mergeCandidates([extended], [candidate(16, 18)], context);

    expect(bounds(result)).toEqual([[14, 18]]);
    expect(result[0].extendedBy).toEqual(relaxed(1));
  });

  test('leaves extendedBy unset on untouched periods', () => {
    const result = mergeCandidates([candidate(10, 12)], [candidate(0, 2, relaxed(1))], context);
    expect(result.map((c) => c.extendedBy)).toEqual([undefined, undefined]);
  });

  test('drops a union whose prices vary too much', () => {
    const steps = smoothOutliers(buildIntervals([10, 10, 10, 30, 30, 30]));
    const stepContext: MergeContext = { ...context, intervals: steps, dayLength: 6, extendableFrom: 6 };
    const existing: PeriodCandidate = { ...candidate(0, 2), start: steps[0].start, end: steps[2].end };
    const incoming: PeriodCandidate = { ...candidate(3, 5, relaxed(1)), start: steps[3].start, end: steps[5].end };

    // 10, 10, 10, 30, 30, 30: CV 54.8 %
    expect(mergeCandidates([existing], [incoming], stepContext)).toEqual([existing]);
  });

  test('only unites across midnight from a late start', () => {
    const flat = smoothOutliers(buildIntervals([20, 20, 20, 20, 20, 20]));
    const crossContext: MergeContext = { ...context, intervals: flat, dayLength: 4, extendableFrom: 2 };
    const span = (startIndex: number, endIndex: number, provenance: Provenance = BASELINE): PeriodCandidate => ({
      ...candidate(startIndex, endIndex, provenance),
      start: flat[startIndex].start,
      end: flat[endIndex].end,
    });

    expect(bounds(mergeCandidates([span(2, 4)], [span(1, 2, relaxed(1))], crossContext))).toEqual([[2, 4]]);
    expect(bounds(mergeCandidates([span(2, 4)], [span(4, 5, relaxed(1))], crossContext))).toEqual([[2, 5]]);
    expect(bounds(mergeCandidates([span(0, 1)], [span(1, 4, relaxed(1))], crossContext))).toEqual([[0, 1]]);
  });

  test('drops a union that would exceed the gap limit', () => {
    const existing = [candidate(12, 15, BASELINE, [13])];
    const result = mergeCandidates(existing, [candidate(16, 19, relaxed(1), [18])], context);

    expect(result).toEqual(existing);
  });

  test('carries gaps of both parts into the union', () => {
    const wide: MergeContext = { ...context, gapTolerance: 2 };
    const result = mergeCandidates([candidate(12, 15, BASELINE, [13])], [candidate(16, 19, relaxed(1), [18])], wide);

    expect(bounds(result)).toEqual([[12, 19]]);
    expect(result[0].gapIndices).toEqual([13, 18]);
    expect(result[0].gapCount).toBe(2);
  });

  test('recounts smoothed intervals of the union', () => {
    const result = mergeCandidates([candidate(3, 5)], [candidate(5, 9, relaxed(1))], context);

    expect(bounds(result)).toEqual([[3, 9]]);
    expect(result[0].smoothedCount).toBe(1);
  });

  test('does not modify the accumulated list', () => {
    const existing = [candidate(0, 2)];
    mergeCandidates(existing, [candidate(10, 12, relaxed(1))], context);
    expect(existing).toHaveLength(1);
  });
});
