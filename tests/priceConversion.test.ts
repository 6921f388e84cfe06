/**
 * Tests for converting provider entries into intervals
 */

import fs from 'fs';
import path from 'path';

import { convertPriceEntries } from '../logic/prices/priceConversion';
import { parseTibberPriceInfo } from '../service/sources/tibber';
import { InputError } from '../logic/utils/errorUtils';

const QUARTER_HOUR = 15 * 60 * 1000;

describe('convertPriceEntries', () => {
  test('sorts entries and derives interval ends', () => {
    const intervals = convertPriceEntries([
      { date: '2025-03-10T00:15:00Z', price: 0.21 },
      { date: '2025-03-10T00:00:00Z', price: 0.2 },
    ]);

    const start = Date.UTC(2025, 2, 10);
    expect(intervals).toEqual([
      { start, end: start + QUARTER_HOUR, price: 0.2, level: 'NORMAL' },
      { start: start + QUARTER_HOUR, end: start + 2 * QUARTER_HOUR, price: 0.21, level: 'NORMAL' },
    ]);
  });

  test('keeps the last entry of a duplicated start', () => {
    const intervals = convertPriceEntries([
      { date: '2025-03-10T00:00:00Z', price: 0.2 },
      { date: '2025-03-10T01:00:00+01:00', price: 0.25, level: 'EXPENSIVE' },
    ]);

    expect(intervals).toHaveLength(1);
    expect(intervals[0]).toMatchObject({ price: 0.25, level: 'EXPENSIVE' });
  });

  test('copies provider levels and ratings', () => {
    const [interval] = convertPriceEntries(
      [{ date: '2025-03-10T00:00:00Z', price: 0.2, level: 'CHEAP', rating: 'LOW' }],
      60,
    );

    expect(interval).toEqual({
      start: Date.UTC(2025, 2, 10),
      end: Date.UTC(2025, 2, 10, 1),
      price: 0.2,
      level: 'CHEAP',
      rating: 'LOW',
    });
  });

  test('rejects unparseable dates', () => {
    expect(() => convertPriceEntries([{ date: 'yesterday', price: 0.2 }])).toThrow(InputError);
    expect(() => convertPriceEntries([{ date: 'yesterday', price: 0.2 }])).toThrow('Invalid price entry date "yesterday"');
  });

  test('converts a Tibber response', () => {
    const dataPath = path.join(__dirname, 'assets', 'tibber-data.json');
    const entries = parseTibberPriceInfo(JSON.parse(fs.readFileSync(dataPath, 'utf8')));

    const intervals = convertPriceEntries(entries);

    expect(intervals).toHaveLength(5);
    // 00:00 in Berlin winter time
    expect(intervals[0].start).toBe(Date.UTC(2025, 2, 9, 23));
    expect(intervals[0].level).toBe('NORMAL');
    expect(intervals[4].level).toBe('CHEAP');
  });
});
