/**
 * Unit Tests for date range resolution
 */

import { describe, it, expect } from '@jest/globals';
import { rangeLength, resolveDateRange } from '../../src/reports/dateRange.js';
import { InvalidRangeError } from '../../src/errors.js';

// local noon, so the local calendar date is 2024-03-10 in any time zone
const NOW = new Date(2024, 2, 10, 12, 0, 0);

describe('resolveDateRange', () => {
  it('ends today and spans exactly `days` days', () => {
    for (const days of [1, 7, 30, 90, 366]) {
      const range = resolveDateRange({ days }, NOW);
      expect(range.endDate).toBe('2024-03-10');
      expect(rangeLength(range)).toBe(days);
    }
  });

  it('computes the start across a leap day', () => {
    expect(resolveDateRange({ days: 30 }, NOW)).toEqual({
      startDate: '2024-02-10',
      endDate: '2024-03-10',
    });
  });

  it('counts back from an explicit end', () => {
    expect(resolveDateRange({ days: 7, end: '2024-01-07' }, NOW)).toEqual({
      startDate: '2024-01-01',
      endDate: '2024-01-07',
    });
  });

  it('lets an explicit start win over days', () => {
    expect(resolveDateRange({ days: 7, start: '2024-01-01', end: '2024-01-10' }, NOW)).toEqual({
      startDate: '2024-01-01',
      endDate: '2024-01-10',
    });
  });

  it('ignores days entirely when a start is given', () => {
    expect(resolveDateRange({ days: -3, start: '2024-03-01' }, NOW)).toEqual({
      startDate: '2024-03-01',
      endDate: '2024-03-10',
    });
  });

  it('rejects non-positive or fractional days', () => {
    expect(() => resolveDateRange({ days: 0 }, NOW)).toThrow(InvalidRangeError);
    expect(() => resolveDateRange({ days: -5 }, NOW)).toThrow(
      '--days must be a positive integer, got -5'
    );
    expect(() => resolveDateRange({ days: 1.5 }, NOW)).toThrow(InvalidRangeError);
  });

  it('rejects day counts that run past the calendar', () => {
    expect(() => resolveDateRange({ days: 5_000_000 }, NOW)).toThrow(
      '--days 5000000 reaches before year 1'
    );
    expect(() => resolveDateRange({ days: 200_000_000 }, NOW)).toThrow(InvalidRangeError);
  });

  it('rejects an end before the start', () => {
    expect(() => resolveDateRange({ days: 7, start: '2024-02-01', end: '2024-01-31' }, NOW)).toThrow(
      'End date 2024-01-31 is before start date 2024-02-01'
    );
  });

  it('rejects malformed and impossible dates', () => {
    expect(() => resolveDateRange({ days: 7, start: '2024/01/01' }, NOW)).toThrow(
      'Invalid start date "2024/01/01": expected YYYY-MM-DD'
    );
    expect(() => resolveDateRange({ days: 7, end: '2023-02-29' }, NOW)).toThrow(InvalidRangeError);
    expect(() => resolveDateRange({ days: 7, end: 'today' }, NOW)).toThrow(InvalidRangeError);
  });
});
