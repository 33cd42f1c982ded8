/**
 * Date range resolution for --days / --start / --end
 */

import { differenceInCalendarDays, format, isValid, parse, subDays } from 'date-fns';
import { InvalidRangeError } from '../errors.js';

export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface DateRangeInput {
  days: number;
  start?: string;
  end?: string;
}

const DATE_FORMAT = 'yyyy-MM-dd';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function parseDate(value: string, label: 'start' | 'end'): Date {
  const date = parse(value, DATE_FORMAT, new Date(0));
  // round trip rejects dates such as 2024-02-30
  if (!ISO_DATE.test(value) || !isValid(date) || format(date, DATE_FORMAT) !== value) {
    throw new InvalidRangeError(`Invalid ${label} date "${value}": expected YYYY-MM-DD`);
  }
  return date;
}

/**
 * Resolve an inclusive calendar range. An explicit start wins over `days`;
 * otherwise the range covers exactly `days` days ending on `end`, which
 * defaults to the local date of `now`.
 */
export function resolveDateRange(input: DateRangeInput, now: Date = new Date()): DateRange {
  const endDate = input.end !== undefined ? parseDate(input.end, 'end') : now;
  const endText = format(endDate, DATE_FORMAT);

  let startText: string;
  if (input.start !== undefined) {
    startText = format(parseDate(input.start, 'start'), DATE_FORMAT);
  } else {
    if (!Number.isInteger(input.days) || input.days <= 0) {
      throw new InvalidRangeError(`--days must be a positive integer, got ${input.days}`);
    }
    const startDate = subDays(endDate, input.days - 1);
    if (!isValid(startDate) || startDate.getFullYear() < 1) {
      throw new InvalidRangeError(`--days ${input.days} reaches before year 1`);
    }
    startText = format(startDate, DATE_FORMAT);
  }

  // same-width ISO dates compare correctly as strings
  if (endText < startText) {
    throw new InvalidRangeError(`End date ${endText} is before start date ${startText}`);
  }

  return { startDate: startText, endDate: endText };
}

/** Number of calendar days in an inclusive range. */
export function rangeLength(range: DateRange): number {
  const start = parse(range.startDate, DATE_FORMAT, new Date(0));
  const end = parse(range.endDate, DATE_FORMAT, new Date(0));
  return differenceInCalendarDays(end, start) + 1;
}
