import { DateTime } from 'luxon';
import { DateRange, IsoDate } from '../types';
import { validateIsoDate } from './validation';

// Calendar dates carry no zone; UTC keeps day arithmetic free of DST shifts.
const CALENDAR_ZONE = 'utc';

export function parseIsoDate(value: IsoDate, name: string = 'date'): DateTime {
  return DateTime.fromISO(validateIsoDate(value, name), { zone: CALENDAR_ZONE });
}

export function formatIsoDate(value: DateTime): IsoDate {
  return value.toFormat('yyyy-MM-dd');
}

/**
 * Every calendar day of a range, ascending
 */
export function eachDay(range: DateRange): IsoDate[] {
  const days: IsoDate[] = [];
  const end = parseIsoDate(range.end, 'end');
  for (let day = parseIsoDate(range.start, 'start'); day <= end; day = day.plus({ days: 1 })) {
    days.push(formatIsoDate(day));
  }
  return days;
}

export function formatRange(range: DateRange): string {
  return range.start === range.end ? range.start : `${range.start}..${range.end}`;
}

/**
 * Today's calendar date in the given zone (local by default)
 */
export function today(now: () => Date = () => new Date(), zone: string = 'local'): IsoDate {
  return formatIsoDate(DateTime.fromJSDate(now(), { zone }));
}
