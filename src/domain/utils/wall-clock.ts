import * as moment from 'moment';

import { BookingError, BookingErrors } from '../errors/booking-error';
import { err, ok, Result } from '../model/result';

export const DATE_FORMAT = 'YYYY-MM-DD';
export const TIME_FORMAT = 'HH:mm';
const DATE_TIME_FORMAT = `${DATE_FORMAT} ${TIME_FORMAT}`;

/** Half-open `[start, end)` interval in minutes since midnight */
export interface Interval {
  start: number;
  end: number;
}

// moment accepts "24:00" in strict mode and rolls it over to the next day,
// so a value only counts as parsed when it formats back to itself.
function strictParse(value: string, format: string): moment.Moment | null {
  const parsed = moment(value, format, true);
  return parsed.isValid() && parsed.format(format) === value ? parsed : null;
}

export function parseDate(
  value: string,
  field = 'date',
): Result<string, BookingError> {
  const parsed = strictParse(value, DATE_FORMAT);
  return parsed
    ? ok(parsed.format(DATE_FORMAT))
    : err(BookingErrors.invalidFormat(field, value, DATE_FORMAT));
}

export function parseTime(
  value: string,
  field = 'time',
): Result<number, BookingError> {
  const parsed = strictParse(value, TIME_FORMAT);
  return parsed
    ? ok(parsed.hours() * 60 + parsed.minutes())
    : err(BookingErrors.invalidFormat(field, value, TIME_FORMAT));
}

/**
 * For times that were validated upstream (court catalog, stored reservations).
 */
export function toMinutes(value: string): number {
  const parsed = parseTime(value);
  if (!parsed.ok) {
    throw new Error(parsed.error.message);
  }
  return parsed.value;
}

// Plain arithmetic: moment would shift the result on DST transition days.
export function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

export function toDateString(instant: Date): string {
  return moment(instant).format(DATE_FORMAT);
}

export function minutesOfDay(instant: Date): number {
  const m = moment(instant);
  return m.hours() * 60 + m.minutes();
}

export function startOf(date: string, time: string): moment.Moment {
  return moment(`${date} ${time}`, DATE_TIME_FORMAT, true);
}

export function addDays(date: string, days: number): string {
  return moment(date, DATE_FORMAT, true).add(days, 'days').format(DATE_FORMAT);
}
