/**
 * CLINICAL TIME
 *
 * All timestamps are naive local ISO strings (yyyy-MM-ddTHH:mm:ss).
 * Arithmetic goes through date-fns; nothing here reads the current time.
 */

import {
  addDays,
  addHours,
  differenceInCalendarDays,
  differenceInMinutes,
  format,
  isValid,
  parseISO,
  set,
  startOfDay,
} from "date-fns";
import { Option } from "effect";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
export const DATE_FORMAT = "yyyy-MM-dd";

export const parseClinicalTimestamp = (value: string): Option.Option<Date> => {
  if (value.trim().length === 0) return Option.none();
  const parsed = parseISO(value);
  return isValid(parsed) ? Option.some(parsed) : Option.none();
};

export const isParseableTimestamp = (value: string): boolean =>
  Option.isSome(parseClinicalTimestamp(value));

export const formatClinicalTimestamp = (date: Date): string => format(date, TIMESTAMP_FORMAT);

/** Calendar date of a timestamp; unparseable input yields its first ten characters. */
export const dateKey = (value: string): string =>
  Option.match(parseClinicalTimestamp(value), {
    onNone: () => value.slice(0, 10),
    onSome: (date) => format(date, DATE_FORMAT),
  });

/** Milliseconds since epoch, or NaN when unparseable (sorts via compareTimestamps). */
const toMillis = (value: string): number =>
  Option.match(parseClinicalTimestamp(value), {
    onNone: () => Number.NaN,
    onSome: (date) => date.getTime(),
  });

/** Chronological comparator; unparseable timestamps sort last. */
export const compareTimestamps = (a: string, b: string): number => {
  const left = toMillis(a);
  const right = toMillis(b);
  if (Number.isNaN(left) && Number.isNaN(right)) return a.localeCompare(b);
  if (Number.isNaN(left)) return 1;
  if (Number.isNaN(right)) return -1;
  return left - right;
};

export const shiftDays = (date: Date, days: number): Date => addDays(date, days);

export const shiftHours = (date: Date, hours: number): Date => addHours(date, hours);

export const atHour = (date: Date, hour: number): Date =>
  set(date, { hours: hour, minutes: 0, seconds: 0, milliseconds: 0 });

export const atStartOfDay = (date: Date): Date => startOfDay(date);

/** Whole calendar days from a to b (b - a). */
export const calendarDaysBetween = (a: string, b: string): Option.Option<number> =>
  Option.zipWith(parseClinicalTimestamp(a), parseClinicalTimestamp(b), (left, right) =>
    differenceInCalendarDays(right, left)
  );

/** Absolute minutes between two timestamps. */
export const minutesApart = (a: string, b: string): Option.Option<number> =>
  Option.zipWith(parseClinicalTimestamp(a), parseClinicalTimestamp(b), (left, right) =>
    Math.abs(differenceInMinutes(right, left))
  );
