import { DateTime } from 'luxon';

/**
 * Zone used when none is configured: the wall clock of the host running the
 * portal, which is how the sign-up sheet's dates and times are written.
 */
export const DEFAULT_TIMEZONE = 'local';

const FORMAT_LOCALE = 'en-US';

export type LocalDate = { year: number; month: number; day: number };
export type LocalTime = { hour: number; minute: number; second: number };

const DATE_FORMATS = ['yyyy-MM-dd', 'M/d/yyyy', 'M/d/yy'];
const TIME_FORMATS = ['H:mm', 'H:mm:ss', 'h:mm a', 'h:mm:ss a', 'h a'];

/**
 * Parses a calendar date typed as text (YYYY-MM-DD or M/D/YYYY)
 */
export function parseDateKey(input: string): LocalDate | null {
  const text = input.trim();
  if (!text) return null;
  for (const format of DATE_FORMATS) {
    const dt = DateTime.fromFormat(text, format, { locale: FORMAT_LOCALE });
    if (dt.isValid) return { year: dt.year, month: dt.month, day: dt.day };
  }
  return null;
}

/**
 * Parses a time of day typed as text (24h "14:30" or 12h "2:30 PM")
 */
export function parseTimeOfDay(input: string): LocalTime | null {
  const text = input.trim().toUpperCase();
  if (!text) return null;
  for (const format of TIME_FORMATS) {
    const dt = DateTime.fromFormat(text, format, { locale: FORMAT_LOCALE });
    if (dt.isValid) return { hour: dt.hour, minute: dt.minute, second: dt.second };
  }
  return null;
}

export function combineDateAndTime(date: LocalDate, time: LocalTime, zone: string = DEFAULT_TIMEZONE): DateTime {
  return DateTime.fromObject(
    {
      year: date.year,
      month: date.month,
      day: date.day,
      hour: time.hour,
      minute: time.minute,
      second: time.second,
    },
    { zone }
  );
}

/**
 * Start and end of a shift. An end time at or before the start time means the
 * shift runs past midnight, so the end moves to the next day.
 */
export function shiftInterval(
  date: LocalDate,
  startTime: LocalTime,
  endTime: LocalTime,
  zone: string = DEFAULT_TIMEZONE
): { start: DateTime; end: DateTime } {
  const start = combineDateAndTime(date, startTime, zone);
  let end = combineDateAndTime(date, endTime, zone);
  if (end <= start) end = end.plus({ days: 1 });
  return { start, end };
}

/**
 * Wall-clock stamp without offset, as used in calendar payloads (YYYYMMDDTHHMMSS)
 */
export function formatNaiveStamp(dt: DateTime): string {
  return dt.toFormat("yyyyMMdd'T'HHmmss");
}

/**
 * "Saturday, March 14, 2026 at 09:00 AM"
 */
export function formatLongWhen(dt: DateTime): string {
  return dt.toFormat("EEEE, MMMM dd, yyyy 'at' hh:mm a", { locale: FORMAT_LOCALE });
}

/**
 * "Mar 14 09:00 AM"
 */
export function formatShortWhen(dt: DateTime): string {
  return dt.toFormat('MMM dd hh:mm a', { locale: FORMAT_LOCALE });
}
