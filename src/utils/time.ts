import { addDays, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const OFFSET_TIMESTAMP = "yyyy-MM-dd'T'HH:mm:ssXXX";

export function parseInstant(value: string): Date {
  return parseISO(value);
}

/**
 * Date part of an upstream timestamp as written, e.g. `2023-12-01` for
 * `2023-12-01T23:00:00+02:00`, without converting to another zone.
 */
export function calendarDateOf(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function formatDateISO(date: Date, tz: string): string {
  return formatInTimeZone(date, tz, 'yyyy-MM-dd');
}

export function formatTime(date: Date, tz: string): string {
  return formatInTimeZone(date, tz, 'HH:mm');
}

export function formatOffsetTimestamp(date: Date, tz: string): string {
  return formatInTimeZone(date, tz, OFFSET_TIMESTAMP);
}

export function lookaheadWindow(now: Date, days: number): { start: Date; end: Date } {
  return { start: now, end: addDays(now, days) };
}
