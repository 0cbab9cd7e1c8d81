import * as chrono from 'chrono-node';
import { DateTime, FixedOffsetZone } from 'luxon';
import type { CalendarDate } from './types';

export interface ClockTime {
  hour: number;
  minute: number;
}

const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

export function localZone(offsetHours: number): FixedOffsetZone {
  return FixedOffsetZone.instance(Math.round(offsetHours * 60));
}

/**
 * Parses the calendar date out of a schedule date key such as
 * "Saturday 15th Nov 2025 - Schedule Time UK GMT". Only the part before " - " is read.
 */
export function parseDateKey(dateKey: string, reference: Date): CalendarDate | null {
  const head = dateKey.split(' - ')[0].trim();
  if (!head) return null;
  const results = chrono.parse(head, reference);
  // A bare weekday only implies a day; prefer the result that states one.
  const best = results.find((r) => r.start.isCertain('day')) ?? results[0];
  if (!best) return null;
  const year = best.start.get('year');
  const month = best.start.get('month');
  const day = best.start.get('day');
  if (year === null || month === null || day === null) return null;
  return { year, month, day };
}

export function parseClock(time: string): ClockTime | null {
  const m = time.trim().match(CLOCK_RE);
  if (!m) return null;
  const hour = parseInt(m[1], 10);
  const minute = parseInt(m[2], 10);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function calendarDateOf(dt: DateTime): CalendarDate {
  return { year: dt.year, month: dt.month, day: dt.day };
}

export function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function isoDate(d: CalendarDate): string {
  return `${d.year}-${String(d.month).padStart(2, '0')}-${String(d.day).padStart(2, '0')}`;
}

// Feed times are filed in UTC; the local view is the same instant in the fixed-offset zone.
export function feedStart(date: CalendarDate, clock: ClockTime, zone: FixedOffsetZone): DateTime {
  return DateTime.fromObject({ ...date, hour: clock.hour, minute: clock.minute }, { zone: 'utc' }).setZone(zone);
}
