/**
 * UTC calendar helpers. All day arithmetic in the engine goes through here
 * so that streaks never depend on the host's time zone.
 */

import type { CalendarDay } from '../types/models.js';

const MS_PER_DAY = 86_400_000;

export function toCalendarDay(date: Date): CalendarDay {
  return date.toISOString().slice(0, 10);
}

/** Year-month bucket key, e.g. "2026-10". */
export function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

function dayNumber(day: CalendarDay): number {
  return Math.floor(Date.parse(`${day}T00:00:00.000Z`) / MS_PER_DAY);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: CalendarDay, to: CalendarDay): number {
  return dayNumber(to) - dayNumber(from);
}

export function addDays(day: CalendarDay, days: number): CalendarDay {
  return new Date((dayNumber(day) + days) * MS_PER_DAY).toISOString().slice(0, 10);
}

export function startOfDay(date: Date): Date {
  return new Date(`${toCalendarDay(date)}T00:00:00.000Z`);
}
