/**
 * Streak engine.
 * Pure day-based streak arithmetic for partnerships (interactions) and
 * users (answers). Callers pass UTC calendar days; nothing here reads the clock.
 */

import type { CalendarDay } from '../types/models.js';
import { daysBetween } from './calendar.js';

export interface StreakState {
  streak: number;
  longest: number;
}

export interface AnswerDay {
  date: CalendarDay;
  skipped: boolean;
}

/**
 * Continue, hold or reset a streak for an interaction on `today`.
 * Same-day repeats do not double count; any gap beyond one day restarts at 1.
 */
export function advanceStreak(
  previousDate: CalendarDay | null,
  today: CalendarDay,
  currentStreak: number,
  longestStreak: number
): StreakState {
  let streak: number;

  if (previousDate === null) {
    streak = 1;
  } else {
    const gap = daysBetween(previousDate, today);
    if (gap === 1) {
      streak = currentStreak + 1;
    } else if (gap === 0) {
      streak = currentStreak;
    } else {
      streak = 1;
    }
  }

  return { streak, longest: Math.max(streak, longestStreak) };
}

/**
 * Current run of consecutive answer days ending today, walking `entries`
 * most-recent-first. Several answers on one day count once. Stops at the
 * first skip, or at the first entry that is not on the day the run expects.
 */
export function answerStreak(entries: readonly AnswerDay[], today: CalendarDay): number {
  let streak = 0;
  let lastCounted: CalendarDay | null = null;

  for (const entry of entries) {
    if (entry.skipped) break;
    if (entry.date === lastCounted) continue;
    if (daysBetween(entry.date, today) !== streak) break;
    streak += 1;
    lastCounted = entry.date;
  }

  return streak;
}

/**
 * Longest run of consecutive answer days in which nothing was skipped.
 * `entries` may be in any order.
 */
export function longestAnswerStreak(entries: readonly AnswerDay[]): number {
  const byDay = new Map<CalendarDay, boolean>();
  for (const entry of entries) {
    byDay.set(entry.date, (byDay.get(entry.date) ?? false) || entry.skipped);
  }

  const days = [...byDay.keys()].sort();
  let longest = 0;
  let current = 0;
  let previous: CalendarDay | null = null;

  for (const day of days) {
    if (byDay.get(day)) {
      current = 0;
    } else if (previous !== null && current > 0 && daysBetween(previous, day) === 1) {
      current += 1;
    } else {
      current = 1;
    }
    longest = Math.max(longest, current);
    previous = day;
  }

  return longest;
}

/** Distinct days within the last `windowDays` (inclusive of today) with a non-skipped answer. */
export function answeredDaysInWindow(
  entries: readonly AnswerDay[],
  today: CalendarDay,
  windowDays: number
): number {
  const days = new Set<CalendarDay>();
  for (const entry of entries) {
    const age = daysBetween(entry.date, today);
    if (!entry.skipped && age >= 0 && age < windowDays) {
      days.add(entry.date);
    }
  }
  return days.size;
}
