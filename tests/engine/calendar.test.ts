import { describe, it, expect } from 'vitest';
import { addDays, daysBetween, monthKey, startOfDay, toCalendarDay } from '../../src/engine/calendar.js';

describe('calendar', () => {
  it('should use the UTC date regardless of time of day', () => {
    expect(toCalendarDay(new Date('2026-03-02T23:59:59.999Z'))).toBe('2026-03-02');
    expect(toCalendarDay(new Date('2026-03-03T00:00:00.000Z'))).toBe('2026-03-03');
  });

  it('should bucket months as YYYY-MM', () => {
    expect(monthKey(new Date('2026-12-31T12:00:00.000Z'))).toBe('2026-12');
  });

  it('should count whole days across month and year ends', () => {
    expect(daysBetween('2026-02-28', '2026-03-01')).toBe(1);
    expect(daysBetween('2025-12-31', '2026-01-01')).toBe(1);
    expect(daysBetween('2026-03-05', '2026-03-02')).toBe(-3);
  });

  it('should add and subtract days', () => {
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    expect(addDays('2026-12-30', 3)).toBe('2027-01-02');
  });

  it('should truncate to midnight UTC', () => {
    expect(startOfDay(new Date('2026-03-02T17:45:00.000Z')).toISOString()).toBe('2026-03-02T00:00:00.000Z');
  });
});
