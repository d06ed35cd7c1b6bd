import { describe, it, expect } from 'vitest';
import { daysAgo, daysBetween, previousDay, toIsoDate } from './dates.js';

describe('dates', () => {
  it('should format local dates as yyyy-MM-dd', () => {
    expect(toIsoDate(new Date(2026, 0, 5, 23, 30))).toBe('2026-01-05');
  });

  it('should step back across month boundaries', () => {
    expect(previousDay('2026-03-01')).toBe('2026-02-28');
    expect(daysAgo('2026-03-10', 30)).toBe('2026-02-08');
  });

  it('should count whole days between dates', () => {
    expect(daysBetween('2026-03-01', '2026-03-10')).toBe(9);
    expect(daysBetween('2026-03-10', '2026-03-10')).toBe(0);
  });

  it('should return null for a missing or later start date', () => {
    expect(daysBetween(null, '2026-03-10')).toBeNull();
    expect(daysBetween(undefined, '2026-03-10')).toBeNull();
    expect(daysBetween('2026-03-11', '2026-03-10')).toBeNull();
  });
});
