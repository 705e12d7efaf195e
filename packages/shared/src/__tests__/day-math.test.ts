import { describe, it, expect } from 'vitest';
import { MS_PER_DAY, addDays, daysBetween, daysToMs, startOfLocalDay } from '../utils/day-math';

describe('day-math', () => {
  const base = new Date('2024-03-10T12:00:00.000Z');

  it('should convert fractional days to milliseconds', () => {
    expect(daysToMs(1)).toBe(MS_PER_DAY);
    expect(daysToMs(0.5)).toBe(43_200_000);
  });

  it('should add and subtract days without mutating the input', () => {
    const later = addDays(base, 6);
    expect(later.toISOString()).toBe('2024-03-16T12:00:00.000Z');
    expect(addDays(base, -7).toISOString()).toBe('2024-03-03T12:00:00.000Z');
    expect(base.toISOString()).toBe('2024-03-10T12:00:00.000Z');
  });

  it('should measure signed day distance', () => {
    expect(daysBetween(base, addDays(base, 2.5))).toBe(2.5);
    expect(daysBetween(addDays(base, 3), base)).toBe(-3);
  });

  it('should truncate to local midnight', () => {
    const afternoon = new Date(2024, 0, 15, 13, 45, 30, 250);
    const start = startOfLocalDay(afternoon);

    expect(start.getFullYear()).toBe(2024);
    expect(start.getMonth()).toBe(0);
    expect(start.getDate()).toBe(15);
    expect(start.getHours()).toBe(0);
    expect(start.getMinutes()).toBe(0);
    expect(start.getSeconds()).toBe(0);
    expect(start.getMilliseconds()).toBe(0);
    expect(afternoon.getHours()).toBe(13);
  });
});
