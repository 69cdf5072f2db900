import { describe, it, expect } from '@jest/globals';
import type { Weekday } from '@crewplan/shared';
import {
  addDays,
  addWorkingDays,
  countWorkingDays,
  diffDays,
  isAvailableOver,
  isValidDate,
  isoWeekday,
  nextWorkingDay,
  searchForward,
  skipWorkingDays,
  spanDays,
} from './dateArithmetic.js';

const WEEKEND: ReadonlySet<Weekday> = new Set<Weekday>([6, 7]);
const NEVER: ReadonlySet<Weekday> = new Set<Weekday>([1, 2, 3, 4, 5, 6, 7]);

// 2025-01-06 is a Monday, 2025-01-10 a Friday.

describe('dateArithmetic', () => {
  describe('calendar days', () => {
    it('adds days across month and year boundaries', () => {
      expect(addDays('2025-01-31', 1)).toBe('2025-02-01');
      expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
      expect(addDays('2025-03-01', -1)).toBe('2025-02-28');
      expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    });

    it('computes the signed difference in days', () => {
      expect(diffDays('2025-01-06', '2025-01-12')).toBe(6);
      expect(diffDays('2025-01-12', '2025-01-06')).toBe(-6);
    });

    it('counts both endpoints of a range', () => {
      expect(spanDays({ start: '2025-01-10', end: '2025-01-16' })).toBe(7);
      expect(spanDays({ start: '2025-01-10', end: '2025-01-10' })).toBe(1);
    });

    it('validates real calendar dates only', () => {
      expect(isValidDate('2024-02-29')).toBe(true);
      expect(isValidDate('2025-02-29')).toBe(false);
      expect(isValidDate('2025-02-30')).toBe(false);
      expect(isValidDate('2025-1-5')).toBe(false);
      expect(isValidDate('not a date')).toBe(false);
    });

    it('numbers weekdays Monday = 1 through Sunday = 7', () => {
      expect(isoWeekday('2025-01-06')).toBe(1);
      expect(isoWeekday('2025-01-10')).toBe(5);
      expect(isoWeekday('2025-01-11')).toBe(6);
      expect(isoWeekday('2025-01-12')).toBe(7);
    });
  });

  describe('working days', () => {
    it('counts working days in an inclusive range', () => {
      expect(countWorkingDays('2025-01-06', '2025-01-19', WEEKEND)).toBe(10);
      expect(countWorkingDays('2025-01-11', '2025-01-12', WEEKEND)).toBe(0);
    });

    it('finds the next working day on or after a date', () => {
      expect(nextWorkingDay('2025-01-08', WEEKEND, 10)).toBe('2025-01-08');
      expect(nextWorkingDay('2025-01-11', WEEKEND, 10)).toBe('2025-01-13');
    });

    it('returns null when no working day exists within the cap', () => {
      expect(nextWorkingDay('2025-01-06', NEVER, 30)).toBeNull();
      expect(addWorkingDays('2025-01-06', 1, NEVER, 30)).toBeNull();
      expect(skipWorkingDays('2025-01-06', 2, NEVER, 30)).toBeNull();
    });

    it('skips elapsed working days and lands on the next working day', () => {
      expect(skipWorkingDays('2025-01-06', 0, WEEKEND, 30)).toBe('2025-01-06');
      expect(skipWorkingDays('2025-01-06', 3, WEEKEND, 30)).toBe('2025-01-09');
      // Mon..Fri elapse, the weekend is skipped
      expect(skipWorkingDays('2025-01-06', 5, WEEKEND, 30)).toBe('2025-01-13');
      // Starting on a Saturday: Monday is the first elapsed day
      expect(skipWorkingDays('2025-01-11', 1, WEEKEND, 30)).toBe('2025-01-14');
    });

    it('counts the start day as working day 1', () => {
      expect(addWorkingDays('2025-01-06', 1, WEEKEND, 30)).toBe('2025-01-06');
      expect(addWorkingDays('2025-01-10', 5, WEEKEND, 30)).toBe('2025-01-16');
      expect(addWorkingDays('2025-01-11', 1, WEEKEND, 30)).toBe('2025-01-13');
    });
  });

  describe('availability', () => {
    it('requires the predicate on every day of the range', () => {
      const notOnTuesday = (date: string) => date !== '2025-01-07';
      expect(isAvailableOver({ start: '2025-01-06', end: '2025-01-08' }, notOnTuesday)).toBe(false);
      expect(isAvailableOver({ start: '2025-01-08', end: '2025-01-10' }, notOnTuesday)).toBe(true);
    });

    it('returns the first probe hit within the horizon', () => {
      const probe = (date: string) => (date === '2025-01-03' ? `hit ${date}` : null);
      expect(searchForward('2025-01-01', 5, probe)).toBe('hit 2025-01-03');
      expect(searchForward('2025-01-01', 2, probe)).toBeNull();
    });
  });
});
