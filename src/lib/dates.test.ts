import { describe, it, expect } from 'vitest';
import {
  MIN_DATE,
  addDays,
  dateOrdinal,
  formatIsoDate,
  makeDate,
  parseDateOrMin,
  parseIsoDate,
} from './dates.js';

describe('Calendar dates', () => {
  describe('makeDate', () => {
    it('should accept real calendar days only', () => {
      expect(makeDate(2020, 2, 29)).toEqual({ year: 2020, month: 2, day: 29 });
      expect(makeDate(2021, 2, 29)).toBeUndefined();
      expect(makeDate(1900, 2, 29)).toBeUndefined();
      expect(makeDate(2021, 13, 1)).toBeUndefined();
      expect(makeDate(2021, 4, 31)).toBeUndefined();
      expect(makeDate(0, 1, 1)).toBeUndefined();
      expect(makeDate(10000, 1, 1)).toBeUndefined();
    });
  });

  describe('addDays', () => {
    it('should shift across months and leap years', () => {
      expect(addDays({ year: 1960, month: 1, day: 1 }, 12345)).toEqual({
        year: 1993,
        month: 10,
        day: 19,
      });
      expect(addDays({ year: 2024, month: 2, day: 28 }, 1)).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it('should give up past year 9999', () => {
      expect(addDays({ year: 9999, month: 12, day: 31 }, 1)).toBeUndefined();
    });
  });

  describe('formatIsoDate', () => {
    it('should zero-pad every part', () => {
      expect(formatIsoDate({ year: 2016, month: 6, day: 1 })).toBe('2016-06-01');
      expect(formatIsoDate({ year: 50, month: 1, day: 2 })).toBe('0050-01-02');
    });
  });

  describe('parseIsoDate', () => {
    it('should read YYYY-MM-DD', () => {
      expect(parseIsoDate('2021-03-04')).toEqual({ year: 2021, month: 3, day: 4 });
      expect(parseIsoDate(' 2021 - 3 - +4 ')).toEqual({ year: 2021, month: 3, day: 4 });
    });

    it('should reject anything else', () => {
      expect(parseIsoDate('2021-02-29')).toBeUndefined();
      expect(parseIsoDate('03/04/2021')).toBeUndefined();
      expect(parseIsoDate('2021-03-04T00:00')).toBeUndefined();
      expect(parseIsoDate('2021-03')).toBeUndefined();
      expect(parseIsoDate('')).toBeUndefined();
      expect(parseIsoDate(null)).toBeUndefined();
    });
  });

  describe('parseDateOrMin', () => {
    it('should map unparseable text to the minimum date', () => {
      expect(parseDateOrMin('unknown')).toBe(MIN_DATE);
      expect(parseDateOrMin(undefined)).toBe(MIN_DATE);
      expect(dateOrdinal(parseDateOrMin('0001-01-02'))).toBeGreaterThan(dateOrdinal(MIN_DATE));
    });
  });
});
