import { describe, it, expect } from 'vitest';
import { isIsoDate, addDays, dayOfWeek, toIsoDate, parseIsoDate, formatIsoDate } from '../src/dates.js';

describe('isIsoDate', () => {
  it('should accept real calendar days', () => {
    expect(isIsoDate('2023-01-31')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('should reject impossible days and other formats', () => {
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2023-13-01')).toBe(false);
    expect(isIsoDate('20230101')).toBe(false);
    expect(isIsoDate('2023-1-1')).toBe(false);
    expect(isIsoDate(20230101)).toBe(false);
    expect(isIsoDate(undefined)).toBe(false);
  });
});

describe('addDays', () => {
  it('should cross month and year boundaries', () => {
    expect(addDays('2023-01-01', -1)).toBe('2022-12-31');
    expect(addDays('2023-01-31', 1)).toBe('2023-02-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
  });

  it('should throw on invalid input', () => {
    expect(() => addDays('not-a-date', 1)).toThrow('Invalid ISO date: not-a-date');
  });
});

describe('dayOfWeek', () => {
  it('should use UTC calendar days', () => {
    // 2024-03-16 is a Saturday
    expect(dayOfWeek('2024-03-16')).toBe(6);
    expect(dayOfWeek('2024-03-17')).toBe(0);
  });
});

describe('toIsoDate', () => {
  it('should cut datetime strings to the date', () => {
    expect(toIsoDate('2024-03-15 00:00:00')).toBe('2024-03-15');
    expect(toIsoDate('2024-03-15')).toBe('2024-03-15');
  });

  it('should read local calendar fields from Date objects', () => {
    expect(toIsoDate(new Date(2024, 2, 15))).toBe('2024-03-15');
  });

  it('should return null for unusable values', () => {
    expect(toIsoDate('garbage')).toBeNull();
    expect(toIsoDate(42)).toBeNull();
    expect(toIsoDate(new Date('invalid'))).toBeNull();
  });
});

describe('parseIsoDate / formatIsoDate', () => {
  it('should agree with each other', () => {
    expect(formatIsoDate(parseIsoDate('2022-12-01'))).toBe('2022-12-01');
  });
});
