import { describe, it, expect } from 'vitest';
import {
  addMonths,
  bcbDateToPeriod,
  firstDayOfPeriod,
  isIsoDate,
  toBcbDate,
  toIsoDate,
  toUnixSeconds,
  toYearMonth,
  unixToZonedDate,
} from '@/lib/dates';

describe('isIsoDate', () => {
  it.each([
    ['2024-02-29', true],
    ['2023-02-29', false],
    ['2024-02-30', false],
    ['2024-13-01', false],
    ['2024-1-01', false],
    ['01/02/2024', false],
    ['', false],
  ])('%s -> %s', (value, expected) => {
    expect(isIsoDate(value)).toBe(expected);
  });
});

describe('year-month helpers', () => {
  it('reads the month of a date', () => {
    expect(toYearMonth('2024-03-15')).toBe('2024-03');
    expect(firstDayOfPeriod('2024-03')).toBe('2024-03-01');
  });

  it.each([
    ['2024-01', -1, '2023-12'],
    ['2024-11', 3, '2025-02'],
    ['2024-06', 0, '2024-06'],
    ['2024-03', -15, '2022-12'],
  ])('addMonths(%s, %s) = %s', (period, months, expected) => {
    expect(addMonths(period, months)).toBe(expected);
  });
});

describe('BCB date format', () => {
  it('converts to DD/MM/YYYY', () => {
    expect(toBcbDate('1995-01-01')).toBe('01/01/1995');
    expect(toBcbDate('2024-03-15')).toBe('15/03/2024');
  });

  it('reads the period of an observation', () => {
    expect(bcbDateToPeriod('01/03/2024')).toBe('2024-03');
    expect(bcbDateToPeriod(' 01/12/1999 ')).toBe('1999-12');
    expect(bcbDateToPeriod('2024-03-01')).toBeNull();
  });
});

describe('timestamps', () => {
  it('formats a Date as its UTC calendar day', () => {
    expect(toIsoDate(new Date(Date.UTC(2024, 0, 5, 23, 59)))).toBe('2024-01-05');
  });

  it('gives unix seconds at UTC midnight', () => {
    expect(toUnixSeconds('1970-01-02')).toBe(86_400);
    expect(toUnixSeconds('2024-01-02')).toBe(1_704_153_600);
  });

  it('reads the calendar day in a given time zone', () => {
    expect(unixToZonedDate(0, 'UTC')).toBe('1970-01-01');
    expect(unixToZonedDate(0, 'America/Sao_Paulo')).toBe('1969-12-31');
    expect(unixToZonedDate(1_704_200_400, 'America/Sao_Paulo')).toBe('2024-01-02');
  });
});
