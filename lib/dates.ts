import type { IsoDate, YearMonth } from '@/types';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const BCB_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Strict `YYYY-MM-DD` check, rejecting impossible days such as 2024-02-30
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, y, m, d] = match.map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;

  const date = new Date(Date.UTC(y, m - 1, d));
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === m - 1 &&
    date.getUTCDate() === d
  );
}

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

/** Month an ISO date falls in */
export function toYearMonth(date: IsoDate): YearMonth {
  return date.slice(0, 7);
}

export function firstDayOfPeriod(period: YearMonth): IsoDate {
  return `${period}-01`;
}

/** Shift a year-month by a (possibly negative) number of months */
export function addMonths(period: YearMonth, months: number): YearMonth {
  const [y, m] = period.split('-').map(Number);
  const shifted = new Date(Date.UTC(y ?? 1970, (m ?? 1) - 1 + months, 1));
  return `${shifted.getUTCFullYear()}-${pad2(shifted.getUTCMonth() + 1)}`;
}

/** `YYYY-MM-DD` -> `DD/MM/YYYY`, the format the BCB SGS API expects */
export function toBcbDate(date: IsoDate): string {
  const [y, m, d] = date.split('-');
  return `${d}/${m}/${y}`;
}

/** `DD/MM/YYYY` -> year-month of the observation */
export function bcbDateToPeriod(value: string): YearMonth | null {
  const match = BCB_DATE_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, , m, y] = match;
  return `${y}-${m}`;
}

/** Unix seconds at 00:00 UTC of a date */
export function toUnixSeconds(date: IsoDate): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);
}

// Cached per time zone; DateTimeFormat construction is expensive
const zoneFormatters = new Map<string, Intl.DateTimeFormat>();

/**
 * Calendar date of a unix timestamp as seen in the given IANA time zone
 */
export function unixToZonedDate(seconds: number, timeZone: string): IsoDate {
  let formatter = zoneFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    zoneFormatters.set(timeZone, formatter);
  }

  const parts = formatter.formatToParts(new Date(seconds * 1000));
  const get = (type: string): string => parts.find((p) => p.type === type)?.value ?? '';
  return `${get('year')}-${get('month')}-${get('day')}`;
}
