import type {
  InflationPoint,
  IsoDate,
  NormalizationWarning,
  NormalizedPair,
  NormalizedPoint,
  PricePoint,
  YearMonth,
} from '@/types';
import { EmptyRangeError, InsufficientLeadDataError } from './errors';
import { firstDayOfPeriod, toYearMonth } from './dates';

interface KeyedValue {
  key: string;
  value: number;
}

function isUsable(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value > 0;
}

/**
 * Sort by key and collapse repeated keys (last delivered wins),
 * dropping non-positive or missing values.
 */
function cleanPoints(
  points: ReadonlyArray<{ key: string; value: number | null }>,
  series: NormalizationWarning['series'],
  warnings: NormalizationWarning[]
): KeyedValue[] {
  const byKey = new Map<string, number>();

  for (const point of points) {
    if (!isUsable(point.value)) {
      warnings.push({
        kind: 'DROPPED_POINT',
        series,
        date: point.key,
        reason: point.value === null ? 'missing value' : `invalid value ${point.value}`,
      });
      continue;
    }
    if (byKey.has(point.key)) {
      warnings.push({
        kind: 'DUPLICATE_DATE',
        series,
        date: point.key,
        reason: 'repeated date, keeping the last value',
      });
    }
    byKey.set(point.key, point.value);
  }

  return [...byKey.entries()]
    .map(([key, value]) => ({ key, value }))
    .sort((a, b) => a.key.localeCompare(b.key));
}

/**
 * Keep the in-window periods plus the latest period before the window,
 * which anchors price dates that precede the first in-window publication.
 */
function selectInflationWindow(
  periods: KeyedValue[],
  startPeriod: YearMonth,
  endPeriod: YearMonth
): { lead: KeyedValue | null; inWindow: KeyedValue[] } {
  let lead: KeyedValue | null = null;
  const inWindow: KeyedValue[] = [];

  for (const point of periods) {
    if (point.key < startPeriod) {
      lead = point;
    } else if (point.key <= endPeriod) {
      inWindow.push(point);
    }
  }

  return { lead, inWindow };
}

/**
 * Align daily prices and monthly IPCA on the price calendar.
 *
 * Inflation is upsampled by step-function forward fill: each price date takes
 * the index of the latest month whose first day is on or before it.
 */
export function normalizeSeries(
  prices: readonly PricePoint[],
  inflation: readonly InflationPoint[],
  startDate: IsoDate,
  endDate: IsoDate
): NormalizedPair {
  const warnings: NormalizationWarning[] = [];

  const windowPrices = prices.filter((p) => p.date >= startDate && p.date <= endDate);
  const cleanPrices = cleanPoints(
    windowPrices.map((p) => ({ key: p.date, value: p.adjustedClose })),
    'prices',
    warnings
  );
  if (cleanPrices.length === 0) {
    throw new EmptyRangeError('prices', startDate, endDate);
  }

  const startPeriod = toYearMonth(startDate);
  const endPeriod = toYearMonth(endDate);
  const inflationWarnings: NormalizationWarning[] = [];
  const cleanInflation = cleanPoints(
    inflation.map((p) => ({ key: p.period, value: p.indexValue })),
    'inflation',
    inflationWarnings
  );
  const { lead, inWindow } = selectInflationWindow(cleanInflation, startPeriod, endPeriod);

  // Only periods from the lead month on bear on the result
  const firstRelevant = lead?.key ?? startPeriod;
  warnings.push(...inflationWarnings.filter((w) => w.date >= firstRelevant && w.date <= endPeriod));
  if (inWindow.length === 0) {
    throw new EmptyRangeError('inflation', startDate, endDate);
  }

  const periods = lead ? [lead, ...inWindow] : inWindow;
  const firstPrice = cleanPrices[0];
  const firstPeriod = periods[0];
  if (firstPrice && firstPeriod && firstPrice.key < firstDayOfPeriod(firstPeriod.key)) {
    throw new InsufficientLeadDataError(firstPrice.key, firstPeriod.key);
  }

  const normalizedPrices: NormalizedPoint[] = [];
  const normalizedInflation: NormalizedPoint[] = [];
  let cursor = 0;

  for (const price of cleanPrices) {
    // Both arrays are sorted, so the cursor only moves forward
    let next = periods[cursor + 1];
    while (next && firstDayOfPeriod(next.key) <= price.key) {
      cursor++;
      next = periods[cursor + 1];
    }
    const current = periods[cursor];
    if (!current) continue;

    normalizedPrices.push(Object.freeze({ date: price.key, value: price.value }));
    normalizedInflation.push(Object.freeze({ date: price.key, value: current.value }));
  }

  return Object.freeze({
    prices: Object.freeze(normalizedPrices),
    inflation: Object.freeze(normalizedInflation),
    warnings: Object.freeze(warnings),
  });
}
