import type { InflationPoint, IsoDate, PricePoint, RealReturnResult } from '@/types';
import { normalizeSeries } from './normalizer';
import { accumulate } from './accumulation';
import { deflate } from './inflation';
import { assembleResult } from './result';
import { InvalidWindowError } from './errors';
import { isIsoDate } from './dates';

/**
 * Real (inflation-adjusted) return of a stock over [startDate, endDate].
 *
 * Pure and synchronous: both series must already be fetched. Throws a
 * RealReturnError subclass on any failure and never returns a partial result.
 */
export function computeRealReturn(
  prices: readonly PricePoint[],
  inflation: readonly InflationPoint[],
  startDate: IsoDate,
  endDate: IsoDate
): RealReturnResult {
  if (!isIsoDate(startDate) || !isIsoDate(endDate) || startDate > endDate) {
    throw new InvalidWindowError(startDate, endDate);
  }

  const normalized = normalizeSeries(prices, inflation, startDate, endDate);

  const nominalSeries = accumulate(normalized.prices, 'prices');
  const inflationSeries = accumulate(normalized.inflation, 'inflation');
  const realSeries = deflate(nominalSeries, inflationSeries);

  return assembleResult({
    startDate,
    endDate,
    nominalSeries,
    inflationSeries,
    realSeries,
    warnings: normalized.warnings,
  });
}
