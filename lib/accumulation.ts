import type { GrowthFactorPoint, GrowthFactorSeries, NormalizedSeries, SeriesName } from '@/types';
import { EmptySeriesError } from './errors';

/**
 * Cumulative growth factor since the first date: value[i] / value[0].
 * For prices this is what R$1 invested at the start is worth at date i.
 */
export function accumulate(series: NormalizedSeries, seriesName: SeriesName): GrowthFactorSeries {
  const first = series[0];
  if (!first) {
    throw new EmptySeriesError(seriesName);
  }

  const base = first.value;
  const factors: GrowthFactorPoint[] = series.map((point, i) =>
    Object.freeze({
      date: point.date,
      // Anchor is set explicitly so it never depends on division rounding
      factor: i === 0 ? 1 : point.value / base,
    })
  );

  return Object.freeze(factors);
}

/**
 * Last factor of a series as a percentage return, e.g. 1.1 -> 10
 */
export function totalReturnPct(series: GrowthFactorSeries): number {
  const last = series[series.length - 1];
  if (!last) return 0;
  return (last.factor - 1) * 100;
}
