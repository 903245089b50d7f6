import type { GrowthFactorPoint, GrowthFactorSeries } from '@/types';
import { MisalignedSeriesError } from './errors';

/**
 * Deflate nominal growth by inflation growth using the Fisher equation:
 * (1 + real) = (1 + nominal) / (1 + inflation), applied date by date.
 *
 * Both series must share the same date axis.
 */
export function deflate(
  nominal: GrowthFactorSeries,
  inflation: GrowthFactorSeries
): GrowthFactorSeries {
  const length = Math.max(nominal.length, inflation.length);
  const real: GrowthFactorPoint[] = [];

  for (let i = 0; i < length; i++) {
    const n = nominal[i];
    const inf = inflation[i];
    if (!n || !inf || n.date !== inf.date) {
      throw new MisalignedSeriesError(i, n?.date, inf?.date);
    }
    real.push(Object.freeze({ date: n.date, factor: n.factor / inf.factor }));
  }

  return Object.freeze(real);
}
