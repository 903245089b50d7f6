import type {
  GrowthFactorSeries,
  InvestmentProjection,
  IsoDate,
  NormalizationWarning,
  RealReturnOutcome,
  RealReturnResult,
} from '@/types';
import { totalReturnPct } from './accumulation';
import { InvalidAmountError } from './errors';
import { BREAK_EVEN_TOLERANCE } from './constants';

/**
 * Qualitative outcome of a real return in percent
 */
export function classifyOutcome(totalRealPct: number): RealReturnOutcome {
  if (Math.abs(totalRealPct) < BREAK_EVEN_TOLERANCE) return 'BREAK_EVEN';
  return totalRealPct > 0 ? 'REAL_GAIN' : 'REAL_LOSS';
}

interface AssembleInput {
  startDate: IsoDate;
  endDate: IsoDate;
  nominalSeries: GrowthFactorSeries;
  inflationSeries: GrowthFactorSeries;
  realSeries: GrowthFactorSeries;
  warnings: readonly NormalizationWarning[];
}

/**
 * Bundle the three growth-factor series with their totals.
 * Every percentage is read off the last factor of its own series.
 */
export function assembleResult(input: AssembleInput): RealReturnResult {
  const totalNominalPct = totalReturnPct(input.nominalSeries);
  const totalInflationPct = totalReturnPct(input.inflationSeries);
  const totalRealPct = totalReturnPct(input.realSeries);

  return Object.freeze({
    startDate: input.startDate,
    endDate: input.endDate,
    nominalSeries: input.nominalSeries,
    inflationSeries: input.inflationSeries,
    realSeries: input.realSeries,
    totalNominalPct,
    totalInflationPct,
    totalRealPct,
    naiveRealPct: totalNominalPct - totalInflationPct,
    outcome: classifyOutcome(totalRealPct),
    warnings: input.warnings,
  });
}

function lastFactor(series: GrowthFactorSeries): number {
  return series[series.length - 1]?.factor ?? 1;
}

/**
 * Money view of a result: what the initial amount became, what it needed to
 * become to keep pace with IPCA, and its final value in start-date reais.
 */
export function projectInvestment(
  result: RealReturnResult,
  initialAmount: number
): InvestmentProjection {
  if (!Number.isFinite(initialAmount) || initialAmount <= 0) {
    throw new InvalidAmountError(initialAmount);
  }

  const realAmount = initialAmount * lastFactor(result.realSeries);

  return {
    initialAmount,
    finalAmount: initialAmount * lastFactor(result.nominalSeries),
    inflationAdjustedAmount: initialAmount * lastFactor(result.inflationSeries),
    realAmount,
    realGainAmount: realAmount - initialAmount,
  };
}
