import type { RealReturnResult } from '@/types';
import { formatDateBR } from './format';

export interface ChartDataset {
  label: string;
  data: number[];
  borderColor: string;
  backgroundColor: string;
  borderDash?: number[];
  fill: boolean;
}

export interface ComparisonChartData {
  labels: string[];
  datasets: ChartDataset[];
}

export const CHART_COLORS = {
  nominal: '#25146E',
  inflation: '#D9534F',
  real: '#16a34a',
} as const;

const round2 = (n: number): number => Math.round(n * 100) / 100;

/**
 * Money series for the comparison chart: what the investment is worth,
 * what it had to be worth to match IPCA, and its value in start-date reais.
 */
export function buildComparisonChart(
  result: RealReturnResult,
  initialAmount: number,
  ticker: string
): ComparisonChartData {
  const labels = result.nominalSeries.map((p) => formatDateBR(p.date));
  const scale = (factor: number): number => round2(initialAmount * factor);

  return {
    labels,
    datasets: [
      {
        label: `Seu investimento (${ticker})`,
        data: result.nominalSeries.map((p) => scale(p.factor)),
        borderColor: CHART_COLORS.nominal,
        backgroundColor: `${CHART_COLORS.nominal}20`,
        fill: false,
      },
      {
        label: 'Corrigido pelo IPCA',
        data: result.inflationSeries.map((p) => scale(p.factor)),
        borderColor: CHART_COLORS.inflation,
        backgroundColor: `${CHART_COLORS.inflation}20`,
        borderDash: [6, 4],
        fill: false,
      },
      {
        label: 'Valor real (poder de compra inicial)',
        data: result.realSeries.map((p) => scale(p.factor)),
        borderColor: CHART_COLORS.real,
        backgroundColor: `${CHART_COLORS.real}20`,
        fill: true,
      },
    ],
  };
}
