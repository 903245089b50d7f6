'use client';

import { useMemo } from 'react';
import '@/lib/chart-setup';
import { Line } from 'react-chartjs-2';
import type { RealReturnResult } from '@/types';
import { buildComparisonChart } from '@/lib/chart-data';

interface RealReturnChartProps {
  result: RealReturnResult;
  initialAmount: number;
  ticker: string;
}

export function RealReturnChart({
  result,
  initialAmount,
  ticker,
}: RealReturnChartProps): React.ReactElement {
  const chartData = useMemo(
    () => buildComparisonChart(result, initialAmount, ticker),
    [result, initialAmount, ticker]
  );

  const options = useMemo(
    () => ({
      responsive: true,
      maintainAspectRatio: false,
      elements: {
        point: { radius: 0 },
        line: { borderWidth: 2, tension: 0.1 },
      },
      interaction: {
        mode: 'index' as const,
        intersect: false,
      },
      plugins: {
        legend: {
          display: true,
          position: 'top' as const,
        },
      },
      scales: {
        x: { ticks: { maxTicksLimit: 12 } },
        y: { beginAtZero: false },
      },
    }),
    []
  );

  if (result.nominalSeries.length === 0) {
    return (
      <div className="h-64 flex items-center justify-center text-gray-500 dark:text-gray-400">
        Sem dados para exibir o gráfico
      </div>
    );
  }

  return (
    <div className="h-96">
      <Line data={chartData} options={options} />
    </div>
  );
}
