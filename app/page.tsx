'use client';

import { RealReturnForm, RealReturnChart, ResultSummary } from '@/components';
import { useRealReturn } from '@/hooks';

export default function RealReturnPage(): React.ReactElement {
  const { data, loading, error, calculate } = useRealReturn();

  return (
    <div className="min-h-screen bg-gray-50 dark:bg-gray-950 py-8 transition-colors">
      <div className="max-w-7xl mx-auto px-4">
        <div className="text-center mb-8">
          <h1 className="text-3xl font-bold text-blue-600 dark:text-blue-400">
            Retorno real: ação vs. IPCA
          </h1>
          <p className="text-gray-500 dark:text-gray-400 mt-2">
            Rentabilidade de um ativo descontada a inflação pela equação de Fisher
          </p>
        </div>

        <div className="bg-white dark:bg-gray-900 rounded-xl border border-gray-200 dark:border-gray-700 p-5 mb-6">
          <RealReturnForm onSubmit={(query) => void calculate(query)} loading={loading} />
        </div>

        {error ? (
          <div className="mb-6 p-4 rounded-lg bg-red-50 dark:bg-red-900/30 text-red-800 dark:text-red-300">
            {error}
          </div>
        ) : null}

        {data ? (
          <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
            <div className="lg:col-span-2 bg-white dark:bg-gray-900 rounded-xl border border-gray-200 dark:border-gray-700 p-5">
              <RealReturnChart
                result={data.result}
                initialAmount={data.projection.initialAmount}
                ticker={data.ticker}
              />
            </div>
            <ResultSummary data={data} />
          </div>
        ) : null}
      </div>
    </div>
  );
}
