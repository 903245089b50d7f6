'use client';

import type { RealReturnResponse } from '@/types';
import { formatBRL, formatDateBR, formatPct } from '@/lib/format';
import { OutcomeBadge } from './OutcomeBadge';

interface ResultSummaryProps {
  data: RealReturnResponse;
}

function Row({ label, value, emphasis }: { label: string; value: string; emphasis?: boolean }): React.ReactElement {
  return (
    <div className="flex justify-between">
      <span className="text-gray-600 dark:text-gray-400">{label}</span>
      <span
        className={`font-semibold ${emphasis ? 'text-blue-800 dark:text-blue-300' : 'text-gray-900 dark:text-gray-100'}`}
      >
        {value}
      </span>
    </div>
  );
}

export function ResultSummary({ data }: ResultSummaryProps): React.ReactElement {
  const { ticker, result, projection } = data;
  const first = result.nominalSeries[0]?.date ?? result.startDate;
  const last = result.nominalSeries[result.nominalSeries.length - 1]?.date ?? result.endDate;

  return (
    <div className="space-y-6">
      <div className="bg-white dark:bg-gray-900 rounded-xl border border-gray-200 dark:border-gray-700 p-5">
        <div className="flex items-center justify-between border-b border-blue-200 dark:border-blue-800 pb-2 mb-4">
          <h3 className="text-lg font-semibold text-blue-800 dark:text-blue-400">{ticker}</h3>
          <OutcomeBadge outcome={result.outcome} />
        </div>

        <div className="space-y-3">
          <Row label="Período (pregões)" value={`${formatDateBR(first)} a ${formatDateBR(last)}`} />
          <Row label="Retorno nominal" value={formatPct(result.totalNominalPct)} />
          <Row label="IPCA acumulado" value={formatPct(result.totalInflationPct)} />
          <Row label="Retorno real (Fisher)" value={formatPct(result.totalRealPct)} emphasis />
          <Row label="Nominal − IPCA (aproximação)" value={formatPct(result.naiveRealPct)} />
        </div>
      </div>

      <div className="bg-white dark:bg-gray-900 rounded-xl border border-gray-200 dark:border-gray-700 p-5">
        <h3 className="text-lg font-semibold text-blue-800 dark:text-blue-400 border-b border-blue-200 dark:border-blue-800 pb-2 mb-4">
          Evolução do patrimônio
        </h3>

        <div className="space-y-3">
          <Row label="Valor investido" value={formatBRL(projection.initialAmount)} />
          <Row label="Saldo final" value={formatBRL(projection.finalAmount)} />
          <Row label="Valor corrigido pelo IPCA" value={formatBRL(projection.inflationAdjustedAmount)} />
          <Row label="Saldo final em poder de compra inicial" value={formatBRL(projection.realAmount)} />
        </div>

        <div
          className={`mt-4 p-4 rounded-lg ${
            projection.realGainAmount >= 0
              ? 'bg-green-50 dark:bg-green-900/30'
              : 'bg-red-50 dark:bg-red-900/30'
          }`}
        >
          <div className="text-sm text-gray-600 dark:text-gray-400">Ganho real</div>
          <div className="text-2xl font-bold text-gray-900 dark:text-gray-100">
            {formatBRL(projection.realGainAmount)}
          </div>
        </div>
      </div>

      {result.warnings.length > 0 ? (
        <p className="text-sm text-amber-700 dark:text-amber-400">
          {result.warnings.length} cotação(ões) inválida(s) ou repetida(s) foram ignoradas no cálculo.
        </p>
      ) : null}
    </div>
  );
}
