'use client';

import { useState } from 'react';
import type { FormEvent } from 'react';
import type { RealReturnQuery } from '@/types';
import { DEFAULT_INITIAL_AMOUNT } from '@/lib/constants';

interface RealReturnFormProps {
  onSubmit: (query: RealReturnQuery) => void;
  loading: boolean;
}

const today = (): string => new Date().toISOString().split('T')[0] ?? '';

export function RealReturnForm({ onSubmit, loading }: RealReturnFormProps): React.ReactElement {
  const [ticker, setTicker] = useState('PETR4');
  const [start, setStart] = useState('2020-01-02');
  const [end, setEnd] = useState(today);
  const [amount, setAmount] = useState(DEFAULT_INITIAL_AMOUNT);

  const handleSubmit = (e: FormEvent<HTMLFormElement>): void => {
    e.preventDefault();
    onSubmit({ ticker: ticker.trim().toUpperCase(), start, end, amount });
  };

  return (
    <form onSubmit={handleSubmit} className="grid grid-cols-1 md:grid-cols-5 gap-4 items-end">
      <div>
        <label htmlFor="ticker" className="block text-sm text-gray-600 dark:text-gray-400 mb-1">
          Ativo
        </label>
        <input
          id="ticker"
          type="text"
          value={ticker}
          onChange={(e) => setTicker(e.target.value)}
          placeholder="PETR4"
          required
          className="w-full rounded-lg border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-800 px-3 py-2"
        />
      </div>
      <div>
        <label htmlFor="start" className="block text-sm text-gray-600 dark:text-gray-400 mb-1">
          Data inicial
        </label>
        <input
          id="start"
          type="date"
          value={start}
          max={end}
          onChange={(e) => setStart(e.target.value)}
          required
          className="w-full rounded-lg border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-800 px-3 py-2"
        />
      </div>
      <div>
        <label htmlFor="end" className="block text-sm text-gray-600 dark:text-gray-400 mb-1">
          Data final
        </label>
        <input
          id="end"
          type="date"
          value={end}
          min={start}
          onChange={(e) => setEnd(e.target.value)}
          required
          className="w-full rounded-lg border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-800 px-3 py-2"
        />
      </div>
      <div>
        <label htmlFor="amount" className="block text-sm text-gray-600 dark:text-gray-400 mb-1">
          Valor investido, R$
        </label>
        <input
          id="amount"
          type="number"
          min={1}
          step="any"
          value={amount}
          onChange={(e) => setAmount(parseFloat(e.target.value) || 0)}
          required
          className="w-full rounded-lg border border-gray-300 dark:border-gray-600 bg-white dark:bg-gray-800 px-3 py-2"
        />
      </div>
      <button
        type="submit"
        disabled={loading}
        className="rounded-lg bg-blue-600 text-white px-4 py-2 font-medium hover:bg-blue-700 disabled:opacity-50"
      >
        {loading ? 'Calculando…' : 'Calcular'}
      </button>
    </form>
  );
}
