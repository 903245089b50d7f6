'use client';

import { useState, useCallback } from 'react';
import type { RealReturnQuery, RealReturnResponse } from '@/types';
import { defaultApiClient, ApiError, type ApiClient } from '@/lib/api-client';
import { describeErrorCode } from '@/lib/format';

interface UseRealReturnOptions {
  apiClient?: ApiClient;
}

interface UseRealReturnResult {
  data: RealReturnResponse | null;
  loading: boolean;
  error: string | null;
  calculate: (query: RealReturnQuery) => Promise<void>;
}

export function useRealReturn(options: UseRealReturnOptions = {}): UseRealReturnResult {
  const { apiClient = defaultApiClient } = options;

  const [data, setData] = useState<RealReturnResponse | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const calculate = useCallback(
    async (query: RealReturnQuery): Promise<void> => {
      setLoading(true);
      setError(null);

      try {
        setData(await apiClient.fetchRealReturn(query));
      } catch (err) {
        setData(null);
        setError(err instanceof ApiError ? describeErrorCode(err.code) : describeErrorCode('UNKNOWN'));
      } finally {
        setLoading(false);
      }
    },
    [apiClient]
  );

  return { data, loading, error, calculate };
}
