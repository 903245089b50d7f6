import type { ApiErrorBody, RealReturnQuery, RealReturnResponse } from '@/types';

/** Non-2xx answer from our own API, keeping the machine-readable code */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string' &&
    'code' in value &&
    typeof value.code === 'string'
  );
}

async function toApiError(response: Response, fallback: string): Promise<ApiError> {
  const generic = new ApiError(`${fallback}: ${response.status}`, response.status, 'HTTP_ERROR');
  // Proxies may answer with an HTML error page
  const body: unknown = await response.json().catch(() => null);
  return isApiErrorBody(body) ? new ApiError(body.error, response.status, body.code) : generic;
}

/**
 * API client interface for dependency injection
 */
export interface ApiClient {
  fetchRealReturn: (query: RealReturnQuery) => Promise<RealReturnResponse>;
}

/**
 * Default API client implementation using fetch
 */
export function createApiClient(baseUrl: string = ''): ApiClient {
  return {
    async fetchRealReturn(query: RealReturnQuery): Promise<RealReturnResponse> {
      const params = new URLSearchParams({
        ticker: query.ticker,
        start: query.start,
        end: query.end,
        amount: String(query.amount),
      });
      const response = await fetch(`${baseUrl}/api/real-return?${params.toString()}`);
      if (!response.ok) {
        throw await toApiError(response, 'Failed to fetch real return');
      }
      return response.json();
    },
  };
}

/**
 * Default singleton client for browser usage
 */
export const defaultApiClient = createApiClient();
