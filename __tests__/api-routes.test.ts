import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';

// Mock the providers
vi.mock('@/lib/yahoo', () => ({
  fetchPriceHistory: vi.fn(),
}));

vi.mock('@/lib/bcb', () => ({
  fetchIpcaIndex: vi.fn(),
}));

import { fetchPriceHistory } from '@/lib/yahoo';
import type { PriceHistory } from '@/lib/yahoo';
import { fetchIpcaIndex } from '@/lib/bcb';
import { DataUnavailableError } from '@/lib/errors';
import { resetRateLimits } from '@/lib/rate-limit';
import type { InflationPoint } from '@/types';

// Import route handlers
import { GET as getRealReturn } from '@/app/api/real-return/route';
import { GET as getInflation } from '@/app/api/inflation/route';
import { GET as getHealth } from '@/app/api/health/route';

const mockHistory: PriceHistory = {
  symbol: 'PETR4.SA',
  currency: 'BRL',
  points: [
    { date: '2024-01-15', adjustedClose: 100 },
    { date: '2024-02-15', adjustedClose: 110 },
    { date: '2024-03-15', adjustedClose: 121 },
  ],
};

const mockIndex: InflationPoint[] = [
  { period: '2024-01', indexValue: 100 },
  { period: '2024-02', indexValue: 105 },
  { period: '2024-03', indexValue: 110.25 },
];

function request(path: string): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    headers: { 'x-forwarded-for': '203.0.113.7' },
  });
}

describe('GET /api/real-return', () => {
  beforeEach(() => {
    vi.mocked(fetchPriceHistory).mockReset();
    vi.mocked(fetchIpcaIndex).mockReset();
    resetRateLimits();
  });

  it('returns the real return and the projection', async () => {
    vi.mocked(fetchPriceHistory).mockResolvedValue(mockHistory);
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex);

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31&amount=1000')
    );
    const data = await response.json();

    expect(response.status).toBe(200);
    expect(data.ticker).toBe('PETR4.SA');
    expect(data.result.outcome).toBe('REAL_GAIN');
    expect(data.result.realSeries).toHaveLength(3);
    expect(data.result.totalRealPct).toBeCloseTo(9.75056689342404, 8);
    expect(data.projection.initialAmount).toBe(1000);
    expect(data.projection.finalAmount).toBeCloseTo(1210, 8);
    expect(fetchPriceHistory).toHaveBeenCalledWith('PETR4', '2024-01-01', '2024-03-31');
    expect(fetchIpcaIndex).toHaveBeenCalledWith('2024-01-01', '2024-03-31');
  });

  it('defaults the initial amount to 1000', async () => {
    vi.mocked(fetchPriceHistory).mockResolvedValue(mockHistory);
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex);

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(data.projection.initialAmount).toBe(1000);
  });

  it('returns 400 without a ticker', async () => {
    const response = await getRealReturn(request('/api/real-return?start=2024-01-01&end=2024-03-31'));
    const data = await response.json();

    expect(response.status).toBe(400);
    expect(data.code).toBe('INVALID_REQUEST');
    expect(fetchPriceHistory).not.toHaveBeenCalled();
  });

  it('returns 400 for a ticker with consecutive dots', async () => {
    const response = await getRealReturn(
      request('/api/real-return?ticker=A..B&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(response.status).toBe(400);
    expect(data).toEqual({ error: 'ticker: invalid ticker format', code: 'INVALID_REQUEST' });
    expect(fetchPriceHistory).not.toHaveBeenCalled();
  });

  it('returns 400 for a reversed window', async () => {
    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-03-31&end=2024-01-01')
    );
    const data = await response.json();

    expect(response.status).toBe(400);
    expect(data.error).toBe('start: start must not be after end');
  });

  it('returns 400 for a non-positive amount', async () => {
    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31&amount=-5')
    );

    expect(response.status).toBe(400);
  });

  it('returns 502 when a provider is down', async () => {
    vi.mocked(fetchPriceHistory).mockRejectedValue(
      new DataUnavailableError('prices', 'Price data for PETR4.SA is unavailable')
    );
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex);

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(response.status).toBe(502);
    expect(data).toEqual({
      error: 'Price data for PETR4.SA is unavailable',
      code: 'DATA_UNAVAILABLE',
      series: 'prices',
    });
  });

  it('returns 422 when inflation starts after the first price', async () => {
    vi.mocked(fetchPriceHistory).mockResolvedValue(mockHistory);
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex.slice(1));

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(response.status).toBe(422);
    expect(data).toMatchObject({ code: 'INSUFFICIENT_LEAD_DATA', series: 'inflation', date: '2024-01-15' });
  });

  it('returns 404 when no inflation falls in the window', async () => {
    vi.mocked(fetchPriceHistory).mockResolvedValue(mockHistory);
    vi.mocked(fetchIpcaIndex).mockResolvedValue([{ period: '2023-12', indexValue: 100 }]);

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(response.status).toBe(404);
    expect(data.code).toBe('EMPTY_RANGE');
  });

  it('hides unexpected errors behind a generic 500', async () => {
    vi.mocked(fetchPriceHistory).mockRejectedValue(new Error('socket hang up'));
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex);

    const response = await getRealReturn(
      request('/api/real-return?ticker=PETR4&start=2024-01-01&end=2024-03-31')
    );
    const data = await response.json();

    expect(response.status).toBe(500);
    expect(data).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });
});

describe('GET /api/inflation', () => {
  beforeEach(() => {
    vi.mocked(fetchIpcaIndex).mockReset();
    resetRateLimits();
  });

  it('returns the index points for the window', async () => {
    vi.mocked(fetchIpcaIndex).mockResolvedValue(mockIndex);

    const response = await getInflation(request('/api/inflation?start=2024-01-01&end=2024-03-31'));
    const data = await response.json();

    expect(response.status).toBe(200);
    expect(data).toEqual({ points: mockIndex });
  });

  it('returns 400 for an impossible date', async () => {
    const response = await getInflation(request('/api/inflation?start=2024-02-30&end=2024-03-31'));
    const data = await response.json();

    expect(response.status).toBe(400);
    expect(data.error).toBe('start: must be a valid YYYY-MM-DD date');
  });
});

describe('GET /api/health', () => {
  it('reports status and load', async () => {
    const response = await getHealth(request('/api/health'));
    const data = await response.json();

    expect(response.status).toBe(200);
    expect(data.status).toBe('ok');
    expect(data.load).toEqual({ globalActive: 1, byEndpoint: { health: 1 } });
  });
});
