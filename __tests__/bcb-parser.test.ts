import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Straight to the fetcher, no memory or disk layer
vi.mock('@/lib/file-cache', () => ({
  getWithCache: vi.fn((_filename: string, fetchFn: () => Promise<unknown>) => fetchFn()),
}));

import { buildIndexSeries, fetchIpcaIndex, parseSgsResponse } from '@/lib/bcb';
import { DataUnavailableError } from '@/lib/errors';
import { resetCircuitBreakers } from '@/lib/resilience';

// SGS series 433 shape: one row per month, dated on the 1st
const SGS_RESPONSE = [
  { data: '01/12/2023', valor: '0.56' },
  { data: '01/01/2024', valor: '0.42' },
  { data: '01/02/2024', valor: '0.83' },
  { data: '01/03/2024', valor: '0.16' },
  { data: '01/04/2024', valor: '0.38' },
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('parseSgsResponse', () => {
  it('maps rows to monthly observations', () => {
    expect(parseSgsResponse(SGS_RESPONSE.slice(0, 2))).toEqual([
      { period: '2023-12', monthlyPct: 0.56 },
      { period: '2024-01', monthlyPct: 0.42 },
    ]);
  });

  it('accepts comma decimals and numeric values', () => {
    const result = parseSgsResponse([
      { data: '01/05/2024', valor: '0,46' },
      { data: '01/06/2024', valor: 0.21 },
    ]);

    expect(result).toEqual([
      { period: '2024-05', monthlyPct: 0.46 },
      { period: '2024-06', monthlyPct: 0.21 },
    ]);
  });

  it('sorts by period and keeps the last row of a repeated month', () => {
    const result = parseSgsResponse([
      { data: '01/03/2024', valor: '0.16' },
      { data: '01/01/2024', valor: '0.40' },
      { data: '01/01/2024', valor: '0.42' },
    ]);

    expect(result).toEqual([
      { period: '2024-01', monthlyPct: 0.42 },
      { period: '2024-03', monthlyPct: 0.16 },
    ]);
  });

  it('skips rows with an unreadable date or value', () => {
    const result = parseSgsResponse([
      { data: '2024-01-01', valor: '0.42' },
      { data: '01/02/2024', valor: '' },
      { data: '01/05/2024', valor: '   ' },
      { data: '01/03/2024', valor: 'n/a' },
      { data: '01/04/2024', valor: '0.38' },
    ]);

    expect(result).toEqual([{ period: '2024-04', monthlyPct: 0.38 }]);
  });

  it('returns an empty list for an empty payload', () => {
    expect(parseSgsResponse([])).toEqual([]);
  });

  it('rejects a payload that is not a row list', () => {
    expect(() => parseSgsResponse({ erro: 'serie inexistente' })).toThrow(/^Unexpected SGS response/);
  });
});

describe('buildIndexSeries', () => {
  it('chains monthly changes from a base of 100', () => {
    const result = buildIndexSeries([
      { period: '2024-01', monthlyPct: 0.5 },
      { period: '2024-02', monthlyPct: 1 },
      { period: '2024-03', monthlyPct: -0.5 },
    ]);

    expect(result.map((p) => p.period)).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(result[0]?.indexValue).toBeCloseTo(100.5, 10);
    expect(result[1]?.indexValue).toBeCloseTo(101.505, 10);
    expect(result[2]?.indexValue).toBeCloseTo(100.997475, 10);
  });

  it('returns an empty series for no observations', () => {
    expect(buildIndexSeries([])).toEqual([]);
  });
});

describe('fetchIpcaIndex', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    resetCircuitBreakers();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the window plus one lead month, rebased to 100', async () => {
    fetchMock.mockResolvedValue(jsonResponse(SGS_RESPONSE));

    const result = await fetchIpcaIndex('2024-02-15', '2024-03-31');

    expect(result.map((p) => p.period)).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(result[0]?.indexValue).toBeCloseTo(100.42, 10);
    expect(result[1]?.indexValue).toBeCloseTo(100.42 * 1.0083, 10);
    expect(result[2]?.indexValue).toBeCloseTo(100.42 * 1.0083 * 1.0016, 10);
  });

  it('queries series 433 with BCB formatted dates', async () => {
    fetchMock.mockResolvedValue(jsonResponse(SGS_RESPONSE));

    await fetchIpcaIndex('2024-02-15', '2024-03-31');

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.pathname).toContain('/bcdata.sgs.433/dados');
    expect(url.searchParams.get('formato')).toBe('json');
    expect(url.searchParams.get('dataInicial')).toBe('01/01/1995');
  });

  it('wraps provider failures in DataUnavailableError', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'not found' }, 404));

    await expect(fetchIpcaIndex('2024-02-15', '2024-03-31')).rejects.toMatchObject({
      code: 'DATA_UNAVAILABLE',
      series: 'inflation',
    });
  });

  it('fails with DataUnavailableError when the provider has no observations', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]));

    await expect(fetchIpcaIndex('2024-02-15', '2024-03-31')).rejects.toBeInstanceOf(
      DataUnavailableError
    );
  });
});
