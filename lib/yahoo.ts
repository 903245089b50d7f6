import { z } from 'zod';
import type { IsoDate, PricePoint } from '@/types';
import {
  B3_SUFFIX,
  B3_TICKER_PATTERN,
  CACHE_PRICE_HISTORY,
  DEFAULT_EXCHANGE_TIMEZONE,
  YAHOO_CHART_URL,
} from './constants';
import { toUnixSeconds, unixToZonedDate } from './dates';
import { DataUnavailableError } from './errors';
import { getWithCache } from './file-cache';
import { externalApiSemaphore } from './semaphore';
import { yahooFetch } from './resilience';
import logger from './logger';

const SECONDS_PER_DAY = 86_400;
const PRICE_CACHE_MAX_AGE = CACHE_PRICE_HISTORY * 1000;

const nullableNumbers = z.array(z.number().nullable());

const chartResultSchema = z.object({
  meta: z.object({
    symbol: z.string(),
    currency: z.string().nullish(),
    exchangeTimezoneName: z.string().nullish(),
  }),
  // Absent when the range holds no trading day
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({ close: nullableNumbers.optional() })).optional(),
    adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
  }),
});

const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string().nullish(),
      })
      .nullable(),
  }),
});

export interface PriceHistory {
  symbol: string;
  currency: string | null;
  points: PricePoint[];
}

const priceHistorySchema = z.object({
  symbol: z.string(),
  currency: z.string().nullable(),
  points: z.array(z.object({ date: z.string(), adjustedClose: z.number().nullable() })),
});

function isPriceHistory(data: unknown): data is PriceHistory {
  return priceHistorySchema.safeParse(data).success;
}

/**
 * Provider symbol for a user ticker: bare B3 codes get the `.SA` suffix
 * (PETR4 -> PETR4.SA); anything else is used as typed, upper-cased.
 */
export function normalizeTicker(ticker: string): string {
  const symbol = ticker.trim().toUpperCase();
  return B3_TICKER_PATTERN.test(symbol) ? `${symbol}${B3_SUFFIX}` : symbol;
}

/**
 * Map a Yahoo chart payload to price points.
 * Adjusted closes are preferred; plain closes are the fallback when the
 * provider sends none. Days without a quote keep a null close.
 */
export function parseChartResponse(payload: unknown): PriceHistory {
  const parsed = chartResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected chart response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const { result, error } = parsed.data.chart;
  if (error) {
    throw new Error(`Chart API error ${error.code}: ${error.description ?? 'no description'}`);
  }
  const chart = result?.[0];
  if (!chart) {
    throw new Error('Chart API returned no result');
  }

  const timestamps = chart.timestamp ?? [];
  const closes =
    chart.indicators.adjclose?.[0]?.adjclose ?? chart.indicators.quote?.[0]?.close ?? [];
  const timeZone = chart.meta.exchangeTimezoneName ?? DEFAULT_EXCHANGE_TIMEZONE;

  const points = timestamps.map((ts, i) => ({
    date: unixToZonedDate(ts, timeZone),
    adjustedClose: closes[i] ?? null,
  }));

  return {
    symbol: chart.meta.symbol,
    currency: chart.meta.currency ?? null,
    points,
  };
}

async function fetchPriceHistoryFromApi(
  symbol: string,
  startDate: IsoDate,
  endDate: IsoDate
): Promise<PriceHistory> {
  const params = new URLSearchParams({
    period1: String(toUnixSeconds(startDate)),
    // period2 is exclusive; include the whole end date
    period2: String(toUnixSeconds(endDate) + SECONDS_PER_DAY),
    interval: '1d',
    events: 'div,splits',
    includeAdjustedClose: 'true',
  });
  const url = `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}?${params.toString()}`;

  // Semaphore limits concurrency, yahooFetch adds timeout + retry + circuit breaker
  const response = await externalApiSemaphore.run(() =>
    yahooFetch(url, { headers: { Accept: 'application/json' }, cache: 'no-store' })
  );

  // 404 carries a chart.error payload for unknown symbols
  if (!response.ok && response.status !== 404) {
    throw new Error(`Chart API error: ${response.status}`);
  }

  const payload: unknown = await response.json();
  return parseChartResponse(payload);
}

/**
 * Daily adjusted closes for a ticker over [startDate, endDate]
 */
export async function fetchPriceHistory(
  ticker: string,
  startDate: IsoDate,
  endDate: IsoDate
): Promise<PriceHistory> {
  const symbol = normalizeTicker(ticker);
  const cacheFile = `prices-${symbol.replace(/[^A-Z0-9.-]/g, '_')}-${startDate}-${endDate}.json`;

  let history: PriceHistory;
  try {
    history = await getWithCache(
      cacheFile,
      () => fetchPriceHistoryFromApi(symbol, startDate, endDate),
      // One entry per requested range: memory only
      { maxAgeMs: PRICE_CACHE_MAX_AGE, validate: isPriceHistory, persist: false }
    );
  } catch (error) {
    logger.warn({ error, symbol, startDate, endDate }, 'Failed to fetch price history');
    throw new DataUnavailableError('prices', `Price data for ${symbol} is unavailable`, error);
  }

  if (history.points.length === 0) {
    throw new DataUnavailableError('prices', `No prices found for ${symbol} between ${startDate} and ${endDate}`);
  }

  return history;
}
