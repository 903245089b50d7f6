import { z } from 'zod';
import type { InflationPoint, IsoDate, YearMonth } from '@/types';
import {
  BCB_SGS_URL,
  CACHE_IPCA_HISTORY,
  IPCA_BASE_INDEX,
  IPCA_HISTORY_START,
  IPCA_LEAD_MONTHS,
  IPCA_SGS_SERIES,
} from './constants';
import { addMonths, bcbDateToPeriod, toBcbDate, toIsoDate, toYearMonth } from './dates';
import { DataUnavailableError } from './errors';
import { getWithCache } from './file-cache';
import { externalApiSemaphore } from './semaphore';
import { bcbFetch } from './resilience';
import logger from './logger';

const IPCA_CACHE_FILE = `sgs-${IPCA_SGS_SERIES}-history.json`;
const IPCA_CACHE_MAX_AGE = CACHE_IPCA_HISTORY * 1000;

/** One SGS observation: `data` is DD/MM/YYYY, `valor` a decimal string such as "0.42" */
const sgsRowSchema = z.object({
  data: z.string(),
  valor: z.union([z.string(), z.number()]),
});

const sgsResponseSchema = z.array(sgsRowSchema);

/** Monthly IPCA change in percent */
export interface IpcaObservation {
  period: YearMonth;
  monthlyPct: number;
}

const ipcaObservationSchema = z.array(
  z.object({
    period: z.string().regex(/^\d{4}-\d{2}$/),
    monthlyPct: z.number().finite(),
  })
);

function isIpcaHistory(data: unknown): data is IpcaObservation[] {
  return ipcaObservationSchema.safeParse(data).success;
}

/** "0,42" or "0.42" -> 0.42; blank -> NaN */
function parseDecimal(value: string): number {
  const trimmed = value.trim();
  return trimmed === '' ? Number.NaN : Number(trimmed.replace(',', '.'));
}

/**
 * Parse an SGS JSON payload into monthly observations sorted by period.
 * Rows with an unreadable date or value are skipped.
 */
export function parseSgsResponse(payload: unknown): IpcaObservation[] {
  const parsed = sgsResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected SGS response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const byPeriod = new Map<YearMonth, number>();
  for (const row of parsed.data) {
    const period = bcbDateToPeriod(row.data);
    const value = typeof row.valor === 'number' ? row.valor : parseDecimal(row.valor);
    if (period === null || !Number.isFinite(value)) {
      logger.debug({ row }, 'Skipping unreadable SGS row');
      continue;
    }
    byPeriod.set(period, value);
  }

  return [...byPeriod.entries()]
    .map(([period, monthlyPct]) => ({ period, monthlyPct }))
    .sort((a, b) => a.period.localeCompare(b.period));
}

/**
 * Chain monthly % changes into index levels at each month's close.
 * The level before the first observation is IPCA_BASE_INDEX.
 */
export function buildIndexSeries(observations: readonly IpcaObservation[]): InflationPoint[] {
  let level = IPCA_BASE_INDEX;
  return observations.map(({ period, monthlyPct }) => {
    level *= 1 + monthlyPct / 100;
    return { period, indexValue: level };
  });
}

async function fetchIpcaHistoryFromApi(): Promise<IpcaObservation[]> {
  const params = new URLSearchParams({
    formato: 'json',
    dataInicial: toBcbDate(IPCA_HISTORY_START),
    dataFinal: toBcbDate(toIsoDate(new Date())),
  });
  const url = `${BCB_SGS_URL}/bcdata.sgs.${IPCA_SGS_SERIES}/dados?${params.toString()}`;

  // Semaphore limits concurrency, bcbFetch adds timeout + retry + circuit breaker
  const response = await externalApiSemaphore.run(() =>
    bcbFetch(url, { headers: { Accept: 'application/json' }, cache: 'no-store' })
  );

  if (!response.ok) {
    throw new Error(`BCB SGS error: ${response.status}`);
  }

  const payload: unknown = await response.json();
  return parseSgsResponse(payload);
}

/**
 * Full IPCA history since IPCA_HISTORY_START, cached in memory and on disk
 */
export async function fetchIpcaHistory(): Promise<IpcaObservation[]> {
  return getWithCache(IPCA_CACHE_FILE, fetchIpcaHistoryFromApi, {
    maxAgeMs: IPCA_CACHE_MAX_AGE,
    validate: isIpcaHistory,
  });
}

/**
 * IPCA index levels from IPCA_LEAD_MONTHS before the start month through the
 * end month, rebased so the month before the first returned one is 100.
 */
export async function fetchIpcaIndex(startDate: IsoDate, endDate: IsoDate): Promise<InflationPoint[]> {
  let history: IpcaObservation[];
  try {
    history = await fetchIpcaHistory();
  } catch (error) {
    logger.error({ error, startDate, endDate }, 'Failed to fetch IPCA history');
    throw new DataUnavailableError('inflation', 'IPCA data is unavailable', error);
  }

  if (history.length === 0) {
    throw new DataUnavailableError('inflation', 'BCB returned no IPCA observations');
  }

  const fromPeriod = addMonths(toYearMonth(startDate), -IPCA_LEAD_MONTHS);
  const toPeriod = toYearMonth(endDate);
  const window = history.filter((o) => o.period >= fromPeriod && o.period <= toPeriod);

  return buildIndexSeries(window);
}
