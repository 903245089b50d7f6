/**
 * Centralized constants for the real return calculator
 */

// Outcome classification
export const BREAK_EVEN_TOLERANCE = 1e-9; // |totalRealPct| below this is break-even

// Investment projection
export const DEFAULT_INITIAL_AMOUNT = 1000; // R$
export const MAX_INITIAL_AMOUNT = 1e12;

// Tickers: B3 codes are four letters plus a one or two digit share class (PETR4, TAEE11)
export const B3_TICKER_PATTERN = /^[A-Z]{4}\d{1,2}$/;
export const B3_SUFFIX = '.SA';
export const VALID_TICKER_PATTERN = /^[A-Za-z0-9.^=-]{1,20}$/;

// IPCA (BCB SGS)
export const IPCA_SGS_SERIES = 433; // IPCA, monthly % change
export const IPCA_HISTORY_START = '1995-01-01'; // First full year after the Plano Real
export const IPCA_BASE_INDEX = 100;
export const IPCA_LEAD_MONTHS = 1; // Months returned before the window to anchor the first price date

// Provider endpoints (overridable for self-hosted mirrors)
export const BCB_SGS_URL = process.env.BCB_SGS_URL ?? 'https://api.bcb.gov.br/dados/serie';
export const YAHOO_CHART_URL =
  process.env.YAHOO_CHART_URL ?? 'https://query1.finance.yahoo.com/v8/finance/chart';
export const DEFAULT_EXCHANGE_TIMEZONE = 'America/Sao_Paulo';

// Cache durations (in seconds)
export const CACHE_IPCA_HISTORY = 43200; // 12 hours
export const CACHE_PRICE_HISTORY = 3600; // 1 hour
export const CACHE_MEMORY_MAX_ENTRIES = 500;
export const CACHE_MEMORY_EVICTION_PERCENT = 0.1;

// Resilience
export const RESILIENCE_DEFAULT_TIMEOUT_MS = 10_000;
export const RESILIENCE_DEFAULT_FAILURE_THRESHOLD = 5;
export const RESILIENCE_DEFAULT_RESET_TIMEOUT_MS = 30_000;
export const RESILIENCE_DEFAULT_MAX_RETRIES = 2;
export const RESILIENCE_DEFAULT_INITIAL_DELAY_MS = 500;
export const RESILIENCE_DEFAULT_MAX_DELAY_MS = 5_000;
export const RESILIENCE_DEFAULT_BACKOFF_MULTIPLIER = 2;
export const YAHOO_TIMEOUT_MS = 15_000;
export const BCB_TIMEOUT_MS = 20_000; // SGS is slow on long ranges
export const BCB_RESET_TIMEOUT_MS = 60_000;

// Outbound concurrency
export const EXTERNAL_API_MAX_CONCURRENT = 4;

// Rate limiting
export const RATE_LIMIT_DEFAULT_MAX_CONCURRENT = 20;
export const RATE_LIMIT_DEFAULT_MAX_GLOBAL_CONCURRENT = 100;
export const RATE_LIMIT_DEFAULT_ABUSE_LIMIT = 200; // requests per window per IP
export const RATE_LIMIT_WINDOW_MS = 60_000;
export const RATE_LIMIT_MAX_ENTRIES = 10_000;
export const RATE_LIMIT_EVICTION_PERCENT = 0.1;
export const RATE_LIMIT_CLEANUP_INTERVAL_MS = 60_000;
