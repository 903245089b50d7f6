/**
 * Resilience patterns for the market data providers:
 * - Circuit Breaker: stop calling a provider that keeps failing
 * - Retry with exponential backoff on transient failures
 * - Request timeout via AbortSignal
 */

import logger from './logger';
import {
  RESILIENCE_DEFAULT_TIMEOUT_MS,
  RESILIENCE_DEFAULT_FAILURE_THRESHOLD,
  RESILIENCE_DEFAULT_RESET_TIMEOUT_MS,
  RESILIENCE_DEFAULT_MAX_RETRIES,
  RESILIENCE_DEFAULT_INITIAL_DELAY_MS,
  RESILIENCE_DEFAULT_MAX_DELAY_MS,
  RESILIENCE_DEFAULT_BACKOFF_MULTIPLIER,
  YAHOO_TIMEOUT_MS,
  BCB_TIMEOUT_MS,
  BCB_RESET_TIMEOUT_MS,
} from './constants';

export enum CircuitState {
  CLOSED = 'CLOSED', // requests pass through
  OPEN = 'OPEN', // failing fast
  HALF_OPEN = 'HALF_OPEN', // a single probe decides
}

interface CircuitBreakerConfig {
  /** Name for logging and status reporting */
  name: string;
  /** Consecutive failures before the circuit opens */
  failureThreshold: number;
  /** Time in ms before a probe is allowed through */
  resetTimeoutMs: number;
}

interface CircuitBreakerState {
  state: CircuitState;
  failures: number;
  lastFailureTime: number;
  halfOpenProbeInFlight: boolean;
}

const circuitStates = new Map<string, CircuitBreakerState>();

function getCircuitState(name: string): CircuitBreakerState {
  let state = circuitStates.get(name);
  if (!state) {
    state = {
      state: CircuitState.CLOSED,
      failures: 0,
      lastFailureTime: 0,
      halfOpenProbeInFlight: false,
    };
    circuitStates.set(name, state);
  }
  return state;
}

/** Raised for a 5xx or 429 answer so the retry loop can see the status */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP error status ${status}: ${url}`);
    this.name = 'HttpStatusError';
  }
}

export class CircuitOpenError extends Error {
  constructor(readonly service: string) {
    super(`Service ${service} is unavailable (circuit breaker open)`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
    this.config = {
      failureThreshold: RESILIENCE_DEFAULT_FAILURE_THRESHOLD,
      resetTimeoutMs: RESILIENCE_DEFAULT_RESET_TIMEOUT_MS,
      ...config,
    };
  }

  canExecute(): boolean {
    const state = getCircuitState(this.config.name);

    switch (state.state) {
      case CircuitState.CLOSED:
        return true;

      case CircuitState.OPEN:
        if (Date.now() - state.lastFailureTime < this.config.resetTimeoutMs) {
          return false;
        }
        state.state = CircuitState.HALF_OPEN;
        state.halfOpenProbeInFlight = false;
        logger.info({ circuit: this.config.name }, 'Circuit breaker half-open');
        return this.tryHalfOpenProbe(state);

      case CircuitState.HALF_OPEN:
        return this.tryHalfOpenProbe(state);
    }
  }

  private tryHalfOpenProbe(state: CircuitBreakerState): boolean {
    if (state.halfOpenProbeInFlight) {
      logger.debug({ circuit: this.config.name }, 'Half-open probe already in flight, rejecting');
      return false;
    }
    state.halfOpenProbeInFlight = true;
    return true;
  }

  recordSuccess(): void {
    const state = getCircuitState(this.config.name);

    if (state.state === CircuitState.HALF_OPEN) {
      logger.info({ circuit: this.config.name }, 'Circuit breaker closed (recovered)');
    }
    state.state = CircuitState.CLOSED;
    state.failures = 0;
    state.halfOpenProbeInFlight = false;
  }

  recordFailure(error: unknown): void {
    const state = getCircuitState(this.config.name);
    state.failures++;
    state.lastFailureTime = Date.now();

    if (state.state === CircuitState.HALF_OPEN) {
      state.state = CircuitState.OPEN;
      state.halfOpenProbeInFlight = false;
      logger.warn({ circuit: this.config.name, error }, 'Circuit breaker re-opened (probe failed)');
    } else if (state.failures >= this.config.failureThreshold) {
      state.state = CircuitState.OPEN;
      logger.warn(
        { circuit: this.config.name, failures: state.failures },
        'Circuit breaker opened (threshold reached)'
      );
    }
  }

  getState(): { state: CircuitState; failures: number } {
    const state = getCircuitState(this.config.name);
    return { state: state.state, failures: state.failures };
  }
}

interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: RESILIENCE_DEFAULT_MAX_RETRIES,
  initialDelayMs: RESILIENCE_DEFAULT_INITIAL_DELAY_MS,
  maxDelayMs: RESILIENCE_DEFAULT_MAX_DELAY_MS,
  backoffMultiplier: RESILIENCE_DEFAULT_BACKOFF_MULTIPLIER,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const TRANSIENT_MESSAGES = ['network', 'timeout', 'abort', 'econnrefused', 'econnreset', 'fetch failed'];

/**
 * Network errors, timeouts, 5xx and 429 are worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status >= 500 || error.status === 429;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
  }
  return false;
}

async function withRetry<T>(
  fn: () => Promise<T>,
  name: string,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < maxRetries) {
        logger.warn(
          { name, attempt: attempt + 1, maxRetries, delayMs: delay, error },
          'Retrying after failure'
        );
        await sleep(delay);
        delay = Math.min(delay * backoffMultiplier, maxDelayMs);
      }
    }
  }

  logger.error({ name, maxRetries, error: lastError }, 'All retry attempts failed');
  throw lastError;
}

export async function fetchWithTimeout(
  url: string,
  options: RequestInit = {},
  timeoutMs: number = RESILIENCE_DEFAULT_TIMEOUT_MS
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Request timeout after ${timeoutMs}ms: ${url}`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface ResilientFetchConfig {
  timeoutMs?: number;
  circuit?: Partial<Omit<CircuitBreakerConfig, 'name'>>;
  retry?: Partial<RetryConfig>;
}

export type ResilientFetch = (url: string, options?: RequestInit) => Promise<Response>;

/**
 * Fetch with timeout, retry and a circuit breaker around the whole attempt.
 *
 * 4xx answers other than 429 are returned to the caller untouched (a 404 from
 * a provider usually means "no data", not an outage).
 */
export function createResilientFetch(
  name: string,
  config: ResilientFetchConfig = {}
): ResilientFetch {
  const circuitBreaker = new CircuitBreaker({ name, ...config.circuit });
  const timeoutMs = config.timeoutMs ?? RESILIENCE_DEFAULT_TIMEOUT_MS;

  return async (url: string, options?: RequestInit): Promise<Response> => {
    if (!circuitBreaker.canExecute()) {
      logger.warn({ name, state: circuitBreaker.getState(), url }, 'Circuit breaker is open, failing fast');
      throw new CircuitOpenError(name);
    }

    try {
      const response = await withRetry(
        async () => {
          const resp = await fetchWithTimeout(url, options, timeoutMs);
          if (resp.status >= 500 || resp.status === 429) {
            throw new HttpStatusError(resp.status, url);
          }
          return resp;
        },
        name,
        config.retry
      );

      circuitBreaker.recordSuccess();
      return response;
    } catch (error) {
      circuitBreaker.recordFailure(error);
      throw error;
    }
  };
}

export const yahooFetch = createResilientFetch('yahoo', {
  timeoutMs: YAHOO_TIMEOUT_MS,
});

export const bcbFetch = createResilientFetch('bcb', {
  timeoutMs: BCB_TIMEOUT_MS,
  circuit: {
    resetTimeoutMs: BCB_RESET_TIMEOUT_MS,
  },
});

/**
 * Circuit breaker status for every provider seen so far (monitoring)
 */
export function getCircuitBreakerStatus(): Record<string, { state: CircuitState; failures: number }> {
  const status: Record<string, { state: CircuitState; failures: number }> = {};
  for (const [name, state] of circuitStates.entries()) {
    status[name] = { state: state.state, failures: state.failures };
  }
  return status;
}

/** Forget all circuit state */
export function resetCircuitBreakers(): void {
  circuitStates.clear();
}
