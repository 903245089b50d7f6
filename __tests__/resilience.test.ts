import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CircuitBreaker,
  CircuitOpenError,
  CircuitState,
  HttpStatusError,
  createResilientFetch,
  getCircuitBreakerStatus,
  isRetryableError,
  resetCircuitBreakers,
} from '@/lib/resilience';
import { Semaphore } from '@/lib/semaphore';

describe('isRetryableError', () => {
  it.each([
    [new HttpStatusError(503, 'https://example.test'), true],
    [new HttpStatusError(429, 'https://example.test'), true],
    [new HttpStatusError(400, 'https://example.test'), false],
    [new Error('Request timeout after 10000ms: https://example.test'), true],
    [new TypeError('fetch failed'), true],
    [new Error('read ECONNRESET'), true],
    [new Error('Unexpected chart response: Required'), false],
    ['network', false],
  ])('%s -> %s', (error, expected) => {
    expect(isRetryableError(error)).toBe(expected);
  });
});

describe('CircuitBreaker', () => {
  beforeEach(() => {
    resetCircuitBreakers();
  });

  it('opens once the failure threshold is reached', () => {
    const breaker = new CircuitBreaker({ name: 'cb-threshold', failureThreshold: 2, resetTimeoutMs: 60_000 });

    breaker.recordFailure(new Error('boom'));
    expect(breaker.canExecute()).toBe(true);

    breaker.recordFailure(new Error('boom'));
    expect(breaker.getState()).toEqual({ state: CircuitState.OPEN, failures: 2 });
    expect(breaker.canExecute()).toBe(false);
  });

  it('lets a single trial request through after the reset timeout', () => {
    const breaker = new CircuitBreaker({ name: 'cb-probe', failureThreshold: 1, resetTimeoutMs: 0 });
    breaker.recordFailure(new Error('boom'));

    expect(breaker.canExecute()).toBe(true);
    expect(breaker.getState().state).toBe(CircuitState.HALF_OPEN);
    expect(breaker.canExecute()).toBe(false);

    breaker.recordSuccess();
    expect(breaker.getState()).toEqual({ state: CircuitState.CLOSED, failures: 0 });
  });

  it('re-opens when the probe fails', () => {
    const breaker = new CircuitBreaker({ name: 'cb-reopen', failureThreshold: 1, resetTimeoutMs: 0 });
    breaker.recordFailure(new Error('boom'));
    breaker.canExecute();

    breaker.recordFailure(new Error('still down'));

    expect(breaker.getState().state).toBe(CircuitState.OPEN);
  });

  it('shares state by name', () => {
    new CircuitBreaker({ name: 'cb-shared', failureThreshold: 1 }).recordFailure(new Error('boom'));

    expect(getCircuitBreakerStatus()['cb-shared']).toEqual({ state: CircuitState.OPEN, failures: 1 });
  });
});

describe('createResilientFetch', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    resetCircuitBreakers();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('retries a 5xx answer and returns the next success', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 503 }))
      .mockResolvedValueOnce(new Response('[]', { status: 200 }));
    const resilientFetch = createResilientFetch('rf-retry', { retry: { initialDelayMs: 1 } });

    const response = await resilientFetch('https://example.test/data');

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns a 404 untouched without retrying', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }));
    const resilientFetch = createResilientFetch('rf-404', { retry: { initialDelayMs: 1 } });

    const response = await resilientFetch('https://example.test/missing');

    expect(response.status).toBe(404);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 500 }));
    const resilientFetch = createResilientFetch('rf-exhaust', {
      retry: { maxRetries: 2, initialDelayMs: 1 },
    });

    await expect(resilientFetch('https://example.test/down')).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('fails fast once the circuit is open', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 500 }));
    const resilientFetch = createResilientFetch('rf-open', {
      circuit: { failureThreshold: 2, resetTimeoutMs: 60_000 },
      retry: { maxRetries: 0 },
    });

    await expect(resilientFetch('https://example.test/down')).rejects.toBeInstanceOf(HttpStatusError);
    await expect(resilientFetch('https://example.test/down')).rejects.toBeInstanceOf(HttpStatusError);
    await expect(resilientFetch('https://example.test/down')).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('Semaphore', () => {
  it('rejects a non-positive size', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore size must be a positive integer, got 0');
  });

  it('queues work beyond its size and releases in order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = semaphore.run(async () => {
      await firstGate;
      order.push('first');
    });
    const second = semaphore.run(async () => {
      order.push('second');
    });

    expect(semaphore.inFlight).toBe(1);
    expect(semaphore.queued).toBe(1);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.inFlight).toBe(0);
  });

  it('releases the slot when the task fails', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(semaphore.run(() => Promise.resolve(42))).resolves.toBe(42);
  });
});
