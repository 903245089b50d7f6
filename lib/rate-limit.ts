import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import logger from './logger';
import {
  RATE_LIMIT_DEFAULT_MAX_CONCURRENT,
  RATE_LIMIT_DEFAULT_MAX_GLOBAL_CONCURRENT,
  RATE_LIMIT_MAX_ENTRIES,
  RATE_LIMIT_EVICTION_PERCENT,
  RATE_LIMIT_CLEANUP_INTERVAL_MS,
  RATE_LIMIT_DEFAULT_ABUSE_LIMIT,
  RATE_LIMIT_WINDOW_MS,
} from './constants';

/**
 * Adaptive throttling for route handlers: concurrent-request caps (global and
 * per endpoint) plus a per-IP request budget against abuse.
 */

let globalActiveRequests = 0;
const endpointActiveRequests = new Map<string, number>();

export interface ThrottleConfig {
  /** Endpoint name, used in logs and as the per-endpoint counter key */
  name: string;
  maxConcurrent?: number;
  maxGlobalConcurrent?: number;
  /** Requests per window per IP */
  abuseLimit?: number;
}

type RouteHandler = (req: NextRequest) => Promise<Response> | Response;

export function getLoadMetrics(): {
  globalActive: number;
  byEndpoint: Record<string, number>;
} {
  return {
    globalActive: globalActiveRequests,
    byEndpoint: Object.fromEntries(endpointActiveRequests),
  };
}

function busy(message: string): Response {
  return NextResponse.json(
    { error: message, code: 'SERVER_BUSY' },
    { status: 503, headers: { 'Retry-After': '2' } }
  );
}

function withConcurrentLimit(handler: RouteHandler, config: ThrottleConfig): RouteHandler {
  const maxConcurrent = config.maxConcurrent ?? RATE_LIMIT_DEFAULT_MAX_CONCURRENT;
  const maxGlobal = config.maxGlobalConcurrent ?? RATE_LIMIT_DEFAULT_MAX_GLOBAL_CONCURRENT;

  return async (req: NextRequest): Promise<Response> => {
    const endpointActive = endpointActiveRequests.get(config.name) ?? 0;

    if (globalActiveRequests >= maxGlobal) {
      logger.warn(
        { endpoint: config.name, globalActive: globalActiveRequests, maxGlobal },
        'Global concurrent limit reached'
      );
      return busy('Server is busy. Please try again shortly.');
    }

    if (endpointActive >= maxConcurrent) {
      logger.warn({ endpoint: config.name, endpointActive, maxConcurrent }, 'Endpoint concurrent limit reached');
      return busy('This endpoint is busy. Please try again shortly.');
    }

    globalActiveRequests++;
    endpointActiveRequests.set(config.name, endpointActive + 1);

    try {
      return await handler(req);
    } finally {
      globalActiveRequests--;
      const current = endpointActiveRequests.get(config.name) ?? 1;
      if (current <= 1) {
        endpointActiveRequests.delete(config.name);
      } else {
        endpointActiveRequests.set(config.name, current - 1);
      }
    }
  };
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

// Bounded so a flood of distinct IPs cannot grow it without limit
const rateLimitStore = new Map<string, RateLimitEntry>();

function setRateLimitEntry(key: string, entry: RateLimitEntry): void {
  if (rateLimitStore.size >= RATE_LIMIT_MAX_ENTRIES && !rateLimitStore.has(key)) {
    const now = Date.now();
    const toEvict = Math.ceil(RATE_LIMIT_MAX_ENTRIES * RATE_LIMIT_EVICTION_PERCENT);

    let evicted = 0;
    for (const [k, v] of rateLimitStore.entries()) {
      if (evicted >= toEvict) break;
      if (v.resetAt < now) {
        rateLimitStore.delete(k);
        evicted++;
      }
    }

    // Still full: drop the oldest insertions
    for (const k of rateLimitStore.keys()) {
      if (rateLimitStore.size < RATE_LIMIT_MAX_ENTRIES) break;
      rateLimitStore.delete(k);
    }
  }

  rateLimitStore.set(key, entry);
}

const cleanupInterval = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of rateLimitStore.entries()) {
    if (entry.resetAt < now) {
      rateLimitStore.delete(key);
    }
  }
}, RATE_LIMIT_CLEANUP_INTERVAL_MS);
// Never keep the process alive just for housekeeping
cleanupInterval.unref();

/** Clear all per-IP counters */
export function resetRateLimits(): void {
  rateLimitStore.clear();
}

/**
 * Client IP as reported by the reverse proxy.
 * x-forwarded-for can be spoofed when the app is exposed directly.
 */
function getClientIp(req: NextRequest): string {
  const forwarded = req.headers.get('x-forwarded-for');
  if (forwarded) {
    return forwarded.split(',')[0]?.trim() || 'unknown';
  }
  return req.headers.get('x-real-ip')?.trim() || 'unknown';
}

export function withThrottle(handler: RouteHandler, config: ThrottleConfig): RouteHandler {
  const abuseLimit = config.abuseLimit ?? RATE_LIMIT_DEFAULT_ABUSE_LIMIT;
  const concurrentLimited = withConcurrentLimit(handler, config);

  return async (req: NextRequest): Promise<Response> => {
    const ip = getClientIp(req);
    const key = `abuse:${config.name}:${ip}`;
    const now = Date.now();
    const entry = rateLimitStore.get(key);

    if (entry && entry.resetAt > now && entry.count >= abuseLimit) {
      logger.warn({ ip, endpoint: config.name, count: entry.count }, 'Abuse limit reached');
      return NextResponse.json(
        { error: 'Too many requests. Please slow down.', code: 'RATE_LIMITED' },
        {
          status: 429,
          headers: { 'Retry-After': String(Math.ceil((entry.resetAt - now) / 1000)) },
        }
      );
    }

    if (!entry || entry.resetAt <= now) {
      setRateLimitEntry(key, { count: 1, resetAt: now + RATE_LIMIT_WINDOW_MS });
    } else {
      entry.count++;
    }

    return concurrentLimited(req);
  };
}

export const ThrottlePresets = {
  /** Calls both providers and runs the calculation */
  expensive: { maxConcurrent: 10, abuseLimit: 100 },
  /** Mostly served from the IPCA cache */
  standard: { maxConcurrent: 20, abuseLimit: 200 },
  /** Status endpoints */
  light: { maxConcurrent: 50, abuseLimit: 300 },
} as const;
