import { promises as fs } from 'fs';
import path from 'path';
import logger from './logger';
import { CACHE_MEMORY_EVICTION_PERCENT, CACHE_MEMORY_MAX_ENTRIES } from './constants';

const CACHE_DIR = process.env.CACHE_DIR ?? path.join(process.cwd(), 'data', 'cache');

interface CacheEntry<T> {
  timestamp: number;
  data: T;
}

interface MemoryEntry extends CacheEntry<unknown> {
  maxAgeMs: number;
}

// Memory layer, primary source while the process lives.
// Bounded: keys can come from request parameters.
const memoryCache = new Map<string, MemoryEntry>();

function setMemoryEntry(key: string, entry: MemoryEntry): void {
  // Re-inserting moves the key to the end of the eviction order
  memoryCache.delete(key);

  if (memoryCache.size >= CACHE_MEMORY_MAX_ENTRIES) {
    const toEvict = Math.ceil(CACHE_MEMORY_MAX_ENTRIES * CACHE_MEMORY_EVICTION_PERCENT);

    let evicted = 0;
    for (const [k, v] of memoryCache.entries()) {
      if (evicted >= toEvict) break;
      if (isCacheStale(v.timestamp, v.maxAgeMs)) {
        memoryCache.delete(k);
        evicted++;
      }
    }

    // Still full: drop the least recently stored
    for (const k of memoryCache.keys()) {
      if (memoryCache.size < CACHE_MEMORY_MAX_ENTRIES) break;
      memoryCache.delete(k);
    }
  }

  memoryCache.set(key, entry);
}

const SAFE_FILENAME = /^[A-Za-z0-9._-]+\.json$/;

function resolveCachePath(filename: string): string {
  if (!SAFE_FILENAME.test(filename) || filename.includes('..')) {
    throw new Error(`Invalid cache filename: ${filename}`);
  }
  return path.join(CACHE_DIR, filename);
}

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'data' in value &&
    value.data !== undefined &&
    value.data !== null
  );
}

/**
 * Read a cache file; null when missing or unreadable.
 * `validate` narrows the stored payload back to T.
 */
export async function readCache<T>(
  filename: string,
  validate: (data: unknown) => data is T
): Promise<CacheEntry<T> | null> {
  const filepath = resolveCachePath(filename);

  let content: string;
  try {
    content = await fs.readFile(filepath, 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (!isCacheEntry(parsed) || !validate(parsed.data)) {
      logger.warn({ filename }, 'Ignoring malformed cache file');
      return null;
    }
    return { timestamp: parsed.timestamp, data: parsed.data };
  } catch (error) {
    logger.warn({ error, filename }, 'Ignoring unparsable cache file');
    return null;
  }
}

export async function writeCache<T>(filename: string, data: T): Promise<boolean> {
  const filepath = resolveCachePath(filename);

  try {
    await fs.mkdir(CACHE_DIR, { recursive: true });
    const entry: CacheEntry<T> = { timestamp: Date.now(), data };
    await fs.writeFile(filepath, JSON.stringify(entry), 'utf-8');
    logger.debug({ filename }, 'Cache written');
    return true;
  } catch (error) {
    logger.error({ error, filename }, 'Failed to write cache');
    return false;
  }
}

export function isCacheStale(timestamp: number, maxAgeMs: number): boolean {
  return Date.now() - timestamp > maxAgeMs;
}

function fromMemory<T>(filename: string, validate: (data: unknown) => data is T): CacheEntry<T> | null {
  const entry = memoryCache.get(filename);
  if (!entry || !validate(entry.data)) return null;
  return { timestamp: entry.timestamp, data: entry.data };
}

interface CacheOptions<T> {
  maxAgeMs: number;
  validate: (data: unknown) => data is T;
  /** Keep a file copy across restarts; off for keys derived from request parameters */
  persist?: boolean;
}

/**
 * Memory-first cache for provider responses:
 * 1. fresh memory entry
 * 2. fresh file entry (cold start)
 * 3. fetch, store in memory and (in the background) on disk
 * 4. on fetch failure, serve stale data when there is any
 *
 * With `persist: false` the file layer is skipped in both directions.
 */
export async function getWithCache<T>(
  filename: string,
  fetchFn: () => Promise<T>,
  options: CacheOptions<T>
): Promise<T> {
  const { maxAgeMs, validate, persist = true } = options;

  const memoryCached = fromMemory(filename, validate);
  if (memoryCached && !isCacheStale(memoryCached.timestamp, maxAgeMs)) {
    return memoryCached.data;
  }

  const fileCached = persist ? await readCache(filename, validate) : null;
  if (fileCached && !isCacheStale(fileCached.timestamp, maxAgeMs)) {
    setMemoryEntry(filename, { ...fileCached, maxAgeMs });
    logger.debug({ filename, ageMs: Date.now() - fileCached.timestamp }, 'Loaded cache from file');
    return fileCached.data;
  }

  const staleData = memoryCached ?? fileCached;

  try {
    const freshData = await fetchFn();

    if (Array.isArray(freshData) && freshData.length === 0) {
      logger.warn({ filename }, 'Fetch returned empty data, not caching');
      if (staleData) {
        return staleData.data;
      }
      return freshData;
    }

    setMemoryEntry(filename, { timestamp: Date.now(), data: freshData, maxAgeMs });
    if (persist) {
      writeCache(filename, freshData).catch((error: unknown) => {
        logger.error({ error, filename }, 'Failed to write cache to file');
      });
    }

    logger.info({ filename }, 'Cache updated with fresh data');
    return freshData;
  } catch (error) {
    if (staleData) {
      logger.warn({ error, filename, ageMs: Date.now() - staleData.timestamp }, 'Fetch failed, using stale cache');
      return staleData.data;
    }
    throw error;
  }
}

