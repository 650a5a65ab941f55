import { Redis } from 'ioredis';
import { loadConfig } from './config.js';

let redisClient: Redis | null = null;

export const CACHE_KEYS = {
  demandScores: (lookbackDays: number | null) => `match:demand:${lookbackDays ?? 'all'}`,
  gapAnalysis: () => 'match:gap',
  collaborationGraph: () => 'match:collab',
  optimizeProject: (projectId: string, budget: number | null) =>
    `match:optimize:${projectId}:${budget ?? 'project'}`,
  overview: () => 'analytics:overview',
  costAnalysis: () => 'analytics:cost',
  utilizationTrend: (parts: ReadonlyArray<string | number | null>) =>
    `analytics:trend:${parts.map((p) => p ?? '-').join(':')}`,
};

/** Patterns removed whenever allocation state changes. */
export const ALLOCATION_SENSITIVE_PATTERNS = ['match:*', 'analytics:*'] as const;

/** Bumped on every allocation change; not matched by the patterns above. */
export const CACHE_GENERATION_KEY = 'cache:generation';

// KEYS: generation, entry. ARGV: expected generation, ttl, payload.
const SET_IF_GENERATION_SCRIPT = `
if tonumber(redis.call('GET', KEYS[1]) or '0') ~= tonumber(ARGV[1]) then
  return 0
end
redis.call('SETEX', KEYS[2], ARGV[2], ARGV[3])
return 1
`;

export const CACHE_TTL = {
  OVERVIEW: 120, // 2 minutes
  WARMED: 3600, // entries written by the refresh job
};

/**
 * Get Redis client singleton with retry strategy
 */
export function getRedisClient(): Redis {
  if (redisClient) {
    return redisClient;
  }

  const { redis } = loadConfig();

  redisClient = new Redis({
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    retryStrategy: (times: number) => {
      if (times > 3) {
        return null;
      }
      // 100ms, 200ms, 300ms
      return Math.min(times * 100, 400);
    },
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redisClient.on('error', (err: Error) => {
    console.error('Redis connection error:', err.message);
  });

  redisClient.on('connect', () => {
    console.log('Redis connected');
  });

  return redisClient;
}

function cacheEnabled(): boolean {
  return loadConfig().cache.enabled;
}

/**
 * Get parsed JSON data from cache. Any Redis failure is a miss.
 */
export async function getCachedData<T>(key: string): Promise<T | null> {
  if (!cacheEnabled()) {
    return null;
  }
  try {
    const client = getRedisClient();
    const data = await client.get(key);
    if (!data) {
      return null;
    }
    return JSON.parse(data) as T;
  } catch (error) {
    console.error('Redis get error:', error);
    return null;
  }
}

export interface SetCacheOptions {
  ttl?: number;
  /**
   * Generation read (via getCacheGeneration) before the value was computed.
   * The write is dropped once the generation has moved on; null skips it.
   */
  generation?: number | null;
}

/**
 * Set data in cache with TTL
 */
export async function setCachedData<T>(key: string, data: T, options: SetCacheOptions = {}): Promise<boolean> {
  if (!cacheEnabled() || options.generation === null) {
    return false;
  }
  const ttl = options.ttl ?? loadConfig().cache.ttlSeconds;
  try {
    const client = getRedisClient();
    const payload = JSON.stringify(data);
    if (options.generation === undefined) {
      await client.setex(key, ttl, payload);
      return true;
    }
    const written = await client.eval(
      SET_IF_GENERATION_SCRIPT,
      2,
      CACHE_GENERATION_KEY,
      key,
      options.generation,
      ttl,
      payload,
    );
    return written === 1;
  } catch (error) {
    console.error('Redis set error:', error);
    return false;
  }
}

/**
 * Current cache generation, 0 before the first change. Null when caching is
 * disabled or Redis cannot be read.
 */
export async function getCacheGeneration(): Promise<number | null> {
  if (!cacheEnabled()) {
    return null;
  }
  try {
    const value = await getRedisClient().get(CACHE_GENERATION_KEY);
    return value === null ? 0 : Number(value);
  } catch (error) {
    console.error('Redis generation read error:', error);
    return null;
  }
}

/**
 * Advance the cache generation so in-flight computations cannot write
 * results read before the change.
 */
export async function bumpCacheGeneration(): Promise<number | null> {
  if (!cacheEnabled()) {
    return null;
  }
  try {
    return await getRedisClient().incr(CACHE_GENERATION_KEY);
  } catch (error) {
    console.error('Redis generation bump error:', error);
    return null;
  }
}

/**
 * Delete keys matching pattern
 */
export async function invalidateCache(pattern: string): Promise<number> {
  if (!cacheEnabled()) {
    return 0;
  }
  try {
    const client = getRedisClient();
    const keys = await client.keys(pattern);
    if (keys.length === 0) {
      return 0;
    }
    return await client.del(...keys);
  } catch (error) {
    console.error('Redis invalidate error:', error);
    return 0;
  }
}

/**
 * Check if Redis is available
 */
export async function isRedisAvailable(): Promise<boolean> {
  if (!cacheEnabled()) {
    return false;
  }
  try {
    const client = getRedisClient();
    await client.ping();
    return true;
  } catch {
    return false;
  }
}

/**
 * Close Redis connection (for cleanup)
 */
export async function closeRedisConnection(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
