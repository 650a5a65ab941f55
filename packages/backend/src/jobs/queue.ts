import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { loadConfig } from '../lib/config.js';

// Queue names
export const QUEUE_NAMES = {
  ANALYTICS_REFRESH: 'analytics-refresh',
} as const;

/** Delay before a change-triggered refresh runs. */
export const REFRESH_DEBOUNCE_MS = 2000;

// Job data types
export interface AnalyticsRefreshJobData {
  triggeredBy: 'allocation_change' | 'scheduled' | 'manual';
  timestamp: string;
  /** Cache generation the change produced; later generations supersede the job. */
  generation: number | null;
}

/**
 * Redis connection options for BullMQ, from the validated config.
 */
export function getRedisConnection(): ConnectionOptions {
  const { redis } = loadConfig();
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
  };
}

let analyticsRefreshQueue: Queue<AnalyticsRefreshJobData> | null = null;

/**
 * Get or create the analytics refresh queue
 */
export function getAnalyticsRefreshQueue(): Queue<AnalyticsRefreshJobData> {
  if (!analyticsRefreshQueue) {
    analyticsRefreshQueue = new Queue<AnalyticsRefreshJobData>(QUEUE_NAMES.ANALYTICS_REFRESH, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 2000,
        },
        removeOnComplete: true,
        removeOnFail: {
          age: 24 * 3600,
        },
      },
    });
  }
  return analyticsRefreshQueue;
}

/**
 * Close all queue connections
 */
export async function closeQueues(): Promise<void> {
  if (analyticsRefreshQueue) {
    const queue = analyticsRefreshQueue;
    analyticsRefreshQueue = null;
    await queue.close();
  }
}

/**
 * Schedule a cache re-warm after a short delay. Each generation gets its own
 * job; the processor skips a job once a newer generation exists, so a burst
 * of changes ends in one refresh. Returns null without touching Redis when
 * caching is disabled.
 */
export async function enqueueAnalyticsRefresh(
  triggeredBy: AnalyticsRefreshJobData['triggeredBy'],
  generation: number | null = null,
): Promise<string | null> {
  if (!loadConfig().cache.enabled) {
    return null;
  }

  const queue = getAnalyticsRefreshQueue();
  const job = await queue.add(
    'refresh',
    {
      triggeredBy,
      timestamp: new Date().toISOString(),
      generation,
    },
    {
      jobId: generation === null ? undefined : `analytics-refresh-gen-${generation}`,
      delay: REFRESH_DEBOUNCE_MS,
    },
  );

  return job.id ?? null;
}
