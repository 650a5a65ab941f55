import type { Job } from 'bullmq';
import { getCacheGeneration } from '../../lib/redis.js';
import { MatchingService } from '../../services/matching.service.js';
import type { AssetStore } from '../../store/snapshot-store.js';
import type { AnalyticsRefreshJobData } from '../queue.js';

/** The parts of a BullMQ job the processor touches. */
export type AnalyticsRefreshJob = Pick<Job<AnalyticsRefreshJobData>, 'id' | 'data' | 'log'>;

export interface AnalyticsRefreshResult {
  keysWarmed: number;
  superseded: boolean;
  refreshedAt: string;
}

/**
 * Build the processor for analytics refresh jobs.
 *
 * Each run reads a fresh snapshot and writes demand scores, gap analysis and
 * the collaboration graph back to the cache.
 */
export function createAnalyticsRefreshProcessor(store: AssetStore) {
  const matching = new MatchingService(store);

  return async function processAnalyticsRefresh(job: AnalyticsRefreshJob): Promise<AnalyticsRefreshResult> {
    await job.log(`Triggered by: ${job.data.triggeredBy} at ${job.data.timestamp}`);

    if (job.data.generation !== null) {
      const current = await getCacheGeneration();
      if (current !== null && current > job.data.generation) {
        await job.log(`Superseded by generation ${current}`);
        return { keysWarmed: 0, superseded: true, refreshedAt: new Date().toISOString() };
      }
    }

    const { keys } = await matching.warmCache();
    await job.log(`Warmed ${keys.length} cache entries: ${keys.join(', ')}`);

    return {
      keysWarmed: keys.length,
      superseded: false,
      refreshedAt: new Date().toISOString(),
    };
  };
}
