import { Worker, Job } from 'bullmq';
import { getRedisConnection, QUEUE_NAMES } from './queue.js';
import type { AnalyticsRefreshJobData } from './queue.js';
import {
  createAnalyticsRefreshProcessor,
  type AnalyticsRefreshResult,
} from './processors/analytics-refresh.processor.js';
import type { AssetStore } from '../store/snapshot-store.js';

let analyticsRefreshWorker: Worker<AnalyticsRefreshJobData, AnalyticsRefreshResult> | null = null;

/**
 * Start all background job workers
 */
export async function startWorkers(store: AssetStore): Promise<void> {
  console.log('Starting background job workers...');

  analyticsRefreshWorker = new Worker<AnalyticsRefreshJobData, AnalyticsRefreshResult>(
    QUEUE_NAMES.ANALYTICS_REFRESH,
    createAnalyticsRefreshProcessor(store),
    {
      connection: getRedisConnection(),
      concurrency: 1, // Refreshes read the whole snapshot; one at a time
    },
  );

  analyticsRefreshWorker.on('completed', (job: Job<AnalyticsRefreshJobData>, result: AnalyticsRefreshResult) => {
    console.log(`[analytics-refresh] Job ${job.id} completed: ${result.keysWarmed} keys warmed`);
  });

  analyticsRefreshWorker.on('failed', (job: Job<AnalyticsRefreshJobData> | undefined, err: Error) => {
    console.error(`[analytics-refresh] Job ${job?.id} failed:`, err.message);
  });

  analyticsRefreshWorker.on('error', (err: Error) => {
    console.error('[analytics-refresh] Worker error:', err.message);
  });

  console.log('All workers started successfully');
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(): Promise<void> {
  console.log('Stopping background job workers...');

  if (analyticsRefreshWorker) {
    const worker = analyticsRefreshWorker;
    analyticsRefreshWorker = null;
    await worker.close();
  }

  console.log('All workers stopped');
}
