import { getAnalyticsRefreshQueue } from './queue.js';

/**
 * Set up recurring jobs using BullMQ's repeatable jobs feature
 */
export async function setupScheduledJobs(): Promise<void> {
  console.log('Setting up scheduled jobs...');

  const analyticsRefreshQueue = getAnalyticsRefreshQueue();

  // Schedule analytics refresh every 15 minutes
  await analyticsRefreshQueue.add(
    'scheduled-refresh',
    {
      triggeredBy: 'scheduled',
      timestamp: new Date().toISOString(),
      generation: null,
    },
    {
      repeat: {
        pattern: '*/15 * * * *',
      },
      jobId: 'scheduled-analytics-refresh',
    },
  );

  console.log('Scheduled jobs configured:');
  console.log('- Analytics refresh: every 15 minutes');
}

/**
 * Remove all scheduled jobs (for cleanup)
 */
export async function removeScheduledJobs(): Promise<void> {
  const analyticsRefreshQueue = getAnalyticsRefreshQueue();
  const repeatableJobs = await analyticsRefreshQueue.getRepeatableJobs();
  for (const job of repeatableJobs) {
    await analyticsRefreshQueue.removeRepeatableByKey(job.key);
  }

  console.log('Scheduled jobs removed');
}
