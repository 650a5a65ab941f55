// Queue exports
export {
  QUEUE_NAMES,
  REFRESH_DEBOUNCE_MS,
  getRedisConnection,
  getAnalyticsRefreshQueue,
  closeQueues,
  enqueueAnalyticsRefresh,
} from './queue.js';

export type { AnalyticsRefreshJobData } from './queue.js';

// Worker exports
export { startWorkers, stopWorkers } from './worker.js';

// Scheduler exports
export { setupScheduledJobs, removeScheduledJobs } from './scheduler.js';

// Processor exports (for testing)
export { createAnalyticsRefreshProcessor } from './processors/analytics-refresh.processor.js';
export type { AnalyticsRefreshJob, AnalyticsRefreshResult } from './processors/analytics-refresh.processor.js';
