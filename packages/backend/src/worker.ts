/**
 * Standalone worker process for background jobs
 *
 * Run with: npm run worker
 */
import 'dotenv/config';
import { startWorkers, stopWorkers, closeQueues } from './jobs/index.js';
import { setupScheduledJobs, removeScheduledJobs } from './jobs/scheduler.js';
import { closeRedisConnection } from './lib/redis.js';
import { openConfiguredStore } from './plugins/store.plugin.js';

async function main() {
  console.log('Kitpool Background Worker');
  console.log('=========================');

  const store = openConfiguredStore((summary, message) => console.log(message, summary));

  // Start workers
  await startWorkers(store);

  // Set up scheduled jobs
  await setupScheduledJobs();

  // Graceful shutdown handling
  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    try {
      await removeScheduledJobs();
      await stopWorkers();
      await closeQueues();
      await closeRedisConnection();
      store.close();
      console.log('Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Keep the process running
  console.log('\nWorker is running. Press Ctrl+C to stop.\n');
}

main().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
