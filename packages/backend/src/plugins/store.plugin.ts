import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { loadConfig } from '../lib/config.js';
import { openDatabase } from '../store/database.js';
import { loadSeedFile, seedDatabase } from '../store/seed.js';
import { SqliteAssetStore, type AssetStore } from '../store/snapshot-store.js';

declare module 'fastify' {
  interface FastifyInstance {
    store: AssetStore;
  }
}

export interface StorePluginOptions {
  /** Use this store instead of opening the configured database. */
  store?: AssetStore;
}

export type SeedReporter = (summary: Record<string, unknown>, message: string) => void;

/**
 * Open the configured SQLite database, seeding it when SEED_PATH is set.
 */
export function openConfiguredStore(report: SeedReporter): AssetStore {
  const { databasePath, seedPath } = loadConfig();
  const db = openDatabase(databasePath);

  if (seedPath) {
    const summary = seedDatabase(db, loadSeedFile(seedPath));
    report({ seedPath, ...summary }, 'Seed data applied');
  }

  return new SqliteAssetStore(db);
}

/**
 * Expose the asset store as `fastify.store`; it is closed with the server.
 */
async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions): Promise<void> {
  const store = options.store ?? openConfiguredStore((summary, message) => fastify.log.info(summary, message));
  fastify.decorate('store', store);

  fastify.addHook('onClose', async () => {
    store.close();
  });
}

export default fp(storePlugin, {
  name: 'store',
});
