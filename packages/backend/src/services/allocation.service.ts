import { bumpCacheGeneration, invalidateCache, ALLOCATION_SENSITIVE_PATTERNS } from '../lib/redis.js';
import { enqueueAnalyticsRefresh } from '../jobs/queue.js';
import type { AllocateInput, AllocationReceipt, AssetStore, ReleaseInput } from '../store/snapshot-store.js';

export interface AllocationChange extends AllocationReceipt {
  invalidatedKeys: number;
  refreshJobId: string | null;
}

/**
 * Writes go straight to the store; every successful write drops the cached
 * analytics that depend on allocation state and schedules a re-warm.
 */
export class AllocationService {
  constructor(private readonly store: AssetStore) {}

  async allocate(input: AllocateInput): Promise<AllocationChange> {
    const receipt = this.store.allocate(input);
    return { ...receipt, ...(await this.afterChange()) };
  }

  async release(allocationId: string, input: ReleaseInput = {}): Promise<AllocationChange> {
    const receipt = this.store.release(allocationId, input);
    return { ...receipt, ...(await this.afterChange()) };
  }

  private async afterChange(): Promise<Pick<AllocationChange, 'invalidatedKeys' | 'refreshJobId'>> {
    // Bump before deleting so a computation that read the old state can no
    // longer write it back.
    const generation = await bumpCacheGeneration();
    let invalidatedKeys = 0;
    for (const pattern of ALLOCATION_SENSITIVE_PATTERNS) {
      invalidatedKeys += await invalidateCache(pattern);
    }

    let refreshJobId: string | null = null;
    try {
      refreshJobId = await enqueueAnalyticsRefresh('allocation_change', generation);
    } catch (error) {
      // Allocation is already committed; the scheduled refresh re-warms later.
      console.error('[analytics-refresh] enqueue failed:', error);
    }

    return { invalidatedKeys, refreshJobId };
  }
}
