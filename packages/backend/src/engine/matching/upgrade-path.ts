import type { Asset, CapabilityMap } from '../../snapshot/types.js';
import { meetsAll, strictlyDominates } from './capability.js';
import { compareIds } from './order.js';

export type UpgradeTarget =
  | { readonly assetId: string }
  | { readonly capability: CapabilityMap };

/**
 * Shortest chain of strict upgrades from `source` to the nearest asset that
 * is (or meets) the target, over the given pool (normally the non-retired
 * assets of the source's category).
 *
 * Returns `[source.id]` when the source already qualifies and `[]` when no
 * chain exists. Neighbours are expanded in id order, so among equally short
 * chains the lexicographically smallest is returned.
 */
export function findUpgradePath(source: Asset, target: UpgradeTarget, pool: readonly Asset[]): string[] {
  const qualifies = (asset: Asset): boolean =>
    'assetId' in target ? asset.id === target.assetId : meetsAll(asset.specifications, target.capability);

  const candidates = pool
    .filter((a) => a.id !== source.id && a.categoryId === source.categoryId)
    .sort((a, b) => compareIds(a.id, b.id));

  const previous = new Map<string, string | null>([[source.id, null]]);
  const queue: Asset[] = [source];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];

    if (qualifies(current)) {
      const path: string[] = [];
      let cursor: string | null = current.id;
      while (cursor !== null) {
        path.push(cursor);
        cursor = previous.get(cursor) ?? null;
      }
      return path.reverse();
    }

    for (const next of candidates) {
      if (previous.has(next.id)) continue;
      if (!strictlyDominates(next.specifications, current.specifications)) continue;
      previous.set(next.id, current.id);
      queue.push(next);
    }
  }

  return [];
}
