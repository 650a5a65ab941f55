import type { Asset, AssetStatus, Requirement } from '../../snapshot/types.js';
import { compareIds } from './order.js';

/** Statuses counted as usable capacity (idle or already serving someone). */
export const CAPACITY_STATUSES: readonly AssetStatus[] = ['available', 'in_use'];

export type GapStatus = 'unmet' | 'met' | 'over_provisioned';

export interface CategoryGap {
  readonly categoryId: string;
  readonly status: GapStatus;
  readonly needed: number;
  readonly available: number;
  readonly shortage: number;
  readonly surplus: number;
}

export interface GapAnalysis {
  readonly categories: CategoryGap[];
  readonly unmet: CategoryGap[];
  readonly met: CategoryGap[];
  readonly overProvisioned: CategoryGap[];
  /** Matched demand / total demand; 1 when nothing is demanded. */
  readonly gapScore: number;
  readonly totalRequired: number;
  readonly totalAvailable: number;
  readonly totalMatched: number;
}

type Tally = Array<[categoryId: string, count: number]>;

function tallyByCategory<T>(rows: readonly T[], key: (row: T) => string | null, amount: (row: T) => number): Tally {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const id = key(row);
    if (id === null) continue;
    totals.set(id, (totals.get(id) ?? 0) + amount(row));
  }
  return [...totals.entries()].sort((a, b) => compareIds(a[0], b[0]));
}

function classify(categoryId: string, needed: number, available: number): CategoryGap | null {
  if (needed > available) {
    return { categoryId, status: 'unmet', needed, available, shortage: needed - available, surplus: 0 };
  }
  if (needed > 0) {
    return { categoryId, status: 'met', needed, available, shortage: 0, surplus: available - needed };
  }
  if (available > 0) {
    return { categoryId, status: 'over_provisioned', needed, available, shortage: 0, surplus: available };
  }
  return null;
}

/**
 * Compare aggregate demand with usable capacity per category.
 *
 * Both sides are tallied into id-sorted lists and walked with two pointers,
 * so every category present on either side is classified exactly once.
 */
export function analyzeGap(requirements: readonly Requirement[], assets: readonly Asset[]): GapAnalysis {
  const demand = tallyByCategory(requirements, (r) => r.categoryId, (r) => r.quantityNeeded);
  const supply = tallyByCategory(
    assets.filter((a) => CAPACITY_STATUSES.includes(a.status)),
    (a) => a.categoryId,
    () => 1,
  );

  const categories: CategoryGap[] = [];
  let i = 0;
  let j = 0;
  while (i < demand.length || j < supply.length) {
    const order =
      i >= demand.length ? 1 : j >= supply.length ? -1 : compareIds(demand[i][0], supply[j][0]);

    let gap: CategoryGap | null;
    if (order < 0) {
      gap = classify(demand[i][0], demand[i][1], 0);
      i++;
    } else if (order > 0) {
      gap = classify(supply[j][0], 0, supply[j][1]);
      j++;
    } else {
      gap = classify(demand[i][0], demand[i][1], supply[j][1]);
      i++;
      j++;
    }
    if (gap) categories.push(gap);
  }

  let totalRequired = 0;
  let totalAvailable = 0;
  let totalMatched = 0;
  for (const gap of categories) {
    totalRequired += gap.needed;
    totalAvailable += gap.available;
    totalMatched += Math.min(gap.needed, gap.available);
  }

  return {
    categories,
    unmet: categories.filter((g) => g.status === 'unmet'),
    met: categories.filter((g) => g.status === 'met'),
    overProvisioned: categories.filter((g) => g.status === 'over_provisioned'),
    gapScore: totalRequired === 0 ? 1 : totalMatched / totalRequired,
    totalRequired,
    totalAvailable,
    totalMatched,
  };
}
