import type { Allocation, Asset, CapabilityMap } from '../../snapshot/types.js';
import { meetsAll, specMatch } from './capability.js';
import { compareIds, SCORE_EPSILON } from './order.js';
import { findUpgradePath } from './upgrade-path.js';

export const URGENT_MATCH_WEIGHTS = {
  specMatch: 0.4,
  availability: 0.3,
  costEfficiency: 0.3,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface UrgentRequest {
  categoryId: string;
  quantity: number;
  /** Daily cost ceiling; unbounded when omitted. */
  maxDailyCost?: number;
  minSpecs?: CapabilityMap;
  /**
   * When set, availability decays with days since the asset was last
   * released, favouring freshly freed assets.
   */
  recencyDecayDays?: number;
}

export interface UrgentMatch {
  readonly assetId: string;
  readonly score: number;
  readonly specMatch: number;
  readonly availability: number;
  readonly costEfficiency: number;
  readonly costPerDay: number;
  readonly reasons: string[];
}

export interface UpgradeSuggestion {
  readonly fromAssetId: string;
  readonly path: string[];
}

export interface UrgentMatchResult {
  readonly matches: UrgentMatch[];
  /** Eligible candidates before truncation to the requested quantity. */
  readonly totalFound: number;
  readonly upgradeSuggestion: UpgradeSuggestion | null;
}

interface ScoredCandidate {
  asset: Asset;
  specMatch: number;
  availability: number;
  costEfficiency: number;
  score: number;
}

function lastReleaseByAsset(allocations: readonly Allocation[]): Map<string, number> {
  const latest = new Map<string, number>();
  for (const allocation of allocations) {
    if (!allocation.releasedAt) continue;
    const at = allocation.releasedAt.getTime();
    if (at > (latest.get(allocation.assetId) ?? -Infinity)) {
      latest.set(allocation.assetId, at);
    }
  }
  return latest;
}

function reasonsFor(candidate: ScoredCandidate, best: Omit<ScoredCandidate, 'asset' | 'score'>, request: UrgentRequest): string[] {
  const reasons: string[] = [];
  const hasSpecs = request.minSpecs !== undefined && request.minSpecs.size > 0;

  if (hasSpecs && candidate.specMatch >= best.specMatch - SCORE_EPSILON) {
    reasons.push('best spec match');
  }
  if (hasSpecs && request.minSpecs && meetsAll(candidate.asset.specifications, request.minSpecs)) {
    reasons.push('meets all spec constraints');
  }
  if (candidate.costEfficiency >= best.costEfficiency - SCORE_EPSILON) {
    reasons.push('lowest cost');
  }
  if (request.recencyDecayDays !== undefined && candidate.availability >= best.availability - SCORE_EPSILON) {
    reasons.push('recently released');
  }
  return reasons;
}

/**
 * Greedy composite ranking of available assets for an ad-hoc request.
 *
 * `assets` is the whole inventory (the upgrade suggestion may route through
 * assets that are busy); only available, in-category, in-budget assets are
 * ranked. Fewer candidates than requested is not an error.
 */
export function matchUrgentRequest(
  request: UrgentRequest,
  assets: readonly Asset[],
  allocations: readonly Allocation[],
  now: Date,
): UrgentMatchResult {
  const ceiling = request.maxDailyCost ?? Infinity;
  const required: CapabilityMap = request.minSpecs ?? new Map();

  const eligible = assets.filter(
    (a) => a.categoryId === request.categoryId && a.status === 'available' && a.costPerDay <= ceiling,
  );

  const maxCost = eligible.reduce((m, a) => Math.max(m, a.costPerDay), 0);
  const allEqualCost = eligible.every((a) => a.costPerDay === maxCost);
  const released = request.recencyDecayDays !== undefined ? lastReleaseByAsset(allocations) : null;

  const scored: ScoredCandidate[] = eligible.map((asset) => {
    const match = specMatch(asset.specifications, required);

    let availability = 1;
    if (released && request.recencyDecayDays !== undefined) {
      const releasedAt = released.get(asset.id);
      availability =
        releasedAt === undefined
          ? 0.5
          : 0.5 + 0.5 * Math.exp(-Math.max(0, now.getTime() - releasedAt) / DAY_MS / request.recencyDecayDays);
    }

    const costEfficiency = allEqualCost || maxCost === 0 ? 1 : 1 - asset.costPerDay / maxCost;
    const score =
      URGENT_MATCH_WEIGHTS.specMatch * match +
      URGENT_MATCH_WEIGHTS.availability * availability +
      URGENT_MATCH_WEIGHTS.costEfficiency * costEfficiency;

    return { asset, specMatch: match, availability, costEfficiency, score };
  });

  scored.sort(
    (a, b) =>
      (Math.abs(b.score - a.score) > SCORE_EPSILON ? b.score - a.score : 0) ||
      a.asset.costPerDay - b.asset.costPerDay ||
      compareIds(a.asset.id, b.asset.id),
  );

  const chosen = scored.slice(0, Math.max(0, request.quantity));
  const best = {
    specMatch: Math.max(0, ...chosen.map((c) => c.specMatch)),
    availability: Math.max(0, ...chosen.map((c) => c.availability)),
    costEfficiency: Math.max(0, ...chosen.map((c) => c.costEfficiency)),
  };

  const matches: UrgentMatch[] = chosen.map((c) => ({
    assetId: c.asset.id,
    score: c.score,
    specMatch: c.specMatch,
    availability: c.availability,
    costEfficiency: c.costEfficiency,
    costPerDay: c.asset.costPerDay,
    reasons: reasonsFor(c, best, request),
  }));

  let upgradeSuggestion: UpgradeSuggestion | null = null;
  if (required.size > 0 && chosen.length > 0 && !chosen.some((c) => meetsAll(c.asset.specifications, required))) {
    const from = chosen[0].asset;
    const pool = assets.filter((a) => a.status !== 'retired');
    upgradeSuggestion = { fromAssetId: from.id, path: findUpgradePath(from, { capability: required }, pool) };
  }

  return { matches, totalFound: eligible.length, upgradeSuggestion };
}
