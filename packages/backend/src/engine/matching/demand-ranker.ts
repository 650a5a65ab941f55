import type { Allocation, Asset } from '../../snapshot/types.js';
import { compareIds, SCORE_EPSILON } from './order.js';

export interface DemandRankOptions {
  dampingFactor?: number;
  maxIterations?: number;
  convergenceThreshold?: number;
}

export const DEFAULT_DEMAND_RANK_OPTIONS: Required<DemandRankOptions> = {
  dampingFactor: 0.85,
  maxIterations: 100,
  convergenceThreshold: 1e-6,
};

export interface AssetDemandScore {
  readonly assetId: string;
  /** Min-max normalised to [0, 1]. */
  readonly demandScore: number;
  readonly rawScore: number;
}

export interface DemandRanking {
  readonly scores: AssetDemandScore[];
  readonly iterations: number;
  /** False when the iteration cap was hit first; scores are then approximate. */
  readonly converged: boolean;
  readonly nodeCount: number;
  readonly edgeCount: number;
}

// ─── Transient graph ─────────────────────────────────────────────────────────

/**
 * Arena of weighted directed edges keyed by integer node index.
 * Parallel edges are merged by summing weights.
 */
class EdgeArena {
  readonly from: number[] = [];
  readonly to: number[] = [];
  readonly weight: number[] = [];
  private readonly slot = new Map<string, number>();

  add(from: number, to: number, weight: number): void {
    const key = `${from}>${to}`;
    const existing = this.slot.get(key);
    if (existing !== undefined) {
      this.weight[existing] += weight;
      return;
    }
    this.slot.set(key, this.from.length);
    this.from.push(from);
    this.to.push(to);
    this.weight.push(weight);
  }

  get size(): number {
    return this.from.length;
  }

  /** Divide each edge weight by its source node's total outgoing weight. */
  rowNormalize(nodeCount: number): void {
    const outTotal = new Float64Array(nodeCount);
    for (let e = 0; e < this.size; e++) {
      outTotal[this.from[e]] += this.weight[e];
    }
    for (let e = 0; e < this.size; e++) {
      this.weight[e] /= outTotal[this.from[e]];
    }
  }
}

function consumerKey(allocation: Allocation): string {
  return allocation.projectId
    ? `team:${allocation.teamId}/project:${allocation.projectId}`
    : `team:${allocation.teamId}`;
}

// ─── Ranking ─────────────────────────────────────────────────────────────────

/**
 * PageRank over the bipartite asset ↔ consumer usage graph.
 *
 * Each allocation links its consumer (team, or team+project) to the asset in
 * both directions, weighted by the consumer's total activity, so demand from
 * busy consumers flows back into the other assets they touch.
 */
export function rankAssetDemand(
  assets: readonly Asset[],
  allocations: readonly Allocation[],
  options: DemandRankOptions = {},
): DemandRanking {
  const { dampingFactor: d, maxIterations, convergenceThreshold } = {
    ...DEFAULT_DEMAND_RANK_OPTIONS,
    ...options,
  };

  if (assets.length === 0) {
    return { scores: [], iterations: 0, converged: true, nodeCount: 0, edgeCount: 0 };
  }

  const nodeIndex = new Map<string, number>();
  for (const asset of assets) {
    nodeIndex.set(`asset:${asset.id}`, nodeIndex.size);
  }

  const activity = new Map<string, number>();
  const relevant = allocations.filter((a) => nodeIndex.has(`asset:${a.assetId}`));
  for (const allocation of relevant) {
    const key = consumerKey(allocation);
    activity.set(key, (activity.get(key) ?? 0) + Math.max(allocation.actualHoursUsed, 1));
    if (!nodeIndex.has(key)) {
      nodeIndex.set(key, nodeIndex.size);
    }
  }

  const n = nodeIndex.size;
  const edges = new EdgeArena();
  for (const allocation of relevant) {
    const key = consumerKey(allocation);
    const consumer = nodeIndex.get(key);
    const asset = nodeIndex.get(`asset:${allocation.assetId}`);
    const weight = activity.get(key);
    if (consumer === undefined || asset === undefined || weight === undefined) continue;
    edges.add(consumer, asset, weight);
    edges.add(asset, consumer, weight);
  }
  edges.rowNormalize(n);

  const base = (1 - d) / n;
  let score = new Float64Array(n).fill(1 / n);
  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    const next = new Float64Array(n).fill(base);
    for (let e = 0; e < edges.size; e++) {
      next[edges.to[e]] += d * score[edges.from[e]] * edges.weight[e];
    }

    let delta = 0;
    for (let v = 0; v < n; v++) {
      delta += Math.abs(next[v] - score[v]);
    }
    score = next;
    iterations++;

    if (delta < convergenceThreshold) {
      converged = true;
      break;
    }
  }

  const raw = assets.map((asset, i) => ({ assetId: asset.id, rawScore: score[i] }));
  let min = Infinity;
  let max = -Infinity;
  for (const { rawScore } of raw) {
    min = Math.min(min, rawScore);
    max = Math.max(max, rawScore);
  }
  const span = max - min;

  const scores = raw
    .map(({ assetId, rawScore }) => ({
      assetId,
      rawScore,
      // All-equal scores (e.g. no history) keep the common raw value as baseline.
      demandScore: span > SCORE_EPSILON ? (rawScore - min) / span : rawScore,
    }))
    .sort((a, b) => b.demandScore - a.demandScore || compareIds(a.assetId, b.assetId));

  return { scores, iterations, converged, nodeCount: n, edgeCount: edges.size };
}
