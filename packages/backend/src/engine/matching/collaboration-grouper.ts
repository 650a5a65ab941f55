import type { Allocation, Asset, AssetCategory } from '../../snapshot/types.js';
import { compareIds } from './order.js';

export interface CollaborationNode {
  readonly id: string;
  readonly label: string;
  readonly categoryId: string | null;
  readonly color: string | null;
  readonly communityId: number;
  readonly communitySize: number;
}

export interface CollaborationEdge {
  readonly source: string;
  readonly target: string;
  /** Number of groups (projects, or overlapping team sessions) sharing the pair. */
  readonly weight: number;
}

export interface Community {
  readonly id: number;
  readonly assetIds: string[];
  readonly size: number;
}

export interface CollaborationGraph {
  readonly nodes: CollaborationNode[];
  readonly edges: CollaborationEdge[];
  readonly communities: Community[];
}

// ─── Disjoint set ────────────────────────────────────────────────────────────

export class DisjointSet {
  private readonly parent = new Map<string, string>();
  private readonly rank = new Map<string, number>();

  add(id: string): void {
    if (!this.parent.has(id)) {
      this.parent.set(id, id);
      this.rank.set(id, 0);
    }
  }

  find(id: string): string {
    this.add(id);
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    // path compression
    let cursor = id;
    while (cursor !== root) {
      const up = this.parent.get(cursor) ?? root;
      this.parent.set(cursor, root);
      cursor = up;
    }
    return root;
  }

  union(a: string, b: string): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    const rankA = this.rank.get(ra) ?? 0;
    const rankB = this.rank.get(rb) ?? 0;
    if (rankA < rankB) {
      this.parent.set(ra, rb);
    } else if (rankA > rankB) {
      this.parent.set(rb, ra);
    } else {
      this.parent.set(rb, ra);
      this.rank.set(ra, rankA + 1);
    }
  }
}

// ─── Co-allocation groups ────────────────────────────────────────────────────

const pairKey = (a: string, b: string): string => (compareIds(a, b) < 0 ? `${a}\u0000${b}` : `${b}\u0000${a}`);

/** Distinct asset pairs within one project's allocations. */
function projectPairs(allocations: readonly Allocation[]): Set<string> {
  const assetIds = [...new Set(allocations.map((a) => a.assetId))].sort(compareIds);
  const pairs = new Set<string>();
  for (let i = 0; i < assetIds.length; i++) {
    for (let j = i + 1; j < assetIds.length; j++) {
      pairs.add(pairKey(assetIds[i], assetIds[j]));
    }
  }
  return pairs;
}

/** Asset pairs whose allocations by one team overlapped in time. Open allocations run forever. */
function overlappingPairs(allocations: readonly Allocation[]): Set<string> {
  const spans = allocations
    .map((a) => ({
      assetId: a.assetId,
      start: a.allocatedAt.getTime(),
      end: a.releasedAt ? a.releasedAt.getTime() : Infinity,
    }))
    .sort((a, b) => a.start - b.start || compareIds(a.assetId, b.assetId));

  const pairs = new Set<string>();
  let open: typeof spans = [];
  for (const span of spans) {
    open = open.filter((o) => o.end > span.start);
    for (const other of open) {
      if (other.assetId !== span.assetId) pairs.add(pairKey(other.assetId, span.assetId));
    }
    open.push(span);
  }
  return pairs;
}

function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = groups.get(k);
    if (bucket) bucket.push(row);
    else groups.set(k, [row]);
  }
  return groups;
}

/**
 * Cluster assets that are habitually used together.
 *
 * Allocations sharing a project form one group; project-less allocations are
 * grouped per team and only paired while their intervals overlap. Every pair
 * seen in any group is an edge, and edge endpoints end up in one community.
 */
export function groupCollaborators(
  assets: readonly Asset[],
  allocations: readonly Allocation[],
  categories: readonly AssetCategory[] = [],
): CollaborationGraph {
  const known = new Set(assets.map((a) => a.id));
  const relevant = allocations.filter((a) => known.has(a.assetId));

  const weights = new Map<string, number>();
  const count = (pairs: Set<string>) => {
    for (const key of pairs) weights.set(key, (weights.get(key) ?? 0) + 1);
  };

  const byProject = groupBy(
    relevant.filter((a) => a.projectId !== null),
    (a) => a.projectId ?? '',
  );
  for (const group of byProject.values()) count(projectPairs(group));

  const byTeam = groupBy(
    relevant.filter((a) => a.projectId === null),
    (a) => a.teamId,
  );
  for (const group of byTeam.values()) count(overlappingPairs(group));

  const sets = new DisjointSet();
  for (const asset of assets) sets.add(asset.id);

  const edges: CollaborationEdge[] = [];
  for (const [key, weight] of weights) {
    const [source, target] = key.split('\u0000');
    sets.union(source, target);
    edges.push({ source, target, weight });
  }
  edges.sort((a, b) => compareIds(a.source, b.source) || compareIds(a.target, b.target));

  const members = groupBy([...known].sort(compareIds), (id) => sets.find(id));
  const communities: Community[] = [...members.values()]
    .sort((a, b) => b.length - a.length || compareIds(a[0], b[0]))
    .map((assetIds, id) => ({ id, assetIds, size: assetIds.length }));

  const communityOf = new Map<string, Community>();
  for (const community of communities) {
    for (const id of community.assetIds) communityOf.set(id, community);
  }
  const colorOf = new Map(categories.map((c) => [c.id, c.color]));

  const nodes: CollaborationNode[] = [...assets]
    .sort((a, b) => compareIds(a.id, b.id))
    .map((asset) => {
      const community = communityOf.get(asset.id);
      return {
        id: asset.id,
        label: asset.name,
        categoryId: asset.categoryId,
        color: asset.categoryId ? colorOf.get(asset.categoryId) ?? null : null,
        communityId: community?.id ?? -1,
        communitySize: community?.size ?? 1,
      };
    });

  return { nodes, edges, communities };
}
