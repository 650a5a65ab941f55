import { NotFoundError } from '../lib/errors.js';
import { getCachedData, getCacheGeneration, setCachedData, CACHE_KEYS, CACHE_TTL } from '../lib/redis.js';
import {
  analyzeGap,
  findUpgradePath,
  groupCollaborators,
  matchUrgentRequest,
  optimizeAllocation,
  rankAssetDemand,
  serializeCapabilities,
  type AssetDemandScore,
  type CategoryGap,
  type CollaborationGraph,
  type DemandRanking,
  type GapAnalysis,
  type OptimizationResult,
  type UpgradeSuggestion,
  type UpgradeTarget,
  type UrgentMatch,
  type UrgentRequest,
} from '../engine/matching/index.js';
import type { Asset, CapabilityMap, SnapshotReader } from '../snapshot/types.js';
import type { AssetStore } from '../store/snapshot-store.js';

// ============================================================================
// Response shapes
// ============================================================================

export interface AssetSummary {
  id: string;
  name: string;
  assetTag: string | null;
  categoryId: string | null;
  categoryName: string | null;
  status: Asset['status'];
  costPerDay: number;
  version: number;
  specifications: Record<string, number | string | string[]>;
}

export interface CachedResult {
  cacheHit: boolean;
}

export interface UrgentMatchResponse {
  matches: Array<UrgentMatch & { asset: AssetSummary }>;
  totalFound: number;
  upgradeSuggestion: (UpgradeSuggestion & { assets: AssetSummary[] }) | null;
}

export interface OptimizationResponse extends OptimizationResult, CachedResult {
  projectId: string;
  projectName: string;
  selectedAssets: AssetSummary[];
}

export interface GapAnalysisResponse extends CachedResult {
  categories: EnrichedGap[];
  unmet: EnrichedGap[];
  met: EnrichedGap[];
  overProvisioned: EnrichedGap[];
  gapScore: number;
  totalRequired: number;
  totalAvailable: number;
  totalMatched: number;
}

export interface EnrichedGap extends CategoryGap {
  categoryName: string | null;
  icon: string | null;
  color: string | null;
}

export interface DemandScoresResponse extends CachedResult {
  lookbackDays: number | null;
  iterations: number;
  converged: boolean;
  nodeCount: number;
  edgeCount: number;
  scores: Array<AssetDemandScore & { name: string; categoryId: string | null }>;
}

export interface CollaborationGraphResponse extends CollaborationGraph, CachedResult {}

export interface UpgradePathResponse {
  sourceAssetId: string;
  path: string[];
  found: boolean;
  assets: AssetSummary[];
}

export interface CacheOptions {
  skipCache?: boolean;
}

// ============================================================================
// Service
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export class MatchingService {
  constructor(private readonly store: AssetStore) {}

  /**
   * Rank available assets for an ad-hoc request. Never cached: it must
   * reflect current availability.
   */
  async urgentMatch(request: UrgentRequest): Promise<UrgentMatchResponse> {
    const snapshot = this.store.loadSnapshot();
    if (!snapshot.getCategory(request.categoryId)) {
      throw new NotFoundError('AssetCategory', request.categoryId);
    }

    const result = matchUrgentRequest(request, snapshot.listAssets(), snapshot.listAllocations(), snapshot.takenAt);

    return {
      matches: result.matches.map((match) => ({
        ...match,
        asset: this.summarize(snapshot, match.assetId),
      })),
      totalFound: result.totalFound,
      upgradeSuggestion: result.upgradeSuggestion && {
        ...result.upgradeSuggestion,
        assets: result.upgradeSuggestion.path.map((id) => this.summarize(snapshot, id)),
      },
    };
  }

  async optimizeForProject(
    projectId: string,
    options: CacheOptions & { budget?: number } = {},
  ): Promise<OptimizationResponse> {
    const cacheKey = CACHE_KEYS.optimizeProject(projectId, options.budget ?? null);
    if (!options.skipCache) {
      const cached = await getCachedData<OptimizationResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const snapshot = this.store.loadSnapshot();
    const project = snapshot.getProject(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }

    const result = optimizeAllocation({
      project,
      requirements: snapshot.listProjectRequirements(projectId),
      assets: snapshot.listAssets(),
      allocations: snapshot.listAllocations(),
      budget: options.budget,
    });

    const response: OptimizationResponse = {
      ...result,
      projectId: project.id,
      projectName: project.name,
      selectedAssets: result.selectedAssetIds.map((id) => this.summarize(snapshot, id)),
      cacheHit: false,
    };
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  async gapAnalysis(options: CacheOptions = {}): Promise<GapAnalysisResponse> {
    const cacheKey = CACHE_KEYS.gapAnalysis();
    if (!options.skipCache) {
      const cached = await getCachedData<GapAnalysisResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const response = this.computeGapAnalysis(this.store.loadSnapshot());
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  async demandScores(options: CacheOptions & { lookbackDays?: number } = {}): Promise<DemandScoresResponse> {
    const lookbackDays = options.lookbackDays ?? null;
    const cacheKey = CACHE_KEYS.demandScores(lookbackDays);
    if (!options.skipCache) {
      const cached = await getCachedData<DemandScoresResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const response = this.computeDemandScores(this.store.loadSnapshot(), lookbackDays);
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  async collaborationGraph(options: CacheOptions = {}): Promise<CollaborationGraphResponse> {
    const cacheKey = CACHE_KEYS.collaborationGraph();
    if (!options.skipCache) {
      const cached = await getCachedData<CollaborationGraphResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const response = this.computeCollaborationGraph(this.store.loadSnapshot());
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  /**
   * Shortest upgrade chain from a source asset to a target asset or to the
   * nearest asset meeting a capability. An unreachable target is not an error.
   */
  async upgradePath(input: {
    sourceAssetId: string;
    targetAssetId?: string;
    minSpecs?: CapabilityMap;
  }): Promise<UpgradePathResponse> {
    const snapshot = this.store.loadSnapshot();
    const source = snapshot.getAsset(input.sourceAssetId);
    if (!source) {
      throw new NotFoundError('Asset', input.sourceAssetId);
    }
    if (input.targetAssetId && !snapshot.getAsset(input.targetAssetId)) {
      throw new NotFoundError('Asset', input.targetAssetId);
    }

    const pool = snapshot.listAssets({
      categoryId: source.categoryId ?? undefined,
      statuses: ['available', 'in_use', 'maintenance'],
    });
    const capability: CapabilityMap = input.minSpecs ?? new Map();
    const target: UpgradeTarget = input.targetAssetId ? { assetId: input.targetAssetId } : { capability };
    const path = findUpgradePath(source, target, pool);

    return {
      sourceAssetId: source.id,
      path,
      found: path.length > 0,
      assets: path.map((id) => this.summarize(snapshot, id)),
    };
  }

  /**
   * Recompute the whole-snapshot analytics into the cache with the longer
   * warmed TTL. Entries are dropped if an allocation change lands while they
   * are computed. Called by the analytics refresh job.
   */
  async warmCache(): Promise<{ keys: string[] }> {
    const generation = await getCacheGeneration();
    const snapshot = this.store.loadSnapshot();
    const entries: Array<[string, unknown]> = [
      [CACHE_KEYS.demandScores(null), this.computeDemandScores(snapshot, null)],
      [CACHE_KEYS.gapAnalysis(), this.computeGapAnalysis(snapshot)],
      [CACHE_KEYS.collaborationGraph(), this.computeCollaborationGraph(snapshot)],
    ];

    const keys: string[] = [];
    for (const [key, value] of entries) {
      if (await setCachedData(key, value, { ttl: CACHE_TTL.WARMED, generation })) {
        keys.push(key);
      }
    }
    return { keys };
  }

  // ==========================================================================
  // Pure computations over one snapshot
  // ==========================================================================

  private computeGapAnalysis(snapshot: SnapshotReader): GapAnalysisResponse {
    const analysis: GapAnalysis = analyzeGap(snapshot.listDemandRequirements(), snapshot.listAssets());
    const enrich = (gap: CategoryGap): EnrichedGap => {
      const category = snapshot.getCategory(gap.categoryId);
      return {
        ...gap,
        categoryName: category?.name ?? null,
        icon: category?.icon ?? null,
        color: category?.color ?? null,
      };
    };

    return {
      categories: analysis.categories.map(enrich),
      unmet: analysis.unmet.map(enrich),
      met: analysis.met.map(enrich),
      overProvisioned: analysis.overProvisioned.map(enrich),
      gapScore: analysis.gapScore,
      totalRequired: analysis.totalRequired,
      totalAvailable: analysis.totalAvailable,
      totalMatched: analysis.totalMatched,
      cacheHit: false,
    };
  }

  private computeDemandScores(snapshot: SnapshotReader, lookbackDays: number | null): DemandScoresResponse {
    const since = lookbackDays === null ? undefined : new Date(snapshot.takenAt.getTime() - lookbackDays * DAY_MS);
    const ranking: DemandRanking = rankAssetDemand(snapshot.listAssets(), snapshot.listAllocations({ since }));

    return {
      lookbackDays,
      iterations: ranking.iterations,
      converged: ranking.converged,
      nodeCount: ranking.nodeCount,
      edgeCount: ranking.edgeCount,
      scores: ranking.scores.map((score) => {
        const asset = snapshot.getAsset(score.assetId);
        return { ...score, name: asset?.name ?? score.assetId, categoryId: asset?.categoryId ?? null };
      }),
      cacheHit: false,
    };
  }

  private computeCollaborationGraph(snapshot: SnapshotReader): CollaborationGraphResponse {
    return {
      ...groupCollaborators(snapshot.listAssets(), snapshot.listAllocations(), snapshot.listCategories()),
      cacheHit: false,
    };
  }

  private summarize(snapshot: SnapshotReader, assetId: string): AssetSummary {
    const asset = snapshot.getAsset(assetId);
    if (!asset) {
      throw new NotFoundError('Asset', assetId);
    }
    const category = asset.categoryId ? snapshot.getCategory(asset.categoryId) : null;
    return {
      id: asset.id,
      name: asset.name,
      assetTag: asset.assetTag,
      categoryId: asset.categoryId,
      categoryName: category?.name ?? null,
      status: asset.status,
      costPerDay: asset.costPerDay,
      version: asset.version,
      specifications: serializeCapabilities(asset.specifications),
    };
  }
}
