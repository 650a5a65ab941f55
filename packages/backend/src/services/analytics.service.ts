import { NotFoundError, ValidationError } from '../lib/errors.js';
import { getCachedData, getCacheGeneration, setCachedData, CACHE_KEYS, CACHE_TTL } from '../lib/redis.js';
import {
  aggregateUtilizationTrend,
  compareIds,
  type TrendRequest,
  type UtilizationTrend,
} from '../engine/matching/index.js';
import { ASSET_STATUSES, type Asset, type AssetStatus, type SnapshotReader } from '../snapshot/types.js';
import type { AssetStore } from '../store/snapshot-store.js';
import type { CacheOptions } from './matching.service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const RECENT_ACTIVITY_LIMIT = 10;
const IDLE_ASSET_LIMIT = 15;
const WASTED_COST_LIMIT = 10;
/** Available assets below this utilisation (percent) count as idle. */
const IDLE_UTILIZATION_THRESHOLD = 20;
const IDLE_AFTER_DAYS = 7;
const DAYS_PER_MONTH = 30;

// ============================================================================
// Response shapes
// ============================================================================

export interface OverviewResponse {
  summary: {
    totalAssets: number;
    averageUtilization: number;
    totalHoursLogged: number;
  };
  statusBreakdown: Array<{ status: AssetStatus; count: number }>;
  byCategory: Array<{
    categoryId: string;
    name: string;
    icon: string;
    color: string;
    total: number;
    available: number;
    inUse: number;
    averageUtilization: number | null;
  }>;
  activeAllocations: number;
  activeProjects: number;
  recentActivity: Array<{
    id: string;
    assetId: string;
    assetName: string | null;
    teamId: string | null;
    teamName: string | null;
    projectId: string | null;
    action: string;
    hoursUsed: number;
    loggedAt: string;
  }>;
  idleAssets: Array<{
    id: string;
    name: string;
    assetTag: string | null;
    utilizationRate: number;
    costPerDay: number;
    categoryName: string | null;
    color: string | null;
    daysIdle: number | null;
  }>;
  cacheHit: boolean;
}

export interface CostAnalysisResponse {
  byTeam: Array<{
    teamId: string;
    teamName: string;
    department: string | null;
    assetCount: number;
    dailyCost: number;
    monthlyCost: number;
    totalSpent: number;
  }>;
  wastedCost: Array<{
    assetId: string;
    name: string;
    assetTag: string | null;
    costPerDay: number;
    utilizationRate: number;
    wastedDaily: number;
    categoryName: string | null;
    color: string | null;
  }>;
  cacheHit: boolean;
}

export interface UtilizationTrendResponse extends UtilizationTrend {
  from: string;
  to: string;
  windowDays: number;
  stepDays: number;
  assetId: string | null;
  idleAssets: Array<{ id: string; name: string }>;
  cacheHit: boolean;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / DAY_MS) * DAY_MS);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function averageUtilization(assets: readonly Asset[]): number | null {
  if (assets.length === 0) return null;
  return round2(assets.reduce((sum, a) => sum + a.utilizationRate, 0) / assets.length);
}

/** Calendar days (UTC) between the last use and the snapshot. */
function daysBetween(earlier: Date, later: Date): number {
  return Math.floor(later.getTime() / DAY_MS) - Math.floor(earlier.getTime() / DAY_MS);
}

// ============================================================================
// Service
// ============================================================================

export class AnalyticsService {
  constructor(private readonly store: AssetStore) {}

  /**
   * Inventory dashboard: status and category breakdowns, activity counts,
   * the latest usage log entries and idle assets.
   */
  async overview(options: CacheOptions = {}): Promise<OverviewResponse> {
    const cacheKey = CACHE_KEYS.overview();
    if (!options.skipCache) {
      const cached = await getCachedData<OverviewResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const response = this.computeOverview(this.store.loadSnapshot());
    await setCachedData(cacheKey, response, { ttl: CACHE_TTL.OVERVIEW, generation });
    return response;
  }

  /**
   * Daily and monthly spend per holding team, and the assets whose unused
   * share of their daily cost is largest.
   */
  async costAnalysis(options: CacheOptions = {}): Promise<CostAnalysisResponse> {
    const cacheKey = CACHE_KEYS.costAnalysis();
    if (!options.skipCache) {
      const cached = await getCachedData<CostAnalysisResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const response = this.computeCostAnalysis(this.store.loadSnapshot());
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  async utilizationTrend(request: TrendRequest, options: CacheOptions = {}): Promise<UtilizationTrendResponse> {
    const from = startOfUtcDay(request.from);
    const to = startOfUtcDay(request.to);
    if (to.getTime() < from.getTime()) {
      throw new ValidationError('Range end must not precede its start', {
        from: from.toISOString(),
        to: to.toISOString(),
      });
    }
    const stepDays = request.stepDays ?? 1;

    const cacheKey = CACHE_KEYS.utilizationTrend([
      from.toISOString().slice(0, 10),
      to.toISOString().slice(0, 10),
      request.windowDays,
      stepDays,
      request.assetId ?? null,
    ]);
    if (!options.skipCache) {
      const cached = await getCachedData<UtilizationTrendResponse>(cacheKey);
      if (cached) return { ...cached, cacheHit: true };
    }

    const generation = await getCacheGeneration();
    const snapshot = this.store.loadSnapshot();
    if (request.assetId && !snapshot.getAsset(request.assetId)) {
      throw new NotFoundError('Asset', request.assetId);
    }

    // Logs through the last millisecond of the final day.
    const logs = snapshot.listUsageLogs({
      from,
      to: new Date(to.getTime() + DAY_MS - 1),
      assetId: request.assetId,
    });
    const trend = aggregateUtilizationTrend({ ...request, from, to, stepDays }, logs, snapshot.listAssets());

    const response: UtilizationTrendResponse = {
      ...trend,
      from: from.toISOString().slice(0, 10),
      to: to.toISOString().slice(0, 10),
      windowDays: request.windowDays,
      stepDays,
      assetId: request.assetId ?? null,
      idleAssets: trend.idleAssetIds.map((id) => ({ id, name: snapshot.getAsset(id)?.name ?? id })),
      cacheHit: false,
    };
    await setCachedData(cacheKey, response, { generation });
    return response;
  }

  // ==========================================================================
  // Pure computations over one snapshot
  // ==========================================================================

  private computeOverview(snapshot: SnapshotReader): OverviewResponse {
    const assets = snapshot.listAssets();
    const inService = assets.filter((a) => a.status !== 'retired');
    const teams = new Map(snapshot.listTeams().map((t) => [t.id, t]));

    const byCategory = snapshot
      .listCategories()
      .map((category) => {
        const members = assets.filter((a) => a.categoryId === category.id);
        return {
          categoryId: category.id,
          name: category.name,
          icon: category.icon,
          color: category.color,
          total: members.length,
          available: members.filter((a) => a.status === 'available').length,
          inUse: members.filter((a) => a.status === 'in_use').length,
          averageUtilization: averageUtilization(members),
        };
      })
      .sort((a, b) => b.total - a.total || compareIds(a.categoryId, b.categoryId));

    const idleBefore = snapshot.takenAt.getTime() - IDLE_AFTER_DAYS * DAY_MS;
    const idleAssets = assets
      .filter(
        (a) =>
          a.status === 'available' &&
          (a.utilizationRate < IDLE_UTILIZATION_THRESHOLD ||
            a.lastUsedAt === null ||
            a.lastUsedAt.getTime() < idleBefore),
      )
      .sort((a, b) => a.utilizationRate - b.utilizationRate || compareIds(a.id, b.id))
      .slice(0, IDLE_ASSET_LIMIT)
      .map((a) => {
        const category = a.categoryId ? snapshot.getCategory(a.categoryId) : null;
        return {
          id: a.id,
          name: a.name,
          assetTag: a.assetTag,
          utilizationRate: a.utilizationRate,
          costPerDay: a.costPerDay,
          categoryName: category?.name ?? null,
          color: category?.color ?? null,
          daysIdle: a.lastUsedAt ? daysBetween(a.lastUsedAt, snapshot.takenAt) : null,
        };
      });

    return {
      summary: {
        totalAssets: inService.length,
        averageUtilization: averageUtilization(inService) ?? 0,
        totalHoursLogged: round2(inService.reduce((sum, a) => sum + a.totalHoursUsed, 0)),
      },
      statusBreakdown: ASSET_STATUSES.map((status) => ({
        status,
        count: assets.filter((a) => a.status === status).length,
      })),
      byCategory,
      activeAllocations: snapshot.listAllocations().filter((a) => a.status === 'active').length,
      activeProjects: snapshot.listProjects().filter((p) => p.status === 'active').length,
      recentActivity: snapshot.listRecentUsageLogs(RECENT_ACTIVITY_LIMIT).map((log) => ({
        id: log.id,
        assetId: log.assetId,
        assetName: snapshot.getAsset(log.assetId)?.name ?? null,
        teamId: log.teamId,
        teamName: log.teamId ? (teams.get(log.teamId)?.name ?? null) : null,
        projectId: log.projectId,
        action: log.action,
        hoursUsed: log.hoursUsed,
        loggedAt: log.loggedAt.toISOString(),
      })),
      idleAssets,
      cacheHit: false,
    };
  }

  private computeCostAnalysis(snapshot: SnapshotReader): CostAnalysisResponse {
    const assets = snapshot.listAssets();

    const byTeam = snapshot
      .listTeams()
      .map((team) => {
        const held = assets.filter((a) => a.currentTeamId === team.id);
        const dailyCost = held.reduce((sum, a) => sum + a.costPerDay, 0);
        return {
          teamId: team.id,
          teamName: team.name,
          department: team.department,
          assetCount: held.length,
          dailyCost: round2(dailyCost),
          monthlyCost: round2(dailyCost * DAYS_PER_MONTH),
          totalSpent: round2(held.reduce((sum, a) => sum + a.totalHoursUsed * a.costPerHour, 0)),
        };
      })
      .sort((a, b) => b.dailyCost - a.dailyCost || compareIds(a.teamId, b.teamId));

    const wastedCost = snapshot
      .listAssets({ statuses: ['available', 'in_use'] })
      .filter((a) => a.costPerDay > 0)
      .map((a) => ({ asset: a, wasted: a.costPerDay * (1 - a.utilizationRate / 100) }))
      .sort((a, b) => b.wasted - a.wasted || compareIds(a.asset.id, b.asset.id))
      .slice(0, WASTED_COST_LIMIT)
      .map(({ asset, wasted }) => {
        const category = asset.categoryId ? snapshot.getCategory(asset.categoryId) : null;
        return {
          assetId: asset.id,
          name: asset.name,
          assetTag: asset.assetTag,
          costPerDay: asset.costPerDay,
          utilizationRate: asset.utilizationRate,
          wastedDaily: round2(wasted),
          categoryName: category?.name ?? null,
          color: category?.color ?? null,
        };
      });

    return { byTeam, wastedCost, cacheHit: false };
  }
}
