import {
  DEMAND_PROJECT_STATUSES,
  type Allocation,
  type AllocationFilter,
  type Asset,
  type AssetCategory,
  type AssetFilter,
  type Project,
  type Requirement,
  type SnapshotData,
  type SnapshotReader,
  type Team,
  type UsageLog,
  type UsageLogRange,
} from './types.js';
import { compareIds } from '../engine/matching/order.js';

/**
 * SnapshotReader over plain arrays. The arrays are frozen on construction;
 * list methods return rows in their original order unless noted.
 */
export class InMemorySnapshot implements SnapshotReader {
  readonly takenAt: Date;

  private readonly data: SnapshotData;
  private readonly categoryIndex: ReadonlyMap<string, AssetCategory>;
  private readonly projectIndex: ReadonlyMap<string, Project>;
  private readonly assetIndex: ReadonlyMap<string, Asset>;

  constructor(data: SnapshotData, takenAt: Date = new Date()) {
    this.takenAt = takenAt;
    this.data = Object.freeze({
      categories: Object.freeze([...data.categories]),
      teams: Object.freeze([...data.teams]),
      projects: Object.freeze([...data.projects]),
      requirements: Object.freeze([...data.requirements]),
      assets: Object.freeze([...data.assets]),
      allocations: Object.freeze([...data.allocations]),
      usageLogs: Object.freeze([...data.usageLogs]),
    });
    this.categoryIndex = new Map(data.categories.map((c) => [c.id, c]));
    this.projectIndex = new Map(data.projects.map((p) => [p.id, p]));
    this.assetIndex = new Map(data.assets.map((a) => [a.id, a]));
  }

  listCategories(): readonly AssetCategory[] {
    return this.data.categories;
  }

  getCategory(id: string): AssetCategory | null {
    return this.categoryIndex.get(id) ?? null;
  }

  listTeams(): readonly Team[] {
    return this.data.teams;
  }

  listProjects(): readonly Project[] {
    return this.data.projects;
  }

  getProject(id: string): Project | null {
    return this.projectIndex.get(id) ?? null;
  }

  getAsset(id: string): Asset | null {
    return this.assetIndex.get(id) ?? null;
  }

  listAssets(filter: AssetFilter = {}): readonly Asset[] {
    const { categoryId, statuses } = filter;
    if (categoryId === undefined && statuses === undefined) {
      return this.data.assets;
    }
    return this.data.assets.filter(
      (a) =>
        (categoryId === undefined || a.categoryId === categoryId) &&
        (statuses === undefined || statuses.includes(a.status)),
    );
  }

  listProjectRequirements(projectId: string): readonly Requirement[] {
    return this.data.requirements.filter((r) => r.projectId === projectId);
  }

  listDemandRequirements(): readonly Requirement[] {
    return this.data.requirements.filter((r) => {
      const project = this.projectIndex.get(r.projectId);
      return project !== undefined && DEMAND_PROJECT_STATUSES.includes(project.status);
    });
  }

  listAllocations(filter: AllocationFilter = {}): readonly Allocation[] {
    const { since } = filter;
    if (!since) {
      return this.data.allocations;
    }
    const cutoff = since.getTime();
    return this.data.allocations.filter(
      (a) => a.releasedAt === null || a.releasedAt.getTime() >= cutoff,
    );
  }

  listUsageLogs(range: UsageLogRange): readonly UsageLog[] {
    const from = range.from.getTime();
    const to = range.to.getTime();
    return this.data.usageLogs.filter((log) => {
      const at = log.loggedAt.getTime();
      return at >= from && at <= to && (range.assetId === undefined || log.assetId === range.assetId);
    });
  }

  listRecentUsageLogs(limit: number): readonly UsageLog[] {
    return [...this.data.usageLogs]
      .sort((a, b) => b.loggedAt.getTime() - a.loggedAt.getTime() || compareIds(b.id, a.id))
      .slice(0, Math.max(0, limit));
  }
}
