// ─── Enumerations ────────────────────────────────────────────────────────────

export const ASSET_STATUSES = ['available', 'in_use', 'maintenance', 'retired'] as const;
export type AssetStatus = (typeof ASSET_STATUSES)[number];

export const PROJECT_STATUSES = ['planning', 'active', 'on_hold', 'completed', 'cancelled'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const PROJECT_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type ProjectPriority = (typeof PROJECT_PRIORITIES)[number];

export const REQUIREMENT_PRIORITIES = ['required', 'preferred', 'optional'] as const;
export type RequirementPriority = (typeof REQUIREMENT_PRIORITIES)[number];

export const ALLOCATION_STATUSES = ['active', 'released', 'overdue'] as const;
export type AllocationStatus = (typeof ALLOCATION_STATUSES)[number];

export const USAGE_ACTIONS = [
  'allocated',
  'released',
  'maintenance_start',
  'maintenance_end',
  'status_change',
] as const;
export type UsageAction = (typeof USAGE_ACTIONS)[number];

/** Project statuses whose requirements count as demand. */
export const DEMAND_PROJECT_STATUSES: readonly ProjectStatus[] = ['planning', 'active'];

// ─── Capability map ──────────────────────────────────────────────────────────

export type SpecValue =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'list'; readonly value: readonly string[] };

/** Ordered field name → tagged value. Insertion order is the declared order. */
export type CapabilityMap = ReadonlyMap<string, SpecValue>;

// ─── Entities ────────────────────────────────────────────────────────────────

export interface AssetCategory {
  readonly id: string;
  readonly name: string;
  readonly color: string;
  readonly icon: string;
  readonly description: string | null;
}

export interface Team {
  readonly id: string;
  readonly name: string;
  readonly department: string | null;
  readonly budget: number;
  readonly headcount: number;
}

export interface Project {
  readonly id: string;
  readonly name: string;
  readonly teamId: string | null;
  readonly status: ProjectStatus;
  readonly priority: ProjectPriority;
  readonly startDate: Date | null;
  readonly endDate: Date | null;
  /** Daily spend ceiling used by the optimizer. */
  readonly budget: number;
}

export interface Requirement {
  readonly id: string;
  readonly projectId: string;
  readonly categoryId: string;
  readonly quantityNeeded: number;
  readonly priority: RequirementPriority;
  readonly minSpec: CapabilityMap;
  readonly notes: string | null;
}

export interface Asset {
  readonly id: string;
  readonly name: string;
  readonly assetTag: string | null;
  readonly categoryId: string | null;
  readonly status: AssetStatus;
  readonly specifications: CapabilityMap;
  readonly costPerHour: number;
  readonly costPerDay: number;
  readonly utilizationRate: number; // 0-100
  readonly totalHoursUsed: number;
  readonly currentTeamId: string | null;
  readonly lastUsedAt: Date | null;
  /** Bumped by every allocate/release; used for optimistic conflict checks. */
  readonly version: number;
}

export interface Allocation {
  readonly id: string;
  readonly assetId: string;
  readonly teamId: string;
  readonly projectId: string | null;
  readonly allocatedAt: Date;
  readonly releasedAt: Date | null;
  readonly status: AllocationStatus;
  readonly actualHoursUsed: number;
}

export interface UsageLog {
  readonly id: string;
  readonly assetId: string;
  readonly teamId: string | null;
  readonly projectId: string | null;
  readonly action: UsageAction;
  readonly hoursUsed: number;
  readonly loggedAt: Date;
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

export interface SnapshotData {
  readonly categories: readonly AssetCategory[];
  readonly teams: readonly Team[];
  readonly projects: readonly Project[];
  readonly requirements: readonly Requirement[];
  readonly assets: readonly Asset[];
  readonly allocations: readonly Allocation[];
  readonly usageLogs: readonly UsageLog[];
}

export interface AssetFilter {
  categoryId?: string;
  statuses?: readonly AssetStatus[];
}

export interface AllocationFilter {
  /** Keep allocations still open or released on/after this instant. */
  since?: Date;
}

export interface UsageLogRange {
  from: Date;
  to: Date;
  assetId?: string;
}

/**
 * Read-only, point-in-time view consumed by one engine invocation.
 */
export interface SnapshotReader {
  readonly takenAt: Date;

  listCategories(): readonly AssetCategory[];
  getCategory(id: string): AssetCategory | null;
  listTeams(): readonly Team[];
  listProjects(): readonly Project[];
  getProject(id: string): Project | null;
  getAsset(id: string): Asset | null;
  listAssets(filter?: AssetFilter): readonly Asset[];
  listProjectRequirements(projectId: string): readonly Requirement[];
  listDemandRequirements(): readonly Requirement[];
  listAllocations(filter?: AllocationFilter): readonly Allocation[];
  listUsageLogs(range: UsageLogRange): readonly UsageLog[];
  /** Newest first. */
  listRecentUsageLogs(limit: number): readonly UsageLog[];
}
