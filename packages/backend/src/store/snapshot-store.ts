import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { parseCapabilities } from '../engine/matching/capability.js';
import { ConflictError, NotFoundError } from '../lib/errors.js';
import { InMemorySnapshot } from '../snapshot/in-memory-snapshot.js';
import {
  ALLOCATION_STATUSES,
  ASSET_STATUSES,
  PROJECT_PRIORITIES,
  PROJECT_STATUSES,
  REQUIREMENT_PRIORITIES,
  USAGE_ACTIONS,
  type Allocation,
  type Asset,
  type SnapshotReader,
} from '../snapshot/types.js';
import type { KitpoolDatabase } from './database.js';

// ─── Row schemas ─────────────────────────────────────────────────────────────

const isoDate = z.string().transform((value) => new Date(value));
const nullableIsoDate = z
  .string()
  .nullable()
  .transform((value) => (value === null ? null : new Date(value)));
const jsonCapabilities = z.string().transform((value) => parseCapabilities(JSON.parse(value)));

const CategoryRow = z.object({
  id: z.string(),
  name: z.string(),
  color: z.string(),
  icon: z.string(),
  description: z.string().nullable(),
});

const TeamRow = z.object({
  id: z.string(),
  name: z.string(),
  department: z.string().nullable(),
  budget: z.number(),
  headcount: z.number().int(),
});

const ProjectRow = z
  .object({
    id: z.string(),
    name: z.string(),
    team_id: z.string().nullable(),
    status: z.enum(PROJECT_STATUSES),
    priority: z.enum(PROJECT_PRIORITIES),
    start_date: nullableIsoDate,
    end_date: nullableIsoDate,
    budget: z.number(),
  })
  .transform((row) => ({
    id: row.id,
    name: row.name,
    teamId: row.team_id,
    status: row.status,
    priority: row.priority,
    startDate: row.start_date,
    endDate: row.end_date,
    budget: row.budget,
  }));

const RequirementRow = z
  .object({
    id: z.string(),
    project_id: z.string(),
    category_id: z.string(),
    quantity_needed: z.number().int(),
    priority: z.enum(REQUIREMENT_PRIORITIES),
    min_specs: jsonCapabilities,
    notes: z.string().nullable(),
  })
  .transform((row) => ({
    id: row.id,
    projectId: row.project_id,
    categoryId: row.category_id,
    quantityNeeded: row.quantity_needed,
    priority: row.priority,
    minSpec: row.min_specs,
    notes: row.notes,
  }));

const AssetRow = z
  .object({
    id: z.string(),
    name: z.string(),
    asset_tag: z.string().nullable(),
    category_id: z.string().nullable(),
    status: z.enum(ASSET_STATUSES),
    specifications: jsonCapabilities,
    cost_per_hour: z.number(),
    cost_per_day: z.number(),
    utilization_rate: z.number(),
    total_hours_used: z.number(),
    current_team_id: z.string().nullable(),
    last_used_at: nullableIsoDate,
    version: z.number().int(),
  })
  .transform(
    (row): Asset => ({
      id: row.id,
      name: row.name,
      assetTag: row.asset_tag,
      categoryId: row.category_id,
      status: row.status,
      specifications: row.specifications,
      costPerHour: row.cost_per_hour,
      costPerDay: row.cost_per_day,
      utilizationRate: row.utilization_rate,
      totalHoursUsed: row.total_hours_used,
      currentTeamId: row.current_team_id,
      lastUsedAt: row.last_used_at,
      version: row.version,
    }),
  );

const AllocationRow = z
  .object({
    id: z.string(),
    asset_id: z.string(),
    team_id: z.string(),
    project_id: z.string().nullable(),
    allocated_at: isoDate,
    released_at: nullableIsoDate,
    status: z.enum(ALLOCATION_STATUSES),
    actual_hours_used: z.number(),
  })
  .transform(
    (row): Allocation => ({
      id: row.id,
      assetId: row.asset_id,
      teamId: row.team_id,
      projectId: row.project_id,
      allocatedAt: row.allocated_at,
      releasedAt: row.released_at,
      status: row.status,
      actualHoursUsed: row.actual_hours_used,
    }),
  );

const UsageLogRow = z
  .object({
    id: z.string(),
    asset_id: z.string(),
    team_id: z.string().nullable(),
    project_id: z.string().nullable(),
    action: z.enum(USAGE_ACTIONS),
    hours_used: z.number(),
    logged_at: isoDate,
  })
  .transform((row) => ({
    id: row.id,
    assetId: row.asset_id,
    teamId: row.team_id,
    projectId: row.project_id,
    action: row.action,
    hoursUsed: row.hours_used,
    loggedAt: row.logged_at,
  }));

const ExistsRow = z.object({ id: z.string() });

// ─── Store ───────────────────────────────────────────────────────────────────

export interface AllocateInput {
  assetId: string;
  teamId: string;
  projectId?: string | null;
  /** Asset version the caller read; the write fails if it moved on. */
  expectedVersion: number;
  now?: Date;
}

export interface ReleaseInput {
  /** Defaults to the wall-clock hours since allocation. */
  hoursUsed?: number;
  now?: Date;
}

export interface AllocationReceipt {
  allocation: Allocation;
  assetVersion: number;
}

export interface AssetStore {
  loadSnapshot(): SnapshotReader;
  allocate(input: AllocateInput): AllocationReceipt;
  release(allocationId: string, input?: ReleaseInput): AllocationReceipt;
  close(): void;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * SQLite-backed store. Reads materialise an immutable snapshot inside one
 * transaction; allocate/release check and write inside one transaction.
 */
export class SqliteAssetStore implements AssetStore {
  constructor(private readonly db: KitpoolDatabase) {}

  loadSnapshot(): SnapshotReader {
    const read = this.db.transaction(() => {
      const all = (sql: string): unknown[] => this.db.prepare(sql).all();
      return new InMemorySnapshot({
        categories: z.array(CategoryRow).parse(all('SELECT * FROM asset_categories ORDER BY id')),
        teams: z.array(TeamRow).parse(all('SELECT * FROM teams ORDER BY id')),
        projects: z.array(ProjectRow).parse(all('SELECT * FROM projects ORDER BY id')),
        requirements: z.array(RequirementRow).parse(all('SELECT * FROM project_requirements ORDER BY id')),
        assets: z.array(AssetRow).parse(all('SELECT * FROM assets ORDER BY id')),
        allocations: z.array(AllocationRow).parse(all('SELECT * FROM allocations ORDER BY allocated_at, id')),
        usageLogs: z.array(UsageLogRow).parse(all('SELECT * FROM usage_logs ORDER BY logged_at, id')),
      });
    });
    return read();
  }

  allocate(input: AllocateInput): AllocationReceipt {
    const now = input.now ?? new Date();
    const projectId = input.projectId ?? null;

    const write = this.db.transaction((): AllocationReceipt => {
      const asset = this.findAsset(input.assetId);
      if (asset.version !== input.expectedVersion) {
        throw new ConflictError(
          `Asset '${asset.id}' changed since it was read`,
          asset.version,
          input.expectedVersion,
        );
      }
      if (asset.status !== 'available') {
        throw new ConflictError(`Asset '${asset.id}' is ${asset.status}`, asset.version, input.expectedVersion);
      }
      this.assertExists('teams', 'Team', input.teamId);
      if (projectId !== null) {
        this.assertExists('projects', 'Project', projectId);
      }

      const allocation: Allocation = {
        id: randomUUID(),
        assetId: asset.id,
        teamId: input.teamId,
        projectId,
        allocatedAt: now,
        releasedAt: null,
        status: 'active',
        actualHoursUsed: 0,
      };

      this.db
        .prepare(
          `INSERT INTO allocations (id, asset_id, team_id, project_id, allocated_at, status, actual_hours_used)
           VALUES (?, ?, ?, ?, ?, 'active', 0)`,
        )
        .run(allocation.id, asset.id, input.teamId, projectId, now.toISOString());

      this.db
        .prepare(
          `UPDATE assets SET status = 'in_use', current_team_id = ?, last_used_at = ?, version = version + 1
           WHERE id = ?`,
        )
        .run(input.teamId, now.toISOString(), asset.id);

      this.appendUsage(asset.id, input.teamId, projectId, 'allocated', 0, now);

      return { allocation, assetVersion: asset.version + 1 };
    });

    return write();
  }

  release(allocationId: string, input: ReleaseInput = {}): AllocationReceipt {
    const now = input.now ?? new Date();

    const write = this.db.transaction((): AllocationReceipt => {
      const row = this.db.prepare('SELECT * FROM allocations WHERE id = ?').get(allocationId);
      if (row === undefined) {
        throw new NotFoundError('Allocation', allocationId);
      }
      const open = AllocationRow.parse(row);
      if (open.releasedAt !== null) {
        throw new ConflictError(`Allocation '${allocationId}' is already released`);
      }

      const asset = this.findAsset(open.assetId);
      const elapsed = Math.max(0, now.getTime() - open.allocatedAt.getTime()) / HOUR_MS;
      const hours = Math.round((input.hoursUsed ?? elapsed) * 100) / 100;

      this.db
        .prepare(
          `UPDATE allocations SET released_at = ?, status = 'released', actual_hours_used = ?
           WHERE id = ?`,
        )
        .run(now.toISOString(), hours, allocationId);

      this.db
        .prepare(
          `UPDATE assets SET status = 'available', current_team_id = NULL, last_used_at = ?,
             total_hours_used = total_hours_used + ?, version = version + 1
           WHERE id = ?`,
        )
        .run(now.toISOString(), hours, asset.id);

      this.appendUsage(asset.id, open.teamId, open.projectId, 'released', hours, now);

      return {
        allocation: { ...open, releasedAt: now, status: 'released', actualHoursUsed: hours },
        assetVersion: asset.version + 1,
      };
    });

    return write();
  }

  close(): void {
    this.db.close();
  }

  private findAsset(id: string): Asset {
    const row = this.db.prepare('SELECT * FROM assets WHERE id = ?').get(id);
    if (row === undefined) {
      throw new NotFoundError('Asset', id);
    }
    return AssetRow.parse(row);
  }

  private assertExists(table: 'teams' | 'projects', resource: string, id: string): void {
    const row = this.db.prepare(`SELECT id FROM ${table} WHERE id = ?`).get(id);
    if (!ExistsRow.safeParse(row).success) {
      throw new NotFoundError(resource, id);
    }
  }

  private appendUsage(
    assetId: string,
    teamId: string,
    projectId: string | null,
    action: 'allocated' | 'released',
    hours: number,
    at: Date,
  ): void {
    this.db
      .prepare(
        `INSERT INTO usage_logs (id, asset_id, team_id, project_id, action, hours_used, logged_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(randomUUID(), assetId, teamId, projectId, action, hours, at.toISOString());
  }
}
