import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  ALLOCATION_STATUSES,
  ASSET_STATUSES,
  PROJECT_PRIORITIES,
  PROJECT_STATUSES,
  REQUIREMENT_PRIORITIES,
  USAGE_ACTIONS,
} from '../snapshot/types.js';
import type { KitpoolDatabase } from './database.js';

const specification = z.record(z.unknown()).default({});
// Normalised to UTC so stored timestamps sort lexicographically.
const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

export const SeedSchema = z.object({
  categories: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        color: z.string().default('#6366f1'),
        icon: z.string().default('box'),
        description: z.string().nullable().default(null),
      }),
    )
    .default([]),
  teams: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        department: z.string().nullable().default(null),
        budget: z.number().nonnegative().default(0),
        headcount: z.number().int().nonnegative().default(0),
      }),
    )
    .default([]),
  projects: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        teamId: z.string().nullable().default(null),
        status: z.enum(PROJECT_STATUSES).default('planning'),
        priority: z.enum(PROJECT_PRIORITIES).default('medium'),
        startDate: timestamp.nullable().default(null),
        endDate: timestamp.nullable().default(null),
        budget: z.number().nonnegative().default(0),
        requirements: z
          .array(
            z.object({
              id: z.string().min(1),
              categoryId: z.string().min(1),
              quantityNeeded: z.number().int().positive().default(1),
              priority: z.enum(REQUIREMENT_PRIORITIES).default('required'),
              minSpecs: specification,
              notes: z.string().nullable().default(null),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
  assets: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        assetTag: z.string().nullable().default(null),
        categoryId: z.string().nullable().default(null),
        status: z.enum(ASSET_STATUSES).default('available'),
        specifications: specification,
        costPerHour: z.number().nonnegative().default(0),
        costPerDay: z.number().nonnegative().default(0),
        utilizationRate: z.number().min(0).max(100).default(0),
        totalHoursUsed: z.number().nonnegative().default(0),
        currentTeamId: z.string().nullable().default(null),
        lastUsedAt: timestamp.nullable().default(null),
      }),
    )
    .default([]),
  allocations: z
    .array(
      z.object({
        id: z.string().min(1),
        assetId: z.string().min(1),
        teamId: z.string().min(1),
        projectId: z.string().nullable().default(null),
        allocatedAt: timestamp,
        releasedAt: timestamp.nullable().default(null),
        status: z.enum(ALLOCATION_STATUSES).default('active'),
        actualHoursUsed: z.number().nonnegative().default(0),
      }),
    )
    .default([]),
  usageLogs: z
    .array(
      z.object({
        id: z.string().min(1),
        assetId: z.string().min(1),
        teamId: z.string().nullable().default(null),
        projectId: z.string().nullable().default(null),
        action: z.enum(USAGE_ACTIONS),
        hoursUsed: z.number().nonnegative().default(0),
        loggedAt: timestamp,
      }),
    )
    .default([]),
});

export type SeedData = z.infer<typeof SeedSchema>;

export interface SeedSummary {
  categories: number;
  teams: number;
  projects: number;
  requirements: number;
  assets: number;
  allocations: number;
  usageLogs: number;
}

export function loadSeedFile(path: string): SeedData {
  return SeedSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

/**
 * Insert seed rows, skipping ids that already exist. Runs in one transaction
 * so a bad row leaves the database untouched.
 */
export function seedDatabase(db: KitpoolDatabase, seed: SeedData): SeedSummary {
  const insertCategory = db.prepare(
    `INSERT OR IGNORE INTO asset_categories (id, name, color, icon, description)
     VALUES (@id, @name, @color, @icon, @description)`,
  );
  const insertTeam = db.prepare(
    `INSERT OR IGNORE INTO teams (id, name, department, budget, headcount)
     VALUES (@id, @name, @department, @budget, @headcount)`,
  );
  const insertProject = db.prepare(
    `INSERT OR IGNORE INTO projects (id, name, team_id, status, priority, start_date, end_date, budget)
     VALUES (@id, @name, @teamId, @status, @priority, @startDate, @endDate, @budget)`,
  );
  const insertRequirement = db.prepare(
    `INSERT OR IGNORE INTO project_requirements (id, project_id, category_id, quantity_needed, priority, min_specs, notes)
     VALUES (@id, @projectId, @categoryId, @quantityNeeded, @priority, @minSpecs, @notes)`,
  );
  const insertAsset = db.prepare(
    `INSERT OR IGNORE INTO assets (id, name, asset_tag, category_id, status, specifications, cost_per_hour,
       cost_per_day, utilization_rate, total_hours_used, current_team_id, last_used_at)
     VALUES (@id, @name, @assetTag, @categoryId, @status, @specifications, @costPerHour,
       @costPerDay, @utilizationRate, @totalHoursUsed, @currentTeamId, @lastUsedAt)`,
  );
  const insertAllocation = db.prepare(
    `INSERT OR IGNORE INTO allocations (id, asset_id, team_id, project_id, allocated_at, released_at, status,
       actual_hours_used)
     VALUES (@id, @assetId, @teamId, @projectId, @allocatedAt, @releasedAt, @status, @actualHoursUsed)`,
  );
  const insertUsageLog = db.prepare(
    `INSERT OR IGNORE INTO usage_logs (id, asset_id, team_id, project_id, action, hours_used, logged_at)
     VALUES (@id, @assetId, @teamId, @projectId, @action, @hoursUsed, @loggedAt)`,
  );

  const run = db.transaction((): SeedSummary => {
    const summary: SeedSummary = {
      categories: 0,
      teams: 0,
      projects: 0,
      requirements: 0,
      assets: 0,
      allocations: 0,
      usageLogs: 0,
    };

    for (const category of seed.categories) {
      summary.categories += insertCategory.run(category).changes;
    }
    for (const team of seed.teams) {
      summary.teams += insertTeam.run(team).changes;
    }
    for (const { requirements, ...project } of seed.projects) {
      summary.projects += insertProject.run(project).changes;
      for (const requirement of requirements) {
        summary.requirements += insertRequirement.run({
          ...requirement,
          projectId: project.id,
          minSpecs: JSON.stringify(requirement.minSpecs),
        }).changes;
      }
    }
    for (const asset of seed.assets) {
      summary.assets += insertAsset.run({ ...asset, specifications: JSON.stringify(asset.specifications) }).changes;
    }
    for (const allocation of seed.allocations) {
      summary.allocations += insertAllocation.run(allocation).changes;
    }
    for (const log of seed.usageLogs) {
      summary.usageLogs += insertUsageLog.run(log).changes;
    }
    return summary;
  });

  return run();
}
