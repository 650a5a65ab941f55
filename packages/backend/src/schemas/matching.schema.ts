import { z } from 'zod';
import { parseCapabilities } from '../engine/matching/capability.js';

const capabilityInput = z
  .record(z.union([z.number(), z.string(), z.boolean(), z.array(z.union([z.string(), z.number(), z.boolean()]))]))
  .transform((raw) => parseCapabilities(raw));

const skipCache = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')
  .optional();

// POST /api/match/urgent
export const UrgentMatchSchema = z.object({
  categoryId: z.string().min(1),
  quantity: z.number().int().min(1).max(100).default(1),
  maxDailyCost: z.number().nonnegative().optional(),
  minSpecs: capabilityInput.optional(),
  recencyDecayDays: z.number().positive().max(365).optional(),
});

export type UrgentMatchInput = z.infer<typeof UrgentMatchSchema>;

// GET /api/match/optimize/:projectId
export const OptimizeParamsSchema = z.object({
  projectId: z.string().min(1),
});

export const OptimizeQuerySchema = z.object({
  budget: z.coerce.number().nonnegative().optional(),
  skipCache,
});

export type OptimizeQueryInput = z.infer<typeof OptimizeQuerySchema>;

// GET /api/match/demand-scores
export const DemandScoresQuerySchema = z.object({
  lookbackDays: z.coerce.number().int().min(1).max(3650).optional(),
  skipCache,
});

export type DemandScoresQueryInput = z.infer<typeof DemandScoresQuerySchema>;

// GET /api/match/gap-analysis, GET /api/match/collaboration-graph
export const CacheQuerySchema = z.object({
  skipCache,
});

// POST /api/match/upgrade-path
export const UpgradePathSchema = z
  .object({
    sourceAssetId: z.string().min(1),
    targetAssetId: z.string().min(1).optional(),
    minSpecs: capabilityInput.optional(),
  })
  .refine((data) => (data.targetAssetId === undefined) !== (data.minSpecs === undefined), {
    message: 'Provide exactly one of targetAssetId or minSpecs',
    path: ['targetAssetId'],
  });

export type UpgradePathInput = z.infer<typeof UpgradePathSchema>;
