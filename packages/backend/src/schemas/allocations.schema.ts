import { z } from 'zod';

// POST /api/allocations
export const AllocateSchema = z.object({
  assetId: z.string().min(1),
  teamId: z.string().min(1),
  projectId: z.string().min(1).nullable().optional(),
  expectedVersion: z.number().int().min(0),
});

export type AllocateBody = z.infer<typeof AllocateSchema>;

// POST /api/allocations/:id/release
export const ReleaseParamsSchema = z.object({
  id: z.string().min(1),
});

export const ReleaseSchema = z
  .object({
    hoursUsed: z.number().nonnegative().max(100000).optional(),
  })
  .default({});

export type ReleaseBody = z.infer<typeof ReleaseSchema>;
