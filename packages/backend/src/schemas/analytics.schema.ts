import { z } from 'zod';

const DAY_MS = 24 * 60 * 60 * 1000;
export const MAX_TREND_DAYS = 3660;

const skipCache = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true')
  .optional();

// GET /api/analytics/overview, GET /api/analytics/cost-analysis
export const AnalyticsCacheQuerySchema = z.object({ skipCache });

// GET /api/analytics/utilization-trend
export const UtilizationTrendQuerySchema = z
  .object({
    from: z.coerce.date(),
    to: z.coerce.date(),
    windowDays: z.coerce.number().int().min(1).max(365).default(7),
    stepDays: z.coerce.number().int().min(1).max(365).default(1),
    assetId: z.string().min(1).optional(),
    skipCache,
  })
  .refine((data) => data.to.getTime() >= data.from.getTime(), {
    message: 'to must not be before from',
    path: ['to'],
  })
  .refine((data) => (data.to.getTime() - data.from.getTime()) / DAY_MS <= MAX_TREND_DAYS, {
    message: `Range may span at most ${MAX_TREND_DAYS} days`,
    path: ['to'],
  });

export type UtilizationTrendQueryInput = z.infer<typeof UtilizationTrendQuerySchema>;
