import { FastifyInstance } from 'fastify';
import { AnalyticsCacheQuerySchema, UtilizationTrendQuerySchema } from '../schemas/analytics.schema.js';
import { AnalyticsService } from '../services/analytics.service.js';

export async function analyticsRoutes(fastify: FastifyInstance): Promise<void> {
  const analytics = new AnalyticsService(fastify.store);

  // GET /api/analytics/overview — Inventory breakdowns, recent activity and idle assets
  fastify.get<{ Querystring: unknown }>('/api/analytics/overview', async (request, reply) => {
    const { skipCache } = AnalyticsCacheQuerySchema.parse(request.query);
    const result = await analytics.overview({ skipCache });
    return reply.code(200).send(result);
  });

  // GET /api/analytics/cost-analysis — Spend per team and idle spend per asset
  fastify.get<{ Querystring: unknown }>('/api/analytics/cost-analysis', async (request, reply) => {
    const { skipCache } = AnalyticsCacheQuerySchema.parse(request.query);
    const result = await analytics.costAnalysis({ skipCache });
    return reply.code(200).send(result);
  });

  // GET /api/analytics/utilization-trend — Rolling usage hours over a date range
  fastify.get<{ Querystring: unknown }>('/api/analytics/utilization-trend', async (request, reply) => {
    const { skipCache, ...query } = UtilizationTrendQuerySchema.parse(request.query);
    const result = await analytics.utilizationTrend(query, { skipCache });
    return reply.code(200).send(result);
  });
}
