import { FastifyInstance } from 'fastify';
import {
  UrgentMatchSchema,
  OptimizeParamsSchema,
  OptimizeQuerySchema,
  DemandScoresQuerySchema,
  CacheQuerySchema,
  UpgradePathSchema,
} from '../schemas/matching.schema.js';
import { MatchingService } from '../services/matching.service.js';

export async function matchingRoutes(fastify: FastifyInstance): Promise<void> {
  const matching = new MatchingService(fastify.store);

  // POST /api/match/urgent — Rank available assets for an ad-hoc request
  fastify.post<{ Body: unknown }>('/api/match/urgent', async (request, reply) => {
    const data = UrgentMatchSchema.parse(request.body);
    const result = await matching.urgentMatch(data);
    return reply.code(200).send(result);
  });

  // GET /api/match/optimize/:projectId — Best asset subset within the project's budget
  fastify.get<{ Params: unknown; Querystring: unknown }>(
    '/api/match/optimize/:projectId',
    async (request, reply) => {
      const { projectId } = OptimizeParamsSchema.parse(request.params);
      const { budget, skipCache } = OptimizeQuerySchema.parse(request.query);
      const result = await matching.optimizeForProject(projectId, { budget, skipCache });
      return reply.code(200).send(result);
    }
  );

  // GET /api/match/gap-analysis — Demand vs supply per category
  fastify.get<{ Querystring: unknown }>('/api/match/gap-analysis', async (request, reply) => {
    const { skipCache } = CacheQuerySchema.parse(request.query);
    const result = await matching.gapAnalysis({ skipCache });
    return reply.code(200).send(result);
  });

  // GET /api/match/demand-scores — Graph-ranked demand per asset
  fastify.get<{ Querystring: unknown }>('/api/match/demand-scores', async (request, reply) => {
    const { lookbackDays, skipCache } = DemandScoresQuerySchema.parse(request.query);
    const result = await matching.demandScores({ lookbackDays, skipCache });

    if (!result.converged) {
      request.log.warn(
        { iterations: result.iterations, lookbackDays: result.lookbackDays },
        'Demand ranking hit the iteration cap; scores are approximate'
      );
    }

    return reply.code(200).send(result);
  });

  // GET /api/match/collaboration-graph — Assets habitually used together
  fastify.get<{ Querystring: unknown }>('/api/match/collaboration-graph', async (request, reply) => {
    const { skipCache } = CacheQuerySchema.parse(request.query);
    const result = await matching.collaborationGraph({ skipCache });
    return reply.code(200).send(result);
  });

  // POST /api/match/upgrade-path — Shortest chain of strict upgrades
  fastify.post<{ Body: unknown }>('/api/match/upgrade-path', async (request, reply) => {
    const data = UpgradePathSchema.parse(request.body);
    const result = await matching.upgradePath(data);
    return reply.code(200).send(result);
  });
}
