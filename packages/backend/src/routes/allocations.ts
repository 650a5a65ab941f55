import { FastifyInstance } from 'fastify';
import { AllocateSchema, ReleaseParamsSchema, ReleaseSchema } from '../schemas/allocations.schema.js';
import { AllocationService } from '../services/allocation.service.js';

export async function allocationsRoutes(fastify: FastifyInstance): Promise<void> {
  const allocations = new AllocationService(fastify.store);

  // POST /api/allocations — Allocate an asset (optimistic version check)
  fastify.post<{ Body: unknown }>('/api/allocations', async (request, reply) => {
    const data = AllocateSchema.parse(request.body);
    const result = await allocations.allocate(data);
    return reply.code(201).send(result);
  });

  // POST /api/allocations/:id/release — Close an open allocation
  fastify.post<{ Params: unknown; Body: unknown }>(
    '/api/allocations/:id/release',
    async (request, reply) => {
      const { id } = ReleaseParamsSchema.parse(request.params);
      const data = ReleaseSchema.parse(request.body);
      const result = await allocations.release(id, data);
      return reply.code(200).send(result);
    }
  );
}
