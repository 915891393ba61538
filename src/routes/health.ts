import type { FastifyInstance } from 'fastify';
import type { GenerationRouteOptions } from './types.js';

export async function healthRoutes(app: FastifyInstance, opts: GenerationRouteOptions) {
  app.get('/health', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      uptime: process.uptime(),
      variant: opts.variant.name,
      model: opts.generator.model,
      credentialConfigured: opts.generator.hasCredential,
    });
  });
}
