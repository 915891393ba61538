import type { FastifyInstance } from 'fastify';
import { postRoutes } from './routes/posts.js';
import type { GenerationRouteOptions } from '../routes/types.js';

export async function webRoutes(app: FastifyInstance, opts: GenerationRouteOptions) {
  await app.register(postRoutes, opts);

  app.get('/favicon.ico', async (_request, reply) => {
    reply.status(204).send();
  });
}
