import type { FastifyInstance } from 'fastify';
import { createFacebookPost } from '../workflows/facebook-post.js';
import type { GenerationRouteOptions } from './types.js';

/**
 * JSON counterpart of the form, for front ends other than the bundled page.
 */
export async function postApiRoutes(app: FastifyInstance, opts: GenerationRouteOptions) {
  app.post<{ Body: unknown }>('/posts', async (request, reply) => {
    const result = await createFacebookPost(request.body, opts.generator, opts.variant);

    switch (result.status) {
      case 'invalid':
        return reply.status(400).send({ error: result.message, issues: result.issues });
      case 'failed':
        return reply.status(502).send({ error: result.message });
      case 'generated':
        return reply.send({ text: result.text });
    }
  });
}
