import Fastify from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import { config } from './config/env.js';
import { healthRoutes } from './routes/health.js';
import { postApiRoutes } from './routes/posts.js';
import { webRoutes } from './web/index.js';
import { globalErrorHandler } from './middleware/error-handler.js';
import type { GenerationRouteOptions } from './routes/types.js';

export async function buildServer(options: GenerationRouteOptions) {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      ...(config.NODE_ENV === 'development'
        ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
        : {}),
    },
  });

  app.setErrorHandler(globalErrorHandler);

  await app.register(cors);
  await app.register(formbody);

  // Routes
  await app.register(healthRoutes, options);
  await app.register(postApiRoutes, { ...options, prefix: '/api' });
  await app.register(webRoutes, options);

  return app;
}
