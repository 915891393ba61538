import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { createChildLogger } from '../lib/logger.js';
import { layout } from '../web/views/layout.js';

const log = createChildLogger('error-handler');

export function globalErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
) {
  const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;

  if (statusCode === 500) {
    log.error({ err: error, requestId: request.id, url: request.url }, 'Unhandled error');
  } else {
    log.warn({ err: error, requestId: request.id, url: request.url }, 'Request error');
  }

  const message = statusCode === 500 ? 'Internal server error' : error.message;

  if (request.url.startsWith('/api')) {
    return reply.status(statusCode).send({ error: message });
  }

  return reply
    .status(statusCode)
    .type('text/html')
    .send(layout('Error', `<h2>Something went wrong</h2><p><a href="/">Back to the form</a></p>`, {
      type: 'error',
      message,
    }));
}
