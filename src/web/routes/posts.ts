import type { FastifyInstance } from 'fastify';
import { createFacebookPost } from '../../workflows/facebook-post.js';
import { postFormPage, type PostFormValues } from '../views/post-form.js';
import type { GenerationRouteOptions } from '../../routes/types.js';

const FORM_FIELDS = [
  'businessType',
  'targetAudience',
  'postGoal',
  'postTone',
  'include',
  'avoid',
] as const;

function lastString(raw: unknown): string | undefined {
  // A repeated field arrives as an array; the form only ever means the last one.
  const value = Array.isArray(raw) ? raw[raw.length - 1] : raw;
  return typeof value === 'string' ? value : undefined;
}

/** Keeps the string form fields of any body; everything else counts as missing. */
function formValues(body: unknown): PostFormValues {
  const values: PostFormValues = {};
  if (typeof body !== 'object' || body === null) return values;

  const fields = new Map<string, unknown>(Object.entries(body));
  for (const field of FORM_FIELDS) {
    const value = lastString(fields.get(field));
    if (value !== undefined) values[field] = value;
  }
  return values;
}

export async function postRoutes(app: FastifyInstance, opts: GenerationRouteOptions) {
  app.get('/', async (_request, reply) => {
    reply.type('text/html').send(postFormPage());
  });

  app.post<{ Body: unknown }>('/generate', async (request, reply) => {
    const values = formValues(request.body);
    const result = await createFacebookPost(values, opts.generator, opts.variant);

    switch (result.status) {
      case 'invalid':
        reply.status(400).type('text/html').send(postFormPage({ values, error: result.message }));
        return;
      case 'failed':
        reply.status(502).type('text/html').send(postFormPage({ values, error: result.message }));
        return;
      case 'generated':
        reply.type('text/html').send(postFormPage({ values, generatedText: result.text }));
    }
  });
}
