import type { PostGenerator, PostVariant } from '../services/gemini/types.js';

/** Dependencies handed to every route plugin that generates posts. */
export interface GenerationRouteOptions {
  generator: PostGenerator;
  variant: PostVariant;
}
