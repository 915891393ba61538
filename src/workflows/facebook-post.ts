import { z } from 'zod';
import {
  DEFAULT_POST_GOAL,
  DEFAULT_POST_TONE,
  GENERATION_FAILED_MESSAGE,
  INVALID_CHOICE_MESSAGE,
  POST_GOALS,
  POST_TONES,
  POST_VARIANTS,
  REQUIRED_INPUTS_MESSAGE,
} from '../config/constants.js';
import { buildPrompt } from '../services/gemini/prompts.js';
import { createChildLogger } from '../lib/logger.js';
import type { PostGenerator, PostRequest, PostVariant } from '../services/gemini/types.js';

const log = createChildLogger('facebook-post');

const CHOICE_FIELDS = ['postGoal', 'postTone'];

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((value) => value.trim().length > 0, `${field} is required`);

// Values are checked, never rewritten: the prompt must carry the literal input.
export const postRequestSchema = z.object({
  businessType: requiredText('businessType'),
  targetAudience: requiredText('targetAudience'),
  postGoal: z.enum(POST_GOALS).default(DEFAULT_POST_GOAL),
  postTone: z.enum(POST_TONES).default(DEFAULT_POST_TONE),
  include: z.string().default(''),
  avoid: z.string().default(''),
});

export type FacebookPostResult =
  | { status: 'generated'; request: PostRequest; text: string }
  | { status: 'invalid'; message: string; issues: string[] }
  | { status: 'failed'; request: PostRequest; message: string };

export type PostRequestValidation =
  | { ok: true; request: PostRequest }
  | { ok: false; fields: string[]; issues: string[] };

export function validatePostRequest(input: unknown): PostRequestValidation {
  const parsed = postRequestSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      fields: parsed.error.issues.map((issue) => String(issue.path[0])),
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  return { ok: true, request: parsed.data };
}

/**
 * Validate the submitted fields, build the prompt and generate the post.
 * Invalid input never reaches the generator.
 */
export async function createFacebookPost(
  input: unknown,
  generator: PostGenerator,
  variant: PostVariant = POST_VARIANTS.detailed,
): Promise<FacebookPostResult> {
  const validation = validatePostRequest(input);
  if (!validation.ok) {
    log.info({ issues: validation.issues }, 'Rejected post request');
    const choicesOnly = validation.fields.every((field) => CHOICE_FIELDS.includes(field));
    return {
      status: 'invalid',
      message: choicesOnly ? INVALID_CHOICE_MESSAGE : REQUIRED_INPUTS_MESSAGE,
      issues: validation.issues,
    };
  }

  const { request } = validation;
  const outcome = await generator.generate(buildPrompt(request, variant));

  if (!outcome.ok) {
    log.warn(
      { reason: outcome.reason, businessType: request.businessType },
      'Facebook post generation failed',
    );
    return { status: 'failed', request, message: GENERATION_FAILED_MESSAGE };
  }

  return { status: 'generated', request, text: outcome.text };
}
