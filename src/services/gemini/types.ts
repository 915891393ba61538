import type { HarmBlockThreshold, HarmCategory } from '@google/genai';
import type { POST_GOALS, POST_TONES } from '../../config/constants.js';

export type PostGoal = (typeof POST_GOALS)[number];
export type PostTone = (typeof POST_TONES)[number];

export interface PostRequest {
  businessType: string;
  targetAudience: string;
  postGoal: PostGoal;
  postTone: PostTone;
  include: string;
  avoid: string;
}

export interface SamplingConfig {
  temperature: number;
  topP: number;
  topK: number;
}

export interface SafetySetting {
  category: HarmCategory;
  threshold: HarmBlockThreshold;
}

export interface PostVariant {
  name: 'detailed' | 'standard' | 'concise';
  model: string;
  maxOutputTokens: number;
  /** Adjective phrase describing the post, e.g. "highly detailed". */
  style: string;
  lengthGuidance: string;
}

/** Everything the endpoint needs for one generation call. */
export interface GenerationRequest {
  model: string;
  prompt: string;
  sampling: SamplingConfig;
  maxOutputTokens: number;
  safetySettings: readonly SafetySetting[];
}

/**
 * Port to the remote endpoint. Resolves to the reply text, or undefined when
 * the endpoint returned no text.
 */
export interface GenerationTransport {
  send(request: GenerationRequest): Promise<string | undefined>;
}

export type GenerationFailureReason = 'missing_credential' | 'rejected' | 'exhausted';

export type GenerationOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: GenerationFailureReason; message: string };

export interface PostGenerator {
  readonly model: string;
  readonly hasCredential: boolean;
  generate(prompt: string): Promise<GenerationOutcome>;
}
