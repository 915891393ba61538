import { HarmBlockThreshold, HarmCategory } from '@google/genai';
import type { PostVariant, SafetySetting, SamplingConfig } from '../services/gemini/types.js';

export const POST_GOALS = [
  'Promote a new product',
  'Share valuable content',
  'Increase engagement',
  'Other',
] as const;

export const POST_TONES = [
  'Informative',
  'Humorous',
  'Inspirational',
  'Upbeat',
  'Casual',
] as const;

export const DEFAULT_POST_GOAL = 'Increase engagement';
export const DEFAULT_POST_TONE = 'Upbeat';

export const GEMINI_SAMPLING: SamplingConfig = {
  temperature: 0.7,
  topP: 0.95,
  topK: 0,
};

export const GEMINI_SAFETY_SETTINGS: readonly SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({
  category,
  threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
}));

export const POST_VARIANTS: Record<PostVariant['name'], PostVariant> = {
  detailed: {
    name: 'detailed',
    model: 'gemini-1.5-flash',
    maxOutputTokens: 4096,
    style: 'highly detailed',
    lengthGuidance: 'at least 1000-2000 words',
  },
  standard: {
    name: 'standard',
    model: 'gemini-1.5-flash',
    maxOutputTokens: 2048,
    style: 'well-structured',
    lengthGuidance: 'around 400-600 words',
  },
  concise: {
    name: 'concise',
    model: 'gemini-1.5-pro',
    maxOutputTokens: 1024,
    style: 'short, punchy',
    lengthGuidance: 'no more than 200 words',
  },
};

export const REQUIRED_INPUTS_MESSAGE = 'Please provide your business type and target audience.';
export const INVALID_CHOICE_MESSAGE = 'Please pick a post goal and tone from the list.';
export const GENERATION_FAILED_MESSAGE = 'Failed to generate your Facebook post. Please try again.';
