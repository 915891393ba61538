import { describe, it, expect } from 'vitest';
import {
  createFacebookPost,
  validatePostRequest,
} from '../../../src/workflows/facebook-post.js';
import { buildPrompt } from '../../../src/services/gemini/prompts.js';
import { POST_VARIANTS } from '../../../src/config/constants.js';
import { fakeGenerator } from '../../fixtures/generators.js';
import { fitnessCoachRequest } from '../../fixtures/post-requests.js';

describe('validatePostRequest', () => {
  it('should fill in defaults for the optional fields', () => {
    const result = validatePostRequest({
      businessType: 'fitness coach',
      targetAudience: 'busy professionals',
    });

    expect(result).toEqual({
      ok: true,
      request: {
        businessType: 'fitness coach',
        targetAudience: 'busy professionals',
        postGoal: 'Increase engagement',
        postTone: 'Upbeat',
        include: '',
        avoid: '',
      },
    });
  });

  it('should keep field text exactly as submitted', () => {
    const result = validatePostRequest({ ...fitnessCoachRequest, businessType: '  yoga studio ' });

    expect(result.ok && result.request.businessType).toBe('  yoga studio ');
  });

  it('should reject blank required fields', () => {
    const result = validatePostRequest({ ...fitnessCoachRequest, targetAudience: '   ' });

    expect(result).toEqual({
      ok: false,
      fields: ['targetAudience'],
      issues: ['targetAudience: targetAudience is required'],
    });
  });

  it('should reject options outside the fixed lists', () => {
    const result = validatePostRequest({ ...fitnessCoachRequest, postTone: 'Angry' });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.fields).toEqual(['postTone']);
  });
});

describe('createFacebookPost', () => {
  it('should generate a post from the built prompt', async () => {
    const { generator, generate } = fakeGenerator({ ok: true, text: 'Lunch-break HIIT, anyone?' });

    const result = await createFacebookPost(fitnessCoachRequest, generator);

    expect(result).toEqual({
      status: 'generated',
      request: fitnessCoachRequest,
      text: 'Lunch-break HIIT, anyone?',
    });
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(buildPrompt(fitnessCoachRequest));
  });

  it('should build the prompt for the configured variant', async () => {
    const { generator, generate } = fakeGenerator({ ok: true, text: 'Short one' });

    await createFacebookPost(fitnessCoachRequest, generator, POST_VARIANTS.standard);

    expect(generate).toHaveBeenCalledWith(buildPrompt(fitnessCoachRequest, POST_VARIANTS.standard));
  });

  it.each([
    ['businessType', { ...fitnessCoachRequest, businessType: '' }],
    ['targetAudience', { ...fitnessCoachRequest, targetAudience: '' }],
  ])('should not call the generator when %s is empty', async (_field, input) => {
    const { generator, generate } = fakeGenerator({ ok: true, text: 'unused' });

    const result = await createFacebookPost(input, generator);

    expect(result.status).toBe('invalid');
    expect(result.status === 'invalid' && result.message).toBe(
      'Please provide your business type and target audience.',
    );
    expect(generate).not.toHaveBeenCalled();
  });

  it('should reject input that is not an object', async () => {
    const { generator, generate } = fakeGenerator({ ok: true, text: 'unused' });

    const result = await createFacebookPost(null, generator);

    expect(result.status).toBe('invalid');
    expect(generate).not.toHaveBeenCalled();
  });

  it('should explain an unknown post goal', async () => {
    const { generator } = fakeGenerator({ ok: true, text: 'unused' });

    const result = await createFacebookPost(
      { ...fitnessCoachRequest, postGoal: 'Go viral' },
      generator,
    );

    expect(result.status === 'invalid' && result.message).toBe(
      'Please pick a post goal and tone from the list.',
    );
  });

  it('should surface a generic message when generation fails', async () => {
    const { generator } = fakeGenerator({
      ok: false,
      reason: 'exhausted',
      message: 'network down',
    });

    const result = await createFacebookPost(fitnessCoachRequest, generator);

    expect(result).toEqual({
      status: 'failed',
      request: fitnessCoachRequest,
      message: 'Failed to generate your Facebook post. Please try again.',
    });
  });

  it('should treat a missing credential like any other failure', async () => {
    const { generator } = fakeGenerator({
      ok: false,
      reason: 'missing_credential',
      message: 'GEMINI_API_KEY is not configured',
    });

    const result = await createFacebookPost(fitnessCoachRequest, generator);

    expect(result.status).toBe('failed');
  });
});
