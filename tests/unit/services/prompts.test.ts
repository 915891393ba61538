import { describe, it, expect } from 'vitest';
import { buildPrompt, POST_STRUCTURE_SECTIONS } from '../../../src/services/gemini/prompts.js';
import { POST_VARIANTS } from '../../../src/config/constants.js';
import { bakeryRequest, fitnessCoachRequest } from '../../fixtures/post-requests.js';

describe('Facebook post prompt', () => {
  it('should include every field of the request verbatim', () => {
    const prompt = buildPrompt(fitnessCoachRequest);

    expect(prompt).toContain('My business type is fitness coach.');
    expect(prompt).toContain('engage my target audience, busy professionals.');
    expect(prompt).toContain('* **Post Goal:** Increase engagement');
    expect(prompt).toContain('* **Post Tone:** Upbeat');
    expect(prompt).toContain('* **Include:** a short video');
    expect(prompt).toContain('* **Avoid:** long paragraphs');
  });

  it('should lay out the four post sections in order', () => {
    const prompt = buildPrompt(fitnessCoachRequest);

    expect(prompt).toContain(
      '1. **Attention-Grabbing Opening:** Start with a question or a bold statement to capture attention.',
    );
    expect(prompt).toContain('2. **Engaging Content:**');
    expect(prompt).toContain('3. **Call-to-Action (CTA):**');
    expect(prompt).toContain(
      '4. **Hashtags:** Include relevant hashtags to increase post visibility.',
    );
    expect(POST_STRUCTURE_SECTIONS.map((section) => section.title)).toEqual([
      'Attention-Grabbing Opening',
      'Engaging Content',
      'Call-to-Action (CTA)',
      'Hashtags',
    ]);
  });

  it('should be deterministic', () => {
    expect(buildPrompt(bakeryRequest)).toBe(buildPrompt({ ...bakeryRequest }));
  });

  it('should ask for a long, detailed post by default', () => {
    expect(buildPrompt(fitnessCoachRequest)).toContain(
      'Please help me write a highly detailed Facebook post, at least 1000-2000 words, that will engage',
    );
  });

  it('should take length and style from the variant', () => {
    const prompt = buildPrompt(fitnessCoachRequest, POST_VARIANTS.concise);

    expect(prompt).toContain(
      'Please help me write a short, punchy Facebook post, no more than 200 words, that will engage',
    );
    expect(prompt).not.toContain('1000-2000 words');
  });

  it('should not escape markup or quotes in user input', () => {
    const prompt = buildPrompt({
      ...fitnessCoachRequest,
      include: '<b>"bold"</b> & emojis',
      avoid: '',
    });

    expect(prompt).toContain('* **Include:** <b>"bold"</b> & emojis');
    expect(prompt).toContain('* **Avoid:** \n');
  });
});
