import { POST_VARIANTS } from '../../config/constants.js';
import type { PostRequest, PostVariant } from './types.js';

export const POST_STRUCTURE_SECTIONS = [
  {
    title: 'Attention-Grabbing Opening',
    guidance: 'Start with a question or a bold statement to capture attention.',
  },
  {
    title: 'Engaging Content',
    guidance: 'Describe the main message or offer, highlighting key benefits or features.',
  },
  {
    title: 'Call-to-Action (CTA)',
    guidance:
      'Encourage & provide compelling reasons for the audience to take a specific action (e.g., visit a link, comment, share).',
  },
  {
    title: 'Hashtags',
    guidance: 'Include relevant hashtags to increase post visibility.',
  },
] as const;

/**
 * Turn a validated post request into the instruction sent to Gemini.
 * Field values are interpolated as-is.
 */
export function buildPrompt(
  request: PostRequest,
  variant: PostVariant = POST_VARIANTS.detailed,
): string {
  const structure = POST_STRUCTURE_SECTIONS.map(
    (section, index) => `${index + 1}. **${section.title}:** ${section.guidance}`,
  ).join('\n');

  return `My business type is ${request.businessType}.

Please help me write a ${variant.style} Facebook post, ${variant.lengthGuidance}, that will engage my target audience, ${request.targetAudience}.

Here are some additional details to consider:

* **Post Goal:** ${request.postGoal}
* **Post Tone:** ${request.postTone}
* **Include:** ${request.include}
* **Avoid:** ${request.avoid}

**Example Post Structure:**

${structure}`;
}
