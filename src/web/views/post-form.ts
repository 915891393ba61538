import { layout } from './layout.js';
import { escapeHtml, selectOptions } from './helpers.js';
import { renderMarkdown } from './markdown.js';
import {
  DEFAULT_POST_GOAL,
  DEFAULT_POST_TONE,
  POST_GOALS,
  POST_TONES,
} from '../../config/constants.js';
import type { PostRequest } from '../../services/gemini/types.js';

export type PostFormValues = Partial<Record<keyof PostRequest, string>>;

export interface PostFormState {
  values?: PostFormValues;
  error?: string;
  generatedText?: string;
}

function textField(
  name: keyof PostRequest,
  label: string,
  value: string,
  placeholder: string,
  required = false,
): string {
  return `<label>
          ${escapeHtml(label)}${required ? ' *' : ''}
          <input type="text" name="${name}" value="${escapeHtml(value)}" placeholder="${escapeHtml(placeholder)}"${required ? ' required' : ''}>
        </label>`;
}

export function postFormPage(state: PostFormState = {}): string {
  const v = {
    businessType: state.values?.businessType ?? '',
    targetAudience: state.values?.targetAudience ?? '',
    postGoal: state.values?.postGoal ?? DEFAULT_POST_GOAL,
    postTone: state.values?.postTone ?? DEFAULT_POST_TONE,
    include: state.values?.include ?? '',
    avoid: state.values?.avoid ?? '',
  };

  const outputHtml = state.generatedText
    ? `
    <article class="post-output">
      <header><strong>Your Facebook post</strong></header>
      ${renderMarkdown(state.generatedText)}
      <footer class="text-muted">Verify before posting: AI can make mistakes.</footer>
    </article>`
    : '';

  return layout(
    'Create a post',
    `
    <h2>Create a Facebook post</h2>
    <p class="text-muted">Describe your business and audience, pick a goal and tone, and we'll draft the post.</p>
    <form method="POST" action="/generate" onsubmit="this.setAttribute('aria-busy', 'true')">
      <div class="grid">
        ${textField('businessType', 'What is your business type?', v.businessType, 'e.g. fitness coach', true)}
        ${textField('targetAudience', 'Describe your target audience', v.targetAudience, 'e.g. fitness enthusiasts', true)}
      </div>
      <div class="grid">
        <label>
          What is the goal of your post?
          <select name="postGoal">${selectOptions(POST_GOALS, v.postGoal)}</select>
        </label>
        <label>
          What tone do you want to use?
          <select name="postTone">${selectOptions(POST_TONES, v.postTone)}</select>
        </label>
      </div>
      ${textField('include', 'What elements do you want to include?', v.include, 'Optional: short video with a sneak peek, image')}
      ${textField('avoid', 'What elements do you want to avoid?', v.avoid, 'Optional: robotic tone, long paragraphs')}
      <button type="submit">Generate post</button>
    </form>
    ${outputHtml}`,
    state.error ? { type: 'error', message: state.error } : undefined,
  );
}
