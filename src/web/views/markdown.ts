import { Marked, type Tokens } from 'marked';
import { escapeHtml } from './helpers.js';

const SAFE_HREF = /^(https?:|mailto:|#)/i;

// Posts come back as Markdown. Raw HTML in the reply is shown as text and
// only http(s), mailto and fragment links are kept.
const markdown = new Marked({
  gfm: true,
  breaks: true,
  renderer: {
    html(token: Tokens.HTML | Tokens.Tag): string {
      return escapeHtml(token.text);
    },
    link(token: Tokens.Link): string {
      const label = this.parser.parseInline(token.tokens);
      if (!SAFE_HREF.test(token.href.trim())) return label;
      return `<a href="${escapeHtml(token.href)}" rel="noopener noreferrer">${label}</a>`;
    },
    image(token: Tokens.Image): string {
      return escapeHtml(token.text);
    },
  },
});

export function renderMarkdown(text: string): string {
  return markdown.parse(text, { async: false });
}
