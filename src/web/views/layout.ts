import { escapeHtml } from './helpers.js';

export function layout(title: string, content: string, flash?: { type: string; message: string }): string {
  const flashHtml = flash
    ? `<div role="alert" class="flash flash-${escapeHtml(flash.type)}">${escapeHtml(flash.message)}</div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en" data-theme="light">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)} - Facebook Post Generator</title>
  <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css">
  <style>
    nav { margin-bottom: 2rem; }
    .flash { padding: 1rem; border-radius: 4px; margin-bottom: 1rem; }
    .flash-success { background: #d4edda; color: #155724; border: 1px solid #c3e6cb; }
    .flash-error { background: #f8d7da; color: #721c24; border: 1px solid #f5c6cb; }
    .text-muted { color: #6c757d; }
    button[type="submit"] { background: #1565c0; border-color: #1565c0; font-weight: bold; }
    article.post-output { background: #f8f9fa; }
  </style>
</head>
<body>
  <main class="container">
    <nav>
      <ul>
        <li><strong>Facebook Post Generator</strong></li>
      </ul>
      <ul>
        <li><a href="/">New post</a></li>
      </ul>
    </nav>
    ${flashHtml}
    ${content}
  </main>
</body>
</html>`;
}
