import fs from 'node:fs';
import path from 'node:path';
import type { Digest } from '../digest.js';
import type { Article } from '../types.js';
import { escapeXml, safeHref } from './escape.js';

export const DEFAULT_TITLE = 'Daily Analytics Digest';

type RenderableArticle = Article & { drawback?: string };

function renderItem(art: RenderableArticle): string {
    const parts = [`<a href="${safeHref(art.link)}" target="_blank" rel="noopener noreferrer">${escapeXml(art.title)}</a>`];
    if (art.published) parts.push(` <span class="date">${escapeXml(art.published)}</span>`);
    if (art.summary) parts.push(`<p class="summary">${escapeXml(art.summary)}</p>`);
    if (art.drawback) parts.push(`<p class="drawback"><strong>Potential drawback:</strong> ${escapeXml(art.drawback)}</p>`);
    return `<li>${parts.join('')}</li>`;
}

/**
 * Renders a standalone page with one collapsible group per source.
 */
export function renderHtml(digest: Digest<RenderableArticle>, opts: { title?: string } = {}): string {
    const title = escapeXml(opts.title ?? DEFAULT_TITLE);
    const groups = Array.from(digest.feeds.entries()).map(([source, arts]) =>
        `<details open>\n<summary>${escapeXml(source)} <span class="count">(${arts.length})</span></summary>\n` +
        `<ul>\n${arts.map(renderItem).join('\n')}\n</ul>\n</details>`
    );
    return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<meta name="viewport" content="width=device-width,initial-scale=1" />
<title>${title}</title>
<style>
  body{font-family:Arial,sans-serif;margin:2em;color:#1d2433}
  details{margin-bottom:1em;border-bottom:1px solid #ccc;padding-bottom:.5em}
  summary{font-size:1.2em;font-weight:700;cursor:pointer}
  ul{list-style-type:none;padding-left:0}
  li{margin-bottom:.75em}
  .date,.count{color:#6b7280;font-size:.9em}
  .summary{margin:.25em 0}
  .drawback{margin:.25em 0;color:#9a3412}
</style>
</head>
<body>
<h1>${title}</h1>
${groups.length > 0 ? groups.join('\n') : '<p class="empty">No articles available.</p>'}
</body>
</html>
`;
}

export function writeHtml(file: string, html: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, html, 'utf-8');
}
