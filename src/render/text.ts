import type { Digest } from '../digest.js';
import type { Article } from '../types.js';

export function renderText(digest: Digest<Article & { drawback?: string }>): string {
    const lines: string[] = [];
    for (const [source, arts] of digest.feeds) {
        lines.push(`${source}:`);
        for (const art of arts) {
            lines.push(`- ${art.title}`);
            if (art.summary) lines.push(`  ${art.summary}`);
            if (art.drawback) lines.push(`  Potential drawback: ${art.drawback}`);
            lines.push(`  ${art.link}`);
            lines.push('');
        }
    }
    return lines.join('\n').trim();
}
