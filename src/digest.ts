import { annotateDrawback } from './drawbacks.js';
import type { TextEnhancer } from './enhancer.js';
import type { AnnotatedArticle, Article } from './types.js';

export const UNKNOWN_SOURCE = 'Unknown';

/**
 * Articles of one run grouped by source, in the order sources were first seen.
 */
export class Digest<T extends Article = Article> {
    readonly feeds = new Map<string, T[]>();

    add(article: T): void {
        const key = article.source || UNKNOWN_SOURCE;
        const list = this.feeds.get(key);
        if (list) list.push(article);
        else this.feeds.set(key, [article]);
    }

    get sources(): string[] {
        return Array.from(this.feeds.keys());
    }

    get size(): number {
        let n = 0;
        for (const list of this.feeds.values()) n += list.length;
        return n;
    }

    articles(): T[] {
        return Array.from(this.feeds.values()).flat();
    }
}

/** Attaches a drawback to every article, one call at a time, keeping the grouping order. */
export async function annotateDigest(digest: Digest, enhancer?: TextEnhancer): Promise<Digest<AnnotatedArticle>> {
    const out = new Digest<AnnotatedArticle>();
    for (const art of digest.articles()) {
        const drawback = await annotateDrawback({ title: art.title, summary: art.summary, source: art.source }, enhancer);
        out.add({ ...art, drawback });
    }
    return out;
}
