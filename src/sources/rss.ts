import Parser from 'rss-parser';
import { createLogger } from '../logger.js';
import { FeedFetchError, toError } from '../errors.js';
import { extractSummary } from '../summarizer.js';
import type { TextEnhancer } from '../enhancer.js';
import type { Article, Feed } from '../types.js';

type CustomItem = { description?: string; summary?: string; 'content:encoded'?: string };

export type FeedItem = Parser.Item & CustomItem;

/** Anything that turns a feed URL into parsed entries. */
export interface FeedReader {
    parseURL(url: string): Promise<{ items: FeedItem[] }>;
}

const logger = createLogger('src:rss');

export function createFeedReader(): FeedReader {
    return new Parser<Record<string, unknown>, CustomItem>({
        timeout: 10000,
        customFields: { item: ['description', 'summary'] },
    });
}

export type FetchDeps = { reader?: FeedReader; enhancer?: TextEnhancer };

/**
 * Reads one feed and maps its first `maxItems` entries to articles.
 * Transport or parse failures are rethrown as FeedFetchError.
 */
export async function fetchFeed(feed: Feed, deps: FetchDeps = {}): Promise<Article[]> {
    const reader = deps.reader ?? createFeedReader();
    const start = Date.now();
    let items: FeedItem[];
    try {
        const parsed = await reader.parseURL(feed.url);
        items = parsed.items || [];
    } catch (e) {
        throw new FeedFetchError(feed.name, toError(e));
    }

    const out: Article[] = [];
    for (const it of items.slice(0, feed.maxItems)) {
        const summary = await extractSummary({
            summary: it.summary,
            description: it.description,
            content: [it.content, it['content:encoded']],
        }, deps.enhancer);
        out.push({
            title: it.title || '',
            link: it.link || '',
            summary,
            published: it.pubDate || it.isoDate,
            source: feed.name,
            category: feed.category,
        });
    }
    logger.info('rss.ok', { feed: feed.name, count: out.length, ms: Date.now() - start });
    return out;
}
