import { loadFeeds, loadMailConfig } from './config.js';
import { Digest, annotateDigest } from './digest.js';
import type { TextEnhancer } from './enhancer.js';
import { createLogger } from './logger.js';
import { sendDigestEmail, type TransportFactory } from './notifier.js';
import { renderHtml, writeHtml } from './render/html.js';
import { renderText } from './render/text.js';
import { fetchFeed, type FeedReader } from './sources/rss.js';
import { setFeedStatus } from './state.js';
import { updateStore } from './storage/store.js';
import type { AnnotatedArticle, Feed, PersistedRecord } from './types.js';

const logger = createLogger('pipeline');

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

export type BuildDeps = { reader?: FeedReader; enhancer?: TextEnhancer };

/**
 * Fetches the feeds one after another, in configuration order.
 * A failing feed is logged, recorded in the feed status and skipped.
 */
export async function buildDigest(feeds: Feed[], deps: BuildDeps = {}): Promise<{ digest: Digest; failedFeeds: string[] }> {
    const digest = new Digest();
    const failedFeeds: string[] = [];
    for (const feed of feeds) {
        try {
            const list = await fetchFeed(feed, deps);
            for (const art of list) digest.add(art);
            setFeedStatus({ name: feed.name, url: feed.url, lastSuccessAt: new Date().toISOString(), lastError: undefined, lastCount: list.length });
        } catch (e) {
            const err = e instanceof Error ? e.message : String(e);
            logger.warn('rss.fail', { feed: feed.name, url: feed.url, err });
            setFeedStatus({ name: feed.name, url: feed.url, lastError: err });
            failedFeeds.push(feed.name);
        }
    }
    return { digest, failedFeeds };
}

export type PipelineOptions = {
    configPath: string;
    htmlPath: string;
    jsonPath?: string;
    sendEmail?: boolean;
    enhancer?: TextEnhancer;
    reader?: FeedReader;
    createTransport?: TransportFactory;
    env?: NodeJS.ProcessEnv;
    now?: Date;
};

export type PipelineResult = {
    digest: Digest<AnnotatedArticle>;
    records?: PersistedRecord[];
    failedFeeds: string[];
    emailed: boolean;
};

/**
 * One run: feeds, digest, drawbacks, HTML, archive merge, then the optional email.
 * Mail settings are checked up front so a bad setup fails before any fetch.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
    const env = opts.env ?? process.env;
    if (opts.sendEmail) loadMailConfig(env);

    const feeds = loadFeeds(opts.configPath);
    logger.info('pipeline.start', { feeds: feeds.length });

    const { digest: raw, failedFeeds } = await buildDigest(feeds, { reader: opts.reader, enhancer: opts.enhancer });
    const digest = await annotateDigest(raw, opts.enhancer);

    writeHtml(opts.htmlPath, renderHtml(digest));

    let records: PersistedRecord[] | undefined;
    if (opts.jsonPath) {
        records = updateStore(opts.jsonPath, digest, formatDate(opts.now ?? new Date()));
    }

    let emailed = false;
    if (opts.sendEmail) {
        await sendDigestEmail(renderText(digest), { env, createTransport: opts.createTransport });
        emailed = true;
    }

    logger.info('pipeline.done', { articles: digest.size, sources: digest.sources.length, failed: failedFeeds.length, archived: records?.length, emailed });
    return { digest, records, failedFeeds, emailed };
}
