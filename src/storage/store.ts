import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logger.js';
import type { Digest } from '../digest.js';
import type { AnnotatedArticle, PersistedRecord } from '../types.js';

const logger = createLogger('store');

function asText(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

/** Entries need a non-empty string link; scalar fields of the wrong type are coerced to text. */
export function normalizeRecord(value: unknown): PersistedRecord | undefined {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
    const entry = new Map<string, unknown>(Object.entries(value));
    const link = entry.get('link');
    if (typeof link !== 'string' || link.length === 0) return undefined;
    return {
        ...Object.fromEntries(entry),
        title: asText(entry.get('title')) ?? '',
        link,
        summary: asText(entry.get('summary')),
        published: asText(entry.get('published')),
        source: asText(entry.get('source')),
        category: asText(entry.get('category')),
        drawbacks: asText(entry.get('drawbacks')) ?? '',
        fetched: asText(entry.get('fetched')) ?? '',
    };
}

/**
 * Loads the archive. A missing, unreadable or malformed file yields an empty list,
 * and the next write replaces it.
 */
export function readRecords(file: string): PersistedRecord[] {
    let raw: string;
    try {
        raw = fs.readFileSync(file, 'utf-8');
    } catch {
        return [];
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e) {
        logger.warn('store.corrupt', { file, err: e instanceof Error ? e.message : String(e) });
        return [];
    }
    if (!Array.isArray(parsed)) {
        logger.warn('store.corrupt', { file, err: 'archive is not a JSON array' });
        return [];
    }
    const records: PersistedRecord[] = [];
    for (const value of parsed) {
        const rec = normalizeRecord(value);
        if (rec) records.push(rec);
    }
    return records;
}

export function toRecord(art: AnnotatedArticle, fetched: string): PersistedRecord {
    return {
        title: art.title,
        link: art.link,
        summary: art.summary ?? null,
        published: art.published ?? null,
        source: art.source ?? null,
        category: art.category ?? null,
        drawbacks: art.drawback,
        fetched,
    };
}

/**
 * Upserts every digest article by link (whole-record overwrite) and orders the
 * result by fetch date, newest first. Equal dates keep their insertion order.
 */
export function mergeRecords(existing: PersistedRecord[], digest: Digest<AnnotatedArticle>, fetched: string): PersistedRecord[] {
    const byLink = new Map<string, PersistedRecord>();
    for (const rec of existing) byLink.set(rec.link, rec);
    for (const art of digest.articles()) byLink.set(art.link, toRecord(art, fetched));

    const merged = Array.from(byLink.values());
    merged.sort((a, b) => {
        const fa = a.fetched || '';
        const fb = b.fetched || '';
        return fa === fb ? 0 : fa < fb ? 1 : -1;
    });
    return merged;
}

export function writeRecords(file: string, records: PersistedRecord[]): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(records, null, 2), 'utf-8');
    logger.info('store.write', { file, count: records.length });
}

export function updateStore(file: string, digest: Digest<AnnotatedArticle>, fetched: string): PersistedRecord[] {
    const merged = mergeRecords(readRecords(file), digest, fetched);
    writeRecords(file, merged);
    return merged;
}
