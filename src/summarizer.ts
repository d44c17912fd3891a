import { load } from 'cheerio';
import { tryEnhance, type TextEnhancer } from './enhancer.js';

/** Raw text fields of a feed entry that may carry a summary. */
export type EntryText = {
    summary?: string;
    description?: string;
    content?: Array<string | undefined>;
};

/**
 * Strips tags and decodes entities, collapsing runs of whitespace.
 */
export function stripHtml(text: string): string {
    const $ = load(text, null, false);
    return $.root().text().replace(/\s+/g, ' ').trim();
}

export function firstSentences(text: string, count = 2): string {
    return text.split(/(?<=[.!?])\s+/).slice(0, count).join(' ').trim();
}

/**
 * Builds a short plain-text summary from every text field the entry has.
 * Returns undefined when the entry has no text at all.
 */
export async function extractSummary(fields: EntryText, enhancer?: TextEnhancer): Promise<string | undefined> {
    const parts: string[] = [];
    for (const val of [fields.summary, fields.description, ...(fields.content ?? [])]) {
        if (val && !parts.includes(val)) parts.push(val);
    }
    if (parts.length === 0) return undefined;

    const text = stripHtml(parts.join(' '));
    if (enhancer && text) {
        const generated = await tryEnhance(() => enhancer.summarize(text));
        if (generated) return generated;
    }
    return firstSentences(text);
}
