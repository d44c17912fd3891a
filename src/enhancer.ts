import axios from 'axios';
import { createLogger } from './logger.js';

const logger = createLogger('enhancer');

export type DrawbackInput = { title: string; summary?: string; source?: string };

/**
 * Optional text-generation capability. Both operations resolve to null when
 * nothing usable came back; callers then fall back to the rule-based text.
 */
export interface TextEnhancer {
    summarize(text: string): Promise<string | null>;
    drawback(input: DrawbackInput): Promise<string | null>;
}

/**
 * Runs one enhancer call. A rejection is logged at debug and counts as no result,
 * so any TextEnhancer implementation falls back to the rule-based text.
 */
export async function tryEnhance(call: () => Promise<string | null>): Promise<string | null> {
    try {
        return await call();
    } catch (e) {
        logger.debug('enhancer.fail', { err: e instanceof Error ? e.message : String(e) });
        return null;
    }
}

type ChatMessage = { role: 'system' | 'user'; content: string };

type ChatCompletionResponse = {
    choices?: Array<{ message?: { content?: string | null } }>;
};

/**
 * OpenAI-compatible chat completions enhancer.
 * The key is read from OPENAI_API_KEY on every call; without it no request is made.
 */
export function createChatEnhancer(): TextEnhancer {
    async function complete(messages: ChatMessage[], maxTokens: number): Promise<string | null> {
        const apiKey = process.env.OPENAI_API_KEY;
        if (!apiKey) return null;
        const base = (process.env.OPENAI_BASE_URL || 'https://api.openai.com').replace(/\/$/, '');
        const model = process.env.OPENAI_MODEL || 'gpt-4o-mini';
        try {
            const resp = await axios.post<ChatCompletionResponse>(base + '/v1/chat/completions', {
                model,
                messages,
                max_tokens: maxTokens,
                temperature: 0.3,
            }, {
                headers: { Authorization: 'Bearer ' + apiKey, 'Content-Type': 'application/json' }, timeout: 15000
            });
            const content = resp.data?.choices?.[0]?.message?.content;
            if (typeof content !== 'string') return null;
            const text = content.trim();
            return text.length > 0 ? text : null;
        } catch (e) {
            logger.debug('enhancer.fail', { err: e instanceof Error ? e.message : String(e) });
            return null;
        }
    }

    return {
        summarize(text) {
            return complete([
                { role: 'system', content: 'You summarize news articles for a competitive analytics digest.' },
                { role: 'user', content: 'Summarize the following article in two sentences:\n\n' + text },
            ], 120);
        },
        drawback({ title, summary, source }) {
            return complete([
                { role: 'system', content: 'You are a competitive analyst for an analytics vendor.' },
                {
                    role: 'user',
                    content: 'In one short sentence, state a potential drawback or risk of this announcement.\n' +
                        (source ? 'Vendor: ' + source + '\n' : '') +
                        'Title: ' + title + '\n' +
                        'Summary: ' + (summary || ''),
                },
            ], 60);
        },
    };
}
