import fs from 'node:fs';
import path from 'node:path';
import express, { type Request, type Response } from 'express';
import { escapeXml } from './render/escape.js';
import { listFeedStatus } from './state.js';
import { readRecords } from './storage/store.js';
import { buildView, isViewName } from './views.js';

export type ServerOptions = { htmlPath: string; jsonPath?: string; siteUrl?: string };

function queryString(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

/**
 * Read-only HTTP view over the generated page and the JSON archive.
 */
export function createServer(opts: ServerOptions) {
    const app = express();
    const site = opts.siteUrl ?? `http://localhost:${process.env.PORT || 3000}`;

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ ok: true, time: new Date().toISOString() });
    });

    app.get('/', (_req: Request, res: Response) => {
        const file = path.resolve(opts.htmlPath);
        if (!fs.existsSync(file)) return res.status(404).json({ error: 'digest not generated yet' });
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.send(fs.readFileSync(file, 'utf-8'));
    });

    app.get('/articles.json', (_req: Request, res: Response) => {
        if (!opts.jsonPath) return res.status(404).json({ error: 'archive not configured' });
        res.json(readRecords(opts.jsonPath));
    });

    app.get('/api/articles', (req: Request, res: Response) => {
        if (!opts.jsonPath) return res.status(404).json({ error: 'archive not configured' });
        const view = queryString(req.query.view) || 'home';
        if (!isViewName(view)) return res.status(400).json({ error: `unknown view "${view}"` });
        res.json(buildView(readRecords(opts.jsonPath), { view, query: queryString(req.query.q) }));
    });

    app.get('/rss/:source', (req: Request, res: Response) => {
        if (!opts.jsonPath) return res.status(404).json({ error: 'archive not configured' });
        const { source } = req.params;
        const items = readRecords(opts.jsonPath).filter((r) => r.source === source);
        const rss = `<?xml version="1.0" encoding="UTF-8"?>\n` +
          `<rss version="2.0">\n` +
          `<channel>\n` +
          `<title>${escapeXml(`Analytics digest: ${source}`)}</title>\n` +
          `<link>${escapeXml(site)}</link>\n` +
          `<description>${escapeXml(`Archived articles from ${source}`)}</description>\n` +
          items.slice(0, 50).map((it) => {
            const date = new Date(it.published || it.fetched || Date.now());
            return `<item>\n` +
            `<title>${escapeXml(it.title || '')}</title>\n` +
            `<link>${escapeXml(it.link)}</link>\n` +
            `<description>${escapeXml(it.summary || '')}</description>\n` +
            (Number.isNaN(date.getTime()) ? '' : `<pubDate>${date.toUTCString()}</pubDate>\n`) +
            `</item>`;
          }).join('\n') +
          `\n</channel>\n</rss>`;
        res.setHeader('Content-Type', 'application/rss+xml; charset=utf-8');
        res.send(rss);
    });

    app.get('/sources', (_req: Request, res: Response) => {
        res.json(listFeedStatus());
    });

    return app;
}
