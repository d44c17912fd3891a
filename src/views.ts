import { VENDOR_WEAKNESSES } from './drawbacks.js';
import type { PersistedRecord } from './types.js';

export type ViewName = 'home' | 'vendors' | 'industry' | 'older';

export const VIEW_NAMES: readonly ViewName[] = ['home', 'vendors', 'industry', 'older'];

export type ArchiveSection = { title: string; articles: PersistedRecord[] };

const RECENT_DAYS = 2;
const HOME_LIMIT = 10;
const PRIORITY_SOURCES = new Set(Object.keys(VENDOR_WEAKNESSES));

export function isViewName(value: string): value is ViewName {
    return (VIEW_NAMES as readonly string[]).includes(value);
}

export function filterRecords(records: PersistedRecord[], query: string): PersistedRecord[] {
    const q = query.toLowerCase();
    if (!q) return records;
    return records.filter((r) => `${r.title || ''} ${r.summary || ''}`.toLowerCase().includes(q));
}

function recordTime(r: PersistedRecord): number {
    return new Date(r.published || r.fetched || '').getTime();
}

function fetchedTime(r: PersistedRecord): number {
    const t = new Date(r.fetched || 0).getTime();
    return Number.isNaN(t) ? 0 : t;
}

function groupBy(records: PersistedRecord[], key: (r: PersistedRecord) => string): ArchiveSection[] {
    const groups = new Map<string, PersistedRecord[]>();
    for (const r of records) {
        const k = key(r);
        const list = groups.get(k);
        if (list) list.push(r);
        else groups.set(k, [r]);
    }
    return Array.from(groups, ([title, articles]) => ({ title, articles }));
}

function nonEmpty(sections: ArchiveSection[]): ArchiveSection[] {
    return sections.filter((s) => s.articles.length > 0);
}

/**
 * Builds the sections of one archive view.
 * "Recent" means published (or, failing that, fetched) within the last two days of `now`.
 */
export function buildView(records: PersistedRecord[], opts: { view: ViewName; query?: string; now?: Date }): ArchiveSection[] {
    const filtered = filterRecords(records, opts.query ?? '');
    const cutoff = new Date(opts.now ?? new Date());
    cutoff.setDate(cutoff.getDate() - RECENT_DAYS);
    const cutoffMs = cutoff.getTime();

    switch (opts.view) {
        case 'home': {
            const recent = filtered
                .filter((r) => recordTime(r) >= cutoffMs)
                .sort((a, b) => recordTime(b) - recordTime(a));
            const pool = (recent.length > 0 ? recent : filtered).slice(0, HOME_LIMIT);
            const sorted = [...pool].sort((a, b) => {
                const aPri = PRIORITY_SOURCES.has(a.source || '');
                const bPri = PRIORITY_SOURCES.has(b.source || '');
                if (aPri !== bPri) return aPri ? -1 : 1;
                return fetchedTime(b) - fetchedTime(a);
            });
            return nonEmpty([
                { title: 'Top News', articles: sorted.filter((r) => PRIORITY_SOURCES.has(r.source || '')) },
                { title: 'Latest', articles: sorted.filter((r) => !PRIORITY_SOURCES.has(r.source || '')) },
            ]);
        }
        case 'vendors':
            return groupBy(filtered.filter((r) => r.category === 'vendor'), (r) => r.source || 'Unknown');
        case 'industry':
            return nonEmpty([{ title: 'Industry', articles: filtered.filter((r) => r.category === 'industry') }]);
        case 'older':
            return groupBy(
                filtered.filter((r) => {
                    const t = recordTime(r);
                    return Number.isNaN(t) || t < cutoffMs;
                }),
                (r) => r.fetched || 'Unknown'
            );
    }
}
