export type Article = { title: string; link: string; summary?: string; published?: string; source?: string; category?: string };

export type AnnotatedArticle = Article & { drawback: string };

export type Feed = { name: string; url: string; maxItems: number; category: string };

/** One archived article, keyed by link. Key names match the archive file on disk. */
export type PersistedRecord = {
    title: string;
    link: string;
    summary: string | null;
    published: string | null;
    source: string | null;
    category: string | null;
    drawbacks: string;
    fetched: string;
    [extra: string]: unknown;
};
