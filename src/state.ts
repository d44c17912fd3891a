export type FeedStatus = {
    name: string;
    url?: string;
    lastSuccessAt?: string;
    lastError?: string;
    lastCount?: number;
};

export const runtimeState: {
    feedStatus: Map<string, FeedStatus>;
} = {
    feedStatus: new Map<string, FeedStatus>(),
};

export function setFeedStatus(partial: FeedStatus) {
    const prev = runtimeState.feedStatus.get(partial.name);
    const next: FeedStatus = { ...prev, ...partial };
    runtimeState.feedStatus.set(next.name, next);
}

export function listFeedStatus(): FeedStatus[] {
    return Array.from(runtimeState.feedStatus.values());
}
