export type DigestErrorCode = 'CONFIG_INVALID' | 'MAIL_CONFIG_MISSING' | 'FEED_FETCH_FAILED';

export class DigestError extends Error {
    constructor(
        message: string,
        public readonly code: DigestErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'DigestError';
    }
}

export class ConfigError extends DigestError {
    constructor(message: string, code: 'CONFIG_INVALID' | 'MAIL_CONFIG_MISSING' = 'CONFIG_INVALID', cause?: Error) {
        super(message, code, cause);
        this.name = 'ConfigError';
    }
}

export class FeedFetchError extends DigestError {
    constructor(public readonly feedName: string, cause: Error) {
        super(`Failed to fetch feed "${feedName}": ${cause.message}`, 'FEED_FETCH_FAILED', cause);
        this.name = 'FeedFetchError';
    }
}

export function toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
}
