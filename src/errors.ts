export class RarityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export type FetchErrorKind = 'network' | 'http_status' | 'parse';

export interface FetchErrorRecord {
    kind: FetchErrorKind;
    url: string;
    index: number;
    reason: string;
    statusCode?: number;
    message: string;
}

/**
 * A per-URL failure. These are returned in place of item metadata rather than thrown,
 * so one bad URL never aborts the rest of a batch.
 */
export abstract class FetchError extends RarityError {
    public abstract readonly kind: FetchErrorKind;

    constructor(
        public readonly url: string,
        public readonly index: number,
        public readonly reason: string,
        message: string
    ) {
        super(message);
    }

    public toJSON(): FetchErrorRecord {
        return {
            kind: this.kind,
            url: this.url,
            index: this.index,
            reason: this.reason,
            message: this.message
        };
    }
}

/** Connection failure, DNS failure or timeout. */
export class NetworkError extends FetchError {
    public readonly kind = 'network' as const;

    constructor(url: string, index: number, reason: string) {
        super(url, index, reason, `Request to ${url} failed: ${reason}`);
    }
}

export class HTTPStatusError extends FetchError {
    public readonly kind = 'http_status' as const;

    constructor(url: string, index: number, public readonly statusCode: number) {
        super(url, index, `status_${statusCode}`, `HTTP error! status: ${statusCode} (${url})`);
    }

    public toJSON(): FetchErrorRecord {
        return { ...super.toJSON(), statusCode: this.statusCode };
    }
}

/** Body was not JSON, or did not carry an attribute list in the configured shape. */
export class ParseError extends FetchError {
    public readonly kind = 'parse' as const;

    constructor(url: string, index: number, public readonly detail: string) {
        super(url, index, 'parse_error', `Unable to parse metadata from ${url}: ${detail}`);
    }
}

export class InvalidCollectionSize extends RarityError {
    constructor(public readonly collectionSize: number) {
        super(`Collection size must be a positive number, got ${collectionSize}`);
    }
}

export class InvalidConcurrencyLimit extends RarityError {
    constructor(public readonly limit: number) {
        super(`Concurrency limit must be a positive integer, got ${limit}`);
    }
}

export class ConfigError extends RarityError {
    constructor(public readonly key: string, message: string) {
        super(`${key}: ${message}`);
    }
}

export function isFetchError(value: unknown): value is FetchError {
    return value instanceof FetchError;
}
