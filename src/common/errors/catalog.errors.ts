export abstract class CatalogSyncError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Network error, timeout, 5xx or 429 from the catalog. Safe to retry. */
export class TransientFetchError extends CatalogSyncError {
    constructor(
        message: string,
        readonly offset: number,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

/** 4xx or a payload we cannot read. Retrying will not help. */
export class TerminalFetchError extends CatalogSyncError {
    constructor(
        message: string,
        readonly offset: number,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export type FetchError = TransientFetchError | TerminalFetchError;

export function isFetchError(error: unknown): error is FetchError {
    return (
        error instanceof TransientFetchError ||
        error instanceof TerminalFetchError
    );
}

export class PersistenceConflict extends CatalogSyncError {
    constructor(
        message: string,
        readonly externalId?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class IndexWriteError extends CatalogSyncError {
    constructor(
        message: string,
        readonly documentId?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class SearchUnavailable extends CatalogSyncError {}

export class ConfigurationError extends CatalogSyncError {}

export class IngestionInProgressError extends CatalogSyncError {
    constructor() {
        super('An ingestion run is already in progress');
    }
}
