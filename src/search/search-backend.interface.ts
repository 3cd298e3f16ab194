import {
    IndexResult,
    SearchBackendResult,
    SearchDocument,
    SearchQuery,
} from './search.types';

export const SEARCH_BACKEND = Symbol('SEARCH_BACKEND');

/**
 * What the indexer and query engine need from a search engine. Implementations
 * throw `SearchUnavailable` from `search` and `suggest` when the engine cannot be reached.
 */
export interface SearchBackend {
    ensureMapping(): Promise<void>;
    /** Create-or-replace by id. Per-document failures are returned, not thrown. */
    indexBatch(documents: SearchDocument[]): Promise<IndexResult>;
    search(query: SearchQuery): Promise<SearchBackendResult>;
    /** Up to `size` product titles starting with `prefix`. */
    suggest(prefix: string, size: number): Promise<string[]>;
}
