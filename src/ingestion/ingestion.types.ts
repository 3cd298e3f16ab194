import { UpsertFailure } from '../product/services/product-persistence.service';
import { IndexFailure } from '../search/search.types';

export enum IngestionState {
    IDLE = 'idle',
    FETCHING = 'fetching',
    PERSISTING = 'persisting',
    INDEXING = 'indexing',
    COMPLETED = 'completed',
    PARTIALLY_FAILED = 'partially_failed',
    ABORTED = 'aborted',
}

export interface IngestionRunOptions {
    signal?: AbortSignal;
    /** Overrides `INGESTION_DEADLINE_MS`; 0 disables the deadline. */
    deadlineMs?: number;
    startOffset?: number;
}

export interface FetchFailure {
    offset: number;
    status?: number;
    reason: string;
}

export interface BatchReport {
    offset: number;
    state: IngestionState;
    fetched: number;
    fromCache: boolean;
    inserted: number;
    updated: number;
    persistFailures: UpsertFailure[];
    indexed: number;
    indexFailures: IndexFailure[];
    fetchFailure?: FetchFailure;
}

export interface RunReport {
    runId: string;
    state: IngestionState;
    startedAt: Date;
    finishedAt: Date;
    /** Catalog size reported by the first page, if any. */
    total: number | null;
    batches: BatchReport[];
    fetched: number;
    inserted: number;
    updated: number;
    persistFailures: UpsertFailure[];
    fetchFailures: FetchFailure[];
    indexFailures: IndexFailure[];
    /** Set when documents are missing from the index and `reindexAll` should run. */
    needsReindex: boolean;
    abortReason?: string;
}
