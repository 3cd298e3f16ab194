/** A product record with canonical camelCase keys, not yet validated. */
export type SourceRecord = Record<string, unknown>;

export interface RawProductBatch {
    offset: number;
    limit: number;
    /** Size of the whole catalog, or null when the source does not say. */
    total: number | null;
    records: SourceRecord[];
    fromCache: boolean;
}

export interface BatchStreamOptions {
    startOffset?: number;
    limit?: number;
    /** Pages to advance between yields; workers sharing a catalog use their count. */
    stride?: number;
    signal?: AbortSignal;
}
