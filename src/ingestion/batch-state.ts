import { IngestionState } from './ingestion.types';

const TRANSITIONS: Record<IngestionState, readonly IngestionState[]> = {
    [IngestionState.IDLE]: [IngestionState.FETCHING],
    [IngestionState.FETCHING]: [
        IngestionState.PERSISTING,
        IngestionState.PARTIALLY_FAILED,
        IngestionState.ABORTED,
    ],
    [IngestionState.PERSISTING]: [
        IngestionState.INDEXING,
        IngestionState.PARTIALLY_FAILED,
        IngestionState.ABORTED,
    ],
    [IngestionState.INDEXING]: [
        IngestionState.COMPLETED,
        IngestionState.PARTIALLY_FAILED,
        IngestionState.ABORTED,
    ],
    [IngestionState.COMPLETED]: [],
    [IngestionState.PARTIALLY_FAILED]: [],
    [IngestionState.ABORTED]: [],
};

export function canTransition(from: IngestionState, to: IngestionState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function transition(from: IngestionState, to: IngestionState): IngestionState {
    if (!canTransition(from, to)) {
        throw new Error(`Illegal batch transition ${from} -> ${to}`);
    }
    return to;
}
