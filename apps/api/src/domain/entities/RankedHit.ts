import type { RetrievalSource } from '@hybrid-retrieval/types';

export interface RankedHit {
    readonly documentId: string;
    readonly rank: number; // 1-based, unique within its source list
    readonly source: RetrievalSource;
    readonly rawScore?: number;
}

export interface FusedResult {
    readonly documentId: string;
    readonly fusedScore: number;
    readonly sources: readonly RetrievalSource[];
}
