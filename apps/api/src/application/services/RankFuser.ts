import type { RetrievalSource } from '@hybrid-retrieval/types';
import type { FusedResult, RankedHit } from '../../domain/entities/RankedHit';

export const DEFAULT_RRF_K = 60;

interface FusionEntry {
    documentId: string;
    contributions: number[];
    listCount: number;
    denseRank: number;
    sources: Set<RetrievalSource>;
}

const SOURCE_ORDER: readonly RetrievalSource[] = ['dense', 'sparse'];

/**
 * Reciprocal Rank Fusion: a document scores the sum of 1/(k + rank) over
 * every list it appears in. Pure and synchronous.
 */
export class RankFuser {
    constructor(private readonly defaultK: number = DEFAULT_RRF_K) {
        assertValidK(defaultK);
    }

    fuse(lists: readonly (readonly RankedHit[])[], k: number = this.defaultK): FusedResult[] {
        assertValidK(k);

        const entries = new Map<string, FusionEntry>();

        for (const list of lists) {
            // Best rank per document within this list
            const bestRanks = new Map<string, RankedHit>();
            for (const hit of list) {
                const current = bestRanks.get(hit.documentId);
                if (!current || hit.rank < current.rank) {
                    bestRanks.set(hit.documentId, hit);
                }
            }

            for (const hit of bestRanks.values()) {
                let entry = entries.get(hit.documentId);
                if (!entry) {
                    entry = {
                        documentId: hit.documentId,
                        contributions: [],
                        listCount: 0,
                        denseRank: Number.POSITIVE_INFINITY,
                        sources: new Set(),
                    };
                    entries.set(hit.documentId, entry);
                }

                entry.contributions.push(1 / (k + hit.rank));
                entry.listCount += 1;
                entry.sources.add(hit.source);
                if (hit.source === 'dense' && hit.rank < entry.denseRank) {
                    entry.denseRank = hit.rank;
                }
            }
        }

        return Array.from(entries.values())
            .map((entry) => ({ entry, score: sumAscending(entry.contributions) }))
            .sort((a, b) => compareFused(a.entry, a.score, b.entry, b.score))
            .map(({ entry, score }) => ({
                documentId: entry.documentId,
                fusedScore: score,
                sources: SOURCE_ORDER.filter((source) => entry.sources.has(source)),
            }));
    }
}

function assertValidK(k: number): void {
    if (!Number.isFinite(k) || k <= 0) {
        throw new RangeError(`RRF k must be a positive finite number, received ${k}`);
    }
}

// Float addition is not associative; a fixed order keeps scores independent of list order.
function sumAscending(values: number[]): number {
    return [...values].sort((a, b) => a - b).reduce((total, value) => total + value, 0);
}

function compareFused(a: FusionEntry, aScore: number, b: FusionEntry, bScore: number): number {
    if (aScore !== bScore) {
        return bScore - aScore;
    }
    if (a.listCount !== b.listCount) {
        return b.listCount - a.listCount;
    }
    if (a.denseRank !== b.denseRank) {
        return a.denseRank < b.denseRank ? -1 : 1;
    }
    if (a.documentId === b.documentId) {
        return 0;
    }
    return a.documentId < b.documentId ? -1 : 1;
}
