import type { RetrievalSource, SearchHit, SearchRequest, SearchResponse } from '@hybrid-retrieval/types';
import { DocumentRepository, type DocumentSearchResult } from '../../domain/entities/DocumentRepository';
import type { RankedHit } from '../../domain/entities/RankedHit';
import { TenantDocument } from '../../domain/entities/TenantDocument';
import { RetrievalFailureError, RetrievalTimeoutError } from '../../domain/errors/RetrievalErrors';
import logger from '../../infrastructure/logger';
import type { VectorProvider } from '../providers/VectorProvider';
import { CircuitBreaker } from '../resilience/CircuitBreaker';
import { DeadlineGuard, type BoundedOutcome } from '../resilience/DeadlineGuard';
import { DEFAULT_RRF_K, RankFuser } from './RankFuser';

export interface SearchOrchestratorConfig {
    rrfK: number;
    /** Overall budget for both retrieval branches. */
    budgetMs: number;
    /** Per-branch sub-deadline inside the overall budget. */
    branchTimeoutMs: number;
    /** Candidates fetched per branch, as a multiple of topK. */
    candidateMultiplier: number;
}

const DEFAULT_SEARCH_BUDGET_MS = 800;

export class SearchOrchestrator {
    private config: SearchOrchestratorConfig;

    constructor(
        private documentRepository: DocumentRepository,
        private vectorProvider: VectorProvider,
        private storeBreaker: CircuitBreaker,
        private deadlineGuard: DeadlineGuard,
        private rankFuser: RankFuser,
        config?: Partial<SearchOrchestratorConfig>
    ) {
        const budgetMs = config?.budgetMs ?? DEFAULT_SEARCH_BUDGET_MS;
        this.config = {
            rrfK: config?.rrfK ?? DEFAULT_RRF_K,
            budgetMs,
            branchTimeoutMs: Math.min(config?.branchTimeoutMs ?? budgetMs, budgetMs),
            candidateMultiplier: config?.candidateMultiplier ?? 2,
        };
    }

    async search(request: SearchRequest, options: { signal?: AbortSignal } = {}): Promise<SearchResponse> {
        const startTime = Date.now();
        const { tenantId, query, topK } = request;
        const limit = topK * this.config.candidateMultiplier;
        const timeoutMs = this.config.branchTimeoutMs;

        // Both branches are scoped to the same tenantId; nothing else is ever merged.
        const run = await this.deadlineGuard.runBounded<DocumentSearchResult[], RetrievalSource>(
            [
                {
                    name: 'dense',
                    timeoutMs,
                    run: (signal, remainingMs) => this.denseSearch(tenantId, query, limit, signal, remainingMs),
                },
                {
                    name: 'sparse',
                    timeoutMs,
                    run: (signal, remainingMs) => this.storeBreaker.execute(
                        () => this.documentRepository.sparseSearch(tenantId, query, limit, {
                            signal,
                            timeoutMs: remainingMs(),
                        }),
                        { signal }
                    ),
                },
            ],
            { budgetMs: this.config.budgetMs, signal: options.signal }
        );

        const documents = new Map<string, TenantDocument>();
        const rankedLists: RankedHit[][] = [];
        const degradedSources: RetrievalSource[] = [];
        const failures: Partial<Record<RetrievalSource, string>> = {};

        for (const outcome of run.outcomes) {
            if (outcome.status === 'fulfilled') {
                rankedLists.push(outcome.value.map((result) => {
                    documents.set(result.document.documentId, result.document);
                    return {
                        documentId: result.document.documentId,
                        rank: result.rank,
                        source: outcome.name,
                        rawScore: result.score,
                    };
                }));
                continue;
            }

            const reason = describeFailure(outcome);
            degradedSources.push(outcome.name);
            failures[outcome.name] = reason;
            logger.warn('Retrieval branch degraded', {
                source: outcome.name,
                status: outcome.status,
                reason,
                tenantId,
                elapsedMs: outcome.elapsedMs,
            });
        }

        if (!run.usable) {
            logger.error('Hybrid search failed on every branch', { tenantId, failures });
            throw new RetrievalFailureError(failures);
        }

        // Truncation happens strictly after fusion
        const fused = this.rankFuser.fuse(rankedLists, this.config.rrfK).slice(0, topK);

        const results: SearchHit[] = fused.flatMap((result) => {
            const document = documents.get(result.documentId);
            if (!document) return [];
            return [{
                documentId: result.documentId,
                content: document.content,
                score: result.fusedScore,
                sources: [...result.sources],
                metadata: document.metadata,
            }];
        });

        const latencyMs = Date.now() - startTime;
        logger.info('Hybrid search completed', {
            latencyMs,
            tenantId,
            hits: results.length,
            degradedSources,
            query: query.substring(0, 50),
        });

        if (latencyMs > this.config.budgetMs) {
            logger.warn('Hybrid search exceeded its latency budget', {
                latencyMs,
                budgetMs: this.config.budgetMs,
                tenantId,
            });
        }

        return { results, latencyMs, degradedSources };
    }

    private async denseSearch(
        tenantId: string,
        query: string,
        limit: number,
        signal: AbortSignal,
        remainingMs: () => number
    ): Promise<DocumentSearchResult[]> {
        // Embedding failures belong to the embedding model, not to the vector store breaker
        const queryEmbedding = await this.vectorProvider.generateEmbedding(query, signal);

        // The statement timeout only gets what the embedding left of the branch deadline
        return this.storeBreaker.execute(
            () => this.documentRepository.denseSearch(tenantId, queryEmbedding, limit, {
                signal,
                timeoutMs: remainingMs(),
            }),
            { signal }
        );
    }
}

function describeFailure(outcome: BoundedOutcome<DocumentSearchResult[], RetrievalSource>): string {
    switch (outcome.status) {
        case 'timeout':
            return new RetrievalTimeoutError(outcome.name, outcome.timeoutMs).message;
        case 'cancelled':
            return `${outcome.name} retrieval cancelled`;
        case 'rejected':
            return outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        default:
            return 'unknown';
    }
}
