import type {
    ChatMessage,
    RetrievalSource,
    SearchHit,
    SearchRequest,
    SummaryDegradedReason,
    SummaryResponse,
    SummaryStatus,
} from '@hybrid-retrieval/types';

export type GenerationOutcome = 'complete' | Exclude<SummaryDegradedReason, 'circuit_open'>;

export class SummaryContext {
    private readonly startedAt = Date.now();

    constructor(
        public readonly request: SearchRequest,
        public readonly signal?: AbortSignal
    ) {}

    results: SearchHit[] = [];
    degradedSources: RetrievalSource[] = [];
    searchLatencyMs = 0;

    builtContext = '';
    messages: ChatMessage[] = [];

    summary = '';
    summaryStatus: SummaryStatus = 'skipped';
    degradedReason?: SummaryDegradedReason;
    llmLatencyMs = 0;

    /** No summary at all; search results still stand. */
    degrade(reason: SummaryDegradedReason): void {
        this.summary = '';
        this.summaryStatus = 'degraded';
        this.degradedReason = reason;
    }

    finishGeneration(outcome: GenerationOutcome, produced: boolean): void {
        if (outcome === 'complete') {
            this.summaryStatus = 'complete';
            this.degradedReason = undefined;
            return;
        }
        if (!produced) {
            this.degrade(outcome);
            return;
        }
        // Output already sent is kept
        this.summaryStatus = 'incomplete';
        this.degradedReason = outcome;
    }

    toResponse(): SummaryResponse {
        const hasSummary = this.summaryStatus === 'complete' || this.summaryStatus === 'incomplete';
        return {
            results: this.results,
            latencyMs: Date.now() - this.startedAt,
            degradedSources: this.degradedSources,
            summary: hasSummary ? this.summary : null,
            summaryStatus: this.summaryStatus,
            degradedReason: this.degradedReason,
            searchLatencyMs: this.searchLatencyMs,
            llmLatencyMs: this.llmLatencyMs,
        };
    }
}
