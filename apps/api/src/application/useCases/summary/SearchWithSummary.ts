import type { SearchRequest, SummaryResponse, SummaryStreamEvent } from '@hybrid-retrieval/types';
import { SummaryContext } from './SummaryContext';
import { SummaryPipeline } from './SummaryPipeline';

export class SearchWithSummary {
    constructor(private pipeline: SummaryPipeline) {}

    async execute(request: SearchRequest, options?: { signal?: AbortSignal }): Promise<SummaryResponse> {
        const ctx = new SummaryContext(request, options?.signal);

        await this.pipeline.execute(ctx);

        return ctx.toResponse();
    }

    async *executeStream(
        request: SearchRequest,
        options?: { signal?: AbortSignal }
    ): AsyncGenerator<SummaryStreamEvent> {
        const ctx = new SummaryContext(request, options?.signal);

        yield* this.pipeline.executeStream(ctx);
    }
}
