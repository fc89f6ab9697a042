import type { SearchRequest, SearchResponse } from '@hybrid-retrieval/types';
import { SearchOrchestrator } from '../services/SearchOrchestrator';

export class SearchDocuments {
    constructor(private orchestrator: SearchOrchestrator) {}

    async execute(request: SearchRequest, options?: { signal?: AbortSignal }): Promise<SearchResponse> {
        return this.orchestrator.search(request, options);
    }
}
