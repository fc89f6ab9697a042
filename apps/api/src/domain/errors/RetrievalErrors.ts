import type { RetrievalSource } from '@hybrid-retrieval/types';
import { AppError } from './AppError';

export class RetrievalTimeoutError extends AppError {
    constructor(
        public readonly source: RetrievalSource,
        public readonly timeoutMs: number
    ) {
        super(`${source} retrieval exceeded its ${timeoutMs}ms deadline`, 504, 'RETRIEVAL_TIMEOUT');
    }
}

/** Every retrieval branch failed, so there is nothing to fuse. */
export class RetrievalFailureError extends AppError {
    constructor(public readonly failures: Partial<Record<RetrievalSource, string>>) {
        super('Search failed: no retrieval strategy returned a usable result', 503, 'RETRIEVAL_FAILURE');
    }
}
