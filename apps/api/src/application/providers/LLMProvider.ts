import type { ChatMessage } from '@hybrid-retrieval/types';

export interface LLMProvider {
    /**
     * Lazy, finite, non-restartable sequence of text fragments. Aborting
     * `signal` must stop the underlying request.
     */
    generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}
