import type { ChatMessage } from '@hybrid-retrieval/types';

export class PromptBuilder {
    build(query: string, context: string): ChatMessage[] {
        return [
            {
                role: 'system',
                content: `You are a helpful assistant that summarizes search results concisely.
        Answer using ONLY the search results below.

        SEARCH RESULTS:
        ${context}

        INSTRUCTIONS:
        - If the results do not answer the query, say so.
        - Cite results as [n] where it helps.
        - Keep the summary under 200 words.`,
            },
            { role: 'user', content: `Summarize the search results for the query: "${query}"` },
        ];
    }
}
