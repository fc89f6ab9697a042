import { ChatOllama } from '@langchain/ollama';
import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { ChatMessage } from '@hybrid-retrieval/types';
import type { LLMProvider } from '../../application/providers/LLMProvider';

export class OllamaLLMProvider implements LLMProvider {
    private model: ChatOllama;

    constructor() {
        this.model = new ChatOllama({
            model: process.env.OLLAMA_MODEL || "llama3.2:3b",
            baseUrl: process.env.OLLAMA_BASE_URL || "http://127.0.0.1:11434",
            temperature: 0,
            numPredict: 256,
        });
    }

    async *generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string> {
        const langChainMessages = messages.map(m => {
            if (m.role === 'system') return new SystemMessage(m.content);
            if (m.role === 'assistant') return new AIMessage(m.content);
            return new HumanMessage(m.content);
        });

        const stream = await this.model.stream(langChainMessages, { signal });

        for await (const chunk of stream) {
            if (signal?.aborted) return;
            if (typeof chunk.content === 'string') {
                yield chunk.content;
            }
        }
    }
}
