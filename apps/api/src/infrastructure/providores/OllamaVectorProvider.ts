import type { VectorProvider } from '../../application/providers/VectorProvider';
import { OllamaEmbeddings } from '@langchain/ollama';

export class OllamaVectorProvider implements VectorProvider {
    private embeddings = new OllamaEmbeddings({
        model: process.env.OLLAMA_EMBEDDING_MODEL || "nomic-embed-text",
        baseUrl: process.env.OLLAMA_BASE_URL || "http://localhost:11434",
    });

    async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
        // embedQuery takes no signal; a deadline that fires mid-call abandons the result
        signal?.throwIfAborted();
        const embedding = await this.embeddings.embedQuery(text);
        signal?.throwIfAborted();
        return embedding;
    }
}
