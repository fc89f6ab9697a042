export interface VectorProvider {
    generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]>;
}
