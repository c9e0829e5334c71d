// src/search/embeddings/embeddingProvider.ts
export interface EmbeddingProvider {
    /**
     * Generate an embedding for a single search query
     */
    embedQuery(text: string): Promise<number[]>;

    /**
     * Generate embeddings for documents, one vector per input in input order
     */
    embedBatch(texts: string[]): Promise<number[][]>;

    /**
     * Get the dimension of the embedding vectors
     */
    getDimension(): number;
}
