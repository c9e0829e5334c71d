// src/search/embeddings/embeddingStore.ts
import { cosineSimilarity } from '../relevanceIndex';

export interface EmbeddingEntry {
    /** `{documentId}#{chunkIndex}` */
    id: string;
    documentId: string;
    documentOrdinal: number;
    vector: number[];
    text: string;
}

export interface EmbeddingHit {
    id: string;
    documentOrdinal: number;
    score: number;
}

/**
 * Keeps chunk embeddings for one corpus version. Each index build gets its own
 * store; the index releases it with `drop` once it is no longer served.
 */
export interface EmbeddingStore {
    /** Drops everything held and stores `entries`. */
    replace(entries: EmbeddingEntry[], dimension: number): Promise<void>;
    search(vector: number[], limit: number): Promise<EmbeddingHit[]>;
    count(): Promise<number>;
    /** Releases external storage. */
    drop(): Promise<void>;
}

export type EmbeddingStoreFactory = () => EmbeddingStore;

export class InMemoryEmbeddingStore implements EmbeddingStore {
    private entries: EmbeddingEntry[] = [];

    async replace(entries: EmbeddingEntry[]): Promise<void> {
        this.entries = entries.slice();
    }

    async search(vector: number[], limit: number): Promise<EmbeddingHit[]> {
        return this.entries
            .map(entry => ({
                id: entry.id,
                documentOrdinal: entry.documentOrdinal,
                score: cosineSimilarity(vector, entry.vector),
            }))
            .sort((a, b) => b.score - a.score)
            .slice(0, limit);
    }

    async count(): Promise<number> {
        return this.entries.length;
    }

    // Entries are left to the garbage collector so in-flight searches still finish.
    async drop(): Promise<void> {}
}
