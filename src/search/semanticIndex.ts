// src/search/semanticIndex.ts
import { RankedResult, RetrievableDocument } from '../types';
import { EmbeddingProvider } from './embeddings/embeddingProvider';
import { EmbeddingEntry, EmbeddingStore, EmbeddingStoreFactory } from './embeddings/embeddingStore';
import { RelevanceIndex, assertResultCount, rankByScore } from './relevanceIndex';
import { ChunkingOptions, DEFAULT_CHUNKING, chunkText } from './textChunker';
import { EmbeddingError } from '../utils/errors';
import { describeError, logger } from '../utils/logger';

export interface SemanticIndexOptions {
    provider: EmbeddingProvider;
    /** Called once per build; the built index owns the store it returns. */
    createStore: EmbeddingStoreFactory;
    chunking?: ChunkingOptions;
}

/**
 * Embedding-based index. Documents are chunked, each chunk is embedded, and a
 * document scores the best cosine similarity among its chunks.
 */
export class SemanticIndex implements RelevanceIndex {
    readonly strategy = 'semantic' as const;

    private constructor(
        private readonly documents: readonly RetrievableDocument[],
        private readonly provider: EmbeddingProvider,
        private readonly store: EmbeddingStore,
        readonly chunkCount: number
    ) {}

    static async build(
        documents: readonly RetrievableDocument[],
        { provider, createStore, chunking = DEFAULT_CHUNKING }: SemanticIndexOptions
    ): Promise<SemanticIndex> {
        const snapshot = documents.slice();

        const chunks = snapshot.flatMap(document =>
            chunkText(document.text, chunking).map((text, chunkIndex) => ({
                id: `${document.id}#${chunkIndex}`,
                document,
                text,
            }))
        );

        const store = createStore();
        try {
            const vectors = chunks.length > 0 ? await provider.embedBatch(chunks.map(chunk => chunk.text)) : [];
            if (vectors.length !== chunks.length) {
                throw new EmbeddingError(`Expected ${chunks.length} embeddings, received ${vectors.length}`);
            }

            const entries: EmbeddingEntry[] = chunks.map((chunk, i) => ({
                id: chunk.id,
                documentId: chunk.document.id,
                documentOrdinal: chunk.document.ordinal,
                vector: vectors[i],
                text: chunk.text,
            }));
            await store.replace(entries, provider.getDimension());

            logger.info(`Semantic index built: ${snapshot.length} documents, ${entries.length} chunks`);
            return new SemanticIndex(snapshot, provider, store, entries.length);
        } catch (error) {
            await SemanticIndex.release(store);
            throw error;
        }
    }

    private static async release(store: EmbeddingStore): Promise<void> {
        try {
            await store.drop();
        } catch (error) {
            logger.warn(`Failed to release embedding store: ${describeError(error)}`);
        }
    }

    get size(): number {
        return this.documents.length;
    }

    async query(text: string, k: number): Promise<RankedResult[]> {
        assertResultCount(k);
        if (this.documents.length === 0 || this.chunkCount === 0) return [];

        const queryVector = await this.provider.embedQuery(text);
        const hits = await this.store.search(queryVector, this.chunkCount);

        const positionByOrdinal = new Map(this.documents.map((doc, position) => [doc.ordinal, position]));
        const best: (number | undefined)[] = new Array(this.documents.length).fill(undefined);
        for (const hit of hits) {
            const position = positionByOrdinal.get(hit.documentOrdinal);
            if (position === undefined) continue;
            const current = best[position];
            if (current === undefined || hit.score > current) best[position] = hit.score;
        }

        // Documents without a usable chunk rank below every real score.
        const scores = best.map(score => score ?? -1);
        return rankByScore(this.documents, scores, k);
    }

    async dispose(): Promise<void> {
        await SemanticIndex.release(this.store);
    }
}
