// src/search/embeddings/qdrantEmbeddingStore.ts
import { QdrantClient } from '@qdrant/js-client-rest';
import { EmbeddingEntry, EmbeddingHit, EmbeddingStore } from './embeddingStore';
import { VectorStoreError } from '../../utils/errors';
import { describeError, logger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';

export interface QdrantEmbeddingStoreOptions {
    url: string;
    collectionName: string;
    upsertBatchSize?: number;
}

interface ChunkPayload {
    original_id: string;
    document_id: string;
    document_ordinal: number;
    text: string;
}

function isChunkPayload(payload: unknown): payload is ChunkPayload {
    if (typeof payload !== 'object' || payload === null) return false;
    const candidate: Record<string, unknown> = { ...payload };
    return (
        typeof candidate.original_id === 'string' &&
        typeof candidate.document_id === 'string' &&
        typeof candidate.document_ordinal === 'number'
    );
}

/**
 * Qdrant collection holding the chunk embeddings of one corpus build.
 * Point ids are sequential integers; the chunk id travels in the payload.
 */
export class QdrantEmbeddingStore implements EmbeddingStore {
    private readonly client: QdrantClient;
    private readonly collectionName: string;
    private readonly upsertBatchSize: number;

    constructor(options: QdrantEmbeddingStoreOptions, client?: QdrantClient) {
        this.client = client ?? new QdrantClient({ url: options.url });
        this.collectionName = options.collectionName;
        this.upsertBatchSize = options.upsertBatchSize ?? 64;
    }

    private async collectionExists(): Promise<boolean> {
        const collections = await this.client.getCollections();
        return collections.collections.some(c => c.name === this.collectionName);
    }

    async replace(entries: EmbeddingEntry[], dimension: number): Promise<void> {
        try {
            if (await this.collectionExists()) {
                logger.info(`Dropping Qdrant collection: ${this.collectionName}`);
                await this.client.deleteCollection(this.collectionName);
            }

            logger.info(`Creating Qdrant collection: ${this.collectionName}`);
            await this.client.createCollection(this.collectionName, {
                vectors: {
                    size: dimension,
                    distance: 'Cosine',
                },
                optimizers_config: {
                    default_segment_number: 2,
                },
            });
        } catch (error) {
            throw new VectorStoreError(`Failed to recreate Qdrant collection: ${describeError(error)}`);
        }

        for (let i = 0; i < entries.length; i += this.upsertBatchSize) {
            const batch = entries.slice(i, i + this.upsertBatchSize);
            const points = batch.map((entry, offset) => {
                const payload: ChunkPayload = {
                    original_id: entry.id,
                    document_id: entry.documentId,
                    document_ordinal: entry.documentOrdinal,
                    text: entry.text,
                };
                return { id: i + offset + 1, vector: entry.vector, payload: { ...payload } };
            });

            await withRetry(
                () => this.client.upsert(this.collectionName, { wait: true, points }),
                message => new VectorStoreError(message),
                { operation: 'Qdrant upsert' }
            );
        }

        logger.info(`Stored ${entries.length} vectors in Qdrant collection "${this.collectionName}".`);
    }

    async search(vector: number[], limit: number): Promise<EmbeddingHit[]> {
        if (limit < 1) return [];

        const points = await withRetry(
            () => this.client.search(this.collectionName, {
                vector,
                limit: Math.floor(limit),
                with_payload: true,
            }),
            message => new VectorStoreError(message),
            { operation: 'Qdrant search' }
        );

        const hits: EmbeddingHit[] = [];
        for (const point of points) {
            if (isChunkPayload(point.payload)) {
                hits.push({
                    id: point.payload.original_id,
                    documentOrdinal: point.payload.document_ordinal,
                    score: point.score,
                });
            } else {
                logger.warn({ pointId: point.id }, 'Qdrant point with unexpected payload structure');
            }
        }
        return hits;
    }

    async count(): Promise<number> {
        if (!(await this.collectionExists())) return 0;
        const result = await this.client.count(this.collectionName, { exact: true });
        return result.count;
    }

    async drop(): Promise<void> {
        try {
            if (await this.collectionExists()) {
                logger.info(`Dropping Qdrant collection: ${this.collectionName}`);
                await this.client.deleteCollection(this.collectionName);
            }
        } catch (error) {
            throw new VectorStoreError(`Failed to drop Qdrant collection: ${describeError(error)}`);
        }
    }
}
