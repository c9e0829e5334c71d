import { CohereClient } from 'cohere-ai';
import { EmbeddingProvider } from './embeddingProvider';
import { EmbeddingError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';

interface CohereEmbeddingsOptions {
    apiKey: string;
    model?: string;
    batchSize?: number;
    /** Inputs longer than this are cut before embedding. */
    maxInputChars?: number;
    retryDelay?: number;
}

type CohereInputType = 'search_query' | 'search_document';

const MODEL_DIMENSIONS: Record<string, number> = {
    'embed-multilingual-v3.0': 1024,
    'embed-english-v3.0': 1024,
    'embed-english-light-v3.0': 384,
    'embed-multilingual-light-v3.0': 384,
};

function extractVectors(embeddings: number[][] | { float?: number[][] }): number[][] {
    if (Array.isArray(embeddings)) {
        return embeddings;
    }
    return embeddings.float ?? [];
}

export class CohereEmbeddings implements EmbeddingProvider {
    private readonly cohere: CohereClient;
    private readonly model: string;
    private readonly batchSize: number;
    private readonly maxInputChars: number;
    private readonly retryDelay?: number;

    constructor(options: CohereEmbeddingsOptions) {
        if (!options.apiKey) {
            throw new EmbeddingError('Cohere initialization failed. Make sure COHERE_API_KEY is set correctly.');
        }
        this.model = options.model || 'embed-multilingual-v3.0';
        this.batchSize = options.batchSize || 20;
        this.maxInputChars = options.maxInputChars || 8000;
        this.retryDelay = options.retryDelay;
        this.cohere = new CohereClient({ token: options.apiKey });
        logger.info(`Cohere client initialized with model: ${this.model}`);
    }

    private async embed(texts: string[], inputType: CohereInputType): Promise<number[][]> {
        const inputs = texts.map(text => text.length > this.maxInputChars ? text.substring(0, this.maxInputChars) : text);

        return withRetry(
            async () => {
                const response = await this.cohere.embed({
                    texts: inputs,
                    model: this.model,
                    inputType,
                });
                const vectors = extractVectors(response.embeddings);
                if (vectors.length !== inputs.length || vectors.some(vector => vector.length === 0)) {
                    throw new EmbeddingError(
                        `Cohere returned ${vectors.length} embeddings for ${inputs.length} texts`
                    );
                }
                return vectors;
            },
            message => new EmbeddingError(message),
            { operation: 'Cohere embedding', retryDelay: this.retryDelay }
        );
    }

    async embedQuery(text: string): Promise<number[]> {
        const [vector] = await this.embed([text], 'search_query');
        return vector;
    }

    async embedBatch(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const results: number[][] = [];
        for (let i = 0; i < texts.length; i += this.batchSize) {
            const batchTexts = texts.slice(i, i + this.batchSize);
            logger.debug(`Processing batch ${Math.floor(i / this.batchSize) + 1} with ${batchTexts.length} texts`);
            results.push(...await this.embed(batchTexts, 'search_document'));
        }
        return results;
    }

    getDimension(): number {
        return MODEL_DIMENSIONS[this.model] ?? 1024;
    }
}
