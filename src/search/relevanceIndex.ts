// src/search/relevanceIndex.ts
import { IndexStrategy, RankedResult, RetrievableDocument } from '../types';
import { InvalidQueryError } from '../utils/errors';

/**
 * Immutable top-k similarity handle over a fixed document set.
 * Rebuilt wholesale whenever the corpus changes.
 */
export interface RelevanceIndex {
    readonly strategy: IndexStrategy;
    /** Number of documents the index was built from. */
    readonly size: number;
    query(text: string, k: number): Promise<RankedResult[]>;
    /** Releases storage held outside the process. Called once the index is no longer served. */
    dispose(): Promise<void>;
}

export function assertResultCount(k: number): void {
    if (!Number.isInteger(k) || k < 1) {
        throw new InvalidQueryError(`Result count must be an integer >= 1, got ${k}`, { k });
    }
}

/**
 * Orders documents by score, highest first. Equal scores keep document order.
 */
export function rankByScore(
    documents: readonly RetrievableDocument[],
    scores: readonly number[],
    k: number
): RankedResult[] {
    return documents
        .map((document, i) => ({ document, score: scores[i] ?? 0 }))
        .sort((a, b) => b.score - a.score || a.document.ordinal - b.document.ordinal)
        .slice(0, k)
        .map((entry, rank) => ({ ...entry, rank }));
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    const length = Math.min(a.length, b.length);
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

class EmptyIndex implements RelevanceIndex {
    readonly size = 0;

    constructor(readonly strategy: IndexStrategy) {}

    async query(_text: string, k: number): Promise<RankedResult[]> {
        assertResultCount(k);
        return [];
    }

    async dispose(): Promise<void> {}
}

export function emptyIndex(strategy: IndexStrategy = 'lexical'): RelevanceIndex {
    return new EmptyIndex(strategy);
}
