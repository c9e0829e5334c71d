// src/search/tfidfIndex.ts
import { RankedResult, RetrievableDocument } from '../types';
import { RelevanceIndex, assertResultCount, rankByScore } from './relevanceIndex';

export const DEFAULT_MAX_VOCABULARY_SIZE = 1000;

// Runs of two or more letters, digits or underscores. Hangul syllables are letters.
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export function tokenize(text: string): string[] {
    return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

function countTerms(tokens: readonly string[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

/** Sparse vector: vocabulary column → weight. */
type SparseVector = Map<number, number>;

function normalize(vector: SparseVector): SparseVector {
    let norm = 0;
    for (const weight of vector.values()) norm += weight * weight;
    if (norm === 0) return vector;
    norm = Math.sqrt(norm);
    for (const [column, weight] of vector) vector.set(column, weight / norm);
    return vector;
}

function dot(a: SparseVector, b: SparseVector): number {
    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    let sum = 0;
    for (const [column, weight] of small) {
        const other = large.get(column);
        if (other !== undefined) sum += weight * other;
    }
    return sum;
}

/**
 * Term-frequency / inverse-document-frequency index with cosine similarity.
 *
 * The vocabulary keeps the `maxVocabularySize` most frequent terms across the corpus
 * (ties in code-point order). idf is smoothed: ln((1 + n) / (1 + df)) + 1.
 */
export class TfidfIndex implements RelevanceIndex {
    readonly strategy = 'lexical' as const;

    private constructor(
        private readonly documents: readonly RetrievableDocument[],
        private readonly vocabulary: Map<string, number>,
        private readonly idf: number[],
        private readonly vectors: SparseVector[]
    ) {}

    static build(
        documents: readonly RetrievableDocument[],
        maxVocabularySize: number = DEFAULT_MAX_VOCABULARY_SIZE
    ): TfidfIndex {
        const snapshot = documents.slice();
        const termCounts = snapshot.map(doc => countTerms(tokenize(doc.text)));

        const corpusFrequency = new Map<string, number>();
        const documentFrequency = new Map<string, number>();
        for (const counts of termCounts) {
            for (const [term, count] of counts) {
                corpusFrequency.set(term, (corpusFrequency.get(term) ?? 0) + count);
                documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
            }
        }

        const terms = Array.from(corpusFrequency.keys())
            .sort((a, b) => {
                const byFrequency = (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0);
                if (byFrequency !== 0) return byFrequency;
                return a < b ? -1 : a > b ? 1 : 0;
            })
            .slice(0, Math.max(0, maxVocabularySize));

        const vocabulary = new Map<string, number>();
        const idf: number[] = [];
        const n = snapshot.length;
        terms.forEach((term, column) => {
            vocabulary.set(term, column);
            const df = documentFrequency.get(term) ?? 0;
            idf.push(Math.log((1 + n) / (1 + df)) + 1);
        });

        const index = new TfidfIndex(snapshot, vocabulary, idf, []);
        for (const counts of termCounts) {
            index.vectors.push(index.weigh(counts));
        }
        return index;
    }

    get size(): number {
        return this.documents.length;
    }

    get vocabularySize(): number {
        return this.vocabulary.size;
    }

    hasTerm(term: string): boolean {
        return this.vocabulary.has(term);
    }

    private weigh(counts: Map<string, number>): SparseVector {
        const vector: SparseVector = new Map();
        for (const [term, count] of counts) {
            const column = this.vocabulary.get(term);
            if (column !== undefined) {
                vector.set(column, count * this.idf[column]);
            }
        }
        return normalize(vector);
    }

    /** Cosine similarity of `text` against every document, in document order. */
    scores(text: string): number[] {
        const queryVector = this.weigh(countTerms(tokenize(text)));
        return this.vectors.map(vector => dot(queryVector, vector));
    }

    rank(text: string, k: number): RankedResult[] {
        assertResultCount(k);
        if (this.documents.length === 0) return [];
        return rankByScore(this.documents, this.scores(text), k);
    }

    async query(text: string, k: number): Promise<RankedResult[]> {
        return this.rank(text, k);
    }

    async dispose(): Promise<void> {}
}
