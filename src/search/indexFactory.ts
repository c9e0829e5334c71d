// src/search/indexFactory.ts
import { RetrievableDocument } from '../types';
import { RelevanceIndex, emptyIndex } from './relevanceIndex';
import { SemanticIndex, SemanticIndexOptions } from './semanticIndex';
import { DEFAULT_MAX_VOCABULARY_SIZE, TfidfIndex } from './tfidfIndex';

export type IndexBuildOptions =
    | { strategy: 'lexical'; maxVocabularySize?: number }
    | ({ strategy: 'semantic' } & SemanticIndexOptions);

export type IndexFactory = (documents: readonly RetrievableDocument[]) => Promise<RelevanceIndex>;

export async function buildRelevanceIndex(
    documents: readonly RetrievableDocument[],
    options: IndexBuildOptions
): Promise<RelevanceIndex> {
    if (documents.length === 0) {
        return emptyIndex(options.strategy);
    }
    switch (options.strategy) {
        case 'lexical':
            return TfidfIndex.build(documents, options.maxVocabularySize ?? DEFAULT_MAX_VOCABULARY_SIZE);
        case 'semantic':
            return SemanticIndex.build(documents, options);
    }
}

export function createIndexFactory(options: IndexBuildOptions): IndexFactory {
    return documents => buildRelevanceIndex(documents, options);
}
