// src/app.ts
import { Config } from './config/config';
import { CorpusHolder } from './corpus/statuteCorpus';
import { IndexFactory, createIndexFactory } from './search/indexFactory';
import { CohereEmbeddings } from './search/embeddings/cohereEmbeddings';
import { EmbeddingStoreFactory, InMemoryEmbeddingStore } from './search/embeddings/embeddingStore';
import { QdrantEmbeddingStore } from './search/embeddings/qdrantEmbeddingStore';
import { AnalysisService } from './agent/analysisService';
import { ExternalReasoningAnalyzer, LocalSummaryAnalyzer } from './agent/analyzers';
import { CompletionClient, OpenAICompletionClient } from './services/openAIService';
import { AppContext } from './api/context';

/**
 * One store per index build. Qdrant builds get numbered collections,
 * `{QDRANT_COLLECTION}_{n}`.
 */
function createEmbeddingStoreFactory(config: Config): EmbeddingStoreFactory {
    if (config.qdrant.vectorStore === 'qdrant') {
        let generation = 0;
        return () => {
            generation += 1;
            return new QdrantEmbeddingStore({
                url: config.qdrant.url,
                collectionName: `${config.qdrant.collection}_${generation}`,
            });
        };
    }
    return () => new InMemoryEmbeddingStore();
}

export function createIndexFactoryFromConfig(config: Config): IndexFactory {
    const { retrieval } = config;
    if (retrieval.strategy === 'lexical') {
        return createIndexFactory({ strategy: 'lexical', maxVocabularySize: retrieval.maxVocabularySize });
    }
    return createIndexFactory({
        strategy: 'semantic',
        provider: new CohereEmbeddings({
            apiKey: config.embeddings.apiKey,
            model: config.embeddings.model,
            batchSize: config.embeddings.batchSize,
        }),
        createStore: createEmbeddingStoreFactory(config),
        chunking: { chunkSize: retrieval.chunkSize, chunkOverlap: retrieval.chunkOverlap },
    });
}

export interface AppDependencies {
    indexFactory?: IndexFactory;
    completionClient?: CompletionClient;
}

/**
 * Wires the corpus holder and analysis service from configuration. Tests pass
 * their own index factory or completion client.
 */
export function createAppContext(config: Config, deps: AppDependencies = {}): AppContext {
    const { retrieval } = config;
    const holder = new CorpusHolder(deps.indexFactory ?? createIndexFactoryFromConfig(config));
    const completionClient = deps.completionClient ?? new OpenAICompletionClient(config.openai);

    const analysis = new AnalysisService(
        {
            local: new LocalSummaryAnalyzer(retrieval.summaryExcerptChars),
            external: new ExternalReasoningAnalyzer(completionClient, retrieval.contextExcerptChars),
        },
        {
            defaultMode: config.analysis.mode,
            resultCount: retrieval.resultCount,
            minScore: retrieval.minScore,
            sourceExcerptChars: retrieval.summaryExcerptChars,
            debugMode: config.debugMode,
        }
    );

    return {
        holder,
        analysis,
        snapshotPath: config.corpus.snapshotPath,
        strategy: retrieval.strategy,
        resultCount: retrieval.resultCount,
        minScore: retrieval.minScore,
        excerptChars: retrieval.summaryExcerptChars,
    };
}
