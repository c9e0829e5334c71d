// src/scripts/import-statutes.ts
// Builds the configured index from the corpus snapshot once and reports what was
// indexed. With INDEX_STRATEGY=semantic and VECTOR_STORE=qdrant this repopulates
// the first numbered collection, {QDRANT_COLLECTION}_1.
import config, { validateConfig } from '../config/config';
import { createIndexFactoryFromConfig } from '../app';
import { CorpusHolder } from '../corpus/statuteCorpus';
import { loadAndBuildCorpus } from '../corpus/corpusLoader';
import { logger } from '../utils/logger';

async function main(): Promise<void> {
    for (const warning of validateConfig(config)) {
        logger.warn(warning);
    }

    const holder = new CorpusHolder(createIndexFactoryFromConfig(config));
    const { snapshot, corpus } = await loadAndBuildCorpus(holder, config.corpus.snapshotPath);

    if (snapshot.status === 'missing') {
        logger.error(`No corpus snapshot found at ${snapshot.filePath}`);
        process.exitCode = 1;
        return;
    }

    for (const warning of snapshot.warnings) {
        logger.warn(warning);
    }

    const summary = corpus.summary();
    logger.info(
        { ...summary, strategy: corpus.index.strategy, skipped: snapshot.warnings.length },
        `Indexed ${summary.documents} documents from ${summary.statutes} statutes`
    );
}

main().catch(error => {
    logger.error({ err: error }, 'Statute import failed');
    process.exit(1);
});
