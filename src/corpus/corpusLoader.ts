// src/corpus/corpusLoader.ts
import { CorpusHolder, StatuteCorpus } from './statuteCorpus';
import { SnapshotLoadResult, loadCorpusSnapshot } from './corpusStore';

export interface CorpusLoadOutcome {
    snapshot: SnapshotLoadResult;
    corpus: StatuteCorpus;
}

/**
 * Loads the snapshot and publishes a corpus built from it. A missing snapshot
 * publishes an empty corpus.
 */
export async function loadAndBuildCorpus(holder: CorpusHolder, snapshotPath: string): Promise<CorpusLoadOutcome> {
    const snapshot = await loadCorpusSnapshot(snapshotPath);
    const statutes = snapshot.status === 'loaded' ? snapshot.statutes : [];
    const corpus = await holder.rebuild(statutes);
    return { snapshot, corpus };
}
