// src/corpus/statuteCorpus.ts
import { RetrievableDocument, Statute } from '../types';
import { RelevanceIndex } from '../search/relevanceIndex';
import { IndexFactory } from '../search/indexFactory';
import { CorpusSummary, buildCorpus, summarizeCorpus } from './corpusBuilder';
import { describeError, logger } from '../utils/logger';

/**
 * One built corpus version: the statutes, their documents, and the index over them.
 * Read-only once constructed.
 */
export class StatuteCorpus {
    readonly builtAt = new Date();

    constructor(
        readonly version: number,
        readonly statutes: readonly Statute[],
        readonly documents: readonly RetrievableDocument[],
        readonly index: RelevanceIndex
    ) {}

    get isEmpty(): boolean {
        return this.documents.length === 0;
    }

    summary(): CorpusSummary {
        return summarizeCorpus(this.statutes, this.documents);
    }
}

/**
 * Caller-owned holder of the active corpus. A rebuild happens off to the side and
 * only the finished corpus is published; a rebuild that completes after a newer
 * one has been published is discarded. The index of a superseded or discarded
 * corpus is disposed.
 */
export class CorpusHolder {
    private active: StatuteCorpus | undefined;
    private requested = 0;
    private published = 0;

    constructor(private readonly indexFactory: IndexFactory) {}

    current(): StatuteCorpus | undefined {
        return this.active;
    }

    async rebuild(statutes: readonly Statute[]): Promise<StatuteCorpus> {
        const version = ++this.requested;
        const snapshot = statutes.slice();
        const documents = buildCorpus(snapshot);
        const index = await this.indexFactory(documents);
        const corpus = new StatuteCorpus(version, snapshot, documents, index);

        if (version > this.published) {
            const superseded = this.active;
            this.active = corpus;
            this.published = version;
            logger.info(
                `Published corpus v${version}: ${snapshot.length} statutes, ${documents.length} documents (${index.strategy})`
            );
            if (superseded) await this.retire(superseded);
        } else {
            logger.warn(`Discarding corpus v${version}; v${this.published} was published first`);
            await this.retire(corpus);
        }
        return corpus;
    }

    private async retire(corpus: StatuteCorpus): Promise<void> {
        try {
            await corpus.index.dispose();
        } catch (error) {
            logger.warn(`Failed to release index of corpus v${corpus.version}: ${describeError(error)}`);
        }
    }
}
