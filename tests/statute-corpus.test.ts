import { describe, it, expect } from '@jest/globals';
import { CorpusHolder } from '../src/corpus/statuteCorpus';
import { IndexFactory, buildRelevanceIndex } from '../src/search/indexFactory';
import { loadAndBuildCorpus } from '../src/corpus/corpusLoader';
import { sampleStatutes } from './helpers';

const lexical: IndexFactory = documents => buildRelevanceIndex(documents, { strategy: 'lexical' });

describe('Statute Corpus', () => {
  it('should publish rebuilt corpora with increasing versions', async () => {
    const holder = new CorpusHolder(lexical);
    expect(holder.current()).toBeUndefined();

    const first = await holder.rebuild(sampleStatutes());
    const second = await holder.rebuild([]);

    expect(first.version).toBe(1);
    expect(first.index.size).toBe(3);
    expect(first.summary()).toEqual({
      statutes: 2,
      articles: 3,
      documents: 3,
      fullStatuteDocuments: 0,
      articleDocuments: 3,
    });
    expect(second.isEmpty).toBe(true);
    expect(holder.current()).toBe(second);
  });

  it('should discard a rebuild that finishes after a newer one', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    let calls = 0;
    const holder = new CorpusHolder(async documents => {
      calls += 1;
      if (calls === 1) await gate;
      return lexical(documents);
    });

    const slow = holder.rebuild(sampleStatutes());
    const fast = await holder.rebuild(sampleStatutes().slice(1));
    release();
    const stale = await slow;

    expect(stale.version).toBe(1);
    expect(fast.version).toBe(2);
    expect(holder.current()).toBe(fast);
  });

  it('should not change a published corpus when the input is mutated', async () => {
    const holder = new CorpusHolder(lexical);
    const statutes = sampleStatutes();

    const corpus = await holder.rebuild(statutes);
    statutes.pop();

    expect(corpus.statutes).toHaveLength(2);
  });

  it('should publish an empty corpus when no snapshot exists', async () => {
    const holder = new CorpusHolder(lexical);

    const { snapshot, corpus } = await loadAndBuildCorpus(holder, '/nonexistent/statute-snapshot.json');

    expect(snapshot.status).toBe('missing');
    expect(corpus.isEmpty).toBe(true);
    expect(holder.current()).toBe(corpus);
  });
});
