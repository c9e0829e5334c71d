import { describe, it, expect } from '@jest/globals';
import {
  assembleContext,
  excerpt,
  retrieveContext,
  toSourceItems,
} from '../src/services/retrievalService';
import { RelevanceIndex } from '../src/search/relevanceIndex';
import { RankedResult } from '../src/types';
import { makeDocument } from './helpers';

class FixedIndex implements RelevanceIndex {
  readonly strategy = 'lexical' as const;
  readonly queries: string[] = [];

  constructor(private readonly results: RankedResult[]) {}

  get size(): number {
    return this.results.length;
  }

  async query(text: string, k: number): Promise<RankedResult[]> {
    this.queries.push(text);
    return this.results.slice(0, k);
  }

  async dispose(): Promise<void> {}
}

const ranked: RankedResult[] = [
  { document: makeDocument('a', 0, 'alpha'), score: 0.9, rank: 0 },
  { document: makeDocument('b', 1, 'beta'), score: 0.3, rank: 1 },
  { document: makeDocument('c', 2, 'gamma'), score: 0.1, rank: 2 },
];

describe('Retrieval Service', () => {
  describe('retrieveContext', () => {
    it('should return nothing without an index or a scenario', async () => {
      const index = new FixedIndex(ranked);

      expect(await retrieveContext(undefined, '대금', 3)).toEqual([]);
      expect(await retrieveContext(index, '   ', 3)).toEqual([]);
      expect(await retrieveContext(new FixedIndex([]), '대금', 3)).toEqual([]);
      expect(index.queries).toEqual([]);
    });

    it('should drop results below the minimum score and re-rank', async () => {
      const results = await retrieveContext(new FixedIndex(ranked), '대금', 3, { minScore: 0.2 });

      expect(results.map(result => [result.document.id, result.rank])).toEqual([
        ['a', 0],
        ['b', 1],
      ]);
    });
  });

  describe('excerpt', () => {
    it('should mark truncated text only', () => {
      expect(excerpt('abcdef', 3)).toBe('abc...');
      expect(excerpt('abc', 3)).toBe('abc');
    });
  });

  describe('assembleContext', () => {
    it('should number the results under the context header', () => {
      const results: RankedResult[] = [
        { document: makeDocument('s0-a0', 0, '하도급법 제1조 목적 이 법은', '하도급법 제1조'), score: 0.8, rank: 0 },
        { document: makeDocument('s0', 1, 'abc', '하도급법'), score: 0.4, rank: 1 },
      ];

      expect(assembleContext(results, 5)).toEqual({
        status: 'ok',
        text: '관련 법령:\n\n1. 하도급법 제1조\n하도급법 ...\n\n2. 하도급법\nabc\n\n',
        citations: ['하도급법 제1조', '하도급법'],
      });
    });

    it('should report when there is nothing to assemble', () => {
      expect(assembleContext([], 400)).toEqual({ status: 'no_relevant_provisions' });
    });
  });

  describe('toSourceItems', () => {
    it('should describe each result', () => {
      expect(toSourceItems(ranked.slice(0, 1), 3)).toEqual([
        { rank: 0, id: 'a', label: 'a', kind: 'full_statute', score: 0.9, excerpt: 'alp...' },
      ]);
    });
  });
});
