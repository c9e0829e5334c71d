import { describe, it, expect } from '@jest/globals';
import { TfidfIndex, tokenize } from '../src/search/tfidfIndex';
import { buildRelevanceIndex } from '../src/search/indexFactory';
import { segmentArticles } from '../src/corpus/articleSegmenter';
import { buildCorpus } from '../src/corpus/corpusBuilder';
import { InvalidQueryError } from '../src/utils/errors';
import { makeDocuments } from './helpers';

describe('TF-IDF Index', () => {
  describe('tokenize', () => {
    it('should keep runs of two or more letters or digits', () => {
      expect(tokenize('a 법 제1조 하도급법')).toEqual(['제1조', '하도급법']);
      expect(tokenize('Hello, WORLD_x')).toEqual(['hello', 'world_x']);
    });
  });

  describe('rank', () => {
    it('should score a document against its own text at 1', () => {
      const documents = makeDocuments('하도급 대금 지급 기한', '부당 특약 금지', '기술 자료 요구 금지');
      const index = TfidfIndex.build(documents);

      const [top] = index.rank('부당 특약 금지', 1);

      expect(top.document.id).toBe('d1');
      expect(top.rank).toBe(0);
      expect(top.score).toBeCloseTo(1, 10);
    });

    it('should weight terms by smoothed idf', () => {
      const index = TfidfIndex.build(makeDocuments('apple banana', 'apple cherry'));
      const weight = Math.log(3 / 2) + 1;

      const results = index.rank('banana', 2);

      expect(results.map(result => result.document.id)).toEqual(['d0', 'd1']);
      expect(results[0].score).toBeCloseTo(weight / Math.sqrt(1 + weight * weight), 10);
      expect(results[1].score).toBe(0);
    });

    it('should keep document order for equal scores', () => {
      const index = TfidfIndex.build(makeDocuments('대금 지급', '특약 금지', '대금 지급'));

      const results = index.rank('대금', 3);

      expect(results.map(result => [result.document.id, result.rank])).toEqual([
        ['d0', 0],
        ['d2', 1],
        ['d1', 2],
      ]);
      expect(results[0].score).toBe(results[1].score);
    });

    it('should return documents in order when no query term is known', () => {
      const index = TfidfIndex.build(makeDocuments('대금 지급', '특약 금지', '기술 자료'));

      const results = index.rank('없는단어', 2);

      expect(results.map(result => result.document.id)).toEqual(['d0', 'd1']);
      expect(results.map(result => result.score)).toEqual([0, 0]);
    });

    it('should return every document when k exceeds the corpus', () => {
      const index = TfidfIndex.build(makeDocuments('대금 지급'));

      expect(index.rank('대금', 10)).toHaveLength(1);
    });

    it('should reject a result count below one', async () => {
      const index = TfidfIndex.build(makeDocuments('대금 지급'));

      expect(() => index.rank('대금', 0)).toThrow(InvalidQueryError);
      await expect(index.query('대금', 1.5)).rejects.toThrow(InvalidQueryError);
    });
  });

  describe('vocabulary', () => {
    it('should keep the most frequent terms, ties in code-point order', () => {
      const index = TfidfIndex.build(makeDocuments('alpha alpha beta', 'alpha gamma'), 2);

      expect(index.vocabularySize).toBe(2);
      expect(index.hasTerm('alpha')).toBe(true);
      expect(index.hasTerm('beta')).toBe(true);
      expect(index.hasTerm('gamma')).toBe(false);
    });
  });

  describe('empty corpus', () => {
    it('should build an empty index that returns no results', async () => {
      const index = await buildRelevanceIndex([], { strategy: 'lexical' });

      expect(index.size).toBe(0);
      expect(await index.query('대금', 5)).toEqual([]);
      await expect(index.query('대금', 0)).rejects.toThrow(InvalidQueryError);
    });
  });

  describe('segmented statutes', () => {
    it('should rank an article first when queried with its body', () => {
      const fullText =
        '제1조(목적) 이 법은 공정한 하도급거래질서를 확립함을 목적으로 한다. ' +
        '제2조(정의) 원사업자란 중소기업자가 아닌 사업자를 말한다.';
      const articles = segmentArticles(fullText);
      const documents = buildCorpus([{ title: '하도급법', url: '', fullText, keyword: '하도급', articles }]);
      const index = TfidfIndex.build(documents);

      const results = index.rank(articles[1].body, 3);

      expect(articles[1].body).toBe('원사업자란 중소기업자가 아닌 사업자를 말한다.');
      expect(results.map(result => result.document.id)).toEqual(['s0-a1', 's0', 's0-a0']);
      expect(results[0].document.label).toBe('하도급법 제2조');
      expect(results[0].score).toBeGreaterThan(results[1].score);
      expect(results[2].score).toBe(0);
    });
  });
});
