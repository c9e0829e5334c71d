import { describe, it, expect } from '@jest/globals';
import { buildCorpus, summarizeCorpus } from '../src/corpus/corpusBuilder';
import { Statute } from '../src/types';

const statutes: Statute[] = [
  {
    title: '하도급법',
    url: 'https://example.test/s0',
    fullText: '제1조(목적) 목적 본문 제2조 정의 본문',
    keyword: '하도급',
    articles: [
      { number: '1', heading: '목적', body: '목적 본문' },
      { number: '2', heading: '', body: '정의 본문' },
    ],
  },
  { title: '공정거래법', url: '', fullText: '', keyword: '', articles: [] },
  {
    title: '상생협력법',
    url: '',
    fullText: '',
    keyword: '',
    articles: [{ number: '5의2', heading: '특례', body: '특례 본문' }],
  },
];

describe('Corpus Builder', () => {
  it('should emit the full statute before its articles', () => {
    const documents = buildCorpus(statutes);

    expect(documents.map(doc => [doc.id, doc.ordinal, doc.kind])).toEqual([
      ['s0', 0, 'full_statute'],
      ['s0-a0', 1, 'article'],
      ['s0-a1', 2, 'article'],
      ['s2-a0', 3, 'article'],
    ]);
  });

  it('should prefix text with the statute title and citation', () => {
    const [full, first, second, branch] = buildCorpus(statutes);

    expect(full.text).toBe('하도급법 제1조(목적) 목적 본문 제2조 정의 본문');
    expect(full.label).toBe('하도급법');
    expect(first.text).toBe('하도급법 제1조 목적 목적 본문');
    expect(first.label).toBe('하도급법 제1조');
    expect(second.text).toBe('하도급법 제2조  정의 본문');
    expect(branch.label).toBe('상생협력법 제5조의2');
  });

  it('should link documents back to their source', () => {
    const [full, first] = buildCorpus(statutes);

    expect(full.sourceRef.statute).toBe(statutes[0]);
    expect(full.sourceRef.article).toBeUndefined();
    expect(first.sourceRef.article).toBe(statutes[0].articles[0]);
    expect(first.metadata).toEqual({
      statuteTitle: '하도급법',
      keyword: '하도급',
      url: 'https://example.test/s0',
      articleNumber: '1',
      articleHeading: '목적',
    });
  });

  it('should emit a full statute document for whitespace-only text', () => {
    const [doc, ...rest] = buildCorpus([{ title: '공정거래법', url: '', fullText: '   ', keyword: '', articles: [] }]);

    expect(rest).toEqual([]);
    expect([doc.id, doc.kind, doc.text]).toEqual(['s0', 'full_statute', '공정거래법    ']);
  });

  it('should emit nothing for a statute with empty text and no articles', () => {
    expect(buildCorpus([statutes[1]])).toEqual([]);
    expect(buildCorpus([])).toEqual([]);
  });

  it('should build the same documents for the same input', () => {
    expect(buildCorpus(statutes)).toEqual(buildCorpus(statutes));
  });

  it('should summarize counts', () => {
    expect(summarizeCorpus(statutes, buildCorpus(statutes))).toEqual({
      statutes: 3,
      articles: 3,
      documents: 4,
      fullStatuteDocuments: 1,
      articleDocuments: 3,
    });
  });
});
