import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  clearCorpusSnapshot,
  loadCorpusSnapshot,
  parseStatuteRecords,
  saveCorpusSnapshot,
} from '../src/corpus/corpusStore';
import { CorpusSnapshotError } from '../src/utils/errors';
import { sampleStatutes } from './helpers';

describe('Corpus Store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'statute-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseStatuteRecords', () => {
    it('should segment content when articles are missing', () => {
      const { statutes, warnings } = parseStatuteRecords(
        [{ title: '하도급법', content: '제1조(목적) 목적 본문' }],
        { segmentMissingArticles: true }
      );

      expect(warnings).toEqual([]);
      expect(statutes).toEqual([
        {
          title: '하도급법',
          url: '',
          fullText: '제1조(목적) 목적 본문',
          keyword: '',
          articles: [{ number: '1', heading: '목적', body: '목적 본문' }],
        },
      ]);
    });

    it('should keep records without articles article-less by default', () => {
      const { statutes } = parseStatuteRecords([{ title: '하도급법', content: '제1조(목적) 목적 본문' }]);

      expect(statutes[0].articles).toEqual([]);
    });

    it('should map stored article fields', () => {
      const { statutes } = parseStatuteRecords([
        { title: '하도급법', articles: [{ number: '13', title: '대금 지급', content: '60일 이내' }] },
      ]);

      expect(statutes[0].articles).toEqual([{ number: '13', heading: '대금 지급', body: '60일 이내' }]);
    });

    it('should skip malformed records with a warning', () => {
      const { statutes, warnings } = parseStatuteRecords([
        { title: '하도급법' },
        { content: 'no title' },
        { title: '   ' },
        { title: '공정거래법', articles: [{ title: 'missing number' }] },
      ]);

      expect(statutes.map(statute => statute.title)).toEqual(['하도급법']);
      expect(warnings).toHaveLength(3);
      expect(warnings[0].startsWith('Skipping record 1: ')).toBe(true);
      expect(warnings[1].startsWith('Skipping record 2 ("   "): ')).toBe(true);
      expect(warnings[2].startsWith('Skipping record 3 ("공정거래법"): ')).toBe(true);
    });

    it('should reject a snapshot that is not an array', () => {
      expect(parseStatuteRecords({ title: '하도급법' })).toEqual({
        statutes: [],
        warnings: ['Corpus snapshot is not a JSON array; no statutes loaded.'],
      });
    });
  });

  describe('snapshots', () => {
    it('should report a missing snapshot', async () => {
      const filePath = path.join(dir, 'statutes.json');

      expect(await loadCorpusSnapshot(filePath)).toEqual({ status: 'missing', filePath });
    });

    it('should round-trip statutes', async () => {
      const filePath = path.join(dir, 'nested', 'statutes.json');

      await saveCorpusSnapshot(filePath, sampleStatutes());
      const loaded = await loadCorpusSnapshot(filePath);

      expect(loaded).toEqual({ status: 'loaded', filePath, statutes: sampleStatutes(), warnings: [] });
    });

    it('should fail on invalid JSON', async () => {
      const filePath = path.join(dir, 'statutes.json');
      await fs.writeFile(filePath, '[{', 'utf-8');

      await expect(loadCorpusSnapshot(filePath)).rejects.toThrow(CorpusSnapshotError);
    });

    it('should report whether a snapshot was removed', async () => {
      const filePath = path.join(dir, 'statutes.json');
      await saveCorpusSnapshot(filePath, []);

      expect(await clearCorpusSnapshot(filePath)).toBe(true);
      expect(await clearCorpusSnapshot(filePath)).toBe(false);
    });
  });
});
