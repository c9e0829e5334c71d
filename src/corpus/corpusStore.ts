// src/corpus/corpusStore.ts
import fs from 'fs/promises';
import path from 'path';
import { Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { Statute, StatuteRecord } from '../types';
import { segmentArticles } from './articleSegmenter';
import { CorpusSnapshotError } from '../utils/errors';
import { describeError, logger } from '../utils/logger';

export const StatuteArticleRecordSchema = Type.Object({
    number: Type.String({ minLength: 1 }),
    title: Type.Optional(Type.String()),
    content: Type.Optional(Type.String()),
});

export const StatuteRecordSchema = Type.Object({
    title: Type.String({ minLength: 1, pattern: '\\S' }),
    url: Type.Optional(Type.String()),
    content: Type.Optional(Type.String()),
    keyword: Type.Optional(Type.String()),
    articles: Type.Optional(Type.Array(StatuteArticleRecordSchema)),
});

export type StatuteRecordType = Static<typeof StatuteRecordSchema>;

export interface StatuteParseResult {
    statutes: Statute[];
    warnings: string[];
}

export type SnapshotLoadResult =
    | { status: 'missing'; filePath: string }
    | ({ status: 'loaded'; filePath: string } & StatuteParseResult);

export interface ParseOptions {
    /** Segment `content` into articles for records that carry no `articles` key. */
    segmentMissingArticles?: boolean;
}

function describeRecord(record: unknown, position: number): string {
    if (typeof record === 'object' && record !== null && 'title' in record && typeof record.title === 'string') {
        return `record ${position} ("${record.title}")`;
    }
    return `record ${position}`;
}

export function toStatute(record: StatuteRecordType, { segmentMissingArticles = false }: ParseOptions = {}): Statute {
    const fullText = record.content ?? '';
    const articles = record.articles
        ? record.articles.map(article => ({
            number: article.number,
            heading: article.title ?? '',
            body: article.content ?? '',
        }))
        : segmentMissingArticles ? segmentArticles(fullText) : [];

    return {
        title: record.title,
        url: record.url ?? '',
        fullText,
        keyword: record.keyword ?? '',
        articles,
    };
}

export function toRecord(statute: Statute): StatuteRecord {
    return {
        title: statute.title,
        url: statute.url,
        content: statute.fullText,
        keyword: statute.keyword,
        articles: statute.articles.map(article => ({
            number: article.number,
            title: article.heading,
            content: article.body,
        })),
    };
}

/**
 * Validates raw records. Malformed records are skipped with a warning; the rest
 * are converted in order.
 */
export function parseStatuteRecords(records: unknown, options: ParseOptions = {}): StatuteParseResult {
    if (!Array.isArray(records)) {
        return { statutes: [], warnings: ['Corpus snapshot is not a JSON array; no statutes loaded.'] };
    }

    const statutes: Statute[] = [];
    const warnings: string[] = [];

    records.forEach((record: unknown, position) => {
        if (Value.Check(StatuteRecordSchema, record)) {
            statutes.push(toStatute(record, options));
            return;
        }
        const [firstError] = Value.Errors(StatuteRecordSchema, record);
        const reason = firstError ? `${firstError.path || '/'} ${firstError.message}` : 'invalid record';
        const warning = `Skipping ${describeRecord(record, position)}: ${reason}`;
        logger.warn(warning);
        warnings.push(warning);
    });

    return { statutes, warnings };
}

export async function loadCorpusSnapshot(filePath: string): Promise<SnapshotLoadResult> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            logger.info(`No corpus snapshot at ${filePath}`);
            return { status: 'missing', filePath };
        }
        throw new CorpusSnapshotError(`Failed to read corpus snapshot: ${describeError(error)}`, filePath);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new CorpusSnapshotError(`Corpus snapshot is not valid JSON: ${describeError(error)}`, filePath);
    }

    const result = parseStatuteRecords(parsed);
    logger.info(`Loaded ${result.statutes.length} statutes from ${filePath} (${result.warnings.length} skipped)`);
    return { status: 'loaded', filePath, ...result };
}

export async function saveCorpusSnapshot(filePath: string, statutes: readonly Statute[]): Promise<void> {
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        const body = JSON.stringify(statutes.map(toRecord), null, 2);
        // Written beside the target, then renamed over it.
        const tempPath = `${filePath}.tmp`;
        await fs.writeFile(tempPath, body, 'utf-8');
        await fs.rename(tempPath, filePath);
    } catch (error) {
        throw new CorpusSnapshotError(`Failed to write corpus snapshot: ${describeError(error)}`, filePath);
    }
    logger.info(`Saved ${statutes.length} statutes to ${filePath}`);
}

/** Returns whether a snapshot existed. */
export async function clearCorpusSnapshot(filePath: string): Promise<boolean> {
    try {
        await fs.rm(filePath);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return false;
        }
        throw new CorpusSnapshotError(`Failed to remove corpus snapshot: ${describeError(error)}`, filePath);
    }
}
