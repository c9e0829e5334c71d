// src/corpus/articleSegmenter.ts
import { Article } from '../types';

export interface ArticleMarker {
    number: string;
    /** Offset of the leading 제. */
    start: number;
    /** Offset just past the marker (and its branch suffix). */
    end: number;
}

type ScanState = 'outside' | 'heading' | 'body';

const OPENING_BRACKETS = new Set(['(', '[', '（', '【']);
const CLOSING_BRACKETS = new Set([')', ']', '）', '】']);

function isDigit(ch: string | undefined): boolean {
    return ch !== undefined && ch >= '0' && ch <= '9';
}

function isWhitespace(ch: string | undefined): boolean {
    return ch !== undefined && /\s/.test(ch);
}

function skipDigits(text: string, from: number): number {
    let i = from;
    while (isDigit(text[i])) i++;
    return i;
}

/**
 * Reads a 제N조 marker (optionally 제N조의M) starting at `at`.
 */
function readMarker(text: string, at: number): ArticleMarker | null {
    if (text[at] !== '제') return null;

    const digitsEnd = skipDigits(text, at + 1);
    if (digitsEnd === at + 1 || text[digitsEnd] !== '조') return null;

    let number = text.slice(at + 1, digitsEnd);
    let end = digitsEnd + 1;

    // 의 is only a branch suffix when digits follow; "제3조의 규정" is possessive.
    if (text[end] === '의' && isDigit(text[end + 1])) {
        const branchEnd = skipDigits(text, end + 1);
        number += text.slice(end, branchEnd);
        end = branchEnd;
    }

    return { number, start: at, end };
}

export function locateArticleMarkers(text: string): ArticleMarker[] {
    const markers: ArticleMarker[] = [];
    let i = 0;
    while (i < text.length) {
        const marker = readMarker(text, i);
        if (marker) {
            markers.push(marker);
            i = marker.end;
        } else {
            i++;
        }
    }
    return markers;
}

/**
 * Splits statute text into articles in order of appearance.
 *
 * Text before the first marker is dropped. Each article's heading is the bracketed
 * text right after the marker; its body runs to the next marker or the end of input.
 * Numbers are kept as written, so duplicated or out-of-order numbering survives.
 */
export function segmentArticles(fullText: string): Article[] {
    const articles: Article[] = [];
    const text = fullText;

    let state: ScanState = 'outside';
    let number = '';
    let heading = '';
    let headingStart = 0;
    let bodyStart = 0;

    const closeArticle = (at: number) => {
        if (state === 'heading') {
            heading = text.slice(headingStart, at);
            bodyStart = at;
        }
        const body = state === 'outside' ? '' : text.slice(bodyStart, at);
        articles.push({ number, heading: heading.trim(), body: body.trim() });
    };

    let i = 0;
    while (i < text.length) {
        const marker = readMarker(text, i);

        if (marker) {
            if (state !== 'outside') closeArticle(i);

            number = marker.number;
            heading = '';
            i = marker.end;
            while (i < text.length && isWhitespace(text[i])) i++;

            if (OPENING_BRACKETS.has(text[i])) {
                state = 'heading';
                headingStart = i + 1;
                i++;
            } else {
                state = 'body';
                bodyStart = i;
            }
            continue;
        }

        if (state === 'heading' && CLOSING_BRACKETS.has(text[i])) {
            heading = text.slice(headingStart, i);
            state = 'body';
            bodyStart = i + 1;
        }
        i++;
    }

    if (state !== 'outside') closeArticle(text.length);

    return articles;
}

/** 제5조, or 제5조의2 for branch numbers. */
export function formatArticleCitation(number: string): string {
    const branchAt = number.indexOf('의');
    if (branchAt === -1) {
        return `제${number}조`;
    }
    return `제${number.slice(0, branchAt)}조${number.slice(branchAt)}`;
}
