// src/search/textChunker.ts
import { ValidationError } from '../utils/errors';

export interface ChunkingOptions {
    chunkSize: number;
    chunkOverlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 1000, chunkOverlap: 200 };

const BREAK_SEPARATORS = ['\n\n', '\n', '. ', ' '];

export function assertChunkingOptions({ chunkSize, chunkOverlap }: ChunkingOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`, { chunkSize });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new ValidationError(
            `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap}`,
            { chunkSize, chunkOverlap }
        );
    }
}

/**
 * Last position in (minEnd, maxEnd] right after a separator, or maxEnd when none.
 */
function findBreak(text: string, minEnd: number, maxEnd: number): number {
    for (const separator of BREAK_SEPARATORS) {
        const at = text.lastIndexOf(separator, maxEnd - separator.length);
        if (at >= 0 && at + separator.length > minEnd) {
            return at + separator.length;
        }
    }
    return maxEnd;
}

/**
 * Splits text into windows of at most `chunkSize` characters, each starting
 * `chunkOverlap` characters before the previous one ended. Windows end on the
 * coarsest separator found in their second half.
 */
export function chunkText(text: string, options: ChunkingOptions = DEFAULT_CHUNKING): string[] {
    assertChunkingOptions(options);
    const { chunkSize, chunkOverlap } = options;

    const trimmed = text.trim();
    if (trimmed.length === 0) return [];
    if (trimmed.length <= chunkSize) return [trimmed];

    const chunks: string[] = [];
    let start = 0;
    while (start < trimmed.length) {
        const maxEnd = Math.min(start + chunkSize, trimmed.length);
        const end = maxEnd === trimmed.length
            ? maxEnd
            : findBreak(trimmed, start + Math.floor(chunkSize / 2), maxEnd);

        const chunk = trimmed.slice(start, end).trim();
        if (chunk.length > 0) chunks.push(chunk);

        if (end >= trimmed.length) break;
        start = Math.max(end - chunkOverlap, start + 1);
    }
    return chunks;
}
