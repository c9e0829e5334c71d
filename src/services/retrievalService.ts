import { RankedResult, SourceItem } from '../types';
import { RelevanceIndex } from '../search/relevanceIndex';
import { logger } from '../utils/logger';

export const CONTEXT_HEADER = '관련 법령:\n\n';

export interface RetrieveOptions {
    /** Results scoring below this are dropped. */
    minScore?: number;
}

export type AssembledContext =
    | { status: 'ok'; text: string; citations: string[] }
    | { status: 'no_relevant_provisions' };

/**
 * Ranks the index's documents against a scenario. A missing index or a blank
 * scenario yields no results.
 */
export async function retrieveContext(
    index: RelevanceIndex | undefined,
    scenario: string,
    k: number,
    { minScore }: RetrieveOptions = {}
): Promise<RankedResult[]> {
    if (!index || index.size === 0 || scenario.trim().length === 0) {
        return [];
    }

    const startTime = Date.now();
    const results = await index.query(scenario, k);
    const kept = minScore === undefined ? results : results.filter(result => result.score >= minScore);

    logger.debug(
        `Retrieved ${kept.length}/${results.length} results (${index.strategy}) in ${Date.now() - startTime}ms`
    );
    // Re-rank after filtering so ranks stay contiguous.
    return kept.map((result, rank) => ({ ...result, rank }));
}

export function excerpt(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Numbered, citation-tagged context block for a downstream summarizer.
 */
export function assembleContext(results: readonly RankedResult[], excerptChars: number): AssembledContext {
    if (results.length === 0) {
        return { status: 'no_relevant_provisions' };
    }

    let text = CONTEXT_HEADER;
    results.forEach((result, i) => {
        text += `${i + 1}. ${result.document.label}\n${excerpt(result.document.text, excerptChars)}\n\n`;
    });

    return {
        status: 'ok',
        text,
        citations: results.map(result => result.document.label),
    };
}

export function toSourceItems(results: readonly RankedResult[], excerptChars: number): SourceItem[] {
    return results.map(result => ({
        rank: result.rank,
        id: result.document.id,
        label: result.document.label,
        kind: result.document.kind,
        score: result.score,
        excerpt: excerpt(result.document.text, excerptChars),
    }));
}
