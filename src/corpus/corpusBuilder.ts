// src/corpus/corpusBuilder.ts
import { RetrievableDocument, Statute } from '../types';
import { formatArticleCitation } from './articleSegmenter';

export interface CorpusSummary {
    statutes: number;
    articles: number;
    documents: number;
    fullStatuteDocuments: number;
    articleDocuments: number;
}

/**
 * Flattens statutes into retrievable documents: one per statute with full text,
 * then one per article, statute by statute in input order.
 */
export function buildCorpus(statutes: readonly Statute[]): RetrievableDocument[] {
    const documents: RetrievableDocument[] = [];

    statutes.forEach((statute, statuteIndex) => {
        const { title, keyword, url } = statute;

        if (statute.fullText.length > 0) {
            documents.push({
                id: `s${statuteIndex}`,
                ordinal: documents.length,
                text: `${title} ${statute.fullText}`,
                label: title,
                kind: 'full_statute',
                sourceRef: { statute },
                metadata: { statuteTitle: title, keyword, url },
            });
        }

        statute.articles.forEach((article, articleIndex) => {
            const citation = formatArticleCitation(article.number);
            documents.push({
                id: `s${statuteIndex}-a${articleIndex}`,
                ordinal: documents.length,
                // An empty heading leaves a double space; kept as is.
                text: `${title} ${citation} ${article.heading} ${article.body}`,
                label: `${title} ${citation}`,
                kind: 'article',
                sourceRef: { statute, article },
                metadata: {
                    statuteTitle: title,
                    keyword,
                    url,
                    articleNumber: article.number,
                    articleHeading: article.heading,
                },
            });
        });
    });

    return documents;
}

export function summarizeCorpus(
    statutes: readonly Statute[],
    documents: readonly RetrievableDocument[]
): CorpusSummary {
    const fullStatuteDocuments = documents.filter(doc => doc.kind === 'full_statute').length;
    return {
        statutes: statutes.length,
        articles: statutes.reduce((sum, statute) => sum + statute.articles.length, 0),
        documents: documents.length,
        fullStatuteDocuments,
        articleDocuments: documents.length - fullStatuteDocuments,
    };
}
