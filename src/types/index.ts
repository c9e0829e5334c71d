export interface Article {
    /** Source numbering, branch suffix included ("5의2" for 제5조의2). */
    number: string;
    heading: string;
    body: string;
}

export interface Statute {
    title: string;
    url: string;
    fullText: string;
    /** Search term that discovered the statute. */
    keyword: string;
    articles: Article[];
}

export type DocumentKind = 'full_statute' | 'article';

export interface DocumentSourceRef {
    statute: Statute;
    article?: Article;
}

export interface DocumentMetadata {
    statuteTitle: string;
    keyword: string;
    url: string;
    articleNumber?: string;
    articleHeading?: string;
}

export interface RetrievableDocument {
    id: string;
    ordinal: number;
    text: string;
    label: string;
    kind: DocumentKind;
    sourceRef: DocumentSourceRef;
    metadata: DocumentMetadata;
}

export interface RankedResult {
    document: RetrievableDocument;
    score: number;
    rank: number;
}

export type IndexStrategy = 'lexical' | 'semantic';

export type AnalysisMode = 'local' | 'external';

export type AnalysisTask = 'case_analysis' | 'statute_summary';

export interface StatuteArticleRecord {
    number: string;
    title?: string;
    content?: string;
}

/** On-disk and ingestion shape of a statute. */
export interface StatuteRecord {
    title: string;
    url?: string;
    content?: string;
    keyword?: string;
    articles?: StatuteArticleRecord[];
}

export interface LLMCallTrace {
    prompt: string;
    response: string | null;
    model: string;
    timestamp: string;
    error?: string;
}

export interface AnalysisStep {
    step: number;
    thought: string;
    action: string;
    observation: string | null;
    error?: string;
}

export type AnalysisStatus = 'success' | 'fallback' | 'no_relevant_provisions';

export interface AnalysisTrace {
    task: AnalysisTask;
    subject: string;
    requestedMode: AnalysisMode;
    steps: AnalysisStep[];
    llmCalls: LLMCallTrace[];
}

export interface SourceItem {
    rank: number;
    id: string;
    label: string;
    kind: DocumentKind;
    score: number;
    excerpt: string;
}

export interface AnalysisReport {
    status: AnalysisStatus;
    /** Mode that produced `text`; differs from the requested mode after a fallback. */
    mode: AnalysisMode;
    text: string;
    sources: SourceItem[];
    diagnostic?: string;
    corpusVersion?: number;
    debugInfo?: AnalysisTrace;
}
