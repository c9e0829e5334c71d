// src/agent/analyzers.ts
import { AnalysisTask, LLMCallTrace, RankedResult } from '../types';
import { CompletionClient, CompletionResponse } from '../services/openAIService';
import { assembleContext, excerpt } from '../services/retrievalService';
import { systemPromptFor, userPromptFor } from './prompts';
import { describeError } from '../utils/logger';

export interface AnalysisRequest {
    task: AnalysisTask;
    /** The scenario for a case analysis, the law name or query for a summary. */
    subject: string;
    results: readonly RankedResult[];
}

export type AnalysisOutcome =
    | { ok: true; text: string; llmCalls: LLMCallTrace[] }
    | { ok: false; reason: string; llmCalls: LLMCallTrace[] };

/**
 * Produces analysis text from a ranked context. One implementation per analysis mode.
 */
export interface CaseAnalyzer {
    analyze(request: AnalysisRequest): Promise<AnalysisOutcome>;
}

const CASE_CLOSING_NOTE = [
    '## 분석 요약',
    '',
    '위의 관련 법령들을 검토하여 케이스의 법적 쟁점을 파악하시기 바랍니다.',
    '더 정확한 분석을 위해서는 OpenAI API 키를 설정하여 AI 분석 기능을 활용하세요.',
].join('\n');

const SUMMARY_CLOSING_NOTE = [
    '## 요약 안내',
    '',
    '위 조문들은 검색어와의 유사도 순으로 정렬되어 있습니다.',
    '법령별 개요가 필요하면 AI 분석 기능을 활용하세요.',
].join('\n');

/**
 * Deterministic summary: ranked citations, similarity scores and excerpts.
 */
export class LocalSummaryAnalyzer implements CaseAnalyzer {
    constructor(private readonly excerptChars: number) {}

    summarize({ task, results }: AnalysisRequest): string {
        let text = task === 'case_analysis' ? '## 관련 법령 분석\n\n' : '## 관련 법령 목록\n\n';

        results.forEach((result, i) => {
            text += `### ${i + 1}. ${result.document.label}\n`;
            text += `**유사도:** ${result.score.toFixed(3)}\n\n`;
            text += `**내용:** ${excerpt(result.document.text, this.excerptChars)}\n\n`;
            text += '---\n\n';
        });

        return text + (task === 'case_analysis' ? CASE_CLOSING_NOTE : SUMMARY_CLOSING_NOTE);
    }

    async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
        if (request.results.length === 0) {
            return { ok: false, reason: 'No provisions to summarize.', llmCalls: [] };
        }
        return { ok: true, text: this.summarize(request), llmCalls: [] };
    }
}

/**
 * Hands the assembled context to a text-generation service and returns its prose.
 */
export class ExternalReasoningAnalyzer implements CaseAnalyzer {
    constructor(
        private readonly client: CompletionClient,
        private readonly excerptChars: number
    ) {}

    async analyze({ task, subject, results }: AnalysisRequest): Promise<AnalysisOutcome> {
        if (!this.client.configured) {
            return { ok: false, reason: 'External analysis is not configured (OPENAI_API_KEY is not set).', llmCalls: [] };
        }

        const context = assembleContext(results, this.excerptChars);
        if (context.status === 'no_relevant_provisions') {
            return { ok: false, reason: 'No context available for external analysis.', llmCalls: [] };
        }

        let response: CompletionResponse;
        try {
            response = await this.client.complete({
                systemMessage: systemPromptFor(task),
                prompt: userPromptFor(task, subject, context.text),
            });
        } catch (error) {
            return { ok: false, reason: `External analysis failed: ${describeError(error)}`, llmCalls: [] };
        }

        const { content, llmTrace } = response;
        if (!content) {
            return { ok: false, reason: llmTrace.error ?? 'External analysis returned no text.', llmCalls: [llmTrace] };
        }
        return { ok: true, text: content, llmCalls: [llmTrace] };
    }
}
