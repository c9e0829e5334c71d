import {
    AnalysisMode,
    AnalysisReport,
    AnalysisStep,
    AnalysisTask,
    AnalysisTrace,
} from '../types';
import { StatuteCorpus } from '../corpus/statuteCorpus';
import { retrieveContext, toSourceItems } from '../services/retrievalService';
import { CaseAnalyzer } from './analyzers';
import { DEFAULT_SUMMARY_QUERY, NO_CORPUS_MESSAGE, NO_RESULTS_MESSAGE } from './prompts';
import { logger } from '../utils/logger';

const SUMMARY_RESULTS_FOR_LAW = 10;
const SUMMARY_RESULTS_DEFAULT = 15;

export interface AnalysisServiceOptions {
    defaultMode: AnalysisMode;
    resultCount: number;
    minScore?: number;
    sourceExcerptChars: number;
    debugMode: boolean;
}

export interface CaseAnalysisParams {
    mode?: AnalysisMode;
    k?: number;
}

export interface SummaryParams {
    lawName?: string;
    mode?: AnalysisMode;
}

interface RunParams {
    task: AnalysisTask;
    subject: string;
    query: string;
    k: number;
    mode: AnalysisMode;
}

function addStepToTrace(
    trace: AnalysisTrace,
    thought: string,
    action: string,
    observation: string | null = null,
    error?: string
): AnalysisStep {
    const step: AnalysisStep = {
        step: trace.steps.length + 1,
        thought,
        action,
        observation,
        error,
    };
    trace.steps.push(step);
    logger.debug({ step }, `[Analysis Step ${step.step}] ${action}`);
    return step;
}

export type AnalyzerRegistry = Record<AnalysisMode, CaseAnalyzer>;

/**
 * Retrieves provisions for a scenario and turns them into analysis text with the
 * analyzer registered for the requested mode. When a non-local analyzer fails,
 * the local one runs instead and the failure is reported in `diagnostic`.
 */
export class AnalysisService {
    constructor(
        private readonly analyzers: AnalyzerRegistry,
        private readonly options: AnalysisServiceOptions
    ) {}

    get defaultMode(): AnalysisMode {
        return this.options.defaultMode;
    }

    analyzeCase(
        corpus: StatuteCorpus | undefined,
        scenario: string,
        { mode = this.options.defaultMode, k = this.options.resultCount }: CaseAnalysisParams = {}
    ): Promise<AnalysisReport> {
        return this.run(corpus, { task: 'case_analysis', subject: scenario, query: scenario, k, mode });
    }

    summarizeStatutes(
        corpus: StatuteCorpus | undefined,
        { lawName, mode = this.options.defaultMode }: SummaryParams = {}
    ): Promise<AnalysisReport> {
        const name = lawName?.trim();
        return this.run(corpus, name
            ? { task: 'statute_summary', subject: name, query: name, k: SUMMARY_RESULTS_FOR_LAW, mode }
            : { task: 'statute_summary', subject: DEFAULT_SUMMARY_QUERY, query: DEFAULT_SUMMARY_QUERY, k: SUMMARY_RESULTS_DEFAULT, mode });
    }

    private async run(corpus: StatuteCorpus | undefined, params: RunParams): Promise<AnalysisReport> {
        const { task, subject, query, k, mode } = params;
        const trace: AnalysisTrace = { task, subject, requestedMode: mode, steps: [], llmCalls: [] };
        const finish = (report: Omit<AnalysisReport, 'debugInfo' | 'corpusVersion'>): AnalysisReport => ({
            ...report,
            corpusVersion: corpus?.version,
            debugInfo: this.options.debugMode ? trace : undefined,
        });

        const retrieval = addStepToTrace(trace, 'Retrieving provisions for the request.', 'retrieveContext');
        const results = await retrieveContext(corpus?.index, query, k, { minScore: this.options.minScore });
        retrieval.observation = JSON.stringify(results.map(result => ({ id: result.document.id, score: result.score })));

        if (results.length === 0) {
            const text = !corpus || corpus.isEmpty ? NO_CORPUS_MESSAGE : NO_RESULTS_MESSAGE;
            addStepToTrace(trace, 'No provisions retrieved.', 'finish', text);
            return finish({ status: 'no_relevant_provisions', mode, text, sources: [] });
        }

        const sources = toSourceItems(results, this.options.sourceExcerptChars);
        const request = { task, subject, results };

        const step = addStepToTrace(trace, `Running the ${mode} analyzer.`, `${mode}Analysis`);
        const outcome = await this.analyzers[mode].analyze(request);
        trace.llmCalls.push(...outcome.llmCalls);

        if (outcome.ok) {
            step.observation = `${outcome.text.length} characters`;
            return finish({ status: 'success', mode, text: outcome.text, sources });
        }
        step.error = outcome.reason;

        if (mode !== 'local') {
            logger.warn(`${mode} analysis unavailable, falling back to local summary: ${outcome.reason}`);
            const fallback = await this.analyzers.local.analyze(request);
            trace.llmCalls.push(...fallback.llmCalls);
            const fallbackStep = addStepToTrace(trace, 'Falling back to the local summary.', 'localAnalysis');
            if (fallback.ok) {
                fallbackStep.observation = `${fallback.text.length} characters`;
                return finish({ status: 'fallback', mode: 'local', text: fallback.text, sources, diagnostic: outcome.reason });
            }
            fallbackStep.error = fallback.reason;
        }

        return finish({
            status: 'no_relevant_provisions',
            mode,
            text: NO_RESULTS_MESSAGE,
            sources: [],
            diagnostic: outcome.reason,
        });
    }
}
