// src/agent/prompts.ts
import { AnalysisTask } from '../types';

export const DEFAULT_SUMMARY_QUERY = '공정거래 하도급 상생협력';

export const NO_CORPUS_MESSAGE = '관련 법령 데이터가 없습니다. 먼저 데이터를 수집해주세요.';

export const NO_RESULTS_MESSAGE = '관련 법령을 찾지 못했습니다. 케이스 설명을 더 구체적으로 작성해주세요.';

export const SYSTEM_PROMPT_CASE_ANALYSIS = `당신은 공정거래 전문 변호사입니다.
주어진 케이스와 관련 법령을 바탕으로 다음과 같이 분석해주세요:

1. **관련 법령 식별**: 케이스와 가장 관련성이 높은 법령과 조문을 찾아주세요.
2. **법적 쟁점 분석**: 케이스에서 발생할 수 있는 법적 쟁점을 분석해주세요.
3. **위반 가능성 평가**: 공정거래법 위반 가능성을 평가해주세요.
4. **권고사항**: 기업이 취해야 할 조치사항을 제시해주세요.

제공된 법령 정보에 근거해서만 답하고, 인용한 조문은 번호로 표시해주세요.
분석은 객관적이고 실무적으로 작성해주세요.`;

export const SYSTEM_PROMPT_STATUTE_SUMMARY = `당신은 법령 전문가입니다.
주어진 법령 정보를 바탕으로 다음과 같이 요약해주세요:

1. **법령 개요**: 각 법령의 목적과 주요 내용
2. **핵심 조문**: 가장 중요한 조문들과 그 의미
3. **적용 범위**: 어떤 기업이나 거래에 적용되는지
4. **주요 제재**: 위반 시 어떤 제재가 있는지

요약은 일반인이 이해하기 쉽게 작성해주세요.`;

export const CASE_ANALYSIS_PROMPT_TEMPLATE = (scenario: string, context: string) =>
    `케이스: ${scenario}\n\n${context}\n\n위 케이스를 분석해주세요.`;

export const STATUTE_SUMMARY_PROMPT_TEMPLATE = (context: string) =>
    `다음 법령 정보를 요약해주세요:\n\n${context}`;

export function systemPromptFor(task: AnalysisTask): string {
    return task === 'case_analysis' ? SYSTEM_PROMPT_CASE_ANALYSIS : SYSTEM_PROMPT_STATUTE_SUMMARY;
}

export function userPromptFor(task: AnalysisTask, subject: string, context: string): string {
    return task === 'case_analysis'
        ? CASE_ANALYSIS_PROMPT_TEMPLATE(subject, context)
        : STATUTE_SUMMARY_PROMPT_TEMPLATE(context);
}
