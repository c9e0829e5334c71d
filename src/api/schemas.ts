import { Static, Type } from '@sinclair/typebox';

export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number(),
  error: Type.String(),
  message: Type.String(),
});

export const AnalysisModeSchema = Type.Union([Type.Literal('local'), Type.Literal('external')], {
  description: "'local' lists ranked provisions; 'external' asks the language model for prose analysis.",
});

export const SourceItemSchema = Type.Object({
  rank: Type.Integer(),
  id: Type.String(),
  label: Type.String({ description: 'Citation, e.g. "하도급법 제5조"' }),
  kind: Type.Union([Type.Literal('full_statute'), Type.Literal('article')]),
  score: Type.Number(),
  excerpt: Type.String(),
});

const AnalysisStepSchema = Type.Object({
  step: Type.Integer(),
  thought: Type.String(),
  action: Type.String(),
  observation: Type.Union([Type.String(), Type.Null()]),
  error: Type.Optional(Type.String()),
});

const LLMCallTraceSchema = Type.Object({
  prompt: Type.String(),
  response: Type.Union([Type.String(), Type.Null()]),
  model: Type.String(),
  timestamp: Type.String(),
  error: Type.Optional(Type.String()),
});

const AnalysisTraceSchema = Type.Object({
  task: Type.String(),
  subject: Type.String(),
  requestedMode: Type.String(),
  steps: Type.Array(AnalysisStepSchema),
  llmCalls: Type.Array(LLMCallTraceSchema),
});

export const AnalysisReportSchema = Type.Object({
  status: Type.String({ description: "'success' | 'fallback' | 'no_relevant_provisions'" }),
  mode: AnalysisModeSchema,
  text: Type.String(),
  sources: Type.Array(SourceItemSchema),
  diagnostic: Type.Optional(Type.String({ description: 'Why external analysis was unavailable' })),
  corpusVersion: Type.Optional(Type.Integer()),
  debugInfo: Type.Optional(AnalysisTraceSchema),
});

export const CorpusStatusSchema = Type.Object({
  loaded: Type.Boolean(),
  version: Type.Optional(Type.Integer()),
  strategy: Type.String(),
  builtAt: Type.Optional(Type.String()),
  statutes: Type.Integer(),
  articles: Type.Integer(),
  documents: Type.Integer(),
  fullStatuteDocuments: Type.Integer(),
  articleDocuments: Type.Integer(),
  snapshotPath: Type.String(),
});

export type CorpusStatus = Static<typeof CorpusStatusSchema>;

export const CorpusResponseSchema = Type.Object({
  corpus: CorpusStatusSchema,
  snapshot: Type.Optional(Type.Union([
    Type.Literal('loaded'),
    Type.Literal('missing'),
    Type.Literal('saved'),
    Type.Literal('removed'),
  ])),
  warnings: Type.Optional(Type.Array(Type.String())),
});

export type CorpusResponse = Static<typeof CorpusResponseSchema>;

export const errorResponses = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
};
