import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { AnalysisReport } from '../../../types';
import { RouteOptions } from '../../context';
import { AnalysisModeSchema, AnalysisReportSchema, errorResponses } from '../../schemas';
import { ErrorResponse, toErrorResponse } from '../../../utils/errors';

const AnalyzeBodySchema = Type.Object({
  scenario: Type.String({ minLength: 1, description: 'Description of the case to analyze.' }),
  mode: Type.Optional(AnalysisModeSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 50, description: 'Number of provisions to retrieve.' })),
});
type AnalyzeBodyType = Static<typeof AnalyzeBodySchema>;

const SummaryBodySchema = Type.Object({
  lawName: Type.Optional(Type.String({ description: 'Statute to summarize; all fair-trade statutes when omitted.' })),
  mode: Type.Optional(AnalysisModeSchema),
});
type SummaryBodyType = Static<typeof SummaryBodySchema>;

export default async function analyzeEndpoints(fastify: FastifyInstance, { ctx }: RouteOptions) {
  fastify.post<{ Body: AnalyzeBodyType; Reply: AnalysisReport | ErrorResponse }>(
    '/analyze',
    {
      schema: {
        description: 'Retrieve the provisions relevant to a case and analyze them.',
        tags: ['Analysis'],
        summary: 'Case analysis, local or external.',
        body: AnalyzeBodySchema,
        response: {
          200: AnalysisReportSchema,
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const { scenario, mode, limit } = request.body;
      request.log.info({ mode, limit }, 'Received case analysis request');

      try {
        const report = await ctx.analysis.analyzeCase(ctx.holder.current(), scenario, { mode, k: limit });
        if (report.diagnostic) {
          request.log.warn({ diagnostic: report.diagnostic }, 'External analysis fell back to local summary');
        }
        return reply.status(200).send(report);
      } catch (error) {
        request.log.error({ err: error }, 'Unhandled error in /analyze endpoint');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );

  fastify.post<{ Body: SummaryBodyType; Reply: AnalysisReport | ErrorResponse }>(
    '/summary',
    {
      schema: {
        description: 'Summarize a statute, or the fair-trade statutes in the corpus.',
        tags: ['Analysis'],
        summary: 'Statute summary, local or external.',
        body: SummaryBodySchema,
        response: {
          200: AnalysisReportSchema,
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const { lawName, mode } = request.body;
      request.log.info({ lawName, mode }, 'Received statute summary request');

      try {
        const report = await ctx.analysis.summarizeStatutes(ctx.holder.current(), { lawName, mode });
        return reply.status(200).send(report);
      } catch (error) {
        request.log.error({ err: error }, 'Unhandled error in /summary endpoint');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );
}
