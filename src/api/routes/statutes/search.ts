import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { retrieveContext, toSourceItems } from '../../../services/retrievalService';
import { SourceItem } from '../../../types';
import { RouteOptions } from '../../context';
import { SourceItemSchema, errorResponses } from '../../schemas';
import { ErrorResponse, toErrorResponse } from '../../../utils/errors';

const SearchQuerySchema = Type.Object({
  query: Type.String({ minLength: 1, description: 'Free-text legal scenario or keywords.' }),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 50, description: 'Maximum number of results to return.' })),
});

type SearchQueryType = Static<typeof SearchQuerySchema>;

const SearchResponseSchema = Type.Object({
  results: Type.Array(SourceItemSchema),
  query: Type.String(),
  strategy: Type.String(),
  corpusVersion: Type.Optional(Type.Integer()),
  totalResults: Type.Integer(),
  executionTimeMs: Type.Number(),
});

interface SearchResponse {
  results: SourceItem[];
  query: string;
  strategy: string;
  corpusVersion?: number;
  totalResults: number;
  executionTimeMs: number;
}

export default async function searchEndpoint(fastify: FastifyInstance, { ctx }: RouteOptions) {
  fastify.get<{ Querystring: SearchQueryType; Reply: SearchResponse | ErrorResponse }>(
    '/search',
    {
      schema: {
        description: 'Rank statutes and articles against a query.',
        tags: ['Search API'],
        summary: 'Top-k statute and article search.',
        querystring: SearchQuerySchema,
        response: {
          200: SearchResponseSchema,
          ...errorResponses,
        },
      },
    },
    async (request, reply) => {
      const { query, limit = ctx.resultCount } = request.query;
      request.log.info({ query, limit }, 'Received search request');

      const startTime = Date.now();
      const corpus = ctx.holder.current();

      try {
        const results = await retrieveContext(corpus?.index, query, limit, { minScore: ctx.minScore });

        return reply.status(200).send({
          results: toSourceItems(results, ctx.excerptChars),
          query,
          strategy: corpus?.index.strategy ?? ctx.strategy,
          corpusVersion: corpus?.version,
          totalResults: results.length,
          executionTimeMs: Date.now() - startTime,
        });
      } catch (error) {
        request.log.error({ err: error, query }, 'Error in /search endpoint');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );
}
