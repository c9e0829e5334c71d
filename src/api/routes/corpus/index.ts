import { FastifyInstance } from 'fastify';
import { Static, Type } from '@sinclair/typebox';
import { clearCorpusSnapshot, parseStatuteRecords, saveCorpusSnapshot } from '../../../corpus/corpusStore';
import { loadAndBuildCorpus } from '../../../corpus/corpusLoader';
import { RouteOptions, describeCorpus } from '../../context';
import { CorpusResponse, CorpusResponseSchema, CorpusStatusSchema, errorResponses } from '../../schemas';
import { ErrorResponse, toErrorResponse } from '../../../utils/errors';

const ReplaceCorpusBodySchema = Type.Object({
  statutes: Type.Array(Type.Unknown(), {
    description: 'Statute records ({ title, url?, content?, keyword?, articles? }). Records without articles are segmented.',
  }),
});
type ReplaceCorpusBodyType = Static<typeof ReplaceCorpusBodySchema>;

export default async function corpusRoutes(fastify: FastifyInstance, { ctx }: RouteOptions) {
  fastify.get(
    '/',
    {
      schema: {
        description: 'Status of the active corpus.',
        tags: ['Corpus'],
        response: { 200: CorpusStatusSchema },
      },
    },
    async () => describeCorpus(ctx)
  );

  fastify.put<{ Body: ReplaceCorpusBodyType; Reply: CorpusResponse | ErrorResponse }>(
    '/',
    {
      schema: {
        description: 'Rebuild the corpus from the given statutes, then persist them as the snapshot.',
        tags: ['Corpus'],
        body: ReplaceCorpusBodySchema,
        response: { 200: CorpusResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      const { statutes, warnings } = parseStatuteRecords(request.body.statutes, { segmentMissingArticles: true });
      request.log.info({ received: request.body.statutes.length, accepted: statutes.length }, 'Replacing corpus');

      try {
        // The snapshot is only written once the new corpus has been built.
        await ctx.holder.rebuild(statutes);
        await saveCorpusSnapshot(ctx.snapshotPath, statutes);
        return reply.status(200).send({ corpus: describeCorpus(ctx), snapshot: 'saved', warnings });
      } catch (error) {
        request.log.error({ err: error }, 'Error replacing corpus');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );

  fastify.post<{ Reply: CorpusResponse | ErrorResponse }>(
    '/reload',
    {
      schema: {
        description: 'Reload the corpus snapshot from disk and rebuild the index.',
        tags: ['Corpus'],
        response: { 200: CorpusResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      try {
        const { snapshot } = await loadAndBuildCorpus(ctx.holder, ctx.snapshotPath);
        return reply.status(200).send({
          corpus: describeCorpus(ctx),
          snapshot: snapshot.status,
          warnings: snapshot.status === 'loaded' ? snapshot.warnings : [],
        });
      } catch (error) {
        request.log.error({ err: error }, 'Error reloading corpus');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );

  fastify.delete<{ Reply: CorpusResponse | ErrorResponse }>(
    '/',
    {
      schema: {
        description: 'Remove the corpus snapshot and publish an empty corpus.',
        tags: ['Corpus'],
        response: { 200: CorpusResponseSchema, ...errorResponses },
      },
    },
    async (request, reply) => {
      try {
        const existed = await clearCorpusSnapshot(ctx.snapshotPath);
        await ctx.holder.rebuild([]);
        return reply.status(200).send({
          corpus: describeCorpus(ctx),
          snapshot: existed ? 'removed' : 'missing',
        });
      } catch (error) {
        request.log.error({ err: error }, 'Error clearing corpus');
        const response = toErrorResponse(error);
        return reply.status(response.statusCode).send(response);
      }
    }
  );
}
