import { FastifyInstance } from 'fastify';
import statuteRoutes from './statutes';
import corpusRoutes from './corpus';
import { RouteOptions } from '../context';

export default async function (fastify: FastifyInstance, { ctx }: RouteOptions) {
  await fastify.register(statuteRoutes, { prefix: '/api/statutes', ctx });
  await fastify.register(corpusRoutes, { prefix: '/api/corpus', ctx });
}
