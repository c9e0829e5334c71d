import { FastifyInstance } from 'fastify';
import searchEndpoint from './search';
import analyzeEndpoints from './analyze';
import { RouteOptions } from '../../context';

export default async function statuteRoutes(fastify: FastifyInstance, options: RouteOptions) {
  await fastify.register(searchEndpoint, options);
  await fastify.register(analyzeEndpoints, options);
}
