import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import routes from './routes';
import { AppContext } from './context';
import { toErrorResponse } from '../utils/errors';

export interface ServerOptions {
  logLevel: string;
  prettyLogs: boolean;
}

export async function createServer(ctx: AppContext, options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({
    logger: {
      level: options.logLevel,
      ...(options.prettyLogs && {
        transport: {
          target: 'pino-pretty',
        },
      }),
    },
  });

  // Register plugins
  await server.register(cors, {
    origin: true,
  });

  // Register Swagger
  await server.register(swagger, {
    swagger: {
      info: {
        title: 'Statute Retrieval API',
        description: 'Segments statutes into articles, ranks them against legal scenarios and prepares analysis context',
        version: '1.0.0',
      },

      schemes: ['http', 'https'],
      consumes: ['application/json'],
      produces: ['application/json'],
    },
  });

  await server.register(swaggerUI, {
    routePrefix: '/documentation',
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({ statusCode: 400, error: 'Bad Request', message: error.message });
    }
    request.log.error({ err: error }, 'Unhandled request error');
    const response = toErrorResponse(error);
    return reply.status(response.statusCode).send(response);
  });

  // Register routes
  await server.register(routes, { ctx });

  // Health check endpoint
  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return server;
}
