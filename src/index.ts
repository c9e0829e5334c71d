// src/index.ts
import { createServer } from './api/server';
import { createAppContext } from './app';
import config, { validateConfig } from './config/config';
import { loadAndBuildCorpus } from './corpus/corpusLoader';
import { logger } from './utils/logger';

logger.info('Starting statute retrieval service...');
logger.info(`Environment: ${config.nodeEnv}`);

async function start() {
    try {
        for (const warning of validateConfig(config)) {
            logger.warn(warning);
        }

        if (config.openai.azureEndpoint && config.openai.apiKey) {
            logger.info(
                { endpoint: config.openai.azureEndpoint, apiVersion: config.openai.azureApiVersion, model: config.openai.model },
                'Azure OpenAI configuration detected'
            );
        }

        const ctx = createAppContext(config);
        const { snapshot } = await loadAndBuildCorpus(ctx.holder, config.corpus.snapshotPath);
        if (snapshot.status === 'missing') {
            logger.warn(`No corpus snapshot at ${snapshot.filePath}; starting with an empty corpus`);
        }

        const server = await createServer(ctx, {
            logLevel: config.logLevel,
            prettyLogs: config.nodeEnv === 'development',
        });

        await server.listen({ port: config.port, host: '0.0.0.0' });

        logger.info(`Server is running on port ${config.port}`);
        logger.info(`Swagger documentation: http://localhost:${config.port}/documentation`);
        if (config.retrieval.strategy === 'semantic' && config.qdrant.vectorStore === 'qdrant') {
            logger.info(`Qdrant dashboard: ${config.qdrant.url}/dashboard/`);
        }

        const shutdown = async () => {
            logger.info('Shutting down server...');
            await server.close();
            process.exit(0);
        };

        process.on('SIGINT', () => void shutdown());
        process.on('SIGTERM', () => void shutdown());
    } catch (err) {
        logger.error({ err }, 'Error starting server');
        process.exit(1);
    }
}

void start();
