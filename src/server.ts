import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { loadEnv } from './config/env.js';
import { JsonFileConfigStore } from './config/json-store.js';
import type { ConfigStore } from './config/types.js';
import { GatewayError, HTTP_STATUS_BY_KIND, buildErrorBody } from './errors.js';
import { logger } from './middleware/logger.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { AdapterFactories, ProviderOptions } from './providers/index.js';
import { aiRoutes } from './routes/ai.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { settingsRoutes } from './routes/settings.js';
import { LLMService } from './services/llm-service.js';

export interface BuildServerOptions {
  store?: ConfigStore;
  adapterFactories?: AdapterFactories;
  adapterOptions?: ProviderOptions;
}

async function openConfigStore(): Promise<ConfigStore> {
  const env = loadEnv();
  return JsonFileConfigStore.open(env.DATA_DIR, env);
}

async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  await server.register(cors);

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  const store = options.store ?? (await openConfigStore());
  const llmService = new LLMService(store, {
    adapterFactories: options.adapterFactories,
    adapterOptions: options.adapterOptions,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        error: 'Validation error',
        details: error.errors,
      });
      return;
    }

    if (error instanceof GatewayError) {
      const status = HTTP_STATUS_BY_KIND[error.kind];
      logger.warn({ requestId: request.id, kind: error.kind, status, error: error.message }, 'Request failed');
      reply.code(status).send(buildErrorBody(error));
      return;
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.code(error.statusCode).send({
        error: 'Bad request',
        message: error.message,
      });
      return;
    }

    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    reply.code(500).send({
      error: 'Internal server error',
      requestId: request.id,
    });
  });

  await server.register(healthRoutes);
  await server.register(metricsRoutes);
  await server.register((instance) => aiRoutes(instance, llmService));
  await server.register((instance) => settingsRoutes(instance, store));

  return server;
}

async function main() {
  const env = loadEnv();
  const server = await buildServer();

  logger.info({ port: env.PORT, host: env.HOST }, 'Starting server');

  try {
    await server.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'AI Gateway shutting down');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.error({ error }, 'Startup failed');
    process.exit(1);
  });
}

export { buildServer };
