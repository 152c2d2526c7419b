import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfig, type AppConfig } from './config/index.js';
import { createItemRepositoryFromConfig } from './infrastructure/repositories.js';
import { itemRoutes } from './modules/items/item.routes.js';
import type { ItemRepository } from './modules/items/item.repository.js';
import pkg from '../package.json' with { type: 'json' };

export interface AppDependencies {
  config?: AppConfig;
  repository?: ItemRepository;
  logger?: FastifyServerOptions['logger'];
}

const DOCS_PREFIX = '/swagger';
const apiVersion = pkg.version;

export function buildApp(deps: AppDependencies = {}) {
  const config = deps.config ?? loadConfig();
  const app = Fastify({ logger: deps.logger ?? { level: config.logLevel } });
  const repository = deps.repository ?? createItemRepositoryFromConfig(config.persistence, app.log);

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Item Store API',
        description: 'CRUD operations over item records persisted to a JSON file',
        version: apiVersion,
      },
      servers: [{ url: config.server.publicUrl, description: 'API server' }],
    },
  });

  app.register(swaggerUi, {
    routePrefix: DOCS_PREFIX,
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      reply.code(statusCode).send({ error: error.message });
      return;
    }
    request.log.error({ err: error }, 'Unhandled error');
    reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.register(itemRoutes, { prefix: '/items', repository });

  app.get('/', { schema: { tags: ['Root'], summary: 'Service information' } }, async () => ({
    message: 'Welcome to the Item Store API',
    docs: DOCS_PREFIX,
  }));
  app.get('/health', { schema: { tags: ['Root'], summary: 'Liveness check' } }, async () => ({ status: 'ok' }));
  return app;
}
