import Fastify from 'fastify';
import cors from '@fastify/cors';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { domainRoutes } from './routes/domains.js';
import { analysisRoutes } from './routes/analysis.js';
import type { ServiceContainer } from '../index.js';

export async function buildApp(container: ServiceContainer, options: { logger?: boolean } = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
  });

  // Plugins
  await app.register(cors, { origin: true, methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'] });
  await app.register(errorHandlerPlugin);

  // Routes
  await app.register(domainRoutes, { prefix: '/api/domains', container });
  await app.register(analysisRoutes, { prefix: '/api', container });

  app.get('/', async () => ({
    message: 'Company Lookup API',
    endpoints: [
      'GET /api/domains - List all domains',
      'POST /api/domains - Add a domain',
      'GET|PUT|DELETE /api/domains/:domain - Read, update or delete a domain',
      'GET /api/analyze/:domain - Analyze a domain and store the result',
      'POST /api/analyze-all - Analyze every stored domain',
    ],
  }));

  // Health check
  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  return app;
}
