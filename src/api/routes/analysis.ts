import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContainer } from '../../index.js';
import { normalizeDomain } from '../../services/page-fetcher/index.js';
import { serializeResult } from '../../services/domain-analyzer/types.js';

export const analysisRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { store, analyzer } = opts.container;

  // GET /api/analyze/:domain
  app.get<{ Params: { domain: string } }>('/analyze/:domain', async (request) => {
    const domain = normalizeDomain(request.params.domain);
    const result = await analyzer.analyzeDomain(domain);
    await store.upsertResult(result);
    request.log.info({ domain, status: result.status }, 'Domain analyzed');
    return serializeResult(result);
  });

  // POST /api/analyze-all
  app.post('/analyze-all', async (request) => {
    const domains = store.list().map(record => record.domain);
    request.log.info({ domains: domains.length }, 'Analyzing all domains');

    const results = await analyzer.analyzeDomains(domains, async (result) => {
      await store.upsertResult(result);
    });

    return {
      message: `Successfully analyzed ${results.length} domains`,
      analyzed: results.length,
      results: results.map(serializeResult),
    };
  });
};
