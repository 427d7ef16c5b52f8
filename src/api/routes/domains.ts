import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ServiceContainer } from '../../index.js';
import { ConflictError, NotFoundError } from '../../lib/errors.js';
import { normalizeDomain } from '../../services/page-fetcher/index.js';
import { DOMAIN_STATUSES } from '../../services/domain-analyzer/types.js';

const addDomainBody = z.object({
  domain: z.string().min(1),
});

const updateDomainBody = z.object({
  status: z.enum(DOMAIN_STATUSES).optional(),
  company_name: z.string().nullable().optional(),
  contact_url: z.string().nullable().optional(),
});

export const domainRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { store } = opts.container;

  // GET /api/domains
  app.get('/', async () => {
    return store.list();
  });

  // POST /api/domains
  app.post('/', async (request, reply) => {
    const body = addDomainBody.parse(request.body);
    const domain = normalizeDomain(body.domain);

    if (!(await store.add(domain))) {
      throw new ConflictError('Domain', domain);
    }

    return reply.status(201).send({ message: `Domain ${domain} added successfully`, domain });
  });

  // GET /api/domains/:domain
  app.get<{ Params: { domain: string } }>('/:domain', async (request) => {
    const domain = normalizeDomain(request.params.domain);
    const record = store.get(domain);
    if (!record) throw new NotFoundError('Domain', domain);
    return record;
  });

  // PUT /api/domains/:domain
  app.put<{ Params: { domain: string } }>('/:domain', async (request) => {
    const domain = normalizeDomain(request.params.domain);
    const patch = updateDomainBody.parse(request.body ?? {});

    if (!(await store.update(domain, patch))) {
      throw new NotFoundError('Domain', domain);
    }

    return { message: `Domain ${domain} updated successfully`, data: store.get(domain) };
  });

  // DELETE /api/domains/:domain
  app.delete<{ Params: { domain: string } }>('/:domain', async (request) => {
    const domain = normalizeDomain(request.params.domain);
    if (!(await store.delete(domain))) {
      throw new NotFoundError('Domain', domain);
    }
    return { message: `Domain ${domain} deleted successfully` };
  });
};
