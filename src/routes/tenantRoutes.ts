import type { FastifyInstance } from 'fastify';
import { isRecord } from '../shared/json.js';
import { getAccessModeCapabilities } from '../services/accessModes.js';
import { discoverAndStoreDomains } from '../services/domainDiscovery.js';
import { setOwnedDomains } from '../services/domainRegistry.js';
import { describeError, TraceSyncError } from '../services/errors.js';
import { toPublicTenant } from '../services/tenantStore.js';
import { parseBooleanFlag, type QueryString } from './helpers.js';
import type { AdminServices } from './services.js';

type TenantParams = { tenantId: string };

export const registerTenantRoutes = async (app: FastifyInstance, services: AdminServices) => {
  const loadTenant = async (tenantId: string) => {
    const tenant = await services.tenants.getTenant(tenantId);
    if (!tenant) {
      throw new TraceSyncError('NotFound', 'tenant not found');
    }
    return tenant;
  };

  app.get<{ Querystring: QueryString }>('/api/tenants', async (req) => {
    const tenants = await services.tenants.listTenants({ activeOnly: parseBooleanFlag(req.query.active) });
    return { tenants: tenants.map(toPublicTenant) };
  });

  app.get<{ Params: TenantParams }>('/api/tenants/:tenantId', async (req) => {
    return { tenant: toPublicTenant(await loadTenant(req.params.tenantId)) };
  });

  app.post<{ Body: unknown }>('/api/tenants', async (req, reply) => {
    const body = isRecord(req.body) ? req.body : {};
    const tenant = await services.tenants.create(body);
    req.log.info({ tenantId: tenant.id }, 'tenant created');
    if (getAccessModeCapabilities(tenant.accessMode).supportsDomainDiscovery) {
      try {
        await services.queue.enqueueDomainDiscovery({ tenantId: tenant.id, overwrite: false });
      } catch (error) {
        req.log.warn({ tenantId: tenant.id, error: describeError(error) }, 'initial domain discovery not queued');
      }
    }
    return reply.code(201).send({ tenant: toPublicTenant(tenant) });
  });

  app.patch<{ Params: TenantParams; Body: unknown }>('/api/tenants/:tenantId', async (req) => {
    const body = isRecord(req.body) ? req.body : {};
    const tenant = await services.tenants.update(req.params.tenantId, body);
    return { tenant: toPublicTenant(tenant) };
  });

  app.delete<{ Params: TenantParams }>('/api/tenants/:tenantId', async (req, reply) => {
    await services.tenants.remove(req.params.tenantId);
    req.log.info({ tenantId: req.params.tenantId }, 'tenant deleted');
    return reply.code(204).send();
  });

  app.put<{ Params: TenantParams; Body: unknown }>('/api/tenants/:tenantId/domains', async (req) => {
    const body = isRecord(req.body) ? req.body : {};
    const domains = body.domains;
    if (!Array.isArray(domains) || !domains.every((domain): domain is string => typeof domain === 'string')) {
      throw new TraceSyncError('InvalidRequest', 'domains must be an array of strings');
    }
    const stored = await setOwnedDomains(services.tenants, req.params.tenantId, domains, {
      overwrite: body.overwrite === true,
    });
    return { tenantId: req.params.tenantId, ownedDomains: stored };
  });

  app.post<{ Params: TenantParams; Body: unknown }>('/api/tenants/:tenantId/discover-domains', async (req) => {
    const body = isRecord(req.body) ? req.body : {};
    const tenant = await loadTenant(req.params.tenantId);
    return discoverAndStoreDomains(
      tenant,
      { ...services.discovery, tenants: services.tenants },
      { overwrite: body.overwrite === true, dryRun: body.dryRun === true },
    );
  });

  app.get<{ Params: TenantParams }>('/api/tenants/:tenantId/unclassified-domains', async (req) => {
    const tenant = await loadTenant(req.params.tenantId);
    return {
      tenantId: tenant.id,
      ownedDomains: tenant.ownedDomains,
      domains: await services.traces.unclassifiedDomains(tenant.id),
    };
  });

  app.post<{ Params: TenantParams; Body: unknown }>('/api/tenants/:tenantId/fix-directions', async (req) => {
    const body = isRecord(req.body) ? req.body : {};
    return services.traces.reclassify(req.params.tenantId, { dryRun: body.dryRun === true });
  });
};
