import { env } from './src/config/env.js';
import { buildApp } from './src/app.js';
import type { AdminServices } from './src/routes/services.js';
import { buildDashboard } from './src/services/dashboard.js';
import { reclassifyTenantTraces } from './src/services/reclassify.js';
import {
  enqueueDomainDiscovery,
  enqueuePull,
  hasActiveWorkers,
  purgeTenantJobs,
  releaseQueue,
} from './src/services/queue.js';
import { ingestionDeps, settingsStore, traceIngestion } from './src/services/runtime.js';
import { defaultPullRange } from './src/services/scheduler.js';
import { createTenant, deleteTenant, updateTenant } from './src/services/tenantStore.js';
import { getTrace, searchTraces, topUnclassifiedDomains } from './src/services/traceStore.js';

if (env.nodeEnv === 'production' && !env.apiAdminToken) {
  throw new Error('API_ADMIN_TOKEN is required in production');
}

const services: AdminServices = {
  tenants: {
    ...ingestionDeps.tenants,
    create: createTenant,
    update: updateTenant,
    remove: async (tenantId) => {
      await deleteTenant(tenantId);
      await purgeTenantJobs(tenantId);
    },
  },
  settings: settingsStore,
  ledger: ingestionDeps.ledger,
  ingestion: traceIngestion,
  discovery: ingestionDeps,
  traces: {
    search: searchTraces,
    get: getTrace,
    unclassifiedDomains: (tenantId) => topUnclassifiedDomains(tenantId),
    reclassify: (tenantId, options) => reclassifyTenantTraces(tenantId, ingestionDeps, options),
  },
  dashboard: (options) => buildDashboard(ingestionDeps.ledger, options),
  queue: {
    hasActiveWorkers,
    enqueuePull: (payload) => enqueuePull(payload),
    enqueueDomainDiscovery,
  },
  defaultRange: (now) => defaultPullRange(now, env.pull.defaultLookbackDays),
};

const server = await buildApp({
  services,
  adminToken: env.apiAdminToken,
  logger: env.nodeEnv === 'development',
});

const stop = async () => {
  await server.close();
  await releaseQueue();
};

process.on('SIGINT', stop);
process.on('SIGTERM', stop);

await server.listen({ port: env.port, host: '0.0.0.0' });
console.log(`Trace archiver API listening on ${env.port}`);
