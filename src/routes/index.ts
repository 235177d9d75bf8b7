import type { FastifyInstance } from 'fastify';
import { registerPullRoutes } from './pullRoutes.js';
import type { AdminServices } from './services.js';
import { registerSettingsRoutes } from './settingsRoutes.js';
import { registerTenantRoutes } from './tenantRoutes.js';
import { registerTraceRoutes } from './traceRoutes.js';

export const registerRoutes = async (app: FastifyInstance, services: AdminServices) => {
  app.get('/api/health', async () => ({ ok: true }));

  await registerTenantRoutes(app, services);
  await registerPullRoutes(app, services);
  await registerTraceRoutes(app, services);
  await registerSettingsRoutes(app, services);
};
