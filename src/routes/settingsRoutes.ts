import type { FastifyInstance } from 'fastify';
import { parseSettingsPatch } from '../services/appSettings.js';
import { actorFrom } from './helpers.js';
import type { AdminServices } from './services.js';

export const registerSettingsRoutes = async (app: FastifyInstance, services: AdminServices) => {
  app.get('/api/settings', async () => ({ settings: await services.settings.get() }));

  app.patch<{ Body: unknown }>('/api/settings', async (req) => {
    const patch = parseSettingsPatch(req.body);
    const settings = await services.settings.update(patch, actorFrom(req));
    req.log.info({ actor: settings.updatedBy, patch }, 'settings updated');
    return { settings };
  });
};
