import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from 'fastify';
import { httpStatusForError, TraceSyncError } from './services/errors.js';
import { registerRoutes } from './routes/index.js';
import type { AdminServices } from './routes/services.js';

export type BuildAppOptions = {
  services: AdminServices;
  /** Empty disables the key check (development only; server.ts refuses this in production). */
  adminToken: string;
  logger?: boolean;
};

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

const isPublicRoute = (path: string) => path === '/api/health';

export const buildApp = async (options: BuildAppOptions) => {
  const app = Fastify({ logger: options.logger ?? false });

  app.addHook('onRequest', async (request, reply) => {
    const requestPath = getRequestPathname(request.url);
    if (isPublicRoute(requestPath) || !options.adminToken) {
      return;
    }
    const headerValue = request.headers['x-api-key'];
    const headerToken = Array.isArray(headerValue) ? headerValue[0] : headerValue;
    if (headerToken !== options.adminToken) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Referrer-Policy', 'no-referrer');
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Cache-Control', 'no-store');
    return payload;
  });

  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof TraceSyncError) {
      const status = httpStatusForError(error);
      if (status >= 500) {
        request.log.error(error);
      } else {
        request.log.info({ kind: error.kind, message: error.message }, 'request rejected');
      }
      return reply.code(status).send({ error: error.message, kind: error.kind });
    }
    request.log.error(error);
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    const exposeMessage = statusCode >= 400 && statusCode < 500;
    const message = exposeMessage ? error.message : 'internal server error';
    return reply.code(statusCode).send({ error: message });
  });

  await registerRoutes(app, options.services);
  return app;
};
