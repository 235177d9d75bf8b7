import type { FastifyInstance } from 'fastify';
import { isRecord } from '../shared/json.js';
import type { TenantRecord, TraceDateRange } from '../shared/types.js';
import { TraceSyncError } from '../services/errors.js';
import { isPullStatus } from '../services/pullLedger.js';
import { pullAllTenants } from '../services/scheduler.js';
import { actorFrom, optionalText, parseBooleanFlag, parseLimitOffset, parseRangeInput, type QueryString } from './helpers.js';
import type { AdminServices } from './services.js';

export const registerPullRoutes = async (app: FastifyInstance, services: AdminServices) => {
  const readRange = (body: unknown): TraceDateRange => {
    const input = isRecord(body) ? body : {};
    return parseRangeInput({ start: input.start, end: input.end }, () => services.defaultRange(new Date()));
  };

  const assertNoRunningPull = async (tenant: TenantRecord) => {
    const running = await services.ledger.list({ tenantId: tenant.id, status: 'Running', limit: 1 });
    if (running.total > 0 || services.ingestion.isPulling(tenant.id)) {
      throw new TraceSyncError('PullAlreadyInProgress', `a pull is already running for tenant ${tenant.id}`);
    }
  };

  // Runs in-process when asked to, or when no worker is polling the queue.
  const shouldRunInline = async (inlineFlag: string | undefined) =>
    parseBooleanFlag(inlineFlag) || !(await services.queue.hasActiveWorkers());

  app.post<{ Params: { tenantId: string }; Querystring: QueryString; Body: unknown }>(
    '/api/tenants/:tenantId/pulls',
    async (req, reply) => {
      const tenant = await services.tenants.getTenant(req.params.tenantId);
      if (!tenant) {
        throw new TraceSyncError('NotFound', 'tenant not found');
      }
      if (!tenant.isActive) {
        throw new TraceSyncError('InvalidRequest', 'tenant is not active');
      }
      const range = readRange(req.body);
      const triggeredBy = actorFrom(req);
      await assertNoRunningPull(tenant);

      if (await shouldRunInline(req.query.inline)) {
        const settings = await services.settings.get();
        const outcome = await services.ingestion.pull({ tenant, range, triggerType: 'Manual', triggeredBy, settings });
        return reply.code(200).send({ queued: false, run: outcome.run, refresh: outcome.refresh, skipped: outcome.skipped });
      }

      const jobId = await services.queue.enqueuePull({
        tenantId: tenant.id,
        start: range.start.toISOString(),
        end: range.end.toISOString(),
        triggerType: 'Manual',
        triggeredBy,
      });
      req.log.info({ tenantId: tenant.id, jobId }, 'pull queued');
      return reply.code(202).send({ queued: true, jobId });
    },
  );

  app.post<{ Querystring: QueryString; Body: unknown }>('/api/pulls', async (req, reply) => {
    const range = readRange(req.body);
    const triggeredBy = actorFrom(req);
    const tenants = await services.tenants.listTenants({ activeOnly: true });

    if (await shouldRunInline(req.query.inline)) {
      const settings = await services.settings.get();
      const results = await pullAllTenants(services.ingestion, tenants, {
        range,
        triggerType: 'Manual',
        triggeredBy,
        settings,
      });
      return reply.code(200).send({
        queued: false,
        results: results.map((result) => (result.ok
          ? { tenantId: result.tenantId, ok: true, run: result.outcome.run }
          : { tenantId: result.tenantId, ok: false, error: result.error })),
      });
    }

    const jobs: Array<{ tenantId: string; jobId: string }> = [];
    for (const tenant of tenants) {
      const jobId = await services.queue.enqueuePull({
        tenantId: tenant.id,
        start: range.start.toISOString(),
        end: range.end.toISOString(),
        triggerType: 'Manual',
        triggeredBy,
      });
      jobs.push({ tenantId: tenant.id, jobId });
    }
    return reply.code(202).send({ queued: true, jobs });
  });

  app.get<{ Querystring: QueryString }>('/api/pulls', async (req) => {
    const status = optionalText(req.query.status);
    if (status !== undefined && !isPullStatus(status)) {
      throw new TraceSyncError('InvalidRequest', `unknown pull status ${status}`);
    }
    return services.ledger.list({
      tenantId: optionalText(req.query.tenantId),
      status,
      ...parseLimitOffset(req.query),
    });
  });

  app.get<{ Params: { runId: string } }>('/api/pulls/:runId', async (req) => {
    const run = await services.ledger.get(req.params.runId);
    if (!run) {
      throw new TraceSyncError('NotFound', 'pull run not found');
    }
    return { run };
  });

  app.post<{ Params: { runId: string } }>('/api/pulls/:runId/cancel', async (req, reply) => {
    const run = await services.ledger.requestCancellation(req.params.runId);
    req.log.info({ runId: run.id, actor: actorFrom(req) }, 'pull cancellation requested');
    return reply.code(202).send({ run });
  });
};
