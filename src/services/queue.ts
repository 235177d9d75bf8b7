import { makeWorkerUtils, type WorkerUtils } from 'graphile-worker';
import { env } from '../config/env.js';
import { isPgError, query } from '../db/pool.js';
import type { PullTriggerType } from '../shared/types.js';

let queue: WorkerUtils | null = null;
let activeWorkersCache: { expiresAtMs: number; value: boolean } | null = null;
const ACTIVE_WORKERS_CACHE_TTL_MS = 5_000;

export const createQueue = async () => {
  if (queue) return queue;
  queue = await makeWorkerUtils({
    connectionString: env.databaseUrl,
  });
  return queue;
};

export const releaseQueue = async () => {
  if (!queue) return;
  const current = queue;
  queue = null;
  await current.release();
};

export const hasActiveWorkers = async () => {
  if (activeWorkersCache && activeWorkersCache.expiresAtMs > Date.now()) {
    return activeWorkersCache.value;
  }

  const heartbeatGraceSeconds = 30;
  const countFrom = async (tableName: 'workers' | '_private_workers') => {
    try {
      const result = await query<{ count: number }>(
        `SELECT COUNT(*)::int as count
           FROM graphile_worker.${tableName}
          WHERE last_heartbeat IS NOT NULL
            AND last_heartbeat > NOW() - ($1::double precision * INTERVAL '1 second')`,
        [heartbeatGraceSeconds],
      );
      return Number(result.rows[0]?.count ?? 0);
    } catch (error) {
      // 42P01: the heartbeat table is not exposed by this graphile-worker schema.
      if (isPgError(error) && error.code === '42P01') {
        return null;
      }
      throw error;
    }
  };

  let active = false;
  const workersCount = await countFrom('workers');
  if (typeof workersCount === 'number') {
    active = workersCount > 0;
  } else {
    const privateWorkersCount = await countFrom('_private_workers');
    active = typeof privateWorkersCount === 'number' && privateWorkersCount > 0;
  }

  activeWorkersCache = {
    value: active,
    expiresAtMs: Date.now() + ACTIVE_WORKERS_CACHE_TTL_MS,
  };
  return active;
};

export interface PullTaskPayload {
  tenantId: string;
  /** ISO timestamps; absent means the default window at run time. */
  start?: string;
  end?: string;
  triggerType: PullTriggerType;
  triggeredBy: string;
}

export interface DiscoverDomainsTaskPayload {
  tenantId: string;
  overwrite: boolean;
}

export const enqueuePull = async (payload: PullTaskPayload, jobKey?: string) => {
  const q = await createQueue();
  const job = await q.addJob(
    'pullTraces',
    payload,
    {
      // Pull failures land in the ledger; the job itself is not retried.
      maxAttempts: 1,
      jobKey: jobKey ?? `pull:${payload.tenantId}:manual:${payload.start ?? 'default'}:${payload.end ?? 'default'}`,
      jobKeyMode: 'preserve_run_at',
    },
  );
  return job.id;
};

export const enqueueDomainDiscovery = async (payload: DiscoverDomainsTaskPayload) => {
  const q = await createQueue();
  const job = await q.addJob(
    'discoverDomains',
    payload,
    {
      maxAttempts: 3,
      jobKey: `discover:${payload.tenantId}`,
      jobKeyMode: 'unsafe_dedupe',
    },
  );
  return job.id;
};

export const purgeTenantJobs = async (tenantId: string) => {
  const normalizedTenantId = String(tenantId || '').trim();
  if (!normalizedTenantId) {
    return { removed: 0 };
  }

  const removed = await query<{ count: number }>(
    `WITH deleted AS (
       DELETE FROM graphile_worker.jobs
        WHERE locked_at IS NULL
          AND (
            (task_identifier = 'pullTraces' AND key LIKE ($1 || '%'))
            OR
            (task_identifier = 'discoverDomains' AND key = $2)
          )
       RETURNING 1
     )
     SELECT COUNT(*)::int AS count FROM deleted`,
    [`pull:${normalizedTenantId}:`, `discover:${normalizedTenantId}`],
  );

  return { removed: Number(removed.rows[0]?.count ?? 0) };
};
