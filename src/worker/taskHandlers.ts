import type { Task } from 'graphile-worker';
import { env } from '../config/env.js';
import { isRecord } from '../shared/json.js';
import type { TraceDateRange } from '../shared/types.js';
import { discoverAndStoreDomains } from '../services/domainDiscovery.js';
import { describeError, isTraceSyncError } from '../services/errors.js';
import type { DiscoverDomainsTaskPayload, PullTaskPayload } from '../services/queue.js';
import { ingestionDeps, settingsStore, traceIngestion } from '../services/runtime.js';
import { defaultPullRange } from '../services/scheduler.js';

export const parsePullTaskPayload = (payload: unknown): PullTaskPayload => {
  if (!isRecord(payload) || typeof payload.tenantId !== 'string' || !payload.tenantId) {
    throw new Error('pullTraces payload requires tenantId');
  }
  return {
    tenantId: payload.tenantId,
    start: typeof payload.start === 'string' ? payload.start : undefined,
    end: typeof payload.end === 'string' ? payload.end : undefined,
    triggerType: payload.triggerType === 'Scheduled' ? 'Scheduled' : 'Manual',
    triggeredBy: typeof payload.triggeredBy === 'string' && payload.triggeredBy ? payload.triggeredBy : 'system',
  };
};

export const resolvePullRange = (payload: Pick<PullTaskPayload, 'start' | 'end'>, now: Date): TraceDateRange => {
  if (!payload.start || !payload.end) {
    return defaultPullRange(now, env.pull.defaultLookbackDays);
  }
  return { start: new Date(payload.start), end: new Date(payload.end) };
};

export const pullTracesTask: Task = async (rawPayload) => {
  const payload = parsePullTaskPayload(rawPayload);
  const tenant = await ingestionDeps.tenants.getTenant(payload.tenantId);
  if (!tenant || !tenant.isActive) {
    console.warn('[pull] skipping job for missing or inactive tenant', { tenantId: payload.tenantId });
    return;
  }
  const settings = await settingsStore.get();
  try {
    await traceIngestion.pull({
      tenant,
      range: resolvePullRange(payload, new Date()),
      triggerType: payload.triggerType,
      triggeredBy: payload.triggeredBy,
      settings,
    });
  } catch (error) {
    if (isTraceSyncError(error, 'PullAlreadyInProgress')) {
      console.warn('[pull] job skipped; tenant already has a running pull', { tenantId: tenant.id });
      return;
    }
    throw error;
  }
};

const parseDiscoverPayload = (payload: unknown): DiscoverDomainsTaskPayload => {
  if (!isRecord(payload) || typeof payload.tenantId !== 'string' || !payload.tenantId) {
    throw new Error('discoverDomains payload requires tenantId');
  }
  return { tenantId: payload.tenantId, overwrite: payload.overwrite === true };
};

export const discoverDomainsTask: Task = async (rawPayload) => {
  const payload = parseDiscoverPayload(rawPayload);
  const tenant = await ingestionDeps.tenants.getTenant(payload.tenantId);
  if (!tenant) {
    console.warn('[domains] skipping discovery for missing tenant', { tenantId: payload.tenantId });
    return;
  }
  try {
    const result = await discoverAndStoreDomains(tenant, ingestionDeps, { overwrite: payload.overwrite, dryRun: false });
    console.info('[domains] discovery job stored domains', { tenantId: tenant.id, count: result.domains.length });
  } catch (error) {
    if (isTraceSyncError(error, 'TransientNetworkError')) {
      throw error;
    }
    console.warn('[domains] discovery job failed', { tenantId: tenant.id, error: describeError(error) });
  }
};
