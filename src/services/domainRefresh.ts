import type { AppSettings, TenantRecord } from '../shared/types.js';
import { describeError, isTraceSyncError } from './errors.js';
import type { TraceSyncErrorKind } from './errors.js';
import { discoverDomains, type DiscoveryDeps } from './domainDiscovery.js';
import { setOwnedDomains } from './domainRegistry.js';
import { assertValidSettings } from './appSettings.js';
import type { TenantStore } from './tenantStore.js';

export type RefreshTrigger = 'missing' | 'stale';

export type RefreshSkipReason =
  | 'disabled'
  | 'fresh'
  | 'discovery_failed'
  | 'no_verified_domains'
  | 'already_configured';

export type RefreshOutcome =
  | { status: 'refreshed'; trigger: RefreshTrigger; domains: string[] }
  | { status: 'skipped'; reason: RefreshSkipReason; detail?: string; errorKind?: TraceSyncErrorKind };

export type RefreshDeps = DiscoveryDeps & { tenants: TenantStore };

const HOUR_MS = 60 * 60 * 1000;

export const refreshTrigger = (
  tenant: Pick<TenantRecord, 'ownedDomains' | 'domainsLastUpdatedAt'>,
  settings: Pick<AppSettings, 'domainRefreshHours'>,
  now: Date,
): RefreshTrigger | null => {
  if (tenant.ownedDomains.length === 0) {
    return 'missing';
  }
  if (!tenant.domainsLastUpdatedAt) {
    return 'stale';
  }
  const ageMs = now.getTime() - tenant.domainsLastUpdatedAt.getTime();
  return ageMs > settings.domainRefreshHours * HOUR_MS ? 'stale' : null;
};

/**
 * Runs discovery when the tenant's domains are missing or stale. Never throws
 * for discovery problems; the existing set is left as it was.
 */
export const ensureFresh = async (
  tenant: TenantRecord,
  settings: AppSettings,
  deps: RefreshDeps,
  now: Date = new Date(),
): Promise<RefreshOutcome> => {
  assertValidSettings(settings);
  if (!settings.autoRefreshDomains) {
    return { status: 'skipped', reason: 'disabled' };
  }
  const trigger = refreshTrigger(tenant, settings, now);
  if (!trigger) {
    return { status: 'skipped', reason: 'fresh' };
  }

  const result = await discoverDomains(tenant, deps);
  if (!result.ok) {
    console.warn('[domains] discovery failed; keeping existing domains', {
      tenantId: tenant.id,
      trigger,
      kind: result.error.kind,
      message: result.error.message,
    });
    return {
      status: 'skipped',
      reason: 'discovery_failed',
      detail: describeError(result.error),
      errorKind: result.error.kind,
    };
  }
  if (result.domains.length === 0) {
    console.warn('[domains] directory returned no verified domains', { tenantId: tenant.id, trigger });
    return { status: 'skipped', reason: 'no_verified_domains' };
  }

  try {
    // A missing set only fills an empty registry; domains stored since the tenant was read are kept.
    const stored = await setOwnedDomains(deps.tenants, tenant.id, result.domains, {
      overwrite: trigger === 'stale',
      now,
    });
    console.info('[domains] refreshed owned domains', { tenantId: tenant.id, trigger, count: stored.length });
    return { status: 'refreshed', trigger, domains: stored };
  } catch (error) {
    if (isTraceSyncError(error, 'AlreadyConfigured')) {
      console.info('[domains] owned domains were set meanwhile; keeping them', { tenantId: tenant.id });
      return { status: 'skipped', reason: 'already_configured', detail: describeError(error) };
    }
    console.warn('[domains] storing discovered domains failed', { tenantId: tenant.id, error: describeError(error) });
    return { status: 'skipped', reason: 'discovery_failed', detail: describeError(error) };
  }
};
