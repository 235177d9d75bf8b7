import type { TenantRecord } from '../shared/types.js';
import { getAccessModeCapabilities } from './accessModes.js';
import { normalizeDomains } from './direction.js';
import type { DirectoryService } from './directoryService.js';
import { TraceSyncError } from './errors.js';
import type { AuthProvider } from './msAuth.js';
import type { RetryPolicy } from './retry.js';
import { withRetry } from './retry.js';
import { setOwnedDomains } from './domainRegistry.js';
import type { TenantStore } from './tenantStore.js';

export interface DiscoveryDeps {
  auth: AuthProvider;
  directory: DirectoryService;
  retry?: RetryPolicy;
  wait?: (ms: number) => Promise<void>;
}

export type DiscoveryResult =
  | { ok: true; domains: string[]; totalListed: number }
  | { ok: false; error: TraceSyncError };

const toDiscoveryError = (error: unknown): TraceSyncError =>
  error instanceof TraceSyncError
    ? error
    : new TraceSyncError('UnexpectedResponse', error instanceof Error ? error.message : String(error), {
      cause: error,
    });

/** Verified domains from the directory. Never mutates the registry. */
export const discoverDomains = async (
  tenant: Pick<TenantRecord, 'accessMode' | 'credentials'>,
  deps: DiscoveryDeps,
): Promise<DiscoveryResult> => {
  const capabilities = getAccessModeCapabilities(tenant.accessMode);
  if (!capabilities.supportsDomainDiscovery) {
    return {
      ok: false,
      error: new TraceSyncError(
        'UnsupportedAccessMethod',
        `domain discovery is not available with the ${capabilities.label} access mode`,
      ),
    };
  }

  const run = async () => {
    const token = await deps.auth.getAccessToken(tenant.credentials, capabilities.tokenAudience);
    return deps.directory.listDomains(token);
  };

  try {
    const listed = deps.retry
      ? await withRetry(run, deps.retry, { wait: deps.wait })
      : await run();
    const verified = normalizeDomains(listed.filter((entry) => entry.isVerified).map((entry) => entry.id));
    return { ok: true, domains: verified, totalListed: listed.length };
  } catch (error) {
    return { ok: false, error: toDiscoveryError(error) };
  }
};

export type DiscoverAndStoreResult = {
  tenantId: string;
  domains: string[];
  previous: string[];
  totalListed: number;
  stored: boolean;
  dryRun: boolean;
};

/** Operator-driven discovery that writes through the registry's overwrite guard. */
export const discoverAndStoreDomains = async (
  tenant: TenantRecord,
  deps: DiscoveryDeps & { tenants: TenantStore },
  options: { overwrite: boolean; dryRun: boolean; now?: Date },
): Promise<DiscoverAndStoreResult> => {
  const result = await discoverDomains(tenant, deps);
  if (!result.ok) {
    throw result.error;
  }
  const base = {
    tenantId: tenant.id,
    domains: result.domains,
    previous: tenant.ownedDomains,
    totalListed: result.totalListed,
    dryRun: options.dryRun,
  };
  if (options.dryRun) {
    return { ...base, stored: false };
  }
  if (result.domains.length === 0) {
    throw new TraceSyncError('UnexpectedResponse', 'directory returned no verified domains; nothing stored');
  }
  await setOwnedDomains(deps.tenants, tenant.id, result.domains, { overwrite: options.overwrite, now: options.now });
  return { ...base, stored: true };
};
