import { createDomainSnapshot, normalizeDomains, type OwnedDomainSnapshot } from './direction.js';
import { TraceSyncError } from './errors.js';
import type { TenantStore } from './tenantStore.js';

export const getOwnedDomains = async (store: TenantStore, tenantId: string): Promise<OwnedDomainSnapshot> => {
  const tenant = await store.getTenant(tenantId);
  if (!tenant) {
    throw new TraceSyncError('NotFound', `tenant ${tenantId} not found`);
  }
  return createDomainSnapshot(tenant.ownedDomains);
};

/**
 * Replaces the tenant's owned domains and stamps the refresh time. A non-empty
 * stored set is only replaced when `overwrite` is set.
 */
export const setOwnedDomains = async (
  store: TenantStore,
  tenantId: string,
  domains: Iterable<string>,
  options: { overwrite: boolean; now?: Date },
): Promise<string[]> => {
  const normalized = normalizeDomains(domains);
  const result = await store.replaceOwnedDomains(tenantId, normalized, {
    overwrite: options.overwrite,
    updatedAt: options.now ?? new Date(),
  });
  if (result === 'missing') {
    throw new TraceSyncError('NotFound', `tenant ${tenantId} not found`);
  }
  if (result === 'conflict') {
    throw new TraceSyncError(
      'AlreadyConfigured',
      'tenant already has owned domains; pass overwrite to replace them',
    );
  }
  return normalized;
};
