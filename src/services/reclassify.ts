import type { TraceDirection } from '../shared/types.js';
import { classifyDirection, createDomainSnapshot } from './direction.js';
import { TraceSyncError } from './errors.js';
import type { TenantStore } from './tenantStore.js';
import type { TraceStore } from './traceStore.js';

export type DirectionCounts = Record<TraceDirection, number>;

export type ReclassifyResult = {
  tenantId: string;
  scanned: number;
  changed: number;
  dryRun: boolean;
  before: DirectionCounts;
  after: DirectionCounts;
};

const emptyCounts = (): DirectionCounts => ({ Inbound: 0, Outbound: 0, Internal: 0, Unknown: 0 });

/**
 * Recomputes direction for every stored trace of a tenant against its current
 * owned domains. Only rows whose direction changes are written.
 */
export const reclassifyTenantTraces = async (
  tenantId: string,
  deps: { tenants: TenantStore; traces: TraceStore },
  options: { dryRun?: boolean; batchSize?: number } = {},
): Promise<ReclassifyResult> => {
  const tenant = await deps.tenants.getTenant(tenantId);
  if (!tenant) {
    throw new TraceSyncError('NotFound', `tenant ${tenantId} not found`);
  }
  const dryRun = options.dryRun === true;
  const batchSize = Math.max(1, Math.floor(options.batchSize ?? 1000));
  const snapshot = createDomainSnapshot(tenant.ownedDomains);
  const result: ReclassifyResult = {
    tenantId,
    scanned: 0,
    changed: 0,
    dryRun,
    before: emptyCounts(),
    after: emptyCounts(),
  };

  let afterId: string | null = null;
  for (;;) {
    const rows = await deps.traces.scanDirections(tenantId, afterId, batchSize);
    if (rows.length === 0) {
      break;
    }
    const updates: Array<{ id: string; direction: TraceDirection }> = [];
    for (const row of rows) {
      const direction = classifyDirection(row.sender, row.recipient, snapshot);
      result.before[row.direction] += 1;
      result.after[direction] += 1;
      if (direction !== row.direction) {
        updates.push({ id: row.id, direction });
      }
    }
    result.scanned += rows.length;
    result.changed += updates.length;
    if (!dryRun && updates.length > 0) {
      await deps.traces.updateDirections(tenantId, updates);
    }
    afterId = rows[rows.length - 1]?.id ?? null;
    if (rows.length < batchSize) {
      break;
    }
  }

  console.info('[directions] reclassified traces', {
    tenantId,
    scanned: result.scanned,
    changed: result.changed,
    dryRun,
  });
  return result;
};
