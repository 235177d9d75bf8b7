import type { TenantRecord, TraceDateRange } from '../shared/types.js';
import { parseRangeInput } from '../routes/helpers.js';
import { TraceSyncError } from './errors.js';
import { defaultPullRange } from './scheduler.js';
import type { TenantStore } from './tenantStore.js';

/** Exchange Online keeps message traces for this many days. */
export const PROVIDER_RETENTION_DAYS = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

export type PullPlanInput = {
  tenant?: string;
  start?: string;
  end?: string;
  days?: string;
};

export type PullPlan = {
  range: TraceDateRange;
  tenants: TenantRecord[];
  warnings: string[];
};

export const parseLookbackDays = (value: string) => {
  const days = /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
  if (!Number.isSafeInteger(days) || days < 1) {
    throw new TraceSyncError('InvalidRequest', `days must be a positive whole number, got "${value}"`);
  }
  return days;
};

/**
 * Resolves what an operator pull would cover: the range (explicit dates, the
 * last N whole UTC days, or the default window) and the tenants. A named
 * tenant must exist and be active.
 */
export const planPull = async (
  tenants: Pick<TenantStore, 'getTenant' | 'listTenants'>,
  input: PullPlanInput,
  options: { now: Date; defaultLookbackDays: number },
): Promise<PullPlan> => {
  if (input.days !== undefined && (input.start !== undefined || input.end !== undefined)) {
    throw new TraceSyncError('InvalidRequest', 'days cannot be combined with start and end');
  }
  const range = input.days !== undefined
    ? defaultPullRange(options.now, parseLookbackDays(input.days))
    : parseRangeInput({ start: input.start, end: input.end }, () => defaultPullRange(options.now, options.defaultLookbackDays));

  let selected: TenantRecord[];
  if (input.tenant) {
    const tenant = await tenants.getTenant(input.tenant);
    if (!tenant) {
      throw new TraceSyncError('NotFound', `tenant ${input.tenant} not found`);
    }
    if (!tenant.isActive) {
      throw new TraceSyncError('InvalidRequest', `tenant ${tenant.name} (${tenant.id}) is inactive; activate it before pulling`);
    }
    selected = [tenant];
  } else {
    selected = await tenants.listTenants({ activeOnly: true });
    if (selected.length === 0) {
      throw new TraceSyncError('NotFound', 'no active tenants');
    }
  }

  const warnings: string[] = [];
  const retainedFrom = new Date(options.now.getTime() - PROVIDER_RETENTION_DAYS * DAY_MS);
  if (range.start < retainedFrom) {
    warnings.push(
      `Exchange Online keeps message traces for ${PROVIDER_RETENTION_DAYS} days; `
        + `traces before ${retainedFrom.toISOString()} may be missing`,
    );
  }
  return { range, tenants: selected, warnings };
};
