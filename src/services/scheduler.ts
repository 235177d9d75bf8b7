import type { AppSettings, PullTriggerType, TenantRecord, TraceDateRange } from '../shared/types.js';
import { describeError, isTraceSyncError } from './errors.js';
import type { PullOutcome, TraceIngestion } from './traceIngestion.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const startOfUtcDay = (value: Date) =>
  new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));

export const utcDateKey = (value: Date) => value.toISOString().slice(0, 10);

/**
 * Yesterday in UTC, widened backwards by `lookbackDays - 1` extra days:
 * [start of day, 23:59:59.999 of yesterday].
 */
export const defaultPullRange = (now: Date, lookbackDays = 1): TraceDateRange => {
  const today = startOfUtcDay(now);
  const days = Math.max(1, Math.floor(lookbackDays));
  return {
    start: new Date(today.getTime() - days * DAY_MS),
    end: new Date(today.getTime() - 1),
  };
};

/** True once per UTC date, from the configured hour:minute onwards. */
export const isScheduledPullDue = (
  settings: Pick<AppSettings, 'scheduledPullEnabled' | 'scheduledPullHour' | 'scheduledPullMinute'>,
  now: Date,
  lastFiredDateKey: string | null,
) => {
  if (!settings.scheduledPullEnabled) {
    return false;
  }
  if (lastFiredDateKey === utcDateKey(now)) {
    return false;
  }
  const minutesNow = now.getUTCHours() * 60 + now.getUTCMinutes();
  return minutesNow >= settings.scheduledPullHour * 60 + settings.scheduledPullMinute;
};

export const scheduledPullJobKey = (tenantId: string, now: Date) => `pull:${tenantId}:${utcDateKey(now)}`;

export type TenantPullResult =
  | { tenantId: string; tenantName: string; ok: true; outcome: PullOutcome }
  | { tenantId: string; tenantName: string; ok: false; error: string; alreadyRunning: boolean };

/** One isolated pull per active tenant; a failure is recorded and the loop moves on. */
export const pullAllTenants = async (
  ingestion: TraceIngestion,
  tenants: TenantRecord[],
  request: {
    range: TraceDateRange;
    triggerType: PullTriggerType;
    triggeredBy: string;
    settings: AppSettings;
    signal?: AbortSignal;
  },
): Promise<TenantPullResult[]> => {
  const results: TenantPullResult[] = [];
  for (const tenant of tenants) {
    if (!tenant.isActive) {
      continue;
    }
    try {
      const outcome = await ingestion.pull({ ...request, tenant });
      results.push({ tenantId: tenant.id, tenantName: tenant.name, ok: true, outcome });
    } catch (error) {
      console.error('[scheduler] tenant pull failed', { tenantId: tenant.id, error: describeError(error) });
      results.push({
        tenantId: tenant.id,
        tenantName: tenant.name,
        ok: false,
        error: describeError(error),
        alreadyRunning: isTraceSyncError(error, 'PullAlreadyInProgress'),
      });
    }
  }
  return results;
};
