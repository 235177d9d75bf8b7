import type { AppSettings, TenantRecord } from '../shared/types.js';
import type { PullTaskPayload } from '../services/queue.js';
import { isScheduledPullDue, scheduledPullJobKey, utcDateKey } from '../services/scheduler.js';

export interface SchedulerTickDeps {
  getSettings: () => Promise<AppSettings>;
  claimDate: (dateKey: string) => Promise<boolean>;
  listActiveTenants: () => Promise<TenantRecord[]>;
  enqueuePull: (payload: PullTaskPayload, jobKey: string) => Promise<unknown>;
}

export type SchedulerTickResult = { due: boolean; enqueued: number; failed: number };

/**
 * Enqueues the daily scheduled pull for every active tenant once the
 * configured UTC time has passed. `lastFired` is a process-local shortcut; the
 * date claim is what keeps several workers from firing twice. Once this
 * process holds the claim, tenants whose enqueue failed stay pending and are
 * retried on later ticks of the same UTC date under the same job key.
 */
export const createSchedulerTick = (deps: SchedulerTickDeps) => {
  let lastFired: string | null = null;
  // tenantIds is null until the active tenants have been listed for the claimed date.
  let pending: { dateKey: string; tenantIds: Set<string> | null } | null = null;

  const enqueuePending = async (now: Date): Promise<SchedulerTickResult> => {
    const current = pending;
    if (!current) {
      return { due: false, enqueued: 0, failed: 0 };
    }
    const tenantIds = current.tenantIds ?? new Set((await deps.listActiveTenants()).map((tenant) => tenant.id));
    current.tenantIds = tenantIds;
    const { dateKey } = current;
    let enqueued = 0;
    let failed = 0;
    for (const tenantId of [...tenantIds]) {
      try {
        await deps.enqueuePull(
          { tenantId, triggerType: 'Scheduled', triggeredBy: 'scheduler' },
          scheduledPullJobKey(tenantId, now),
        );
        tenantIds.delete(tenantId);
        enqueued += 1;
      } catch (error) {
        failed += 1;
        console.error('[scheduler] failed to enqueue scheduled pull', { tenantId, date: dateKey, error });
      }
    }
    if (tenantIds.size === 0) {
      pending = null;
    }
    console.info('[scheduler] scheduled pulls enqueued', { date: dateKey, enqueued, failed });
    return { due: true, enqueued, failed };
  };

  return async (now: Date = new Date()): Promise<SchedulerTickResult> => {
    const dateKey = utcDateKey(now);
    if (pending && pending.dateKey !== dateKey) {
      console.warn('[scheduler] dropping scheduled pulls never enqueued for a past date', {
        date: pending.dateKey,
        tenantIds: pending.tenantIds ? [...pending.tenantIds] : 'all',
      });
      pending = null;
    }
    if (pending) {
      return enqueuePending(now);
    }

    const settings = await deps.getSettings();
    if (!isScheduledPullDue(settings, now, lastFired)) {
      return { due: false, enqueued: 0, failed: 0 };
    }
    const claimed = await deps.claimDate(dateKey);
    lastFired = dateKey;
    if (!claimed) {
      return { due: false, enqueued: 0, failed: 0 };
    }
    pending = { dateKey, tenantIds: null };
    return enqueuePending(now);
  };
};
