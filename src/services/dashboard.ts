import type { PullRunRecord } from '../shared/types.js';
import type { PullLedger } from './pullLedger.js';
import { summarizeTraces, type TraceCountSummary } from './traceStore.js';

export type DashboardSummary = TraceCountSummary & {
  lastSuccessfulRun: PullRunRecord | null;
  recentRuns: PullRunRecord[];
};

export const buildDashboard = async (
  ledger: PullLedger,
  options: { tenantId?: string; now?: Date } = {},
): Promise<DashboardSummary> => {
  const now = options.now ?? new Date();
  const tenantIds = options.tenantId ? [options.tenantId] : [];
  const [counts, recent, success, partial] = await Promise.all([
    summarizeTraces(tenantIds, now),
    ledger.list({ tenantId: options.tenantId, limit: 5 }),
    ledger.list({ tenantId: options.tenantId, status: 'Success', limit: 1 }),
    ledger.list({ tenantId: options.tenantId, status: 'Partial', limit: 1 }),
  ]);

  const candidates = [success.runs[0], partial.runs[0]].filter(
    (run): run is PullRunRecord => run !== undefined,
  );
  candidates.sort((left, right) => right.startedAt.getTime() - left.startedAt.getTime());

  return {
    ...counts,
    lastSuccessfulRun: candidates[0] ?? null,
    recentRuns: recent.runs,
  };
};
