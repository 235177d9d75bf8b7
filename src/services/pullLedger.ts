import { isInvalidTextError, isPgError, query } from '../db/pool.js';
import type { QueryParam } from '../db/pool.js';
import type {
  AccessMode,
  PullRunCounts,
  PullRunRecord,
  PullStatus,
  PullTriggerType,
  TerminalPullStatus,
  TraceDateRange,
} from '../shared/types.js';
import { PULL_STATUSES } from '../shared/types.js';
import { isAccessMode } from './accessModes.js';
import { TraceSyncError } from './errors.js';

export type BeginPullInput = {
  tenantId: string;
  range: TraceDateRange;
  triggerType: PullTriggerType;
  triggeredBy: string;
  accessMode: AccessMode;
};

export type FinalizePullInput = {
  status: TerminalPullStatus;
  counts: PullRunCounts;
  errorDetail: string;
};

export type PullRunFilter = {
  tenantId?: string;
  status?: PullStatus;
  limit?: number;
  offset?: number;
};

export type PagedPullRuns = {
  runs: PullRunRecord[];
  total: number;
  limit: number;
  offset: number;
};

export interface PullLedger {
  begin(input: BeginPullInput): Promise<PullRunRecord>;
  /** Exactly once per run; a second call raises AlreadyFinalized. */
  finalize(runId: string, input: FinalizePullInput): Promise<PullRunRecord>;
  list(filter?: PullRunFilter): Promise<PagedPullRuns>;
  get(runId: string): Promise<PullRunRecord | null>;
  requestCancellation(runId: string): Promise<PullRunRecord>;
  /** Records the access mode a Running entry switched to mid-pull. */
  recordAccessMode(runId: string, accessMode: AccessMode): Promise<void>;
  isCancellationRequested(runId: string): Promise<boolean>;
  /** Fails Running entries started before `startedBefore`; returns how many were reaped. */
  reapStaleRuns(startedBefore: Date): Promise<number>;
}

export const STALE_RUN_DETAIL = 'stale pull run reaped by maintenance';
export const DEFAULT_RUN_PAGE_SIZE = 50;
export const MAX_RUN_PAGE_SIZE = 500;

export const isPullStatus = (value: unknown): value is PullStatus =>
  PULL_STATUSES.some((status) => status === value);

export const runDurationSeconds = (startedAt: Date, finishedAt: Date | null) =>
  finishedAt ? Math.max(0, Math.round((finishedAt.getTime() - startedAt.getTime()) / 1000)) : null;

export const clampPage = (filter: Pick<PullRunFilter, 'limit' | 'offset'>) => ({
  limit: Math.min(Math.max(Math.floor(filter.limit ?? DEFAULT_RUN_PAGE_SIZE), 1), MAX_RUN_PAGE_SIZE),
  offset: Math.max(Math.floor(filter.offset ?? 0), 0),
});

type PullRunRow = {
  id: string;
  tenant_id: string;
  started_at: Date;
  finished_at: Date | null;
  range_start: Date;
  range_end: Date;
  records_pulled: number;
  records_new: number;
  records_updated: number;
  status: string;
  error_detail: string | null;
  trigger_type: string;
  triggered_by: string | null;
  access_mode: string;
  cancel_requested_at: Date | null;
};

const RUN_COLUMNS = `id, tenant_id, started_at, finished_at, range_start, range_end,
  records_pulled, records_new, records_updated, status, error_detail,
  trigger_type, triggered_by, access_mode, cancel_requested_at`;

const toPullRun = (row: PullRunRow): PullRunRecord => ({
  id: row.id,
  tenantId: row.tenant_id,
  startedAt: row.started_at,
  finishedAt: row.finished_at,
  range: { start: row.range_start, end: row.range_end },
  counts: {
    pulled: Number(row.records_pulled),
    inserted: Number(row.records_new),
    updated: Number(row.records_updated),
  },
  status: isPullStatus(row.status) ? row.status : 'Failed',
  errorDetail: row.error_detail ?? '',
  triggerType: row.trigger_type === 'Scheduled' ? 'Scheduled' : 'Manual',
  triggeredBy: row.triggered_by ?? '',
  accessMode: isAccessMode(row.access_mode) ? row.access_mode : 'graph',
  cancelRequestedAt: row.cancel_requested_at,
  durationSeconds: runDurationSeconds(row.started_at, row.finished_at),
});

const ONE_RUNNING_CONSTRAINT = 'pull_runs_one_running_per_tenant';

const getRun = async (runId: string) => {
  try {
    const result = await query<PullRunRow>(`SELECT ${RUN_COLUMNS} FROM pull_runs WHERE id = $1`, [runId]);
    const row = result.rows[0];
    return row ? toPullRun(row) : null;
  } catch (error) {
    if (isInvalidTextError(error)) {
      return null;
    }
    throw error;
  }
};

// Updates addressed by a malformed id match nothing.
const updateRunById = async (text: string, params: QueryParam[]) => {
  try {
    return (await query<PullRunRow>(text, params)).rows[0];
  } catch (error) {
    if (isInvalidTextError(error)) {
      throw new TraceSyncError('NotFound', `pull run ${String(params[0])} not found`, { cause: error });
    }
    throw error;
  }
};

export const pgPullLedger: PullLedger = {
  async begin(input) {
    try {
      const result = await query<PullRunRow>(
        `INSERT INTO pull_runs (tenant_id, range_start, range_end, status, trigger_type, triggered_by, access_mode)
         VALUES ($1, $2, $3, 'Running', $4, $5, $6)
         RETURNING ${RUN_COLUMNS}`,
        [input.tenantId, input.range.start, input.range.end, input.triggerType, input.triggeredBy, input.accessMode],
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('pull run insert returned no row');
      }
      return toPullRun(row);
    } catch (error) {
      if (isPgError(error) && error.code === '23505' && error.constraint === ONE_RUNNING_CONSTRAINT) {
        throw new TraceSyncError('PullAlreadyInProgress', `a pull is already running for tenant ${input.tenantId}`, {
          cause: error,
        });
      }
      if (isPgError(error) && error.code === '23503') {
        throw new TraceSyncError('NotFound', `tenant ${input.tenantId} not found`, { cause: error });
      }
      throw error;
    }
  },

  async finalize(runId, input) {
    const row = await updateRunById(
      `UPDATE pull_runs
          SET status = $2,
              finished_at = NOW(),
              records_pulled = $3,
              records_new = $4,
              records_updated = $5,
              error_detail = $6
        WHERE id = $1
          AND status = 'Running'
        RETURNING ${RUN_COLUMNS}`,
      [runId, input.status, input.counts.pulled, input.counts.inserted, input.counts.updated, input.errorDetail],
    );
    if (row) {
      return toPullRun(row);
    }
    const existing = await getRun(runId);
    if (!existing) {
      throw new TraceSyncError('NotFound', `pull run ${runId} not found`);
    }
    throw new TraceSyncError('AlreadyFinalized', `pull run ${runId} is already ${existing.status}`);
  },

  async list(filter = {}) {
    const { limit, offset } = clampPage(filter);
    const values: QueryParam[] = [];
    const where: string[] = [];
    if (filter.tenantId) {
      values.push(filter.tenantId);
      where.push(`tenant_id = $${values.length}`);
    }
    if (filter.status) {
      values.push(filter.status);
      where.push(`status = $${values.length}`);
    }
    const whereSql = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';

    let countResult: { rows: Array<{ total: number }> };
    let result: { rows: PullRunRow[] };
    try {
      countResult = await query<{ total: number }>(
        `SELECT COUNT(*)::int AS total FROM pull_runs ${whereSql}`,
        values,
      );
      result = await query<PullRunRow>(
        `SELECT ${RUN_COLUMNS}
           FROM pull_runs
           ${whereSql}
          ORDER BY started_at DESC
          LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
        [...values, limit, offset],
      );
    } catch (error) {
      // A malformed tenant id filters every run out.
      if (filter.tenantId && isInvalidTextError(error)) {
        return { runs: [], total: 0, limit, offset };
      }
      throw error;
    }
    return {
      runs: result.rows.map(toPullRun),
      total: Number(countResult.rows[0]?.total ?? 0),
      limit,
      offset,
    };
  },

  get: getRun,

  async requestCancellation(runId) {
    const row = await updateRunById(
      `UPDATE pull_runs
          SET cancel_requested_at = COALESCE(cancel_requested_at, NOW())
        WHERE id = $1
          AND status = 'Running'
        RETURNING ${RUN_COLUMNS}`,
      [runId],
    );
    if (row) {
      return toPullRun(row);
    }
    const existing = await getRun(runId);
    if (!existing) {
      throw new TraceSyncError('NotFound', `pull run ${runId} not found`);
    }
    throw new TraceSyncError('AlreadyFinalized', `pull run ${runId} is already ${existing.status}`);
  },

  async recordAccessMode(runId, accessMode) {
    await query(
      `UPDATE pull_runs SET access_mode = $2 WHERE id = $1 AND status = 'Running'`,
      [runId, accessMode],
    );
  },

  async isCancellationRequested(runId) {
    const result = await query<{ requested: boolean }>(
      'SELECT cancel_requested_at IS NOT NULL AS requested FROM pull_runs WHERE id = $1',
      [runId],
    );
    return result.rows[0]?.requested === true;
  },

  async reapStaleRuns(startedBefore) {
    const result = await query<{ id: string }>(
      `UPDATE pull_runs
          SET status = 'Failed',
              finished_at = NOW(),
              error_detail = $2
        WHERE status = 'Running'
          AND started_at < $1
        RETURNING id`,
      [startedBefore, STALE_RUN_DETAIL],
    );
    return result.rows.length;
  },
};
