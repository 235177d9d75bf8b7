import { isInvalidTextError, pool, query } from '../db/pool.js';
import type { QueryParam } from '../db/pool.js';
import { toJsonObject } from '../shared/json.js';
import type { DeliveryStatus, TraceDirection, TraceRecord } from '../shared/types.js';
import { DELIVERY_STATUSES, TRACE_DIRECTIONS } from '../shared/types.js';
import type { ProviderTrace } from './traceReporting.js';

export type TraceUpsert = ProviderTrace & { direction: TraceDirection };

export type UpsertCounts = { inserted: number; updated: number; unchanged: number };

export type DirectionRow = { id: string; sender: string; recipient: string; direction: TraceDirection };

export interface TraceStore {
  /**
   * Inserts new traces and updates mutable fields of existing ones, keyed on
   * (tenant, message id, recipient, received at). Unchanged rows are not written.
   */
  upsertBatch(tenantId: string, records: TraceUpsert[]): Promise<UpsertCounts>;
  /** Keyset scan in id order for direction maintenance. */
  scanDirections(tenantId: string, afterId: string | null, limit: number): Promise<DirectionRow[]>;
  updateDirections(tenantId: string, updates: Array<{ id: string; direction: TraceDirection }>): Promise<number>;
}

export const traceKey = (record: Pick<ProviderTrace, 'messageId' | 'recipient' | 'receivedAt'>) =>
  `${record.messageId}\u0000${record.recipient}\u0000${record.receivedAt.toISOString()}`;

/** Later duplicates within one batch win; ON CONFLICT cannot touch a row twice. */
export const dedupeByKey = <T extends Pick<ProviderTrace, 'messageId' | 'recipient' | 'receivedAt'>>(records: T[]) => {
  const byKey = new Map<string, T>();
  for (const record of records) {
    byKey.set(traceKey(record), record);
  }
  return [...byKey.values()];
};

export const isTraceDirection = (value: unknown): value is TraceDirection =>
  TRACE_DIRECTIONS.some((direction) => direction === value);

export const isDeliveryStatus = (value: unknown): value is DeliveryStatus =>
  DELIVERY_STATUSES.some((status) => status === value);

const UPSERT_CHUNK_SIZE = 500;

const buildUpsert = (tenantId: string, records: TraceUpsert[]) => {
  const params: QueryParam[] = [tenantId];
  const tuples = records.map((record) => {
    const base = params.length;
    params.push(
      record.messageId,
      record.receivedAt,
      record.sender,
      record.recipient,
      record.subject,
      record.status,
      record.direction,
      record.sizeBytes,
      JSON.stringify(record.eventData),
      JSON.stringify(record.rawPayload),
    );
    const slot = (offset: number) => `$${base + offset}`;
    return `($1, ${slot(1)}, ${slot(2)}, ${slot(3)}, ${slot(4)}, ${slot(5)}, ${slot(6)}, ${slot(7)}, ${slot(8)}, ${slot(9)}::jsonb, ${slot(10)}::jsonb, NOW())`;
  });

  const text = `INSERT INTO message_traces (
      tenant_id, message_id, received_at, sender, recipient, subject, status, direction,
      size_bytes, event_data, raw_payload, trace_date
    ) VALUES ${tuples.join(',\n      ')}
    ON CONFLICT (tenant_id, message_id, recipient, received_at) DO UPDATE
       SET subject = EXCLUDED.subject,
           status = EXCLUDED.status,
           direction = EXCLUDED.direction,
           size_bytes = EXCLUDED.size_bytes,
           event_data = EXCLUDED.event_data,
           raw_payload = EXCLUDED.raw_payload,
           trace_date = EXCLUDED.trace_date
     WHERE (message_traces.subject, message_traces.status, message_traces.direction,
            message_traces.size_bytes, message_traces.event_data, message_traces.raw_payload)
           IS DISTINCT FROM
           (EXCLUDED.subject, EXCLUDED.status, EXCLUDED.direction,
            EXCLUDED.size_bytes, EXCLUDED.event_data, EXCLUDED.raw_payload)
    RETURNING (xmax = 0) AS inserted`;
  return { text, params };
};

type UpsertRunner = (text: string, params: QueryParam[]) => Promise<{ rows: Array<{ inserted: boolean }> }>;

const writeChunks = async (run: UpsertRunner, tenantId: string, chunks: TraceUpsert[][]) => {
  const counts: UpsertCounts = { inserted: 0, updated: 0, unchanged: 0 };
  for (const chunk of chunks) {
    const { text, params } = buildUpsert(tenantId, chunk);
    const result = await run(text, params);
    const inserted = result.rows.filter((row) => row.inserted).length;
    counts.inserted += inserted;
    counts.updated += result.rows.length - inserted;
    counts.unchanged += chunk.length - result.rows.length;
  }
  return counts;
};

export const pgTraceStore: TraceStore = {
  async upsertBatch(tenantId, records) {
    const unique = dedupeByKey(records);
    const chunks: TraceUpsert[][] = [];
    for (let index = 0; index < unique.length; index += UPSERT_CHUNK_SIZE) {
      chunks.push(unique.slice(index, index + UPSERT_CHUNK_SIZE));
    }
    if (chunks.length <= 1) {
      return writeChunks((text, params) => query<{ inserted: boolean }>(text, params), tenantId, chunks);
    }

    // A page lands whole or not at all, so the run's counts match what was stored.
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const counts = await writeChunks(
        (text, params) => client.query<{ inserted: boolean }>(text, params),
        tenantId,
        chunks,
      );
      await client.query('COMMIT');
      return counts;
    } catch (error) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw error;
    } finally {
      client.release();
    }
  },

  async scanDirections(tenantId, afterId, limit) {
    const result = await query<{ id: string; sender: string; recipient: string; direction: string }>(
      `SELECT id, sender, recipient, direction
         FROM message_traces
        WHERE tenant_id = $1
          AND ($2::uuid IS NULL OR id > $2::uuid)
        ORDER BY id ASC
        LIMIT $3`,
      [tenantId, afterId, limit],
    );
    return result.rows.map((row) => ({
      id: row.id,
      sender: row.sender,
      recipient: row.recipient,
      direction: isTraceDirection(row.direction) ? row.direction : 'Unknown',
    }));
  },

  async updateDirections(tenantId, updates) {
    if (updates.length === 0) {
      return 0;
    }
    const result = await query(
      `UPDATE message_traces AS t
          SET direction = u.direction
         FROM unnest($2::uuid[], $3::text[]) AS u(id, direction)
        WHERE t.tenant_id = $1
          AND t.id = u.id
          AND t.direction IS DISTINCT FROM u.direction`,
      [tenantId, updates.map((update) => update.id), updates.map((update) => update.direction)],
    );
    return result.rowCount ?? 0;
  },
};

type TraceRow = {
  id: string;
  tenant_id: string;
  message_id: string;
  received_at: Date;
  sender: string;
  recipient: string;
  subject: string;
  status: string;
  direction: string;
  size_bytes: number | string;
  event_data: unknown;
  raw_payload: unknown;
  trace_date: Date;
};

const TRACE_COLUMNS = `id, tenant_id, message_id, received_at, sender, recipient, subject, status,
  direction, size_bytes, event_data, raw_payload, trace_date`;

const toTraceRecord = (row: TraceRow): TraceRecord => ({
  id: row.id,
  tenantId: row.tenant_id,
  messageId: row.message_id,
  receivedAt: row.received_at,
  sender: row.sender,
  recipient: row.recipient,
  subject: row.subject,
  status: isDeliveryStatus(row.status) ? row.status : 'Unknown',
  direction: isTraceDirection(row.direction) ? row.direction : 'Unknown',
  sizeBytes: Number(row.size_bytes),
  eventData: toJsonObject(row.event_data),
  rawPayload: toJsonObject(row.raw_payload),
  traceDate: row.trace_date,
});

export type TraceSearchFilter = {
  tenantIds?: string[];
  receivedFrom?: Date;
  receivedTo?: Date;
  sender?: string;
  senderContains?: string;
  recipient?: string;
  recipientContains?: string;
  senderDomain?: string;
  recipientDomain?: string;
  subjectContains?: string;
  status?: DeliveryStatus;
  direction?: TraceDirection;
  q?: string;
  order?: 'asc' | 'desc';
  limit?: number;
  offset?: number;
};

export const escapeLike = (value: string) => value.replace(/[\\%_]/g, (match) => `\\${match}`);

const ADDRESS_DOMAIN_SQL = (column: string) => `lower(substring(${column} from '@([^@]*)$'))`;

/** WHERE clause and parameters for a trace search; shared by listing and counting. */
export const buildTraceSearchWhere = (filter: TraceSearchFilter) => {
  const values: QueryParam[] = [];
  const where: string[] = [];
  const push = (value: QueryParam) => {
    values.push(value);
    return `$${values.length}`;
  };

  if (filter.tenantIds && filter.tenantIds.length > 0) {
    where.push(`tenant_id = ANY(${push(filter.tenantIds)}::uuid[])`);
  }
  if (filter.receivedFrom) {
    where.push(`received_at >= ${push(filter.receivedFrom)}`);
  }
  if (filter.receivedTo) {
    where.push(`received_at <= ${push(filter.receivedTo)}`);
  }
  if (filter.sender) {
    where.push(`lower(sender) = lower(${push(filter.sender)})`);
  }
  if (filter.senderContains) {
    where.push(`sender ILIKE ${push(`%${escapeLike(filter.senderContains)}%`)}`);
  }
  if (filter.recipient) {
    where.push(`lower(recipient) = lower(${push(filter.recipient)})`);
  }
  if (filter.recipientContains) {
    where.push(`recipient ILIKE ${push(`%${escapeLike(filter.recipientContains)}%`)}`);
  }
  if (filter.senderDomain) {
    where.push(`${ADDRESS_DOMAIN_SQL('sender')} = lower(${push(filter.senderDomain)})`);
  }
  if (filter.recipientDomain) {
    where.push(`${ADDRESS_DOMAIN_SQL('recipient')} = lower(${push(filter.recipientDomain)})`);
  }
  if (filter.subjectContains) {
    where.push(`subject ILIKE ${push(`%${escapeLike(filter.subjectContains)}%`)}`);
  }
  if (filter.status) {
    where.push(`status = ${push(filter.status)}`);
  }
  if (filter.direction) {
    where.push(`direction = ${push(filter.direction)}`);
  }
  if (filter.q) {
    const pattern = push(`%${escapeLike(filter.q)}%`);
    where.push(`(sender ILIKE ${pattern} OR recipient ILIKE ${pattern} OR subject ILIKE ${pattern} OR message_id ILIKE ${pattern})`);
  }

  return { whereSql: where.length > 0 ? `WHERE ${where.join(' AND ')}` : '', values };
};

export const DEFAULT_TRACE_PAGE_SIZE = 50;
export const MAX_TRACE_PAGE_SIZE = 500;

export const searchTraces = async (filter: TraceSearchFilter) => {
  const { whereSql, values } = buildTraceSearchWhere(filter);
  const limit = Math.min(Math.max(Math.floor(filter.limit ?? DEFAULT_TRACE_PAGE_SIZE), 1), MAX_TRACE_PAGE_SIZE);
  const offset = Math.max(Math.floor(filter.offset ?? 0), 0);
  const direction = filter.order === 'asc' ? 'ASC' : 'DESC';

  let countResult: { rows: Array<{ total: number }> };
  let result: { rows: TraceRow[] };
  try {
    countResult = await query<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM message_traces ${whereSql}`,
      values,
    );
    result = await query<TraceRow>(
      `SELECT ${TRACE_COLUMNS}
         FROM message_traces
         ${whereSql}
        ORDER BY received_at ${direction}, id ${direction}
        LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      [...values, limit, offset],
    );
  } catch (error) {
    // Malformed tenant ids match no traces.
    if (filter.tenantIds?.length && isInvalidTextError(error)) {
      return { traces: [], total: 0, limit, offset };
    }
    throw error;
  }
  return {
    traces: result.rows.map(toTraceRecord),
    total: Number(countResult.rows[0]?.total ?? 0),
    limit,
    offset,
  };
};

export const getTrace = async (traceId: string): Promise<TraceRecord | null> => {
  try {
    const result = await query<TraceRow>(`SELECT ${TRACE_COLUMNS} FROM message_traces WHERE id = $1`, [traceId]);
    const row = result.rows[0];
    return row ? toTraceRecord(row) : null;
  } catch (error) {
    if (isInvalidTextError(error)) {
      return null;
    }
    throw error;
  }
};

export type TraceCountSummary = {
  total: number;
  today: number;
  lastSevenDays: number;
  byStatus: Record<string, number>;
  byDirection: Record<TraceDirection, number>;
};

export const summarizeTraces = async (tenantIds: string[], now: Date): Promise<TraceCountSummary> => {
  const startOfToday = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const sevenDaysAgo = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000);
  const scope = 'WHERE (cardinality($1::uuid[]) = 0 OR tenant_id = ANY($1::uuid[]))';

  const byStatus: Record<string, number> = {};
  const byDirection: Record<TraceDirection, number> = { Inbound: 0, Outbound: 0, Internal: 0, Unknown: 0 };

  let totals: { rows: Array<{ total: number; today: number; last_seven_days: number }> };
  let groups: { rows: Array<{ kind: string; value: string; count: number }> };
  try {
    totals = await query<{ total: number; today: number; last_seven_days: number }>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE received_at >= $2)::int AS today,
              COUNT(*) FILTER (WHERE received_at >= $3)::int AS last_seven_days
         FROM message_traces
         ${scope}`,
      [tenantIds, startOfToday, sevenDaysAgo],
    );
    groups = await query<{ kind: string; value: string; count: number }>(
      `SELECT 'status' AS kind, status AS value, COUNT(*)::int AS count FROM message_traces ${scope} GROUP BY status
       UNION ALL
       SELECT 'direction' AS kind, direction AS value, COUNT(*)::int AS count FROM message_traces ${scope} GROUP BY direction`,
      [tenantIds],
    );
  } catch (error) {
    if (tenantIds.length > 0 && isInvalidTextError(error)) {
      return { total: 0, today: 0, lastSevenDays: 0, byStatus, byDirection };
    }
    throw error;
  }

  for (const row of groups.rows) {
    if (row.kind === 'status') {
      byStatus[row.value] = Number(row.count);
    } else if (isTraceDirection(row.value)) {
      byDirection[row.value] = Number(row.count);
    }
  }
  const summary = totals.rows[0];
  return {
    total: Number(summary?.total ?? 0),
    today: Number(summary?.today ?? 0),
    lastSevenDays: Number(summary?.last_seven_days ?? 0),
    byStatus,
    byDirection,
  };
};

/** Most frequent sender and recipient domains among traces still classified Unknown. */
export const topUnclassifiedDomains = async (tenantId: string, limit = 10) => {
  const result = await query<{ side: string; domain: string; count: number }>(
    `SELECT side, domain, count FROM (
        SELECT 'sender' AS side, ${ADDRESS_DOMAIN_SQL('sender')} AS domain, COUNT(*)::int AS count
          FROM message_traces
         WHERE tenant_id = $1 AND direction = 'Unknown'
         GROUP BY 2
        UNION ALL
        SELECT 'recipient' AS side, ${ADDRESS_DOMAIN_SQL('recipient')} AS domain, COUNT(*)::int AS count
          FROM message_traces
         WHERE tenant_id = $1 AND direction = 'Unknown'
         GROUP BY 2
      ) AS domains
      WHERE domain IS NOT NULL AND domain <> ''
      ORDER BY count DESC, domain ASC
      LIMIT $2`,
    [tenantId, limit],
  );
  return result.rows.map((row) => ({
    side: row.side === 'recipient' ? 'recipient' : 'sender',
    domain: row.domain,
    count: Number(row.count),
  }));
};
