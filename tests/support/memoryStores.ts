import type {
  AccessMode,
  AppSettings,
  PullRunRecord,
  TenantCredentials,
  TenantRecord,
  TraceDirection,
  TraceRecord,
} from '../../src/shared/types.js';
import { DEFAULT_APP_SETTINGS } from '../../src/services/appSettings.js';
import type { TokenAudience } from '../../src/services/accessModes.js';
import type { DirectoryDomain, DirectoryService } from '../../src/services/directoryService.js';
import { TraceSyncError } from '../../src/services/errors.js';
import type { AuthProvider } from '../../src/services/msAuth.js';
import { clampPage, runDurationSeconds, STALE_RUN_DETAIL, type PullLedger } from '../../src/services/pullLedger.js';
import type { TenantStore } from '../../src/services/tenantStore.js';
import type { ProviderTrace, TracePage, TraceReportingService } from '../../src/services/traceReporting.js';
import { dedupeByKey, traceKey, type TraceStore } from '../../src/services/traceStore.js';

export const secretCredentials: TenantCredentials = {
  authMethod: 'secret',
  directoryTenantId: 'dir-tenant-1',
  clientId: 'client-1',
  clientSecret: 'test-secret',
};

export const makeTenant = (overrides: Partial<TenantRecord> = {}): TenantRecord => ({
  id: 'tenant-1',
  name: 'Contoso',
  credentials: secretCredentials,
  accessMode: 'graph',
  organization: 'contoso.onmicrosoft.com',
  isActive: true,
  ownedDomains: [],
  domainsLastUpdatedAt: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
  ...overrides,
});

export const makeSettings = (overrides: Partial<AppSettings> = {}): AppSettings => ({
  ...DEFAULT_APP_SETTINGS,
  ...overrides,
});

export class MemoryTenantStore implements TenantStore {
  readonly tenants = new Map<string, TenantRecord>();

  constructor(tenants: TenantRecord[] = []) {
    for (const tenant of tenants) {
      this.tenants.set(tenant.id, { ...tenant });
    }
  }

  async getTenant(tenantId: string) {
    const tenant = this.tenants.get(tenantId);
    return tenant ? { ...tenant } : null;
  }

  async listTenants(options: { activeOnly?: boolean } = {}) {
    return [...this.tenants.values()]
      .filter((tenant) => !options.activeOnly || tenant.isActive)
      .map((tenant) => ({ ...tenant }));
  }

  async replaceOwnedDomains(tenantId: string, domains: string[], options: { overwrite: boolean; updatedAt: Date }) {
    const tenant = this.tenants.get(tenantId);
    if (!tenant) {
      return 'missing' as const;
    }
    if (tenant.ownedDomains.length > 0 && !options.overwrite) {
      return 'conflict' as const;
    }
    this.tenants.set(tenantId, { ...tenant, ownedDomains: [...domains], domainsLastUpdatedAt: options.updatedAt });
    return 'updated' as const;
  }
}

export class MemoryPullLedger implements PullLedger {
  readonly runs = new Map<string, PullRunRecord>();
  readonly cancelRequests = new Set<string>();
  private sequence = 0;

  async begin(input: Parameters<PullLedger['begin']>[0]) {
    const running = [...this.runs.values()].some((run) => run.tenantId === input.tenantId && run.status === 'Running');
    if (running) {
      throw new TraceSyncError('PullAlreadyInProgress', `a pull is already running for tenant ${input.tenantId}`);
    }
    this.sequence += 1;
    const run: PullRunRecord = {
      id: `run-${this.sequence}`,
      tenantId: input.tenantId,
      startedAt: new Date(Date.UTC(2024, 0, 10, 0, 0, this.sequence)),
      finishedAt: null,
      range: input.range,
      counts: { pulled: 0, inserted: 0, updated: 0 },
      status: 'Running',
      errorDetail: '',
      triggerType: input.triggerType,
      triggeredBy: input.triggeredBy,
      accessMode: input.accessMode,
      cancelRequestedAt: null,
      durationSeconds: null,
    };
    this.runs.set(run.id, run);
    return { ...run };
  }

  async finalize(runId: string, input: Parameters<PullLedger['finalize']>[1]) {
    const run = this.runs.get(runId);
    if (!run) {
      throw new TraceSyncError('NotFound', `pull run ${runId} not found`);
    }
    if (run.status !== 'Running') {
      throw new TraceSyncError('AlreadyFinalized', `pull run ${runId} is already ${run.status}`);
    }
    const finishedAt = new Date(run.startedAt.getTime() + 5000);
    const next: PullRunRecord = {
      ...run,
      status: input.status,
      counts: { ...input.counts },
      errorDetail: input.errorDetail,
      finishedAt,
      durationSeconds: runDurationSeconds(run.startedAt, finishedAt),
    };
    this.runs.set(runId, next);
    return { ...next };
  }

  async list(filter: Parameters<PullLedger['list']>[0] = {}) {
    const { limit, offset } = clampPage(filter);
    const matching = [...this.runs.values()]
      .filter((run) => (!filter.tenantId || run.tenantId === filter.tenantId) && (!filter.status || run.status === filter.status))
      .sort((left, right) => right.startedAt.getTime() - left.startedAt.getTime());
    return { runs: matching.slice(offset, offset + limit), total: matching.length, limit, offset };
  }

  async get(runId: string) {
    const run = this.runs.get(runId);
    return run ? { ...run } : null;
  }

  async requestCancellation(runId: string) {
    const run = this.runs.get(runId);
    if (!run) {
      throw new TraceSyncError('NotFound', `pull run ${runId} not found`);
    }
    if (run.status !== 'Running') {
      throw new TraceSyncError('AlreadyFinalized', `pull run ${runId} is already ${run.status}`);
    }
    this.cancelRequests.add(runId);
    const next = { ...run, cancelRequestedAt: run.cancelRequestedAt ?? new Date('2024-01-10T00:01:00Z') };
    this.runs.set(runId, next);
    return { ...next };
  }

  async recordAccessMode(runId: string, accessMode: AccessMode) {
    const run = this.runs.get(runId);
    if (run && run.status === 'Running') {
      this.runs.set(runId, { ...run, accessMode });
    }
  }

  async isCancellationRequested(runId: string) {
    return this.cancelRequests.has(runId);
  }

  async reapStaleRuns(startedBefore: Date) {
    let reaped = 0;
    for (const run of this.runs.values()) {
      if (run.status === 'Running' && run.startedAt < startedBefore) {
        this.runs.set(run.id, { ...run, status: 'Failed', errorDetail: STALE_RUN_DETAIL });
        reaped += 1;
      }
    }
    return reaped;
  }
}

export class MemoryTraceStore implements TraceStore {
  readonly rows = new Map<string, TraceRecord>();
  writes = 0;

  async upsertBatch(tenantId: string, records: Array<ProviderTrace & { direction: TraceDirection }>) {
    const counts = { inserted: 0, updated: 0, unchanged: 0 };
    for (const record of dedupeByKey(records)) {
      const key = `${tenantId}\u0000${traceKey(record)}`;
      const existing = this.rows.get(key);
      if (!existing) {
        this.rows.set(key, {
          ...record,
          id: `trace-${this.rows.size + 1}`,
          tenantId,
          traceDate: new Date('2024-01-10T00:00:00Z'),
        });
        counts.inserted += 1;
        this.writes += 1;
        continue;
      }
      const changed = existing.subject !== record.subject
        || existing.status !== record.status
        || existing.direction !== record.direction
        || existing.sizeBytes !== record.sizeBytes
        || JSON.stringify(existing.eventData) !== JSON.stringify(record.eventData)
        || JSON.stringify(existing.rawPayload) !== JSON.stringify(record.rawPayload);
      if (!changed) {
        counts.unchanged += 1;
        continue;
      }
      this.rows.set(key, {
        ...existing,
        subject: record.subject,
        status: record.status,
        direction: record.direction,
        sizeBytes: record.sizeBytes,
        eventData: record.eventData,
        rawPayload: record.rawPayload,
      });
      counts.updated += 1;
      this.writes += 1;
    }
    return counts;
  }

  async scanDirections(tenantId: string, afterId: string | null, limit: number) {
    return [...this.rows.values()]
      .filter((row) => row.tenantId === tenantId && (afterId === null || row.id > afterId))
      .sort((left, right) => (left.id < right.id ? -1 : left.id > right.id ? 1 : 0))
      .slice(0, limit)
      .map((row) => ({ id: row.id, sender: row.sender, recipient: row.recipient, direction: row.direction }));
  }

  async updateDirections(tenantId: string, updates: Array<{ id: string; direction: TraceDirection }>) {
    let changed = 0;
    for (const [key, row] of this.rows) {
      const update = updates.find((candidate) => candidate.id === row.id);
      if (row.tenantId === tenantId && update && update.direction !== row.direction) {
        this.rows.set(key, { ...row, direction: update.direction });
        changed += 1;
      }
    }
    return changed;
  }

  list(tenantId: string) {
    return [...this.rows.values()].filter((row) => row.tenantId === tenantId);
  }
}

export class FakeAuthProvider implements AuthProvider {
  readonly requests: TokenAudience[] = [];
  failWith: TraceSyncError | null = null;

  async getAccessToken(_credentials: TenantCredentials, audience: TokenAudience) {
    this.requests.push(audience);
    if (this.failWith) {
      throw this.failWith;
    }
    return `token-${audience}`;
  }
}

export class FakeDirectory implements DirectoryService {
  calls = 0;

  constructor(private readonly result: DirectoryDomain[] | TraceSyncError) {}

  async listDomains() {
    this.calls += 1;
    if (this.result instanceof TraceSyncError) {
      throw this.result;
    }
    return this.result;
  }
}

export type ScriptedPage = TracePage | TraceSyncError;

/** Serves pages from a script; the page token is the index of the next page. */
export class ScriptedReporting implements TraceReportingService {
  readonly calls: Array<{ pageToken: string | undefined }> = [];
  beforePage: ((index: number) => void) | null = null;

  constructor(
    private readonly pages: ScriptedPage[],
    readonly accessMode: AccessMode = 'graph',
  ) {}

  async queryTraces(_accessToken: string, _range: unknown, pageToken?: string) {
    this.calls.push({ pageToken });
    const index = pageToken === undefined ? 0 : Number(pageToken);
    this.beforePage?.(index);
    const page = this.pages[index];
    if (!page) {
      throw new Error(`no scripted page ${index}`);
    }
    if (page instanceof TraceSyncError) {
      throw page;
    }
    return page;
  }
}

export const providerTrace = (overrides: Partial<ProviderTrace> = {}): ProviderTrace => ({
  messageId: '<m1@contoso.com>',
  receivedAt: new Date('2024-01-02T10:00:00Z'),
  sender: 'alice@contoso.com',
  recipient: 'bob@fabrikam.com',
  subject: 'Quarterly report',
  status: 'Delivered',
  sizeBytes: 2048,
  eventData: {},
  rawPayload: {},
  ...overrides,
});

export const page = (records: ProviderTrace[], nextPageToken?: string, rejected = 0): TracePage => ({
  records,
  rejected,
  nextPageToken,
});
