import type { TenantRecord, TraceDateRange, TraceRecord } from '../shared/types.js';
import type { SettingsStore } from '../services/appSettings.js';
import type { DashboardSummary } from '../services/dashboard.js';
import type { DiscoveryDeps } from '../services/domainDiscovery.js';
import type { PullLedger } from '../services/pullLedger.js';
import type { DiscoverDomainsTaskPayload, PullTaskPayload } from '../services/queue.js';
import type { ReclassifyResult } from '../services/reclassify.js';
import type { TenantInput, TenantStore } from '../services/tenantStore.js';
import type { TraceIngestion } from '../services/traceIngestion.js';
import type { TraceSearchFilter } from '../services/traceStore.js';

/** Everything the HTTP layer calls; production wiring lives in server.ts. */
export interface AdminServices {
  tenants: TenantStore & {
    create(input: TenantInput): Promise<TenantRecord>;
    update(tenantId: string, input: TenantInput): Promise<TenantRecord>;
    remove(tenantId: string): Promise<void>;
  };
  settings: SettingsStore;
  ledger: PullLedger;
  ingestion: TraceIngestion;
  discovery: DiscoveryDeps;
  traces: {
    search(filter: TraceSearchFilter): Promise<{ traces: TraceRecord[]; total: number; limit: number; offset: number }>;
    get(traceId: string): Promise<TraceRecord | null>;
    unclassifiedDomains(tenantId: string): Promise<Array<{ side: string; domain: string; count: number }>>;
    reclassify(tenantId: string, options: { dryRun: boolean }): Promise<ReclassifyResult>;
  };
  dashboard(options: { tenantId?: string }): Promise<DashboardSummary>;
  queue: {
    hasActiveWorkers(): Promise<boolean>;
    enqueuePull(payload: PullTaskPayload): Promise<string>;
    enqueueDomainDiscovery(payload: DiscoverDomainsTaskPayload): Promise<string>;
  };
  defaultRange(now: Date): TraceDateRange;
}
