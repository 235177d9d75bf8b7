import type {
  AccessMode,
  AppSettings,
  PullRunCounts,
  PullRunRecord,
  PullTriggerType,
  TenantRecord,
  TerminalPullStatus,
  TraceDateRange,
} from '../shared/types.js';
import { getAccessModeCapabilities } from './accessModes.js';
import { assertValidSettings } from './appSettings.js';
import { classifyDirection, createDomainSnapshot } from './direction.js';
import { ensureFresh, type RefreshDeps, type RefreshOutcome } from './domainRefresh.js';
import { describeError, isTraceSyncError, TraceSyncError } from './errors.js';
import type { PullLedger } from './pullLedger.js';
import { withRetry, type RetryPolicy } from './retry.js';
import type { TracePage, TraceReportingService } from './traceReporting.js';
import type { TraceStore } from './traceStore.js';

export interface IngestionDeps extends RefreshDeps {
  ledger: PullLedger;
  traces: TraceStore;
  reportingFor: (tenant: TenantRecord, accessMode: AccessMode) => TraceReportingService;
  retry: RetryPolicy;
  now?: () => Date;
}

export type PullRequest = {
  tenant: TenantRecord;
  range: TraceDateRange;
  triggerType: PullTriggerType;
  triggeredBy: string;
  settings: AppSettings;
  signal?: AbortSignal;
};

export type PullOutcome = {
  run: PullRunRecord;
  refresh: RefreshOutcome;
  pages: number;
  /** Provider entries dropped because they had no usable received time. */
  skipped: number;
};

/** Safety stop for a provider that keeps handing out next links. */
const MAX_PAGES_PER_PULL = 10_000;

export const assertValidRange = (range: TraceDateRange) => {
  const start = range.start.getTime();
  const end = range.end.getTime();
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new TraceSyncError('InvalidRequest', 'pull range start and end must be valid dates');
  }
  if (start > end) {
    throw new TraceSyncError('InvalidRequest', 'pull range start must not be after its end');
  }
};

export interface TraceIngestion {
  pull(request: PullRequest): Promise<PullOutcome>;
  isPulling(tenantId: string): boolean;
}

export const createTraceIngestion = (deps: IngestionDeps): TraceIngestion => {
  const inFlight = new Set<string>();
  const now = deps.now ?? (() => new Date());

  const safeRefresh = async (tenant: TenantRecord, settings: AppSettings): Promise<RefreshOutcome> => {
    try {
      return await ensureFresh(tenant, settings, deps, now());
    } catch (error) {
      console.warn('[pull] domain refresh raised; continuing with stored domains', {
        tenantId: tenant.id,
        error: describeError(error),
      });
      return { status: 'skipped', reason: 'discovery_failed', detail: describeError(error) };
    }
  };

  const finalizeRun = async (
    run: PullRunRecord,
    status: TerminalPullStatus,
    counts: PullRunCounts,
    errorDetail: string,
  ): Promise<PullRunRecord> => {
    try {
      return await deps.ledger.finalize(run.id, { status, counts, errorDetail });
    } catch (error) {
      if (!isTraceSyncError(error, 'AlreadyFinalized')) {
        throw error;
      }
      // Reaped or finalized elsewhere while this pull was still going.
      console.warn('[pull] run was finalized elsewhere', { runId: run.id, wanted: status });
      return (await deps.ledger.get(run.id)) ?? run;
    }
  };

  // A refresh refused because domains were stored meanwhile classifies with the stored set.
  const domainsForPull = async (tenant: TenantRecord, refresh: RefreshOutcome): Promise<string[]> => {
    if (refresh.status === 'refreshed') {
      return refresh.domains;
    }
    if (refresh.reason !== 'already_configured') {
      return tenant.ownedDomains;
    }
    try {
      return (await deps.tenants.getTenant(tenant.id))?.ownedDomains ?? tenant.ownedDomains;
    } catch (error) {
      console.warn('[pull] could not re-read owned domains', { tenantId: tenant.id, error: describeError(error) });
      return tenant.ownedDomains;
    }
  };

  const pull = async (request: PullRequest): Promise<PullOutcome> => {
    const { tenant, range, settings, signal } = request;
    assertValidSettings(settings);
    assertValidRange(range);

    if (inFlight.has(tenant.id)) {
      throw new TraceSyncError('PullAlreadyInProgress', `a pull is already running for tenant ${tenant.id}`);
    }
    inFlight.add(tenant.id);

    try {
      const run = await deps.ledger.begin({
        tenantId: tenant.id,
        range,
        triggerType: request.triggerType,
        triggeredBy: request.triggeredBy,
        accessMode: tenant.accessMode,
      });
      console.info('[pull] started', {
        runId: run.id,
        tenantId: tenant.id,
        start: range.start.toISOString(),
        end: range.end.toISOString(),
        trigger: request.triggerType,
      });

      const refresh = await safeRefresh(tenant, settings);
      const snapshot = createDomainSnapshot(await domainsForPull(tenant, refresh));
      let accessMode = tenant.accessMode;
      let reporting = deps.reportingFor(tenant, accessMode);
      const counts: PullRunCounts = { pulled: 0, inserted: 0, updated: 0 };
      let pages = 0;
      let skipped = 0;

      const isCancelled = async () => signal?.aborted === true || deps.ledger.isCancellationRequested(run.id);

      const finish = async (status: TerminalPullStatus, errorDetail = '') => {
        const finalized = await finalizeRun(run, status, counts, errorDetail);
        const log = status === 'Success' || status === 'Cancelled' ? console.info : console.warn;
        log('[pull] finished', {
          runId: run.id,
          tenantId: tenant.id,
          status: finalized.status,
          pages,
          ...finalized.counts,
          skipped,
          ...(errorDetail ? { error: errorDetail } : {}),
        });
        return { run: finalized, refresh, pages, skipped };
      };

      const fetchPage = (token: string | undefined) => withRetry(
        async () => {
          const audience = getAccessModeCapabilities(accessMode).tokenAudience;
          const accessToken = await deps.auth.getAccessToken(tenant.credentials, audience);
          return reporting.queryTraces(accessToken, range, token);
        },
        deps.retry,
        {
          wait: deps.wait,
          onRetry: (error, attempt, delayMs) => {
            console.warn('[pull] retrying page', {
              runId: run.id,
              page: pages + 1,
              attempt: attempt + 1,
              delayMs,
              error: describeError(error),
            });
          },
        },
      );

      let pageToken: string | undefined;
      try {
        do {
          if (await isCancelled()) {
            return await finish('Cancelled', 'cancelled by request');
          }
          if (pages >= MAX_PAGES_PER_PULL) {
            throw new TraceSyncError('UnexpectedResponse', `provider returned more than ${MAX_PAGES_PER_PULL} pages`);
          }
          let page: TracePage;
          try {
            page = await fetchPage(pageToken);
          } catch (error) {
            if (pages > 0 || accessMode !== 'graph' || !isTraceSyncError(error, 'EndpointUnavailable')) {
              throw error;
            }
            if (!tenant.organization.trim()) {
              throw new TraceSyncError(
                'EndpointUnavailable',
                `${error.message}; the shell fallback needs the tenant's organization (e.g. contoso.onmicrosoft.com), `
                  + 'or grant the app the Exchange message trace permission',
                { cause: error },
              );
            }
            console.warn('[pull] graph message trace unavailable; falling back to the shell', {
              runId: run.id,
              tenantId: tenant.id,
              error: error.message,
            });
            accessMode = 'powershell';
            reporting = deps.reportingFor(tenant, accessMode);
            await deps.ledger.recordAccessMode(run.id, accessMode);
            page = await fetchPage(undefined);
          }

          const upserts = page.records.map((record) => ({
            ...record,
            direction: classifyDirection(record.sender, record.recipient, snapshot),
          }));
          const written = await deps.traces.upsertBatch(tenant.id, upserts);
          counts.pulled += page.records.length + page.rejected;
          counts.inserted += written.inserted;
          counts.updated += written.updated;
          skipped += page.rejected;
          if (page.rejected > 0) {
            console.warn('[pull] skipped records without a usable received time', {
              runId: run.id,
              page: pages + 1,
              count: page.rejected,
            });
          }
          pages += 1;
          pageToken = page.nextPageToken;
        } while (pageToken);
      } catch (error) {
        // Counts only move after a page is fully written, so they are zero here when no page landed.
        return await finish(pages === 0 ? 'Failed' : 'Partial', describeError(error));
      }

      return await finish('Success');
    } finally {
      inFlight.delete(tenant.id);
    }
  };

  return {
    pull,
    isPulling: (tenantId) => inFlight.has(tenantId),
  };
};
