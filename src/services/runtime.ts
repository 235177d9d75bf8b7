import { env } from '../config/env.js';
import { pgSettingsStore } from './appSettings.js';
import { createGraphDirectoryService } from './directoryService.js';
import { createClientCredentialsAuthProvider } from './msAuth.js';
import { pgPullLedger } from './pullLedger.js';
import type { RetryPolicy } from './retry.js';
import { pgTenantStore } from './tenantStore.js';
import { createTraceIngestion, type IngestionDeps } from './traceIngestion.js';
import { createTraceReportingService } from './traceReporting.js';
import { pgTraceStore } from './traceStore.js';

export const retryPolicy: RetryPolicy = {
  maxAttempts: env.pull.fetchMaxAttempts,
  baseDelayMs: env.pull.backoffBaseMs,
  maxDelayMs: env.pull.backoffMaxMs,
};

export const authProvider = createClientCredentialsAuthProvider({
  authorityHost: env.microsoft.authorityHost,
  scopes: {
    graph: `${env.microsoft.graphBaseUrl}/.default`,
    exchange: `${env.microsoft.exchangeAdminBaseUrl}/.default`,
  },
});

export const ingestionDeps: IngestionDeps = {
  auth: authProvider,
  directory: createGraphDirectoryService({ graphBaseUrl: env.microsoft.graphBaseUrl }),
  tenants: pgTenantStore,
  ledger: pgPullLedger,
  traces: pgTraceStore,
  retry: retryPolicy,
  reportingFor: (tenant, accessMode) => createTraceReportingService(
    { accessMode, organization: tenant.organization },
    {
      graphBaseUrl: env.microsoft.graphBaseUrl,
      exchangeAdminBaseUrl: env.microsoft.exchangeAdminBaseUrl,
      pageSize: env.pull.pageSize,
    },
  ),
};

/** Process-wide engine; its per-tenant lock covers every pull started in this process. */
export const traceIngestion = createTraceIngestion(ingestionDeps);

export const settingsStore = pgSettingsStore;
