import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const repoEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
  dotenv.config({ path: repoEnvPath, override: false });
}

const required = (value?: string, name = 'environment variable'): string => {
  if (!value) {
    throw new Error(`Missing required ${name}`);
  }
  return value;
};

const positiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : fallback;
};

const trimSlash = (value: string) => value.trim().replace(/\/+$/, '');

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? '3000'),
  apiAdminToken: process.env.API_ADMIN_TOKEN ?? '',
  databaseUrl: required(process.env.DATABASE_URL, 'DATABASE_URL'),
  microsoft: {
    authorityHost: trimSlash(process.env.MS_AUTHORITY_HOST ?? 'https://login.microsoftonline.com'),
    graphBaseUrl: trimSlash(process.env.MS_GRAPH_BASE_URL ?? 'https://graph.microsoft.com'),
    exchangeAdminBaseUrl: trimSlash(process.env.MS_EXCHANGE_ADMIN_BASE_URL ?? 'https://outlook.office365.com'),
  },
  pull: {
    pageSize: positiveInt(process.env.TRACE_PAGE_SIZE, 1000),
    fetchMaxAttempts: positiveInt(process.env.TRACE_FETCH_MAX_ATTEMPTS, 4),
    backoffBaseMs: positiveInt(process.env.TRACE_FETCH_BACKOFF_BASE_MS, 500),
    backoffMaxMs: positiveInt(process.env.TRACE_FETCH_BACKOFF_MAX_MS, 8000),
    staleRunMs: positiveInt(process.env.PULL_STALE_RUN_MS, 6 * 60 * 60 * 1000),
    defaultLookbackDays: positiveInt(process.env.DEFAULT_PULL_LOOKBACK_DAYS, 1),
  },
  worker: {
    concurrency: positiveInt(process.env.WORKER_CONCURRENCY, 4),
  },
};
