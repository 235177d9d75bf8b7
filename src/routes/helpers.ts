import type { FastifyRequest } from 'fastify';
import type { TraceDateRange } from '../shared/types.js';
import { TraceSyncError } from '../services/errors.js';

export type QueryString = Record<string, string | undefined>;

export const actorFrom = (request: FastifyRequest) => {
  const header = request.headers['x-actor'];
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = String(value ?? '').trim();
  return trimmed || 'admin';
};

export const parseBooleanFlag = (value: unknown) => {
  if (typeof value === 'boolean') return value;
  const normalized = String(value ?? '').trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
};

export const parseOptionalDate = (value: unknown, field: string): Date | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new TraceSyncError('InvalidRequest', `${field} must be an ISO date string`);
  }
  // A bare date means the whole UTC day; callers pick start or end of it.
  const parsed = Date.parse(/^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value}T00:00:00.000Z` : value);
  if (!Number.isFinite(parsed)) {
    throw new TraceSyncError('InvalidRequest', `${field} is not a valid date`);
  }
  return new Date(parsed);
};

const END_OF_DAY_OFFSET_MS = 24 * 60 * 60 * 1000 - 1;

/**
 * Reads {start, end}. Bare dates are widened to whole UTC days; both or
 * neither must be given, and neither means the default window.
 */
export const parseRangeInput = (
  input: { start?: unknown; end?: unknown },
  fallback: () => TraceDateRange,
): TraceDateRange => {
  const start = parseOptionalDate(input.start, 'start');
  let end = parseOptionalDate(input.end, 'end');
  if (!start && !end) {
    return fallback();
  }
  if (!start || !end) {
    throw new TraceSyncError('InvalidRequest', 'start and end must be given together');
  }
  if (typeof input.end === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(input.end)) {
    end = new Date(end.getTime() + END_OF_DAY_OFFSET_MS);
  }
  if (start.getTime() > end.getTime()) {
    throw new TraceSyncError('InvalidRequest', 'start must not be after end');
  }
  return { start, end };
};

export const parseLimitOffset = (query: QueryString) => {
  const limit = query.limit === undefined ? undefined : Number(query.limit);
  const offset = query.offset === undefined ? undefined : Number(query.offset);
  if (limit !== undefined && !Number.isFinite(limit)) {
    throw new TraceSyncError('InvalidRequest', 'limit must be a number');
  }
  if (offset !== undefined && !Number.isFinite(offset)) {
    throw new TraceSyncError('InvalidRequest', 'offset must be a number');
  }
  return { limit, offset };
};

export const optionalText = (value: string | undefined) => {
  const trimmed = String(value ?? '').trim();
  return trimmed || undefined;
};
