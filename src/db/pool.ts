import { Pool } from 'pg';
import type { QueryResultRow } from 'pg';
import { env } from '../config/env.js';

const connectionString = env.databaseUrl;

export const pool = new Pool({
  connectionString,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

export type QueryParam = string | number | boolean | Date | null | string[];

export const query = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: QueryParam[] = [],
): Promise<{ rows: T[]; rowCount: number | null }> => {
  return pool.query<T>(text, params);
};

export type PgError = {
  code?: string;
  constraint?: string;
  message: string;
};

export const isPgError = (error: unknown): error is PgError =>
  typeof error === 'object' && error !== null && 'message' in error;

/** A value that does not parse as its column type, such as a malformed uuid. */
export const isInvalidTextError = (error: unknown) => isPgError(error) && error.code === '22P02';
