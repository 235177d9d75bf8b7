import type { JsonObject, JsonValue } from './types.js';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => toJsonValue(entry));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (isRecord(value)) {
    return toJsonObject(value);
  }
  return null;
};

/** Copies an arbitrary provider object into plain JSON; undefined entries are dropped. */
export const toJsonObject = (value: unknown): JsonObject => {
  const result: JsonObject = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      result[key] = toJsonValue(entry);
    }
  }
  return result;
};
