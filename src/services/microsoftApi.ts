import { isRecord } from '../shared/json.js';
import { TraceSyncError } from './errors.js';

const readErrorCode = (value: unknown): string => {
  if (!isRecord(value)) {
    return '';
  }
  if (typeof value.code === 'string') {
    return value.code;
  }
  return readErrorCode(value.cause);
};

const isRecoverableNetworkError = (error: unknown) => {
  const code = readErrorCode(error);
  const message = String(error).toLowerCase();
  return (
    code === 'ECONNRESET'
    || code === 'ETIMEDOUT'
    || code === 'EAI_AGAIN'
    || code === 'ECONNREFUSED'
    || code === 'UND_ERR_CONNECT_TIMEOUT'
    || message.includes('timed out')
    || message.includes('timeout')
    || message.includes('fetch failed')
    || message.includes('network')
  );
};

const isRetryableStatus = (status: number) => status === 429 || status === 408 || (status >= 500 && status <= 599);

/** Retry-After as seconds or an HTTP date; null when absent or unusable. */
export const parseRetryAfterMs = (value: string | null, nowMs = Date.now()): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : null;
  }
  const at = Date.parse(value);
  if (!Number.isFinite(at)) {
    return null;
  }
  return Math.max(0, at - nowMs);
};

const extractProviderMessage = (text: string) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text.slice(0, 500);
  }
  if (isRecord(parsed)) {
    const inner = parsed.error;
    const parts = isRecord(inner) ? [inner.code, inner.message] : [inner, parsed.error_description];
    const message = parts
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join(': ');
    if (message) {
      return message;
    }
  }
  return text.slice(0, 500);
};

export const toProviderError = (response: Response, bodyText: string, context: string) => {
  const detail = `${context} ${response.status} ${response.statusText}: ${extractProviderMessage(bodyText)}`.trim();
  const httpStatus = response.status;
  if (httpStatus === 401) {
    return new TraceSyncError('AuthenticationFailed', detail, { httpStatus });
  }
  if (httpStatus === 403) {
    return new TraceSyncError('PermissionDenied', detail, { httpStatus });
  }
  if (isRetryableStatus(httpStatus)) {
    return new TraceSyncError('TransientNetworkError', detail, {
      httpStatus,
      retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after')),
    });
  }
  return new TraceSyncError('UnexpectedResponse', detail, { httpStatus });
};

/**
 * One authenticated JSON request. Never retries; the caller owns the retry
 * policy. Failures always surface as TraceSyncError.
 */
export const microsoftApiRequest = async (
  url: string,
  accessToken: string,
  context: string,
  init: RequestInit = {},
): Promise<unknown> => {
  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
        ...(init.body ? { 'Content-Type': 'application/json' } : {}),
        ...(init.headers ?? {}),
      },
    });
  } catch (error) {
    if (isRecoverableNetworkError(error)) {
      throw new TraceSyncError('TransientNetworkError', `${context}: ${String(error)}`, { cause: error });
    }
    throw new TraceSyncError('UnexpectedResponse', `${context}: ${String(error)}`, { cause: error });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw toProviderError(response, text, context);
  }

  const text = await response.text();
  if (!text.trim()) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TraceSyncError('UnexpectedResponse', `${context}: response is not valid JSON`, { cause: error });
  }
};

export type ODataPage = { value: unknown[]; nextLink: string | undefined };

export const readODataPage = (payload: unknown, context: string): ODataPage => {
  if (!isRecord(payload)) {
    throw new TraceSyncError('UnexpectedResponse', `${context}: expected an object payload`);
  }
  const value: unknown = payload.value;
  if (!Array.isArray(value)) {
    throw new TraceSyncError('UnexpectedResponse', `${context}: payload has no value array`);
  }
  const next = payload['@odata.nextLink'];
  return {
    value,
    nextLink: typeof next === 'string' && next ? next : undefined,
  };
};
