export type TraceSyncErrorKind =
  | 'AuthenticationFailed'
  | 'PermissionDenied'
  | 'UnsupportedAccessMethod'
  | 'TransientNetworkError'
  | 'UnexpectedResponse'
  | 'EndpointUnavailable'
  | 'AlreadyConfigured'
  | 'PullAlreadyInProgress'
  | 'AlreadyFinalized'
  | 'InvalidSettings'
  | 'InvalidRequest'
  | 'NotFound';

export class TraceSyncError extends Error {
  readonly kind: TraceSyncErrorKind;
  readonly retryAfterMs: number | null;
  /** HTTP status of the provider response, when one was received. */
  readonly httpStatus: number | null;

  constructor(
    kind: TraceSyncErrorKind,
    message: string,
    options: { retryAfterMs?: number | null; httpStatus?: number | null; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TraceSyncError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.httpStatus = options.httpStatus ?? null;
  }
}

export const isTraceSyncError = (error: unknown, kind?: TraceSyncErrorKind): error is TraceSyncError =>
  error instanceof TraceSyncError && (kind === undefined || error.kind === kind);

export const isRetryableError = (error: unknown): error is TraceSyncError =>
  isTraceSyncError(error, 'TransientNetworkError');

const ERROR_LABELS: Partial<Record<TraceSyncErrorKind, string>> = {
  AuthenticationFailed: 'Authentication error',
  PermissionDenied: 'Permission denied',
  UnsupportedAccessMethod: 'Unsupported access method',
  TransientNetworkError: 'API error',
  UnexpectedResponse: 'API error',
  EndpointUnavailable: 'Endpoint unavailable',
};

/** Plain-string detail stored on ledger entries and shown to operators. */
export const describeError = (error: unknown): string => {
  if (error instanceof TraceSyncError) {
    const label = ERROR_LABELS[error.kind] ?? error.kind;
    return `${label}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
};

export const httpStatusForError = (error: TraceSyncError): number => {
  switch (error.kind) {
    case 'NotFound':
      return 404;
    case 'AlreadyConfigured':
    case 'PullAlreadyInProgress':
    case 'AlreadyFinalized':
      return 409;
    case 'InvalidSettings':
    case 'InvalidRequest':
    case 'UnsupportedAccessMethod':
      return 400;
    case 'PermissionDenied':
      return 403;
    case 'AuthenticationFailed':
      return 401;
    default:
      return 502;
  }
};
