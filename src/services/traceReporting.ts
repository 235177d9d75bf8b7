import { isRecord, toJsonObject } from '../shared/json.js';
import type {
  AccessMode,
  DeliveryStatus,
  JsonObject,
  TenantRecord,
  TraceDateRange,
} from '../shared/types.js';
import { isTraceSyncError, TraceSyncError } from './errors.js';
import { microsoftApiRequest, readODataPage } from './microsoftApi.js';

export interface ProviderTrace {
  messageId: string;
  receivedAt: Date;
  sender: string;
  recipient: string;
  subject: string;
  status: DeliveryStatus;
  sizeBytes: number;
  eventData: JsonObject;
  rawPayload: JsonObject;
}

export interface TracePage {
  records: ProviderTrace[];
  /** Entries on this page that could not be normalized (no usable received time). */
  rejected: number;
  nextPageToken?: string;
}

export interface TraceReportingService {
  readonly accessMode: AccessMode;
  queryTraces(accessToken: string, range: TraceDateRange, pageToken?: string): Promise<TracePage>;
}

export interface TraceReportingOptions {
  graphBaseUrl: string;
  exchangeAdminBaseUrl: string;
  pageSize: number;
}

const STATUS_MAP: Record<string, DeliveryStatus> = {
  delivered: 'Delivered',
  failed: 'Failed',
  pending: 'Pending',
  gettingstatus: 'Pending',
  expanded: 'Expanded',
  quarantined: 'Quarantined',
  filteredasspam: 'FilteredAsSpam',
  none: 'None',
};

export const normalizeDeliveryStatus = (value: unknown): DeliveryStatus =>
  STATUS_MAP[String(value ?? '').trim().toLowerCase()] ?? 'Unknown';

const LEGACY_DATE_PATTERN = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/;
const HAS_ZONE_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;

/** ISO strings, zone-less ISO strings (taken as UTC) and the shell's /Date(ms)/ form. */
export const parseProviderDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const text = value.trim();
  const legacy = LEGACY_DATE_PATTERN.exec(text);
  if (legacy) {
    return new Date(Number(legacy[1]));
  }
  const withZone = /T\d{2}:\d{2}/.test(text) && !HAS_ZONE_PATTERN.test(text) ? `${text}Z` : text;
  const parsed = Date.parse(withZone);
  return Number.isFinite(parsed) ? new Date(parsed) : null;
};

const asString = (value: unknown) => (typeof value === 'string' ? value : value == null ? '' : String(value));

const asSize = (value: unknown) => {
  const size = Number(value);
  return Number.isFinite(size) && size > 0 ? Math.floor(size) : 0;
};

const compactEventData = (entries: Record<string, unknown>): JsonObject =>
  toJsonObject(Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined && value !== null)));

export const normalizeGraphTrace = (raw: unknown): ProviderTrace | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const receivedAt = parseProviderDate(raw.receivedDateTime ?? raw.received);
  if (!receivedAt) {
    return null;
  }
  const senderObject = isRecord(raw.sender) && isRecord(raw.sender.emailAddress) ? raw.sender.emailAddress : null;
  const eventData = isRecord(raw.eventData)
    ? toJsonObject(raw.eventData)
    : compactEventData({ fromIp: raw.fromIP, toIp: raw.toIP, messageTraceId: raw.id });

  return {
    messageId: asString(raw.internetMessageId ?? raw.messageId),
    receivedAt,
    sender: asString(senderObject ? senderObject.address : raw.senderAddress),
    recipient: asString(raw.recipientAddress),
    subject: asString(raw.subject),
    status: normalizeDeliveryStatus(raw.status),
    sizeBytes: asSize(raw.size),
    eventData,
    rawPayload: toJsonObject(raw),
  };
};

export const normalizeShellTrace = (raw: unknown): ProviderTrace | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const receivedAt = parseProviderDate(raw.Received);
  if (!receivedAt) {
    return null;
  }
  return {
    messageId: asString(raw.MessageId),
    receivedAt,
    sender: asString(raw.SenderAddress),
    recipient: asString(raw.RecipientAddress),
    subject: asString(raw.Subject),
    status: normalizeDeliveryStatus(raw.Status),
    sizeBytes: asSize(raw.Size),
    eventData: compactEventData({ toIp: raw.ToIP, fromIp: raw.FromIP, messageTraceId: raw.MessageTraceId }),
    rawPayload: toJsonObject(raw),
  };
};

const toPage = (
  payload: unknown,
  context: string,
  normalize: (raw: unknown) => ProviderTrace | null,
): TracePage => {
  const page = readODataPage(payload, context);
  const records: ProviderTrace[] = [];
  let rejected = 0;
  for (const entry of page.value) {
    const normalized = normalize(entry);
    if (normalized) {
      records.push(normalized);
    } else {
      rejected += 1;
    }
  }
  return { records, rejected, nextPageToken: page.nextLink };
};

const formatProviderDate = (value: Date) => value.toISOString().replace(/\.\d{3}Z$/, 'Z');

const UNSUPPORTED_SEGMENT = /not supported|unsupported|resource not found for the segment/i;

// Tenants without the beta tracing endpoint answer the first request with 404, or 400 naming the segment.
const isMissingEndpoint = (error: TraceSyncError) =>
  error.kind === 'UnexpectedResponse'
  && (error.httpStatus === 404 || (error.httpStatus === 400 && UNSUPPORTED_SEGMENT.test(error.message)));

export const createGraphTraceService = (options: TraceReportingOptions): TraceReportingService => ({
  accessMode: 'graph',
  async queryTraces(accessToken, range, pageToken) {
    if (pageToken) {
      return toPage(await microsoftApiRequest(pageToken, accessToken, 'Message trace'), 'Message trace', normalizeGraphTrace);
    }
    const params = new URLSearchParams({
      $filter: `receivedDateTime ge ${formatProviderDate(range.start)} and receivedDateTime le ${formatProviderDate(range.end)}`,
      $top: String(options.pageSize),
    });
    const url = `${options.graphBaseUrl}/beta/admin/exchange/tracing/messageTraces?${params.toString()}`;
    let payload: unknown;
    try {
      payload = await microsoftApiRequest(url, accessToken, 'Message trace');
    } catch (error) {
      if (isTraceSyncError(error) && isMissingEndpoint(error)) {
        throw new TraceSyncError('EndpointUnavailable', `Graph message trace is not available: ${error.message}`, {
          httpStatus: error.httpStatus,
          cause: error,
        });
      }
      throw error;
    }
    return toPage(payload, 'Message trace', normalizeGraphTrace);
  },
});

export const createShellTraceService = (
  organization: string,
  options: TraceReportingOptions,
): TraceReportingService => ({
  accessMode: 'powershell',
  async queryTraces(accessToken, range, pageToken) {
    const org = organization.trim();
    if (!org) {
      throw new TraceSyncError(
        'AuthenticationFailed',
        'The Exchange organization (e.g. contoso.onmicrosoft.com) is required for the shell access mode',
      );
    }
    const url = pageToken ?? `${options.exchangeAdminBaseUrl}/adminapi/beta/${encodeURIComponent(org)}/InvokeCommand`;
    const payload = await microsoftApiRequest(url, accessToken, 'Message trace (shell)', {
      method: 'POST',
      body: JSON.stringify({
        CmdletInput: {
          CmdletName: 'Get-MessageTraceV2',
          Parameters: {
            StartDate: formatProviderDate(range.start),
            EndDate: formatProviderDate(range.end),
            ResultSize: options.pageSize,
          },
        },
      }),
      headers: { 'X-AnchorMailbox': `UPN:SystemMailbox{bb558c35-97f1-4cb9-8ff7-d53741dc928c}@${org}` },
    });
    return toPage(payload, 'Message trace (shell)', normalizeShellTrace);
  },
});

export const createTraceReportingService = (
  tenant: Pick<TenantRecord, 'accessMode' | 'organization'>,
  options: TraceReportingOptions,
): TraceReportingService =>
  tenant.accessMode === 'graph'
    ? createGraphTraceService(options)
    : createShellTraceService(tenant.organization, options);
