export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type AccessMode = 'graph' | 'powershell';
export type AuthMethod = 'certificate' | 'secret';

export const TRACE_DIRECTIONS = ['Inbound', 'Outbound', 'Internal', 'Unknown'] as const;
export type TraceDirection = (typeof TRACE_DIRECTIONS)[number];

export const DELIVERY_STATUSES = [
  'Delivered',
  'Failed',
  'Pending',
  'Expanded',
  'Quarantined',
  'FilteredAsSpam',
  'None',
  'Unknown',
] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

export const PULL_STATUSES = ['Running', 'Success', 'Partial', 'Failed', 'Cancelled'] as const;
export type PullStatus = (typeof PULL_STATUSES)[number];
export type TerminalPullStatus = Exclude<PullStatus, 'Running'>;

export type PullTriggerType = 'Scheduled' | 'Manual';

interface CredentialBase {
  directoryTenantId: string;
  clientId: string;
}

export interface SecretCredentials extends CredentialBase {
  authMethod: 'secret';
  clientSecret: string;
}

export interface CertificateCredentials extends CredentialBase {
  authMethod: 'certificate';
  certificatePath: string;
  certificateThumbprint: string;
  certificatePassword?: string;
}

export type TenantCredentials = SecretCredentials | CertificateCredentials;

export interface TenantRecord {
  id: string;
  name: string;
  credentials: TenantCredentials;
  accessMode: AccessMode;
  /** Exchange organization, e.g. contoso.onmicrosoft.com. Needed by the shell access mode. */
  organization: string;
  isActive: boolean;
  ownedDomains: string[];
  domainsLastUpdatedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AppSettings {
  autoRefreshDomains: boolean;
  domainRefreshHours: number;
  scheduledPullEnabled: boolean;
  scheduledPullHour: number;
  scheduledPullMinute: number;
  updatedAt: Date | null;
  updatedBy: string;
}

export interface TraceDateRange {
  start: Date;
  end: Date;
}

export interface TraceRecord {
  id: string;
  tenantId: string;
  messageId: string;
  receivedAt: Date;
  sender: string;
  recipient: string;
  subject: string;
  status: DeliveryStatus;
  direction: TraceDirection;
  sizeBytes: number;
  eventData: JsonObject;
  rawPayload: JsonObject;
  /** When the provider record was last written here, distinct from receivedAt. */
  traceDate: Date;
}

export interface PullRunCounts {
  pulled: number;
  inserted: number;
  updated: number;
}

export interface PullRunRecord {
  id: string;
  tenantId: string;
  startedAt: Date;
  finishedAt: Date | null;
  range: TraceDateRange;
  counts: PullRunCounts;
  status: PullStatus;
  errorDetail: string;
  triggerType: PullTriggerType;
  triggeredBy: string;
  accessMode: AccessMode;
  cancelRequestedAt: Date | null;
  durationSeconds: number | null;
}
