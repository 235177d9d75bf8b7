import { isInvalidTextError, query } from '../db/pool.js';
import type { QueryParam } from '../db/pool.js';
import { isRecord } from '../shared/json.js';
import type { AccessMode, TenantCredentials, TenantRecord } from '../shared/types.js';
import { isAccessMode } from './accessModes.js';
import { TraceSyncError } from './errors.js';

export type ReplaceDomainsResult = 'updated' | 'conflict' | 'missing';

export interface TenantStore {
  getTenant(tenantId: string): Promise<TenantRecord | null>;
  listTenants(options?: { activeOnly?: boolean }): Promise<TenantRecord[]>;
  /**
   * Atomically replaces the owned-domain set. Without `overwrite` the write
   * only lands when the stored set is empty.
   */
  replaceOwnedDomains(
    tenantId: string,
    domains: string[],
    options: { overwrite: boolean; updatedAt: Date },
  ): Promise<ReplaceDomainsResult>;
}

type TenantRow = {
  id: string;
  name: string;
  auth_method: string;
  directory_tenant_id: string;
  client_id: string;
  client_secret: string | null;
  certificate_path: string | null;
  certificate_thumbprint: string | null;
  certificate_password: string | null;
  access_mode: string;
  organization: string | null;
  is_active: boolean;
  owned_domains: string[] | null;
  domains_last_updated_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const TENANT_COLUMNS = `id, name, auth_method, directory_tenant_id, client_id, client_secret,
  certificate_path, certificate_thumbprint, certificate_password, access_mode, organization,
  is_active, owned_domains, domains_last_updated_at, created_at, updated_at`;

const toCredentials = (row: TenantRow): TenantCredentials => {
  if (row.auth_method === 'certificate') {
    return {
      authMethod: 'certificate',
      directoryTenantId: row.directory_tenant_id,
      clientId: row.client_id,
      certificatePath: row.certificate_path ?? '',
      certificateThumbprint: row.certificate_thumbprint ?? '',
      certificatePassword: row.certificate_password ?? undefined,
    };
  }
  return {
    authMethod: 'secret',
    directoryTenantId: row.directory_tenant_id,
    clientId: row.client_id,
    clientSecret: row.client_secret ?? '',
  };
};

export const toTenantRecord = (row: TenantRow): TenantRecord => ({
  id: row.id,
  name: row.name,
  credentials: toCredentials(row),
  accessMode: isAccessMode(row.access_mode) ? row.access_mode : 'graph',
  organization: row.organization ?? '',
  isActive: row.is_active,
  ownedDomains: row.owned_domains ?? [],
  domainsLastUpdatedAt: row.domains_last_updated_at,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export const pgTenantStore: TenantStore = {
  async getTenant(tenantId) {
    try {
      const result = await query<TenantRow>(`SELECT ${TENANT_COLUMNS} FROM tenants WHERE id = $1`, [tenantId]);
      const row = result.rows[0];
      return row ? toTenantRecord(row) : null;
    } catch (error) {
      if (isInvalidTextError(error)) {
        return null;
      }
      throw error;
    }
  },

  async listTenants(options = {}) {
    const result = await query<TenantRow>(
      `SELECT ${TENANT_COLUMNS}
         FROM tenants
        WHERE ($1::boolean IS FALSE OR is_active)
        ORDER BY name ASC`,
      [options.activeOnly === true],
    );
    return result.rows.map(toTenantRecord);
  },

  async replaceOwnedDomains(tenantId, domains, options) {
    let result: { rows: Array<{ id: string }> };
    try {
      result = await query<{ id: string }>(
        `UPDATE tenants
            SET owned_domains = $2::text[],
                domains_last_updated_at = $3,
                updated_at = NOW()
          WHERE id = $1
            AND ($4::boolean OR cardinality(owned_domains) = 0)
          RETURNING id`,
        [tenantId, domains, options.updatedAt, options.overwrite],
      );
    } catch (error) {
      if (isInvalidTextError(error)) {
        return 'missing';
      }
      throw error;
    }
    if (result.rows.length > 0) {
      return 'updated';
    }
    const exists = await query<{ id: string }>('SELECT id FROM tenants WHERE id = $1', [tenantId]);
    return exists.rows.length > 0 ? 'conflict' : 'missing';
  },
};

export type TenantInput = {
  name?: unknown;
  accessMode?: unknown;
  organization?: unknown;
  isActive?: unknown;
  credentials?: unknown;
};

const readText = (value: unknown, field: string, options: { required: boolean }) => {
  if (value === undefined || value === null) {
    if (options.required) {
      throw new TraceSyncError('InvalidRequest', `${field} is required`);
    }
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new TraceSyncError('InvalidRequest', `${field} must be a string`);
  }
  const trimmed = value.trim();
  if (options.required && !trimmed) {
    throw new TraceSyncError('InvalidRequest', `${field} is required`);
  }
  return trimmed;
};

const readAccessMode = (value: unknown): AccessMode | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isAccessMode(value)) {
    throw new TraceSyncError('InvalidRequest', 'accessMode must be "graph" or "powershell"');
  }
  return value;
};

export const parseCredentials = (value: unknown): TenantCredentials => {
  if (!isRecord(value)) {
    throw new TraceSyncError('InvalidRequest', 'credentials must be an object');
  }
  const directoryTenantId = readText(value.directoryTenantId, 'credentials.directoryTenantId', { required: true }) ?? '';
  const clientId = readText(value.clientId, 'credentials.clientId', { required: true }) ?? '';
  if (value.authMethod === 'certificate') {
    return {
      authMethod: 'certificate',
      directoryTenantId,
      clientId,
      certificatePath: readText(value.certificatePath, 'credentials.certificatePath', { required: true }) ?? '',
      certificateThumbprint:
        readText(value.certificateThumbprint, 'credentials.certificateThumbprint', { required: true }) ?? '',
      certificatePassword: readText(value.certificatePassword, 'credentials.certificatePassword', { required: false }),
    };
  }
  if (value.authMethod === 'secret') {
    return {
      authMethod: 'secret',
      directoryTenantId,
      clientId,
      clientSecret: readText(value.clientSecret, 'credentials.clientSecret', { required: true }) ?? '',
    };
  }
  throw new TraceSyncError('InvalidRequest', 'credentials.authMethod must be "certificate" or "secret"');
};

const credentialParams = (credentials: TenantCredentials): QueryParam[] => [
  credentials.authMethod,
  credentials.directoryTenantId,
  credentials.clientId,
  credentials.authMethod === 'secret' ? credentials.clientSecret : null,
  credentials.authMethod === 'certificate' ? credentials.certificatePath : null,
  credentials.authMethod === 'certificate' ? credentials.certificateThumbprint : null,
  credentials.authMethod === 'certificate' ? credentials.certificatePassword ?? null : null,
];

export const createTenant = async (input: TenantInput): Promise<TenantRecord> => {
  const name = readText(input.name, 'name', { required: true }) ?? '';
  const accessMode = readAccessMode(input.accessMode) ?? 'graph';
  const organization = readText(input.organization, 'organization', { required: false }) ?? '';
  const credentials = parseCredentials(input.credentials);
  if (accessMode === 'powershell' && !organization) {
    throw new TraceSyncError('InvalidRequest', 'organization is required for the powershell access mode');
  }
  const isActive = input.isActive === undefined ? true : input.isActive === true;

  const result = await query<TenantRow>(
    `INSERT INTO tenants (
        name, access_mode, organization, is_active,
        auth_method, directory_tenant_id, client_id, client_secret,
        certificate_path, certificate_thumbprint, certificate_password
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      RETURNING ${TENANT_COLUMNS}`,
    [name, accessMode, organization, isActive, ...credentialParams(credentials)],
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error('tenant insert returned no row');
  }
  return toTenantRecord(row);
};

export const updateTenant = async (tenantId: string, input: TenantInput): Promise<TenantRecord> => {
  const values: QueryParam[] = [tenantId];
  const setClauses: string[] = [];

  const name = readText(input.name, 'name', { required: false });
  if (name !== undefined) {
    if (!name) {
      throw new TraceSyncError('InvalidRequest', 'name must not be empty');
    }
    values.push(name);
    setClauses.push(`name = $${values.length}`);
  }
  const accessMode = readAccessMode(input.accessMode);
  if (accessMode !== undefined) {
    values.push(accessMode);
    setClauses.push(`access_mode = $${values.length}`);
  }
  const organization = readText(input.organization, 'organization', { required: false });
  if (organization !== undefined) {
    values.push(organization);
    setClauses.push(`organization = $${values.length}`);
  }
  if (input.isActive !== undefined) {
    if (typeof input.isActive !== 'boolean') {
      throw new TraceSyncError('InvalidRequest', 'isActive must be a boolean');
    }
    values.push(input.isActive);
    setClauses.push(`is_active = $${values.length}`);
  }
  if (input.credentials !== undefined) {
    const columns = [
      'auth_method',
      'directory_tenant_id',
      'client_id',
      'client_secret',
      'certificate_path',
      'certificate_thumbprint',
      'certificate_password',
    ];
    credentialParams(parseCredentials(input.credentials)).forEach((param, index) => {
      values.push(param);
      setClauses.push(`${columns[index]} = $${values.length}`);
    });
  }

  setClauses.push('updated_at = NOW()');
  let row: TenantRow | undefined;
  try {
    const result = await query<TenantRow>(
      `UPDATE tenants SET ${setClauses.join(', ')} WHERE id = $1 RETURNING ${TENANT_COLUMNS}`,
      values,
    );
    row = result.rows[0];
  } catch (error) {
    if (!isInvalidTextError(error)) {
      throw error;
    }
  }
  if (!row) {
    throw new TraceSyncError('NotFound', 'tenant not found');
  }
  return toTenantRecord(row);
};

export const deleteTenant = async (tenantId: string): Promise<void> => {
  let deleted = 0;
  try {
    deleted = (await query('DELETE FROM tenants WHERE id = $1', [tenantId])).rowCount ?? 0;
  } catch (error) {
    if (!isInvalidTextError(error)) {
      throw error;
    }
  }
  if (deleted === 0) {
    throw new TraceSyncError('NotFound', 'tenant not found');
  }
};

/** Administrative view of a tenant; secrets are replaced by presence flags. */
export const toPublicTenant = (tenant: TenantRecord) => {
  const { credentials } = tenant;
  return {
    id: tenant.id,
    name: tenant.name,
    accessMode: tenant.accessMode,
    organization: tenant.organization,
    isActive: tenant.isActive,
    ownedDomains: tenant.ownedDomains,
    domainsLastUpdatedAt: tenant.domainsLastUpdatedAt,
    createdAt: tenant.createdAt,
    updatedAt: tenant.updatedAt,
    credentials: credentials.authMethod === 'secret'
      ? {
        authMethod: credentials.authMethod,
        directoryTenantId: credentials.directoryTenantId,
        clientId: credentials.clientId,
        hasClientSecret: Boolean(credentials.clientSecret),
      }
      : {
        authMethod: credentials.authMethod,
        directoryTenantId: credentials.directoryTenantId,
        clientId: credentials.clientId,
        certificatePath: credentials.certificatePath,
        certificateThumbprint: credentials.certificateThumbprint,
        hasCertificatePassword: Boolean(credentials.certificatePassword),
      },
  };
};
