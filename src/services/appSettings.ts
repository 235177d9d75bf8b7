import { query } from '../db/pool.js';
import { isRecord } from '../shared/json.js';
import type { AppSettings } from '../shared/types.js';
import { TraceSyncError } from './errors.js';

export const DEFAULT_APP_SETTINGS: AppSettings = {
  autoRefreshDomains: true,
  domainRefreshHours: 24,
  scheduledPullEnabled: true,
  scheduledPullHour: 1,
  scheduledPullMinute: 0,
  updatedAt: null,
  updatedBy: '',
};

export type AppSettingsPatch = Partial<Omit<AppSettings, 'updatedAt' | 'updatedBy'>>;

export interface SettingsStore {
  get(): Promise<AppSettings>;
  update(patch: AppSettingsPatch, actor: string): Promise<AppSettings>;
}

const isIntInRange = (value: number, min: number, max: number) =>
  Number.isInteger(value) && value >= min && value <= max;

export const assertValidSettings = (settings: AppSettingsPatch) => {
  if (settings.domainRefreshHours !== undefined && !isIntInRange(settings.domainRefreshHours, 1, 168)) {
    throw new TraceSyncError('InvalidSettings', 'domainRefreshHours must be an integer between 1 and 168');
  }
  if (settings.scheduledPullHour !== undefined && !isIntInRange(settings.scheduledPullHour, 0, 23)) {
    throw new TraceSyncError('InvalidSettings', 'scheduledPullHour must be an integer between 0 and 23');
  }
  if (settings.scheduledPullMinute !== undefined && !isIntInRange(settings.scheduledPullMinute, 0, 59)) {
    throw new TraceSyncError('InvalidSettings', 'scheduledPullMinute must be an integer between 0 and 59');
  }
};

const BOOLEAN_FIELDS = ['autoRefreshDomains', 'scheduledPullEnabled'] as const;
const NUMBER_FIELDS = ['domainRefreshHours', 'scheduledPullHour', 'scheduledPullMinute'] as const;

/** Reads an administrative request body into a validated patch; unknown keys are rejected. */
export const parseSettingsPatch = (body: unknown): AppSettingsPatch => {
  if (!isRecord(body)) {
    throw new TraceSyncError('InvalidSettings', 'settings body must be an object');
  }
  const patch: AppSettingsPatch = {};
  for (const key of Object.keys(body)) {
    const value = body[key];
    const booleanField = BOOLEAN_FIELDS.find((field) => field === key);
    if (booleanField) {
      if (typeof value !== 'boolean') {
        throw new TraceSyncError('InvalidSettings', `${key} must be a boolean`);
      }
      patch[booleanField] = value;
      continue;
    }
    const numberField = NUMBER_FIELDS.find((field) => field === key);
    if (numberField) {
      if (typeof value !== 'number') {
        throw new TraceSyncError('InvalidSettings', `${key} must be a number`);
      }
      patch[numberField] = value;
      continue;
    }
    throw new TraceSyncError('InvalidSettings', `unknown setting ${key}`);
  }
  assertValidSettings(patch);
  return patch;
};

type SettingsRow = {
  auto_refresh_domains: boolean;
  domain_refresh_hours: number;
  scheduled_pull_enabled: boolean;
  scheduled_pull_hour: number;
  scheduled_pull_minute: number;
  updated_at: Date | null;
  updated_by: string | null;
};

const toSettings = (row: SettingsRow): AppSettings => ({
  autoRefreshDomains: row.auto_refresh_domains,
  domainRefreshHours: Number(row.domain_refresh_hours),
  scheduledPullEnabled: row.scheduled_pull_enabled,
  scheduledPullHour: Number(row.scheduled_pull_hour),
  scheduledPullMinute: Number(row.scheduled_pull_minute),
  updatedAt: row.updated_at,
  updatedBy: row.updated_by ?? '',
});

const SETTINGS_COLUMNS = `auto_refresh_domains, domain_refresh_hours, scheduled_pull_enabled,
  scheduled_pull_hour, scheduled_pull_minute, updated_at, updated_by`;

export const pgSettingsStore: SettingsStore = {
  async get() {
    await query(
      `INSERT INTO app_settings (id, auto_refresh_domains, domain_refresh_hours, scheduled_pull_enabled,
                                 scheduled_pull_hour, scheduled_pull_minute)
       VALUES (1, $1, $2, $3, $4, $5)
       ON CONFLICT (id) DO NOTHING`,
      [
        DEFAULT_APP_SETTINGS.autoRefreshDomains,
        DEFAULT_APP_SETTINGS.domainRefreshHours,
        DEFAULT_APP_SETTINGS.scheduledPullEnabled,
        DEFAULT_APP_SETTINGS.scheduledPullHour,
        DEFAULT_APP_SETTINGS.scheduledPullMinute,
      ],
    );
    const result = await query<SettingsRow>(`SELECT ${SETTINGS_COLUMNS} FROM app_settings WHERE id = 1`);
    const row = result.rows[0];
    return row ? toSettings(row) : { ...DEFAULT_APP_SETTINGS };
  },

  async update(patch, actor) {
    assertValidSettings(patch);
    const current = await pgSettingsStore.get();
    const next = { ...current, ...patch };
    const result = await query<SettingsRow>(
      `UPDATE app_settings
          SET auto_refresh_domains = $1,
              domain_refresh_hours = $2,
              scheduled_pull_enabled = $3,
              scheduled_pull_hour = $4,
              scheduled_pull_minute = $5,
              updated_at = NOW(),
              updated_by = $6
        WHERE id = 1
        RETURNING ${SETTINGS_COLUMNS}`,
      [
        next.autoRefreshDomains,
        next.domainRefreshHours,
        next.scheduledPullEnabled,
        next.scheduledPullHour,
        next.scheduledPullMinute,
        actor,
      ],
    );
    const row = result.rows[0];
    return row ? toSettings(row) : next;
  },
};

/**
 * Marks the scheduled pull for `dateKey` (YYYY-MM-DD, UTC) as fired. Only one
 * caller per date gets `true`, whichever worker process it runs in.
 */
export const claimScheduledPullDate = async (dateKey: string): Promise<boolean> => {
  const result = await query<{ id: number }>(
    `UPDATE app_settings
        SET last_scheduled_pull_on = $1::date
      WHERE id = 1
        AND last_scheduled_pull_on IS DISTINCT FROM $1::date
      RETURNING id`,
    [dateKey],
  );
  return result.rows.length > 0;
};
