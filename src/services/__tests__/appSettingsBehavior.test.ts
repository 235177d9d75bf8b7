import assert from 'node:assert/strict';
import {
  assertValidSettings,
  claimScheduledPullDate,
  DEFAULT_APP_SETTINGS,
  parseSettingsPatch,
  pgSettingsStore,
} from '../appSettings.js';
import { TraceSyncError } from '../errors.js';
import { finish, test, withMockedQueries } from '../../../tests/support/harness.js';

const invalid = (pattern: RegExp) => (error: unknown) =>
  error instanceof TraceSyncError && error.kind === 'InvalidSettings' && pattern.test(error.message);

const settingsRow = {
  auto_refresh_domains: false,
  domain_refresh_hours: 12,
  scheduled_pull_enabled: true,
  scheduled_pull_hour: 3,
  scheduled_pull_minute: 15,
  updated_at: new Date('2024-01-05T00:00:00Z'),
  updated_by: 'ops',
};

await test('accepts settings on the range edges', () => {
  assertValidSettings({ domainRefreshHours: 1, scheduledPullHour: 0, scheduledPullMinute: 0 });
  assertValidSettings({ domainRefreshHours: 168, scheduledPullHour: 23, scheduledPullMinute: 59 });
  assertValidSettings(DEFAULT_APP_SETTINGS);
});

await test('rejects out-of-range or fractional settings', () => {
  assert.throws(() => assertValidSettings({ domainRefreshHours: 169 }), invalid(/domainRefreshHours/));
  assert.throws(() => assertValidSettings({ domainRefreshHours: 1.5 }), invalid(/domainRefreshHours/));
  assert.throws(() => assertValidSettings({ scheduledPullHour: 24 }), invalid(/scheduledPullHour/));
  assert.throws(() => assertValidSettings({ scheduledPullMinute: -1 }), invalid(/scheduledPullMinute/));
});

await test('parses a settings patch from a request body', () => {
  assert.deepEqual(parseSettingsPatch({ autoRefreshDomains: false, scheduledPullHour: 6 }), {
    autoRefreshDomains: false,
    scheduledPullHour: 6,
  });
  assert.deepEqual(parseSettingsPatch({}), {});
});

await test('rejects malformed settings patches', () => {
  assert.throws(() => parseSettingsPatch(null), invalid(/must be an object/));
  assert.throws(() => parseSettingsPatch({ autoRefreshDomains: 'yes' }), invalid(/autoRefreshDomains must be a boolean/));
  assert.throws(() => parseSettingsPatch({ scheduledPullHour: '6' }), invalid(/scheduledPullHour must be a number/));
  assert.throws(() => parseSettingsPatch({ retentionDays: 30 }), invalid(/unknown setting retentionDays/));
  assert.throws(() => parseSettingsPatch({ scheduledPullMinute: 75 }), invalid(/between 0 and 59/));
});

await test('creates the settings row on first read', async () => {
  await withMockedQueries(
    [
      {
        check: (call) => {
          assert.match(call.text, /ON CONFLICT \(id\) DO NOTHING/);
          assert.deepEqual(call.params, [true, 24, true, 1, 0]);
        },
      },
      { rows: [settingsRow] },
    ],
    async () => {
      assert.deepEqual(await pgSettingsStore.get(), {
        autoRefreshDomains: false,
        domainRefreshHours: 12,
        scheduledPullEnabled: true,
        scheduledPullHour: 3,
        scheduledPullMinute: 15,
        updatedAt: new Date('2024-01-05T00:00:00Z'),
        updatedBy: 'ops',
      });
    },
  );
});

await test('merges a patch over the stored settings and records the actor', async () => {
  await withMockedQueries(
    [
      {},
      { rows: [settingsRow] },
      {
        rows: [{ ...settingsRow, scheduled_pull_hour: 6, updated_by: 'alice' }],
        check: (call) => {
          assert.match(call.text, /UPDATE app_settings/);
          assert.deepEqual(call.params, [false, 12, true, 6, 15, 'alice']);
        },
      },
    ],
    async () => {
      const updated = await pgSettingsStore.update({ scheduledPullHour: 6 }, 'alice');
      assert.equal(updated.scheduledPullHour, 6);
      assert.equal(updated.updatedBy, 'alice');
    },
  );
});

await test('rejects an invalid update before touching the database', async () => {
  await withMockedQueries([], async () => {
    await assert.rejects(pgSettingsStore.update({ domainRefreshHours: 0 }, 'alice'), invalid(/domainRefreshHours/));
  });
});

await test('claims a scheduled pull date once', async () => {
  await withMockedQueries(
    [
      { rows: [{ id: 1 }], check: (call) => assert.deepEqual(call.params, ['2024-01-10']) },
      { rows: [] },
    ],
    async () => {
      assert.equal(await claimScheduledPullDate('2024-01-10'), true);
      assert.equal(await claimScheduledPullDate('2024-01-10'), false);
    },
  );
});

finish();
