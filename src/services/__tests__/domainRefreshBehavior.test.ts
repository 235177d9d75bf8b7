import assert from 'node:assert/strict';
import { discoverAndStoreDomains, discoverDomains } from '../domainDiscovery.js';
import { getOwnedDomains, setOwnedDomains } from '../domainRegistry.js';
import { ensureFresh, refreshTrigger } from '../domainRefresh.js';
import { TraceSyncError } from '../errors.js';
import { finish, quietly, test } from '../../../tests/support/harness.js';
import {
  FakeAuthProvider,
  FakeDirectory,
  makeSettings,
  makeTenant,
  MemoryTenantStore,
} from '../../../tests/support/memoryStores.js';

const NOW = new Date('2024-01-10T12:00:00Z');
const HOUR = 60 * 60 * 1000;

const verified = [
  { id: 'Contoso.com', isVerified: true },
  { id: 'contoso.onmicrosoft.com', isVerified: true },
  { id: 'pending.contoso.com', isVerified: false },
];

await test('registry refuses to replace a configured set without overwrite', async () => {
  const tenants = new MemoryTenantStore([makeTenant({ ownedDomains: ['contoso.com'] })]);
  await assert.rejects(
    setOwnedDomains(tenants, 'tenant-1', ['fabrikam.com'], { overwrite: false, now: NOW }),
    (error: unknown) => error instanceof TraceSyncError && error.kind === 'AlreadyConfigured',
  );
  assert.deepEqual([...(await getOwnedDomains(tenants, 'tenant-1'))], ['contoso.com']);

  const stored = await setOwnedDomains(tenants, 'tenant-1', ['Fabrikam.com', 'fabrikam.com'], { overwrite: true, now: NOW });
  assert.deepEqual(stored, ['fabrikam.com']);
  assert.deepEqual(tenants.tenants.get('tenant-1')?.domainsLastUpdatedAt, NOW);
});

await test('registry reports unknown tenants', async () => {
  const tenants = new MemoryTenantStore();
  await assert.rejects(getOwnedDomains(tenants, 'nope'), /tenant nope not found/);
  await assert.rejects(
    setOwnedDomains(tenants, 'nope', ['contoso.com'], { overwrite: true }),
    (error: unknown) => error instanceof TraceSyncError && error.kind === 'NotFound',
  );
});

await test('discovery keeps only verified domains', async () => {
  const auth = new FakeAuthProvider();
  const result = await discoverDomains(makeTenant(), { auth, directory: new FakeDirectory(verified) });
  assert.deepEqual(result, { ok: true, domains: ['contoso.com', 'contoso.onmicrosoft.com'], totalListed: 3 });
  assert.deepEqual(auth.requests, ['graph']);
});

await test('discovery is unsupported for the shell access mode and makes no calls', async () => {
  const auth = new FakeAuthProvider();
  const directory = new FakeDirectory(verified);
  const result = await discoverDomains(makeTenant({ accessMode: 'powershell' }), { auth, directory });
  assert.equal(result.ok, false);
  assert.equal(result.ok ? '' : result.error.kind, 'UnsupportedAccessMethod');
  assert.equal(directory.calls, 0);
  assert.deepEqual(auth.requests, []);
});

await test('discovery retries transient directory failures', async () => {
  let calls = 0;
  const directory = {
    async listDomains() {
      calls += 1;
      if (calls === 1) {
        throw new TraceSyncError('TransientNetworkError', 'busy');
      }
      return verified;
    },
  };
  const result = await discoverDomains(makeTenant(), {
    auth: new FakeAuthProvider(),
    directory,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    wait: async () => undefined,
  });
  assert.equal(result.ok, true);
  assert.equal(calls, 2);
});

await test('operator discovery stores through the overwrite guard', async () => {
  const tenant = makeTenant({ ownedDomains: ['old.com'] });
  const tenants = new MemoryTenantStore([tenant]);
  const deps = { auth: new FakeAuthProvider(), directory: new FakeDirectory(verified), tenants };

  await assert.rejects(
    discoverAndStoreDomains(tenant, deps, { overwrite: false, dryRun: false, now: NOW }),
    (error: unknown) => error instanceof TraceSyncError && error.kind === 'AlreadyConfigured',
  );

  const dryRun = await discoverAndStoreDomains(tenant, deps, { overwrite: false, dryRun: true, now: NOW });
  assert.deepEqual(dryRun, {
    tenantId: 'tenant-1',
    domains: ['contoso.com', 'contoso.onmicrosoft.com'],
    previous: ['old.com'],
    totalListed: 3,
    dryRun: true,
    stored: false,
  });
  assert.deepEqual(tenants.tenants.get('tenant-1')?.ownedDomains, ['old.com']);

  const stored = await discoverAndStoreDomains(tenant, deps, { overwrite: true, dryRun: false, now: NOW });
  assert.equal(stored.stored, true);
  assert.deepEqual(tenants.tenants.get('tenant-1')?.ownedDomains, ['contoso.com', 'contoso.onmicrosoft.com']);
});

await test('operator discovery refuses to store an empty verified set', async () => {
  const tenant = makeTenant();
  const deps = {
    auth: new FakeAuthProvider(),
    directory: new FakeDirectory([{ id: 'pending.com', isVerified: false }]),
    tenants: new MemoryTenantStore([tenant]),
  };
  await assert.rejects(
    discoverAndStoreDomains(tenant, deps, { overwrite: true, dryRun: false }),
    /directory returned no verified domains; nothing stored/,
  );
});

await test('staleness uses a strict comparison against the refresh interval', () => {
  const settings = makeSettings({ domainRefreshHours: 24 });
  const base = { ownedDomains: ['contoso.com'] };
  assert.equal(refreshTrigger({ ...base, domainsLastUpdatedAt: new Date(NOW.getTime() - 24 * HOUR - 1000) }, settings, NOW), 'stale');
  assert.equal(refreshTrigger({ ...base, domainsLastUpdatedAt: new Date(NOW.getTime() - 24 * HOUR) }, settings, NOW), null);
  assert.equal(refreshTrigger({ ...base, domainsLastUpdatedAt: new Date(NOW.getTime() - 23 * HOUR - 59 * 60 * 1000) }, settings, NOW), null);
  assert.equal(refreshTrigger({ ...base, domainsLastUpdatedAt: null }, settings, NOW), 'stale');
  assert.equal(refreshTrigger({ ownedDomains: [], domainsLastUpdatedAt: NOW }, settings, NOW), 'missing');
});

await test('refresh does nothing when auto refresh is disabled', async () => {
  const directory = new FakeDirectory(verified);
  const tenant = makeTenant();
  const outcome = await ensureFresh(
    tenant,
    makeSettings({ autoRefreshDomains: false }),
    { auth: new FakeAuthProvider(), directory, tenants: new MemoryTenantStore([tenant]) },
    NOW,
  );
  assert.deepEqual(outcome, { status: 'skipped', reason: 'disabled' });
  assert.equal(directory.calls, 0);
});

await test('refresh skips fresh domains', async () => {
  const directory = new FakeDirectory(verified);
  const tenant = makeTenant({ ownedDomains: ['contoso.com'], domainsLastUpdatedAt: new Date(NOW.getTime() - HOUR) });
  const outcome = await ensureFresh(
    tenant,
    makeSettings(),
    { auth: new FakeAuthProvider(), directory, tenants: new MemoryTenantStore([tenant]) },
    NOW,
  );
  assert.deepEqual(outcome, { status: 'skipped', reason: 'fresh' });
  assert.equal(directory.calls, 0);
});

await test('refresh fills missing domains and stamps the refresh time', async () => {
  const tenant = makeTenant();
  const tenants = new MemoryTenantStore([tenant]);
  const outcome = await quietly(() => ensureFresh(
    tenant,
    makeSettings(),
    { auth: new FakeAuthProvider(), directory: new FakeDirectory(verified), tenants },
    NOW,
  ));
  assert.deepEqual(outcome, { status: 'refreshed', trigger: 'missing', domains: ['contoso.com', 'contoso.onmicrosoft.com'] });
  assert.deepEqual(tenants.tenants.get('tenant-1')?.domainsLastUpdatedAt, NOW);
});

await test('refresh replaces stale domains', async () => {
  const tenant = makeTenant({ ownedDomains: ['old.com'], domainsLastUpdatedAt: new Date(NOW.getTime() - 25 * HOUR) });
  const tenants = new MemoryTenantStore([tenant]);
  const outcome = await quietly(() => ensureFresh(
    tenant,
    makeSettings(),
    { auth: new FakeAuthProvider(), directory: new FakeDirectory(verified), tenants },
    NOW,
  ));
  assert.equal(outcome.status, 'refreshed');
  assert.deepEqual(tenants.tenants.get('tenant-1')?.ownedDomains, ['contoso.com', 'contoso.onmicrosoft.com']);
});

await test('keeps domains an operator stored after the tenant was read', async () => {
  const tenant = makeTenant();
  const tenants = new MemoryTenantStore([{ ...tenant, ownedDomains: ['manual.example'], domainsLastUpdatedAt: NOW }]);
  const outcome = await quietly(() => ensureFresh(
    tenant,
    makeSettings(),
    { auth: new FakeAuthProvider(), directory: new FakeDirectory([{ id: 'discovered.example', isVerified: true }]), tenants },
    new Date(NOW.getTime() + HOUR),
  ));
  assert.deepEqual(outcome, {
    status: 'skipped',
    reason: 'already_configured',
    detail: 'AlreadyConfigured: tenant already has owned domains; pass overwrite to replace them',
  });
  assert.deepEqual(tenants.tenants.get('tenant-1')?.ownedDomains, ['manual.example']);
  assert.deepEqual(tenants.tenants.get('tenant-1')?.domainsLastUpdatedAt, NOW);
});

await test('a permission failure leaves stale domains untouched', async () => {
  const lastUpdated = new Date(NOW.getTime() - 25 * HOUR);
  const tenant = makeTenant({ ownedDomains: ['old.com'], domainsLastUpdatedAt: lastUpdated });
  const tenants = new MemoryTenantStore([tenant]);
  const directory = new FakeDirectory(new TraceSyncError('PermissionDenied', 'Directory domains 403 : denied'));
  const outcome = await quietly(() => ensureFresh(tenant, makeSettings(), { auth: new FakeAuthProvider(), directory, tenants }, NOW));
  assert.deepEqual(outcome, {
    status: 'skipped',
    reason: 'discovery_failed',
    detail: 'Permission denied: Directory domains 403 : denied',
    errorKind: 'PermissionDenied',
  });
  assert.deepEqual(tenants.tenants.get('tenant-1')?.ownedDomains, ['old.com']);
  assert.deepEqual(tenants.tenants.get('tenant-1')?.domainsLastUpdatedAt, lastUpdated);
});

await test('an empty verified set is not stored', async () => {
  const tenant = makeTenant();
  const tenants = new MemoryTenantStore([tenant]);
  const outcome = await quietly(() => ensureFresh(
    tenant,
    makeSettings(),
    { auth: new FakeAuthProvider(), directory: new FakeDirectory([]), tenants },
    NOW,
  ));
  assert.deepEqual(outcome, { status: 'skipped', reason: 'no_verified_domains' });
  assert.equal(tenants.tenants.get('tenant-1')?.domainsLastUpdatedAt, null);
});

await test('refresh rejects out-of-range settings', async () => {
  const tenant = makeTenant();
  await assert.rejects(
    ensureFresh(tenant, makeSettings({ domainRefreshHours: 0 }), {
      auth: new FakeAuthProvider(),
      directory: new FakeDirectory(verified),
      tenants: new MemoryTenantStore([tenant]),
    }, NOW),
    (error: unknown) => error instanceof TraceSyncError && error.kind === 'InvalidSettings',
  );
});

finish();
