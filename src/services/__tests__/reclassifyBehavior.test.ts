import assert from 'node:assert/strict';
import { TraceSyncError } from '../errors.js';
import { reclassifyTenantTraces } from '../reclassify.js';
import { finish, quietly, test } from '../../../tests/support/harness.js';
import { makeTenant, MemoryTenantStore, MemoryTraceStore, providerTrace } from '../../../tests/support/memoryStores.js';

const seed = async () => {
  const traces = new MemoryTraceStore();
  await traces.upsertBatch('tenant-1', [
    { ...providerTrace({ messageId: '<a@x>' }), direction: 'Unknown' },
    { ...providerTrace({ messageId: '<b@x>', sender: 'eve@fabrikam.com', recipient: 'alice@contoso.com' }), direction: 'Unknown' },
    { ...providerTrace({ messageId: '<c@x>', sender: 'eve@fabrikam.com', recipient: 'zed@other.org' }), direction: 'Unknown' },
    { ...providerTrace({ messageId: '<d@x>', recipient: 'carol@contoso.com' }), direction: 'Internal' },
  ]);
  await traces.upsertBatch('tenant-2', [{ ...providerTrace({ messageId: '<e@x>' }), direction: 'Unknown' }]);
  return traces;
};

const tenants = () => new MemoryTenantStore([
  makeTenant({ ownedDomains: ['contoso.com'] }),
  makeTenant({ id: 'tenant-2', ownedDomains: ['contoso.com'] }),
]);

await test('rewrites only directions that change, in batches', async () => {
  const traces = await seed();
  const result = await quietly(() => reclassifyTenantTraces('tenant-1', { tenants: tenants(), traces }, { batchSize: 3 }));

  assert.deepEqual(result, {
    tenantId: 'tenant-1',
    scanned: 4,
    changed: 2,
    dryRun: false,
    before: { Inbound: 0, Outbound: 0, Internal: 1, Unknown: 3 },
    after: { Inbound: 1, Outbound: 1, Internal: 1, Unknown: 1 },
  });
  assert.deepEqual(traces.list('tenant-1').map((trace) => trace.direction), ['Outbound', 'Inbound', 'Unknown', 'Internal']);
  assert.deepEqual(traces.list('tenant-2').map((trace) => trace.direction), ['Unknown']);
});

await test('reports changes without writing on a dry run', async () => {
  const traces = await seed();
  const result = await quietly(() => reclassifyTenantTraces('tenant-1', { tenants: tenants(), traces }, { dryRun: true }));

  assert.equal(result.changed, 2);
  assert.equal(result.dryRun, true);
  assert.deepEqual(traces.list('tenant-1').map((trace) => trace.direction), ['Unknown', 'Unknown', 'Unknown', 'Internal']);
});

await test('rejects an unknown tenant', async () => {
  await assert.rejects(
    reclassifyTenantTraces('missing', { tenants: tenants(), traces: new MemoryTraceStore() }),
    (error: unknown) => error instanceof TraceSyncError && error.kind === 'NotFound',
  );
});

finish();
