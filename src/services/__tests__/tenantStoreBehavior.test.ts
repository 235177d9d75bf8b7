import assert from 'node:assert/strict';
import { TraceSyncError } from '../errors.js';
import {
  createTenant,
  deleteTenant,
  parseCredentials,
  pgTenantStore,
  toPublicTenant,
  updateTenant,
} from '../tenantStore.js';
import { finish, test, withMockedQueries } from '../../../tests/support/harness.js';
import { makeTenant } from '../../../tests/support/memoryStores.js';

const invalidRequest = (pattern: RegExp) => (error: unknown) =>
  error instanceof TraceSyncError && error.kind === 'InvalidRequest' && pattern.test(error.message);

const tenantRow = (overrides: Record<string, unknown> = {}) => ({
  id: 'tenant-1',
  name: 'Contoso',
  auth_method: 'secret',
  directory_tenant_id: 'dir-1',
  client_id: 'client-1',
  client_secret: 'test-secret',
  certificate_path: null,
  certificate_thumbprint: null,
  certificate_password: null,
  access_mode: 'graph',
  organization: null,
  is_active: true,
  owned_domains: null,
  domains_last_updated_at: null,
  created_at: new Date('2024-01-01T00:00:00Z'),
  updated_at: new Date('2024-01-01T00:00:00Z'),
  ...overrides,
});

await test('maps a tenant row', async () => {
  await withMockedQueries([{ rows: [tenantRow()] }], async () => {
    const tenant = await pgTenantStore.getTenant('tenant-1');
    assert.ok(tenant);
    assert.deepEqual(tenant.credentials, {
      authMethod: 'secret',
      directoryTenantId: 'dir-1',
      clientId: 'client-1',
      clientSecret: 'test-secret',
    });
    assert.deepEqual(tenant.ownedDomains, []);
    assert.equal(tenant.organization, '');
  });
});

await test('lists only active tenants when asked', async () => {
  await withMockedQueries(
    [{ rows: [], check: (call) => assert.deepEqual(call.params, [true]) }],
    async () => {
      assert.deepEqual(await pgTenantStore.listTenants({ activeOnly: true }), []);
    },
  );
});

await test('replaces owned domains through a guarded update', async () => {
  const at = new Date('2024-01-10T00:00:00Z');
  await withMockedQueries(
    [
      {
        rows: [{ id: 'tenant-1' }],
        check: (call) => {
          assert.match(call.text, /\(\$4::boolean OR cardinality\(owned_domains\) = 0\)/);
          assert.deepEqual(call.params, ['tenant-1', ['contoso.com'], at, false]);
        },
      },
      { rows: [] },
      { rows: [{ id: 'tenant-1' }] },
      { rows: [] },
      { rows: [] },
    ],
    async () => {
      assert.equal(await pgTenantStore.replaceOwnedDomains('tenant-1', ['contoso.com'], { overwrite: false, updatedAt: at }), 'updated');
      assert.equal(await pgTenantStore.replaceOwnedDomains('tenant-1', ['contoso.com'], { overwrite: false, updatedAt: at }), 'conflict');
      assert.equal(await pgTenantStore.replaceOwnedDomains('gone', ['contoso.com'], { overwrite: true, updatedAt: at }), 'missing');
    },
  );
});

await test('parses secret and certificate credentials', () => {
  assert.deepEqual(
    parseCredentials({ authMethod: 'secret', directoryTenantId: ' dir-1 ', clientId: 'client-1', clientSecret: 'test-secret' }),
    { authMethod: 'secret', directoryTenantId: 'dir-1', clientId: 'client-1', clientSecret: 'test-secret' },
  );
  assert.deepEqual(
    parseCredentials({
      authMethod: 'certificate',
      directoryTenantId: 'dir-1',
      clientId: 'client-1',
      certificatePath: '/certs/app.pem',
      certificateThumbprint: 'ab'.repeat(20),
    }),
    {
      authMethod: 'certificate',
      directoryTenantId: 'dir-1',
      clientId: 'client-1',
      certificatePath: '/certs/app.pem',
      certificateThumbprint: 'ab'.repeat(20),
      certificatePassword: undefined,
    },
  );
});

await test('rejects incomplete credentials', () => {
  assert.throws(() => parseCredentials('secret'), invalidRequest(/credentials must be an object/));
  assert.throws(
    () => parseCredentials({ authMethod: 'secret', directoryTenantId: 'dir-1', clientId: 'client-1' }),
    invalidRequest(/credentials.clientSecret is required/),
  );
  assert.throws(
    () => parseCredentials({ authMethod: 'password', directoryTenantId: 'dir-1', clientId: 'client-1' }),
    invalidRequest(/authMethod must be/),
  );
  assert.throws(
    () => parseCredentials({ authMethod: 'secret', directoryTenantId: '  ', clientId: 'client-1', clientSecret: 'x' }),
    invalidRequest(/directoryTenantId is required/),
  );
});

await test('creates a tenant', async () => {
  await withMockedQueries(
    [{
      rows: [tenantRow({ organization: 'contoso.onmicrosoft.com', access_mode: 'powershell' })],
      check: (call) => {
        assert.match(call.text, /INSERT INTO tenants/);
        assert.deepEqual(call.params, [
          'Contoso',
          'powershell',
          'contoso.onmicrosoft.com',
          true,
          'secret',
          'dir-1',
          'client-1',
          'test-secret',
          null,
          null,
          null,
        ]);
      },
    }],
    async () => {
      const tenant = await createTenant({
        name: ' Contoso ',
        accessMode: 'powershell',
        organization: 'contoso.onmicrosoft.com',
        credentials: { authMethod: 'secret', directoryTenantId: 'dir-1', clientId: 'client-1', clientSecret: 'test-secret' },
      });
      assert.equal(tenant.accessMode, 'powershell');
    },
  );
});

await test('requires an organization for the shell access mode', async () => {
  await withMockedQueries([], async () => {
    await assert.rejects(
      createTenant({
        name: 'Contoso',
        accessMode: 'powershell',
        credentials: { authMethod: 'secret', directoryTenantId: 'dir-1', clientId: 'client-1', clientSecret: 'test-secret' },
      }),
      invalidRequest(/organization is required/),
    );
    await assert.rejects(createTenant({ name: 'Contoso', accessMode: 'pop3' }), invalidRequest(/accessMode must be/));
  });
});

await test('updates only the provided fields', async () => {
  await withMockedQueries(
    [{
      rows: [tenantRow({ name: 'Renamed', is_active: false })],
      check: (call) => {
        assert.ok(call.text.startsWith('UPDATE tenants SET name = $2, is_active = $3, updated_at = NOW() WHERE id = $1 RETURNING'));
        assert.deepEqual(call.params, ['tenant-1', 'Renamed', false]);
      },
    }],
    async () => {
      const tenant = await updateTenant('tenant-1', { name: 'Renamed', isActive: false });
      assert.equal(tenant.isActive, false);
    },
  );
});

await test('reports updates and deletes of unknown tenants as NotFound', async () => {
  const notFound = (error: unknown) => error instanceof TraceSyncError && error.kind === 'NotFound';
  await withMockedQueries([{ rows: [] }, { rowCount: 0 }], async () => {
    await assert.rejects(updateTenant('gone', { name: 'X' }), notFound);
    await assert.rejects(deleteTenant('gone'), notFound);
  });
});

await test('treats malformed tenant ids as unknown tenants', async () => {
  const malformed = () => Object.assign(new Error('invalid input syntax for type uuid: "abc"'), { code: '22P02' });
  const notFound = (error: unknown) => error instanceof TraceSyncError && error.kind === 'NotFound';
  await withMockedQueries(
    [{ error: malformed() }, { error: malformed() }, { error: malformed() }, { error: malformed() }],
    async () => {
      assert.equal(await pgTenantStore.getTenant('abc'), null);
      assert.equal(
        await pgTenantStore.replaceOwnedDomains('abc', ['contoso.com'], { overwrite: true, updatedAt: new Date('2024-01-10T00:00:00Z') }),
        'missing',
      );
      await assert.rejects(updateTenant('abc', { name: 'X' }), notFound);
      await assert.rejects(deleteTenant('abc'), notFound);
    },
  );
});

await test('does not hide other database errors behind NotFound', async () => {
  await withMockedQueries([{ error: new Error('connection terminated') }], async () => {
    await assert.rejects(pgTenantStore.getTenant('tenant-1'), /connection terminated/);
  });
});

await test('hides secrets in the public view', () => {
  const view = toPublicTenant(makeTenant());
  assert.deepEqual(view.credentials, {
    authMethod: 'secret',
    directoryTenantId: 'dir-tenant-1',
    clientId: 'client-1',
    hasClientSecret: true,
  });
  assert.equal(JSON.stringify(view).includes('test-secret'), false);
});

finish();
