import { parseArgs } from 'node:util';
import { pool } from '../src/db/pool.js';
import { discoverAndStoreDomains } from '../src/services/domainDiscovery.js';
import { describeError } from '../src/services/errors.js';
import { ingestionDeps } from '../src/services/runtime.js';

const usage = `Usage: npm run discover-domains -- (--tenant <id> | --all) [--overwrite] [--dry-run]

Lists verified domains from the directory and stores them as the tenant's owned domains.
A tenant that already has domains is only updated with --overwrite.`;

async function main() {
  const { values } = parseArgs({
    options: {
      tenant: { type: 'string' },
      all: { type: 'boolean', default: false },
      overwrite: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });
  if (values.help || (!values.tenant && !values.all)) {
    console.log(usage);
    return;
  }

  const tenants = values.tenant
    ? [await ingestionDeps.tenants.getTenant(values.tenant)].filter((tenant) => tenant !== null)
    : await ingestionDeps.tenants.listTenants({ activeOnly: true });
  if (tenants.length === 0) {
    console.error('No matching tenants');
    process.exitCode = 1;
    return;
  }

  for (const tenant of tenants) {
    try {
      const result = await discoverAndStoreDomains(tenant, ingestionDeps, {
        overwrite: values.overwrite === true,
        dryRun: values['dry-run'] === true,
      });
      const verb = result.dryRun ? 'would store' : 'stored';
      console.log(`${tenant.name}: ${verb} ${result.domains.length} verified of ${result.totalListed} listed`);
      console.log(`  current:    ${result.previous.join(', ') || '(none)'}`);
      console.log(`  discovered: ${result.domains.join(', ') || '(none)'}`);
    } catch (error) {
      process.exitCode = 1;
      console.error(`${tenant.name}: ${describeError(error)}`);
    }
  }
}

main()
  .catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  })
  .finally(() => pool.end());
