import { parseArgs } from 'node:util';
import { pool } from '../src/db/pool.js';
import { describeError } from '../src/services/errors.js';
import { reclassifyTenantTraces } from '../src/services/reclassify.js';
import { ingestionDeps } from '../src/services/runtime.js';
import { topUnclassifiedDomains } from '../src/services/traceStore.js';

const usage = `Usage: npm run fix-directions -- (--tenant <id> | --all) [--dry-run] [--batch-size <n>] [--diagnose]

Recomputes the direction of stored traces against each tenant's current owned domains.
--diagnose lists the busiest domains among traces that are still Unknown.`;

async function main() {
  const { values } = parseArgs({
    options: {
      tenant: { type: 'string' },
      all: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      'batch-size': { type: 'string', default: '1000' },
      diagnose: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });
  if (values.help || (!values.tenant && !values.all)) {
    console.log(usage);
    return;
  }
  const batchSize = Number(values['batch-size']);
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error('--batch-size must be a positive integer');
  }

  const tenants = values.tenant
    ? [await ingestionDeps.tenants.getTenant(values.tenant)].filter((tenant) => tenant !== null)
    : await ingestionDeps.tenants.listTenants();

  for (const tenant of tenants) {
    if (tenant.ownedDomains.length === 0) {
      console.log(`${tenant.name}: no owned domains configured; every trace stays Unknown`);
    }
    const result = await reclassifyTenantTraces(tenant.id, ingestionDeps, {
      dryRun: values['dry-run'] === true,
      batchSize,
    });
    const verb = result.dryRun ? 'would change' : 'changed';
    console.log(`${tenant.name}: scanned ${result.scanned}, ${verb} ${result.changed}`);
    for (const direction of ['Inbound', 'Outbound', 'Internal', 'Unknown'] as const) {
      console.log(`  ${direction.padEnd(8)} ${String(result.before[direction]).padStart(8)} -> ${result.after[direction]}`);
    }
    if (values.diagnose) {
      const domains = await topUnclassifiedDomains(tenant.id);
      for (const entry of domains) {
        console.log(`  unknown ${entry.side.padEnd(9)} ${entry.domain} (${entry.count})`);
      }
    }
  }
}

main()
  .catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  })
  .finally(() => pool.end());
