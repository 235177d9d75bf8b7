import { parseArgs } from 'node:util';
import { env } from '../src/config/env.js';
import { pool } from '../src/db/pool.js';
import { describeError } from '../src/services/errors.js';
import { planPull } from '../src/services/pullPlan.js';
import { ingestionDeps, settingsStore, traceIngestion } from '../src/services/runtime.js';
import { pullAllTenants } from '../src/services/scheduler.js';

const usage = `Usage: npm run pull-traces -- [--tenant <id>] [--start YYYY-MM-DD --end YYYY-MM-DD | --days <n>] [--actor <name>] [--dry-run]

Pulls message traces for one tenant, or every active tenant when --tenant is omitted.
Without a range the previous UTC day is pulled; --days <n> pulls the last n whole UTC days.
--dry-run prints the tenants and range without pulling.`;

async function main() {
  const { values } = parseArgs({
    options: {
      tenant: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      days: { type: 'string' },
      actor: { type: 'string', default: 'cli' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });
  if (values.help) {
    console.log(usage);
    return;
  }

  const plan = await planPull(
    ingestionDeps.tenants,
    { tenant: values.tenant, start: values.start, end: values.end, days: values.days },
    { now: new Date(), defaultLookbackDays: env.pull.defaultLookbackDays },
  );
  const { range, tenants } = plan;
  for (const warning of plan.warnings) {
    console.warn(`Warning: ${warning}`);
  }
  console.log(`Pulling ${range.start.toISOString()} .. ${range.end.toISOString()} for ${tenants.length} tenant(s)`);
  if (values['dry-run']) {
    for (const tenant of tenants) {
      console.log(`  ${tenant.name} (${tenant.id}) via ${tenant.accessMode}`);
    }
    console.log('Dry run: nothing was pulled');
    return;
  }

  const settings = await settingsStore.get();
  const triggeredBy = values.actor ?? 'cli';
  const results = await pullAllTenants(traceIngestion, tenants, { range, triggerType: 'Manual', triggeredBy, settings });

  let failures = 0;
  for (const result of results) {
    if (!result.ok) {
      failures += 1;
      console.log(`  ${result.tenantName}: not started (${result.error})`);
      continue;
    }
    const { run, skipped } = result.outcome;
    if (run.status === 'Failed') {
      failures += 1;
    }
    console.log(
      `  ${result.tenantName}: ${run.status} pulled=${run.counts.pulled} new=${run.counts.inserted} updated=${run.counts.updated} skipped=${skipped}`
      + (run.errorDetail ? ` error="${run.errorDetail}"` : ''),
    );
  }
  if (failures > 0) {
    process.exitCode = 1;
  }
}

main()
  .catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  })
  .finally(() => pool.end());
