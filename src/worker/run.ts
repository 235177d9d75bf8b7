import { run, type TaskList } from 'graphile-worker';
import { env } from '../config/env.js';
import { query } from '../db/pool.js';
import { claimScheduledPullDate } from '../services/appSettings.js';
import { enqueuePull } from '../services/queue.js';
import { ingestionDeps, settingsStore } from '../services/runtime.js';
import { createSchedulerTick } from './maintenance.js';
import { discoverDomainsTask, pullTracesTask } from './taskHandlers.js';

const taskList: TaskList = {
  pullTraces: pullTracesTask,
  discoverDomains: discoverDomainsTask,
};

const unlockStaleWorkerLocks = async () => {
  const relationCheck = await query<{ rel: string | null }>(
    "SELECT to_regclass('graphile_worker._private_jobs') AS rel"
  );
  if (!relationCheck.rows[0]?.rel) {
    return;
  }

  const staleWorkers = await query<{ locked_by: string }>(`
    SELECT DISTINCT locked_by
      FROM graphile_worker._private_jobs
     WHERE locked_by IS NOT NULL
       AND locked_at IS NOT NULL
       AND locked_at < NOW() - INTERVAL '5 minutes'
  `);

  const workerIds = staleWorkers.rows
    .map((row) => row.locked_by)
    .filter((value): value is string => Boolean(value));

  if (workerIds.length === 0) {
    return;
  }

  await query('SELECT graphile_worker.force_unlock_workers($1::text[])', [workerIds]);
  console.warn(`Unlocked ${workerIds.length} stale Graphile worker lock(s)`);
};

const MAINTENANCE_INTERVAL_MS = 30_000;

const startMaintenanceLoops = () => {
  let running = false;
  const schedulerTick = createSchedulerTick({
    getSettings: () => settingsStore.get(),
    claimDate: claimScheduledPullDate,
    listActiveTenants: () => ingestionDeps.tenants.listTenants({ activeOnly: true }),
    enqueuePull,
  });

  const runMaintenanceTick = async () => {
    if (running) {
      return;
    }
    running = true;
    try {
      const reaped = await ingestionDeps.ledger.reapStaleRuns(new Date(Date.now() - env.pull.staleRunMs));
      if (reaped > 0) {
        console.info(`[maintenance] reaped stale pull runs: ${reaped}`);
      }
      await schedulerTick();
    } catch (error) {
      console.warn('[maintenance] tick failed', error);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void runMaintenanceTick();
  }, MAINTENANCE_INTERVAL_MS);
  timer.unref?.();
  void runMaintenanceTick();

  return () => clearInterval(timer);
};

async function main() {
  const stopMaintenance = startMaintenanceLoops();
  process.on('SIGINT', stopMaintenance);
  process.on('SIGTERM', stopMaintenance);

  try {
    await unlockStaleWorkerLocks();
  } catch (error) {
    console.warn('Failed to unlock stale Graphile worker locks', error);
  }

  await run({
    connectionString: env.databaseUrl,
    taskList,
    concurrency: env.worker.concurrency,
    pollInterval: 1000,
    schema: 'graphile_worker',
  });
}

main().catch((err) => {
  console.error('Worker stopped with error', err);
  process.exit(1);
});

process.on('SIGINT', () => {
  process.exit(0);
});

process.on('SIGTERM', () => {
  process.exit(0);
});
