import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { runMigrations } from 'graphile-worker';
import { env } from '../src/config/env.js';
import { isPgError, pool } from '../src/db/pool.js';

const MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

const isIgnorableDuplicateConstraintError = (error: unknown) =>
  isPgError(error) && error.code === '42710' && error.message.includes('already exists');

const appliedMigrations = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  const result = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
  return new Set(result.rows.map((row) => row.name));
};

async function run() {
  const applied = await appliedMigrations();
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    if (applied.has(file)) {
      continue;
    }
    const sql = readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
    try {
      await pool.query(sql);
    } catch (error) {
      if (!isIgnorableDuplicateConstraintError(error)) {
        throw error;
      }
      console.warn(`[migrate] duplicate constraint in ${file}; continuing`);
    }
    await pool.query('INSERT INTO schema_migrations (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [file]);
    console.info(`[migrate] applied ${file}`);
  }

  // The API checks worker heartbeats and enqueues jobs before any worker may have started.
  await runMigrations({ connectionString: env.databaseUrl });
  console.info('[migrate] job queue schema ready');
  await pool.end();
}

run().catch((err) => {
  console.error('Migration failed', err);
  process.exit(1);
});
