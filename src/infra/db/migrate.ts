import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';
import dotenv from 'dotenv';
import { createLogger } from '../logger.js';
import { createPool } from './pool.js';

const MIGRATIONS_DIR = join(fileURLToPath(new URL('.', import.meta.url)), 'migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: Pool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply pending SQL migrations in version order. Returns the versions applied.
 */
export async function migrate(pool: Pool, dir: string = MIGRATIONS_DIR): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }
  return pending.map((m) => m.version);
}

// Run if called directly
if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  dotenv.config();
  const logger = createLogger({ name: 'migrate' });
  const pool = createPool(process.env.DATABASE_URL, logger);

  migrate(pool)
    .then((versions) => {
      if (versions.length === 0) {
        logger.info('No pending migrations');
      } else {
        logger.info({ versions }, 'Migrations applied');
      }
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Migration failed');
      process.exitCode = 1;
    })
    .finally(() => {
      void pool.end();
    });
}
