import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { toPoolConfig } from './index.js';
import { loadDotEnv } from '../config/env.js';
import { loadAppConfig, type DatabaseConfig } from '../config/index.js';

const MIGRATIONS_TABLE = 'schema_migrations';
const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

export interface Migration {
  id: number;
  name: string;
  filename: string;
  sql: string;
}

async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getExecutedMigrations(client: pg.PoolClient): Promise<Set<string>> {
  const result = await client.query<{ name: string }>(
    `SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY id`
  );
  return new Set(result.rows.map((row) => row.name));
}

/**
 * Pick `NNN_name.sql` files out of a directory listing, in id order.
 */
export function selectMigrationFiles(files: string[]): Array<{ id: number; filename: string }> {
  const selected: Array<{ id: number; filename: string }> = [];
  for (const filename of files) {
    const match = filename.match(/^(\d+)_.+\.sql$/);
    if (!match?.[1]) continue;
    selected.push({ id: parseInt(match[1], 10), filename });
  }
  return selected.sort((a, b) => a.id - b.id || a.filename.localeCompare(b.filename));
}

export async function loadMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  const migrations: Migration[] = [];

  for (const { id, filename } of selectMigrationFiles(files)) {
    migrations.push({
      id,
      name: filename.replace(/\.sql$/, ''),
      filename,
      sql: await readFile(join(dir, filename), 'utf-8'),
    });
  }

  return migrations;
}

/**
 * Apply every migration not yet recorded in `schema_migrations`, each in its own transaction.
 */
export async function runMigrations(database: DatabaseConfig): Promise<void> {
  const pool = new pg.Pool(toPoolConfig(database));
  const client = await pool.connect();

  try {
    await ensureMigrationsTable(client);

    const executed = await getExecutedMigrations(client);
    const pending = (await loadMigrations()).filter((m) => !executed.has(m.name));

    if (pending.length === 0) {
      console.log('No pending migrations');
      return;
    }

    for (const migration of pending) {
      console.log(`Running migration: ${migration.filename}`);
      await client.query('BEGIN');
      try {
        await client.query(migration.sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [migration.name]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    }

    console.log(`Applied ${pending.length} migration(s)`);
  } finally {
    client.release();
    await pool.end();
  }
}

export async function showMigrationStatus(database: DatabaseConfig): Promise<void> {
  const pool = new pg.Pool(toPoolConfig(database));
  const client = await pool.connect();

  try {
    await ensureMigrationsTable(client);
    const executed = await getExecutedMigrations(client);
    for (const migration of await loadMigrations()) {
      console.log(`  ${executed.has(migration.name) ? '✓' : '○'} ${migration.filename}`);
    }
  } finally {
    client.release();
    await pool.end();
  }
}

const isEntrypoint = process.argv[1] === fileURLToPath(import.meta.url);

if (isEntrypoint) {
  loadDotEnv();
  const command = process.argv[2];
  const task = async (): Promise<void> => {
    const { database } = loadAppConfig();
    await (command === 'status' ? showMigrationStatus(database) : runMigrations(database));
  };
  task().catch((err: unknown) => {
    console.error('Migration failed:', err);
    process.exit(1);
  });
}
