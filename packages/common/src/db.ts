import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Pool } from 'pg';

export function createPgPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

/** `db/migrations` at the repository root. */
export function defaultMigrationsDir(): string {
  return fileURLToPath(new URL('../../../db/migrations', import.meta.url));
}

/**
 * Applies every `*.sql` file not yet recorded in `schema_migrations`, in
 * filename order, each inside its own transaction. Resolves to the files
 * applied by this call.
 */
export async function runMigrations(pool: Pool, migrationsDir = defaultMigrationsDir()): Promise<string[]> {
  await pool.query(`
    create table if not exists schema_migrations (
      id serial primary key,
      filename text not null unique,
      applied_at timestamptz not null default now()
    )
  `);

  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort((a, b) => a.localeCompare(b));
  const applied: string[] = [];

  for (const file of files) {
    const check = await pool.query<{ exists: boolean }>(
      'select exists(select 1 from schema_migrations where filename = $1) as exists',
      [file]
    );

    if (check.rows[0]?.exists) {
      continue;
    }

    const sql = await readFile(path.join(migrationsDir, file), 'utf8');
    const client = await pool.connect();

    try {
      await client.query('begin');
      await client.query(sql);
      await client.query('insert into schema_migrations(filename) values ($1)', [file]);
      await client.query('commit');
      applied.push(file);
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  return applied;
}
