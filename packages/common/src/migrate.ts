import { createPgPool, defaultMigrationsDir, runMigrations } from './db.js';
import { parseEnv } from './env.js';
import { createLogger } from './logger.js';

const logger = createLogger('migrate');

async function main() {
  const env = parseEnv();
  const pool = createPgPool(env.DATABASE_URL);
  const migrationsDir = defaultMigrationsDir();

  try {
    const applied = await runMigrations(pool, migrationsDir);
    logger.info({ migrationsDir, applied }, 'migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'migration failed');
  process.exit(1);
});
