import { createLogger, createPgPool, parseEnv, parseProjectRootAllowlist, runMigrations, TriageStore } from '@fixgate/common';

import { BullSessionScheduler } from './scheduler.js';
import { buildServer } from './server.js';

const logger = createLogger('web');

async function main() {
  const env = parseEnv();
  const pool = createPgPool(env.DATABASE_URL);

  if (env.AUTO_MIGRATE) {
    const applied = await runMigrations(pool);
    logger.info({ applied }, 'migrations complete');
  }

  const store = new TriageStore(pool);
  const scheduler = new BullSessionScheduler(env.REDIS_URL);

  const app = buildServer({
    store,
    scheduler,
    projectRootAllowlist: parseProjectRootAllowlist(env.PROJECT_ROOT_ALLOWLIST)
  });

  const close = async () => {
    await app.close();
    await scheduler.close();
    await store.close();
  };

  process.on('SIGINT', async () => {
    await close();
    process.exit(0);
  });

  process.on('SIGTERM', async () => {
    await close();
    process.exit(0);
  });

  await app.listen({ port: env.WEB_PORT, host: '0.0.0.0' });
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'web startup failed');
  process.exit(1);
});
