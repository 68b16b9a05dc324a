import {
  createLogger,
  createPgPool,
  GitHubAppClientFactory,
  parseEnv,
  parseFixerArgs,
  parsePrivateKey,
  runMigrations,
  TriageStore
} from '@fixgate/common';

import { GitHubPullRequestService } from './github.js';
import { TriageOrchestrator } from './orchestrator.js';
import { startSessionWorker } from './worker.js';
import { localWorkspaceFactory } from './workspace.js';

const logger = createLogger('worker');

async function main() {
  const env = parseEnv();
  const pool = createPgPool(env.DATABASE_URL);

  if (env.AUTO_MIGRATE) {
    const applied = await runMigrations(pool);
    logger.info({ applied }, 'migrations complete');
  }

  const pullRequests =
    env.GITHUB_APP_ID && env.GITHUB_APP_PRIVATE_KEY
      ? new GitHubPullRequestService(
          new GitHubAppClientFactory({
            appId: env.GITHUB_APP_ID,
            privateKey: parsePrivateKey(env.GITHUB_APP_PRIVATE_KEY)
          })
        )
      : undefined;

  if (!pullRequests) {
    logger.warn({}, 'GitHub App not configured; branches are committed locally without pull requests');
  }

  const store = new TriageStore(pool);
  const orchestrator = new TriageOrchestrator({
    store,
    workspaces: localWorkspaceFactory({
      buildTimeoutMs: env.BUILD_TIMEOUT_MS,
      scanReportPath: env.SCAN_REPORT_PATH,
      scanCommand: env.SCAN_COMMAND,
      fixer: env.FIXER_BIN
        ? { bin: env.FIXER_BIN, args: parseFixerArgs(env.FIXER_ARGS), timeoutMs: env.FIXER_TIMEOUT_MS }
        : undefined,
      pullRequests,
      logger
    }),
    reviewPolicy: env.REVIEW_POLICY,
    commitMode: env.COMMIT_MODE,
    fixConcurrency: env.FIX_CONCURRENCY,
    validateAfterApply: env.VALIDATE_AFTER_APPLY,
    logger
  });

  const runtime = startSessionWorker({
    redisUrl: env.REDIS_URL,
    concurrency: env.WORKER_CONCURRENCY,
    orchestrator,
    logger
  });

  const shutdown = async () => {
    await runtime.worker.close();
    await store.close();
  };

  process.on('SIGINT', async () => {
    await shutdown();
    process.exit(0);
  });

  process.on('SIGTERM', async () => {
    await shutdown();
    process.exit(0);
  });
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'worker startup failed');
  process.exit(1);
});
