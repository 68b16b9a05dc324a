import { createInterface } from 'node:readline/promises';

import { createLogger, createPgPool, parseEnv, TriageStore } from '@fixgate/common';

import { reviewSession, TerminalPrompt } from './review-session.js';

const logger = createLogger('review');

async function main() {
  const sessionId = Number(process.argv[2]);
  if (!Number.isInteger(sessionId) || sessionId <= 0) {
    throw new Error('Usage: review <sessionId>');
  }

  const env = parseEnv();
  const store = new TriageStore(createPgPool(env.DATABASE_URL));
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const report = await reviewSession(store, sessionId, new TerminalPrompt(rl));
    process.stdout.write(`\n${report}\n`);
  } finally {
    rl.close();
    await store.close();
  }
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'review failed');
  process.exit(1);
});
