import { z } from 'zod';

const flag = z
  .preprocess((value) => value === '1' || value === 'true' || value === true, z.boolean())
  .default(false);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  WEB_PORT: z.coerce.number().default(3000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),
  AUTO_MIGRATE: flag,
  PROJECT_ROOT_ALLOWLIST: z.string().optional(),
  FIX_CONCURRENCY: z.coerce.number().int().positive().default(3),
  FIXER_BIN: z.string().optional(),
  FIXER_ARGS: z.string().default(''),
  FIXER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  REVIEW_POLICY: z.enum(['manual', 'approve_changed', 'approve_all']).default('manual'),
  COMMIT_MODE: z.enum(['per_rule', 'single']).default('per_rule'),
  BUILD_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  VALIDATE_AFTER_APPLY: flag,
  SCAN_COMMAND: z.string().optional(),
  SCAN_REPORT_PATH: z.string().default('build/reports/governance/violations.json'),
  GITHUB_APP_ID: z.string().optional(),
  GITHUB_APP_PRIVATE_KEY: z.string().optional()
});

export type AppEnv = z.output<typeof envSchema>;

export type ReviewPolicy = AppEnv['REVIEW_POLICY'];

export function parseEnv(input: NodeJS.ProcessEnv = process.env): AppEnv {
  return envSchema.parse(input);
}

export function parsePrivateKey(raw: string): string {
  return raw.replace(/\\n/g, '\n');
}

/** Comma-separated absolute directories; an empty list allows any root. */
export function parseProjectRootAllowlist(value?: string): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim().replace(/\/+$/, ''))
    .filter(Boolean);
}

export function isProjectRootAllowed(projectRoot: string, allowlist: readonly string[]): boolean {
  if (allowlist.length === 0) {
    return true;
  }

  const normalized = projectRoot.replace(/\/+$/, '');
  return allowlist.some((root) => normalized === root || normalized.startsWith(`${root}/`));
}

/** Splits `FIXER_ARGS` on whitespace. */
export function parseFixerArgs(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}
