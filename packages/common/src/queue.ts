export const SESSION_QUEUE_NAME = 'fixgate-sessions';

export type TriageSessionJob = {
  type: 'triage_session';
  sessionId: number;
};

export type ApplySessionJob = {
  type: 'apply_session';
  sessionId: number;
  /** Overrides the generated `governance/auto-fix-*` branch name. */
  branch?: string;
};

export type ValidateSessionJob = {
  type: 'validate_session';
  sessionId: number;
};

export type QueueJobPayload = TriageSessionJob | ApplySessionJob | ValidateSessionJob;

export const queueJobName = (payload: QueueJobPayload): QueueJobPayload['type'] => payload.type;

export const queueJobId = (payload: QueueJobPayload): string => {
  switch (payload.type) {
    case 'triage_session':
      return `triage:${payload.sessionId}`;
    case 'apply_session':
      return `apply:${payload.sessionId}`;
    case 'validate_session':
      return `validate:${payload.sessionId}`;
  }
};

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: Record<string, never>;
  maxRetriesPerRequest: null;
}

/** bullmq connection options for a `redis://` or `rediss://` URL. */
export function connectionFromRedisUrl(redisUrl: string): RedisConnectionOptions {
  const parsed = new URL(redisUrl);
  const db = parsed.pathname && parsed.pathname !== '/' ? Number(parsed.pathname.replace('/', '')) : undefined;

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: db === undefined || Number.isNaN(db) ? undefined : db,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null
  };
}
