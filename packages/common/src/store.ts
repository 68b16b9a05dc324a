import { Pool } from 'pg';
import { z } from 'zod';

import { ProposedFix, ValidationResult } from '@fixgate/domain';

import { proposedFixSchema, sessionStatusSchema, validationResultSchema, violationSchema } from './schemas.js';
import {
  CreateSessionInput,
  EventRecord,
  PublicationInput,
  ReviewUpdate,
  SessionRecord,
  SessionStatus,
  SessionStore
} from './types.js';

type Row = Record<string, unknown>;

const toDate = (value: unknown): Date => (value instanceof Date ? value : new Date(String(value)));

const nullableString = (value: unknown): string | null => (value === null || value === undefined ? null : String(value));

export const mapSession = (row: Row): SessionRecord => ({
  id: Number(row.id),
  projectRoot: String(row.project_root),
  category: nullableString(row.category),
  status: sessionStatusSchema.parse(row.status),
  violations: z.array(violationSchema).parse(row.violations_json ?? []),
  fixedRules: z.array(z.string()).parse(row.fixed_rules_json ?? []),
  branch: nullableString(row.branch),
  pullRequestUrl: nullableString(row.pull_request_url),
  validation: validationResultSchema.nullable().parse(row.validation_json ?? null),
  errorText: nullableString(row.error_text),
  createdAt: toDate(row.created_at),
  updatedAt: toDate(row.updated_at)
});

export const mapFix = (row: Row): ProposedFix => proposedFixSchema.parse(row.fix_json);

export const mapEvent = (row: Row): EventRecord => ({
  id: Number(row.id),
  sessionId: Number(row.session_id),
  source: String(row.source),
  eventType: String(row.event_type),
  payload: z.record(z.unknown()).parse(row.payload_json ?? {}),
  createdAt: toDate(row.created_at)
});

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: number) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class TriageStore implements SessionStore {
  constructor(private readonly pool: Pool) {}

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    const result = await this.pool.query<Row>(
      `
      insert into sessions (project_root, category, status, violations_json, fixed_rules_json)
      values ($1, $2, 'queued', $3::jsonb, $4::jsonb)
      returning *
      `,
      [input.projectRoot, input.category, JSON.stringify(input.violations), JSON.stringify(input.fixedRules)]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Session insert returned no row');
    }

    return mapSession(row);
  }

  async getSession(sessionId: number): Promise<SessionRecord | null> {
    const result = await this.pool.query<Row>('select * from sessions where id = $1', [sessionId]);
    const row = result.rows[0];
    return row ? mapSession(row) : null;
  }

  async updateSessionStatus(sessionId: number, status: SessionStatus, errorText?: string): Promise<void> {
    await this.pool.query(
      `
      update sessions
      set
        status = $2,
        error_text = case when $2 = 'failed' then coalesce($3, error_text) else null end,
        updated_at = now()
      where id = $1
      `,
      [sessionId, status, errorText ?? null]
    );
  }

  async setSessionCategory(sessionId: number, category: string | null): Promise<void> {
    await this.pool.query('update sessions set category = $2, updated_at = now() where id = $1', [sessionId, category]);
  }

  async replaceFixes(sessionId: number, fixes: readonly ProposedFix[]): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      await client.query('delete from reviews where session_id = $1', [sessionId]);
      await client.query('delete from fixes where session_id = $1', [sessionId]);

      for (const [position, fix] of fixes.entries()) {
        await client.query(
          `
          insert into fixes (session_id, position, fix_id, file_path, rule_id, fix_json)
          values ($1, $2, $3, $4, $5, $6::jsonb)
          `,
          [sessionId, position, fix.id, fix.filePath, fix.ruleId, JSON.stringify(fix)]
        );
      }

      await client.query('commit');
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  async listFixes(sessionId: number): Promise<ProposedFix[]> {
    const result = await this.pool.query<Row>('select fix_json from fixes where session_id = $1 order by position asc', [
      sessionId
    ]);
    return result.rows.map(mapFix);
  }

  async saveReview(sessionId: number, record: unknown): Promise<void> {
    await this.pool.query(
      `
      insert into reviews (session_id, record_json)
      values ($1, $2::jsonb)
      on conflict (session_id)
      do update set record_json = excluded.record_json, updated_at = now()
      `,
      [sessionId, JSON.stringify(record)]
    );
  }

  async getReview(sessionId: number): Promise<unknown | null> {
    const result = await this.pool.query<Row>('select record_json from reviews where session_id = $1', [sessionId]);
    return result.rows[0]?.record_json ?? null;
  }

  async updateReview<T>(sessionId: number, mutate: (current: unknown | null) => ReviewUpdate<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      // The session row is locked so a review without a stored record is serialised too.
      const current = await client.query<Row>(
        `
        select r.record_json
        from sessions s
        left join reviews r on r.session_id = s.id
        where s.id = $1
        for update of s
        `,
        [sessionId]
      );
      const { record, result } = mutate(current.rows[0]?.record_json ?? null);
      await client.query(
        `
        insert into reviews (session_id, record_json)
        values ($1, $2::jsonb)
        on conflict (session_id)
        do update set record_json = excluded.record_json, updated_at = now()
        `,
        [sessionId, JSON.stringify(record)]
      );
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  async recordPublication(sessionId: number, input: PublicationInput): Promise<void> {
    await this.pool.query(
      'update sessions set branch = $2, pull_request_url = $3, updated_at = now() where id = $1',
      [sessionId, input.branch, input.pullRequestUrl]
    );
  }

  async recordValidation(sessionId: number, result: ValidationResult): Promise<void> {
    await this.pool.query('update sessions set validation_json = $2::jsonb, updated_at = now() where id = $1', [
      sessionId,
      JSON.stringify(result)
    ]);
  }

  async insertEvent(sessionId: number, source: string, eventType: string, payload: Record<string, unknown>): Promise<EventRecord> {
    const result = await this.pool.query<Row>(
      `
      insert into events (session_id, source, event_type, payload_json)
      values ($1, $2, $3, $4::jsonb)
      returning *
      `,
      [sessionId, source, eventType, JSON.stringify(payload)]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Event insert returned no row');
    }

    return mapEvent(row);
  }

  async listEvents(sessionId: number): Promise<EventRecord[]> {
    const result = await this.pool.query<Row>('select * from events where session_id = $1 order by id asc', [sessionId]);
    return result.rows.map(mapEvent);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
