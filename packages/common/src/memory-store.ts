import { ProposedFix, ValidationResult } from '@fixgate/domain';

import {
  CreateSessionInput,
  EventRecord,
  PublicationInput,
  ReviewUpdate,
  SessionRecord,
  SessionStatus,
  SessionStore
} from './types.js';

/** Process-local `SessionStore` for tests and single-process runs without Postgres. */
export class MemorySessionStore implements SessionStore {
  private sessionSeq = 1;
  private eventSeq = 1;

  readonly sessions = new Map<number, SessionRecord>();
  readonly fixes = new Map<number, ProposedFix[]>();
  readonly reviews = new Map<number, unknown>();
  readonly events: EventRecord[] = [];
  private readonly reviewQueues = new Map<number, Promise<void>>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    const now = this.clock();
    const session: SessionRecord = {
      id: this.sessionSeq++,
      projectRoot: input.projectRoot,
      category: input.category,
      status: 'queued',
      violations: [...input.violations],
      fixedRules: [...input.fixedRules],
      branch: null,
      pullRequestUrl: null,
      validation: null,
      errorText: null,
      createdAt: now,
      updatedAt: now
    };

    this.sessions.set(session.id, session);
    return { ...session };
  }

  async getSession(sessionId: number): Promise<SessionRecord | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async updateSessionStatus(sessionId: number, status: SessionStatus, errorText?: string): Promise<void> {
    this.update(sessionId, (session) => ({
      ...session,
      status,
      errorText: status === 'failed' ? errorText ?? session.errorText : null
    }));
  }

  async setSessionCategory(sessionId: number, category: string | null): Promise<void> {
    this.update(sessionId, (session) => ({ ...session, category }));
  }

  async replaceFixes(sessionId: number, fixes: readonly ProposedFix[]): Promise<void> {
    this.reviews.delete(sessionId);
    this.fixes.set(sessionId, [...fixes]);
  }

  async listFixes(sessionId: number): Promise<ProposedFix[]> {
    return [...(this.fixes.get(sessionId) ?? [])];
  }

  async saveReview(sessionId: number, record: unknown): Promise<void> {
    this.reviews.set(sessionId, JSON.parse(JSON.stringify(record)));
  }

  async getReview(sessionId: number): Promise<unknown | null> {
    return this.reviews.get(sessionId) ?? null;
  }

  async updateReview<T>(sessionId: number, mutate: (current: unknown | null) => ReviewUpdate<T>): Promise<T> {
    const previous = this.reviewQueues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(async () => {
      const { record, result } = mutate(await this.getReview(sessionId));
      await this.saveReview(sessionId, record);
      return result;
    });
    // Later updates wait on this one even when it fails.
    this.reviewQueues.set(
      sessionId,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }

  async recordPublication(sessionId: number, input: PublicationInput): Promise<void> {
    this.update(sessionId, (session) => ({ ...session, branch: input.branch, pullRequestUrl: input.pullRequestUrl }));
  }

  async recordValidation(sessionId: number, result: ValidationResult): Promise<void> {
    this.update(sessionId, (session) => ({ ...session, validation: result }));
  }

  async insertEvent(sessionId: number, source: string, eventType: string, payload: Record<string, unknown>): Promise<EventRecord> {
    const event: EventRecord = {
      id: this.eventSeq++,
      sessionId,
      source,
      eventType,
      payload,
      createdAt: this.clock()
    };

    this.events.push(event);
    return event;
  }

  async listEvents(sessionId: number): Promise<EventRecord[]> {
    return this.events.filter((event) => event.sessionId === sessionId);
  }

  private update(sessionId: number, change: (session: SessionRecord) => SessionRecord): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }

    this.sessions.set(sessionId, { ...change(session), updatedAt: this.clock() });
  }
}
