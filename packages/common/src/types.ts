import { ProposedFix, ValidationResult, Violation } from '@fixgate/domain';

export type SessionStatus =
  | 'queued'
  | 'triaging'
  | 'awaiting_review'
  | 'applying'
  | 'applied'
  | 'validating'
  | 'completed'
  | 'failed';

export interface SessionRecord {
  id: number;
  projectRoot: string;
  /** Requested category, or the one triage picked when none was requested. */
  category: string | null;
  status: SessionStatus;
  violations: Violation[];
  fixedRules: string[];
  branch: string | null;
  pullRequestUrl: string | null;
  validation: ValidationResult | null;
  errorText: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateSessionInput {
  projectRoot: string;
  category: string | null;
  fixedRules: string[];
  violations: Violation[];
}

export interface PublicationInput {
  branch: string | null;
  pullRequestUrl: string | null;
}

export interface EventRecord {
  id: number;
  sessionId: number;
  source: string;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: Date;
}

/** What a review mutation stores and what it hands back to the caller. */
export interface ReviewUpdate<T> {
  record: unknown;
  result: T;
}

/**
 * Persistence seam used by the worker and the HTTP API. `TriageStore` is the
 * Postgres implementation.
 */
export interface SessionStore {
  createSession(input: CreateSessionInput): Promise<SessionRecord>;
  getSession(sessionId: number): Promise<SessionRecord | null>;
  updateSessionStatus(sessionId: number, status: SessionStatus, errorText?: string): Promise<void>;
  setSessionCategory(sessionId: number, category: string | null): Promise<void>;
  replaceFixes(sessionId: number, fixes: readonly ProposedFix[]): Promise<void>;
  listFixes(sessionId: number): Promise<ProposedFix[]>;
  saveReview(sessionId: number, record: unknown): Promise<void>;
  /** Raw stored review record; callers validate it through `ReviewLedger.restore`. */
  getReview(sessionId: number): Promise<unknown | null>;
  /**
   * Reads the stored review record, passes it to `mutate` and saves what it
   * returns. Updates for one session run one at a time; when `mutate` throws
   * nothing is saved and the error propagates.
   */
  updateReview<T>(sessionId: number, mutate: (current: unknown | null) => ReviewUpdate<T>): Promise<T>;
  recordPublication(sessionId: number, input: PublicationInput): Promise<void>;
  recordValidation(sessionId: number, result: ValidationResult): Promise<void>;
  insertEvent(sessionId: number, source: string, eventType: string, payload: Record<string, unknown>): Promise<EventRecord>;
  listEvents(sessionId: number): Promise<EventRecord[]>;
}
