import Fastify, { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import { isProjectRootAllowed, SessionRecord, SessionStatus, SessionStore } from '@fixgate/common';
import {
  ConsistencyValidator,
  defaultTaxonomy,
  DiffAuditor,
  parseViolationReport,
  ProposedFix,
  ReviewLedger,
  ReviewTransitionError,
  Taxonomy,
  UnknownFixError,
  ViolationClassifier
} from '@fixgate/domain';

import { SessionScheduler } from './scheduler.js';
import {
  applyBodySchema,
  bulkDecisionBodySchema,
  consistencyBodySchema,
  createSessionBodySchema,
  DecisionBody,
  decisionBodySchema,
  sessionParamsSchema
} from './types.js';

export interface BuildServerOptions {
  store: SessionStore;
  scheduler: SessionScheduler;
  taxonomy?: Taxonomy;
  /** Project roots sessions may target; empty allows any. */
  projectRootAllowlist?: readonly string[];
  logger?: boolean;
}

/** A pipeline stage is running; the session cannot be changed underneath it. */
const BUSY_STATUSES: ReadonlySet<SessionStatus> = new Set(['queued', 'triaging', 'applying', 'validating']);

function invalidRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    error: 'Invalid request',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
  });
}

function applyDecision(ledger: ReviewLedger, body: DecisionBody): void {
  switch (body.action) {
    case 'approve':
      ledger.approve(body.fixId);
      break;
    case 'reject':
      ledger.reject(body.fixId);
      break;
    case 'skip':
      ledger.skip(body.fixId);
      break;
    case 'reopen':
      ledger.reopen(body.fixId);
      break;
  }

  if (body.comment) {
    ledger.addComment(body.fixId, body.comment);
  }
}

export function buildServer(options: BuildServerOptions): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? true });

  const taxonomy = options.taxonomy ?? defaultTaxonomy();
  const classifier = new ViolationClassifier(taxonomy);
  const allowlist = options.projectRootAllowlist ?? [];
  const auditor = new DiffAuditor();
  const consistency = new ConsistencyValidator();

  async function loadSession(params: unknown, reply: FastifyReply): Promise<SessionRecord | null> {
    const parsed = sessionParamsSchema.safeParse(params);
    if (!parsed.success) {
      reply.code(400).send({ error: 'Invalid session id' });
      return null;
    }

    const session = await options.store.getSession(parsed.data.id);
    if (!session) {
      reply.code(404).send({ error: 'Session not found' });
      return null;
    }

    return session;
  }

  function ledgerFor(fixes: readonly ProposedFix[], record: unknown | null): ReviewLedger {
    return record === null ? new ReviewLedger(fixes) : ReviewLedger.restore(fixes, record);
  }

  async function loadLedger(session: SessionRecord): Promise<ReviewLedger> {
    const fixes = await options.store.listFixes(session.id);
    return ledgerFor(fixes, await options.store.getReview(session.id));
  }

  /** Applies `change` to the latest stored review under the store's per-session lock. */
  async function updateLedger<T>(
    session: SessionRecord,
    change: (ledger: ReviewLedger) => T
  ): Promise<{ ledger: ReviewLedger; result: T }> {
    const fixes = await options.store.listFixes(session.id);
    return options.store.updateReview(session.id, (current) => {
      const ledger = ledgerFor(fixes, current);
      const result = change(ledger);
      return { record: ledger.toRecord(), result: { ledger, result } };
    });
  }

  function busy(session: SessionRecord, reply: FastifyReply): FastifyReply | null {
    if (!BUSY_STATUSES.has(session.status)) {
      return null;
    }
    return reply.code(409).send({ error: `Session is ${session.status}` });
  }

  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/sessions', async (request, reply) => {
    const parsed = createSessionBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return invalidRequest(reply, parsed.error);
    }

    const body = parsed.data;
    if (!isProjectRootAllowed(body.projectRoot, allowlist)) {
      return reply.code(403).send({ error: 'Project root not in allowlist' });
    }

    if (body.category !== undefined && taxonomy.category(body.category) === null) {
      return reply.code(400).send({ error: `Unknown category: ${body.category}` });
    }

    const violations = parseViolationReport(body.report);
    const session = await options.store.createSession({
      projectRoot: body.projectRoot,
      category: body.category ?? null,
      fixedRules: body.fixedRules,
      violations
    });

    await options.store.insertEvent(session.id, 'web', 'session_created', { violations: violations.length });
    await options.scheduler.enqueue({ type: 'triage_session', sessionId: session.id });

    return reply.code(202).send({ sessionId: session.id, violations: violations.length });
  });

  app.get('/sessions/:id', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const fixed = session.violations.filter((violation) => session.fixedRules.includes(violation.rule));

    return {
      id: session.id,
      projectRoot: session.projectRoot,
      category: session.category,
      status: session.status,
      branch: session.branch,
      pullRequestUrl: session.pullRequestUrl,
      validation: session.validation,
      error: session.errorText,
      createdAt: session.createdAt.toISOString(),
      updatedAt: session.updatedAt.toISOString(),
      progress: classifier.progress(session.violations, fixed),
      events: (await options.store.listEvents(session.id)).map((event) => ({
        type: event.eventType,
        source: event.source,
        payload: event.payload,
        createdAt: event.createdAt.toISOString()
      }))
    };
  });

  app.get('/sessions/:id/categories', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    return {
      ...classifier.exportReport(session.violations),
      subcategories: classifier.subcategorySummary(session.violations)
    };
  });

  app.get('/sessions/:id/fixes', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const ledger = await loadLedger(session);
    const fixes = await options.store.listFixes(session.id);
    const record = ledger.toRecord();

    return {
      summary: record.summary,
      comments: record.comments,
      fixes: fixes.map((fix) => {
        const diff = auditor.audit(fix);
        return {
          id: fix.id,
          filePath: fix.filePath,
          ruleId: fix.ruleId,
          ruleIds: fix.ruleIds,
          safety: fix.safety,
          complexity: fix.complexity,
          explanation: fix.explanation,
          relatedFiles: fix.relatedChanges.map((change) => change.filePath),
          decision: ledger.decisionOf(fix.id),
          severity: diff.severity,
          additions: diff.additions,
          deletions: diff.deletions,
          diff: diff.unifiedDiff
        };
      })
    };
  });

  app.post('/sessions/:id/decisions', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const parsed = decisionBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return invalidRequest(reply, parsed.error);
    }

    const conflict = busy(session, reply);
    if (conflict) {
      return conflict;
    }

    const body = parsed.data;
    try {
      const { ledger } = await updateLedger(session, (current) => applyDecision(current, body));
      return { fixId: body.fixId, decision: ledger.decisionOf(body.fixId), summary: ledger.summary() };
    } catch (error) {
      if (error instanceof UnknownFixError) {
        return reply.code(404).send({ error: error.message });
      }
      if (error instanceof ReviewTransitionError) {
        return reply.code(409).send({ error: error.message });
      }
      throw error;
    }
  });

  app.post('/sessions/:id/bulk', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const parsed = bulkDecisionBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return invalidRequest(reply, parsed.error);
    }

    const conflict = busy(session, reply);
    if (conflict) {
      return conflict;
    }

    const action = parsed.data.action;
    const { ledger, result: changed } = await updateLedger(session, (current) => {
      if (action === 'approve_all') {
        return current.approveAll();
      }
      if (action === 'approve_changed') {
        return current.approveChanged();
      }
      return current.rejectAll();
    });

    return { changed, summary: ledger.summary() };
  });

  app.post('/sessions/:id/apply', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const parsed = applyBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return invalidRequest(reply, parsed.error);
    }

    const conflict = busy(session, reply);
    if (conflict) {
      return conflict;
    }

    const ledger = await loadLedger(session);
    if (ledger.approvedFixes.length === 0) {
      return reply.code(409).send({ error: 'No approved fixes to apply' });
    }

    await options.store.updateSessionStatus(session.id, 'queued');
    await options.scheduler.enqueue({ type: 'apply_session', sessionId: session.id, branch: parsed.data.branch });

    return reply.code(202).send({ accepted: true, sessionId: session.id, approved: ledger.approvedFixes.length });
  });

  app.post('/sessions/:id/validate', async (request, reply) => {
    const session = await loadSession(request.params, reply);
    if (!session) {
      return reply;
    }

    const conflict = busy(session, reply);
    if (conflict) {
      return conflict;
    }

    if (session.category === null) {
      return reply.code(409).send({ error: 'Session has no category to validate' });
    }

    await options.store.updateSessionStatus(session.id, 'queued');
    await options.scheduler.enqueue({ type: 'validate_session', sessionId: session.id });

    return reply.code(202).send({ accepted: true, sessionId: session.id });
  });

  app.post('/consistency', async (request, reply) => {
    const parsed = consistencyBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return invalidRequest(reply, parsed.error);
    }

    const report = consistency.validate(
      parseViolationReport(parsed.data.specViolations),
      parseViolationReport(parsed.data.codeViolations),
      parsed.data.inventory
    );

    return {
      report: consistency.exportReport(report),
      recommendations: consistency.recommendFixes(report)
    };
  });

  return app;
}
