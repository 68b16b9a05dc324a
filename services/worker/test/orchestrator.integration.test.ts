import { describe, expect, it } from 'vitest';

import { MemorySessionStore, ReviewPolicy } from '@fixgate/common';

import { TriageOrchestrator } from '../src/orchestrator.js';
import { FakeBuild, FakeScanner, FakeWorkspace, secureRandomViolation, tokensFixed, tokensPath } from './fakes.js';

async function setup(options: { reviewPolicy?: ReviewPolicy; validateAfterApply?: boolean } = {}) {
  const store = new MemorySessionStore();
  const workspace = new FakeWorkspace();
  const orchestrator = new TriageOrchestrator({
    store,
    workspaces: () => workspace,
    reviewPolicy: options.reviewPolicy,
    validateAfterApply: options.validateAfterApply
  });
  const session = await store.createSession({
    projectRoot: '/srv/projects/app',
    category: null,
    fixedRules: [],
    violations: [secureRandomViolation()]
  });

  return { store, workspace, orchestrator, sessionId: session.id };
}

describe('TriageOrchestrator', () => {
  it('proposes fixes and waits for review under the manual policy', async () => {
    const { store, workspace, orchestrator, sessionId } = await setup();

    await orchestrator.handleJob({ type: 'triage_session', sessionId });

    const session = await store.getSession(sessionId);
    expect(session?.status).toBe('awaiting_review');
    expect(session?.category).toBe('OTHER');

    const fixes = await store.listFixes(sessionId);
    expect(fixes).toHaveLength(1);
    expect(fixes[0]?.id).toBe('fix-0001-batch');
    expect(fixes[0]?.filePath).toBe(tokensPath);
    expect(fixes[0]?.proposedContent).toBe(tokensFixed);

    expect(await store.getReview(sessionId)).toMatchObject({
      decisions: { 'fix-0001-batch': 'pending' },
      summary: { total: 1, pending: 1 }
    });
    expect(store.events.map((event) => event.eventType)).toEqual(['triage_started', 'triage_completed']);
    expect(workspace.vcs.commits).toEqual([]);
    expect(workspace.closed).toBe(1);
  });

  it('publishes approved fixes and opens a pull request against the starting branch', async () => {
    const { store, workspace, orchestrator, sessionId } = await setup();

    await orchestrator.handleJob({ type: 'triage_session', sessionId });
    await store.saveReview(sessionId, {
      decisions: { 'fix-0001-batch': 'approved' },
      comments: [],
      summary: { total: 1, approved: 1, rejected: 0, pending: 0, skipped: 0 }
    });
    await orchestrator.handleJob({ type: 'apply_session', sessionId, branch: 'governance/tokens' });

    const session = await store.getSession(sessionId);
    expect(session?.status).toBe('applied');
    expect(session?.branch).toBe('governance/tokens');
    expect(session?.pullRequestUrl).toBe('https://github.com/example/app/pull/1');

    expect(workspace.files.files.get(tokensPath)).toBe(tokensFixed);
    expect(workspace.vcs.commits).toHaveLength(1);
    expect(workspace.vcs.commits[0]?.files).toEqual([tokensPath]);
    expect(workspace.vcs.commits[0]?.message.split('\n')[0]).toBe(
      'fix(governance): [security-use-secure-random] Fix 1 violation(s)'
    );
    expect(workspace.pullRequests).toHaveLength(1);
    expect(workspace.pullRequests[0]?.base).toBe('main');
    expect(workspace.pullRequests[0]?.branch).toBe('governance/tokens');
  });

  it('runs straight through to validation when changed fixes are auto-approved', async () => {
    const { store, workspace, orchestrator, sessionId } = await setup({
      reviewPolicy: 'approve_changed',
      validateAfterApply: true
    });

    await orchestrator.handleJob({ type: 'triage_session', sessionId });

    const session = await store.getSession(sessionId);
    expect(session?.status).toBe('completed');
    expect(session?.branch).toMatch(/^governance\/auto-fix-\d{8}-\d{6}$/);
    expect(session?.validation).toMatchObject({
      category: 'OTHER',
      violationsBefore: 1,
      violationsAfter: 0,
      violationsFixed: 1,
      newViolations: 0,
      success: true
    });
    expect(store.events.map((event) => event.eventType)).toEqual([
      'triage_started',
      'triage_completed',
      'apply_completed',
      'validation_completed'
    ]);
    expect(workspace.closed).toBe(1);
  });

  it('records a failed build as an unsuccessful validation', async () => {
    const { store, workspace, orchestrator, sessionId } = await setup();
    workspace.build = new FakeBuild({ success: false, error: 'compile error' });

    await orchestrator.handleJob({ type: 'triage_session', sessionId });
    await orchestrator.handleJob({ type: 'validate_session', sessionId });

    const session = await store.getSession(sessionId);
    expect(session?.status).toBe('completed');
    expect(session?.validation?.success).toBe(false);
    expect(session?.validation?.message).toBe('Build failed: compile error');
    expect(session?.validation?.violationsAfter).toBe(1);
  });

  it('counts rescanned violations of the session category only', async () => {
    const { store, workspace, orchestrator, sessionId } = await setup();
    workspace.scanner = new FakeScanner([
      secureRandomViolation({ file: 'src/main/java/com/example/Other.java' }),
      secureRandomViolation({ rule: 'coding-no-std-streams', severity: 'warning' })
    ]);

    await orchestrator.handleJob({ type: 'triage_session', sessionId });
    await orchestrator.handleJob({ type: 'validate_session', sessionId });

    const session = await store.getSession(sessionId);
    expect(session?.validation).toMatchObject({
      violationsBefore: 1,
      violationsAfter: 1,
      violationsFixed: 0,
      newViolations: 0,
      success: false
    });
  });

  it('completes without proposals when every rule is already fixed', async () => {
    const store = new MemorySessionStore();
    const workspace = new FakeWorkspace();
    const orchestrator = new TriageOrchestrator({ store, workspaces: () => workspace });
    const session = await store.createSession({
      projectRoot: '/srv/projects/app',
      category: null,
      fixedRules: ['security-use-secure-random'],
      violations: [secureRandomViolation()]
    });

    await orchestrator.handleJob({ type: 'triage_session', sessionId: session.id });

    const updated = await store.getSession(session.id);
    expect(updated?.status).toBe('completed');
    expect(updated?.category).toBeNull();
    expect(await store.listFixes(session.id)).toEqual([]);
  });

  it('ignores jobs for unknown sessions', async () => {
    const { store, workspace, orchestrator } = await setup();

    await orchestrator.handleJob({ type: 'triage_session', sessionId: 99 });

    expect(store.events).toEqual([]);
    expect(workspace.closed).toBe(0);
  });
});
