import { Interface } from 'node:readline/promises';

import { SessionNotFoundError, SessionStore } from '@fixgate/common';
import {
  DiffAuditor,
  FileDiff,
  ProposedFix,
  renderFileDiff,
  renderReviewReport,
  ReviewLedger,
  ReviewPrompt,
  ReviewRecord
} from '@fixgate/domain';

export class TerminalPrompt implements ReviewPrompt {
  constructor(
    private readonly rl: Interface,
    private readonly write: (text: string) => void = (text) => process.stdout.write(text)
  ) {}

  show(diff: FileDiff, position: { index: number; total: number }): void {
    this.write(`\n[${position.index}/${position.total}] ${diff.fixId}\n\n${renderFileDiff(diff)}\n\n`);
  }

  ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  notify(message: string): void {
    this.write(`${message}\n`);
  }
}

function ledgerFor(fixes: readonly ProposedFix[], record: unknown | null): ReviewLedger {
  return record === null ? new ReviewLedger(fixes) : ReviewLedger.restore(fixes, record);
}

/**
 * Copies onto `target` what changed in `reviewed` since `before`. Fixes that
 * someone else decided in the meantime keep that decision.
 */
function carryReview(target: ReviewLedger, before: ReviewRecord, reviewed: ReviewLedger): void {
  for (const fix of reviewed.allFixes) {
    const decision = reviewed.decisionOf(fix.id);
    if (decision === before.decisions[fix.id] || target.decisionOf(fix.id) !== 'pending') {
      continue;
    }
    if (decision === 'approved') {
      target.approve(fix.id);
    } else if (decision === 'rejected') {
      target.reject(fix.id);
    } else if (decision === 'skipped') {
      target.skip(fix.id);
    }
  }

  for (const comment of reviewed.reviewComments.slice(before.comments.length)) {
    target.addComment(comment.fixId, comment.comment);
  }
}

/**
 * Walks the pending fixes of a session in the terminal and saves the
 * resulting decisions. Returns the rendered review report.
 */
export async function reviewSession(store: SessionStore, sessionId: number, prompt: ReviewPrompt): Promise<string> {
  const session = await store.getSession(sessionId);
  if (!session) {
    throw new SessionNotFoundError(sessionId);
  }

  const fixes = await store.listFixes(sessionId);
  const ledger = ledgerFor(fixes, await store.getReview(sessionId));
  const before = ledger.toRecord();

  const auditor = new DiffAuditor();
  const outcome = await ledger.interactiveReview(auditor.auditAll(fixes), prompt);

  const saved = await store.updateReview(sessionId, (current) => {
    const latest = ledgerFor(fixes, current);
    carryReview(latest, before, ledger);
    return { record: latest.toRecord(), result: latest };
  });
  await store.insertEvent(sessionId, 'terminal', 'review_saved', { outcome, ...saved.summary() });

  return renderReviewReport(saved);
}
