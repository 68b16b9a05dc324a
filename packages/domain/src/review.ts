import { z } from 'zod';

import { ReviewPrompt } from './collaborators.js';
import { ReviewRecordError, ReviewTransitionError, UnknownFixError } from './errors.js';
import { parseReviewCommand, reviewCommandHelp } from './review-commands.js';
import {
  FileDiff,
  ProposedFix,
  ReviewComment,
  ReviewDecision,
  ReviewRecord,
  ReviewSummary
} from './types.js';

const allowedTransitions: Record<ReviewDecision, readonly ReviewDecision[]> = {
  pending: ['approved', 'rejected', 'skipped'],
  skipped: ['approved', 'rejected'],
  approved: [],
  rejected: []
};

const decisionSchema = z.enum(['pending', 'approved', 'rejected', 'skipped']);

const recordSchema = z.object({
  decisions: z.record(decisionSchema),
  comments: z
    .array(
      z
        .object({
          fixId: z.string().optional(),
          fix_id: z.string().optional(),
          comment: z.string(),
          timestamp: z.string()
        })
        .transform((entry, context) => {
          const fixId = entry.fixId ?? entry.fix_id;
          if (fixId === undefined) {
            context.addIssue({ code: z.ZodIssueCode.custom, message: 'comment is missing its fix id' });
            return z.NEVER;
          }
          return { fixId, comment: entry.comment, timestamp: entry.timestamp };
        })
    )
    .default([])
});

export type ReviewSessionOutcome = 'completed' | 'quit' | 'approved_all' | 'rejected_all';

export interface ReviewLedgerOptions {
  clock?: () => Date;
}

export function hasContentChange(fix: ProposedFix): boolean {
  return (
    fix.proposedContent !== fix.originalContent ||
    fix.relatedChanges.some((change) => change.proposedContent !== change.originalContent)
  );
}

/**
 * Disposition of every proposed fix in a review session. Every fix has
 * exactly one decision at all times; decisions only move through the
 * transitions listed in `allowedTransitions`, or back to pending via `reopen`.
 */
export class ReviewLedger {
  private readonly fixes: readonly ProposedFix[];
  private readonly decisions = new Map<string, ReviewDecision>();
  private readonly comments: ReviewComment[] = [];
  private readonly clock: () => Date;

  constructor(fixes: readonly ProposedFix[], options: ReviewLedgerOptions = {}) {
    for (const fix of fixes) {
      if (this.decisions.has(fix.id)) {
        throw new ReviewRecordError(`Duplicate fix id: ${fix.id}`);
      }
      this.decisions.set(fix.id, 'pending');
    }

    this.fixes = [...fixes];
    this.clock = options.clock ?? (() => new Date());
  }

  static restore(fixes: readonly ProposedFix[], record: unknown, options: ReviewLedgerOptions = {}): ReviewLedger {
    const parsed = recordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ReviewRecordError(`Invalid review record: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }

    const ledger = new ReviewLedger(fixes, options);

    for (const [fixId, decision] of Object.entries(parsed.data.decisions)) {
      if (!ledger.decisions.has(fixId)) {
        throw new ReviewRecordError(`Review record names unknown fix id: ${fixId}`);
      }
      ledger.decisions.set(fixId, decision);
    }

    for (const comment of parsed.data.comments) {
      if (!ledger.decisions.has(comment.fixId)) {
        throw new ReviewRecordError(`Review comment names unknown fix id: ${comment.fixId}`);
      }
      ledger.comments.push(comment);
    }

    return ledger;
  }

  get size(): number {
    return this.fixes.length;
  }

  decisionOf(fixId: string): ReviewDecision {
    const decision = this.decisions.get(fixId);
    if (decision === undefined) {
      throw new UnknownFixError(fixId);
    }
    return decision;
  }

  approve(fixId: string): void {
    this.transition(fixId, 'approved');
  }

  reject(fixId: string): void {
    this.transition(fixId, 'rejected');
  }

  skip(fixId: string): void {
    this.transition(fixId, 'skipped');
  }

  /** Returns a decided fix to pending so a later session can revisit it. */
  reopen(fixId: string): void {
    this.decisionOf(fixId);
    this.decisions.set(fixId, 'pending');
  }

  addComment(fixId: string, comment: string): void {
    this.decisionOf(fixId);
    this.comments.push({ fixId, comment, timestamp: this.clock().toISOString() });
  }

  approveAll(): number {
    return this.resolvePending('approved', () => true);
  }

  rejectAll(): number {
    return this.resolvePending('rejected', () => true);
  }

  /**
   * Approves every pending fix that changes content. This is a presence-of-a-
   * change predicate only; it says nothing about whether the change is correct.
   */
  approveChanged(): number {
    return this.resolvePending('approved', hasContentChange);
  }

  /** Same predicate as `approveChanged`; kept for callers of the older name. */
  approveSafeOnly(): number {
    return this.approveChanged();
  }

  get approvedFixes(): ProposedFix[] {
    return this.fixesIn('approved');
  }

  get rejectedFixes(): ProposedFix[] {
    return this.fixesIn('rejected');
  }

  get pendingFixes(): ProposedFix[] {
    return this.fixesIn('pending');
  }

  get skippedFixes(): ProposedFix[] {
    return this.fixesIn('skipped');
  }

  get allFixes(): ProposedFix[] {
    return [...this.fixes];
  }

  get reviewComments(): ReviewComment[] {
    return [...this.comments];
  }

  commentsFor(fixId: string): ReviewComment[] {
    return this.comments.filter((comment) => comment.fixId === fixId);
  }

  isComplete(): boolean {
    return this.fixes.every((fix) => this.decisions.get(fix.id) !== 'pending');
  }

  summary(): ReviewSummary {
    const summary: ReviewSummary = { total: this.fixes.length, approved: 0, rejected: 0, pending: 0, skipped: 0 };
    for (const fix of this.fixes) {
      summary[this.decisionOf(fix.id)] += 1;
    }
    return summary;
  }

  toRecord(): ReviewRecord {
    const decisions: Record<string, ReviewDecision> = {};
    for (const fix of this.fixes) {
      decisions[fix.id] = this.decisionOf(fix.id);
    }

    return {
      decisions,
      comments: this.comments.map((comment) => ({ ...comment })),
      summary: this.summary()
    };
  }

  /**
   * Walks the diffs in order, asking the prompt for a decision on each fix
   * that is still pending. Quitting leaves everything undecided as pending.
   */
  async interactiveReview(diffs: readonly FileDiff[], prompt: ReviewPrompt): Promise<ReviewSessionOutcome> {
    prompt.notify(reviewCommandHelp);

    for (const [index, diff] of diffs.entries()) {
      if (!this.decisions.has(diff.fixId) || this.decisionOf(diff.fixId) !== 'pending') {
        continue;
      }

      prompt.show(diff, { index: index + 1, total: diffs.length });

      for (;;) {
        const command = parseReviewCommand(await prompt.ask('Decision [A/R/S/C/Q/AA/RA]: '));

        if (command === null) {
          prompt.notify('Invalid choice. Enter A, R, S, C, Q, AA or RA.');
          continue;
        }

        if (command.type === 'comment') {
          const comment = (await prompt.ask('Comment: ')).trim();
          if (comment.length > 0) {
            this.addComment(diff.fixId, comment);
            prompt.notify('Comment added');
          }
          continue;
        }

        if (command.type === 'quit') {
          prompt.notify('Review paused. Remaining fixes stay pending.');
          return 'quit';
        }

        if (command.type === 'approve_all') {
          this.approveAll();
          prompt.notify('All remaining fixes approved');
          return 'approved_all';
        }

        if (command.type === 'reject_all') {
          this.rejectAll();
          prompt.notify('All remaining fixes rejected');
          return 'rejected_all';
        }

        if (command.type === 'approve') {
          this.approve(diff.fixId);
        } else if (command.type === 'reject') {
          this.reject(diff.fixId);
        } else {
          this.skip(diff.fixId);
        }
        break;
      }
    }

    return 'completed';
  }

  private transition(fixId: string, to: ReviewDecision): void {
    const from = this.decisionOf(fixId);
    if (from === to) {
      return;
    }

    if (!allowedTransitions[from].includes(to)) {
      throw new ReviewTransitionError(fixId, from, to);
    }

    this.decisions.set(fixId, to);
  }

  private resolvePending(to: ReviewDecision, predicate: (fix: ProposedFix) => boolean): number {
    let count = 0;
    for (const fix of this.fixes) {
      if (this.decisions.get(fix.id) === 'pending' && predicate(fix)) {
        this.decisions.set(fix.id, to);
        count += 1;
      }
    }
    return count;
  }

  private fixesIn(decision: ReviewDecision): ProposedFix[] {
    return this.fixes.filter((fix) => this.decisions.get(fix.id) === decision);
  }
}

export function renderReviewReport(ledger: ReviewLedger): string {
  const summary = ledger.summary();
  const sections: string[] = [];

  sections.push('# Governance Fix Review Report');
  sections.push(
    [
      '## Summary',
      '',
      `- Total fixes: ${summary.total}`,
      `- Approved: ${summary.approved}`,
      `- Rejected: ${summary.rejected}`,
      `- Skipped: ${summary.skipped}`,
      `- Pending: ${summary.pending}`
    ].join('\n')
  );

  const listing = (title: string, fixes: readonly ProposedFix[]) => {
    if (fixes.length > 0) {
      sections.push([`## ${title}`, '', ...fixes.map((fix) => `- \`${fix.filePath}\` - ${fix.ruleId}`)].join('\n'));
    }
  };

  listing('Approved Fixes', ledger.approvedFixes);
  listing('Rejected Fixes', ledger.rejectedFixes);
  listing('Skipped Fixes', ledger.skippedFixes);

  const comments = ledger.reviewComments;
  if (comments.length > 0) {
    sections.push(['## Comments', '', ...comments.map((entry) => `- ${entry.fixId} (${entry.timestamp}): ${entry.comment}`)].join('\n'));
  }

  return sections.join('\n\n');
}
