import { describe, expect, it } from 'vitest';

import { ReviewPrompt } from '../src/collaborators.js';
import { DiffAuditor } from '../src/diff.js';
import { ReviewRecordError, ReviewTransitionError, UnknownFixError } from '../src/errors.js';
import { parseReviewCommand } from '../src/review-commands.js';
import { ReviewLedger, renderReviewReport } from '../src/review.js';
import { ProposedFix } from '../src/types.js';
import { makeFix } from './fixtures.js';

const fixedClock = () => new Date('2026-03-01T10:00:00.000Z');

function threeFixes(): ProposedFix[] {
  return [
    makeFix({ id: 'fix-0001-batch', filePath: 'src/A.java' }),
    makeFix({ id: 'fix-0002-batch', filePath: 'src/B.java', proposedContent: 'class A {}\n' }),
    makeFix({ id: 'fix-0003-batch', filePath: 'src/C.java', proposedContent: 'class C {}\n' })
  ];
}

function countsMatch(ledger: ReviewLedger): boolean {
  const summary = ledger.summary();
  return summary.approved + summary.rejected + summary.pending + summary.skipped === summary.total;
}

class ScriptedPrompt implements ReviewPrompt {
  readonly shown: string[] = [];
  readonly notices: string[] = [];

  constructor(private readonly answers: string[]) {}

  show(diff: { fixId: string }, position: { index: number; total: number }): void {
    this.shown.push(`${position.index}/${position.total} ${diff.fixId}`);
  }

  async ask(): Promise<string> {
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error('prompt ran out of answers');
    }
    return answer;
  }

  notify(message: string): void {
    this.notices.push(message);
  }
}

describe('ReviewLedger', () => {
  it('starts every fix as pending', () => {
    const ledger = new ReviewLedger(threeFixes());

    expect(ledger.summary()).toEqual({ total: 3, approved: 0, rejected: 0, pending: 3, skipped: 0 });
    expect(ledger.isComplete()).toBe(false);
  });

  it('approves only fixes that change content', () => {
    const ledger = new ReviewLedger(threeFixes());

    expect(ledger.approveSafeOnly()).toBe(2);
    expect(ledger.approvedFixes.map((fix) => fix.id)).toEqual(['fix-0001-batch', 'fix-0003-batch']);
    expect(ledger.decisionOf('fix-0002-batch')).toBe('pending');
    expect(countsMatch(ledger)).toBe(true);
  });

  it('enforces the transition table', () => {
    const ledger = new ReviewLedger(threeFixes());

    ledger.skip('fix-0001-batch');
    ledger.approve('fix-0001-batch');
    ledger.approve('fix-0001-batch');
    ledger.reject('fix-0002-batch');

    expect(() => ledger.approve('fix-0002-batch')).toThrow(ReviewTransitionError);
    expect(() => ledger.skip('fix-0001-batch')).toThrow('Cannot move fix fix-0001-batch from approved to skipped');
    expect(() => ledger.approve('fix-9999-batch')).toThrow(UnknownFixError);

    ledger.reopen('fix-0002-batch');
    ledger.approve('fix-0002-batch');
    expect(ledger.summary()).toEqual({ total: 3, approved: 2, rejected: 0, pending: 1, skipped: 0 });
  });

  it('bulk operations touch pending fixes only', () => {
    const ledger = new ReviewLedger(threeFixes());
    ledger.reject('fix-0001-batch');
    ledger.skip('fix-0002-batch');

    expect(ledger.approveAll()).toBe(1);
    expect(ledger.rejectedFixes.map((fix) => fix.id)).toEqual(['fix-0001-batch']);
    expect(ledger.skippedFixes.map((fix) => fix.id)).toEqual(['fix-0002-batch']);
    expect(ledger.rejectAll()).toBe(0);
    expect(countsMatch(ledger)).toBe(true);
  });

  it('round-trips through its record', () => {
    const fixes = threeFixes();
    const ledger = new ReviewLedger(fixes, { clock: fixedClock });
    ledger.approve('fix-0001-batch');
    ledger.skip('fix-0003-batch');
    ledger.addComment('fix-0001-batch', 'looks fine');

    const record = ledger.toRecord();
    expect(record).toEqual({
      decisions: { 'fix-0001-batch': 'approved', 'fix-0002-batch': 'pending', 'fix-0003-batch': 'skipped' },
      comments: [{ fixId: 'fix-0001-batch', comment: 'looks fine', timestamp: '2026-03-01T10:00:00.000Z' }],
      summary: { total: 3, approved: 1, rejected: 0, pending: 1, skipped: 1 }
    });

    const restored = ReviewLedger.restore(fixes, JSON.parse(JSON.stringify(record)));
    expect(restored.toRecord()).toEqual(record);
  });

  it('accepts snake_case comment ids and rejects unknown fix ids on restore', () => {
    const fixes = threeFixes();

    const restored = ReviewLedger.restore(fixes, {
      decisions: { 'fix-0002-batch': 'rejected' },
      comments: [{ fix_id: 'fix-0002-batch', comment: 'no', timestamp: '2026-03-01T10:00:00.000Z' }]
    });
    expect(restored.decisionOf('fix-0002-batch')).toBe('rejected');
    expect(restored.commentsFor('fix-0002-batch')).toHaveLength(1);

    expect(() => ReviewLedger.restore(fixes, { decisions: { 'fix-0404-batch': 'approved' } })).toThrow(ReviewRecordError);
    expect(() => ReviewLedger.restore(fixes, { decisions: { 'fix-0001-batch': 'maybe' } })).toThrow(ReviewRecordError);
  });

  it('renders a review report', () => {
    const ledger = new ReviewLedger(threeFixes(), { clock: fixedClock });
    ledger.approve('fix-0001-batch');

    const report = renderReviewReport(ledger);
    expect(report).toContain('## Approved Fixes\n\n- `src/A.java` - coding-no-std-streams');
    expect(report).not.toContain('## Rejected Fixes');
  });
});

describe('interactiveReview', () => {
  const auditor = new DiffAuditor();

  it('walks fixes in order and leaves the rest pending on quit', async () => {
    const fixes = threeFixes();
    const ledger = new ReviewLedger(fixes, { clock: fixedClock });
    const prompt = new ScriptedPrompt(['a', 'what', 'c', 'needs a test', 'R', 'q']);

    const outcome = await ledger.interactiveReview(
      fixes.map((fix) => auditor.audit(fix)),
      prompt
    );

    expect(outcome).toBe('quit');
    expect(prompt.shown).toEqual(['1/3 fix-0001-batch', '2/3 fix-0002-batch', '3/3 fix-0003-batch']);
    expect(ledger.toRecord().decisions).toEqual({
      'fix-0001-batch': 'approved',
      'fix-0002-batch': 'rejected',
      'fix-0003-batch': 'pending'
    });
    expect(ledger.commentsFor('fix-0002-batch').map((entry) => entry.comment)).toEqual(['needs a test']);
    expect(prompt.notices).toContain('Invalid choice. Enter A, R, S, C, Q, AA or RA.');
  });

  it('skips decided fixes and resolves the remainder with aa', async () => {
    const fixes = threeFixes();
    const ledger = new ReviewLedger(fixes);
    ledger.reject('fix-0001-batch');
    const prompt = new ScriptedPrompt(['aa']);

    const outcome = await ledger.interactiveReview(
      fixes.map((fix) => auditor.audit(fix)),
      prompt
    );

    expect(outcome).toBe('approved_all');
    expect(prompt.shown).toEqual(['2/3 fix-0002-batch']);
    expect(ledger.summary()).toEqual({ total: 3, approved: 2, rejected: 1, pending: 0, skipped: 0 });
  });
});

describe('parseReviewCommand', () => {
  it('parses the review commands case-insensitively', () => {
    expect(parseReviewCommand(' A ')).toEqual({ type: 'approve' });
    expect(parseReviewCommand('ra')).toEqual({ type: 'reject_all' });
    expect(parseReviewCommand('AA')).toEqual({ type: 'approve_all' });
  });

  it('rejects anything else', () => {
    expect(parseReviewCommand('approve')).toBeNull();
    expect(parseReviewCommand('')).toBeNull();
    expect(parseReviewCommand('constructor')).toBeNull();
  });
});
