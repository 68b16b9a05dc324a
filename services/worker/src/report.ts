import { CategorySummary, FailedFile, ProposalReport, PublishResult, ReviewSummary, ValidationResult } from '@fixgate/domain';

export function renderCategoryTable(summaries: readonly CategorySummary[]): string {
  if (summaries.length === 0) {
    return 'No violations to triage.';
  }

  const rows = summaries.map(
    (summary) => `| ${summary.priority} | ${summary.displayName} (\`${summary.name}\`) | ${summary.count} | ${summary.effort} |`
  );

  return ['| Priority | Category | Violations | Effort |', '|---|---|---|---|', ...rows].join('\n');
}

function renderFailedFiles(failed: readonly FailedFile[]): string {
  return ['Files that could not be processed:', ...failed.map((entry) => `- \`${entry.filePath}\`: ${entry.error}`)].join('\n');
}

export function renderTriageSummary(params: {
  sessionId: number;
  category: string;
  report: ProposalReport;
  review: ReviewSummary;
}): string {
  const sections: string[] = [];

  sections.push(`## Triage for session ${params.sessionId}`);
  sections.push(`Category: \`${params.category}\``);
  sections.push(
    [
      `- Proposed fixes: ${params.report.fixes.length}`,
      `- Unresolved violations: ${params.report.unresolved.length}`,
      `- Violations without a location: ${params.report.dropped.length}`,
      `- Approved: ${params.review.approved}, pending: ${params.review.pending}`
    ].join('\n')
  );

  if (params.report.failedFiles.length > 0) {
    sections.push(renderFailedFiles(params.report.failedFiles));
  }

  return sections.join('\n\n');
}

export function renderPublishSummary(result: PublishResult, pullRequestUrl: string | null): string {
  const lines = [
    `Branch: ${result.branch ?? '(current)'}`,
    `Commits: ${result.commits.length}`,
    `Files written: ${result.written.length}`
  ];

  if (pullRequestUrl) {
    lines.push(`Pull request: ${pullRequestUrl}`);
  }

  for (const failure of result.failures) {
    lines.push(`Failed group ${failure.group}: ${failure.error}`);
    if (failure.written.length > 0) {
      lines.push(`  Uncommitted: ${failure.written.join(', ')}`);
    }
  }

  return lines.join('\n');
}

export function renderValidationResult(result: ValidationResult): string {
  const status = result.success ? 'passed' : 'failed';
  return [
    `Validation ${status} for ${result.category}: ${result.message}`,
    `Before: ${result.violationsBefore}, after: ${result.violationsAfter}, fixed: ${result.violationsFixed}, new: ${result.newViolations}`
  ].join('\n');
}
