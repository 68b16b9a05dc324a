import { structuredPatch } from 'diff';

import { FileDiff, FixComplexity, ProposedFix, ViolationSeverity } from './types.js';

const severityPrefixes: ReadonlyArray<[string, ViolationSeverity]> = [
  ['security-', 'critical'],
  ['dependency-', 'critical'],
  ['architecture-', 'critical'],
  ['coding-', 'warning'],
  ['naming-', 'warning'],
  ['annotation-', 'warning']
];

const severityRank: Record<ViolationSeverity, number> = { critical: 0, warning: 1, info: 2 };

export function ruleSeverity(ruleId: string): ViolationSeverity {
  for (const [prefix, severity] of severityPrefixes) {
    if (ruleId.startsWith(prefix)) {
      return severity;
    }
  }
  return 'info';
}

/** Highest severity across every rule a (possibly consolidated) fix addresses. */
export function fixSeverity(fix: Pick<ProposedFix, 'ruleId' | 'ruleIds'>): ViolationSeverity {
  const rules = fix.ruleIds.length > 0 ? fix.ruleIds : [fix.ruleId];
  return rules.map(ruleSeverity).reduce<ViolationSeverity>(
    (highest, severity) => (severityRank[severity] < severityRank[highest] ? severity : highest),
    'info'
  );
}

export function isNoOpFix(fix: Pick<ProposedFix, 'originalContent' | 'proposedContent'>): boolean {
  return fix.originalContent === fix.proposedContent;
}

export function unifiedDiff(filePath: string, original: string, proposed: string, context = 3): string {
  const patch = structuredPatch(`a/${filePath}`, `b/${filePath}`, original, proposed, undefined, undefined, { context });
  if (patch.hunks.length === 0) {
    return '';
  }

  const lines = [`--- a/${filePath}`, `+++ b/${filePath}`];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
    lines.push(...hunk.lines);
  }

  return lines.join('\n');
}

export function countChanges(diff: string): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;

  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      continue;
    }

    if (line.startsWith('+')) {
      additions += 1;
    } else if (line.startsWith('-')) {
      deletions += 1;
    }
  }

  return { additions, deletions };
}

const complexityNotes: Record<FixComplexity, string> = {
  simple: 'Complexity: simple (single-line change)',
  moderate: 'Complexity: moderate (multi-line, single file)',
  complex: 'Complexity: complex (multi-file or structural)'
};

function explain(fix: ProposedFix): string {
  const sections: string[] = [fix.explanation];

  if (fix.addedImports.length > 0) {
    sections.push(['Imports added:', ...fix.addedImports.map((name) => `  - ${name}`)].join('\n'));
  }

  if (fix.removedImports.length > 0) {
    sections.push(['Imports removed:', ...fix.removedImports.map((name) => `  - ${name}`)].join('\n'));
  }

  if (fix.relatedChanges.length > 0) {
    sections.push(['Related files:', ...fix.relatedChanges.map((change) => `  - ${change.filePath}`)].join('\n'));
  }

  sections.push(complexityNotes[fix.complexity]);
  sections.push(fix.safety === 'safe' ? 'Safety: can be applied without further review.' : 'Safety: review before applying.');

  return sections.join('\n\n');
}

export interface DiffSummary {
  totalFiles: number;
  totalAdditions: number;
  totalDeletions: number;
  bySeverity: Record<ViolationSeverity, number>;
}

export class DiffAuditor {
  constructor(private readonly options: { context?: number } = {}) {}

  audit(fix: ProposedFix): FileDiff {
    const text = unifiedDiff(fix.filePath, fix.originalContent, fix.proposedContent, this.options.context ?? 3);
    const { additions, deletions } = countChanges(text);

    return {
      fixId: fix.id,
      filePath: fix.filePath,
      ruleId: fix.ruleId,
      unifiedDiff: text,
      additions,
      deletions,
      severity: fixSeverity(fix),
      explanation: explain(fix)
    };
  }

  /** No-op fixes never reach review, so they are dropped here. */
  auditAll(fixes: readonly ProposedFix[]): FileDiff[] {
    return fixes.filter((fix) => !isNoOpFix(fix)).map((fix) => this.audit(fix));
  }

  summarize(diffs: readonly FileDiff[]): DiffSummary {
    const bySeverity: Record<ViolationSeverity, number> = { critical: 0, warning: 0, info: 0 };
    let totalAdditions = 0;
    let totalDeletions = 0;

    for (const diff of diffs) {
      bySeverity[diff.severity] += 1;
      totalAdditions += diff.additions;
      totalDeletions += diff.deletions;
    }

    return { totalFiles: diffs.length, totalAdditions, totalDeletions, bySeverity };
  }
}

export function renderFileDiff(diff: FileDiff): string {
  return [
    `File: ${diff.filePath}`,
    `Rule: ${diff.ruleId}`,
    `Severity: ${diff.severity}`,
    `Changes: +${diff.additions} -${diff.deletions}`,
    diff.unifiedDiff || 'No changes',
    diff.explanation
  ].join('\n\n');
}
