import { PipelineLogger, VersionControl, WorkspaceWriter, silentLogger } from './collaborators.js';
import { fixSeverity } from './diff.js';
import { ReviewLedger } from './review.js';
import { ProposedFix, ViolationSeverity } from './types.js';

export type CommitMode = 'per_rule' | 'single';

export interface CommitInfo {
  /** Commit id reported by version control. */
  id: string;
  group: string;
  message: string;
  files: string[];
}

export interface GroupFailure {
  group: string;
  files: string[];
  /** Files of the group already on disk when it failed; left uncommitted. */
  written: string[];
  error: string;
}

export interface PublishResult {
  branch: string | null;
  commits: CommitInfo[];
  failures: GroupFailure[];
  /** Files written, whether or not a commit followed. */
  written: string[];
  title: string;
  description: string;
  filesChanged: number;
}

export interface ChangeSetPublisherOptions {
  writer: WorkspaceWriter;
  vcs?: VersionControl | null;
  mode?: CommitMode;
  clock?: () => Date;
  logger?: PipelineLogger;
}

export const SINGLE_COMMIT_GROUP = 'governance-auto-fix';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `governance/auto-fix-YYYYMMDD-HHMMSS`, in UTC. */
export function defaultBranchName(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `governance/auto-fix-${date}-${time}`;
}

export function commitMessage(
  group: string,
  summary: string,
  files: readonly string[],
  severity: ViolationSeverity | 'mixed'
): string {
  const type = severity === 'critical' ? 'fix' : 'refactor';
  return [
    `${type}(governance): [${group}] ${summary}`,
    '',
    `Fixes governance violation: ${group}`,
    `Severity: ${severity}`,
    '',
    'Changes:',
    ...[...files].sort().map((file) => `- ${file}`)
  ].join('\n');
}

function severityCounts(fixes: readonly ProposedFix[]): { critical: number; warning: number } {
  let critical = 0;
  let warning = 0;
  for (const fix of fixes) {
    const severity = fixSeverity(fix);
    if (severity === 'critical') {
      critical += 1;
    } else if (severity === 'warning') {
      warning += 1;
    }
  }
  return { critical, warning };
}

function changedFiles(fix: ProposedFix): Array<{ filePath: string; content: string }> {
  return [
    { filePath: fix.filePath, content: fix.proposedContent },
    ...fix.relatedChanges.map((change) => ({ filePath: change.filePath, content: change.proposedContent }))
  ];
}

export function pullRequestTitle(fixes: readonly ProposedFix[]): string {
  const { critical, warning } = severityCounts(fixes);
  return `fix(governance): Auto-fix ${critical} critical and ${warning} warning violations`;
}

export function pullRequestDescription(ledger: ReviewLedger, commitCount: number): string {
  const approved = ledger.approvedFixes;
  const { critical, warning } = severityCounts(approved);
  const files = new Set(approved.flatMap((fix) => changedFiles(fix).map((change) => change.filePath)));
  const sections: string[] = [];

  sections.push('## Governance Auto-Fix\n\nThis change addresses governance violations identified in the latest scan.');
  sections.push(
    [
      '### Summary',
      '',
      `- Critical violations fixed: ${critical}`,
      `- Warnings fixed: ${warning}`,
      `- Files changed: ${files.size}`,
      `- Commits: ${commitCount}`
    ].join('\n')
  );

  const rows = approved.map((fix) => {
    const explanation = (fix.explanation.split('\n')[0] ?? '').slice(0, 80);
    return `| \`${fix.ruleId}\` | \`${fix.filePath}\` | ${explanation} |`;
  });
  sections.push(['### Violations Addressed', '', '| Rule ID | File | Description |', '|---------|------|-------------|', ...rows].join('\n'));

  const approvedById = new Map(approved.map((fix) => [fix.id, fix]));
  const comments = ledger.reviewComments.flatMap((entry) => {
    const fix = approvedById.get(entry.fixId);
    return fix ? [`- **${fix.filePath}**: ${entry.comment}`] : [];
  });
  if (comments.length > 0) {
    sections.push(['### Review Comments', '', ...comments].join('\n'));
  }

  return sections.join('\n\n');
}

interface CommitGroup {
  key: string;
  fixes: ProposedFix[];
}

/**
 * Writes approved fixes and commits them in deterministic groups. A failing
 * group is recorded and the remaining groups still go through.
 */
export class ChangeSetPublisher {
  private readonly writer: WorkspaceWriter;
  private readonly vcs: VersionControl | null;
  private readonly mode: CommitMode;
  private readonly clock: () => Date;
  private readonly logger: PipelineLogger;

  constructor(options: ChangeSetPublisherOptions) {
    this.writer = options.writer;
    this.vcs = options.vcs ?? null;
    this.mode = options.mode ?? 'per_rule';
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  groups(fixes: readonly ProposedFix[]): CommitGroup[] {
    if (this.mode === 'single') {
      return fixes.length > 0 ? [{ key: SINGLE_COMMIT_GROUP, fixes: [...fixes] }] : [];
    }

    const byRule = new Map<string, ProposedFix[]>();
    for (const fix of fixes) {
      byRule.set(fix.ruleId, [...(byRule.get(fix.ruleId) ?? []), fix]);
    }

    return Array.from(byRule.keys())
      .sort()
      .map((key) => ({ key, fixes: byRule.get(key) ?? [] }));
  }

  async publish(ledger: ReviewLedger, options: { branch?: string } = {}): Promise<PublishResult> {
    const approved = ledger.approvedFixes;
    const commits: CommitInfo[] = [];
    const failures: GroupFailure[] = [];
    const written: string[] = [];
    let branch: string | null = null;

    if (this.vcs && approved.length > 0) {
      const requested = options.branch ?? defaultBranchName(this.clock());
      try {
        branch = await this.vcs.createBranch(requested);
      } catch (error) {
        this.logger.warn({ branch: requested, error: errorMessage(error) }, 'branch creation failed; continuing on current branch');
      }
    }

    for (const group of this.groups(approved)) {
      const files = group.fixes.flatMap(changedFiles);
      const paths = Array.from(new Set(files.map((file) => file.filePath))).sort();

      const groupWritten = new Set<string>();
      try {
        for (const file of files) {
          await this.writer.write(file.filePath, file.content);
          groupWritten.add(file.filePath);
          written.push(file.filePath);
        }

        if (this.vcs) {
          const message = this.messageFor(group);
          const id = await this.vcs.stageAndCommit(paths, message);
          commits.push({ id, group: group.key, message, files: paths });
        }
      } catch (error) {
        const message = errorMessage(error);
        const dirty = Array.from(groupWritten).sort();
        this.logger.error({ group: group.key, files: paths, written: dirty, error: message }, 'publishing group failed');
        failures.push({ group: group.key, files: paths, written: dirty, error: message });
      }
    }

    return {
      branch,
      commits,
      failures,
      written: Array.from(new Set(written)).sort(),
      title: pullRequestTitle(approved),
      description: pullRequestDescription(ledger, commits.length),
      filesChanged: new Set(approved.flatMap((fix) => changedFiles(fix).map((change) => change.filePath))).size
    };
  }

  private messageFor(group: CommitGroup): string {
    const paths = group.fixes.flatMap(changedFiles).map((file) => file.filePath);
    const unique = Array.from(new Set(paths));

    if (this.mode === 'single') {
      const { critical, warning } = severityCounts(group.fixes);
      return commitMessage(group.key, `Fix ${critical} critical and ${warning} warning violations`, unique, 'mixed');
    }

    const severity = group.fixes.map(fixSeverity).reduce<ViolationSeverity>(
      (highest, next) => (next === 'critical' || (next === 'warning' && highest === 'info') ? next : highest),
      'info'
    );
    return commitMessage(group.key, `Fix ${group.fixes.length} violation(s)`, unique, severity);
  }
}
