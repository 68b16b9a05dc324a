import {
  ArtifactResolver,
  ContentFixer,
  PipelineLogger,
  SourceReader,
  silentLogger
} from './collaborators.js';
import { runBounded } from './pool.js';
import { FixStrategy, StrategyCatalog } from './strategies.js';
import { FixComplexity, FixSafety, ProposedFix, RelatedChange, Violation } from './types.js';
import { groupViolations, isJavaArtifact, isSpecArtifact, resolveTargetPath, violationLine } from './violations.js';

export const MULTIPLE_RULES = 'multiple-violations';

export interface CrossFileOptions {
  resolver: ArtifactResolver;
  /** Code artifacts that may be edited alongside a spec artifact. */
  inventory: readonly string[];
}

export interface FixProposalCoordinatorOptions {
  catalog: StrategyCatalog;
  reader: SourceReader;
  fixer?: ContentFixer | null;
  crossFile?: CrossFileOptions | null;
  concurrency?: number;
  logger?: PipelineLogger;
}

export interface UnresolvedViolation {
  filePath: string;
  violation: Violation;
}

export interface FailedFile {
  filePath: string;
  error: string;
}

export interface ProposalReport {
  fixes: ProposedFix[];
  /** Violations with no resolvable target file. */
  dropped: Violation[];
  /** Violations no strategy or fixer could change; left for manual work. */
  unresolved: UnresolvedViolation[];
  failedFiles: FailedFile[];
}

interface FileOutcome {
  fix: ProposedFix | null;
  unresolved: Violation[];
  failure: string | null;
}

const complexityRank: Record<FixComplexity, number> = { simple: 0, moderate: 1, complex: 2 };

function artifactOrder(filePath: string | null): number {
  if (filePath && isJavaArtifact(filePath)) {
    return 0;
  }
  if (filePath && isSpecArtifact(filePath)) {
    return 1;
  }
  return 2;
}

function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function fixId(position: number): string {
  return `fix-${String(position).padStart(4, '0')}-batch`;
}

/**
 * Turns violations into one consolidated ProposedFix per file. Deterministic
 * strategies run first; whatever they leave is handed to the content fixer in
 * a single call per file.
 */
export class FixProposalCoordinator {
  private readonly catalog: StrategyCatalog;
  private readonly reader: SourceReader;
  private readonly fixer: ContentFixer | null;
  private readonly crossFile: CrossFileOptions | null;
  private readonly concurrency: number;
  private readonly logger: PipelineLogger;

  constructor(options: FixProposalCoordinatorOptions) {
    this.catalog = options.catalog;
    this.reader = options.reader;
    this.fixer = options.fixer ?? null;
    this.crossFile = options.crossFile ?? null;
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.logger = options.logger ?? silentLogger;
  }

  async propose(violations: readonly Violation[]): Promise<ProposedFix[]> {
    const report = await this.proposeWithReport(violations);
    return report.fixes;
  }

  async proposeWithReport(violations: readonly Violation[]): Promise<ProposalReport> {
    const dropped: Violation[] = [];
    const targeted: Array<{ filePath: string; violation: Violation }> = [];

    for (const violation of violations) {
      const filePath = resolveTargetPath(violation);
      if (filePath === null) {
        this.logger.warn({ rule: violation.rule, message: violation.message }, 'dropping violation without a target file');
        dropped.push(violation);
        continue;
      }
      targeted.push({ filePath, violation });
    }

    const ordered = targeted
      .map((entry, index) => ({ ...entry, index }))
      .sort((left, right) => artifactOrder(left.filePath) - artifactOrder(right.filePath) || left.index - right.index);

    const byFile = new Map<string, Violation[]>();
    for (const { filePath, violation } of ordered) {
      const group = byFile.get(filePath);
      if (group) {
        group.push(violation);
      } else {
        byFile.set(filePath, [violation]);
      }
    }

    const groups = Array.from(byFile.entries());
    const relatedByFile = this.assignRelatedArtifacts(groups.map(([filePath]) => filePath));

    const outcomes = await runBounded(groups, this.concurrency, async ([filePath, group], index): Promise<FileOutcome> => {
      try {
        return await this.proposeForFile(filePath, group, index + 1, relatedByFile.get(filePath) ?? []);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error({ filePath, error: message }, 'fix proposal failed for file');
        return { fix: null, unresolved: group, failure: message };
      }
    });

    const report: ProposalReport = { fixes: [], dropped, unresolved: [], failedFiles: [] };

    outcomes.forEach((outcome, index) => {
      const filePath = groups[index]?.[0] ?? '';
      if (outcome.fix) {
        report.fixes.push(outcome.fix);
      }
      if (outcome.failure !== null) {
        report.failedFiles.push({ filePath, error: outcome.failure });
        return;
      }
      for (const violation of outcome.unresolved) {
        report.unresolved.push({ filePath, violation });
      }
    });

    return report;
  }

  private async proposeForFile(
    filePath: string,
    group: Violation[],
    position: number,
    relatedPaths: readonly string[]
  ): Promise<FileOutcome> {
    const original = await this.reader.read(filePath);
    if (original === null) {
      return { fix: null, unresolved: group, failure: `Cannot read ${filePath}` };
    }

    let content = original;
    const addedImports: string[] = [];
    const removedImports: string[] = [];
    const resolved: Violation[] = [];
    const strategies: FixStrategy[] = [];
    const pending: Violation[] = [];

    for (const violation of group) {
      const strategy = this.catalog.strategyFor(violation.rule);
      if (strategy?.fixer) {
        try {
          const output = strategy.fixer(content, { violation, line: violationLine(violation), filePath });
          if (output && output.content !== content) {
            content = output.content;
            addedImports.push(...output.addedImports);
            removedImports.push(...output.removedImports);
            resolved.push(violation);
            strategies.push(strategy);
            continue;
          }
        } catch (error) {
          this.logger.warn({ filePath, rule: violation.rule, error: errorMessage(error) }, 'deterministic fixer failed');
        }
      }
      pending.push(violation);
    }

    let relatedChanges: RelatedChange[] = [];
    let aiResolved: Violation[] = [];

    if (pending.length > 0 && this.fixer) {
      const related = await this.readRelated(relatedPaths);
      try {
        if (related.size > 0) {
          const result = await this.fixer.fixCrossFile(new Map([[filePath, content], ...related]), pending);
          relatedChanges = Array.from(related.entries()).flatMap(([relatedPath, relatedOriginal]) => {
            const proposed = result.get(relatedPath);
            return proposed !== undefined && proposed !== relatedOriginal
              ? [{ filePath: relatedPath, originalContent: relatedOriginal, proposedContent: proposed }]
              : [];
          });
          const primary = result.get(filePath) ?? content;
          if (primary !== content || relatedChanges.length > 0) {
            content = primary;
            aiResolved = pending;
          }
        } else {
          const [single] = pending;
          const next =
            pending.length === 1 && single ? await this.fixer.fixOne(content, single) : await this.fixer.fixBatch(content, pending);
          if (next !== content) {
            content = next;
            aiResolved = pending;
          }
        }
      } catch (error) {
        this.logger.warn({ filePath, violations: pending.length, error: errorMessage(error) }, 'content fixer failed');
        relatedChanges = [];
      }
    }

    const unresolved = aiResolved.length > 0 ? [] : pending;
    if (content === original && relatedChanges.length === 0) {
      return { fix: null, unresolved: group, failure: null };
    }

    const addressed = [...resolved, ...aiResolved];
    const ruleIds = sortedUnique(addressed.map((violation) => violation.rule));
    const firstLine = addressed.map(violationLine).find((line) => line !== null) ?? null;

    const fix: ProposedFix = {
      id: fixId(position),
      ruleId: ruleIds.length === 1 && ruleIds[0] ? ruleIds[0] : MULTIPLE_RULES,
      ruleIds,
      filePath,
      line: firstLine,
      originalContent: original,
      proposedContent: content,
      explanation: this.explain(addressed, strategies, aiResolved.length),
      complexity: this.complexity(strategies, aiResolved.length > 0, relatedChanges.length > 0),
      safety: this.safety(strategies, aiResolved.length > 0),
      violations: addressed,
      addedImports: sortedUnique(addedImports),
      removedImports: sortedUnique(removedImports),
      relatedChanges
    };

    return { fix, unresolved, failure: null };
  }

  /**
   * Gives each spec artifact the code artifacts it may edit. A code file goes
   * to at most one task: files with their own group are never shared, and the
   * first spec artifact in order takes a match.
   */
  private assignRelatedArtifacts(filePaths: readonly string[]): Map<string, string[]> {
    const assigned = new Map<string, string[]>();
    if (!this.crossFile) {
      return assigned;
    }

    const claimed = new Set(filePaths);
    for (const filePath of filePaths) {
      if (!isSpecArtifact(filePath)) {
        continue;
      }
      const candidates = this.crossFile.inventory.filter((candidate) => !claimed.has(candidate));
      const matches = this.crossFile.resolver.relatedCodeArtifacts(filePath, candidates);
      for (const match of matches) {
        claimed.add(match);
      }
      if (matches.length > 0) {
        assigned.set(filePath, matches);
      }
    }

    return assigned;
  }

  private async readRelated(relatedPaths: readonly string[]): Promise<Map<string, string>> {
    const related = new Map<string, string>();
    for (const candidate of relatedPaths) {
      const content = await this.reader.read(candidate);
      if (content !== null) {
        related.set(candidate, content);
      }
    }
    return related;
  }

  private explain(addressed: readonly Violation[], strategies: readonly FixStrategy[], aiCount: number): string {
    const distinct = new Map(strategies.map((strategy) => [strategy.ruleId, strategy]));
    const [only] = distinct.values();

    if (distinct.size === 1 && aiCount === 0 && only) {
      return only.explanation;
    }

    const lines = [`Fixes ${addressed.length} violation(s) in this file:`];
    for (const [rule, violations] of groupViolations(addressed, (violation) => violation.rule)) {
      const strategy = distinct.get(rule) ?? this.catalog.strategyFor(rule);
      lines.push(`- ${rule} (${violations.length}): ${strategy?.description ?? 'content fixer edit'}`);
    }

    return lines.join('\n');
  }

  private complexity(strategies: readonly FixStrategy[], usedFixer: boolean, crossFile: boolean): FixComplexity {
    if (crossFile) {
      return 'complex';
    }

    const floor: FixComplexity = usedFixer ? 'moderate' : 'simple';
    return strategies.reduce<FixComplexity>(
      (highest, strategy) => (complexityRank[strategy.complexity] > complexityRank[highest] ? strategy.complexity : highest),
      floor
    );
  }

  private safety(strategies: readonly FixStrategy[], usedFixer: boolean): FixSafety {
    if (usedFixer || strategies.length === 0) {
      return 'review_required';
    }
    return strategies.every((strategy) => strategy.safety === 'safe') ? 'safe' : 'review_required';
  }
}
