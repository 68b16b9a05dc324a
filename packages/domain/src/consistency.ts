import { NameMatchingResolver } from './artifacts.js';
import { ArtifactResolver, PipelineLogger, silentLogger } from './collaborators.js';
import { SyncCategory, SyncEntry, SyncStrategy, Violation } from './types.js';
import { groupViolations, resolveTargetPath } from './violations.js';

/** Code-level rule to the spec-level rule describing the same defect; null when none does. */
export const defaultEquivalences: Readonly<Record<string, string | null>> = {
  pluralResourceNaming: 'plural-resources',
  noVerbsInMapping: 'no-verbs-in-url',
  pathVariablesShouldBeUUID: 'uuid-resource-ids',
  postMethodsShouldReturn201: 'post-create-returns-201',
  paginatedEndpointsUsePageable: 'pagination-parameter-naming',
  getMethodsNoRequestBody: 'get-no-request-body',
  requestMappingsKebabCase: 'kebab-case-paths',
  requestParamsCamelCase: 'request-fields-camelcase',
  controllerMethodsReturnProperTypes: 'response-envelope',
  noTrailingSlashes: 'no-trailing-slash',
  classLevelRequestMapping: null,
  controllerNamingConvention: null,
  controllersInCorrectPackage: null
};

export class RuleEquivalence {
  private readonly specByCode = new Map<string, string>();
  private readonly codeBySpec = new Map<string, string[]>();

  constructor(entries: Readonly<Record<string, string | null>> = defaultEquivalences) {
    for (const [codeRule, specRule] of Object.entries(entries)) {
      if (specRule === null) {
        continue;
      }
      this.specByCode.set(codeRule, specRule);
      this.codeBySpec.set(specRule, [...(this.codeBySpec.get(specRule) ?? []), codeRule]);
    }
  }

  specRuleFor(codeRule: string): string | null {
    return this.specByCode.get(codeRule) ?? null;
  }

  codeRulesFor(specRule: string): string[] {
    return [...(this.codeBySpec.get(specRule) ?? [])].sort();
  }

  /** Spec rules that both sets report once the code rules are translated. */
  sharedRules(specRules: Iterable<string>, codeRules: Iterable<string>): string[] {
    const spec = new Set(specRules);
    const shared = new Set<string>();

    for (const codeRule of codeRules) {
      const mapped = this.specRuleFor(codeRule);
      if (mapped !== null && spec.has(mapped)) {
        shared.add(mapped);
      }
    }

    return Array.from(shared).sort();
  }
}

export interface SyncSummary {
  total: number;
  in_sync: number;
  spec_only: number;
  code_only: number;
  both_wrong: number;
  conflicts: number;
  requires_fixes: number;
  requires_manual_review: number;
}

export interface SyncReport {
  in_sync: SyncEntry[];
  spec_only: SyncEntry[];
  code_only: SyncEntry[];
  both_wrong: SyncEntry[];
  conflicts: SyncEntry[];
  summary: SyncSummary;
}

export interface ArtifactInventory {
  specArtifacts?: readonly string[];
  codeArtifacts?: readonly string[];
}

export type RecommendationPriority = 'critical' | 'high' | 'medium';

export interface FixRecommendation {
  priority: RecommendationPriority;
  strategy: SyncStrategy;
  specArtifact: string | null;
  codeArtifacts: string[];
  specViolations: Violation[];
  codeViolations: Violation[];
  action: string;
  reason: string;
}

export const NO_RELATED_CODE = 'No related code artifact found';
export const NO_RELATED_SPEC = 'No related spec artifact found';

const bucketOf: Record<SyncCategory, keyof Omit<SyncReport, 'summary'>> = {
  in_sync: 'in_sync',
  spec_only: 'spec_only',
  code_only: 'code_only',
  both_wrong: 'both_wrong',
  conflict: 'conflicts'
};

const strategyOf: Record<SyncCategory, SyncStrategy> = {
  in_sync: 'none',
  spec_only: 'fix_spec',
  code_only: 'fix_code',
  both_wrong: 'atomic_multi_file',
  conflict: 'manual_review'
};

function specArtifactOf(violation: Violation): string {
  return violation.file ?? 'unknown';
}

function codeArtifactOf(violation: Violation): string {
  return resolveTargetPath(violation) ?? 'unknown';
}

function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export interface ConsistencyValidatorOptions {
  equivalence?: RuleEquivalence;
  resolver?: ArtifactResolver;
  logger?: PipelineLogger;
}

/**
 * Reconciles spec-level and code-level violation sets. Each artifact lands in
 * exactly one entry, so the five categories partition the pairs considered.
 */
export class ConsistencyValidator {
  private readonly equivalence: RuleEquivalence;
  private readonly resolver: ArtifactResolver;
  private readonly logger: PipelineLogger;

  constructor(options: ConsistencyValidatorOptions = {}) {
    this.equivalence = options.equivalence ?? new RuleEquivalence();
    this.resolver = options.resolver ?? new NameMatchingResolver();
    this.logger = options.logger ?? silentLogger;
  }

  validate(
    specViolations: readonly Violation[],
    codeViolations: readonly Violation[],
    inventory: ArtifactInventory = {}
  ): SyncReport {
    const specByArtifact = groupViolations(specViolations, specArtifactOf);
    const codeByArtifact = groupViolations(codeViolations, codeArtifactOf);

    const specArtifacts = sortedUnique([...specByArtifact.keys(), ...(inventory.specArtifacts ?? [])]);
    const codeArtifacts = sortedUnique([...codeByArtifact.keys(), ...(inventory.codeArtifacts ?? [])]);

    const entries: SyncEntry[] = [];
    const claimed = new Set<string>();

    for (const specArtifact of specArtifacts) {
      const unclaimed = codeArtifacts.filter((artifact) => !claimed.has(artifact));
      const related = sortedUnique(this.resolver.relatedCodeArtifacts(specArtifact, unclaimed)).filter((artifact) =>
        unclaimed.includes(artifact)
      );
      related.forEach((artifact) => claimed.add(artifact));

      const specSide = specByArtifact.get(specArtifact) ?? [];
      const codeSide = related.flatMap((artifact) => codeByArtifact.get(artifact) ?? []);

      entries.push(
        related.length === 0
          ? this.unpaired(specArtifact, [], specSide, [], NO_RELATED_CODE)
          : this.classify(specArtifact, related, specSide, codeSide)
      );
    }

    for (const codeArtifact of codeArtifacts) {
      if (!claimed.has(codeArtifact)) {
        entries.push(this.unpaired(null, [codeArtifact], [], codeByArtifact.get(codeArtifact) ?? [], NO_RELATED_SPEC));
      }
    }

    const report: SyncReport = {
      in_sync: [],
      spec_only: [],
      code_only: [],
      both_wrong: [],
      conflicts: [],
      summary: {
        total: 0,
        in_sync: 0,
        spec_only: 0,
        code_only: 0,
        both_wrong: 0,
        conflicts: 0,
        requires_fixes: 0,
        requires_manual_review: 0
      }
    };

    for (const entry of entries) {
      report[bucketOf[entry.category]].push(entry);
    }

    report.summary = {
      total: entries.length,
      in_sync: report.in_sync.length,
      spec_only: report.spec_only.length,
      code_only: report.code_only.length,
      both_wrong: report.both_wrong.length,
      conflicts: report.conflicts.length,
      requires_fixes: report.spec_only.length + report.code_only.length + report.both_wrong.length,
      requires_manual_review: report.conflicts.length
    };

    this.logger.info({ ...report.summary }, 'consistency validation complete');
    return report;
  }

  classify(
    specArtifact: string | null,
    codeArtifacts: readonly string[],
    specViolations: readonly Violation[],
    codeViolations: readonly Violation[]
  ): SyncEntry {
    if (specViolations.length === 0 && codeViolations.length === 0) {
      return this.entry('in_sync', specArtifact, codeArtifacts, specViolations, codeViolations, 'Spec and code are both clean');
    }

    if (codeViolations.length === 0) {
      return this.entry('spec_only', specArtifact, codeArtifacts, specViolations, codeViolations, 'Spec has violations but code is clean');
    }

    if (specViolations.length === 0) {
      return this.entry('code_only', specArtifact, codeArtifacts, specViolations, codeViolations, 'Code has violations but spec is clean');
    }

    const specRules = sortedUnique(specViolations.map((violation) => violation.rule));
    const codeRules = sortedUnique(codeViolations.map((violation) => violation.rule));
    const shared = this.equivalence.sharedRules(specRules, codeRules);

    if (shared.length > 0) {
      return this.entry(
        'both_wrong',
        specArtifact,
        codeArtifacts,
        specViolations,
        codeViolations,
        `Both layers have violations for the same rules: ${shared.join(', ')}`
      );
    }

    return this.entry(
      'conflict',
      specArtifact,
      codeArtifacts,
      specViolations,
      codeViolations,
      `Violations are for different rules: spec=[${specRules.join(', ')}] code=[${codeRules.join(', ')}]`
    );
  }

  exportReport(report: SyncReport): Record<string, unknown> {
    const exportEntry = (entry: SyncEntry) => ({
      spec_artifact: entry.specArtifact,
      code_artifacts: entry.codeArtifacts,
      spec_violations: entry.specViolations,
      code_violations: entry.codeViolations,
      reason: entry.reason,
      fix_strategy: entry.strategy
    });

    return {
      in_sync: report.in_sync.map(exportEntry),
      spec_only: report.spec_only.map(exportEntry),
      code_only: report.code_only.map(exportEntry),
      both_wrong: report.both_wrong.map(exportEntry),
      conflicts: report.conflicts.map(exportEntry),
      summary: report.summary
    };
  }

  recommendFixes(report: SyncReport): FixRecommendation[] {
    const recommend = (entry: SyncEntry, priority: RecommendationPriority, action: string): FixRecommendation => ({
      priority,
      strategy: entry.strategy,
      specArtifact: entry.specArtifact,
      codeArtifacts: [...entry.codeArtifacts],
      specViolations: [...entry.specViolations],
      codeViolations: [...entry.codeViolations],
      action,
      reason: entry.reason
    });

    return [
      ...report.spec_only.map((entry) => recommend(entry, 'high', 'Fix the spec and carry the change into the implementing code')),
      ...report.code_only.map((entry) => recommend(entry, 'medium', 'Fix the code to match the spec')),
      ...report.both_wrong.map((entry) => recommend(entry, 'high', 'Generate one atomic fix covering spec and code')),
      ...report.conflicts.map((entry) =>
        recommend(entry, 'critical', 'Manual review required; spec and code disagree about what is wrong')
      )
    ];
  }

  private unpaired(
    specArtifact: string | null,
    codeArtifacts: readonly string[],
    specViolations: readonly Violation[],
    codeViolations: readonly Violation[],
    reason: string
  ): SyncEntry {
    const category: SyncCategory =
      specViolations.length > 0 ? 'spec_only' : codeViolations.length > 0 ? 'code_only' : 'in_sync';
    return this.entry(category, specArtifact, codeArtifacts, specViolations, codeViolations, reason);
  }

  private entry(
    category: SyncCategory,
    specArtifact: string | null,
    codeArtifacts: readonly string[],
    specViolations: readonly Violation[],
    codeViolations: readonly Violation[],
    reason: string
  ): SyncEntry {
    return {
      category,
      specArtifact,
      codeArtifacts: [...codeArtifacts],
      specViolations: [...specViolations],
      codeViolations: [...codeViolations],
      reason,
      strategy: strategyOf[category]
    };
  }
}
