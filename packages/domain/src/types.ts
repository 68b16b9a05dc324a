export type ViolationSeverity = 'critical' | 'warning' | 'info';

export interface Violation {
  readonly rule: string;
  readonly message: string;
  readonly file: string | null;
  readonly line: number | null;
  readonly severity: ViolationSeverity;
  readonly engine: string;
  readonly path: string | null;
}

export type Effort = 'Low' | 'Medium' | 'High' | 'Varies';

export interface Category {
  readonly name: string;
  readonly displayName: string;
  readonly description: string;
  readonly priority: number;
  readonly effort: Effort;
  readonly rules: ReadonlySet<string>;
}

export type FixComplexity = 'simple' | 'moderate' | 'complex';

export interface Subcategory {
  readonly ruleId: string;
  readonly displayName: string;
  readonly description: string;
  readonly category: string;
  readonly fixComplexity: FixComplexity;
  readonly example: string;
}

/**
 * Two-tier safety classification. Older strategy catalogs carry a third
 * `manual_only` tier; it is read as `review_required` (see `normalizeSafety`).
 */
export type FixSafety = 'safe' | 'review_required';

export interface RelatedChange {
  readonly filePath: string;
  readonly originalContent: string;
  readonly proposedContent: string;
}

export interface ProposedFix {
  readonly id: string;
  readonly ruleId: string;
  readonly ruleIds: readonly string[];
  readonly filePath: string;
  readonly line: number | null;
  readonly originalContent: string;
  readonly proposedContent: string;
  readonly explanation: string;
  readonly complexity: FixComplexity;
  readonly safety: FixSafety;
  readonly violations: readonly Violation[];
  readonly addedImports: readonly string[];
  readonly removedImports: readonly string[];
  readonly relatedChanges: readonly RelatedChange[];
}

export interface FileDiff {
  readonly fixId: string;
  readonly filePath: string;
  readonly ruleId: string;
  readonly unifiedDiff: string;
  readonly additions: number;
  readonly deletions: number;
  readonly severity: ViolationSeverity;
  readonly explanation: string;
}

export type ReviewDecision = 'pending' | 'approved' | 'rejected' | 'skipped';

export interface ReviewComment {
  readonly fixId: string;
  readonly comment: string;
  readonly timestamp: string;
}

export interface ReviewSummary {
  total: number;
  approved: number;
  rejected: number;
  pending: number;
  skipped: number;
}

export interface ReviewRecord {
  decisions: Record<string, ReviewDecision>;
  comments: ReviewComment[];
  summary: ReviewSummary;
}

export type ReviewCommand =
  | { type: 'approve' }
  | { type: 'reject' }
  | { type: 'skip' }
  | { type: 'comment' }
  | { type: 'quit' }
  | { type: 'approve_all' }
  | { type: 'reject_all' };

export type SyncCategory = 'in_sync' | 'spec_only' | 'code_only' | 'both_wrong' | 'conflict';

export type SyncStrategy = 'none' | 'fix_spec' | 'fix_code' | 'atomic_multi_file' | 'manual_review';

export interface SyncEntry {
  readonly category: SyncCategory;
  readonly specArtifact: string | null;
  readonly codeArtifacts: readonly string[];
  readonly specViolations: readonly Violation[];
  readonly codeViolations: readonly Violation[];
  readonly reason: string;
  readonly strategy: SyncStrategy;
}

export interface BuildResult {
  success: boolean;
  output: string;
  error: string | null;
  durationMs: number;
}

export interface ValidationResult {
  category: string;
  violationsBefore: number;
  violationsAfter: number;
  violationsFixed: number;
  newViolations: number;
  build: BuildResult | null;
  success: boolean;
  message: string;
}
