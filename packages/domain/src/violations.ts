import { z } from 'zod';

import { Violation, ViolationSeverity } from './types.js';

const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

const rawViolationSchema = z.object({
  rule: lenient(z.string()),
  rule_id: lenient(z.string()),
  ruleId: lenient(z.string()),
  code: lenient(z.union([z.string(), z.number()])),
  message: lenient(z.string()),
  violation: lenient(z.string()),
  description: lenient(z.string()),
  file: lenient(z.string()),
  source: lenient(z.string()),
  class: lenient(z.string()),
  line: lenient(z.union([z.number(), z.string()])),
  range: lenient(z.object({ start: z.object({ line: z.number() }) })),
  severity: lenient(z.union([z.number(), z.string()])),
  path: lenient(z.union([z.string(), z.array(z.union([z.string(), z.number()]))])),
  engine: lenient(z.string())
});

type RawViolation = z.output<typeof rawViolationSchema>;

const reportSchema = z.object({
  spectral_results: lenient(z.array(z.unknown())),
  archunit_results: lenient(z.array(z.unknown())),
  llm_results: lenient(z.array(z.unknown())),
  violations: lenient(z.array(z.unknown()))
});

const numericSeverity: Record<number, ViolationSeverity> = {
  0: 'critical',
  1: 'warning',
  2: 'info',
  3: 'info'
};

const namedSeverity: Record<string, ViolationSeverity> = {
  error: 'critical',
  critical: 'critical',
  high: 'critical',
  blocker: 'critical',
  warn: 'warning',
  warning: 'warning',
  medium: 'warning',
  info: 'info',
  information: 'info',
  hint: 'info',
  low: 'info'
};

export function normalizeSeverity(value: number | string | undefined): ViolationSeverity {
  if (typeof value === 'number') {
    return numericSeverity[value] ?? 'warning';
  }

  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (/^\d+$/.test(trimmed)) {
      return numericSeverity[Number(trimmed)] ?? 'warning';
    }
    return namedSeverity[trimmed] ?? 'warning';
  }

  return 'warning';
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function detectEngine(raw: RawViolation): string {
  if (raw.engine) {
    return raw.engine.toLowerCase();
  }

  if (raw.code !== undefined && !raw.rule && !raw.rule_id && !raw.ruleId) {
    return 'spectral';
  }

  if (raw.violation !== undefined || raw.class !== undefined) {
    return 'archunit';
  }

  return 'unknown';
}

function lineOf(raw: RawViolation, engine: string): number | null {
  if (raw.line !== undefined) {
    const line = Number(raw.line);
    if (!Number.isInteger(line) || line < 0) {
      return null;
    }
    return line === 0 && engine !== 'spectral' ? null : line;
  }

  if (raw.range) {
    return raw.range.start.line;
  }

  return null;
}

function pathOf(raw: RawViolation): string | null {
  if (Array.isArray(raw.path)) {
    return raw.path.length > 0 ? raw.path.map(String).join('.') : null;
  }

  return nonEmpty(raw.path);
}

/**
 * Converts one engine record (Spectral, ArchUnit or the generic governance
 * shape) into a Violation. Never throws; unusable input yields an `unknown`
 * rule so it still lands in the audit counts.
 */
export function normalizeViolation(input: unknown): Violation {
  const parsed = rawViolationSchema.safeParse(input);
  if (!parsed.success) {
    return {
      rule: 'unknown',
      message: '',
      file: null,
      line: null,
      severity: 'warning',
      engine: 'unknown',
      path: null
    };
  }

  const raw = parsed.data;
  const engine = detectEngine(raw);
  const code = raw.code === undefined ? undefined : String(raw.code);

  return {
    rule: nonEmpty(raw.rule) ?? nonEmpty(raw.rule_id) ?? nonEmpty(raw.ruleId) ?? nonEmpty(code) ?? 'unknown',
    message: raw.message ?? raw.violation ?? raw.description ?? '',
    file: nonEmpty(raw.file) ?? nonEmpty(raw.source) ?? nonEmpty(raw.class),
    line: lineOf(raw, engine),
    severity: normalizeSeverity(raw.severity),
    engine,
    path: pathOf(raw)
  };
}

export function normalizeViolations(inputs: readonly unknown[]): Violation[] {
  return inputs.map((input) => normalizeViolation(input));
}

/**
 * Accepts a bare list of records or a governance report object carrying
 * per-engine result lists.
 */
export function parseViolationReport(input: unknown): Violation[] {
  if (Array.isArray(input)) {
    return normalizeViolations(input);
  }

  const parsed = reportSchema.safeParse(input);
  if (!parsed.success) {
    return [];
  }

  const report = parsed.data;
  return normalizeViolations([
    ...(report.spectral_results ?? []),
    ...(report.archunit_results ?? []),
    ...(report.llm_results ?? []),
    ...(report.violations ?? [])
  ]);
}

export function violationKey(violation: Violation): string {
  return [violation.rule, violation.file ?? '', violation.line ?? '', violation.message].join('|');
}

export function dedupeViolations(violations: readonly Violation[]): Violation[] {
  const seen = new Set<string>();
  const unique: Violation[] = [];

  for (const violation of violations) {
    const key = violationKey(violation);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(violation);
  }

  return unique;
}

export function groupViolations<K>(violations: readonly Violation[], keyOf: (violation: Violation) => K): Map<K, Violation[]> {
  const groups = new Map<K, Violation[]>();

  for (const violation of violations) {
    const key = keyOf(violation);
    const group = groups.get(key);
    if (group) {
      group.push(violation);
    } else {
      groups.set(key, [violation]);
    }
  }

  return groups;
}

export function countBySeverity(violations: readonly Violation[]): Record<ViolationSeverity, number> {
  const counts: Record<ViolationSeverity, number> = { critical: 0, warning: 0, info: 0 };

  for (const violation of violations) {
    counts[violation.severity] += 1;
  }

  return counts;
}

const classReferencePattern = /Class <([^>]+)>/;
const qualifiedNamePattern = /(?:[a-z][a-z0-9_]*\.)+[A-Z][a-zA-Z0-9_]*/;
const bareQualifiedNamePattern = /^(?:[a-z][a-z0-9_]*\.)+[A-Z][a-zA-Z0-9_$]*$/;

function javaSourcePath(className: string): string {
  const outer = className.split('$')[0] ?? className;
  return `src/main/java/${outer.replace(/\./g, '/')}.java`;
}

/**
 * Resolves the file a violation should be fixed in, or null when no location
 * can be derived.
 */
export function resolveTargetPath(violation: Violation): string | null {
  const file = violation.file;
  if (file && file !== 'unknown') {
    return bareQualifiedNamePattern.test(file) ? javaSourcePath(file) : file;
  }

  const classReference = classReferencePattern.exec(violation.message);
  if (classReference?.[1]) {
    return javaSourcePath(classReference[1]);
  }

  const qualifiedName = qualifiedNamePattern.exec(violation.message);
  if (qualifiedName) {
    return javaSourcePath(qualifiedName[0]);
  }

  return null;
}

export function violationLine(violation: Violation): number | null {
  if (violation.line !== null) {
    return violation.line;
  }

  const match = /line (\d+)/i.exec(violation.message);
  return match ? Number(match[1]) : null;
}

export function isSpecArtifact(filePath: string): boolean {
  return /\.(ya?ml|json)$/i.test(filePath);
}

export function isJavaArtifact(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.java');
}
