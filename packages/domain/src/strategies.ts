import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { TaxonomyError } from './errors.js';
import {
  javaUtilLogging,
  secureRandom,
  serialVersionUid,
  stdStreams,
  transactionalLayer
} from './java-fixers.js';
import {
  camelCaseProperties,
  createdReturnsResource,
  descriptionRequired,
  kebabCasePaths,
  paginationStructure,
  pluralResources,
  postReturns201,
  standardHttpVerbs,
  uuidFormat,
  versioningRequired
} from './openapi-fixers.js';
import { FixComplexity, FixSafety, Violation } from './types.js';

export interface FixerOutput {
  content: string;
  addedImports: string[];
  removedImports: string[];
}

export interface FixerContext {
  violation: Violation;
  line: number | null;
  filePath: string;
}

/** Deterministic rule fixer. Returns null when it has nothing to change. */
export type StrategyFixer = (content: string, context: FixerContext) => FixerOutput | null;

export interface FixStrategy {
  readonly ruleId: string;
  readonly description: string;
  readonly complexity: FixComplexity;
  readonly safety: FixSafety;
  readonly fixer: StrategyFixer | null;
  readonly explanation: string;
  readonly requiresImports: readonly string[];
}

export const builtinFixers: Readonly<Record<string, StrategyFixer>> = {
  javaUtilLogging,
  secureRandom,
  serialVersionUid,
  transactionalLayer,
  stdStreams,
  kebabCasePaths,
  pluralResources,
  standardHttpVerbs,
  uuidFormat,
  camelCaseProperties,
  paginationStructure,
  descriptionRequired,
  versioningRequired,
  createdReturnsResource,
  postReturns201
};

const catalogSchema = z.object({
  version: z.number().int().positive(),
  strategies: z.array(
    z.object({
      ruleId: z.string().min(1),
      description: z.string(),
      complexity: z.enum(['simple', 'moderate', 'complex']),
      safety: z.enum(['safe', 'review_required', 'manual_only']),
      fixer: z.string().nullable(),
      explanation: z.string(),
      requiresImports: z.array(z.string()).default([])
    })
  )
});

export type StrategyCatalogDefinition = z.input<typeof catalogSchema>;

/** `manual_only` is the legacy third tier; it carries the same meaning as `review_required`. */
export function normalizeSafety(value: 'safe' | 'review_required' | 'manual_only'): FixSafety {
  return value === 'safe' ? 'safe' : 'review_required';
}

export class StrategyCatalog {
  readonly version: number;
  private readonly byRule: ReadonlyMap<string, FixStrategy>;

  constructor(definition: StrategyCatalogDefinition, fixers: Readonly<Record<string, StrategyFixer>> = builtinFixers) {
    const parsed = catalogSchema.safeParse(definition);
    if (!parsed.success) {
      throw new TaxonomyError(`Invalid strategy catalog: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }

    const byRule = new Map<string, FixStrategy>();
    for (const entry of parsed.data.strategies) {
      let fixer: StrategyFixer | null = null;
      if (entry.fixer !== null) {
        const found = fixers[entry.fixer];
        if (!found) {
          throw new TaxonomyError(`Strategy ${entry.ruleId} names unknown fixer ${entry.fixer}`);
        }
        fixer = found;
      }

      byRule.set(entry.ruleId, {
        ruleId: entry.ruleId,
        description: entry.description,
        complexity: entry.complexity,
        safety: normalizeSafety(entry.safety),
        fixer,
        explanation: entry.explanation,
        requiresImports: entry.requiresImports
      });
    }

    this.version = parsed.data.version;
    this.byRule = byRule;
  }

  get size(): number {
    return this.byRule.size;
  }

  strategyFor(ruleId: string): FixStrategy | null {
    return this.byRule.get(ruleId) ?? null;
  }

  hasStrategy(ruleId: string): boolean {
    return this.byRule.has(ruleId);
  }

  rules(): string[] {
    return Array.from(this.byRule.keys()).sort();
  }
}

export function loadStrategyCatalog(filePath: string | URL): StrategyCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TaxonomyError(`Cannot read strategy catalog from ${String(filePath)}: ${message}`);
  }

  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaxonomyError(`Invalid strategy catalog in ${String(filePath)}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  return new StrategyCatalog(parsed.data);
}

let bundled: StrategyCatalog | null = null;

export function defaultStrategyCatalog(): StrategyCatalog {
  bundled ??= loadStrategyCatalog(new URL('../data/fix-strategies.json', import.meta.url));
  return bundled;
}
