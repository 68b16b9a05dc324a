import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { TaxonomyError } from './errors.js';
import { Category, Subcategory } from './types.js';

const taxonomySchema = z.object({
  version: z.number().int().positive(),
  fallbackCategory: z.string().min(1),
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        displayName: z.string(),
        description: z.string(),
        priority: z.number().int(),
        effort: z.enum(['Low', 'Medium', 'High', 'Varies']),
        rules: z.array(z.string())
      })
    )
    .min(1),
  subcategories: z.array(
    z.object({
      ruleId: z.string().min(1),
      displayName: z.string(),
      description: z.string(),
      category: z.string(),
      fixComplexity: z.enum(['simple', 'moderate', 'complex']),
      example: z.string()
    })
  )
});

export type TaxonomyDefinition = z.input<typeof taxonomySchema>;

/**
 * Versioned, read-only rule registry. Built once and handed to the components
 * that need it; lookups never mutate it.
 */
export class Taxonomy {
  readonly version: number;
  readonly fallback: Category;
  private readonly categoriesByName: ReadonlyMap<string, Category>;
  private readonly categoryByRule: ReadonlyMap<string, Category>;
  private readonly subcategoryByRule: ReadonlyMap<string, Subcategory>;

  constructor(definition: TaxonomyDefinition) {
    const parsed = taxonomySchema.safeParse(definition);
    if (!parsed.success) {
      throw new TaxonomyError(`Invalid taxonomy: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }

    const data = parsed.data;
    this.version = data.version;

    const categoriesByName = new Map<string, Category>();
    const categoryByRule = new Map<string, Category>();

    for (const entry of data.categories) {
      if (categoriesByName.has(entry.name)) {
        throw new TaxonomyError(`Duplicate category: ${entry.name}`);
      }

      const category: Category = {
        name: entry.name,
        displayName: entry.displayName,
        description: entry.description,
        priority: entry.priority,
        effort: entry.effort,
        rules: new Set(entry.rules)
      };

      categoriesByName.set(category.name, category);

      // First declaration wins when a rule is listed twice.
      for (const rule of entry.rules) {
        if (!categoryByRule.has(rule)) {
          categoryByRule.set(rule, category);
        }
      }
    }

    const fallback = categoriesByName.get(data.fallbackCategory);
    if (!fallback) {
      throw new TaxonomyError(`Fallback category ${data.fallbackCategory} is not defined`);
    }

    this.fallback = fallback;
    this.categoriesByName = categoriesByName;
    this.categoryByRule = categoryByRule;
    this.subcategoryByRule = new Map(data.subcategories.map((entry) => [entry.ruleId, { ...entry }]));
  }

  get categories(): Category[] {
    return Array.from(this.categoriesByName.values());
  }

  category(name: string): Category | null {
    return this.categoriesByName.get(name) ?? null;
  }

  categoryForRule(rule: string): Category {
    return this.categoryByRule.get(rule) ?? this.fallback;
  }

  subcategory(rule: string): Subcategory | null {
    return this.subcategoryByRule.get(rule) ?? null;
  }
}

export function loadTaxonomy(filePath: string | URL): Taxonomy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TaxonomyError(`Cannot read taxonomy from ${String(filePath)}: ${message}`);
  }

  const parsed = taxonomySchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaxonomyError(`Invalid taxonomy in ${String(filePath)}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  return new Taxonomy(parsed.data);
}

let bundled: Taxonomy | null = null;

/** The governance taxonomy shipped in `data/taxonomy.json`. */
export function defaultTaxonomy(): Taxonomy {
  bundled ??= loadTaxonomy(new URL('../data/taxonomy.json', import.meta.url));
  return bundled;
}
