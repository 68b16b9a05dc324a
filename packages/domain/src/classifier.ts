import { Taxonomy } from './taxonomy.js';
import { Category, Effort, FixComplexity, Violation } from './types.js';

export interface CategorySummary {
  name: string;
  displayName: string;
  description: string;
  count: number;
  priority: number;
  effort: Effort;
  violations: Violation[];
}

export interface NextCategory {
  category: string | null;
  violations: Violation[];
}

export interface CategoryProgress {
  name: string;
  total: number;
  fixed: number;
  remaining: number;
}

export interface ProgressReport {
  totalViolations: number;
  fixedViolations: number;
  remainingViolations: number;
  percentComplete: number;
  categories: CategoryProgress[];
}

export interface CategoryExport {
  total_violations: number;
  total_categories: number;
  categories: Record<
    string,
    {
      count: number;
      priority: number;
      effort: Effort;
      display_name: string;
      description: string;
      violations: Violation[];
    }
  >;
  recommended_order: string[];
}

export interface SubcategoryDetail {
  displayName: string;
  description: string;
  violationCount: number;
  fixComplexity: FixComplexity | 'unknown';
  example: string;
  violations: Violation[];
}

export type SubcategorySummary = Record<
  string,
  {
    totalViolations: number;
    subcategories: Record<string, SubcategoryDetail>;
  }
>;

export class ViolationClassifier {
  constructor(private readonly taxonomy: Taxonomy) {}

  categorize(violation: Violation): string {
    return this.taxonomy.categoryForRule(violation.rule).name;
  }

  partition(violations: readonly Violation[]): Map<string, Violation[]> {
    const byCategory = new Map<string, Violation[]>();

    for (const violation of violations) {
      const name = this.categorize(violation);
      const bucket = byCategory.get(name);
      if (bucket) {
        bucket.push(violation);
      } else {
        byCategory.set(name, [violation]);
      }
    }

    return byCategory;
  }

  violationsIn(category: string, violations: readonly Violation[]): Violation[] {
    return violations.filter((violation) => this.categorize(violation) === category);
  }

  summarize(violations: readonly Violation[]): CategorySummary[] {
    const summaries: CategorySummary[] = [];

    for (const [name, bucket] of this.partition(violations)) {
      const category = this.requireCategory(name);
      summaries.push({
        name: category.name,
        displayName: category.displayName,
        description: category.description,
        count: bucket.length,
        priority: category.priority,
        effort: category.effort,
        violations: bucket
      });
    }

    return summaries.sort((left, right) => left.priority - right.priority || left.name.localeCompare(right.name));
  }

  /**
   * Highest-priority category that still has a violation whose rule is not
   * among the fixed ones.
   */
  nextCategory(all: readonly Violation[], fixed: readonly Violation[]): NextCategory {
    const fixedRules = new Set(fixed.map((violation) => violation.rule));

    for (const summary of this.summarize(all)) {
      const remaining = summary.violations.filter((violation) => !fixedRules.has(violation.rule));
      if (remaining.length > 0) {
        return { category: summary.name, violations: remaining };
      }
    }

    return { category: null, violations: [] };
  }

  progress(all: readonly Violation[], fixed: readonly Violation[]): ProgressReport {
    const fixedRules = new Set(fixed.map((violation) => violation.rule));
    const categories = this.summarize(all).map<CategoryProgress>((summary) => {
      const fixedCount = summary.violations.filter((violation) => fixedRules.has(violation.rule)).length;
      return {
        name: summary.name,
        total: summary.count,
        fixed: fixedCount,
        remaining: summary.count - fixedCount
      };
    });

    const fixedViolations = categories.reduce((sum, entry) => sum + entry.fixed, 0);
    const totalViolations = all.length;

    return {
      totalViolations,
      fixedViolations,
      remainingViolations: totalViolations - fixedViolations,
      percentComplete: totalViolations === 0 ? 100 : Math.round((fixedViolations / totalViolations) * 1000) / 10,
      categories
    };
  }

  exportReport(violations: readonly Violation[]): CategoryExport {
    const summaries = this.summarize(violations);
    const categories: CategoryExport['categories'] = {};

    for (const summary of summaries) {
      categories[summary.name] = {
        count: summary.count,
        priority: summary.priority,
        effort: summary.effort,
        display_name: summary.displayName,
        description: summary.description,
        violations: summary.violations
      };
    }

    return {
      total_violations: violations.length,
      total_categories: summaries.length,
      categories,
      recommended_order: summaries.map((summary) => summary.name)
    };
  }

  subcategorySummary(violations: readonly Violation[]): SubcategorySummary {
    const summary: SubcategorySummary = {};

    for (const categorySummary of this.summarize(violations)) {
      const subcategories: Record<string, SubcategoryDetail> = {};

      for (const violation of categorySummary.violations) {
        const existing = subcategories[violation.rule];
        if (existing) {
          existing.violations.push(violation);
          existing.violationCount += 1;
          continue;
        }

        const info = this.taxonomy.subcategory(violation.rule);
        subcategories[violation.rule] = {
          displayName: info?.displayName ?? violation.rule,
          description: info?.description ?? 'No description',
          violationCount: 1,
          fixComplexity: info?.fixComplexity ?? 'unknown',
          example: info?.example ?? 'No example',
          violations: [violation]
        };
      }

      summary[categorySummary.name] = {
        totalViolations: categorySummary.count,
        subcategories
      };
    }

    return summary;
  }

  private requireCategory(name: string): Category {
    return this.taxonomy.category(name) ?? this.taxonomy.fallback;
  }
}
