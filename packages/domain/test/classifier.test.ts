import { describe, expect, it } from 'vitest';

import { ViolationClassifier } from '../src/classifier.js';
import { TaxonomyError } from '../src/errors.js';
import { Taxonomy, TaxonomyDefinition, defaultTaxonomy } from '../src/taxonomy.js';
import { makeViolation } from './fixtures.js';

const classifier = new ViolationClassifier(defaultTaxonomy());

const pluralResources = makeViolation({ rule: 'plural-resources', file: 'api/users-api.yaml', engine: 'spectral' });
const stdStreams = makeViolation({ rule: 'coding-no-std-streams' });

function smallTaxonomy(overrides: Partial<TaxonomyDefinition> = {}): TaxonomyDefinition {
  return {
    version: 1,
    fallbackCategory: 'MISC',
    categories: [
      { name: 'FIRST', displayName: 'First', description: 'first', priority: 1, effort: 'Low', rules: ['shared', 'alpha'] },
      { name: 'SECOND', displayName: 'Second', description: 'second', priority: 2, effort: 'High', rules: ['shared', 'beta'] },
      { name: 'MISC', displayName: 'Misc', description: 'misc', priority: 9, effort: 'Varies', rules: [] }
    ],
    subcategories: [],
    ...overrides
  };
}

describe('ViolationClassifier', () => {
  it('categorizes by rule with the bundled taxonomy', () => {
    expect(classifier.categorize(pluralResources)).toBe('RESOURCE_NAMING');
    expect(classifier.categorize(stdStreams)).toBe('CODE_QUALITY');

    const summary = classifier.summarize([stdStreams, pluralResources]);
    expect(summary.map((entry) => [entry.name, entry.priority])).toEqual([
      ['RESOURCE_NAMING', 1],
      ['CODE_QUALITY', 3]
    ]);
  });

  it('picks the highest-priority category first and moves on once its rules are fixed', () => {
    expect(classifier.nextCategory([stdStreams, pluralResources], [])).toEqual({
      category: 'RESOURCE_NAMING',
      violations: [pluralResources]
    });

    const fixedCopy = makeViolation({ rule: 'plural-resources', message: 'a different record' });
    expect(classifier.nextCategory([stdStreams, pluralResources], [fixedCopy])).toEqual({
      category: 'CODE_QUALITY',
      violations: [stdStreams]
    });

    expect(classifier.nextCategory([], [])).toEqual({ category: null, violations: [] });
  });

  it('is total and deterministic for unknown rules', () => {
    const unknown = makeViolation({ rule: 'made-up-rule' });
    expect(classifier.categorize(unknown)).toBe('OTHER');
    expect(classifier.categorize(makeViolation({ rule: 'made-up-rule', message: 'again' }))).toBe('OTHER');
  });

  it('lets the first declaration win when a rule is listed twice', () => {
    const custom = new ViolationClassifier(new Taxonomy(smallTaxonomy()));
    expect(custom.categorize(makeViolation({ rule: 'shared' }))).toBe('FIRST');
    expect(custom.categorize(makeViolation({ rule: 'beta' }))).toBe('SECOND');
    expect(custom.categorize(makeViolation({ rule: 'gamma' }))).toBe('MISC');
  });

  it('reports progress', () => {
    const progress = classifier.progress([stdStreams, pluralResources, makeViolation({ rule: 'plural-resources', line: 3 })], [pluralResources]);

    expect(progress.totalViolations).toBe(3);
    expect(progress.fixedViolations).toBe(2);
    expect(progress.remainingViolations).toBe(1);
    expect(progress.percentComplete).toBe(66.7);
  });

  it('exports the category report shape', () => {
    const report = classifier.exportReport([stdStreams, pluralResources]);

    expect(report.total_violations).toBe(2);
    expect(report.total_categories).toBe(2);
    expect(report.recommended_order).toEqual(['RESOURCE_NAMING', 'CODE_QUALITY']);
    expect(report.categories.CODE_QUALITY?.count).toBe(1);
    expect(report.categories.CODE_QUALITY?.effort).toBe('Medium');
  });

  it('summarizes subcategories with their metadata', () => {
    const summary = classifier.subcategorySummary([stdStreams, stdStreams, makeViolation({ rule: 'made-up-rule' })]);

    expect(summary.CODE_QUALITY?.subcategories['coding-no-std-streams']).toMatchObject({
      displayName: 'No System.out/System.err',
      violationCount: 2,
      fixComplexity: 'simple'
    });
    expect(summary.OTHER?.subcategories['made-up-rule']).toMatchObject({
      description: 'No description',
      fixComplexity: 'unknown',
      example: 'No example'
    });
  });
});

describe('Taxonomy', () => {
  it('rejects a missing fallback category', () => {
    expect(() => new Taxonomy(smallTaxonomy({ fallbackCategory: 'NOPE' }))).toThrow(TaxonomyError);
  });

  it('rejects duplicate categories', () => {
    const definition = smallTaxonomy();
    const first = definition.categories[0];
    expect(first).toBeDefined();
    if (first) {
      expect(() => new Taxonomy({ ...definition, categories: [...definition.categories, first] })).toThrow('Duplicate category: FIRST');
    }
  });

  it('loads the bundled registry', () => {
    const taxonomy = defaultTaxonomy();
    expect(taxonomy.version).toBe(1);
    expect(taxonomy.categories.map((category) => category.name)).toContain('DOCUMENTATION');
    expect(taxonomy.categoryForRule('pathVariablesShouldBeUUID').name).toBe('DATA_TYPES');
  });
});
