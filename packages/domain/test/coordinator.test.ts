import { describe, expect, it } from 'vitest';

import { ContentFixer } from '../src/collaborators.js';
import { FixProposalCoordinator, MULTIPLE_RULES } from '../src/coordinator.js';
import { NameMatchingResolver } from '../src/artifacts.js';
import { runBounded } from '../src/pool.js';
import { builtinFixers, defaultStrategyCatalog, StrategyCatalog } from '../src/strategies.js';
import { Violation } from '../src/types.js';
import { MemoryFiles, makeViolation } from './fixtures.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class FakeFixer implements ContentFixer {
  readonly calls: Array<{ method: 'one' | 'batch' | 'crossFile'; violations: number }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly edit: (content: string, filePath: string | null) => string = (content) => content,
    private readonly delayMs = 0
  ) {}

  async fixOne(content: string, violation: Violation): Promise<string> {
    return this.track('one', 1, async () => this.edit(content, violation.file));
  }

  async fixBatch(content: string, violations: readonly Violation[]): Promise<string> {
    return this.track('batch', violations.length, async () => this.edit(content, violations[0]?.file ?? null));
  }

  async fixCrossFile(files: ReadonlyMap<string, string>, violations: readonly Violation[]): Promise<Map<string, string>> {
    return this.track('crossFile', violations.length, async () => {
      const result = new Map<string, string>();
      for (const [filePath, content] of files) {
        result.set(filePath, this.edit(content, filePath));
      }
      return result;
    });
  }

  private async track<T>(method: 'one' | 'batch' | 'crossFile', violations: number, work: () => Promise<T>): Promise<T> {
    this.calls.push({ method, violations });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      return await work();
    } finally {
      this.inFlight -= 1;
    }
  }
}

const servicePath = 'src/main/java/com/example/UserService.java';
const serviceSource = [
  'public class UserService {',
  '    public void run() {',
  '        System.out.println("hi");',
  '    }',
  '}',
  ''
].join('\n');

describe('FixProposalCoordinator', () => {
  it('emits nothing when the fixer leaves content unchanged', async () => {
    const files = new MemoryFiles({ [servicePath]: serviceSource });
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files, fixer: new FakeFixer() });
    const violation = makeViolation({ rule: 'coding-no-generic-exceptions', file: servicePath });

    const report = await coordinator.proposeWithReport([violation]);

    expect(report.fixes).toEqual([]);
    expect(report.unresolved).toEqual([{ filePath: servicePath, violation }]);
  });

  it('consolidates deterministic and fixer edits into one fix per file', async () => {
    const files = new MemoryFiles({ [servicePath]: serviceSource });
    const fixer = new FakeFixer((content) => `${content}// reviewed\n`);
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files, fixer });

    const fixes = await coordinator.propose([
      makeViolation({ rule: 'coding-no-std-streams', file: servicePath, line: 3 }),
      makeViolation({ rule: 'coding-no-generic-exceptions', file: servicePath, line: 7 })
    ]);

    expect(fixes).toHaveLength(1);
    const [fix] = fixes;
    expect(fix?.id).toBe('fix-0001-batch');
    expect(fix?.ruleId).toBe(MULTIPLE_RULES);
    expect(fix?.ruleIds).toEqual(['coding-no-generic-exceptions', 'coding-no-std-streams']);
    expect(fix?.line).toBe(3);
    expect(fix?.proposedContent.endsWith('// reviewed\n')).toBe(true);
    expect(fix?.proposedContent).toContain('logger.info("hi");');
    expect(fix?.addedImports).toEqual(['org.slf4j.Logger', 'org.slf4j.LoggerFactory']);
    expect(fix?.safety).toBe('review_required');
    expect(fix?.complexity).toBe('moderate');
    expect(fix?.explanation).toBe(
      [
        'Fixes 2 violation(s) in this file:',
        '- coding-no-std-streams (1): Replace System.out/err with proper logging',
        '- coding-no-generic-exceptions (1): Replace generic exceptions with specific types'
      ].join('\n')
    );
    expect(fixer.calls).toEqual([{ method: 'one', violations: 1 }]);
  });

  it('sends every unresolved violation of a file in a single batch call', async () => {
    const files = new MemoryFiles({ [servicePath]: serviceSource });
    const fixer = new FakeFixer((content) => content.replace('UserService', 'UserServiceImpl'));
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files, fixer });

    const fixes = await coordinator.propose([
      makeViolation({ rule: 'coding-no-generic-exceptions', file: servicePath }),
      makeViolation({ rule: 'coding-no-field-injection', file: servicePath }),
      makeViolation({ rule: 'architecture-layered', file: servicePath })
    ]);

    expect(fixer.calls).toEqual([{ method: 'batch', violations: 3 }]);
    expect(fixes[0]?.violations).toHaveLength(3);
  });

  it('keeps a deterministic fix on its own explanation and safety', async () => {
    const path = 'src/main/java/com/example/Tokens.java';
    const files = new MemoryFiles({ [path]: 'import java.util.Random;\nclass Tokens { Random r = new Random(); }\n' });
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files });

    const [fix] = await coordinator.propose([makeViolation({ rule: 'security-use-secure-random', file: path })]);

    expect(fix?.ruleId).toBe('security-use-secure-random');
    expect(fix?.safety).toBe('safe');
    expect(fix?.complexity).toBe('simple');
    expect(fix?.explanation).toBe(defaultStrategyCatalog().strategyFor('security-use-secure-random')?.explanation);
  });

  it('never runs more file tasks than the bound', async () => {
    const initial: Record<string, string> = {};
    const violations: Violation[] = [];
    for (let index = 0; index < 7; index += 1) {
      const path = `src/main/java/com/example/Service${index}.java`;
      initial[path] = `class Service${index} {}\n`;
      violations.push(makeViolation({ rule: 'coding-no-generic-exceptions', file: path }));
    }

    const fixer = new FakeFixer((content) => `${content}// fixed\n`, 10);
    const coordinator = new FixProposalCoordinator({
      catalog: defaultStrategyCatalog(),
      reader: new MemoryFiles(initial),
      fixer,
      concurrency: 2
    });

    const fixes = await coordinator.propose(violations);

    expect(fixes).toHaveLength(7);
    expect(fixer.maxInFlight).toBe(2);
    expect(fixes.map((fix) => fix.id)).toEqual([
      'fix-0001-batch',
      'fix-0002-batch',
      'fix-0003-batch',
      'fix-0004-batch',
      'fix-0005-batch',
      'fix-0006-batch',
      'fix-0007-batch'
    ]);
  });

  it('isolates per-file failures and drops violations without a target', async () => {
    const missing = 'src/main/java/com/example/Missing.java';
    const files = new MemoryFiles({ [servicePath]: serviceSource });
    const failing: ContentFixer = {
      fixOne: async () => {
        throw new Error('fixer offline');
      },
      fixBatch: async () => {
        throw new Error('fixer offline');
      },
      fixCrossFile: async () => {
        throw new Error('fixer offline');
      }
    };
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files, fixer: failing });
    const orphan = makeViolation({ rule: 'coding-no-std-streams', file: null, message: 'no location here' });

    const report = await coordinator.proposeWithReport([
      makeViolation({ rule: 'coding-no-std-streams', file: missing }),
      makeViolation({ rule: 'coding-no-std-streams', file: servicePath }),
      makeViolation({ rule: 'coding-no-generic-exceptions', file: servicePath }),
      orphan
    ]);

    expect(report.dropped).toEqual([orphan]);
    expect(report.failedFiles).toEqual([{ filePath: missing, error: `Cannot read ${missing}` }]);
    expect(report.fixes).toHaveLength(1);
    expect(report.fixes[0]?.ruleIds).toEqual(['coding-no-std-streams']);
    expect(report.unresolved.map((entry) => entry.violation.rule)).toEqual(['coding-no-generic-exceptions']);
  });

  it('orders java artifacts before spec artifacts', async () => {
    const specPath = 'api/orders-api.yaml';
    const files = new MemoryFiles({
      [specPath]: 'paths:\n  /orderItems:\n    get: {}\n',
      [servicePath]: serviceSource
    });
    const coordinator = new FixProposalCoordinator({ catalog: defaultStrategyCatalog(), reader: files });

    const fixes = await coordinator.propose([
      makeViolation({ rule: 'kebab-case-paths', file: specPath, engine: 'spectral' }),
      makeViolation({ rule: 'coding-no-std-streams', file: servicePath })
    ]);

    expect(fixes.map((fix) => [fix.id, fix.filePath])).toEqual([
      ['fix-0001-batch', servicePath],
      ['fix-0002-batch', specPath]
    ]);
  });

  it('edits related code artifacts together with a spec artifact', async () => {
    const specPath = 'api/users-api.yaml';
    const controllerPath = 'src/main/java/com/example/UserController.java';
    const files = new MemoryFiles({
      [specPath]: 'paths:\n  /users:\n    get: {}\n',
      [controllerPath]: 'public class UserController {}\n'
    });
    const fixer = new FakeFixer((content, filePath) => (filePath === controllerPath ? `${content}// envelope\n` : `${content}# envelope\n`));
    const coordinator = new FixProposalCoordinator({
      catalog: defaultStrategyCatalog(),
      reader: files,
      fixer,
      crossFile: { resolver: new NameMatchingResolver(), inventory: [controllerPath] }
    });

    const [fix] = await coordinator.propose([makeViolation({ rule: 'response-envelope', file: specPath, engine: 'spectral' })]);

    expect(fixer.calls).toEqual([{ method: 'crossFile', violations: 1 }]);
    expect(fix?.proposedContent).toBe('paths:\n  /users:\n    get: {}\n# envelope\n');
    expect(fix?.relatedChanges).toEqual([
      {
        filePath: controllerPath,
        originalContent: 'public class UserController {}\n',
        proposedContent: 'public class UserController {}\n// envelope\n'
      }
    ]);
    expect(fix?.complexity).toBe('complex');
  });

  it('gives a shared code artifact to only one spec artifact', async () => {
    const yamlSpec = 'api/users-api.yaml';
    const jsonSpec = 'api/users-openapi.json';
    const controllerPath = 'src/main/java/com/example/UserController.java';
    const files = new MemoryFiles({
      [yamlSpec]: 'paths:\n  /users:\n    get: {}\n',
      [jsonSpec]: '{"paths":{}}\n',
      [controllerPath]: 'class UserController {}\n'
    });
    const fixer = new FakeFixer((content) => `${content}// envelope\n`);
    const coordinator = new FixProposalCoordinator({
      catalog: defaultStrategyCatalog(),
      reader: files,
      fixer,
      crossFile: { resolver: new NameMatchingResolver(), inventory: [controllerPath] },
      concurrency: 1
    });

    const fixes = await coordinator.propose([
      makeViolation({ rule: 'response-envelope', file: yamlSpec, engine: 'spectral' }),
      makeViolation({ rule: 'response-envelope', file: jsonSpec, engine: 'spectral' })
    ]);

    const touching = fixes.filter((fix) => fix.relatedChanges.some((change) => change.filePath === controllerPath));
    expect(touching.map((fix) => [fix.id, fix.filePath])).toEqual([['fix-0001-batch', yamlSpec]]);
    expect(fixes.map((fix) => fix.filePath)).toEqual([yamlSpec, jsonSpec]);
    expect(fixes[1]?.relatedChanges).toEqual([]);
    expect(fixer.calls).toEqual([
      { method: 'crossFile', violations: 1 },
      { method: 'one', violations: 1 }
    ]);
  });

  it('hands a violation to the content fixer when its deterministic fixer throws', async () => {
    const catalog = new StrategyCatalog(
      {
        version: 1,
        strategies: [
          {
            ruleId: 'coding-no-std-streams',
            description: 'Replace System.out/err with proper logging',
            complexity: 'moderate',
            safety: 'review_required',
            fixer: 'stdStreams',
            explanation: 'Uses a logger.'
          },
          {
            ruleId: 'coding-broken-rule',
            description: 'Always fails',
            complexity: 'simple',
            safety: 'safe',
            fixer: 'broken',
            explanation: 'Never applies.'
          }
        ]
      },
      {
        ...builtinFixers,
        broken: () => {
          throw new Error('parser crashed');
        }
      }
    );
    const files = new MemoryFiles({ [servicePath]: serviceSource });
    const fixer = new FakeFixer((content) => `${content}// reviewed\n`);
    const coordinator = new FixProposalCoordinator({ catalog, reader: files, fixer });

    const report = await coordinator.proposeWithReport([
      makeViolation({ rule: 'coding-no-std-streams', file: servicePath, line: 3 }),
      makeViolation({ rule: 'coding-broken-rule', file: servicePath, line: 2 })
    ]);

    expect(fixer.calls).toEqual([{ method: 'one', violations: 1 }]);
    expect(report.unresolved).toEqual([]);
    expect(report.fixes).toHaveLength(1);
    const [fix] = report.fixes;
    expect(fix?.ruleIds).toEqual(['coding-broken-rule', 'coding-no-std-streams']);
    expect(fix?.proposedContent).toContain('logger.info("hi");');
    expect(fix?.proposedContent.endsWith('// reviewed\n')).toBe(true);
    expect(fix?.violations.map((violation) => violation.rule)).toEqual(['coding-no-std-streams', 'coding-broken-rule']);
  });
});

describe('runBounded', () => {
  it('keeps input order in its results', async () => {
    const results = await runBounded([30, 10, 20], 3, async (delay, index) => {
      await sleep(delay);
      return index;
    });

    expect(results).toEqual([0, 1, 2]);
  });
});
