import { SourceReader, WorkspaceWriter } from '../src/collaborators.js';
import { ProposedFix, Violation } from '../src/types.js';

export function makeViolation(overrides: Partial<Violation> = {}): Violation {
  return {
    rule: 'coding-no-std-streams',
    message: 'System.out used',
    file: 'src/main/java/com/example/UserService.java',
    line: 12,
    severity: 'warning',
    engine: 'archunit',
    path: null,
    ...overrides
  };
}

export function makeFix(overrides: Partial<ProposedFix> = {}): ProposedFix {
  return {
    id: 'fix-0001-batch',
    ruleId: 'coding-no-std-streams',
    ruleIds: ['coding-no-std-streams'],
    filePath: 'src/main/java/com/example/UserService.java',
    line: 12,
    originalContent: 'class A {}\n',
    proposedContent: 'class B {}\n',
    explanation: 'Replaces System.out with a logger.',
    complexity: 'moderate',
    safety: 'review_required',
    violations: [],
    addedImports: [],
    removedImports: [],
    relatedChanges: [],
    ...overrides
  };
}

export class MemoryFiles implements SourceReader, WorkspaceWriter {
  readonly files: Map<string, string>;
  readonly writes: Array<{ filePath: string; content: string }> = [];

  constructor(initial: Record<string, string> = {}) {
    this.files = new Map(Object.entries(initial));
  }

  async read(filePath: string): Promise<string | null> {
    return this.files.get(filePath) ?? null;
  }

  async write(filePath: string, content: string): Promise<void> {
    this.files.set(filePath, content);
    this.writes.push({ filePath, content });
  }
}
