import { BuildResult, FileDiff, Violation } from './types.js';

/**
 * Structural logger accepted by the pipeline components. A pino logger
 * satisfies it directly.
 */
export interface PipelineLogger {
  info(bindings: Record<string, unknown>, message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
  error(bindings: Record<string, unknown>, message: string): void;
}

export const silentLogger: PipelineLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * AI-assisted content fixer. Returning the input unchanged is the "could not
 * fix" signal; ordinary failures are swallowed by the implementation.
 */
export interface ContentFixer {
  fixOne(content: string, violation: Violation): Promise<string>;
  fixBatch(content: string, violations: readonly Violation[]): Promise<string>;
  fixCrossFile(files: ReadonlyMap<string, string>, violations: readonly Violation[]): Promise<Map<string, string>>;
}

export interface SourceReader {
  /** Resolves to null when the file does not exist or cannot be read. */
  read(filePath: string): Promise<string | null>;
}

export interface WorkspaceWriter {
  write(filePath: string, content: string): Promise<void>;
}

export interface VersionControl {
  createBranch(name?: string): Promise<string>;
  stageAndCommit(files: readonly string[], message: string): Promise<string>;
}

export interface BuildRunner {
  build(options: { clean: boolean }): Promise<BuildResult>;
}

export interface Scanner {
  scan(): Promise<Violation[]>;
}

/** Pairs spec artifacts (API descriptions) with the code artifacts implementing them. */
export interface ArtifactResolver {
  relatedCodeArtifacts(specArtifact: string, candidates: readonly string[]): string[];
}

export interface ReviewPrompt {
  show(diff: FileDiff, position: { index: number; total: number }): void;
  ask(question: string): Promise<string>;
  notify(message: string): void;
}
