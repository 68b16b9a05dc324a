import { ViolationClassifier } from './classifier.js';
import { BuildRunner, PipelineLogger, Scanner, silentLogger } from './collaborators.js';
import { BuildResult, ValidationResult, Violation } from './types.js';

export interface ValidationLoopOptions {
  build: BuildRunner;
  scanner: Scanner;
  classifier: ViolationClassifier;
  clean?: boolean;
  logger?: PipelineLogger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rebuilds the project and rescans it to confirm a category's fixes reduced
 * its violations without introducing new ones. A failed build or scan never
 * yields an inferred delta.
 */
export class ValidationLoop {
  private readonly options: ValidationLoopOptions;
  private readonly logger: PipelineLogger;

  constructor(options: ValidationLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async validateFixes(category: string, violationsBefore: readonly Violation[] | number): Promise<ValidationResult> {
    const before = typeof violationsBefore === 'number' ? violationsBefore : violationsBefore.length;
    const clean = this.options.clean ?? true;

    let build: BuildResult;
    try {
      build = await this.options.build.build({ clean });
    } catch (error) {
      build = { success: false, output: '', error: errorMessage(error), durationMs: 0 };
    }

    if (!build.success) {
      this.logger.warn({ category, error: build.error }, 'build failed during validation');
      return this.unchanged(category, before, build, `Build failed: ${build.error ?? 'unknown error'}`);
    }

    let rescanned: Violation[];
    try {
      rescanned = await this.options.scanner.scan();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ category, error: message }, 'scan failed during validation');
      return this.unchanged(category, before, build, `Scan failed: ${message}`);
    }

    const after = this.options.classifier.violationsIn(category, rescanned).length;
    const violationsFixed = Math.max(0, before - after);
    const newViolations = Math.max(0, after - before);
    const success = (violationsFixed > 0 || after === 0) && newViolations === 0;

    let message: string;
    if (newViolations > 0) {
      message = `Fixed ${violationsFixed} violation(s); ${newViolations} new violation(s) introduced`;
    } else if (after === 0) {
      message = `All violations in ${category} resolved`;
    } else if (violationsFixed > 0) {
      message = `Fixed ${violationsFixed} violation(s); ${after} remaining`;
    } else {
      message = 'No violations were fixed';
    }

    this.logger.info({ category, before, after, violationsFixed, newViolations }, 'validation complete');

    return {
      category,
      violationsBefore: before,
      violationsAfter: after,
      violationsFixed,
      newViolations,
      build,
      success,
      message
    };
  }

  private unchanged(category: string, before: number, build: BuildResult, message: string): ValidationResult {
    return {
      category,
      violationsBefore: before,
      violationsAfter: before,
      violationsFixed: 0,
      newViolations: 0,
      build,
      success: false,
      message
    };
  }
}
