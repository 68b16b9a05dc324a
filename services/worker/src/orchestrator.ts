import { QueueJobPayload, ReviewPolicy, SessionRecord, SessionStore } from '@fixgate/common';
import {
  ChangeSetPublisher,
  CommitMode,
  defaultStrategyCatalog,
  defaultTaxonomy,
  FixProposalCoordinator,
  NameMatchingResolver,
  PipelineLogger,
  ReviewLedger,
  silentLogger,
  StrategyCatalog,
  ValidationLoop,
  ViolationClassifier
} from '@fixgate/domain';

import { renderCategoryTable, renderPublishSummary, renderTriageSummary, renderValidationResult } from './report.js';
import { ProjectWorkspace, WorkspaceFactory } from './workspace.js';

export interface TriageOrchestratorOptions {
  store: SessionStore;
  workspaces: WorkspaceFactory;
  reviewPolicy?: ReviewPolicy;
  commitMode?: CommitMode;
  fixConcurrency?: number;
  validateAfterApply?: boolean;
  classifier?: ViolationClassifier;
  catalog?: StrategyCatalog;
  logger?: PipelineLogger;
}

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

const EVENT_SOURCE = 'worker';

/**
 * Runs the pipeline stages for a session: triage (classify and propose),
 * apply (publish approved fixes) and validate (rebuild and rescan). A stage
 * failure marks the session `failed` with the error text.
 */
export class TriageOrchestrator {
  private readonly classifier: ViolationClassifier;
  private readonly catalog: StrategyCatalog;
  private readonly logger: PipelineLogger;

  constructor(private readonly options: TriageOrchestratorOptions) {
    this.classifier = options.classifier ?? new ViolationClassifier(defaultTaxonomy());
    this.catalog = options.catalog ?? defaultStrategyCatalog();
    this.logger = options.logger ?? silentLogger;
  }

  async handleJob(payload: QueueJobPayload): Promise<void> {
    switch (payload.type) {
      case 'triage_session':
        await this.runStage(payload.sessionId, (session, workspace) => this.triage(session, workspace));
        return;
      case 'apply_session':
        await this.runStage(payload.sessionId, (session, workspace) => this.apply(session, workspace, payload.branch));
        return;
      case 'validate_session':
        await this.runStage(payload.sessionId, (session, workspace) => this.validate(session, workspace));
        return;
    }
  }

  private async runStage(
    sessionId: number,
    stage: (session: SessionRecord, workspace: ProjectWorkspace) => Promise<void>
  ): Promise<void> {
    const session = await this.options.store.getSession(sessionId);
    if (!session) {
      this.logger.warn({ sessionId }, 'session not found; dropping job');
      return;
    }

    let workspace: ProjectWorkspace | null = null;
    try {
      workspace = this.options.workspaces(session.projectRoot);
      await stage(session, workspace);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ sessionId, error: message }, 'session stage failed');
      await this.options.store.updateSessionStatus(sessionId, 'failed', message);
      await this.options.store.insertEvent(sessionId, EVENT_SOURCE, 'session_failed', { error: message });
    } finally {
      if (workspace) {
        await workspace.close().catch((error: unknown) => {
          this.logger.warn({ sessionId, error: String(error) }, 'workspace close failed');
        });
      }
    }
  }

  private async triage(session: SessionRecord, workspace: ProjectWorkspace): Promise<void> {
    await this.options.store.updateSessionStatus(session.id, 'triaging');

    const fixedRules = new Set(session.fixedRules);
    const fixed = session.violations.filter((violation) => fixedRules.has(violation.rule));
    const category = session.category ?? this.classifier.nextCategory(session.violations, fixed).category;

    await this.options.store.insertEvent(session.id, EVENT_SOURCE, 'triage_started', {
      category,
      summary: renderCategoryTable(this.classifier.summarize(session.violations))
    });

    if (category === null) {
      await this.options.store.replaceFixes(session.id, []);
      await this.options.store.updateSessionStatus(session.id, 'completed');
      await this.options.store.insertEvent(session.id, EVENT_SOURCE, 'triage_completed', { category: null, fixes: 0 });
      return;
    }

    await this.options.store.setSessionCategory(session.id, category);

    const violations = this.classifier
      .violationsIn(category, session.violations)
      .filter((violation) => !fixedRules.has(violation.rule));

    const coordinator = new FixProposalCoordinator({
      catalog: this.catalog,
      reader: workspace.files,
      fixer: workspace.fixer,
      crossFile: workspace.fixer
        ? { resolver: new NameMatchingResolver(), inventory: await workspace.listCodeArtifacts() }
        : null,
      concurrency: this.options.fixConcurrency,
      logger: this.logger
    });

    const report = await coordinator.proposeWithReport(violations);
    await this.options.store.replaceFixes(session.id, report.fixes);

    const ledger = new ReviewLedger(report.fixes);
    const policy = this.options.reviewPolicy ?? 'manual';
    if (policy === 'approve_all') {
      ledger.approveAll();
    } else if (policy === 'approve_changed') {
      ledger.approveChanged();
    }
    await this.options.store.saveReview(session.id, ledger.toRecord());

    await this.options.store.insertEvent(session.id, EVENT_SOURCE, 'triage_completed', {
      category,
      fixes: report.fixes.length,
      unresolved: report.unresolved.length,
      dropped: report.dropped.length,
      failedFiles: report.failedFiles.length,
      summary: renderTriageSummary({ sessionId: session.id, category, report, review: ledger.summary() })
    });

    if (report.fixes.length === 0) {
      await this.options.store.updateSessionStatus(session.id, 'completed');
      return;
    }
    if (policy === 'manual' || ledger.approvedFixes.length === 0) {
      await this.options.store.updateSessionStatus(session.id, 'awaiting_review');
      return;
    }

    await this.apply({ ...session, category }, workspace);
  }

  private async apply(session: SessionRecord, workspace: ProjectWorkspace, branch?: string): Promise<void> {
    const fixes = await this.options.store.listFixes(session.id);
    const record = await this.options.store.getReview(session.id);
    const ledger = record === null ? new ReviewLedger(fixes) : ReviewLedger.restore(fixes, record);

    if (ledger.approvedFixes.length === 0) {
      throw new SessionStateError(`Session ${session.id} has no approved fixes to apply`);
    }

    await this.options.store.updateSessionStatus(session.id, 'applying');

    const base = await workspace.currentBranch();
    const publisher = new ChangeSetPublisher({
      writer: workspace.files,
      vcs: workspace.vcs,
      mode: this.options.commitMode,
      logger: this.logger
    });
    const result = await publisher.publish(ledger, { branch });

    let pullRequestUrl: string | null = null;
    if (result.branch !== null && result.commits.length > 0) {
      pullRequestUrl = await workspace.openPullRequest({
        branch: result.branch,
        base,
        title: result.title,
        description: result.description
      });
    }

    await this.options.store.recordPublication(session.id, { branch: result.branch, pullRequestUrl });
    await this.options.store.insertEvent(session.id, EVENT_SOURCE, 'apply_completed', {
      branch: result.branch,
      commits: result.commits.map((commit) => ({ id: commit.id, group: commit.group, files: commit.files })),
      failures: result.failures.map((failure) => ({ ...failure })),
      summary: renderPublishSummary(result, pullRequestUrl)
    });
    await this.options.store.updateSessionStatus(session.id, 'applied');

    if (this.options.validateAfterApply) {
      await this.validate(session, workspace);
    }
  }

  private async validate(session: SessionRecord, workspace: ProjectWorkspace): Promise<void> {
    if (session.category === null) {
      throw new SessionStateError(`Session ${session.id} has no category to validate`);
    }

    await this.options.store.updateSessionStatus(session.id, 'validating');

    const loop = new ValidationLoop({
      build: workspace.build,
      scanner: workspace.scanner,
      classifier: this.classifier,
      logger: this.logger
    });
    const before = this.classifier.violationsIn(session.category, session.violations);
    const result = await loop.validateFixes(session.category, before);

    await this.options.store.recordValidation(session.id, result);
    await this.options.store.insertEvent(session.id, EVENT_SOURCE, 'validation_completed', {
      success: result.success,
      summary: renderValidationResult(result)
    });
    await this.options.store.updateSessionStatus(session.id, 'completed');
  }
}
