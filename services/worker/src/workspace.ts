import {
  BuildRunner,
  ContentFixer,
  PipelineLogger,
  Scanner,
  SourceReader,
  VersionControl,
  WorkspaceWriter
} from '@fixgate/domain';
import { FixerServerClient, RpcContentFixer } from '@fixgate/fixer-client';

import { ToolchainBuildRunner } from './build.js';
import { ProjectFiles } from './files.js';
import { GitVersionControl } from './git.js';
import { PullRequestService } from './github.js';
import { ReportScanner } from './scanner.js';

export interface PullRequestRequest {
  branch: string;
  base: string;
  title: string;
  description: string;
}

/** Every collaborator the pipeline needs for one project checkout. */
export interface ProjectWorkspace {
  files: SourceReader & WorkspaceWriter;
  /** Code artifacts eligible for cross-file edits. */
  listCodeArtifacts(): Promise<string[]>;
  fixer: ContentFixer | null;
  vcs: VersionControl;
  build: BuildRunner;
  scanner: Scanner;
  /** Branch checked out before publishing; the pull request base. */
  currentBranch(): Promise<string>;
  /** Pushes the branch and opens a pull request; null when that is not configured. */
  openPullRequest(request: PullRequestRequest): Promise<string | null>;
  close(): Promise<void>;
}

export type WorkspaceFactory = (projectRoot: string) => ProjectWorkspace;

export interface LocalWorkspaceOptions {
  buildTimeoutMs: number;
  scanReportPath: string;
  scanCommand?: string;
  fixer?: {
    bin: string;
    args: string[];
    timeoutMs: number;
  };
  pullRequests?: PullRequestService;
  logger: PipelineLogger;
}

export function localWorkspaceFactory(options: LocalWorkspaceOptions): WorkspaceFactory {
  return (projectRoot) => {
    const files = new ProjectFiles(projectRoot);
    const vcs = new GitVersionControl(projectRoot);
    const client = options.fixer
      ? new FixerServerClient({
          bin: options.fixer.bin,
          args: options.fixer.args,
          cwd: projectRoot,
          timeoutMs: options.fixer.timeoutMs
        })
      : null;

    return {
      files,
      listCodeArtifacts: () => files.listJavaSources(),
      fixer: client ? new RpcContentFixer({ transport: client, logger: options.logger }) : null,
      vcs,
      build: new ToolchainBuildRunner({ projectRoot, timeoutMs: options.buildTimeoutMs }),
      scanner: new ReportScanner({
        projectRoot,
        reportPath: options.scanReportPath,
        command: options.scanCommand,
        timeoutMs: options.buildTimeoutMs
      }),
      currentBranch: () => vcs.currentBranch(),
      openPullRequest: async (request) => {
        const pullRequests = options.pullRequests;
        if (!pullRequests) {
          return null;
        }

        const remoteUrl = await vcs.remoteUrl();
        if (!remoteUrl) {
          options.logger.warn({ projectRoot }, 'no origin remote; skipping pull request');
          return null;
        }

        await vcs.push(request.branch);
        return pullRequests.openPullRequest({
          remoteUrl,
          head: request.branch,
          base: request.base,
          title: request.title,
          body: request.description
        });
      },
      close: async () => {
        await client?.stop();
      }
    };
  };
}
