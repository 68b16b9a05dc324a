import { VersionControl } from '@fixgate/domain';

import { ProcessRunner, runProcess } from './exec.js';

const gitEnv = (): NodeJS.ProcessEnv => ({
  ...process.env,
  GIT_TERMINAL_PROMPT: '0'
});

/** `VersionControl` over the git CLI in a local checkout. */
export class GitVersionControl implements VersionControl {
  constructor(
    private readonly cwd: string,
    private readonly run: ProcessRunner = runProcess
  ) {}

  async createBranch(name?: string): Promise<string> {
    const branch = name ?? `governance/auto-fix-${Date.now()}`;
    await this.git(['checkout', '-b', branch]);
    return branch;
  }

  async stageAndCommit(files: readonly string[], message: string): Promise<string> {
    await this.git(['add', '--', ...files]);
    await this.git(['commit', '-m', message, '--', ...files]);
    return this.git(['rev-parse', 'HEAD']);
  }

  async currentBranch(): Promise<string> {
    return this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async remoteUrl(remote = 'origin'): Promise<string | null> {
    try {
      return await this.git(['remote', 'get-url', remote]);
    } catch {
      return null;
    }
  }

  async push(branch: string, remote = 'origin'): Promise<void> {
    await this.git(['push', '--set-upstream', remote, branch]);
  }

  private async git(args: string[]): Promise<string> {
    const { stdout } = await this.run('git', args, { cwd: this.cwd, env: gitEnv() });
    return stdout.trim();
  }
}
