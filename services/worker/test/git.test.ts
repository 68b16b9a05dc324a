import { describe, expect, it } from 'vitest';

import { ProcessOptions } from '../src/exec.js';
import { GitVersionControl } from '../src/git.js';

class FakeGit {
  readonly calls: string[][] = [];
  readonly cwds: string[] = [];

  constructor(private readonly outputs: Record<string, string> = {}, private readonly failing: string[] = []) {}

  run = async (file: string, args: readonly string[], options: ProcessOptions) => {
    this.calls.push([file, ...args]);
    this.cwds.push(options.cwd);
    const key = args.join(' ');
    if (this.failing.includes(key)) {
      throw new Error(`git ${key} failed`);
    }
    return { stdout: this.outputs[key] ?? '', stderr: '' };
  };
}

describe('GitVersionControl', () => {
  it('creates the named branch', async () => {
    const git = new FakeGit();
    const vcs = new GitVersionControl('/srv/projects/app', git.run);

    expect(await vcs.createBranch('governance/auto-fix-20260101-000000')).toBe('governance/auto-fix-20260101-000000');
    expect(git.calls).toEqual([['git', 'checkout', '-b', 'governance/auto-fix-20260101-000000']]);
    expect(git.cwds).toEqual(['/srv/projects/app']);
  });

  it('stages and commits only the given files and returns the new head', async () => {
    const git = new FakeGit({ 'rev-parse HEAD': 'abc123\n' });
    const vcs = new GitVersionControl('/srv/projects/app', git.run);

    const id = await vcs.stageAndCommit(['a.yaml', 'B.java'], 'refactor(governance): [r] Fix 1 violation(s)');

    expect(id).toBe('abc123');
    expect(git.calls).toEqual([
      ['git', 'add', '--', 'a.yaml', 'B.java'],
      ['git', 'commit', '-m', 'refactor(governance): [r] Fix 1 violation(s)', '--', 'a.yaml', 'B.java'],
      ['git', 'rev-parse', 'HEAD']
    ]);
  });

  it('reads the current branch and remote', async () => {
    const git = new FakeGit({
      'rev-parse --abbrev-ref HEAD': 'main\n',
      'remote get-url origin': 'git@github.com:example/app.git\n'
    });
    const vcs = new GitVersionControl('/srv/projects/app', git.run);

    expect(await vcs.currentBranch()).toBe('main');
    expect(await vcs.remoteUrl()).toBe('git@github.com:example/app.git');
  });

  it('reads a missing remote as null', async () => {
    const vcs = new GitVersionControl('/srv/projects/app', new FakeGit({}, ['remote get-url origin']).run);

    expect(await vcs.remoteUrl()).toBeNull();
  });
});
