import { GitHubAppClientFactory, parseGitHubRemote } from '@fixgate/common';

export interface PullRequestInput {
  remoteUrl: string;
  head: string;
  base: string;
  title: string;
  body: string;
}

export interface PullRequestService {
  /** Resolves to the pull request URL, or null when the remote is not on GitHub. */
  openPullRequest(input: PullRequestInput): Promise<string | null>;
}

export class GitHubPullRequestService implements PullRequestService {
  constructor(private readonly factory: GitHubAppClientFactory) {}

  async openPullRequest(input: PullRequestInput): Promise<string | null> {
    const ref = parseGitHubRemote(input.remoteUrl);
    if (!ref) {
      return null;
    }

    const octokit = await this.factory.getRepositoryClient(ref);
    const created = await octokit.pulls.create({
      owner: ref.owner,
      repo: ref.repo,
      head: input.head,
      base: input.base,
      title: input.title.slice(0, 256),
      body: input.body.slice(0, 65_000)
    });

    return created.data.html_url;
  }
}
