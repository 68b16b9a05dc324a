import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';

export interface GitHubAppConfig {
  appId: string;
  privateKey: string;
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export class GitHubAppClientFactory {
  private readonly appId: number;
  private readonly privateKey: string;

  constructor(config: GitHubAppConfig) {
    this.appId = Number(config.appId);
    this.privateKey = config.privateKey;

    if (Number.isNaN(this.appId)) {
      throw new Error('GITHUB_APP_ID must be numeric');
    }
  }

  /** Client authenticated as the app itself, for installation lookups. */
  getAppClient(): Octokit {
    return new Octokit({
      authStrategy: createAppAuth,
      auth: {
        appId: this.appId,
        privateKey: this.privateKey
      }
    });
  }

  async getInstallationClient(installationId: number): Promise<Octokit> {
    const token = await this.getInstallationToken(installationId);

    return new Octokit({ auth: token });
  }

  /** Installation client for the installation that covers `owner/repo`. */
  async getRepositoryClient(ref: RepositoryRef): Promise<Octokit> {
    const installation = await this.getAppClient().apps.getRepoInstallation({
      owner: ref.owner,
      repo: ref.repo
    });

    return this.getInstallationClient(installation.data.id);
  }

  async getInstallationToken(installationId: number): Promise<string> {
    const auth = createAppAuth({
      appId: this.appId,
      privateKey: this.privateKey
    });

    const token = await auth({
      type: 'installation',
      installationId
    });

    return token.token;
  }
}

/**
 * Reads `owner/repo` from a GitHub remote URL in https or scp form. Other
 * hosts resolve to null.
 */
export function parseGitHubRemote(remoteUrl: string): RepositoryRef | null {
  const match = remoteUrl.trim().match(/github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/);
  if (!match?.[1] || !match[2]) {
    return null;
  }

  return { owner: match[1], repo: match[2] };
}
