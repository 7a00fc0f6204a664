import { Octokit } from '@octokit/rest';
import { BranchInfo, BranchProtection, IGitHubApiClient, RepoSummary } from './IGitHubApiClient';

export interface GitHubApiClientOptions {
  token?: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Octokit-backed adapter for the GitHub REST API.
 * Lookup failures on branches and their protection rules resolve to null.
 */
export class GitHubApiClient implements IGitHubApiClient {
  private readonly octokit: Octokit;

  constructor(options: GitHubApiClientOptions = {}) {
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: 'branch-audit',
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  async listRepositories(org: string, limit: number): Promise<RepoSummary[]> {
    const repos: RepoSummary[] = [];

    for await (const response of this.octokit.paginate.iterator(
      this.octokit.rest.repos.listForOrg,
      {
        org,
        per_page: Math.min(100, limit),
      },
    )) {
      for (const repo of response.data) {
        repos.push({ name: repo.name });
        if (repos.length >= limit) {
          return repos;
        }
      }
    }

    return repos;
  }

  async getBranch(org: string, repo: string, branch: string): Promise<BranchInfo | null> {
    try {
      const { data } = await this.octokit.rest.repos.getBranch({ owner: org, repo, branch });
      return { name: data.name };
    } catch {
      return null;
    }
  }

  async getBranchProtection(org: string, repo: string, branch: string): Promise<BranchProtection | null> {
    try {
      const { data } = await this.octokit.rest.repos.getBranchProtection({ owner: org, repo, branch });
      return { ...data };
    } catch {
      return null;
    }
  }

  async getRequiredSignatures(org: string, repo: string, branch: string): Promise<unknown> {
    try {
      const { data } = await this.octokit.rest.repos.getCommitSignatureProtection({ owner: org, repo, branch });
      return data;
    } catch {
      return null;
    }
  }
}
