import { BranchInfo, BranchProtection, IGitHubApiClient, RepoSummary } from './IGitHubApiClient';

export interface BranchFixture {
  protection?: BranchProtection | null;
  /** Raw required-signatures body; a string is returned verbatim. */
  signatures?: unknown;
}

export interface RepoFixture {
  name: string;
  branches: Record<string, BranchFixture>;
}

export type ApiMethod = 'listRepositories' | 'getBranch' | 'getBranchProtection' | 'getRequiredSignatures';

export interface ApiCall {
  method: ApiMethod;
  org: string;
  repo?: string;
  branch?: string;
}

/**
 * In-memory stand-in for the GitHub API, keyed by organization.
 * Records every call so callers can assert which endpoints were hit.
 */
export class InMemoryGitHubApiClient implements IGitHubApiClient {
  readonly calls: ApiCall[] = [];
  private readonly unreadable = new Set<string>();

  constructor(private readonly orgs: Record<string, RepoFixture[]> = {}) {}

  /**
   * Make listing fail for an organization, as an auth or network error would.
   */
  denyAccess(org: string): this {
    this.unreadable.add(org);
    return this;
  }

  callsTo(method: ApiMethod): ApiCall[] {
    return this.calls.filter(c => c.method === method);
  }

  async listRepositories(org: string, limit: number): Promise<RepoSummary[]> {
    this.calls.push({ method: 'listRepositories', org });
    if (this.unreadable.has(org)) {
      throw new Error(`Not Found: ${org}`);
    }
    return (this.orgs[org] ?? []).slice(0, limit).map(r => ({ name: r.name }));
  }

  async getBranch(org: string, repo: string, branch: string): Promise<BranchInfo | null> {
    this.calls.push({ method: 'getBranch', org, repo, branch });
    return this.findBranch(org, repo, branch) ? { name: branch } : null;
  }

  async getBranchProtection(org: string, repo: string, branch: string): Promise<BranchProtection | null> {
    this.calls.push({ method: 'getBranchProtection', org, repo, branch });
    return this.findBranch(org, repo, branch)?.protection ?? null;
  }

  async getRequiredSignatures(org: string, repo: string, branch: string): Promise<unknown> {
    this.calls.push({ method: 'getRequiredSignatures', org, repo, branch });
    return this.findBranch(org, repo, branch)?.signatures ?? null;
  }

  private findBranch(org: string, repo: string, branch: string): BranchFixture | undefined {
    const fixture = (this.orgs[org] ?? []).find(r => r.name === repo);
    return fixture?.branches[branch];
  }
}
