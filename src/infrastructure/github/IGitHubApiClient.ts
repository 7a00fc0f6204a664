/**
 * Port for the hosting platform's REST API.
 * Infrastructure provides the Octokit adapter; tests provide in-memory fakes.
 */

export interface RepoSummary {
  name: string;
}

export interface BranchInfo {
  name: string;
}

export type BranchProtection = Record<string, unknown>;

export interface IGitHubApiClient {
  /**
   * List repositories of an organization in API order, at most `limit` of them.
   * Throws when the organization cannot be read.
   */
  listRepositories(org: string, limit: number): Promise<RepoSummary[]>;

  /**
   * Branch metadata, or null when the branch does not exist or the lookup failed.
   */
  getBranch(org: string, repo: string, branch: string): Promise<BranchInfo | null>;

  getBranchProtection(org: string, repo: string, branch: string): Promise<BranchProtection | null>;

  /**
   * Raw body of the required-signatures endpoint, or null on failure.
   * The body is left unparsed so callers decide how to read malformed payloads.
   */
  getRequiredSignatures(org: string, repo: string, branch: string): Promise<unknown>;
}
