import {
  BranchCheckResult,
  ComplianceReport,
  PRIMARY_BRANCH_CANDIDATES,
  PrimaryBranchName,
  RepositoryAudit,
} from '../../domain';
import { IGitHubApiClient } from '../../infrastructure';
import { RepositoryListingError } from '../errors';

export const DEFAULT_REPO_LIMIT = 1000;
export const DEFAULT_CONCURRENCY = 4;

export type PrimaryBranchResolution =
  | { branch: PrimaryBranchName; exists: true }
  | { branch: null; exists: false };

export interface ScanProgressCallback {
  (index: number, total: number, repo: string): void;
}

export interface ScanResultCallback {
  (audit: RepositoryAudit, nonCompliantSoFar: number): void;
}

export interface ScanOptions {
  limit?: number;
  concurrency?: number;
  onProgress?: ScanProgressCallback;
  onResult?: ScanResultCallback;
  /** Called once the repository list is known, before any audit starts. */
  onListed?: (total: number) => void;
}

/**
 * Application service for organization compliance scans.
 * Checks each repository's primary branch for protection and required signatures.
 */
export class ComplianceService {
  constructor(private readonly github: IGitHubApiClient) {}

  async listRepositories(org: string, limit: number = DEFAULT_REPO_LIMIT): Promise<string[]> {
    if (!org.trim()) {
      throw new Error('Organization name is required');
    }

    let names: string[];
    try {
      const repos = await this.github.listRepositories(org, limit);
      names = repos.slice(0, limit).map(r => r.name);
    } catch (error) {
      throw new RepositoryListingError(org, error);
    }

    if (names.length === 0) {
      throw new RepositoryListingError(org);
    }
    return names;
  }

  /**
   * Probe "main", then "master". The first branch that exists wins.
   */
  async resolvePrimaryBranch(org: string, repo: string): Promise<PrimaryBranchResolution> {
    for (const branch of PRIMARY_BRANCH_CANDIDATES) {
      const info = await this.github.getBranch(org, repo, branch);
      if (info) {
        return { branch, exists: true };
      }
    }
    return { branch: null, exists: false };
  }

  async checkProtection(org: string, repo: string, branch: string): Promise<boolean> {
    const protection = await this.github.getBranchProtection(org, repo, branch);
    return protection !== null && Object.keys(protection).length > 0;
  }

  async checkRequiredSignatures(org: string, repo: string, branch: string): Promise<boolean> {
    const body = await this.github.getRequiredSignatures(org, repo, branch);
    return isSignatureEnforced(body);
  }

  /**
   * Evaluate one repository. Checks short-circuit on the first failure,
   * so a repository carries at most one issue.
   */
  async auditRepository(org: string, repo: string): Promise<RepositoryAudit> {
    const resolution = await this.resolvePrimaryBranch(org, repo);

    let result: BranchCheckResult;
    if (!resolution.exists) {
      result = BranchCheckResult.notFound();
    } else if (!(await this.checkProtection(org, repo, resolution.branch))) {
      result = BranchCheckResult.unprotected(resolution.branch);
    } else if (!(await this.checkRequiredSignatures(org, repo, resolution.branch))) {
      result = BranchCheckResult.unsigned(resolution.branch);
    } else {
      result = BranchCheckResult.compliant(resolution.branch);
    }

    return RepositoryAudit.create({ organization: org, name: repo, result });
  }

  /**
   * Audit every repository of an organization with a bounded worker pool.
   * Results are released to `onResult` in listing order.
   */
  async scanOrganization(org: string, options: ScanOptions = {}): Promise<ComplianceReport> {
    const requested = options.concurrency ?? DEFAULT_CONCURRENCY;
    const concurrency = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : DEFAULT_CONCURRENCY;
    const repos = await this.listRepositories(org, options.limit ?? DEFAULT_REPO_LIMIT);
    const total = repos.length;
    options.onListed?.(total);

    const audits: Array<RepositoryAudit | undefined> = new Array(total);
    let nextToStart = 0;
    let nextToRelease = 0;
    let nonCompliant = 0;

    const release = () => {
      while (nextToRelease < total) {
        const audit = audits[nextToRelease];
        if (!audit) return;
        if (audit.issues.length > 0) {
          nonCompliant++;
        }
        options.onResult?.(audit, nonCompliant);
        nextToRelease++;
      }
    };

    const worker = async () => {
      while (nextToStart < total) {
        const index = nextToStart++;
        const repo = repos[index];
        options.onProgress?.(index + 1, total, repo);
        audits[index] = await this.auditRepository(org, repo);
        release();
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));

    return ComplianceReport.create(
      org,
      audits.filter((a): a is RepositoryAudit => a !== undefined),
    );
  }
}

/**
 * Read the `enabled` flag from a required-signatures payload.
 * Absent bodies, malformed JSON and missing flags all count as disabled.
 */
export function isSignatureEnforced(body: unknown): boolean {
  let payload = body;
  if (typeof payload === 'string') {
    if (!payload.trim()) return false;
    try {
      payload = JSON.parse(payload);
    } catch {
      return false;
    }
  }
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return false;
  }
  return 'enabled' in payload && payload.enabled === true;
}
