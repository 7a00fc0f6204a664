export type PrimaryBranchName = 'main' | 'master';
export type BranchCheckStatus = 'not_found' | 'unprotected' | 'unsigned' | 'compliant';

export const PRIMARY_BRANCH_CANDIDATES: readonly PrimaryBranchName[] = ['main', 'master'];

export const NO_PRIMARY_BRANCH_ISSUE = 'No main or master branch found';

/**
 * Outcome of checking a repository's primary branch.
 * Immutable; at most one issue is derived from it.
 */
export class BranchCheckResult {
  private constructor(
    private readonly _status: BranchCheckStatus,
    private readonly _branch: PrimaryBranchName | null,
  ) {}

  static notFound(): BranchCheckResult {
    return new BranchCheckResult('not_found', null);
  }

  static unprotected(branch: PrimaryBranchName): BranchCheckResult {
    return new BranchCheckResult('unprotected', branch);
  }

  static unsigned(branch: PrimaryBranchName): BranchCheckResult {
    return new BranchCheckResult('unsigned', branch);
  }

  static compliant(branch: PrimaryBranchName): BranchCheckResult {
    return new BranchCheckResult('compliant', branch);
  }

  get status(): BranchCheckStatus {
    return this._status;
  }

  get branch(): PrimaryBranchName | null {
    return this._branch;
  }

  get isCompliant(): boolean {
    return this._status === 'compliant';
  }

  get issue(): string | null {
    switch (this._status) {
      case 'not_found':
        return NO_PRIMARY_BRANCH_ISSUE;
      case 'unprotected':
        return `'${this._branch}' branch is not protected`;
      case 'unsigned':
        return `Commit signing not required for '${this._branch}' branch`;
      case 'compliant':
        return null;
    }
  }

  equals(other: BranchCheckResult): boolean {
    return this._status === other._status && this._branch === other._branch;
  }
}
