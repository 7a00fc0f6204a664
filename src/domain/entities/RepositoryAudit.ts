import { BranchCheckResult, PrimaryBranchName } from '../value-objects/BranchCheckResult';

export interface RepositoryAuditProps {
  organization: string;
  name: string;
  result: BranchCheckResult;
}

/**
 * Compliance verdict for a single repository of an organization.
 */
export class RepositoryAudit {
  private readonly _organization: string;
  private readonly _name: string;
  private readonly _result: BranchCheckResult;

  private constructor(props: RepositoryAuditProps) {
    this._organization = props.organization;
    this._name = props.name;
    this._result = props.result;
  }

  static create(props: RepositoryAuditProps): RepositoryAudit {
    if (!props.organization.trim()) {
      throw new Error('Organization name is required');
    }
    if (!props.name.trim()) {
      throw new Error('Repository name is required');
    }
    return new RepositoryAudit(props);
  }

  get organization(): string {
    return this._organization;
  }

  get name(): string {
    return this._name;
  }

  get fullName(): string {
    return `${this._organization}/${this._name}`;
  }

  get result(): BranchCheckResult {
    return this._result;
  }

  get branch(): PrimaryBranchName | null {
    return this._result.branch;
  }

  get issues(): string[] {
    const issue = this._result.issue;
    return issue ? [issue] : [];
  }

  get isCompliant(): boolean {
    return this._result.isCompliant;
  }
}
