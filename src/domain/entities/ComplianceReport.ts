import { RepositoryAudit } from './RepositoryAudit';

/**
 * Aggregate of every repository audit from one organization scan.
 * Audits keep the order in which the organization listed its repositories.
 */
export class ComplianceReport {
  private readonly _audits: RepositoryAudit[];

  private constructor(
    private readonly _organization: string,
    audits: RepositoryAudit[],
  ) {
    this._audits = [...audits];
  }

  static create(organization: string, audits: RepositoryAudit[]): ComplianceReport {
    return new ComplianceReport(organization, audits);
  }

  get organization(): string {
    return this._organization;
  }

  get audits(): readonly RepositoryAudit[] {
    return this._audits;
  }

  get totalRepositories(): number {
    return this._audits.length;
  }

  get nonCompliant(): RepositoryAudit[] {
    return this._audits.filter(a => a.issues.length > 0);
  }

  get nonCompliantCount(): number {
    return this.nonCompliant.length;
  }

  get isFullyCompliant(): boolean {
    return this.nonCompliantCount === 0;
  }
}
