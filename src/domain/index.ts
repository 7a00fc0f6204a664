export { RepositoryAudit, RepositoryAuditProps } from './entities/RepositoryAudit';
export { ComplianceReport } from './entities/ComplianceReport';
export {
  BranchCheckResult,
  BranchCheckStatus,
  PrimaryBranchName,
  PRIMARY_BRANCH_CANDIDATES,
  NO_PRIMARY_BRANCH_ISSUE,
} from './value-objects/BranchCheckResult';
