export {
  ComplianceService,
  PrimaryBranchResolution,
  ScanOptions,
  ScanProgressCallback,
  ScanResultCallback,
  DEFAULT_CONCURRENCY,
  DEFAULT_REPO_LIMIT,
  isSignatureEnforced,
} from './services/ComplianceService';
export { RepositoryListingError, InvalidOptionError } from './errors';
