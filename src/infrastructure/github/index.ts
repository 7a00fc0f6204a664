export { IGitHubApiClient, RepoSummary, BranchInfo, BranchProtection } from './IGitHubApiClient';
export { GitHubApiClient, GitHubApiClientOptions } from './GitHubApiClient';
export {
  InMemoryGitHubApiClient,
  RepoFixture,
  BranchFixture,
  ApiCall,
  ApiMethod,
} from './InMemoryGitHubApiClient';
