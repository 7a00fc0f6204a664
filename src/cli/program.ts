import { Command } from 'commander';
import { AuditDependencies, createAuditCommand } from './commands/audit';

export function createProgram(deps: AuditDependencies = {}): Command {
  const program = new Command();

  program
    .name('branch-audit')
    .description('Audit an organization for primary-branch protection and required commit signatures')
    .version('1.0.0')
    .option('--api-url <url>', 'GitHub API base URL (default: GITHUB_API_URL or https://api.github.com)');

  program.addCommand(createAuditCommand(deps), { isDefault: true });

  return program;
}
