import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { ComplianceReport, RepositoryAudit } from '../../domain';
import { ComplianceService, InvalidOptionError, RepositoryListingError } from '../../application';
import { GitHubApiClient, IGitHubApiClient } from '../../infrastructure';
import { AuditConfig, loadConfig } from '../../config';

export type AuditFormat = 'text' | 'table' | 'json';

const FORMATS: readonly AuditFormat[] = ['text', 'table', 'json'];

export interface AuditCommandOptions {
  limit?: string;
  concurrency?: string;
  format?: string;
  apiUrl?: string;
}

export interface AuditDependencies {
  createClient?: (config: AuditConfig) => IGitHubApiClient;
  env?: NodeJS.ProcessEnv;
  /** Suppress the progress spinner. */
  silent?: boolean;
  /** Spinner output stream, stderr by default. */
  stream?: NodeJS.WritableStream;
  /** Animate the spinner in place; defaults to whether stderr is a terminal. */
  interactive?: boolean;
}

export interface JsonAuditReport {
  organization: string;
  totalRepositories: number;
  nonCompliantCount: number;
  repositories: Array<{
    name: string;
    fullName: string;
    branch: string | null;
    status: string;
    issues: string[];
  }>;
}

export function formatIssueBlock(audit: RepositoryAudit): string[] {
  return [
    `\n${chalk.bold(`${audit.fullName}:`)}`,
    ...audit.issues.map(issue => `  - ${issue}`),
  ];
}

export function formatSummary(report: ComplianceReport): string {
  if (report.isFullyCompliant) {
    return chalk.green('\nAll repositories meet the requirements.');
  }
  return chalk.yellow(
    `\nTotal: ${report.nonCompliantCount} non-compliant repositories out of ${report.totalRepositories}`,
  );
}

export function toJsonReport(report: ComplianceReport): JsonAuditReport {
  return {
    organization: report.organization,
    totalRepositories: report.totalRepositories,
    nonCompliantCount: report.nonCompliantCount,
    repositories: report.audits.map(audit => ({
      name: audit.name,
      fullName: audit.fullName,
      branch: audit.branch,
      status: audit.result.status,
      issues: audit.issues,
    })),
  };
}

function renderTable(audits: RepositoryAudit[]): string {
  const table = new Table({
    head: [chalk.cyan('Repository'), chalk.cyan('Branch'), chalk.cyan('Issue')],
  });

  for (const audit of audits) {
    table.push([audit.fullName, audit.branch ?? chalk.gray('-'), audit.issues.join('\n')]);
  }

  return table.toString();
}

function parseFormat(value: string): AuditFormat {
  const format = FORMATS.find(f => f === value);
  if (!format) {
    throw new InvalidOptionError(`Format must be one of ${FORMATS.join(', ')}, got "${value}"`);
  }
  return format;
}

/**
 * Scan an organization and print the compliance report.
 * Resolves to the process exit code.
 */
export async function runAudit(
  organization: string,
  options: AuditCommandOptions,
  deps: AuditDependencies = {},
): Promise<number> {
  let config: AuditConfig;
  let format: AuditFormat;
  try {
    config = loadConfig(deps.env, options);
    format = parseFormat(options.format ?? 'text');
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
    return 1;
  }

  if (!config.token) {
    console.error(chalk.yellow(
      'Warning: no GITHUB_TOKEN or GH_TOKEN set; protection rules are only visible to authenticated admins.',
    ));
  }

  const client = deps.createClient
    ? deps.createClient(config)
    : new GitHubApiClient({ token: config.token, baseUrl: config.apiUrl });
  const service = new ComplianceService(client);
  const streaming = format === 'text';

  // A disabled spinner prints a permanent line on every start(), so only
  // restart it when it can redraw in place.
  const interactive = deps.interactive ?? (!deps.stream && process.stderr.isTTY === true);
  const spinner = ora({
    text: `Fetching repositories for organization: ${organization}...`,
    isSilent: deps.silent || format === 'json',
    isEnabled: interactive,
    ...(deps.stream ? { stream: deps.stream } : {}),
  }).start();
  let total = 0;
  let released = 0;
  let nonCompliant = 0;

  try {
    const report = await service.scanOrganization(organization, {
      limit: config.repoLimit,
      concurrency: config.concurrency,
      onListed: (count) => {
        total = count;
        spinner.succeed(`Found ${count} repositories. Checking compliance for each repository...`);
        if (streaming) {
          console.log('\nRepositories not meeting requirements:');
        }
      },
      onProgress: (index, count, repo) => {
        const text = `Processing: ${index}/${count} (${repo})`;
        spinner.text = nonCompliant > 0 ? `${text} - ${nonCompliant} non-compliant` : text;
        if (interactive && !spinner.isSpinning) {
          spinner.start();
        }
      },
      onResult: (audit, nonCompliantSoFar) => {
        nonCompliant = nonCompliantSoFar;
        released++;
        if (!streaming || audit.issues.length === 0) {
          return;
        }
        // Clear the progress line before printing
        spinner.stop();
        for (const line of formatIssueBlock(audit)) {
          console.log(line);
        }
        if (interactive && released < total) {
          spinner.start();
        }
      },
    });

    spinner.stop();

    if (format === 'json') {
      console.log(JSON.stringify(toJsonReport(report), null, 2));
      return 0;
    }

    if (format === 'table' && !report.isFullyCompliant) {
      console.log(renderTable(report.nonCompliant));
    }
    console.log(formatSummary(report));
    return 0;
  } catch (error) {
    if (error instanceof RepositoryListingError) {
      spinner.fail(`Failed to list repositories for ${error.organization}`);
    } else {
      spinner.fail('Compliance scan failed');
    }
    console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
    return 1;
  }
}

export function createAuditCommand(deps: AuditDependencies = {}): Command {
  const command: Command = new Command('audit')
    .description('Report repositories whose primary branch is unprotected or accepts unsigned commits')
    .argument('<organization>', 'Organization to audit')
    .option('-l, --limit <n>', 'Maximum number of repositories to scan')
    .option('-c, --concurrency <n>', 'Repositories audited in parallel')
    .option('-f, --format <format>', 'Output format (text, table or json)', 'text')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (organization: string, options: AuditCommandOptions) => {
      const apiUrl: unknown = command.parent?.opts().apiUrl;
      if (typeof apiUrl === 'string') {
        options.apiUrl = apiUrl;
      }

      const code = await runAudit(organization, options, deps);
      if (code !== 0) {
        process.exit(code);
      }
    });

  return command;
}
