import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { BulkUpdateOptionsSchema } from '../config/schema.js';
import { loadSettings } from '../config/settings.js';
import { FleetError, formatIssues } from '../core/errors.js';
import { RepoFinder } from '../core/repo-finder.js';
import { BulkUpdater } from '../core/bulk-updater.js';
import { SimpleGitRunner } from '../core/git-runner.js';
import { ResultReport } from '../ui/report.js';
import { commandLogger, interruptSignal, positiveInt, nonNegativeInt, runCommand } from './shared.js';

interface PullAllFlags {
  parallel?: number;
  maxDepth?: number;
  dryRun?: boolean;
  fetch: boolean;
  fetchTimeout?: number;
  include?: string;
  exclude?: string;
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export function registerPullAll(program: Command): void {
  program
    .command('pull-all')
    .alias('pull')
    .description('Find repositories under a directory and pull (with rebase) the ones that are safe to update')
    .argument('[directory]', 'Directory to scan', '.')
    .option('-j, --parallel <n>', 'Repositories processed at once', positiveInt)
    .option('-d, --max-depth <n>', 'Maximum directory depth to scan', nonNegativeInt)
    .option('-n, --dry-run', 'Classify and report without pulling')
    .option('--no-fetch', 'Compare against existing remote refs without fetching')
    .option('--fetch-timeout <seconds>', 'Per-repository fetch timeout', positiveInt)
    .option('--include <regex>', 'Only repositories whose path matches')
    .option('--exclude <regex>', 'Skip repositories whose path matches')
    .option('-q, --quiet', 'Hide repositories that are already up to date')
    .option('--json', 'Print the report as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action((directory: string, flags: PullAllFlags) =>
      runCommand(async () => {
        const logger = commandLogger(flags);
        const { settings } = loadSettings();
        const defaults = settings.pull_all;

        const parsed = BulkUpdateOptionsSchema.safeParse({
          directory: resolve(directory),
          parallel: flags.parallel ?? defaults.parallel,
          maxDepth: flags.maxDepth ?? defaults.max_depth,
          dryRun: flags.dryRun ?? false,
          noFetch: !flags.fetch,
          fetchTimeoutMs: (flags.fetchTimeout ?? defaults.fetch_timeout_seconds) * 1000,
          includePattern: flags.include,
          excludePattern: flags.exclude,
          ignoreDirs: defaults.ignore_dirs,
        });
        if (!parsed.success) {
          throw new FleetError('validation', `invalid options: ${formatIssues(parsed.error)}`);
        }
        const options = parsed.data;
        if (!existsSync(options.directory)) {
          throw new FleetError('validation', `No such directory: ${directory}`);
        }

        const signal = interruptSignal(logger);
        const spinner = flags.json ? null : ora('Scanning for git repositories...').start();

        const finder = new RepoFinder(options.directory, {
          maxDepth: options.maxDepth,
          ignoreDirs: options.ignoreDirs,
          include: options.includePattern,
          exclude: options.excludePattern,
          logger,
        });
        const repos = await finder.find((path) => {
          if (spinner) spinner.text = `Found: ${path}`;
        });

        if (repos.length === 0) {
          spinner?.stop();
          if (flags.json) console.log(JSON.stringify({ root: options.directory, results: [], summary: {}, failed: false }, null, 2));
          else console.log(chalk.yellow('\n  No git repositories found.\n'));
          return;
        }

        let done = 0;
        if (spinner) spinner.text = `Updating ${repos.length} repositories...`;
        const updater = new BulkUpdater(new SimpleGitRunner({ signal }), {
          parallel: options.parallel,
          dryRun: options.dryRun,
          noFetch: options.noFetch,
          fetchTimeoutMs: options.fetchTimeoutMs,
          signal,
          logger,
          onResult: () => {
            done++;
            if (spinner) spinner.text = `Updating repositories... ${done}/${repos.length}`;
          },
        });
        const report = await updater.run(options.directory, repos);
        spinner?.stop();

        if (flags.json) console.log(ResultReport.toJson(report));
        else ResultReport.renderBulk(report, { quiet: flags.quiet });

        return report.failed ? 1 : 0;
      }),
    );
}
