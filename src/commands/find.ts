import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { loadSettings } from '../config/settings.js';
import { FleetError } from '../core/errors.js';
import { RepoFinder, type DiscoveredRepo } from '../core/repo-finder.js';
import { commandLogger, nonNegativeInt, runCommand } from './shared.js';

/** Group repositories by the folder that contains them. */
export function groupByFolder(repos: DiscoveredRepo[]): Map<string, DiscoveredRepo[]> {
  const groups = new Map<string, DiscoveredRepo[]>();
  for (const repo of repos) {
    const parts = repo.relativePath.split('/');
    const folder = parts.length > 1 ? parts.slice(0, -1).join('/') : '.';
    const list = groups.get(folder) ?? [];
    list.push(repo);
    groups.set(folder, list);
  }
  return groups;
}

export function registerFind(program: Command): void {
  program
    .command('find')
    .description('List git repositories found under a directory')
    .argument('[directory]', 'Directory to search', '.')
    .option('-d, --max-depth <n>', 'Maximum search depth', nonNegativeInt)
    .option('--include <regex>', 'Only repositories whose path matches')
    .option('--exclude <regex>', 'Skip repositories whose path matches')
    .option('--json', 'Print as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action((directory: string, opts: { maxDepth?: number; include?: string; exclude?: string; json?: boolean; verbose?: boolean }) =>
      runCommand(async () => {
        const searchDir = resolve(directory);
        if (!existsSync(searchDir)) {
          throw new FleetError('validation', `No such file or directory: ${directory}`);
        }
        const { settings } = loadSettings();
        const logger = commandLogger(opts);
        const spinner = opts.json ? null : ora('Scanning for git repositories...').start();

        const finder = new RepoFinder(searchDir, {
          maxDepth: opts.maxDepth ?? settings.pull_all.max_depth,
          ignoreDirs: settings.pull_all.ignore_dirs,
          include: opts.include,
          exclude: opts.exclude,
          logger,
        });
        const repos = await finder.find((path) => {
          if (spinner) spinner.text = `Found: ${path}`;
        });
        spinner?.stop();

        if (opts.json) {
          console.log(JSON.stringify(repos, null, 2));
          return;
        }
        if (repos.length === 0) {
          console.log(chalk.yellow('\n  No git repositories found.\n'));
          return;
        }

        const folders = groupByFolder(repos);
        console.log(chalk.bold(`\n  Found ${repos.length} git repositories in ${folders.size} folder(s):\n`));
        for (const [folder, folderRepos] of folders) {
          console.log(chalk.blue.bold(`  ${folder}/`) + chalk.dim(` (${folderRepos.length})`));
          for (const repo of folderRepos) console.log(`      ${chalk.white(repo.name)}`);
        }
        console.log();
      }),
    );
}
