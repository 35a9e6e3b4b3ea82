import type { Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { loadSettings } from '../config/settings.js';
import { FleetError } from '../core/errors.js';
import { splitFullName, type ProviderAdmin, type ProviderClient } from '../core/provider.js';
import { requireGitHubToken } from '../auth/token.js';
import { GitHubProvider } from '../github/client.js';
import { runCommand } from './shared.js';

function githubClient(): ProviderClient & ProviderAdmin {
  const { settings } = loadSettings();
  const { token } = requireGitHubToken({ tokenEnv: settings.github.token_env });
  return new GitHubProvider({ token, baseUrl: settings.github.api_url });
}

function parseFullName(fullName: string): { owner: string; repo: string } {
  try {
    return splitFullName(fullName);
  } catch (err) {
    throw new FleetError('validation', err instanceof Error ? err.message : String(err));
  }
}

export function registerRepo(program: Command): void {
  const repoCmd = program.command('repo').description('Manage repositories on the hosting provider');

  repoCmd
    .command('show <owner/name>')
    .description('Show a repository as the sync manifest would record it')
    .option('--json', 'Print as JSON')
    .action((fullName: string, opts: { json?: boolean }) =>
      runCommand(async () => {
        parseFullName(fullName);
        const repo = await githubClient().getRepository(fullName);
        if (opts.json) {
          console.log(JSON.stringify(repo, null, 2));
          return;
        }
        const flags = [repo.private ? 'private' : 'public', repo.archived && 'archived', repo.fork && 'fork'].filter(Boolean);
        console.log(chalk.bold(`\n  ${fullName}`) + chalk.dim(`  (${flags.join(', ')})`));
        if (repo.description) console.log(`  ${repo.description}`);
        console.log(chalk.dim(`  ${repo.cloneUrl}\n`));
      }),
    );

  repoCmd
    .command('create <owner/name>')
    .description('Create a repository in an organization')
    .option('--description <text>', 'Repository description')
    .option('--public', 'Create a public repository (default: private)')
    .action((fullName: string, opts: { description?: string; public?: boolean }) =>
      runCommand(async () => {
        const { owner, repo } = parseFullName(fullName);
        const created = await githubClient().createRepository({
          organization: owner,
          name: repo,
          description: opts.description,
          private: !opts.public,
        });
        console.log(chalk.green(`✓ Created ${owner}/${created.name}`) + chalk.dim(` ${created.cloneUrl}`));
      }),
    );

  repoCmd
    .command('delete <owner/name>')
    .description('Permanently delete a repository')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action((fullName: string, opts: { yes?: boolean }) =>
      runCommand(async () => {
        parseFullName(fullName);
        if (!opts.yes) {
          if (!process.stdin.isTTY) throw new FleetError('validation', 'refusing to delete without confirmation; pass --yes');
          const ok = await confirm({ message: `Permanently delete ${fullName}?`, default: false });
          if (!ok) {
            console.log(chalk.dim('  Cancelled.'));
            return;
          }
        }
        await githubClient().deleteRepository(fullName);
        console.log(chalk.green(`✓ Deleted ${fullName}`));
      }),
    );

  repoCmd
    .command('archive <owner/name>')
    .description('Archive a repository (read-only)')
    .action((fullName: string) =>
      runCommand(async () => {
        parseFullName(fullName);
        await githubClient().archiveRepository(fullName);
        console.log(chalk.green(`✓ Archived ${fullName}`));
      }),
    );

  repoCmd
    .command('unarchive <owner/name>')
    .description('Unarchive a repository')
    .action((fullName: string) =>
      runCommand(async () => {
        parseFullName(fullName);
        await githubClient().unarchiveRepository(fullName);
        console.log(chalk.green(`✓ Unarchived ${fullName}`));
      }),
    );
}
