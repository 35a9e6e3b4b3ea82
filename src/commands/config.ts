import type { Command } from 'commander';
import chalk from 'chalk';
import { dumpSettings, loadSettings } from '../config/settings.js';
import { resolveGitHubToken } from '../auth/token.js';
import { runCommand } from './shared.js';

export function registerConfig(program: Command): void {
  program
    .command('config')
    .description('Show the effective settings and where they are read from')
    .option('--path', 'Print only the settings file path')
    .action((opts: { path?: boolean }) =>
      runCommand(async () => {
        const { settings, path, fromFile } = loadSettings();
        if (opts.path) {
          console.log(path);
          return;
        }
        const token = resolveGitHubToken({ tokenEnv: settings.github.token_env });
        console.log(chalk.bold('\n  Settings:') + chalk.dim(` ${path}${fromFile ? '' : ' (not found, using defaults)'}`));
        console.log(chalk.dim(`  GitHub token: ${token ? chalk.green(`✓ from ${token.source}`) : chalk.red('✗ not found')}\n`));
        console.log(dumpSettings(settings).trimEnd().split('\n').map((line) => `    ${line}`).join('\n'));
        console.log();
      }),
    );
}
