import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { StrategySchema } from '../config/schema.js';
import { loadSettings } from '../config/settings.js';
import { FleetError } from '../core/errors.js';
import { SimpleGitRunner } from '../core/git-runner.js';
import { cloneOrUpdate } from '../core/repo-action.js';
import { STATUS_STYLE } from '../ui/report.js';
import { commandLogger, interruptSignal, nonNegativeInt, positiveInt, runCommand } from './shared.js';

interface CloneOrUpdateFlags {
  strategy: string;
  name?: string;
  force?: boolean;
  depth?: number;
  branch?: string;
  maxRetries?: number;
  json?: boolean;
  verbose?: boolean;
}

export function registerCloneOrUpdate(program: Command): void {
  program
    .command('clone-or-update')
    .description('Clone a repository, or update the existing clone with a strategy')
    .argument('<url>', 'Repository clone URL')
    .argument('[directory]', 'Parent directory for the clone', '.')
    .option('-s, --strategy <strategy>', 'Update strategy: rebase | reset | clone | skip | pull | fetch', 'rebase')
    .option('--name <dir>', 'Directory name (default: from the URL)')
    .option('-f, --force', 'Replace a directory that is not a clone of <url>')
    .option('--depth <n>', 'Shallow clone depth', positiveInt)
    .option('-b, --branch <name>', 'Branch to clone and reset to')
    .option('--max-retries <n>', 'Retries for network and timeout errors', nonNegativeInt)
    .option('--json', 'Print the result as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action((url: string, directory: string, flags: CloneOrUpdateFlags) =>
      runCommand(async () => {
        const logger = commandLogger(flags);
        const strategy = StrategySchema.safeParse(flags.strategy);
        if (!strategy.success) throw new FleetError('validation', `unknown strategy "${flags.strategy}"`);
        const { settings } = loadSettings();
        const signal = interruptSignal(logger);

        const spinner = flags.json ? null : ora(`Processing ${url}...`).start();
        const result = await cloneOrUpdate(
          new SimpleGitRunner({ signal }),
          {
            url,
            targetPath: directory,
            name: flags.name,
            strategy: strategy.data,
            force: flags.force ?? false,
            cloneDepth: flags.depth,
            branch: flags.branch,
            maxRetries: flags.maxRetries ?? settings.sync.max_retries,
            retryBaseDelayMs: settings.sync.retry_base_delay_ms,
            retryMaxDelayMs: settings.sync.retry_max_delay_ms,
          },
          { signal, logger },
        ).finally(() => spinner?.stop());

        if (flags.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }
        const style = STATUS_STYLE[result.status];
        console.log(`${style.color(`${style.icon} ${style.label}`)} ${chalk.white(result.path)} ${chalk.dim(result.message)}`);
      }),
    );
}
