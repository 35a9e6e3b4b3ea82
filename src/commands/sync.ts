import type { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { confirm } from '@inquirer/prompts';
import { ManifestReuseSchema, ProviderNameSchema, StrategySchema, type Settings, type SyncOptions } from '../config/schema.js';
import { loadSettings } from '../config/settings.js';
import { FleetError } from '../core/errors.js';
import { SimpleGitRunner } from '../core/git-runner.js';
import { SyncOrchestrator } from '../core/sync-orchestrator.js';
import { requireGitHubToken } from '../auth/token.js';
import { GitHubProvider } from '../github/client.js';
import type { Logger } from '../utils/logger.js';
import { ResultReport } from '../ui/report.js';
import { commandLogger, interruptSignal, nonNegativeInt, positiveInt, runCommand } from './shared.js';

interface SyncFlags {
  target?: string;
  provider: string;
  strategy?: string;
  parallel?: number;
  maxRetries?: number;
  resume?: boolean;
  force?: boolean;
  streaming?: boolean;
  pageSize?: number;
  cleanupOrphans?: boolean;
  yes?: boolean;
  manifestReuse?: string;
  manifestMaxAge?: number;
  depth?: number;
  branch?: string;
  json?: boolean;
  verbose?: boolean;
}

/** Merge command-line flags over the `sync` section of the settings file. */
export function buildSyncOptions(organization: string, flags: SyncFlags, settings: Settings): SyncOptions {
  const defaults = settings.sync;
  const provider = ProviderNameSchema.safeParse(flags.provider);
  if (!provider.success) throw new FleetError('validation', `unknown provider "${flags.provider}"`);
  const strategy = flags.strategy === undefined ? undefined : StrategySchema.safeParse(flags.strategy);
  if (strategy && !strategy.success) throw new FleetError('validation', `unknown strategy "${flags.strategy}"`);
  const reuse = ManifestReuseSchema.safeParse(flags.manifestReuse ?? defaults.manifest_reuse);
  if (!reuse.success) throw new FleetError('validation', `unknown manifest reuse policy "${flags.manifestReuse}"`);

  return {
    provider: provider.data,
    organization,
    targetPath: resolve(flags.target ?? organization),
    // unset flags stay undefined on resume so the recorded settings apply
    strategy: strategy?.data ?? (flags.resume ? undefined : defaults.strategy),
    parallel: flags.parallel ?? defaults.parallel,
    maxRetries: flags.maxRetries ?? defaults.max_retries,
    resume: flags.resume ?? false,
    force: flags.force,
    streaming: flags.streaming,
    pageSize: flags.pageSize ?? defaults.page_size,
    cleanupOrphans: flags.cleanupOrphans,
    manifestReuse: reuse.data,
    manifestMaxAgeMinutes: flags.manifestMaxAge ?? defaults.manifest_max_age_minutes,
    cloneDepth: flags.depth,
    branch: flags.branch,
    retryBaseDelayMs: defaults.retry_base_delay_ms,
    retryMaxDelayMs: defaults.retry_max_delay_ms,
  };
}

function cleanupConfirmation(flags: SyncFlags, logger: Logger): (orphans: string[]) => Promise<boolean> {
  return async (orphans) => {
    if (flags.yes) return true;
    if (!process.stdin.isTTY) {
      logger.warn(`Not removing ${orphans.length} orphan(s) without confirmation; pass --yes`);
      return false;
    }
    console.log(chalk.yellow(`\n  Orphan directories not in the organization:\n    ${orphans.join('\n    ')}\n`));
    return confirm({ message: `Permanently delete ${orphans.length} director${orphans.length === 1 ? 'y' : 'ies'}?`, default: false });
  };
}

export function registerSync(program: Command): void {
  program
    .command('sync')
    .description("Clone or update every repository of an organization into a directory")
    .argument('<organization>', 'Organization (or user) to mirror')
    .option('-t, --target <dir>', 'Target directory (default: ./<organization>)')
    .option('-p, --provider <name>', 'Hosting provider', 'github')
    .option('-s, --strategy <strategy>', 'Update strategy for existing clones: rebase | reset | clone | skip | pull | fetch')
    .option('-j, --parallel <n>', 'Repositories processed at once', positiveInt)
    .option('--max-retries <n>', 'Retries for rate-limit, network and timeout errors', nonNegativeInt)
    .option('--resume', 'Continue the interrupted session for this target')
    .option('-f, --force', 'Replace directories that are not clones of the expected repository')
    .option('--streaming', 'Start syncing each page of the listing as soon as it arrives')
    .option('--page-size <n>', 'Repositories per listing page (max 100)', positiveInt)
    .option('--cleanup-orphans', 'Delete directories of repositories no longer in the organization')
    .option('-y, --yes', 'Do not ask before deleting orphans')
    .option('--manifest-reuse <policy>', 'Reuse an existing manifest: always | never | max-age')
    .option('--manifest-max-age <minutes>', 'Maximum manifest age for max-age reuse', positiveInt)
    .option('--depth <n>', 'Shallow clone depth', positiveInt)
    .option('-b, --branch <name>', 'Branch to clone and reset to')
    .option('--json', 'Print the report as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action((organization: string, flags: SyncFlags) =>
      runCommand(async () => {
        const logger = commandLogger(flags);
        const { settings } = loadSettings();
        const options = buildSyncOptions(organization, flags, settings);
        if (options.provider !== 'github') {
          throw new FleetError('validation', `provider ${options.provider} is not supported yet; use github`);
        }

        const { token, source } = requireGitHubToken({ tokenEnv: settings.github.token_env });
        logger.debug(`Using GitHub token from ${source}`);
        const provider = new GitHubProvider({ token, baseUrl: settings.github.api_url, logger });

        const orchestrator = new SyncOrchestrator({
          provider,
          git: (signal) => new SimpleGitRunner({ signal }),
          logger,
        });

        const spinner = flags.json || flags.verbose ? null : ora(`Syncing ${organization}...`).start();
        let done = 0;
        const report = await orchestrator
          .sync(options, {
            signal: interruptSignal(logger),
            onResult: (result) => {
              done++;
              if (spinner) spinner.text = `Syncing ${organization}... ${done} done (last: ${result.path})`;
            },
            confirmCleanup: async (orphans) => {
              spinner?.stop();
              return cleanupConfirmation(flags, logger)(orphans);
            },
          })
          .finally(() => spinner?.stop());

        if (flags.json) console.log(ResultReport.toJson(report));
        else ResultReport.renderSync(report);

        if (report.failed) return 1;
        // cancelled before the run could finish
        return report.completed ? 0 : 130;
      }),
    );
}
