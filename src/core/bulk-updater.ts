import type { GitRunner } from './git-runner.js';
import { SafetyClassifier } from './safety-classifier.js';
import { ExecutionScheduler } from './scheduler.js';
import { errorMessage, toFleetError } from './errors.js';
import { createResult, localRef, summarize, type BulkUpdateStatus, type Classification, type RepoResult, type RepoStatus } from './types.js';
import type { DiscoveredRepo } from './repo-finder.js';
import type { SafetyState } from '../config/schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface BulkUpdaterOptions {
  parallel: number;
  dryRun?: boolean;
  noFetch?: boolean;
  fetchTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onResult?: (result: RepoResult) => void;
}

export interface BulkUpdateReport {
  root: string;
  results: RepoResult[];
  summary: Partial<Record<RepoStatus, number>>;
  /** True when any repository ended `failed` or `error`. */
  failed: boolean;
}

/** Non-mutating outcome for every state other than `safe`. */
const STATE_STATUS: Record<Exclude<SafetyState, 'safe'>, BulkUpdateStatus> = {
  'merge-in-progress': 'merge-in-progress',
  dirty: 'dirty',
  'no-upstream': 'no-upstream',
  'up-to-date': 'up-to-date',
  conflicts: 'conflicts',
};

const UP_TO_DATE_OUTPUT = [/already up.to.date/i, /current branch .* is up to date/i];

/** Interpret `git pull --rebase` output for a successful pull. */
export function interpretPullOutput(output: string): { status: 'updated' | 'up-to-date'; message: string } {
  const text = output.trim();
  if (UP_TO_DATE_OUTPUT.some((p) => p.test(text))) {
    return { status: 'up-to-date', message: 'already up to date' };
  }
  const firstLine = text.split('\n')[0]?.trim();
  return { status: 'updated', message: firstLine || 'updated' };
}

/**
 * Classifies every repository and pulls (with rebase) the ones that are
 * safe to fast-forward, on a bounded worker pool.
 */
export class BulkUpdater {
  private readonly git: GitRunner;
  private readonly options: BulkUpdaterOptions;
  private readonly classifier: SafetyClassifier;
  private readonly logger: Logger;

  constructor(git: GitRunner, options: BulkUpdaterOptions) {
    this.git = git;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.classifier = new SafetyClassifier(git, {
      noFetch: options.noFetch,
      fetchTimeoutMs: options.fetchTimeoutMs,
      logger: this.logger,
    });
  }

  async run(root: string, repos: DiscoveredRepo[]): Promise<BulkUpdateReport> {
    const scheduler = new ExecutionScheduler({
      concurrency: this.options.parallel,
      signal: this.options.signal,
      logger: this.logger,
    });

    const results = await scheduler.run(repos, (repo) => this.processRepository(repo), {
      key: (repo) => repo.absolutePath,
      onError: (repo, err) =>
        createResult({
          ref: localRef(repo.absolutePath), path: repo.absolutePath,
          status: 'error', message: errorMessage(err), durationMs: 0, error: errorMessage(err),
        }),
      onCancelled: (repo) =>
        createResult({
          ref: localRef(repo.absolutePath), path: repo.absolutePath,
          status: 'cancelled', message: 'not processed: run cancelled', durationMs: 0,
        }),
      onResult: (result) => {
        this.logger.debug(`${result.path}: ${result.status} ${result.message}`);
        this.options.onResult?.(result);
      },
    });

    return {
      root,
      results,
      summary: summarize(results),
      failed: results.some((r) => r.status === 'failed' || r.status === 'error'),
    };
  }

  private async processRepository(repo: DiscoveredRepo): Promise<RepoResult> {
    const started = Date.now();
    const path = repo.absolutePath;
    const ref = localRef(path);

    let classification: Classification;
    try {
      classification = await this.classifier.classify(path);
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: path, operation: 'classify' });
      return createResult({
        ref, path,
        status: fleetErr.kind === 'cancelled' ? 'cancelled' : 'error',
        message: `status check failed: ${fleetErr.message}`,
        durationMs: Date.now() - started,
        error: fleetErr.message,
      });
    }

    const facts = {
      ref, path,
      branch: classification.branch,
      remoteUrl: classification.remoteUrl,
      ahead: classification.ahead,
      behind: classification.behind,
      hasStash: classification.hasStash,
    };

    if (classification.state !== 'safe') {
      return createResult({
        ...facts,
        status: STATE_STATUS[classification.state],
        message: classification.details,
        durationMs: Date.now() - started,
      });
    }

    if (this.options.dryRun) {
      return createResult({
        ...facts,
        status: 'would-update',
        message: `would pull ${classification.behind} commit(s) (dry run)`,
        durationMs: Date.now() - started,
      });
    }

    try {
      const output = await this.git.pullRebase(path);
      const { status, message } = interpretPullOutput(output);
      return createResult({
        ...facts,
        status,
        message,
        durationMs: Date.now() - started,
      });
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: path, operation: 'pull-rebase' });
      return createResult({
        ...facts,
        status: fleetErr.kind === 'cancelled' ? 'cancelled' : 'failed',
        message: `pull failed: ${fleetErr.message}`,
        durationMs: Date.now() - started,
        error: fleetErr.message,
      });
    }
  }
}
