import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  SyncOptionsSchema,
  isSafeRepoName,
  type ProviderName,
  type ResolvedSyncOptions,
  type SessionState,
  type SyncOptions,
} from '../config/schema.js';
import type { GitRunner } from './git-runner.js';
import type { ProviderClient } from './provider.js';
import { ManifestStore } from './manifest-store.js';
import { SessionStore, createSession, isDone } from './session-store.js';
import { ExecutionScheduler, ResultCollection } from './scheduler.js';
import { applyRepositoryAction, repositoryPath } from './repo-action.js';
import { withRetry, type RetryHooks, type RetryPolicy } from './retry.js';
import { FleetError, errorMessage, formatIssues, isFatal, toFleetError } from './errors.js';
import { createResult, remoteRef, summarize, type Manifest, type RepoResult, type RepoStatus, type RepoSummary } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface SyncReport {
  provider: ProviderName;
  organization: string;
  targetPath: string;
  manifestReused: boolean;
  orphans: string[];
  removedOrphans: string[];
  results: RepoResult[];
  summary: Partial<Record<RepoStatus, number>>;
  /** A session from an earlier interrupted run was continued. */
  resumed: boolean;
  /** Every listed repository reached a terminal state and none failed. */
  completed: boolean;
  failed: boolean;
}

export interface SyncDependencies {
  provider: ProviderClient;
  /** Git runner bound to the run signal, so aborting kills in-flight subprocesses. */
  git: (signal: AbortSignal) => GitRunner;
  manifests?: ManifestStore;
  logger?: Logger;
  sleep?: RetryHooks['sleep'];
}

export interface SyncHooks {
  signal?: AbortSignal;
  onResult?: (result: RepoResult) => void;
  /** Asked before orphan directories are deleted; defaults to yes. */
  confirmCleanup?: (orphans: string[]) => Promise<boolean>;
}

/**
 * Reconciles a provider organization against a local directory.
 *
 * Each listed repository is cloned when missing, or brought up to date with
 * the chosen strategy when a matching clone exists. Progress is written to a
 * session file after every transition so an interrupted run can resume; the
 * org manifest is written once the listing is complete, and directories it
 * does not name can then be removed as orphans.
 */
export class SyncOrchestrator {
  private readonly provider: ProviderClient;
  private readonly gitFactory: (signal: AbortSignal) => GitRunner;
  private readonly manifests: ManifestStore;
  private readonly logger: Logger;
  private readonly sleep?: RetryHooks['sleep'];

  constructor(deps: SyncDependencies) {
    this.provider = deps.provider;
    this.gitFactory = deps.git;
    this.logger = deps.logger ?? silentLogger;
    this.manifests = deps.manifests ?? new ManifestStore({ logger: this.logger });
    this.sleep = deps.sleep;
  }

  async sync(input: SyncOptions, hooks: SyncHooks = {}): Promise<SyncReport> {
    const parsed = SyncOptionsSchema.safeParse(input);
    if (!parsed.success) {
      throw new FleetError('validation', `invalid sync options: ${formatIssues(parsed.error)}`, { operation: 'sync' });
    }
    const options: ResolvedSyncOptions = { ...parsed.data, targetPath: resolve(parsed.data.targetPath) };
    if (options.provider !== this.provider.name) {
      throw new FleetError('validation', `provider ${options.provider} is not supported by the ${this.provider.name} client`, { operation: 'sync' });
    }

    const sessions = new SessionStore(options.targetPath);
    // settings left unset on resume continue with the recorded ones
    if (options.resume) {
      const recorded = await sessions.load(options.provider, options.organization);
      if (recorded) {
        const snapshot = recorded.options;
        options.strategy = input.strategy ?? snapshot.strategy;
        options.force = input.force ?? snapshot.force;
        options.streaming = input.streaming ?? snapshot.streaming;
        options.cleanupOrphans = input.cleanupOrphans ?? snapshot.cleanupOrphans;
        options.branch = input.branch ?? snapshot.branch;
        options.cloneDepth = input.cloneDepth ?? snapshot.cloneDepth;
      }
    }

    const session = await this.openSession(sessions, options);

    const controller = new AbortController();
    const userSignal = hooks.signal;
    const onUserAbort = (): void => controller.abort();
    if (userSignal?.aborted) controller.abort();
    userSignal?.addEventListener('abort', onUserAbort, { once: true });

    try {
      return await this.runSession(options, session, sessions, controller, hooks);
    } finally {
      userSignal?.removeEventListener('abort', onUserAbort);
    }
  }

  // ─── Session ───────────────────────────────────────────────────────

  private async openSession(sessions: SessionStore, options: ResolvedSyncOptions): Promise<SessionState> {
    const existing = await sessions.load(options.provider, options.organization);
    const where = `${options.provider}/${options.organization} in ${options.targetPath}`;

    if (!options.resume) {
      if (existing && existing.status !== 'completed') {
        throw new FleetError(
          'validation',
          `an unfinished sync session exists for ${where}; rerun with --resume or remove it with "state clean"`,
          { operation: 'open-session' },
        );
      }
      const session = createSession(options.provider, options.organization, options.targetPath, {
        strategy: options.strategy,
        parallel: options.parallel,
        maxRetries: options.maxRetries,
        force: options.force,
        streaming: options.streaming,
        cleanupOrphans: options.cleanupOrphans,
        branch: options.branch,
        cloneDepth: options.cloneDepth,
      });
      await sessions.save(session);
      return session;
    }

    if (!existing) {
      throw new FleetError('validation', `no sync session to resume for ${where}`, { operation: 'open-session' });
    }
    if (existing.targetPath !== options.targetPath) {
      throw new FleetError('validation', `session was recorded for ${existing.targetPath}, not ${options.targetPath}`, { operation: 'open-session' });
    }
    // settings a resume may not change
    const locked: Array<[string, unknown, unknown]> = [
      ['strategy', options.strategy, existing.options.strategy],
      ['force', options.force, existing.options.force],
      ['streaming', options.streaming, existing.options.streaming],
      ['cleanup-orphans', options.cleanupOrphans, existing.options.cleanupOrphans],
      ['branch', options.branch, existing.options.branch],
      ['clone depth', options.cloneDepth, existing.options.cloneDepth],
    ];
    for (const [setting, requested, recorded] of locked) {
      if (requested !== recorded) {
        throw new FleetError(
          'validation',
          `cannot resume with ${setting} ${String(requested ?? 'unset')}: the session was started with ${String(recorded ?? 'unset')}`,
          { operation: 'open-session' },
        );
      }
    }
    if (existing.options.parallel !== options.parallel) {
      this.logger.warn(`Resuming with parallel ${options.parallel} (session used ${existing.options.parallel})`);
      existing.options.parallel = options.parallel;
    }
    if (existing.options.maxRetries !== options.maxRetries) {
      this.logger.warn(`Resuming with max retries ${options.maxRetries} (session used ${existing.options.maxRetries})`);
      existing.options.maxRetries = options.maxRetries;
    }

    existing.status = 'running';
    await sessions.save(existing);
    const done = Object.values(existing.repositories).filter((r) => isDone(r.status)).length;
    this.logger.info(`Resuming session ${existing.resumeToken}: ${done} repositories already done`);
    return existing;
  }

  // ─── Run ───────────────────────────────────────────────────────────

  private async runSession(
    options: ResolvedSyncOptions,
    session: SessionState,
    sessions: SessionStore,
    controller: AbortController,
    hooks: SyncHooks,
  ): Promise<SyncReport> {
    const { provider, organization, targetPath } = options;
    const signal = controller.signal;
    const git = this.gitFactory(signal);
    const policy: RetryPolicy = {
      maxRetries: options.maxRetries,
      baseDelayMs: options.retryBaseDelayMs,
      maxDelayMs: options.retryMaxDelayMs,
    };

    try {
      await mkdir(targetPath, { recursive: true });
    } catch (err) {
      throw toFleetError(err, { operation: 'create-target' });
    }

    const existingManifest = await this.manifests.load(targetPath);
    const manifestReused = this.manifests.shouldReuse(existingManifest, provider, organization, {
      mode: options.manifestReuse,
      maxAgeMinutes: options.manifestMaxAgeMinutes,
    });

    const collection = new ResultCollection();
    const listed: RepoSummary[] = [];
    const seen = new Set<string>();
    let runError: FleetError | undefined;

    const fail = (err: FleetError): void => {
      runError ??= err;
      controller.abort();
    };

    // Repositories finished by an earlier run are reported, not dispatched.
    const admit = async (page: RepoSummary[]): Promise<RepoSummary[]> => {
      const dispatch: RepoSummary[] = [];
      for (const repo of page) {
        if (!isSafeRepoName(repo.name)) {
          this.logger.warn(`Skipping repository "${repo.name}": not a usable directory name`);
          continue;
        }
        if (seen.has(repo.name)) {
          this.logger.debug(`${repo.name}: listed more than once, keeping the first entry`);
          continue;
        }
        seen.add(repo.name);
        listed.push(repo);
        const record = session.repositories[repo.name];
        if (record && isDone(record.status)) {
          const result = createResult({
            ref: remoteRef(provider, organization, repo.name, repo.cloneUrl),
            path: join(targetPath, repo.name),
            status: record.outcome ?? (record.status === 'skipped' ? 'skipped' : 'updated'),
            message: `${record.message ?? record.status} (previous run)`,
            durationMs: 0,
          });
          collection.add(repo.name, result);
          hooks.onResult?.(result);
          continue;
        }
        if (!record) {
          session.repositories[repo.name] = { status: 'pending', attempts: 0, updatedAt: new Date().toISOString() };
        }
        dispatch.push(repo);
      }
      await sessions.save(session);
      return dispatch;
    };

    const listPages = (): AsyncGenerator<RepoSummary> =>
      this.listPages(organization, options.pageSize, policy, signal, admit, fail);

    let items: Iterable<RepoSummary> | AsyncIterable<RepoSummary>;
    if (manifestReused && existingManifest) {
      this.logger.info(`Using existing manifest with ${existingManifest.repositories.length} repositories`);
      items = await admit(existingManifest.repositories);
    } else if (options.streaming) {
      this.logger.info(`Streaming repositories of ${provider}/${organization}`);
      items = listPages();
    } else {
      this.logger.info(`Listing repositories of ${provider}/${organization}`);
      const all: RepoSummary[] = [];
      for await (const repo of listPages()) all.push(repo);
      items = all;
    }

    const scheduler = new ExecutionScheduler({ concurrency: options.parallel, signal, logger: this.logger });
    const results = await scheduler.run(
      items,
      (repo) => this.processRepository(repo, options, session, sessions, git, policy, signal, fail),
      {
        key: (repo) => repo.name,
        onError: (repo, err) =>
          createResult({
            ref: remoteRef(provider, organization, repo.name, repo.cloneUrl),
            path: join(targetPath, repo.name),
            status: 'failed',
            message: errorMessage(err),
            durationMs: 0,
            error: errorMessage(err),
          }),
        onCancelled: (repo) =>
          createResult({
            ref: remoteRef(provider, organization, repo.name, repo.cloneUrl),
            path: join(targetPath, repo.name),
            status: 'cancelled',
            message: 'not processed: run cancelled',
            durationMs: 0,
          }),
        onResult: (result) => hooks.onResult?.(result),
      },
      collection,
    );

    if (runError) {
      session.status = 'failed';
      await sessions.save(session);
      throw runError;
    }

    const report: SyncReport = {
      provider,
      organization,
      targetPath,
      manifestReused,
      orphans: [],
      removedOrphans: [],
      results,
      summary: summarize(results),
      resumed: options.resume,
      completed: false,
      failed: results.some((r) => r.status === 'failed'),
    };

    if (signal.aborted) {
      session.status = 'cancelled';
      await sessions.save(session);
      this.logger.warn('Sync cancelled; rerun with --resume to continue');
      return report;
    }

    const manifest: Manifest =
      manifestReused && existingManifest
        ? existingManifest
        : {
            provider,
            organization,
            generatedAt: new Date().toISOString(),
            cleanupOrphans: options.cleanupOrphans,
            repositories: listed,
          };
    if (!manifestReused) await this.manifests.save(targetPath, manifest);

    report.orphans = await this.manifests.computeOrphans(targetPath, manifest);
    if (report.orphans.length > 0) {
      if (options.cleanupOrphans && (await (hooks.confirmCleanup?.(report.orphans) ?? Promise.resolve(true)))) {
        report.removedOrphans = await this.manifests.removeOrphans(targetPath, report.orphans);
      } else {
        this.logger.info(`${report.orphans.length} orphan directories not in the manifest: ${report.orphans.join(', ')}`);
      }
    }

    if (report.failed) {
      session.status = 'failed';
      await sessions.save(session);
      this.logger.warn('Some repositories failed; rerun with --resume to retry them');
    } else {
      await sessions.delete(provider, organization);
      report.completed = true;
    }
    return report;
  }

  /** Page through the provider listing, admitting each page as it arrives. */
  private async *listPages(
    organization: string,
    pageSize: number,
    policy: RetryPolicy,
    signal: AbortSignal,
    admit: (page: RepoSummary[]) => Promise<RepoSummary[]>,
    fail: (err: FleetError) => void,
  ): AsyncGenerator<RepoSummary> {
    try {
      for (let page: number | null = 1; page !== null && !signal.aborted; ) {
        const current: number = page;
        const result = await withRetry(
          () => this.provider.listRepositories(organization, current, pageSize),
          policy,
          { repository: organization, operation: 'list-repositories' },
          { signal, sleep: this.sleep, onRetry: (err, attempt, delay) => this.logRetry(`page ${current}`, err, attempt, delay) },
        );
        this.logger.debug(`Listed page ${current}: ${result.repositories.length} repositories`);
        yield* await admit(result.repositories);
        page = result.nextPage;
      }
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: organization, operation: 'list-repositories' });
      if (fleetErr.kind !== 'cancelled') fail(fleetErr);
    }
  }

  private async processRepository(
    repo: RepoSummary,
    options: ResolvedSyncOptions,
    session: SessionState,
    sessions: SessionStore,
    git: GitRunner,
    policy: RetryPolicy,
    signal: AbortSignal,
    fail: (err: FleetError) => void,
  ): Promise<RepoResult> {
    const started = Date.now();
    let path = join(options.targetPath, repo.name);
    const ref = remoteRef(options.provider, options.organization, repo.name, repo.cloneUrl);
    const previousAttempts = session.repositories[repo.name]?.attempts ?? 0;
    let attempts = 0;

    await sessions.transition(session, repo.name, 'in-progress', { attempts: previousAttempts });

    try {
      path = repositoryPath(options.targetPath, repo.name);
      const outcome = await withRetry(
        (attempt) => {
          attempts = attempt;
          return applyRepositoryAction(git, repo, path, options, this.logger);
        },
        policy,
        { repository: repo.name, operation: 'sync-repository' },
        { signal, sleep: this.sleep, onRetry: (err, attempt, delay) => this.logRetry(repo.name, err, attempt, delay) },
      );
      await sessions.transition(session, repo.name, outcome.status === 'skipped' ? 'skipped' : 'succeeded', {
        attempts: previousAttempts + attempts,
        message: outcome.message,
        outcome: outcome.status,
      });
      return createResult({ ref, path, status: outcome.status, message: outcome.message, durationMs: Date.now() - started });
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: repo.name });
      const durationMs = Date.now() - started;

      // interrupted repositories stay in-progress for the next resume
      if (fleetErr.kind === 'cancelled') {
        return createResult({ ref, path, status: 'cancelled', message: 'interrupted: run cancelled', durationMs });
      }
      if (isFatal(fleetErr.kind)) {
        this.logger.error(`${repo.name}: ${fleetErr.message}; aborting run`);
        fail(fleetErr);
        return createResult({ ref, path, status: 'failed', message: fleetErr.message, durationMs, error: `${fleetErr.kind}: ${fleetErr.message}` });
      }

      await sessions.transition(session, repo.name, 'failed', {
        attempts: previousAttempts + attempts,
        message: fleetErr.message,
        error: fleetErr.kind,
      });
      return createResult({ ref, path, status: 'failed', message: fleetErr.message, durationMs, error: `${fleetErr.kind}: ${fleetErr.message}` });
    }
  }

  private logRetry(label: string, err: FleetError, attempt: number, delayMs: number): void {
    this.logger.warn(`${label}: ${err.kind} error (${err.message}); retry ${attempt} in ${delayMs}ms`);
  }
}
