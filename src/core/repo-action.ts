import { existsSync } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { CloneOrUpdateOptionsSchema, isSafeRepoName, type CloneOrUpdateOptions, type Strategy } from '../config/schema.js';
import type { GitRunner } from './git-runner.js';
import { interpretPullOutput } from './bulk-updater.js';
import { withRetry, type RetryHooks } from './retry.js';
import { FleetError, formatIssues, toFleetError } from './errors.js';
import { repoNameFromUrl, sameRemote } from './url.js';
import { createResult, localRef, type RepoResult, type RepoSummary } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** What a single repository action did. */
export interface ActionOutcome {
  status: 'cloned' | 'updated' | 'skipped';
  message: string;
}

export interface ActionSettings {
  strategy: Strategy;
  force: boolean;
  cloneDepth?: number;
  branch?: string;
}

/**
 * Directory of repository `name` directly under `parent`. Anything that
 * would resolve elsewhere (`..`, separators, reserved entries) is refused.
 */
export function repositoryPath(parent: string, name: string): string {
  const root = resolve(parent);
  const path = resolve(root, name);
  if (!isSafeRepoName(name) || dirname(path) !== root) {
    throw new FleetError('filesystem', `refusing to use "${name}" as a directory under ${root}`, {
      repository: name,
      operation: 'check-target',
    });
  }
  return path;
}

/**
 * Classify the local target and apply the strategy:
 * missing → clone; matching clone → strategy; anything else is refused
 * unless `force` or strategy `clone` allows replacing it.
 */
export async function applyRepositoryAction(
  git: GitRunner,
  repo: RepoSummary,
  path: string,
  settings: ActionSettings,
  logger: Logger = silentLogger,
): Promise<ActionOutcome> {
  if (!existsSync(path)) {
    await cloneFresh(git, repo, path, settings);
    return { status: 'cloned', message: 'cloned' };
  }

  const isRepo = await git.isRepository(path);
  const origin = isRepo ? await git.remoteUrl(path) : undefined;
  if (!isRepo || origin === undefined || !sameRemote(origin, repo.cloneUrl)) {
    const reason = !isRepo
      ? `${path} exists but is not a git repository`
      : `origin ${origin ?? '(none)'} does not match ${repo.cloneUrl}`;
    if (!settings.force && settings.strategy !== 'clone') {
      throw new FleetError('filesystem', `${reason}; use --force to replace it`, { repository: repo.name, operation: 'check-target' });
    }
    logger.warn(`${repo.name}: ${reason}; replacing with a fresh clone`);
    await removeDirectory(path, repo.name);
    await cloneFresh(git, repo, path, settings);
    return { status: 'cloned', message: 'replaced with a fresh clone' };
  }

  switch (settings.strategy) {
    case 'skip':
      return { status: 'skipped', message: 'existing clone left unchanged' };
    case 'clone':
      await removeDirectory(path, repo.name);
      await cloneFresh(git, repo, path, settings);
      return { status: 'cloned', message: 'recloned' };
    case 'fetch':
      await git.fetch(path, { prune: true });
      return { status: 'updated', message: 'fetched' };
    case 'reset': {
      await git.fetch(path);
      const branch = settings.branch ?? (await git.remoteHeadBranch(path)) ?? (await git.currentBranch(path));
      if (!branch) {
        throw new FleetError('git', 'cannot determine the branch to reset to', { repository: repo.name, operation: 'reset-hard' });
      }
      await git.resetHard(path, `origin/${branch}`);
      return { status: 'updated', message: `reset to origin/${branch}` };
    }
    case 'rebase':
    case 'pull': {
      // merge-pulls never run on top of local edits
      const marker = await git.inProgressOperation(path);
      if (marker) return { status: 'skipped', message: `merge or rebase in progress (${marker})` };
      if (!(await git.isClean(path))) return { status: 'skipped', message: 'uncommitted changes present' };
      const output = settings.strategy === 'rebase' ? await git.pullRebase(path) : await git.pull(path);
      return { status: 'updated', message: interpretPullOutput(output).message };
    }
  }
}

async function cloneFresh(git: GitRunner, repo: RepoSummary, path: string, settings: ActionSettings): Promise<void> {
  try {
    await git.clone(repo.cloneUrl, path, { depth: settings.cloneDepth, branch: settings.branch });
  } catch (err) {
    // a half-written clone would look like a foreign directory on retry
    await rm(path, { recursive: true, force: true });
    throw err;
  }
}

async function removeDirectory(path: string, repository: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    throw toFleetError(err, { repository, operation: 'remove-directory' });
  }
}

export interface CloneOrUpdateHooks {
  signal?: AbortSignal;
  sleep?: RetryHooks['sleep'];
  logger?: Logger;
}

/**
 * Clone or update one repository by URL, with the same target
 * classification, strategies and retry policy as a fleet sync.
 */
export async function cloneOrUpdate(
  git: GitRunner,
  input: CloneOrUpdateOptions,
  hooks: CloneOrUpdateHooks = {},
): Promise<RepoResult> {
  const parsed = CloneOrUpdateOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new FleetError('validation', `invalid clone-or-update options: ${formatIssues(parsed.error)}`, { operation: 'clone-or-update' });
  }
  const options = parsed.data;
  const logger = hooks.logger ?? silentLogger;
  const parent = resolve(options.targetPath);
  const name = options.name ?? repoNameFromUrl(options.url);
  const repo: RepoSummary = { name, cloneUrl: options.url, description: '', private: false, archived: false, fork: false };
  const path = repositoryPath(parent, name);
  const started = Date.now();

  try {
    await mkdir(parent, { recursive: true });
  } catch (err) {
    throw toFleetError(err, { repository: name, operation: 'create-target' });
  }

  const outcome = await withRetry(
    () => applyRepositoryAction(git, repo, path, options, logger),
    { maxRetries: options.maxRetries, baseDelayMs: options.retryBaseDelayMs, maxDelayMs: options.retryMaxDelayMs },
    { repository: name, operation: 'clone-or-update' },
    {
      signal: hooks.signal,
      sleep: hooks.sleep,
      onRetry: (err, attempt, delay) => logger.warn(`${name}: ${err.kind} error (${err.message}); retry ${attempt} in ${delay}ms`),
    },
  );

  return createResult({
    ref: localRef(path),
    path,
    status: outcome.status,
    message: outcome.message,
    durationMs: Date.now() - started,
  });
}
