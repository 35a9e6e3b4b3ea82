import { simpleGit, CheckRepoActions, type SimpleGit } from 'simple-git';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { FleetError, toFleetError } from './errors.js';

export interface AheadBehind {
  ahead: number;
  behind: number;
}

export interface CloneOptions {
  depth?: number;
  branch?: string;
  mirror?: boolean;
}

export interface FetchOptions {
  remote?: string;
  timeoutMs?: number;
  prune?: boolean;
}

/**
 * Logical git operations used by the classifier, bulk updater and sync
 * orchestrator. Every method takes the repository path it acts on.
 */
export interface GitRunner {
  isRepository(path: string): Promise<boolean>;
  /** Name of the marker (MERGE_HEAD, rebase-merge, rebase-apply) if an operation is in progress. */
  inProgressOperation(path: string): Promise<string | null>;
  currentBranch(path: string): Promise<string | undefined>;
  remoteUrl(path: string, remote?: string): Promise<string | undefined>;
  isClean(path: string): Promise<boolean>;
  upstream(path: string): Promise<string | undefined>;
  fetch(path: string, options?: FetchOptions): Promise<void>;
  aheadBehind(path: string): Promise<AheadBehind>;
  hasStash(path: string): Promise<boolean>;
  /** Returns combined command output. */
  pullRebase(path: string): Promise<string>;
  pull(path: string): Promise<string>;
  resetHard(path: string, target: string): Promise<void>;
  remoteHeadBranch(path: string, remote?: string): Promise<string | undefined>;
  clone(url: string, destination: string, options?: CloneOptions): Promise<void>;
}

export const IN_PROGRESS_MARKERS = ['MERGE_HEAD', 'rebase-merge', 'rebase-apply'] as const;

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

/** Parse `git rev-list --left-right --count A...B` output ("<ahead>\t<behind>"). */
export function parseAheadBehind(output: string): AheadBehind {
  const parts = output.trim().split(/\s+/);
  const [ahead, behind] = parts.map((p) => Number.parseInt(p, 10));
  if (parts.length !== 2 || !Number.isInteger(ahead) || !Number.isInteger(behind)) {
    throw new FleetError('git', `unexpected rev-list output: ${output.trim()}`, { operation: 'compare-ahead-behind' });
  }
  return { ahead, behind };
}

/**
 * GitRunner backed by simple-git. A run-level AbortSignal, when given, is
 * handed to every spawned git process so cancellation kills in-flight work.
 */
export class SimpleGitRunner implements GitRunner {
  private readonly signal?: AbortSignal;

  constructor(options: { signal?: AbortSignal } = {}) {
    this.signal = options.signal;
  }

  private client(baseDir?: string, signal: AbortSignal | undefined = this.signal): SimpleGit {
    const git = simpleGit({ baseDir, abort: signal, maxConcurrentProcesses: 4 });
    return git.env({ ...process.env, GIT_TERMINAL_PROMPT: '0' });
  }

  private async run<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toFleetError(err, { repository: path, operation });
    }
  }

  async isRepository(path: string): Promise<boolean> {
    if (!existsSync(join(path, '.git'))) return false;
    return this.run('is-repository', path, () => this.client(path).checkIsRepo(CheckRepoActions.IS_REPO_ROOT));
  }

  async inProgressOperation(path: string): Promise<string | null> {
    const gitDir = await this.run('get-git-dir', path, () =>
      this.client(path).revparse(['--absolute-git-dir']),
    );
    const marker = IN_PROGRESS_MARKERS.find((m) => existsSync(join(gitDir.trim(), m)));
    return marker ?? null;
  }

  async currentBranch(path: string): Promise<string | undefined> {
    const out = await this.run('get-current-branch', path, () => this.client(path).raw(['branch', '--show-current']));
    return out.trim() || undefined;
  }

  async remoteUrl(path: string, remote = 'origin'): Promise<string | undefined> {
    const remotes = await this.run('get-remote-url', path, () => this.client(path).getRemotes(true));
    return remotes.find((r) => r.name === remote)?.refs.fetch || undefined;
  }

  async isClean(path: string): Promise<boolean> {
    const out = await this.run('get-working-tree-status', path, () => this.client(path).raw(['status', '--porcelain']));
    return out.trim().length === 0;
  }

  async upstream(path: string): Promise<string | undefined> {
    try {
      const out = await this.client(path).raw(['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}']);
      return out.trim() || undefined;
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: path, operation: 'get-upstream-branch' });
      // rev-parse exits non-zero when no upstream is configured
      if (fleetErr.kind === 'git') return undefined;
      throw fleetErr;
    }
  }

  async fetch(path: string, options: FetchOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = this.signal ? AbortSignal.any([this.signal, timeout]) : timeout;
    const args = ['fetch', '--quiet', options.remote ?? 'origin'];
    if (options.prune) args.push('--prune');

    try {
      await this.client(path, signal).raw(args);
    } catch (err) {
      if (timeout.aborted && !this.signal?.aborted) {
        throw new FleetError('timeout', `fetch timed out after ${timeoutMs}ms`, { repository: path, operation: 'fetch' }, err);
      }
      throw toFleetError(err, { repository: path, operation: 'fetch' });
    }
  }

  async aheadBehind(path: string): Promise<AheadBehind> {
    const out = await this.run('compare-ahead-behind', path, () =>
      this.client(path).raw(['rev-list', '--left-right', '--count', 'HEAD...@{u}']),
    );
    return parseAheadBehind(out);
  }

  async hasStash(path: string): Promise<boolean> {
    const out = await this.run('list-stashes', path, () => this.client(path).raw(['stash', 'list']));
    return out.trim().length > 0;
  }

  async pullRebase(path: string): Promise<string> {
    return this.run('pull-rebase', path, () => this.client(path).raw(['pull', '--rebase']));
  }

  async pull(path: string): Promise<string> {
    return this.run('pull', path, () => this.client(path).raw(['pull', '--no-rebase']));
  }

  async resetHard(path: string, target: string): Promise<void> {
    await this.run('reset-hard', path, () => this.client(path).raw(['reset', '--hard', target]));
  }

  async remoteHeadBranch(path: string, remote = 'origin'): Promise<string | undefined> {
    try {
      const out = await this.client(path).raw(['rev-parse', '--abbrev-ref', `${remote}/HEAD`]);
      const ref = out.trim();
      return ref.startsWith(`${remote}/`) ? ref.slice(remote.length + 1) : undefined;
    } catch (err) {
      const fleetErr = toFleetError(err, { repository: path, operation: 'get-remote-head' });
      if (fleetErr.kind === 'git') return undefined;
      throw fleetErr;
    }
  }

  async clone(url: string, destination: string, options: CloneOptions = {}): Promise<void> {
    const args: string[] = [];
    if (options.mirror) args.push('--mirror');
    if (options.depth) args.push('--depth', String(options.depth));
    if (options.branch && !options.mirror) args.push('--branch', options.branch);
    await this.run(options.mirror ? 'clone-mirror' : 'clone', destination, () =>
      this.client().clone(url, destination, args),
    );
  }
}
