import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { AheadBehind, CloneOptions, FetchOptions, GitRunner } from '../../src/core/git-runner.js';
import type { ProviderClient, RepositoryPage } from '../../src/core/provider.js';
import type { RepoSummary } from '../../src/core/types.js';
import type { Logger } from '../../src/utils/logger.js';

export interface FakeRepoState {
  marker?: string | null;
  clean?: boolean;
  upstream?: string;
  ahead?: number;
  behind?: number;
  branch?: string;
  remoteUrl?: string;
  hasStash?: boolean;
  remoteHead?: string;
  pullOutput?: string;
}

export type FakeGitOp =
  | 'inProgressOperation' | 'currentBranch' | 'remoteUrl' | 'isClean' | 'upstream' | 'fetch'
  | 'aheadBehind' | 'hasStash' | 'pullRebase' | 'pull' | 'resetHard' | 'remoteHeadBranch' | 'clone';

export interface FakeGitCall {
  op: FakeGitOp | 'isRepository';
  path: string;
  args?: unknown;
}

/**
 * In-memory GitRunner. Repository state is keyed by path; `clone` creates the
 * destination (with a `.git` directory) on the real filesystem so callers that
 * check for the directory see it.
 */
export class FakeGitRunner implements GitRunner {
  readonly repos = new Map<string, FakeRepoState>();
  readonly calls: FakeGitCall[] = [];
  private readonly failures = new Map<string, unknown[]>();

  /** Queue errors thrown by the next calls of `op` (optionally only for `path`). */
  failNext(op: FakeGitOp, errors: unknown[], path?: string): this {
    const key = path ? `${op}:${path}` : op;
    this.failures.set(key, [...(this.failures.get(key) ?? []), ...errors]);
    return this;
  }

  set(path: string, state: FakeRepoState): this {
    this.repos.set(path, state);
    return this;
  }

  callsOf(op: FakeGitOp): FakeGitCall[] {
    return this.calls.filter((c) => c.op === op);
  }

  private take(op: FakeGitOp, path: string, args?: unknown): FakeRepoState {
    this.calls.push({ op, path, args });
    for (const key of [`${op}:${path}`, op]) {
      const queue = this.failures.get(key);
      if (queue && queue.length > 0) throw queue.shift();
    }
    return this.repos.get(path) ?? {};
  }

  async isRepository(path: string): Promise<boolean> {
    this.calls.push({ op: 'isRepository', path });
    return existsSync(join(path, '.git'));
  }

  async inProgressOperation(path: string): Promise<string | null> {
    return this.take('inProgressOperation', path).marker ?? null;
  }

  async currentBranch(path: string): Promise<string | undefined> {
    return this.take('currentBranch', path).branch;
  }

  async remoteUrl(path: string): Promise<string | undefined> {
    return this.take('remoteUrl', path).remoteUrl;
  }

  async isClean(path: string): Promise<boolean> {
    return this.take('isClean', path).clean ?? true;
  }

  async upstream(path: string): Promise<string | undefined> {
    return this.take('upstream', path).upstream;
  }

  async fetch(path: string, options?: FetchOptions): Promise<void> {
    this.take('fetch', path, options);
  }

  async aheadBehind(path: string): Promise<AheadBehind> {
    const state = this.take('aheadBehind', path);
    return { ahead: state.ahead ?? 0, behind: state.behind ?? 0 };
  }

  async hasStash(path: string): Promise<boolean> {
    return this.take('hasStash', path).hasStash ?? false;
  }

  async pullRebase(path: string): Promise<string> {
    return this.take('pullRebase', path).pullOutput ?? 'Updating 1111111..2222222\nFast-forward';
  }

  async pull(path: string): Promise<string> {
    return this.take('pull', path).pullOutput ?? 'Updating 1111111..2222222\nFast-forward';
  }

  async resetHard(path: string, target: string): Promise<void> {
    this.take('resetHard', path, target);
  }

  async remoteHeadBranch(path: string): Promise<string | undefined> {
    return this.take('remoteHeadBranch', path).remoteHead;
  }

  async clone(url: string, destination: string, options?: CloneOptions): Promise<void> {
    this.take('clone', destination, { url, ...options });
    mkdirSync(join(destination, '.git'), { recursive: true });
    this.repos.set(destination, { remoteUrl: url, clean: true, branch: options?.branch ?? 'main', remoteHead: 'main' });
  }
}

export function summary(name: string, org = 'acme'): RepoSummary {
  return {
    name,
    cloneUrl: `https://github.com/${org}/${name}.git`,
    description: '',
    private: false,
    archived: false,
    fork: false,
  };
}

/** Provider serving a fixed repository list in pages, with optional queued failures. */
export class FakeProvider implements ProviderClient {
  readonly name = 'github' as const;
  readonly requests: number[] = [];
  private readonly failures: unknown[] = [];

  constructor(private readonly all: RepoSummary[]) {}

  failNext(...errors: unknown[]): this {
    this.failures.push(...errors);
    return this;
  }

  async listRepositories(_organization: string, page: number, perPage: number): Promise<RepositoryPage> {
    this.requests.push(page);
    if (this.failures.length > 0) throw this.failures.shift();
    const start = (page - 1) * perPage;
    const repositories = this.all.slice(start, start + perPage);
    return { repositories, nextPage: repositories.length === perPage ? page + 1 : null };
  }

  async getRepository(fullName: string): Promise<RepoSummary> {
    const name = fullName.split('/')[1];
    const found = this.all.find((r) => r.name === name);
    if (!found) throw Object.assign(new Error('Not Found'), { status: 404 });
    return found;
  }
}

/** Logger that records every line by level. */
type Level = 'debug' | 'info' | 'warn' | 'error';

export function recordingLogger(): Logger & { lines: Record<Level, string[]> } {
  const lines: Record<Level, string[]> = { debug: [], info: [], warn: [], error: [] };
  return {
    lines,
    debug: (m) => lines.debug.push(m),
    info: (m) => lines.info.push(m),
    warn: (m) => lines.warn.push(m),
    error: (m) => lines.error.push(m),
  };
}

export const noSleep = async (): Promise<void> => {};
