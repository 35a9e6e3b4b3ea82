import { DEFAULT_FETCH_TIMEOUT_MS, type GitRunner } from './git-runner.js';
import { errorMessage, FleetError, toFleetError } from './errors.js';
import type { Classification } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ClassifierOptions {
  /** Skip refreshing remote refs before comparing with upstream. */
  noFetch?: boolean;
  fetchTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Decides whether a repository may be auto-updated.
 *
 * Checks run in order and the first match wins: merge/rebase in progress,
 * dirty tree, missing upstream, then ahead/behind against upstream
 * (up-to-date, conflicts when diverged, otherwise safe).
 */
export class SafetyClassifier {
  private readonly git: GitRunner;
  private readonly noFetch: boolean;
  private readonly fetchTimeoutMs: number;
  private readonly logger: Logger;

  constructor(git: GitRunner, options: ClassifierOptions = {}) {
    this.git = git;
    this.noFetch = options.noFetch ?? false;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async classify(path: string): Promise<Classification> {
    const facts = await this.gatherFacts(path);
    const base = { ...facts, ahead: 0, behind: 0 };

    const marker = await this.git.inProgressOperation(path);
    if (marker) {
      return { ...base, state: 'merge-in-progress', details: `merge or rebase in progress (${marker})` };
    }

    if (!(await this.git.isClean(path))) {
      return { ...base, state: 'dirty', details: 'uncommitted changes present' };
    }

    const upstream = await this.git.upstream(path);
    if (!upstream) {
      return { ...base, state: 'no-upstream', details: 'no upstream branch configured' };
    }

    if (!this.noFetch) {
      try {
        await this.git.fetch(path, { timeoutMs: this.fetchTimeoutMs });
      } catch (err) {
        const fleetErr = toFleetError(err, { repository: path, operation: 'fetch' });
        if (fleetErr.kind === 'cancelled') throw fleetErr;
        this.logger.warn(`Fetch failed for ${path}, comparing against stale refs: ${fleetErr.message}`);
      }
    }

    let ahead: number;
    let behind: number;
    try {
      ({ ahead, behind } = await this.git.aheadBehind(path));
    } catch (err) {
      throw new FleetError(
        'git',
        `could not compare with ${upstream}: ${errorMessage(err)}`,
        { repository: path, operation: 'compare-ahead-behind' },
        err,
      );
    }

    if (behind === 0) {
      return { ...facts, ahead, behind, state: 'up-to-date', details: 'already up to date' };
    }
    if (ahead > 0) {
      return {
        ...facts, ahead, behind, state: 'conflicts',
        details: `${ahead} local and ${behind} remote commit(s) diverged`,
      };
    }
    return { ...facts, ahead, behind, state: 'safe', details: `${behind} commit(s) can be fast-forwarded` };
  }

  /** Branch, origin URL and stash presence; each best-effort. */
  private async gatherFacts(path: string): Promise<Pick<Classification, 'branch' | 'remoteUrl' | 'hasStash'>> {
    const [branch, remoteUrl, hasStash] = await Promise.all([
      this.git.currentBranch(path).catch((err: unknown) => this.skipFact(path, 'branch', err)),
      this.git.remoteUrl(path).catch((err: unknown) => this.skipFact(path, 'remote URL', err)),
      this.git.hasStash(path).catch((err: unknown) => this.skipFact(path, 'stash list', err)),
    ]);
    return { branch, remoteUrl, hasStash: hasStash ?? false };
  }

  private skipFact(path: string, what: string, err: unknown): undefined {
    const fleetErr = toFleetError(err);
    if (fleetErr.kind === 'cancelled') throw fleetErr;
    this.logger.debug(`${path}: could not read ${what}: ${fleetErr.message}`);
    return undefined;
  }
}
