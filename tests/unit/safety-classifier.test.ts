import { describe, it, expect } from 'vitest';
import { SafetyClassifier } from '../../src/core/safety-classifier.js';
import { FleetError } from '../../src/core/errors.js';
import { FakeGitRunner, recordingLogger } from '../helpers/fakes.js';

const path = '/work/api';

function classifierFor(git: FakeGitRunner, noFetch = false): SafetyClassifier {
  return new SafetyClassifier(git, { noFetch, fetchTimeoutMs: 5000 });
}

describe('SafetyClassifier', () => {
  it('reports a merge in progress before anything else', async () => {
    const git = new FakeGitRunner().set(path, { marker: 'MERGE_HEAD', clean: false, upstream: 'origin/main' });
    const result = await classifierFor(git).classify(path);
    expect(result.state).toBe('merge-in-progress');
    expect(result.details).toBe('merge or rebase in progress (MERGE_HEAD)');
    expect(git.callsOf('isClean')).toHaveLength(0);
  });

  it('reports a dirty working tree', async () => {
    const git = new FakeGitRunner().set(path, { clean: false, upstream: 'origin/main', branch: 'main' });
    const result = await classifierFor(git).classify(path);
    expect(result).toMatchObject({ state: 'dirty', details: 'uncommitted changes present', branch: 'main', ahead: 0, behind: 0 });
    expect(git.callsOf('fetch')).toHaveLength(0);
  });

  it('reports a missing upstream', async () => {
    const git = new FakeGitRunner().set(path, {});
    const result = await classifierFor(git).classify(path);
    expect(result).toMatchObject({ state: 'no-upstream', details: 'no upstream branch configured' });
  });

  it('reports up-to-date when nothing is behind', async () => {
    const git = new FakeGitRunner().set(path, { upstream: 'origin/main', ahead: 2, behind: 0 });
    const result = await classifierFor(git).classify(path);
    expect(result).toMatchObject({ state: 'up-to-date', ahead: 2, behind: 0 });
  });

  it('reports conflicts when local and remote have diverged', async () => {
    const git = new FakeGitRunner().set(path, { upstream: 'origin/main', ahead: 1, behind: 3 });
    const result = await classifierFor(git).classify(path);
    expect(result).toMatchObject({ state: 'conflicts', details: '1 local and 3 remote commit(s) diverged' });
  });

  it('reports safe when only behind, carrying the facts', async () => {
    const git = new FakeGitRunner().set(path, {
      upstream: 'origin/main', behind: 4, branch: 'main', remoteUrl: 'https://github.com/acme/api.git', hasStash: true,
    });
    const result = await classifierFor(git).classify(path);
    expect(result).toEqual({
      state: 'safe',
      details: '4 commit(s) can be fast-forwarded',
      branch: 'main',
      remoteUrl: 'https://github.com/acme/api.git',
      hasStash: true,
      ahead: 0,
      behind: 4,
    });
  });

  it('fetches with the configured timeout before comparing', async () => {
    const git = new FakeGitRunner().set(path, { upstream: 'origin/main', behind: 1 });
    await classifierFor(git).classify(path);
    expect(git.callsOf('fetch')).toEqual([{ op: 'fetch', path, args: { timeoutMs: 5000 } }]);
  });

  it('skips the fetch when asked', async () => {
    const git = new FakeGitRunner().set(path, { upstream: 'origin/main', behind: 1 });
    await classifierFor(git, true).classify(path);
    expect(git.callsOf('fetch')).toHaveLength(0);
  });

  it('compares against stale refs when the fetch fails', async () => {
    const git = new FakeGitRunner()
      .set(path, { upstream: 'origin/main', behind: 2 })
      .failNext('fetch', [new FleetError('timeout', 'fetch timed out after 5000ms')]);
    const logger = recordingLogger();
    const result = await new SafetyClassifier(git, { logger }).classify(path);
    expect(result.state).toBe('safe');
    expect(logger.lines.warn).toEqual([`Fetch failed for ${path}, comparing against stale refs: fetch timed out after 5000ms`]);
  });

  it('propagates cancellation from the fetch', async () => {
    const git = new FakeGitRunner()
      .set(path, { upstream: 'origin/main', behind: 2 })
      .failNext('fetch', [new FleetError('cancelled', 'operation cancelled')]);
    await expect(classifierFor(git).classify(path)).rejects.toMatchObject({ kind: 'cancelled' });
  });

  it('fails with a git error when the comparison fails', async () => {
    const git = new FakeGitRunner()
      .set(path, { upstream: 'origin/main' })
      .failNext('aheadBehind', [new Error('bad revision')]);
    await expect(classifierFor(git).classify(path)).rejects.toMatchObject({
      kind: 'git',
      message: 'could not compare with origin/main: bad revision',
    });
  });

  it('tolerates unreadable facts', async () => {
    const git = new FakeGitRunner()
      .set(path, { upstream: 'origin/main', behind: 0 })
      .failNext('currentBranch', [new Error('detached')]);
    const result = await classifierFor(git).classify(path);
    expect(result.state).toBe('up-to-date');
    expect(result.branch).toBeUndefined();
  });
});
