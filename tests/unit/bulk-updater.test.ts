import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BulkUpdater, interpretPullOutput } from '../../src/core/bulk-updater.js';
import { FleetError } from '../../src/core/errors.js';
import { RepoFinder, type DiscoveredRepo } from '../../src/core/repo-finder.js';
import { FakeGitRunner } from '../helpers/fakes.js';

function repo(name: string): DiscoveredRepo {
  return { name, absolutePath: `/work/${name}`, relativePath: name };
}

describe('interpretPullOutput', () => {
  it('recognises an already up-to-date pull', () => {
    expect(interpretPullOutput('Already up to date.\n')).toEqual({ status: 'up-to-date', message: 'already up to date' });
    expect(interpretPullOutput('Current branch main is up to date.')).toEqual({ status: 'up-to-date', message: 'already up to date' });
  });

  it('uses the first output line as the update message', () => {
    expect(interpretPullOutput('Updating abc..def\nFast-forward\n')).toEqual({ status: 'updated', message: 'Updating abc..def' });
    expect(interpretPullOutput('')).toEqual({ status: 'updated', message: 'updated' });
  });
});

describe('BulkUpdater', () => {
  it('pulls a safe repository and leaves a dirty one alone', async () => {
    const git = new FakeGitRunner()
      .set('/work/repoA', { upstream: 'origin/main', behind: 2, branch: 'main', pullOutput: 'Updating 1a..2b\nFast-forward' })
      .set('/work/repoB', { clean: false, upstream: 'origin/main', behind: 5, branch: 'main' });

    const report = await new BulkUpdater(git, { parallel: 2 }).run('/work', [repo('repoA'), repo('repoB')]);

    expect(report.results.map((r) => [r.path, r.status, r.message])).toEqual([
      ['/work/repoA', 'updated', 'Updating 1a..2b'],
      ['/work/repoB', 'dirty', 'uncommitted changes present'],
    ]);
    expect(report.results[0]?.behind).toBe(2);
    expect(git.callsOf('pullRebase').map((c) => c.path)).toEqual(['/work/repoA']);
    expect(report.summary).toEqual({ updated: 1, dirty: 1 });
    expect(report.failed).toBe(false);
  });

  it('never pulls in a dry run', async () => {
    const git = new FakeGitRunner().set('/work/api', { upstream: 'origin/main', behind: 3 });
    const report = await new BulkUpdater(git, { parallel: 1, dryRun: true }).run('/work', [repo('api')]);
    expect(report.results[0]).toMatchObject({ status: 'would-update', message: 'would pull 3 commit(s) (dry run)' });
    expect(git.callsOf('pullRebase')).toHaveLength(0);
  });

  it('maps every non-safe state to its own status', async () => {
    const git = new FakeGitRunner()
      .set('/work/a', { marker: 'rebase-merge' })
      .set('/work/b', {})
      .set('/work/c', { upstream: 'origin/main', ahead: 1, behind: 1 })
      .set('/work/d', { upstream: 'origin/main' });
    const report = await new BulkUpdater(git, { parallel: 4, noFetch: true }).run('/work', ['a', 'b', 'c', 'd'].map(repo));
    expect(report.results.map((r) => r.status)).toEqual(['merge-in-progress', 'no-upstream', 'conflicts', 'up-to-date']);
    expect(git.calls.some((c) => c.op === 'pullRebase' || c.op === 'fetch')).toBe(false);
  });

  it('records a failed pull without affecting other repositories', async () => {
    const git = new FakeGitRunner()
      .set('/work/a', { upstream: 'origin/main', behind: 1 })
      .set('/work/b', { upstream: 'origin/main', behind: 1 })
      .failNext('pullRebase', [new FleetError('git', 'CONFLICT (content): merge conflict in app.ts')], '/work/a');

    const report = await new BulkUpdater(git, { parallel: 2 }).run('/work', [repo('a'), repo('b')]);
    expect(report.results.map((r) => [r.status, r.message])).toEqual([
      ['failed', 'pull failed: CONFLICT (content): merge conflict in app.ts'],
      ['updated', 'Updating 1111111..2222222'],
    ]);
    expect(report.failed).toBe(true);
  });

  it('reports a status check failure as an error', async () => {
    const git = new FakeGitRunner()
      .set('/work/a', {})
      .failNext('isClean', [new Error('not a git repository')]);
    const report = await new BulkUpdater(git, { parallel: 1 }).run('/work', [repo('a')]);
    expect(report.results[0]).toMatchObject({ status: 'error', message: 'status check failed: not a git repository' });
    expect(report.failed).toBe(true);
  });

  it('marks repositories cancelled when the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const git = new FakeGitRunner();
    const report = await new BulkUpdater(git, { parallel: 2, signal: controller.signal }).run('/work', [repo('a'), repo('b')]);
    expect(report.results.map((r) => r.status)).toEqual(['cancelled', 'cancelled']);
    expect(report.summary).toEqual({ cancelled: 2 });
  });
});

describe('finding and updating a workspace', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it('updates the repositories the finder discovers', async () => {
    root = mkdtempSync(join(tmpdir(), 'rf-bulk-'));
    mkdirSync(join(root, 'repoA', '.git'), { recursive: true });
    mkdirSync(join(root, 'nested', 'repoB', '.git'), { recursive: true });
    mkdirSync(join(root, 'repoC'));
    writeFileSync(join(root, 'repoC', 'README.md'), 'not a repository');
    mkdirSync(join(root, 'node_modules', 'dep', '.git'), { recursive: true });

    const repos = await new RepoFinder(root).find();
    expect(repos.map((r) => r.relativePath)).toEqual([join('nested', 'repoB'), 'repoA']);

    const repoA = join(root, 'repoA');
    const repoB = join(root, 'nested', 'repoB');
    const git = new FakeGitRunner()
      .set(repoA, { upstream: 'origin/main', behind: 3, branch: 'main', pullOutput: 'Updating 1a..2b\nFast-forward' })
      .set(repoB, { clean: false, upstream: 'origin/main', behind: 1, branch: 'main' });

    const report = await new BulkUpdater(git, { parallel: 2 }).run(root, repos);

    expect(report.results.map((r) => [r.path, r.status])).toEqual([
      [repoB, 'dirty'],
      [repoA, 'updated'],
    ]);
    expect(git.callsOf('pullRebase').map((c) => c.path)).toEqual([repoA]);
    expect(report.summary).toEqual({ updated: 1, dirty: 1 });
  });
});
