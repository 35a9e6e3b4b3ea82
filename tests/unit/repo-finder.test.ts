import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { RepoFinder, compileFilter } from '../../src/core/repo-finder.js';
import { recordingLogger } from '../helpers/fakes.js';

let root: string;

function makeRepo(...segments: string[]): string {
  const dir = join(root, ...segments);
  mkdirSync(join(dir, '.git'), { recursive: true });
  return dir;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'rf-find-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('RepoFinder', () => {
  it('finds repositories sorted by path', async () => {
    makeRepo('zeta');
    makeRepo('alpha');
    makeRepo('group', 'beta');

    const repos = await new RepoFinder(root).find();
    expect(repos.map((r) => r.relativePath)).toEqual(['alpha', 'group/beta', 'zeta']);
    expect(repos[1]).toEqual({ name: 'beta', absolutePath: join(root, 'group', 'beta'), relativePath: 'group/beta' });
  });

  it('does not look for repositories nested inside a repository', async () => {
    makeRepo('outer');
    makeRepo('outer', 'vendor-copy');

    const repos = await new RepoFinder(root).find();
    expect(repos.map((r) => r.name)).toEqual(['outer']);
  });

  it('reports the root itself when it is a repository', async () => {
    mkdirSync(join(root, '.git'));
    const repos = await new RepoFinder(root).find();
    expect(repos).toEqual([{ name: basename(root), absolutePath: root, relativePath: '.' }]);
  });

  it('recognises a .git file (worktree or submodule)', async () => {
    mkdirSync(join(root, 'worktree'));
    writeFileSync(join(root, 'worktree', '.git'), 'gitdir: /elsewhere/.git/worktrees/wt\n');
    const repos = await new RepoFinder(root).find();
    expect(repos.map((r) => r.name)).toEqual(['worktree']);
  });

  it('skips ignored directories', async () => {
    makeRepo('node_modules', 'pkg');
    makeRepo('app');
    const repos = await new RepoFinder(root).find();
    expect(repos.map((r) => r.name)).toEqual(['app']);
  });

  it('stops at the maximum depth', async () => {
    makeRepo('a', 'b', 'deep');
    makeRepo('shallow');
    const repos = await new RepoFinder(root, { maxDepth: 2 }).find();
    expect(repos.map((r) => r.name)).toEqual(['shallow']);
  });

  it('applies include and exclude patterns to the relative path', async () => {
    makeRepo('services', 'api');
    makeRepo('services', 'legacy-billing');
    makeRepo('tools', 'lint');

    const repos = await new RepoFinder(root, { include: '^services/', exclude: 'legacy' }).find();
    expect(repos.map((r) => r.relativePath)).toEqual(['services/api']);
  });

  it('ignores an invalid pattern with a warning instead of failing', async () => {
    makeRepo('one');
    const logger = recordingLogger();
    const repos = await new RepoFinder(root, { exclude: '(unclosed', logger }).find();
    expect(repos.map((r) => r.name)).toEqual(['one']);
    expect(logger.lines.warn).toHaveLength(1);
    expect(logger.lines.warn[0]).toMatch(/^Ignoring invalid exclude pattern "\(unclosed"/);
  });

  it('does not follow symlinked directories', async () => {
    const outside = mkdtempSync(join(tmpdir(), 'rf-outside-'));
    try {
      mkdirSync(join(outside, 'linked', '.git'), { recursive: true });
      symlinkSync(join(outside, 'linked'), join(root, 'link'), 'dir');
      const repos = await new RepoFinder(root).find();
      expect(repos).toEqual([]);
    } finally {
      rmSync(outside, { recursive: true, force: true });
    }
  });

  it('reports progress for every repository found', async () => {
    makeRepo('a');
    makeRepo('b');
    const seen: string[] = [];
    await new RepoFinder(root).find((p) => seen.push(p));
    expect(seen.sort()).toEqual([join(root, 'a'), join(root, 'b')]);
  });
});

describe('compileFilter', () => {
  it('returns null for an empty pattern', () => {
    expect(compileFilter(undefined, 'include', recordingLogger())).toBeNull();
  });
});
