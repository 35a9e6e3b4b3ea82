import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { buildSyncOptions } from '../../src/commands/sync.js';
import { groupByFolder } from '../../src/commands/find.js';
import { lifecycleCounts } from '../../src/commands/state.js';
import { nonNegativeInt, positiveInt } from '../../src/commands/shared.js';
import { SettingsSchema } from '../../src/config/schema.js';
import { createSession } from '../../src/core/session-store.js';

const settings = SettingsSchema.parse({ sync: { parallel: 6, strategy: 'rebase' } });

describe('buildSyncOptions', () => {
  it('fills unset flags from the settings file', () => {
    const options = buildSyncOptions('acme', { provider: 'github' }, settings);

    expect(options).toMatchObject({
      provider: 'github',
      organization: 'acme',
      targetPath: resolve('acme'),
      strategy: 'rebase',
      parallel: 6,
      maxRetries: 3,
      pageSize: 100,
      manifestReuse: 'always',
      resume: false,
    });
  });

  it('lets flags win over settings', () => {
    const options = buildSyncOptions(
      'acme',
      { provider: 'github', target: 'mirror', strategy: 'fetch', parallel: 2, manifestReuse: 'never' },
      settings,
    );
    expect(options).toMatchObject({ targetPath: resolve('mirror'), strategy: 'fetch', parallel: 2, manifestReuse: 'never' });
  });

  it('leaves the strategy open on resume', () => {
    expect(buildSyncOptions('acme', { provider: 'github', resume: true }, settings).strategy).toBeUndefined();
  });

  it('leaves the settings a session records unset when no flag is given', () => {
    const options = buildSyncOptions('acme', { provider: 'github', resume: true }, settings);
    expect([options.force, options.streaming, options.cleanupOrphans, options.branch, options.cloneDepth]).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
    ]);
    expect(buildSyncOptions('acme', { provider: 'github', resume: true, force: true }, settings).force).toBe(true);
  });

  it('rejects unknown names', () => {
    expect(() => buildSyncOptions('acme', { provider: 'bitbucket' }, settings)).toThrow('unknown provider "bitbucket"');
    expect(() => buildSyncOptions('acme', { provider: 'github', strategy: 'merge' }, settings)).toThrow('unknown strategy "merge"');
  });
});

describe('integer flags', () => {
  it('parses valid values', () => {
    expect(positiveInt('4')).toBe(4);
    expect(nonNegativeInt('0')).toBe(0);
  });

  it('rejects invalid values', () => {
    expect(() => positiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => positiveInt('2.5')).toThrow('expected a positive integer, got "2.5"');
    expect(() => nonNegativeInt('-1')).toThrow(InvalidArgumentError);
  });
});

describe('groupByFolder', () => {
  it('groups by parent folder with top-level repositories under "."', () => {
    const repo = (relativePath: string) => ({
      name: relativePath.split('/').pop() ?? relativePath,
      absolutePath: `/src/${relativePath}`,
      relativePath,
    });
    const groups = groupByFolder([repo('api'), repo('tools/lint'), repo('tools/fmt')]);

    expect([...groups.keys()]).toEqual(['.', 'tools']);
    expect(groups.get('tools')?.map((r) => r.name)).toEqual(['lint', 'fmt']);
  });
});

describe('lifecycleCounts', () => {
  it('counts repositories per status', () => {
    const state = createSession('github', 'acme', '/tmp/acme', {
      strategy: 'reset',
      parallel: 1,
      maxRetries: 0,
      force: false,
      streaming: false,
      cleanupOrphans: false,
    });
    const at = state.startedAt;
    state.repositories = {
      a: { status: 'succeeded', attempts: 1, updatedAt: at },
      b: { status: 'succeeded', attempts: 1, updatedAt: at },
      c: { status: 'pending', attempts: 0, updatedAt: at },
    };
    expect(lifecycleCounts(state)).toEqual({ succeeded: 2, pending: 1 });
  });
});
