import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ManifestStore, parseManifest, toManifestFile } from '../../src/core/manifest-store.js';
import type { Manifest } from '../../src/core/types.js';
import { summary } from '../helpers/fakes.js';

let target: string;
const store = new ManifestStore();

function manifest(names: string[], generatedAt = '2025-01-01T00:00:00.000Z'): Manifest {
  return { provider: 'github', organization: 'acme', generatedAt, cleanupOrphans: false, repositories: names.map((n) => summary(n)) };
}

beforeEach(() => {
  target = mkdtempSync(join(tmpdir(), 'rf-manifest-'));
});

afterEach(() => {
  rmSync(target, { recursive: true, force: true });
});

describe('ManifestStore', () => {
  it('returns null when there is no manifest', async () => {
    expect(await store.load(target)).toBeNull();
  });

  it('writes snake_case YAML and reads it back', async () => {
    const original = manifest(['api', 'web']);
    await store.save(target, original);

    const raw = readFileSync(join(target, 'repofleet.yaml'), 'utf-8');
    expect(raw).toContain('clone_url: https://github.com/acme/api.git');
    expect(raw).toContain('cleanup_orphans: false');
    expect(await store.load(target)).toEqual(original);
    // no temp files left behind
    expect(readdirSync(target)).toEqual(['repofleet.yaml']);
  });

  it('loads a hand-written manifest with an unquoted timestamp', async () => {
    writeFileSync(
      join(target, 'repofleet.yaml'),
      [
        'organization: acme',
        'provider: github',
        'generated_at: 2025-01-01T00:00:00.000Z',
        'repositories:',
        '  - name: api',
        '    clone_url: https://github.com/acme/api.git',
      ].join('\n'),
    );
    const loaded = await store.load(target);
    expect(loaded?.generatedAt).toBe('2025-01-01T00:00:00.000Z');
    expect(loaded?.cleanupOrphans).toBe(false);
    expect(loaded?.repositories).toEqual([summary('api')]);
  });

  it('fails with a validation error on an invalid manifest', async () => {
    writeFileSync(join(target, 'repofleet.yaml'), 'organization: acme\nprovider: github\n');
    await expect(store.load(target)).rejects.toMatchObject({ kind: 'validation' });
  });

  it('rejects a manifest naming a repository outside the target', async () => {
    const doc = (name: string): string =>
      [
        'organization: acme',
        'provider: github',
        "generated_at: '2025-01-01T00:00:00.000Z'",
        'repositories:',
        `  - name: '${name}'`,
        `    clone_url: https://github.com/acme/x.git`,
        '',
      ].join('\n');

    writeFileSync(join(target, 'repofleet.yaml'), doc('x'));
    expect((await store.load(target))?.repositories.map((r) => r.name)).toEqual(['x']);

    for (const name of ['..', 'a/../..', '.git']) {
      writeFileSync(join(target, 'repofleet.yaml'), doc(name));
      await expect(store.load(target)).rejects.toMatchObject({ kind: 'validation' });
    }
  });

  it('computes orphans from the manifest name set', async () => {
    for (const dir of ['A', 'B', 'C', '.repofleet', '.cache']) mkdirSync(join(target, dir));
    writeFileSync(join(target, 'notes.txt'), 'not a directory');

    expect(await store.computeOrphans(target, manifest(['A', 'B']))).toEqual(['C']);
  });

  it('removes only the given orphans', async () => {
    for (const dir of ['A', 'C']) mkdirSync(join(target, dir, 'src'), { recursive: true });
    expect(await store.removeOrphans(target, ['C'])).toEqual(['C']);
    expect(existsSync(join(target, 'A', 'src'))).toBe(true);
    expect(existsSync(join(target, 'C'))).toBe(false);
  });

  describe('shouldReuse', () => {
    const now = new Date('2025-01-01T02:00:00.000Z');

    it('never reuses a missing manifest or one for another organization', () => {
      expect(store.shouldReuse(null, 'github', 'acme', { mode: 'always' }, now)).toBe(false);
      expect(store.shouldReuse(manifest([]), 'github', 'other', { mode: 'always' }, now)).toBe(false);
      expect(store.shouldReuse(manifest([]), 'gitlab', 'acme', { mode: 'always' }, now)).toBe(false);
    });

    it('follows the always and never policies', () => {
      expect(store.shouldReuse(manifest([]), 'github', 'acme', { mode: 'always' }, now)).toBe(true);
      expect(store.shouldReuse(manifest([]), 'github', 'acme', { mode: 'never' }, now)).toBe(false);
    });

    it('reuses within the maximum age only', () => {
      // generated two hours before `now`
      expect(store.shouldReuse(manifest([]), 'github', 'acme', { mode: 'max-age', maxAgeMinutes: 180 }, now)).toBe(true);
      expect(store.shouldReuse(manifest([]), 'github', 'acme', { mode: 'max-age', maxAgeMinutes: 60 }, now)).toBe(false);
    });
  });
});

describe('manifest file mapping', () => {
  it('round-trips through the file shape', () => {
    const original = manifest(['api']);
    expect(parseManifest(toManifestFile(original))).toEqual(original);
  });
});
