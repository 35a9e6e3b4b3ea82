import { readFile, readdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { ManifestFileSchema, type ManifestFile, type ManifestReuse, type ProviderName } from '../config/schema.js';
import { MANIFEST_FILENAME } from '../config/branding.js';
import { FleetError, errorMessage } from './errors.js';
import type { Manifest, RepoSummary } from './types.js';
import { writeFileAtomic } from '../utils/fs.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ReusePolicy {
  mode: ManifestReuse;
  /** Used by `max-age`. */
  maxAgeMinutes?: number;
}

// ─── File Mapping ──────────────────────────────────────────────────

export function toManifestFile(manifest: Manifest): ManifestFile {
  return {
    organization: manifest.organization,
    provider: manifest.provider,
    generated_at: manifest.generatedAt,
    sync_mode: { cleanup_orphans: manifest.cleanupOrphans },
    repositories: manifest.repositories.map((r) => ({
      name: r.name,
      clone_url: r.cloneUrl,
      description: r.description,
      private: r.private,
      archived: r.archived,
      fork: r.fork,
    })),
  };
}

export function parseManifest(raw: unknown): Manifest {
  const file = ManifestFileSchema.parse(raw);
  return {
    organization: file.organization,
    provider: file.provider,
    generatedAt: file.generated_at,
    cleanupOrphans: file.sync_mode.cleanup_orphans,
    repositories: file.repositories.map(
      (r): RepoSummary => ({
        name: r.name,
        cloneUrl: r.clone_url,
        description: r.description,
        private: r.private,
        archived: r.archived,
        fork: r.fork,
      }),
    ),
  };
}

/**
 * Reads and writes the per-target org manifest (repofleet.yaml) and derives
 * orphan directories from it. The manifest's name set is the only input to
 * orphan computation.
 */
export class ManifestStore {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  path(targetDir: string): string {
    return join(targetDir, MANIFEST_FILENAME);
  }

  /** Load the manifest in `targetDir`, or null if there is none. */
  async load(targetDir: string): Promise<Manifest | null> {
    const filePath = this.path(targetDir);
    if (!existsSync(filePath)) return null;
    try {
      const raw = await readFile(filePath, 'utf-8');
      return parseManifest(yaml.load(raw));
    } catch (err) {
      throw new FleetError('validation', `unreadable manifest ${filePath}: ${errorMessage(err)}`, { operation: 'load-manifest' }, err);
    }
  }

  async save(targetDir: string, manifest: Manifest): Promise<void> {
    const content = yaml.dump(toManifestFile(manifest), { indent: 2, lineWidth: 120, noRefs: true });
    await writeFileAtomic(this.path(targetDir), content);
    this.logger.debug(`Wrote ${this.path(targetDir)} with ${manifest.repositories.length} repositories`);
  }

  /** Whether an existing manifest may stand in for a fresh provider listing. */
  shouldReuse(
    existing: Manifest | null,
    provider: ProviderName,
    organization: string,
    policy: ReusePolicy,
    now: Date = new Date(),
  ): existing is Manifest {
    if (!existing) return false;
    if (existing.provider !== provider || existing.organization !== organization) return false;

    switch (policy.mode) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'max-age': {
        const generated = Date.parse(existing.generatedAt);
        if (Number.isNaN(generated)) return false;
        const maxAgeMs = (policy.maxAgeMinutes ?? 0) * 60_000;
        return now.getTime() - generated <= maxAgeMs;
      }
    }
  }

  /**
   * Immediate subdirectories of `targetDir` not named in the manifest.
   * The manifest file, dotfiles and `.git` are never orphans.
   */
  async computeOrphans(targetDir: string, manifest: Manifest): Promise<string[]> {
    const names = new Set(manifest.repositories.map((r) => r.name));
    const entries = await readdir(targetDir, { withFileTypes: true });

    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .filter((name) => name !== MANIFEST_FILENAME && !name.startsWith('.') && !names.has(name))
      .sort();
  }

  /** Recursively and irreversibly delete the given orphan directories. */
  async removeOrphans(targetDir: string, orphans: string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const name of orphans) {
      const orphanPath = join(targetDir, name);
      try {
        await rm(orphanPath, { recursive: true, force: true });
      } catch (err) {
        throw new FleetError('filesystem', `failed to remove orphan ${orphanPath}: ${errorMessage(err)}`, { repository: name, operation: 'remove-orphan' }, err);
      }
      this.logger.info(`Removed orphan directory ${name}`);
      removed.push(name);
    }
    return removed;
  }
}
