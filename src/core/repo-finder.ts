import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, basename, relative, resolve } from 'node:path';
import { DEFAULT_IGNORE_DIRS } from '../config/schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Represents a discovered git repository.
 */
export interface DiscoveredRepo {
  /** Repository name (folder name) */
  name: string;
  /** Absolute path to the repository */
  absolutePath: string;
  /** Path relative to the search root */
  relativePath: string;
}

/**
 * Options for repository discovery.
 */
export interface FindReposOptions {
  /** Maximum depth to search; the root itself is depth 0 (default: 10) */
  maxDepth?: number;
  /** Directory names skipped entirely */
  ignoreDirs?: string[];
  /** Keep only repos whose absolute or relative path matches */
  include?: string;
  /** Drop repos whose absolute or relative path matches */
  exclude?: string;
  logger?: Logger;
}

/** Compile a user-supplied filter; invalid syntax disables the filter with a warning. */
export function compileFilter(pattern: string | undefined, label: string, logger: Logger): RegExp | null {
  if (!pattern) return null;
  try {
    return new RegExp(pattern);
  } catch (err) {
    logger.warn(`Ignoring invalid ${label} pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Recursively finds git repositories starting from a root directory.
 * Repositories are not searched for nested repositories, symlinks are never
 * followed and unreadable directories are skipped.
 */
export class RepoFinder {
  private readonly rootDir: string;
  private readonly maxDepth: number;
  private readonly ignoreDirs: Set<string>;
  private readonly include: RegExp | null;
  private readonly exclude: RegExp | null;
  private readonly logger: Logger;

  constructor(rootDir: string, options: FindReposOptions = {}) {
    this.rootDir = resolve(rootDir);
    this.logger = options.logger ?? silentLogger;
    this.maxDepth = options.maxDepth ?? 10;
    this.ignoreDirs = new Set(options.ignoreDirs ?? DEFAULT_IGNORE_DIRS);
    this.include = compileFilter(options.include, 'include', this.logger);
    this.exclude = compileFilter(options.exclude, 'exclude', this.logger);
  }

  /**
   * Find all git repositories under the root directory, filtered and sorted
   * by absolute path.
   */
  async find(onProgress?: (path: string) => void): Promise<DiscoveredRepo[]> {
    const found: string[] = [];
    await this.scanDirectory(this.rootDir, 0, found, onProgress);

    return found
      .filter((p) => this.matchesFilters(p))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((absolutePath) => ({
        name: basename(absolutePath),
        absolutePath,
        relativePath: relative(this.rootDir, absolutePath) || '.',
      }));
  }

  private matchesFilters(absolutePath: string): boolean {
    const rel = relative(this.rootDir, absolutePath) || '.';
    if (this.include && !this.include.test(rel) && !this.include.test(absolutePath)) return false;
    if (this.exclude && (this.exclude.test(rel) || this.exclude.test(absolutePath))) {
      this.logger.debug(`Excluded: ${rel}`);
      return false;
    }
    return true;
  }

  private async scanDirectory(
    dir: string,
    depth: number,
    found: string[],
    onProgress?: (path: string) => void,
  ): Promise<void> {
    if (depth > this.maxDepth) return;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.debug(`Skipping unreadable directory ${dir}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    // .git may be a directory or, for worktrees and submodules, a file
    if (entries.some((e) => e.name === '.git')) {
      onProgress?.(dir);
      found.push(dir);
      return; // Don't recurse into git repos
    }

    for (const entry of entries) {
      // Dirent types come from lstat, so symlinked directories are not directories here
      if (!entry.isDirectory()) continue;
      if (this.ignoreDirs.has(entry.name)) continue;

      await this.scanDirectory(join(dir, entry.name), depth + 1, found, onProgress);
    }
  }
}
