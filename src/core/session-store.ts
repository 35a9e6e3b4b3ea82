import { readFile, readdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  SessionStateSchema,
  type ProviderName,
  type RepoLifecycle,
  type SessionOptionsSnapshot,
  type SessionRepoRecord,
  type SessionState,
} from '../config/schema.js';
import { STATE_DIR } from '../config/branding.js';
import { FleetError, errorMessage } from './errors.js';
import { writeFileAtomic } from '../utils/fs.js';

const TERMINAL: ReadonlySet<RepoLifecycle> = new Set(['succeeded', 'failed', 'skipped']);

/** Repositories a resumed run does not process again. */
const DONE: ReadonlySet<RepoLifecycle> = new Set(['succeeded', 'skipped']);

export function isTerminal(status: RepoLifecycle): boolean {
  return TERMINAL.has(status);
}

export function isDone(status: RepoLifecycle): boolean {
  return DONE.has(status);
}

export function createSession(
  provider: ProviderName,
  organization: string,
  targetPath: string,
  options: SessionOptionsSnapshot,
  now: Date = new Date(),
): SessionState {
  const ts = now.toISOString();
  return {
    version: 1,
    resumeToken: randomUUID(),
    provider,
    organization,
    targetPath,
    status: 'running',
    startedAt: ts,
    updatedAt: ts,
    options,
    repositories: {},
  };
}

/** Names still to process: everything not succeeded or skipped. */
export function remainingRepositories(state: SessionState): string[] {
  return Object.entries(state.repositories)
    .filter(([, record]) => !isDone(record.status))
    .map(([name]) => name)
    .sort();
}

/** Parsed JSON, or undefined for text that is not JSON. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Persists resume state for one sync target under `<target>/.repofleet/state`.
 *
 * Every save rewrites the whole file atomically; saves are chained so that
 * concurrent workers never interleave and the file on disk always reflects
 * a prefix of the transitions made in memory.
 */
export class SessionStore {
  private readonly dir: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(targetPath: string) {
    this.dir = join(targetPath, STATE_DIR);
  }

  filePath(provider: ProviderName, organization: string): string {
    const safeOrg = organization.replace(/[^A-Za-z0-9._-]/g, '_');
    return join(this.dir, `${provider}_${safeOrg}.json`);
  }

  has(provider: ProviderName, organization: string): boolean {
    return existsSync(this.filePath(provider, organization));
  }

  async load(provider: ProviderName, organization: string): Promise<SessionState | null> {
    const filePath = this.filePath(provider, organization);
    if (!existsSync(filePath)) return null;
    try {
      return SessionStateSchema.parse(JSON.parse(await readFile(filePath, 'utf-8')));
    } catch (err) {
      throw new FleetError('validation', `corrupt session state ${filePath}: ${errorMessage(err)}`, { operation: 'load-session' }, err);
    }
  }

  /** Snapshot `state` and queue an atomic write of it. */
  save(state: SessionState): Promise<void> {
    const content = JSON.stringify({ ...state, updatedAt: new Date().toISOString() }, null, 2);
    const filePath = this.filePath(state.provider, state.organization);
    const write = this.queue.then(() => writeFileAtomic(filePath, content));
    // keep the chain alive after a failed write; the failure still reaches this caller
    this.queue = write.catch(() => undefined);
    return write;
  }

  /** Record a lifecycle transition for one repository and persist it. */
  transition(
    state: SessionState,
    name: string,
    status: RepoLifecycle,
    details: Partial<Pick<SessionRepoRecord, 'attempts' | 'message' | 'error' | 'outcome'>> = {},
  ): Promise<void> {
    const previous = state.repositories[name];
    state.repositories[name] = {
      status,
      attempts: details.attempts ?? previous?.attempts ?? 0,
      message: details.message,
      error: details.error,
      outcome: details.outcome,
      updatedAt: new Date().toISOString(),
    };
    return this.save(state);
  }

  async delete(provider: ProviderName, organization: string): Promise<void> {
    await this.queue;
    await rm(this.filePath(provider, organization), { force: true });
  }

  /** Every session file in this target's state directory. */
  async list(): Promise<SessionState[]> {
    if (!existsSync(this.dir)) return [];
    const files = (await readdir(this.dir)).filter((f) => f.endsWith('.json')).sort();
    const states: SessionState[] = [];
    for (const file of files) {
      const parsed = SessionStateSchema.safeParse(parseJson(await readFile(join(this.dir, file), 'utf-8')));
      if (parsed.success) states.push(parsed.data);
    }
    return states;
  }
}
