import type { ProviderName, SafetyState } from '../config/schema.js';

// ─── Repository Identity ───────────────────────────────────────────

export interface LocalRepositoryRef {
  kind: 'local';
  path: string;
}

export interface RemoteRepositoryRef {
  kind: 'remote';
  provider: ProviderName;
  organization: string;
  name: string;
  cloneUrl: string;
}

export type RepositoryRef = LocalRepositoryRef | RemoteRepositoryRef;

export function localRef(path: string): LocalRepositoryRef {
  return Object.freeze({ kind: 'local', path });
}

export function remoteRef(
  provider: ProviderName,
  organization: string,
  name: string,
  cloneUrl: string,
): RemoteRepositoryRef {
  return Object.freeze({ kind: 'remote', provider, organization, name, cloneUrl });
}

// ─── Provider Data ─────────────────────────────────────────────────

export interface RepoSummary {
  name: string;
  cloneUrl: string;
  description: string;
  private: boolean;
  archived: boolean;
  fork: boolean;
}

export interface Manifest {
  provider: ProviderName;
  organization: string;
  generatedAt: string;
  cleanupOrphans: boolean;
  repositories: RepoSummary[];
}

// ─── Classification ────────────────────────────────────────────────

export interface Classification {
  state: SafetyState;
  details: string;
  branch?: string;
  remoteUrl?: string;
  ahead: number;
  behind: number;
  hasStash: boolean;
}

// ─── Results ───────────────────────────────────────────────────────

export type BulkUpdateStatus =
  | 'updated'
  | 'up-to-date'
  | 'would-update'
  | 'dirty'
  | 'conflicts'
  | 'no-upstream'
  | 'merge-in-progress'
  | 'failed'
  | 'error'
  | 'cancelled';

export type SyncStatus = 'cloned' | 'updated' | 'skipped' | 'failed' | 'cancelled';

export type RepoStatus = BulkUpdateStatus | SyncStatus;

export interface RepoResult {
  readonly ref: RepositoryRef;
  /** Local path the result refers to (absolute). */
  readonly path: string;
  readonly status: RepoStatus;
  readonly message: string;
  readonly durationMs: number;
  readonly branch?: string;
  readonly remoteUrl?: string;
  readonly ahead: number;
  readonly behind: number;
  readonly hasStash: boolean;
  readonly error?: string;
}

export type RepoResultInit = Omit<RepoResult, 'ahead' | 'behind' | 'hasStash'> &
  Partial<Pick<RepoResult, 'ahead' | 'behind' | 'hasStash'>>;

/** Build a frozen result; status and every other field are write-once. */
export function createResult(init: RepoResultInit): RepoResult {
  return Object.freeze({ ahead: 0, behind: 0, hasStash: false, ...init });
}

/** Count results per status. */
export function summarize(results: readonly RepoResult[]): Partial<Record<RepoStatus, number>> {
  const summary: Partial<Record<RepoStatus, number>> = {};
  for (const r of results) summary[r.status] = (summary[r.status] ?? 0) + 1;
  return summary;
}
