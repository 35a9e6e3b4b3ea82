import { z } from 'zod';
import { CONFIG_DIR_NAME, MANIFEST_FILENAME } from './branding.js';

// ─── Providers ─────────────────────────────────────────────────────

export const ProviderNameSchema = z.enum(['github', 'gitlab', 'gitea']);

export type ProviderName = z.infer<typeof ProviderNameSchema>;

// ─── Safety State ──────────────────────────────────────────────────

export const SafetyStateSchema = z.enum([
  'merge-in-progress',
  'dirty',
  'no-upstream',
  'up-to-date',
  'conflicts',
  'safe',
]);

export type SafetyState = z.infer<typeof SafetyStateSchema>;

// ─── Update Strategy ───────────────────────────────────────────────

/** Action applied to an existing, valid, matching local clone. */
export const StrategySchema = z.enum(['rebase', 'reset', 'clone', 'skip', 'pull', 'fetch']);

export type Strategy = z.infer<typeof StrategySchema>;

// ─── Manifest Reuse Policy ─────────────────────────────────────────

export const ManifestReuseSchema = z.enum(['always', 'never', 'max-age']);

export type ManifestReuse = z.infer<typeof ManifestReuseSchema>;

// ─── Repository Names ──────────────────────────────────────────────

/** Entries of a sync target that no repository may take over. */
const RESERVED_NAMES: ReadonlySet<string> = new Set(['.', '..', '.git', CONFIG_DIR_NAME, MANIFEST_FILENAME]);

/** A repository name that is safe to use as one directory directly under a sync target. */
export const RepoNameSchema = z
  .string()
  .min(1)
  .refine((name) => !/[/\\]/.test(name), { message: 'must not contain a path separator' })
  .refine((name) => !RESERVED_NAMES.has(name), { message: 'is a reserved directory name' });

export function isSafeRepoName(name: string): boolean {
  return RepoNameSchema.safeParse(name).success;
}

// ─── Manifest File (repofleet.yaml) ────────────────────────────────

export const RepoSummaryFileSchema = z.object({
  name: RepoNameSchema,
  clone_url: z.string().min(1),
  description: z.string().nullish().transform((v) => v ?? ''),
  private: z.boolean().default(false),
  archived: z.boolean().default(false),
  fork: z.boolean().default(false),
});

export const ManifestFileSchema = z.object({
  organization: z.string().min(1),
  provider: ProviderNameSchema,
  // js-yaml turns unquoted ISO timestamps into Date objects
  generated_at: z.union([z.string(), z.date()]).transform((v) => (v instanceof Date ? v.toISOString() : v)),
  sync_mode: z.object({ cleanup_orphans: z.boolean().default(false) }).default({}),
  repositories: z.array(RepoSummaryFileSchema).default([]),
});

export type ManifestFile = z.input<typeof ManifestFileSchema>;

// ─── Session State (resume) ────────────────────────────────────────

export const RepoLifecycleSchema = z.enum(['pending', 'in-progress', 'succeeded', 'failed', 'skipped']);

export type RepoLifecycle = z.infer<typeof RepoLifecycleSchema>;

export const SessionRepoRecordSchema = z.object({
  status: RepoLifecycleSchema,
  /** Concrete outcome of a succeeded or skipped repository, replayed on resume. */
  outcome: z.enum(['cloned', 'updated', 'skipped']).optional(),
  attempts: z.number().int().nonnegative().default(0),
  message: z.string().optional(),
  error: z.string().optional(),
  updatedAt: z.string(),
});

export type SessionRepoRecord = z.infer<typeof SessionRepoRecordSchema>;

export const SessionOptionsSnapshotSchema = z.object({
  strategy: StrategySchema,
  parallel: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  force: z.boolean(),
  streaming: z.boolean(),
  cleanupOrphans: z.boolean(),
  branch: z.string().min(1).optional(),
  cloneDepth: z.number().int().positive().optional(),
});

export type SessionOptionsSnapshot = z.infer<typeof SessionOptionsSnapshotSchema>;

export const SessionStateSchema = z.object({
  version: z.literal(1),
  resumeToken: z.string(),
  provider: ProviderNameSchema,
  organization: z.string(),
  targetPath: z.string(),
  status: z.enum(['running', 'completed', 'failed', 'cancelled']),
  startedAt: z.string(),
  updatedAt: z.string(),
  options: SessionOptionsSnapshotSchema,
  repositories: z.record(z.string(), SessionRepoRecordSchema).default({}),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

// ─── User Settings (~/.repofleet/config.yaml) ──────────────────────

export const DEFAULT_IGNORE_DIRS = [
  '.git', 'node_modules', '.venv', 'venv', '__pycache__',
  'target', 'build', 'dist', '.gradle', '.idea', '.vscode',
  'vendor', 'deps', '.next', '.nuxt', 'coverage',
];

export const PullAllSettingsSchema = z.object({
  parallel: z.number().int().positive().default(5),
  max_depth: z.number().int().nonnegative().default(10),
  fetch_timeout_seconds: z.number().positive().default(30),
  ignore_dirs: z.array(z.string()).default(DEFAULT_IGNORE_DIRS),
});

export type PullAllSettings = z.infer<typeof PullAllSettingsSchema>;

export const SyncSettingsSchema = z.object({
  parallel: z.number().int().positive().default(10),
  max_retries: z.number().int().nonnegative().default(3),
  strategy: StrategySchema.default('reset'),
  page_size: z.number().int().min(1).max(100).default(100),
  retry_base_delay_ms: z.number().int().nonnegative().default(1_000),
  retry_max_delay_ms: z.number().int().nonnegative().default(60_000),
  manifest_reuse: ManifestReuseSchema.default('always'),
  manifest_max_age_minutes: z.number().positive().default(1_440),
});

export type SyncSettings = z.infer<typeof SyncSettingsSchema>;

export const GitHubSettingsSchema = z.object({
  token_env: z.string().default('GITHUB_TOKEN'),
  api_url: z.string().url().optional(),
});

export type GitHubSettings = z.infer<typeof GitHubSettingsSchema>;

export const SettingsSchema = z.object({
  pull_all: PullAllSettingsSchema.default(() => PullAllSettingsSchema.parse({})),
  sync: SyncSettingsSchema.default(() => SyncSettingsSchema.parse({})),
  github: GitHubSettingsSchema.default(() => GitHubSettingsSchema.parse({})),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─── Run Options ───────────────────────────────────────────────────

export const BulkUpdateOptionsSchema = z.object({
  directory: z.string().min(1),
  parallel: z.number().int().positive(),
  maxDepth: z.number().int().nonnegative(),
  dryRun: z.boolean().default(false),
  noFetch: z.boolean().default(false),
  fetchTimeoutMs: z.number().int().positive().default(30_000),
  includePattern: z.string().optional(),
  excludePattern: z.string().optional(),
  ignoreDirs: z.array(z.string()).default(DEFAULT_IGNORE_DIRS),
});

export type BulkUpdateOptions = z.input<typeof BulkUpdateOptionsSchema>;

export const SyncOptionsSchema = z.object({
  provider: ProviderNameSchema.default('github'),
  organization: z.string().min(1, 'organization is required'),
  targetPath: z.string().min(1),
  strategy: StrategySchema.default('reset'),
  parallel: z.number().int().positive().default(10),
  maxRetries: z.number().int().nonnegative().default(3),
  resume: z.boolean().default(false),
  force: z.boolean().default(false),
  streaming: z.boolean().default(false),
  pageSize: z.number().int().min(1).max(100).default(100),
  cleanupOrphans: z.boolean().default(false),
  manifestReuse: ManifestReuseSchema.default('always'),
  manifestMaxAgeMinutes: z.number().positive().default(1_440),
  cloneDepth: z.number().int().positive().optional(),
  branch: z.string().min(1).optional(),
  retryBaseDelayMs: z.number().int().nonnegative().default(1_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(60_000),
});

export type SyncOptions = z.input<typeof SyncOptionsSchema>;
export type ResolvedSyncOptions = z.output<typeof SyncOptionsSchema>;

export const CloneOrUpdateOptionsSchema = z.object({
  url: z.string().min(1, 'repository URL is required'),
  /** Parent directory; the clone lands in `<targetPath>/<name>`. */
  targetPath: z.string().min(1),
  /** Directory name; defaults to the last path segment of the URL. */
  name: z.string().min(1).optional(),
  strategy: StrategySchema.default('rebase'),
  force: z.boolean().default(false),
  cloneDepth: z.number().int().positive().optional(),
  branch: z.string().min(1).optional(),
  maxRetries: z.number().int().nonnegative().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(60_000),
});

export type CloneOrUpdateOptions = z.input<typeof CloneOrUpdateOptionsSchema>;
