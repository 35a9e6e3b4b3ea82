import { GitError, GitPluginError } from 'simple-git';
import type { ZodError } from 'zod';

/**
 * Error kinds shared by every fleet operation.
 *
 * - `validation`, `auth`: fatal for the whole run, never retried.
 * - `rate-limit`, `network`, `timeout`: transient, retried with backoff.
 * - `git`, `filesystem`: isolated to one repository.
 * - `cancelled`: the run signal aborted the operation.
 */
export type ErrorKind =
  | 'validation'
  | 'auth'
  | 'rate-limit'
  | 'network'
  | 'timeout'
  | 'git'
  | 'filesystem'
  | 'cancelled';

export interface ErrorContext {
  repository?: string;
  operation?: string;
  /** Provider hint for when a throttled request may be retried. */
  retryAfterMs?: number;
}

export class FleetError extends Error {
  readonly kind: ErrorKind;
  readonly context: ErrorContext;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'FleetError';
    this.kind = kind;
    this.context = context;
  }
}

export function isRetryable(kind: ErrorKind): boolean {
  return kind === 'rate-limit' || kind === 'network' || kind === 'timeout';
}

/** Kinds that indicate a problem every later operation would hit too. */
export function isFatal(kind: ErrorKind): boolean {
  return kind === 'auth' || kind === 'validation';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Classification ────────────────────────────────────────────────

const AUTH_PATTERNS = [
  /authentication failed/i,
  /could not read username/i,
  /permission denied \(publickey\)/i,
  /invalid username or password/i,
  /bad credentials/i,
  /terminal prompts disabled/i,
  /returned error: 40[13]\b/i,
];

const RATE_LIMIT_PATTERNS = [/rate limit/i, /too many requests/i, /\b429\b/];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /connection (timed out|refused|reset)/i,
  /failed to connect/i,
  /early eof/i,
  /rpc failed/i,
  /unable to access/i,
  /network is unreachable/i,
  /the remote end hung up unexpectedly/i,
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|ECONNREFUSED/,
];

const TIMEOUT_PATTERNS = [/timed out/i, /timeout/i];

const FS_CODES = new Set(['EACCES', 'EPERM', 'ENOENT', 'ENOTDIR', 'EISDIR', 'EEXIST', 'ENOTEMPTY', 'EROFS', 'ENOSPC', 'EBUSY']);

const NET_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH', 'ENETUNREACH']);

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

interface HttpLikeError {
  status: number;
  message?: string;
  response?: { headers?: Record<string, string | number | undefined> };
}

function isHttpError(err: unknown): err is HttpLikeError {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

function header(err: HttpLikeError, name: string): string | undefined {
  const value = err.response?.headers?.[name];
  return value === undefined ? undefined : String(value);
}

function matchesAny(text: string, patterns: RegExp[]): boolean {
  return patterns.some((p) => p.test(text));
}

/** Classify a git subprocess failure from its stderr text. */
export function classifyGitMessage(message: string): ErrorKind {
  if (matchesAny(message, AUTH_PATTERNS)) return 'auth';
  if (matchesAny(message, RATE_LIMIT_PATTERNS)) return 'rate-limit';
  if (matchesAny(message, NETWORK_PATTERNS)) return 'network';
  return 'git';
}

function classifyHttp(err: HttpLikeError): { kind: ErrorKind; retryAfterMs?: number } {
  const retryAfter = header(err, 'retry-after');
  const remaining = header(err, 'x-ratelimit-remaining');
  const reset = header(err, 'x-ratelimit-reset');

  if (err.status === 429 || (err.status === 403 && (remaining === '0' || retryAfter !== undefined))) {
    let retryAfterMs: number | undefined;
    if (retryAfter !== undefined && Number.isFinite(Number(retryAfter))) {
      retryAfterMs = Number(retryAfter) * 1000;
    } else if (reset !== undefined && Number.isFinite(Number(reset))) {
      retryAfterMs = Math.max(0, Number(reset) * 1000 - Date.now());
    }
    return { kind: 'rate-limit', retryAfterMs };
  }
  if (err.status === 401 || err.status === 403) return { kind: 'auth' };
  if (err.status === 404 || err.status === 410 || err.status === 422) return { kind: 'validation' };
  if (err.status >= 500 || err.status === 408) return { kind: 'network' };
  return { kind: 'validation' };
}

/**
 * Map anything thrown by git, the provider client or the filesystem onto a
 * FleetError. FleetErrors pass through with the extra context merged in.
 */
export function toFleetError(err: unknown, context: ErrorContext = {}): FleetError {
  if (err instanceof FleetError) {
    return Object.keys(context).length === 0
      ? err
      : new FleetError(err.kind, err.message, { ...context, ...err.context }, err.cause);
  }

  const message = errorMessage(err);

  if (err instanceof GitPluginError) {
    if (err.plugin === 'abort') return new FleetError('cancelled', 'operation cancelled', context, err);
    if (err.plugin === 'timeout') return new FleetError('timeout', message, context, err);
  }
  if (err instanceof GitError) {
    return new FleetError(classifyGitMessage(message), message, context, err);
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return new FleetError('cancelled', 'operation cancelled', context, err);
  }
  if (err instanceof Error && err.name === 'TimeoutError') {
    return new FleetError('timeout', message, context, err);
  }
  if (isHttpError(err)) {
    const { kind, retryAfterMs } = classifyHttp(err);
    return new FleetError(kind, message, { ...context, retryAfterMs }, err);
  }

  const code = errnoCode(err);
  if (code === 'ETIMEDOUT') return new FleetError('timeout', message, context, err);
  if (code && NET_CODES.has(code)) return new FleetError('network', message, context, err);
  if (code && FS_CODES.has(code)) return new FleetError('filesystem', message, context, err);

  if (matchesAny(message, TIMEOUT_PATTERNS)) return new FleetError('timeout', message, context, err);
  return new FleetError('git', message, context, err);
}

/** Format zod issues as `path: message` pairs. */
export function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
