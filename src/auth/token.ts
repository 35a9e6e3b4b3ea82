import { execSync } from 'node:child_process';
import { APP_NAME, APP_CONFIG_DIR_DISPLAY, SETTINGS_FILENAME } from '../config/branding.js';
import { FleetError } from '../core/errors.js';

export interface TokenSource {
  token: string;
  /** Where the token came from, e.g. `env:GITHUB_TOKEN` or `gh-cli`. */
  source: string;
}

export interface TokenLookup {
  /** Variable named by `github.token_env` in the settings file. */
  tokenEnv?: string;
  env?: NodeJS.ProcessEnv;
  ghAuthToken?: () => string | null;
}

// ─── GitHub Token Resolution ────────────────────────────────────────
// Cascading lookup:
//   1. $<token_env>               (settings override)
//   2. $GITHUB_TOKEN / $GH_TOKEN
//   3. `gh auth token`            (GitHub CLI)

export function resolveGitHubToken(lookup: TokenLookup = {}): TokenSource | null {
  const env = lookup.env ?? process.env;
  const names = [lookup.tokenEnv, 'GITHUB_TOKEN', 'GH_TOKEN'].filter(
    (name, i, all): name is string => !!name && all.indexOf(name) === i,
  );

  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return { token: value, source: `env:${name}` };
  }

  const ghToken = (lookup.ghAuthToken ?? tryGhAuthToken)();
  if (ghToken) return { token: ghToken, source: 'gh-cli' };

  return null;
}

function tryGhAuthToken(): string | null {
  try {
    const token = execSync('gh auth token', { encoding: 'utf-8', timeout: 5000, stdio: ['pipe', 'pipe', 'pipe'] }).trim();
    return token.length > 0 ? token : null;
  } catch {
    // gh missing or not logged in
    return null;
  }
}

/** Resolve a token or throw an `auth` FleetError listing what was tried. */
export function requireGitHubToken(lookup: TokenLookup = {}): TokenSource {
  const result = resolveGitHubToken(lookup);
  if (result) return result;

  const envNames = lookup.tokenEnv && lookup.tokenEnv !== 'GITHUB_TOKEN' ? `$${lookup.tokenEnv} / ` : '';
  throw new FleetError(
    'auth',
    [
      'Could not find a GitHub token. Tried:',
      `  1. ${envNames}$GITHUB_TOKEN / $GH_TOKEN env vars`,
      '  2. gh auth token (GitHub CLI)',
      '',
      'To fix, do one of:',
      '  • gh auth login',
      '  • export GITHUB_TOKEN=<token>',
      `  • set github.token_env in ${APP_CONFIG_DIR_DISPLAY}/${SETTINGS_FILENAME} (${APP_NAME} config)`,
    ].join('\n'),
    { operation: 'resolve-token' },
  );
}
