/**
 * Canonical `host/path` form of a git remote URL, so that https and ssh
 * spellings of the same repository compare equal:
 *
 *   https://GitHub.com/acme/api.git  → github.com/acme/api
 *   git@github.com:acme/api.git      → github.com/acme/api
 *   ssh://git@github.com/acme/api/   → github.com/acme/api
 */
export function normalizeRemoteUrl(url: string): string {
  let value = url.trim();

  const scp = /^(?:[^@/\s]+@)?([^:/\s]+):(?!\/\/)(.+)$/.exec(value);
  if (scp && !/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    value = `${scp[1].toLowerCase()}/${scp[2]}`;
  } else {
    const parsed = /^[a-z][a-z0-9+.-]*:\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/?(.*)$/i.exec(value);
    if (parsed) value = `${parsed[1].toLowerCase()}/${parsed[2]}`;
  }

  value = value.replace(/\/+$/, '');
  if (value.endsWith('.git')) value = value.slice(0, -'.git'.length);
  return value.replace(/\/+$/, '');
}

export function sameRemote(a: string, b: string): boolean {
  return normalizeRemoteUrl(a) === normalizeRemoteUrl(b);
}

/** Last path segment without `.git`: the directory name `git clone` would pick. */
export function repoNameFromUrl(url: string): string {
  const normalized = normalizeRemoteUrl(url);
  const name = normalized.slice(normalized.lastIndexOf('/') + 1);
  return name || normalized;
}

