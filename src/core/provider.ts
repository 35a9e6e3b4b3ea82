import type { ProviderName } from '../config/schema.js';
import type { RepoSummary } from './types.js';

export interface RepositoryPage {
  repositories: RepoSummary[];
  /** Next page number, or null after the last page. */
  nextPage: number | null;
}

/** Read access to a hosting provider's organization listing. */
export interface ProviderClient {
  readonly name: ProviderName;
  /** One page (1-based) of the organization's repositories. */
  listRepositories(organization: string, page: number, perPage: number): Promise<RepositoryPage>;
  /** Look up a single repository by `owner/name`. */
  getRepository(fullName: string): Promise<RepoSummary>;
}

export interface CreateRepositoryInput {
  organization: string;
  name: string;
  description?: string;
  private?: boolean;
}

/** Administrative operations, used only by the `repo` command. */
export interface ProviderAdmin {
  createRepository(input: CreateRepositoryInput): Promise<RepoSummary>;
  deleteRepository(fullName: string): Promise<void>;
  archiveRepository(fullName: string): Promise<void>;
  unarchiveRepository(fullName: string): Promise<void>;
}

/** Split `owner/name`, rejecting anything else. */
export function splitFullName(fullName: string): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(fullName.trim());
  if (!match) {
    throw new TypeError(`expected <owner>/<name>, got "${fullName}"`);
  }
  return { owner: match[1], repo: match[2] };
}
