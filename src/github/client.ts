import { Octokit } from 'octokit';
import type { CreateRepositoryInput, ProviderAdmin, ProviderClient, RepositoryPage } from '../core/provider.js';
import { splitFullName } from '../core/provider.js';
import { FleetError, toFleetError } from '../core/errors.js';
import type { RepoSummary } from '../core/types.js';
import { isSafeRepoName } from '../config/schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Fields of a GitHub repository payload that end up in the manifest. */
interface GitHubRepoData {
  name: string;
  clone_url?: string;
  ssh_url?: string;
  description: string | null;
  private: boolean;
  archived?: boolean;
  fork: boolean;
}

/** Throws a validation error for an entry that cannot be cloned into its own directory. */
export function toRepoSummary(data: GitHubRepoData): RepoSummary {
  if (!isSafeRepoName(data.name)) {
    throw new FleetError('validation', `repository name "${data.name}" is not a usable directory name`, { repository: data.name });
  }
  const cloneUrl = data.clone_url || data.ssh_url;
  if (!cloneUrl) {
    throw new FleetError('validation', `repository ${data.name} has no clone URL`, { repository: data.name });
  }
  return {
    name: data.name,
    cloneUrl,
    description: data.description ?? '',
    private: data.private,
    archived: data.archived ?? false,
    fork: data.fork,
  };
}

export interface GitHubProviderOptions {
  token: string;
  /** GitHub Enterprise API root, e.g. https://ghe.example.com/api/v3 */
  baseUrl?: string;
  /** Prebuilt client; tests pass one with a stubbed `request`. */
  octokit?: Octokit;
  logger?: Logger;
}

/**
 * GitHub organization client on Octokit.
 * Octokit's request errors are turned into FleetErrors (status and
 * rate-limit headers decide the kind) so retry policy stays in the caller.
 */
export class GitHubProvider implements ProviderClient, ProviderAdmin {
  readonly name = 'github' as const;
  private readonly octokit: Octokit;
  private readonly logger: Logger;

  constructor(options: GitHubProviderOptions) {
    this.octokit = options.octokit ?? new Octokit({ auth: options.token, baseUrl: options.baseUrl });
    this.logger = options.logger ?? silentLogger;
  }

  async listRepositories(organization: string, page: number, perPage: number): Promise<RepositoryPage> {
    const data = await this.call('list-repositories', organization, () =>
      this.octokit.rest.repos.listForOrg({ org: organization, type: 'all', sort: 'full_name', per_page: perPage, page }),
    );
    const repositories: RepoSummary[] = [];
    for (const entry of data) {
      try {
        repositories.push(toRepoSummary(entry));
      } catch (err) {
        if (!(err instanceof FleetError)) throw err;
        this.logger.warn(`Skipping ${organization}/${entry.name}: ${err.message}`);
      }
    }
    return {
      repositories,
      // a short page is the last one
      nextPage: data.length === perPage ? page + 1 : null,
    };
  }

  async getRepository(fullName: string): Promise<RepoSummary> {
    const { owner, repo } = splitFullName(fullName);
    const data = await this.call('get-repository', fullName, () => this.octokit.rest.repos.get({ owner, repo }));
    return toRepoSummary(data);
  }

  async createRepository(input: CreateRepositoryInput): Promise<RepoSummary> {
    const data = await this.call('create-repository', `${input.organization}/${input.name}`, () =>
      this.octokit.rest.repos.createInOrg({
        org: input.organization,
        name: input.name,
        description: input.description,
        private: input.private ?? true,
      }),
    );
    return toRepoSummary(data);
  }

  async deleteRepository(fullName: string): Promise<void> {
    const { owner, repo } = splitFullName(fullName);
    await this.call('delete-repository', fullName, () => this.octokit.rest.repos.delete({ owner, repo }));
  }

  async archiveRepository(fullName: string): Promise<void> {
    await this.setArchived(fullName, true);
  }

  async unarchiveRepository(fullName: string): Promise<void> {
    await this.setArchived(fullName, false);
  }

  private async setArchived(fullName: string, archived: boolean): Promise<void> {
    const { owner, repo } = splitFullName(fullName);
    await this.call(archived ? 'archive-repository' : 'unarchive-repository', fullName, () =>
      this.octokit.rest.repos.update({ owner, repo, archived }),
    );
  }

  private async call<T>(operation: string, repository: string, fn: () => Promise<{ data: T }>): Promise<T> {
    try {
      const { data } = await fn();
      return data;
    } catch (err) {
      throw toFleetError(err, { repository, operation });
    }
  }
}
