import { createAppAuth } from '@octokit/auth-app';
import { throttling } from '@octokit/plugin-throttling';
import { Octokit } from '@octokit/rest';

import type { Clock } from '../domain/lifecycle.js';
import type { AdapterResult, HealthDetail, ResourceRef } from '../domain/platform.js';
import { PlatformOperationError } from '../errors/lifecycle-errors.js';
import type { CredentialProvider, GitHubCredential } from './credential-provider.js';
import type { ArchivableAdapter } from './platform-adapter.js';
import { httpStatusOf, notConfigured, toPlatformOperationError } from './platform-errors.js';

const DAY_MS = 24 * 60 * 60 * 1_000;

export interface GitHubRepositorySummary {
  owner: string;
  name: string;
  fullName: string;
  archived: boolean;
  private: boolean;
  pushedAt: string | null;
  htmlUrl: string;
}

export interface RepositoryChanges {
  archived?: boolean;
  private?: boolean;
}

export interface GitHubRepositoryClient {
  getRepository(owner: string, name: string): Promise<GitHubRepositorySummary | null>;
  updateRepository(owner: string, name: string, changes: RepositoryChanges): Promise<GitHubRepositorySummary>;
  listOrganizationRepositories(organization: string): Promise<GitHubRepositorySummary[]>;
}

export type GitHubClientFactory = (credential: GitHubCredential, baseUrl: string) => GitHubRepositoryClient;

interface RepositoryPayload {
  name: string;
  full_name: string;
  owner: { login: string };
  archived?: boolean;
  private: boolean;
  pushed_at?: string | null;
  html_url: string;
}

function toSummary(repository: RepositoryPayload): GitHubRepositorySummary {
  return {
    owner: repository.owner.login,
    name: repository.name,
    fullName: repository.full_name,
    archived: repository.archived === true,
    private: repository.private,
    pushedAt: repository.pushed_at ?? null,
    htmlUrl: repository.html_url
  };
}

/** Visibility the repository had before it was archived, when the deletion recorded it. */
function recordedVisibility(ref: ResourceRef): boolean | null {
  const wasPrivate = ref.metadata.wasPrivate;
  return typeof wasPrivate === 'boolean' ? wasPrivate : null;
}

const ThrottledOctokit = Octokit.plugin(throttling);

function createOctokit(credential: GitHubCredential, baseUrl: string): Octokit {
  switch (credential.kind) {
    case 'token':
      return new ThrottledOctokit({
        auth: credential.token,
        baseUrl,
        throttle: {
          onRateLimit: (_retryAfter, _options, _octokit, retryCount) => retryCount < 2,
          onSecondaryRateLimit: (_retryAfter, _options, _octokit, retryCount) => retryCount < 2
        }
      });
    case 'app':
      return new ThrottledOctokit({
        authStrategy: createAppAuth,
        auth: {
          appId: credential.appId,
          privateKey: credential.privateKey,
          installationId: credential.installationId
        },
        baseUrl,
        throttle: {
          onRateLimit: (_retryAfter, _options, _octokit, retryCount) => retryCount < 2,
          onSecondaryRateLimit: (_retryAfter, _options, _octokit, retryCount) => retryCount < 2
        }
      });
  }
}

export function createOctokitRepositoryClient(credential: GitHubCredential, baseUrl: string): GitHubRepositoryClient {
  const octokit = createOctokit(credential, baseUrl);

  return {
    async getRepository(owner, name) {
      try {
        const response = await octokit.rest.repos.get({ owner, repo: name });
        return toSummary(response.data);
      } catch (error) {
        if (httpStatusOf(error) === 404) {
          return null;
        }

        throw error;
      }
    },
    async updateRepository(owner, name, changes) {
      const response = await octokit.rest.repos.update({ owner, repo: name, ...changes });
      return toSummary(response.data);
    },
    async listOrganizationRepositories(organization) {
      const repositories = await octokit.paginate(octokit.rest.repos.listForOrg, {
        org: organization,
        type: 'all',
        per_page: 100
      });
      return repositories.map((repository) => toSummary(repository));
    }
  };
}

export interface GitHubAdapterConfig {
  organization: string | null;
  apiUrl: string;
  staleActivityDays: number;
  now: Clock;
}

export class GitHubAdapter implements ArchivableAdapter {
  public readonly platform = 'source_control' as const;
  public readonly capability = 'archivable' as const;

  public constructor(
    private readonly credentials: CredentialProvider,
    private readonly config: GitHubAdapterConfig,
    private readonly createClient: GitHubClientFactory = createOctokitRepositoryClient
  ) {}

  public async archive(ref: ResourceRef): Promise<AdapterResult> {
    const { owner, name } = this.parseRepository(ref);
    const client = await this.client();

    const repository = await this.guard(() => client.getRepository(owner, name));
    if (repository === null) {
      throw new PlatformOperationError('source_control', 'RESOURCE_NOT_FOUND', `Repository ${owner}/${name} was not found.`, false);
    }

    if (repository.archived) {
      return {
        success: true,
        detail: { repository: repository.fullName, archived: true, alreadyArchived: true }
      };
    }

    const updated = await this.guard(() => client.updateRepository(owner, name, { archived: true, private: true }));
    return {
      success: true,
      detail: {
        repository: updated.fullName,
        archived: updated.archived,
        private: updated.private,
        wasPrivate: repository.private
      }
    };
  }

  public async restore(ref: ResourceRef): Promise<AdapterResult> {
    const { owner, name } = this.parseRepository(ref);
    const client = await this.client();

    const repository = await this.guard(() => client.getRepository(owner, name));
    if (repository === null) {
      throw new PlatformOperationError('source_control', 'RESOURCE_NOT_FOUND', `Repository ${owner}/${name} was not found.`, false);
    }

    const wasPrivate = recordedVisibility(ref);
    const restoreVisibility = wasPrivate !== null && repository.private !== wasPrivate;

    if (!repository.archived && !restoreVisibility) {
      return {
        success: true,
        detail: { repository: repository.fullName, archived: false, alreadyRestored: true }
      };
    }

    // Archived repositories are read-only, so visibility changes only after unarchiving.
    let updated = repository;
    if (repository.archived) {
      updated = await this.guard(() => client.updateRepository(owner, name, { archived: false }));
    }
    if (wasPrivate !== null && updated.private !== wasPrivate) {
      updated = await this.guard(() => client.updateRepository(owner, name, { private: wasPrivate }));
    }

    return {
      success: true,
      detail: { repository: updated.fullName, archived: updated.archived, private: updated.private }
    };
  }

  public async probe(ref: ResourceRef): Promise<HealthDetail> {
    const { owner, name } = this.parseRepository(ref);
    const client = await this.client();
    const repository = await this.guard(() => client.getRepository(owner, name));

    if (repository === null) {
      return {
        status: 'down',
        issues: [`Repository ${owner}/${name} not found`],
        detail: { repository: `${owner}/${name}` }
      };
    }

    const issues: string[] = [];
    const detail: Record<string, unknown> = {
      repository: repository.fullName,
      archived: repository.archived,
      pushedAt: repository.pushedAt
    };

    if (repository.archived) {
      issues.push('Repository is archived');
    }

    if (repository.pushedAt !== null) {
      const daysSincePush = Math.floor((this.config.now().getTime() - new Date(repository.pushedAt).getTime()) / DAY_MS);
      detail.daysSincePush = daysSincePush;
      if (daysSincePush > this.config.staleActivityDays) {
        issues.push(`No pushes in ${daysSincePush} days`);
      }
    } else {
      issues.push('Repository has never been pushed to');
    }

    return {
      status: issues.length > 0 ? 'degraded' : 'healthy',
      issues,
      detail
    };
  }

  public async list(): Promise<ResourceRef[]> {
    const organization = this.config.organization;
    if (organization === null) {
      throw notConfigured('source_control', 'GITHUB_ORG is not configured.');
    }

    const client = await this.client();
    const repositories = await this.guard(() => client.listOrganizationRepositories(organization));

    return repositories.map((repository) => ({
      platform: 'source_control',
      resourceType: 'repository',
      resourceId: repository.fullName,
      resourceName: repository.name,
      resourceUrl: repository.htmlUrl,
      metadata: { archived: repository.archived, private: repository.private }
    }));
  }

  private async client(): Promise<GitHubRepositoryClient> {
    const credential = await this.credentials.github();
    return this.createClient(credential, this.config.apiUrl);
  }

  private parseRepository(ref: ResourceRef): { owner: string; name: string } {
    const [first, second] = ref.resourceId.split('/');
    if (first !== undefined && second !== undefined && first.length > 0 && second.length > 0) {
      return { owner: first, name: second };
    }

    if (this.config.organization !== null && ref.resourceId.length > 0) {
      return { owner: this.config.organization, name: ref.resourceId };
    }

    throw new PlatformOperationError('source_control', 'INVALID_RESOURCE_ID', `Repository handle '${ref.resourceId}' is not owner/name.`, false);
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toPlatformOperationError('source_control', error);
    }
  }
}
