import { z } from 'zod';

import type { Clock } from '../domain/lifecycle.js';
import type { AdapterResult, HealthDetail, ResourceRef } from '../domain/platform.js';
import type { CertificateInspector } from './certificate-inspector.js';
import type { CredentialProvider, VercelCredential } from './credential-provider.js';
import type { PausableAdapter } from './platform-adapter.js';
import { platformErrorFromStatus, toPlatformOperationError } from './platform-errors.js';

const DAY_MS = 24 * 60 * 60 * 1_000;

const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
  paused: z.boolean().optional()
}).passthrough();

const projectListSchema = z.object({
  projects: z.array(projectSchema),
  pagination: z.object({
    next: z.number().nullable().optional()
  }).optional()
});

const deploymentListSchema = z.object({
  deployments: z.array(z.object({
    uid: z.string(),
    state: z.string().optional(),
    readyState: z.string().optional(),
    created: z.number().optional()
  }).passthrough())
});

const FAILED_DEPLOYMENT_STATES = new Set(['ERROR', 'CANCELED']);

export type FetchLike = typeof fetch;

export interface VercelAdapterConfig {
  apiUrl: string;
  certificateWarningDays: number;
  now: Clock;
}

type Project = z.infer<typeof projectSchema>;

export class VercelAdapter implements PausableAdapter {
  public readonly platform = 'deployment' as const;
  public readonly capability = 'pausable' as const;

  public constructor(
    private readonly credentials: CredentialProvider,
    private readonly certificates: CertificateInspector,
    private readonly config: VercelAdapterConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  public async pause(ref: ResourceRef): Promise<AdapterResult> {
    const credential = await this.credentials.vercel();
    const project = await this.getProject(credential, ref.resourceId);
    if (project === null) {
      throw platformErrorFromStatus('deployment', 404, `Project ${ref.resourceId} was not found.`);
    }

    if (project.paused === true) {
      return { success: true, detail: { projectId: project.id, paused: true, alreadyPaused: true } };
    }

    await this.request(credential, 'POST', `/v1/projects/${encodeURIComponent(project.id)}/pause`);
    return { success: true, detail: { projectId: project.id, paused: true } };
  }

  public async resume(ref: ResourceRef): Promise<AdapterResult> {
    const credential = await this.credentials.vercel();
    const project = await this.getProject(credential, ref.resourceId);
    if (project === null) {
      throw platformErrorFromStatus('deployment', 404, `Project ${ref.resourceId} was not found.`);
    }

    if (project.paused !== true) {
      return { success: true, detail: { projectId: project.id, paused: false, alreadyResumed: true } };
    }

    await this.request(credential, 'POST', `/v1/projects/${encodeURIComponent(project.id)}/unpause`);
    return { success: true, detail: { projectId: project.id, paused: false } };
  }

  public async probe(ref: ResourceRef): Promise<HealthDetail> {
    const credential = await this.credentials.vercel();
    const project = await this.getProject(credential, ref.resourceId);
    if (project === null) {
      return {
        status: 'down',
        issues: [`Project ${ref.resourceId} not found`],
        detail: { projectId: ref.resourceId }
      };
    }

    const issues: string[] = [];
    let status: HealthDetail['status'] = 'healthy';
    const detail: Record<string, unknown> = { projectId: project.id, paused: project.paused === true };

    if (project.paused === true) {
      issues.push('Project is paused');
      status = 'degraded';
    }

    const deployments = deploymentListSchema.parse(await this.request(
      credential,
      'GET',
      '/v6/deployments',
      { projectId: project.id, limit: '1' }
    ));
    const latest = deployments.deployments[0];
    if (latest === undefined) {
      issues.push('No deployments found');
      status = 'degraded';
    } else {
      const state = latest.state ?? latest.readyState ?? 'UNKNOWN';
      detail.latestDeployment = { id: latest.uid, state };
      if (FAILED_DEPLOYMENT_STATES.has(state)) {
        issues.push(`Latest deployment is ${state}`);
        status = 'degraded';
      }
    }

    if (ref.resourceUrl !== null) {
      const hostname = new URL(ref.resourceUrl).hostname;
      try {
        const certificate = await this.certificates.inspect(hostname);
        const daysRemaining = Math.floor((certificate.validTo.getTime() - this.config.now().getTime()) / DAY_MS);
        detail.certificate = { validTo: certificate.validTo.toISOString(), daysRemaining, issuer: certificate.issuer };

        if (daysRemaining < 0) {
          issues.push('TLS certificate has expired');
          status = 'down';
        } else if (daysRemaining <= this.config.certificateWarningDays) {
          issues.push(`TLS certificate expires in ${daysRemaining} days`);
          if (status === 'healthy') {
            status = 'degraded';
          }
        }
      } catch (error) {
        issues.push(`TLS certificate could not be inspected: ${error instanceof Error ? error.message : 'unknown error'}`);
        if (status === 'healthy') {
          status = 'degraded';
        }
      }
    }

    return { status, issues, detail };
  }

  public async list(): Promise<ResourceRef[]> {
    const credential = await this.credentials.vercel();
    const refs: ResourceRef[] = [];
    let until: number | null = null;

    do {
      const query: Record<string, string> = { limit: '100' };
      if (until !== null) {
        query.until = String(until);
      }

      const page = projectListSchema.parse(await this.request(credential, 'GET', '/v9/projects', query));
      for (const project of page.projects) {
        refs.push({
          platform: 'deployment',
          resourceType: 'project',
          resourceId: project.id,
          resourceName: project.name,
          resourceUrl: null,
          metadata: { paused: project.paused === true }
        });
      }

      until = page.pagination?.next ?? null;
    } while (until !== null);

    return refs;
  }

  private async getProject(credential: VercelCredential, projectId: string): Promise<Project | null> {
    const payload = await this.request(credential, 'GET', `/v9/projects/${encodeURIComponent(projectId)}`, {}, true);
    return payload === null ? null : projectSchema.parse(payload);
  }

  private async request(
    credential: VercelCredential,
    method: 'GET' | 'POST',
    path: string,
    query: Record<string, string> = {},
    allowNotFound = false
  ): Promise<unknown> {
    const url = new URL(path, this.config.apiUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    if (credential.teamId !== null) {
      url.searchParams.set('teamId', credential.teamId);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${credential.token}`,
          'Content-Type': 'application/json'
        }
      });
    } catch (error) {
      throw toPlatformOperationError('deployment', error);
    }

    if (allowNotFound && response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw platformErrorFromStatus('deployment', response.status, `Vercel API ${method} ${path} returned ${response.status}.`);
    }

    const text = await response.text();
    return text.length > 0 ? JSON.parse(text) : {};
  }
}
