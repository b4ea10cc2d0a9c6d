import type { CmsSpace, Tenant } from '../repositories/tenant-repository.js';
import type { Platform, ResourceRef } from './platform.js';

export type CmsTarget =
  | { mode: 'shared'; spaceId: string; clientSlug: string }
  | { mode: 'dedicated'; spaceId: string };

export function defaultBackupPrefix(rootPrefix: string, slug: string): string {
  const root = rootPrefix.endsWith('/') ? rootPrefix : `${rootPrefix}/`;
  return `${root}${slug}/`;
}

export function cmsResourceId(target: CmsTarget): string {
  switch (target.mode) {
    case 'shared':
      return `${target.spaceId}:${target.clientSlug}`;
    case 'dedicated':
      return target.spaceId;
  }
}

export function cmsTargetForTenant(cms: CmsSpace, slug: string): CmsTarget {
  switch (cms.mode) {
    case 'shared':
      return { mode: 'shared', spaceId: cms.spaceId, clientSlug: slug };
    case 'dedicated':
      return { mode: 'dedicated', spaceId: cms.spaceId };
  }
}

export function cmsTargetFromRef(ref: ResourceRef): CmsTarget {
  if (ref.resourceType === 'content_scope') {
    const separator = ref.resourceId.indexOf(':');
    return {
      mode: 'shared',
      spaceId: ref.resourceId.slice(0, separator),
      clientSlug: ref.resourceId.slice(separator + 1)
    };
  }

  return { mode: 'dedicated', spaceId: ref.resourceId };
}

function repositoryName(fullName: string): string {
  const separator = fullName.indexOf('/');
  return separator < 0 ? fullName : fullName.slice(separator + 1);
}

/**
 * Resource handles a tenant record points at, one per platform it was provisioned on.
 * Platforms without a handle are absent from the result.
 */
export function resolveResourceRefs(tenant: Tenant, backupRootPrefix: string): Partial<Record<Platform, ResourceRef>> {
  const refs: Partial<Record<Platform, ResourceRef>> = {};

  if (tenant.repository !== null) {
    refs.source_control = {
      platform: 'source_control',
      resourceType: 'repository',
      resourceId: tenant.repository,
      resourceName: repositoryName(tenant.repository),
      resourceUrl: null,
      metadata: {}
    };
  }

  if (tenant.deploymentProjectId !== null) {
    refs.deployment = {
      platform: 'deployment',
      resourceType: 'project',
      resourceId: tenant.deploymentProjectId,
      resourceName: tenant.slug,
      resourceUrl: tenant.stagingUrl,
      metadata: {}
    };
  }

  if (tenant.cms !== null) {
    const target = cmsTargetForTenant(tenant.cms, tenant.slug);
    refs.cms = {
      platform: 'cms',
      resourceType: target.mode === 'shared' ? 'content_scope' : 'space',
      resourceId: cmsResourceId(target),
      resourceName: tenant.slug,
      resourceUrl: null,
      metadata: { mode: target.mode }
    };
  }

  const prefix = tenant.backupPrefix ?? defaultBackupPrefix(backupRootPrefix, tenant.slug);
  refs.backup = {
    platform: 'backup',
    resourceType: 'backup_prefix',
    resourceId: prefix,
    resourceName: tenant.slug,
    resourceUrl: null,
    metadata: {}
  };

  return refs;
}

export function sameResource(left: ResourceRef, right: Pick<ResourceRef, 'platform' | 'resourceType' | 'resourceId'>): boolean {
  return left.platform === right.platform
    && left.resourceType === right.resourceType
    && left.resourceId === right.resourceId;
}
