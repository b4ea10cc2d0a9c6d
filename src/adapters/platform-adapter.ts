import type { AdapterResult, HealthDetail, Platform, ResourceRef } from '../domain/platform.js';

interface AdapterBase {
  readonly platform: Platform;
  probe(ref: ResourceRef): Promise<HealthDetail>;
  list(): Promise<ResourceRef[]>;
}

export interface ArchivableAdapter extends AdapterBase {
  readonly capability: 'archivable';
  archive(ref: ResourceRef): Promise<AdapterResult>;
  restore(ref: ResourceRef): Promise<AdapterResult>;
}

export interface PausableAdapter extends AdapterBase {
  readonly capability: 'pausable';
  pause(ref: ResourceRef): Promise<AdapterResult>;
  resume(ref: ResourceRef): Promise<AdapterResult>;
}

export interface RetentionAdapter extends AdapterBase {
  readonly capability: 'retention';
  tagForRetention(ref: ResourceRef): Promise<AdapterResult>;
  clearRetentionTag(ref: ResourceRef): Promise<AdapterResult>;
}

/**
 * Mutating calls are idempotent: repeating one on a resource already in the target state
 * succeeds. Retryable failures are thrown as `PlatformOperationError`.
 */
export type PlatformAdapter = ArchivableAdapter | PausableAdapter | RetentionAdapter;

export type PlatformAdapters = Record<Platform, PlatformAdapter>;

export interface UrlProbe {
  probe(url: string): Promise<HealthDetail>;
}

export function deactivationAction(adapter: PlatformAdapter): string {
  switch (adapter.capability) {
    case 'archivable':
      return 'archive';
    case 'pausable':
      return 'pause';
    case 'retention':
      return 'tag_for_retention';
  }
}

export function reactivationAction(adapter: PlatformAdapter): string {
  switch (adapter.capability) {
    case 'archivable':
      return 'restore';
    case 'pausable':
      return 'resume';
    case 'retention':
      return 'clear_retention_tag';
  }
}

export function deactivate(adapter: PlatformAdapter, ref: ResourceRef): Promise<AdapterResult> {
  switch (adapter.capability) {
    case 'archivable':
      return adapter.archive(ref);
    case 'pausable':
      return adapter.pause(ref);
    case 'retention':
      return adapter.tagForRetention(ref);
  }
}

export function reactivate(adapter: PlatformAdapter, ref: ResourceRef): Promise<AdapterResult> {
  switch (adapter.capability) {
    case 'archivable':
      return adapter.restore(ref);
    case 'pausable':
      return adapter.resume(ref);
    case 'retention':
      return adapter.clearRetentionTag(ref);
  }
}
