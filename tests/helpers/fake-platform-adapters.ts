import type {
  ArchivableAdapter,
  PausableAdapter,
  PlatformAdapters,
  RetentionAdapter,
  UrlProbe
} from '../../src/adapters/platform-adapter.js';
import type { AdapterResult, HealthDetail, Platform, PlatformErrorInfo, ResourceRef } from '../../src/domain/platform.js';
import { PlatformOperationError } from '../../src/errors/lifecycle-errors.js';

/** One scripted response of a fake adapter call; unscripted calls succeed. */
export type FakeStep =
  | { kind: 'ok'; detail?: Record<string, unknown> }
  | { kind: 'reject'; error: PlatformErrorInfo }
  | { kind: 'throw'; code: string; retryable: boolean }
  | { kind: 'hang' };

export interface FakeCall {
  action: string;
  resourceId: string;
}

const HEALTHY: HealthDetail = { status: 'healthy', issues: [], detail: {} };

function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

class FakeAdapterCore {
  public readonly calls: FakeCall[] = [];

  public readonly refsByAction = new Map<string, ResourceRef[]>();

  public health: HealthDetail | 'throw' | 'hang' = HEALTHY;

  public listing: ResourceRef[] | 'throw' = [];

  private readonly scripts = new Map<string, FakeStep[]>();

  public constructor(public readonly platform: Platform) {}

  public script(action: string, ...steps: FakeStep[]): void {
    this.scripts.set(action, [...(this.scripts.get(action) ?? []), ...steps]);
  }

  public callsFor(action: string): FakeCall[] {
    return this.calls.filter((call) => call.action === action);
  }

  public async probe(ref: ResourceRef): Promise<HealthDetail> {
    this.calls.push({ action: 'probe', resourceId: ref.resourceId });
    if (this.health === 'throw') {
      throw new PlatformOperationError(this.platform, 'PLATFORM_UNAVAILABLE', `${this.platform} probe failed`, true);
    }

    if (this.health === 'hang') {
      return never();
    }

    return this.health;
  }

  public async list(): Promise<ResourceRef[]> {
    this.calls.push({ action: 'list', resourceId: '*' });
    if (this.listing === 'throw') {
      throw new PlatformOperationError(this.platform, 'PLATFORM_AUTH_FAILED', `${this.platform} listing denied`, false);
    }

    return this.listing;
  }

  protected async run(action: string, ref: ResourceRef): Promise<AdapterResult> {
    this.calls.push({ action, resourceId: ref.resourceId });
    this.refsByAction.set(action, [...(this.refsByAction.get(action) ?? []), ref]);
    const step = this.scripts.get(action)?.shift() ?? { kind: 'ok' };

    switch (step.kind) {
      case 'ok':
        return { success: true, detail: step.detail ?? { resourceId: ref.resourceId } };
      case 'reject':
        return { success: false, detail: {}, error: step.error };
      case 'throw':
        throw new PlatformOperationError(this.platform, step.code, `${this.platform} ${action} failed`, step.retryable);
      case 'hang':
        return never();
    }
  }
}

export class FakeArchivableAdapter extends FakeAdapterCore implements ArchivableAdapter {
  public readonly capability = 'archivable' as const;

  public archive(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('archive', ref);
  }

  public restore(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('restore', ref);
  }
}

export class FakePausableAdapter extends FakeAdapterCore implements PausableAdapter {
  public readonly capability = 'pausable' as const;

  public pause(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('pause', ref);
  }

  public resume(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('resume', ref);
  }
}

export class FakeRetentionAdapter extends FakeAdapterCore implements RetentionAdapter {
  public readonly capability = 'retention' as const;

  public tagForRetention(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('tag_for_retention', ref);
  }

  public clearRetentionTag(ref: ResourceRef): Promise<AdapterResult> {
    return this.run('clear_retention_tag', ref);
  }
}

export class FakeUrlProbe implements UrlProbe {
  public readonly urls: string[] = [];

  public health: HealthDetail = HEALTHY;

  public async probe(url: string): Promise<HealthDetail> {
    this.urls.push(url);
    return this.health;
  }
}

export interface FakePlatforms {
  adapters: PlatformAdapters;
  sourceControl: FakeArchivableAdapter;
  deployment: FakePausableAdapter;
  cms: FakeArchivableAdapter;
  backup: FakeRetentionAdapter;
  urlProbe: FakeUrlProbe;
}

export function createFakePlatforms(): FakePlatforms {
  const sourceControl = new FakeArchivableAdapter('source_control');
  const deployment = new FakePausableAdapter('deployment');
  const cms = new FakeArchivableAdapter('cms');
  const backup = new FakeRetentionAdapter('backup');

  return {
    adapters: {
      source_control: sourceControl,
      deployment,
      cms,
      backup
    },
    sourceControl,
    deployment,
    cms,
    backup,
    urlProbe: new FakeUrlProbe()
  };
}
