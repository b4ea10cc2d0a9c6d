export const PLATFORMS = ['source_control', 'deployment', 'cms', 'backup'] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Health probes also cover reachability of the public site, which has no lifecycle step. */
export const HEALTH_PLATFORMS = [...PLATFORMS, 'public_url'] as const;

export type HealthPlatform = (typeof HEALTH_PLATFORMS)[number];

export const PLATFORM_HEALTH_STATUSES = ['healthy', 'degraded', 'down'] as const;

export type PlatformHealthStatus = (typeof PLATFORM_HEALTH_STATUSES)[number];

export interface ResourceRef {
  platform: Platform;
  resourceType: string;
  resourceId: string;
  resourceName: string;
  resourceUrl: string | null;
  metadata: Record<string, unknown>;
}

export interface PlatformErrorInfo {
  code: string;
  message: string;
  retryable: boolean;
}

/** What an adapter call hands back. `success: false` is a definitive, non-retryable failure. */
export interface AdapterResult {
  success: boolean;
  detail: Record<string, unknown>;
  error?: PlatformErrorInfo;
}

/** An adapter call as recorded by the orchestrators, after timeout and retry handling. */
export interface PlatformResult {
  success: boolean;
  detail: Record<string, unknown>;
  error: PlatformErrorInfo | null;
  attempts: number;
  durationMs: number;
}

export type PlatformResults = Partial<Record<Platform, PlatformResult>>;

export interface HealthDetail {
  status: PlatformHealthStatus;
  issues: string[];
  detail: Record<string, unknown>;
}

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}
