import type { PlatformHealthStatus } from './platform.js';
import type { TenantHealthStatus } from '../repositories/tenant-repository.js';

/** Worst status wins. Order-independent; no probes means nothing is known. */
export function reduceHealth(statuses: readonly PlatformHealthStatus[]): TenantHealthStatus {
  if (statuses.length === 0) {
    return 'unknown';
  }

  if (statuses.includes('down')) {
    return 'down';
  }

  if (statuses.includes('degraded')) {
    return 'degraded';
  }

  return 'healthy';
}
