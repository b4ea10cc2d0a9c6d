import type { Platform } from '../domain/platform.js';
import { PlatformOperationError } from '../errors/lifecycle-errors.js';

export function httpStatusOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null
    && 'httpStatusCode' in error.$metadata && typeof error.$metadata.httpStatusCode === 'number') {
    return error.$metadata.httpStatusCode;
  }

  return null;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function platformErrorFromStatus(platform: Platform, status: number, message: string): PlatformOperationError {
  if (status === 404) {
    return new PlatformOperationError(platform, 'RESOURCE_NOT_FOUND', message, false, { status });
  }

  if (status === 401 || status === 403) {
    return new PlatformOperationError(platform, 'PLATFORM_AUTH_FAILED', message, false, { status });
  }

  if (isRetryableStatus(status)) {
    return new PlatformOperationError(platform, 'PLATFORM_UNAVAILABLE', message, true, { status });
  }

  return new PlatformOperationError(platform, 'PLATFORM_REQUEST_REJECTED', message, false, { status });
}

/** Errors without an HTTP status are transport failures and are worth another attempt. */
export function toPlatformOperationError(platform: Platform, error: unknown): PlatformOperationError {
  if (error instanceof PlatformOperationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : 'Platform request failed.';
  const status = httpStatusOf(error);
  if (status !== null) {
    return platformErrorFromStatus(platform, status, message);
  }

  return new PlatformOperationError(platform, 'PLATFORM_NETWORK_ERROR', message, true);
}

export function notConfigured(platform: Platform, message: string): PlatformOperationError {
  return new PlatformOperationError(platform, 'PLATFORM_NOT_CONFIGURED', message, false);
}
