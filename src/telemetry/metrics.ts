import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('site-registry');

const httpRequestDuration = meter.createHistogram('http.server.request.duration', {
  description: 'Duration of inbound HTTP requests',
  unit: 'ms'
});

const httpRequestCount = meter.createCounter('http.server.request.count', {
  description: 'Count of inbound HTTP requests'
});

const httpErrorCount = meter.createCounter('http.server.request.errors', {
  description: 'Count of HTTP 5xx responses'
});

const platformCallDuration = meter.createHistogram('platform.call.duration', {
  description: 'Duration of platform adapter calls, retries included',
  unit: 'ms'
});

const platformCallFailures = meter.createCounter('platform.call.failures', {
  description: 'Count of platform adapter calls that ended in failure'
});

const healthCheckDuration = meter.createHistogram('health.check.duration', {
  description: 'Duration of tenant health checks by overall status',
  unit: 'ms'
});

const lifecycleOperationCount = meter.createCounter('lifecycle.operation.count', {
  description: 'Count of completed lifecycle operations by type and status'
});

export function recordHttpRequest(attributes: Record<string, string | number>, durationMs: number): void {
  httpRequestDuration.record(durationMs, attributes);
  httpRequestCount.add(1, attributes);
}

export function recordHttpError(attributes: Record<string, string | number>): void {
  httpErrorCount.add(1, attributes);
}

export function recordPlatformCall(attributes: Record<string, string | number>, durationMs: number): void {
  platformCallDuration.record(durationMs, attributes);
  if (attributes.success === 'false') {
    platformCallFailures.add(1, attributes);
  }
}

export function recordLifecycleOperation(attributes: Record<string, string | number>): void {
  lifecycleOperationCount.add(1, attributes);
}

export function recordHealthCheck(attributes: Record<string, string | number>, durationMs: number): void {
  healthCheckDuration.record(durationMs, attributes);
}
