import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const TRACE_ID_PATTERN = /^[A-Za-z0-9-]{8,64}$/;

/** Reuses a caller-supplied `x-trace-id` so an agent front end can correlate its own logs. */
export function attachTraceId(request: Request, response: Response, next: NextFunction): void {
  const incoming = request.header('x-trace-id');
  const traceId = typeof incoming === 'string' && TRACE_ID_PATTERN.test(incoming) ? incoming : randomUUID();
  response.locals.traceId = traceId;
  response.setHeader('x-trace-id', traceId);
  next();
}
