import { createHash, timingSafeEqual } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Operator authentication by `x-api-key`. Keys are compared as SHA-256 digests so every
 * comparison has the same length. An empty key list leaves the API open (local development).
 */
export function createOperatorAuthMiddleware(apiKeys: readonly string[]) {
  const digests = apiKeys.map(digest);

  return function operatorAuthMiddleware(request: Request, _response: Response, next: NextFunction): void {
    if (digests.length === 0) {
      next();
      return;
    }

    const header = request.header('x-api-key');
    if (typeof header !== 'string' || header.length === 0) {
      next(new AppError(401, 'AUTH_REQUIRED', 'An operator API key is required.'));
      return;
    }

    const presented = digest(header);
    const matched = digests.some((candidate) => timingSafeEqual(candidate, presented));
    if (!matched) {
      next(new AppError(401, 'AUTH_INVALID_API_KEY', 'API key is invalid.'));
      return;
    }

    request.operator = {
      keyFingerprint: presented.toString('hex').slice(0, 12)
    };
    next();
  };
}
