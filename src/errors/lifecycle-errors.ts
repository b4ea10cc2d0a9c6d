import type { Platform } from '../domain/platform.js';
import { AppError } from './app-error.js';

export class ValidationError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class ConfirmationRequiredError extends AppError {
  public constructor(message = 'Deletion must be explicitly confirmed.') {
    super(400, 'CONFIRMATION_REQUIRED', message);
  }
}

export class NotFoundError extends AppError {
  public constructor(code: string, message: string) {
    super(404, code, message);
  }
}

export class InvalidStateError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(409, 'INVALID_STATE', message, details);
  }
}

/** Terminal: the recovery window has closed and there is no remediation path. */
export class RecoveryWindowExpiredError extends AppError {
  public constructor(public readonly recoveryDeadline: Date) {
    super(410, 'RECOVERY_WINDOW_EXPIRED', 'The recovery window for this site has expired.', {
      recoveryDeadline: recoveryDeadline.toISOString()
    });
  }
}

/** Another lifecycle operation holds the slug. Callers may retry after a backoff. */
export class OperationInProgressError extends AppError {
  public constructor(slug: string) {
    super(409, 'OPERATION_IN_PROGRESS', `Another lifecycle operation is running for '${slug}'.`, {
      slug,
      retryable: true
    });
  }
}

export class PlatformOperationError extends AppError {
  public constructor(
    public readonly platform: Platform | 'public_url',
    code: string,
    message: string,
    public readonly retryable: boolean,
    details?: Record<string, unknown>
  ) {
    super(502, code, message, details);
  }
}
