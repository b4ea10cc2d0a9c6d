import type { Response } from 'express';

import type { OperationOutcome } from '../domain/outcome.js';
import { requiresFollowUp } from '../domain/outcome.js';

/** Anything short of full success is a 207 so callers cannot read it as done. */
export function sendOutcome(response: Response, outcome: OperationOutcome, body: Record<string, unknown>): void {
  const followUp = requiresFollowUp(outcome);

  response.status(outcome.kind === 'success' ? 200 : 207).json({
    ...body,
    outcome: outcome.kind,
    requiresFollowUp: followUp
  });
}
