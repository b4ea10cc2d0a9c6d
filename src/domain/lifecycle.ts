import { InvalidStateError } from '../errors/lifecycle-errors.js';
import type { DeletionSnapshot, TenantStatus } from '../repositories/tenant-repository.js';

export const RECOVERY_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1_000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const LIFECYCLE_TRANSITIONS = ['activate', 'delete', 'recover', 'permanently_delete'] as const;

export type LifecycleTransition = (typeof LIFECYCLE_TRANSITIONS)[number];

interface TransitionRule {
  from: TenantStatus;
  to: TenantStatus;
}

/**
 * `recover` does not move the retired record: it leaves it `deleted` and materialises a new
 * `active` record under a fresh id.
 */
const TRANSITION_RULES: Record<LifecycleTransition, TransitionRule> = {
  activate: { from: 'pending', to: 'active' },
  delete: { from: 'active', to: 'deleted' },
  recover: { from: 'deleted', to: 'active' },
  permanently_delete: { from: 'deleted', to: 'permanently_deleted' }
};

export function transitionRule(transition: LifecycleTransition): TransitionRule {
  return TRANSITION_RULES[transition];
}

export function canTransition(current: TenantStatus, transition: LifecycleTransition): boolean {
  return TRANSITION_RULES[transition].from === current;
}

export function assertTransition(current: TenantStatus, transition: LifecycleTransition): TenantStatus {
  const rule = TRANSITION_RULES[transition];
  if (rule.from !== current) {
    throw new InvalidStateError(`Cannot ${transition.replace('_', ' ')} a site in status '${current}'.`, {
      status: current,
      transition
    });
  }

  return rule.to;
}

export function computeRecoveryDeadline(deletedAt: Date): Date {
  return new Date(deletedAt.getTime() + RECOVERY_WINDOW_DAYS * DAY_MS);
}

export function isSnapshotOpen(snapshot: DeletionSnapshot): boolean {
  return !snapshot.recovered && !snapshot.permanentlyDeleted;
}

/** Recovery is allowed up to and including the deadline instant. */
export function isWithinRecoveryWindow(snapshot: DeletionSnapshot, now: Date): boolean {
  return now.getTime() <= snapshot.recoveryDeadline.getTime();
}

export function daysUntil(deadline: Date, now: Date): number {
  return Math.floor((deadline.getTime() - now.getTime()) / DAY_MS);
}
