import { AttemptOutcome, ClaimObservation } from '../types';

export interface ClassifierPolicy {
  /** Unrecognized or failed observations seen in a row before this one. */
  consecutiveFailures: number;
  maxConsecutiveFailures: number;
}

export function countsAsFailure(observation: ClaimObservation): boolean {
  return observation.kind === 'unrecognized' || observation.kind === 'error';
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function classifyOutcome(
  observation: ClaimObservation,
  policy: ClassifierPolicy
): AttemptOutcome {
  switch (observation.kind) {
    case 'confirmed':
      return { kind: 'success', claimed: true };
    case 'transient':
      return { kind: 'retryable', reason: `transient: ${observation.marker}` };
    case 'no-slot':
      return {
        kind: 'retryable',
        reason: `no matching slot yet (${observation.seen} listed)`,
      };
    case 'auth-failed':
      return { kind: 'fatal', reason: `authentication failed: ${observation.reason}` };
    case 'unrecognized':
    case 'error': {
      const reason = observation.kind === 'error'
        ? `automation error: ${describeError(observation.error)}`
        : `no expected marker on page${observation.url ? ` (${observation.url})` : ''}`;
      const failures = policy.consecutiveFailures + 1;
      if (failures > policy.maxConsecutiveFailures) {
        return {
          kind: 'fatal',
          reason: `${reason}; ${failures} consecutive failures (limit ${policy.maxConsecutiveFailures})`,
        };
      }
      return { kind: 'retryable', reason };
    }
  }
}
