// Error taxonomy for the resolution engine.
// Expected game outcomes (failed espionage, depleted poaching pools) are never
// thrown; they are reported as ActionOutcome values.

import type { RejectionCode } from '@/engine/types';

/** A malformed or resource-infeasible action or entity. */
export class ValidationError extends Error {
  constructor(
    public readonly code: RejectionCode,
    message: string,
    public readonly character: string | null = null,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A resolved round would break a state invariant (e.g. negative available
 * capital). The whole round is rejected and no state is returned.
 */
export class ConsistencyViolation extends Error {
  constructor(
    public readonly round: number,
    public readonly violations: string[],
  ) {
    super(`Round ${round} rejected: ${violations.join('; ')}`);
    this.name = 'ConsistencyViolation';
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
