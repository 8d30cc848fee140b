import { RetryPolicySchema, type ErrorKind, type RetryPolicy, type RetryPolicyInput } from '../types/step.js';
import { formatIssues } from '../errors.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = RetryPolicySchema.parse({});

/**
 * Validate and normalize a retry policy (delays become seconds).
 * @throws Error listing every invalid field
 */
export function normalizeRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  const result = RetryPolicySchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid retry policy: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Seconds to wait before retry `attempt` (0-indexed):
 * `min(initialDelay * backoffMultiplier ** attempt, maxDelay)`.
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelay * policy.backoffMultiplier ** attempt, policy.maxDelay);
}

function matchesKind(error: unknown, kind: ErrorKind): boolean {
  if (typeof kind === 'string') {
    return error instanceof Error && (error.name === kind || error.constructor.name === kind);
  }
  return error instanceof kind;
}

export function isRetryable(error: unknown, policy: RetryPolicy): boolean {
  if (!policy.retryOn) {
    return true;
  }
  return policy.retryOn.some(kind => matchesKind(error, kind));
}

/**
 * Error matchers for the orchestrator's retry block.
 */
export function errorEquals(policy: RetryPolicy): string[] {
  if (!policy.retryOn) {
    return ['States.ALL'];
  }
  return policy.retryOn.map(kind => (typeof kind === 'string' ? kind : kind.name));
}
