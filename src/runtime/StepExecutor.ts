import { pick } from 'lodash-es';
import { isRetryable, retryDelay } from '../steps/retry.js';
import type { Logger } from '../logging.js';
import type { StepConfig } from '../types/config.js';
import type { ResolvedStep } from '../types/graph.js';
import type { FlowParams, RetryPolicy } from '../types/step.js';

/**
 * Diagnostics attached to an error that ended a step.
 */
export interface FailureDetails {
  step: string;
  /** Calls made, including the one that failed */
  attempts: number;
  elapsedMs: number;
}

const failures = new WeakMap<object, FailureDetails>();

/**
 * Attempt count and elapsed time for an error raised by a step, if any.
 * The error object itself is the one the step threw.
 */
export function getFailureDetails(error: unknown): FailureDetails | undefined {
  return typeof error === 'object' && error !== null ? failures.get(error) : undefined;
}

function recordFailure(error: unknown, details: FailureDetails): void {
  if (typeof error === 'object' && error !== null && !failures.has(error)) {
    failures.set(error, details);
  }
}

export type Sleep = (ms: number) => Promise<void>;

interface StepExecutorConfig {
  config: StepConfig;
  logger: Logger;
  sleep: Sleep;
}

/**
 * Runs one step body with its retry policy.
 */
export class StepExecutor {
  private readonly settings: StepExecutorConfig;

  constructor(settings: StepExecutorConfig) {
    this.settings = settings;
  }

  /**
   * The step's own policy, else the configured default.
   */
  effectivePolicy(step: ResolvedStep): RetryPolicy {
    return step.definition.retry ?? this.settings.config.retry;
  }

  /**
   * Flow parameters the step declared, overlaid with the ones bound at link time.
   */
  selectParams(step: ResolvedStep, flowParams: FlowParams): FlowParams {
    const declared = step.definition.params;
    const selected = declared === '*' ? { ...flowParams } : pick(flowParams, declared);
    return { ...selected, ...step.bound };
  }

  /**
   * Call the step until it succeeds or its policy gives up. Errors are
   * rethrown unchanged.
   *
   * @param label - name used in log lines, e.g. `double[3]` for an element
   */
  async execute(step: ResolvedStep, input: unknown, params: FlowParams, label = step.name): Promise<unknown> {
    const policy = this.effectivePolicy(step);
    const maxAttempts = policy.maxRetries + 1;
    const startedAt = Date.now();

    for (let attempt = 0; ; attempt++) {
      try {
        return await step.definition.execute(input, params);
      } catch (error) {
        const details = { step: label, attempts: attempt + 1, elapsedMs: Date.now() - startedAt };

        if (!isRetryable(error, policy)) {
          this.settings.logger.debug(`Step '${label}' raised a non-retryable error`);
          recordFailure(error, details);
          throw error;
        }
        if (attempt >= policy.maxRetries) {
          recordFailure(error, details);
          throw error;
        }

        const delay = retryDelay(policy, attempt);
        this.settings.logger.warn(
          `Step '${label}' failed (attempt ${attempt + 1}/${maxAttempts}), retrying in ${delay.toFixed(1)}s`,
          { event: 'step_retry', step: step.name },
          error
        );
        await this.settings.sleep(delay * 1000);
      }
    }
  }
}
