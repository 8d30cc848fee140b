/**
 * Step types - step functions, retry policies and execution placement.
 */

import { z } from 'zod';
import { toSeconds } from '../utils.js';

/**
 * Flow-level parameters passed to a flow when it is resolved or run.
 */
export type FlowParams = Record<string, unknown>;

/**
 * The unit of work wrapped by a step. `input` is the upstream output (or the
 * default input captured by `invoke`), `params` the flow parameters the step
 * declared plus any parameters bound when it was linked.
 */
export type StepFunction<TInput = unknown, TOutput = unknown> = (
  input: TInput,
  params: FlowParams
) => TOutput | Promise<TOutput>;

/** Error classes a retry policy can match with `instanceof`. */
export type ErrorClass = abstract new (...args: never[]) => Error;

/** Either an error class or an error name (matched against `error.name`). */
export type ErrorKind = string | ErrorClass;

/**
 * Zod schema for delays. Numbers are seconds, strings go through `ms`.
 */
export const DelaySchema = z.union([z.number(), z.string().min(1)]).transform((value, ctx) => {
  let seconds: number;
  try {
    seconds = toSeconds(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
  if (!(seconds > 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a positive delay' });
    return z.NEVER;
  }
  return seconds;
});

const ErrorKindSchema = z.union([
  z.string().min(1),
  z.custom<ErrorClass>((value) => typeof value === 'function', 'Must be an error class or an error name'),
]);

/**
 * Zod schema for a retry policy.
 */
export const RetryPolicySchema = z.object({
  /** Retries after the first attempt (default: 0) */
  maxRetries: z.number().int().min(0).default(0),
  /** Delay before the first retry, seconds or a duration string (default: 1s) */
  initialDelay: DelaySchema.default(1),
  /** Multiplier applied to the delay after every retry (default: 1) */
  backoffMultiplier: z.number().positive().default(1),
  /** Upper bound for a single delay (default: 60s) */
  maxDelay: DelaySchema.default(60),
  /** Errors worth retrying. Absent means every error is retried. */
  retryOn: z.array(ErrorKindSchema).min(1).optional(),
});

export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;

/** Normalized retry policy; delays are in seconds. */
export type RetryPolicy = z.output<typeof RetryPolicySchema>;

export const ExecutionClassSchema = z.enum(['lightweight', 'heavyweight']);

export type ExecutionClass = z.infer<typeof ExecutionClassSchema>;

/**
 * Zod schema for step placement. Resource hints only apply to heavyweight
 * (batch-style) steps.
 */
export const JobOptionsSchema = z
  .object({
    type: ExecutionClassSchema.default('lightweight'),
    vcpu: z.number().int().positive().optional(),
    memoryMb: z.number().int().positive().optional(),
    timeoutSeconds: z.number().int().positive().optional(),
  })
  .refine(
    (job) =>
      job.type === 'heavyweight' ||
      (job.vcpu === undefined && job.memoryMb === undefined && job.timeoutSeconds === undefined),
    { message: 'vcpu, memoryMb and timeoutSeconds are only accepted on heavyweight steps' }
  );

export type JobOptionsInput = z.input<typeof JobOptionsSchema>;

export type JobOptions = z.output<typeof JobOptionsSchema>;

/**
 * Flow parameters a step wants: an explicit list of names, or '*' for all of them.
 */
export type ParamSelection = readonly string[] | '*';

export const ParamSelectionSchema = z.union([z.literal('*'), z.array(z.string().min(1))]);

export const StepNameSchema = z
  .string()
  .min(1, 'Step name is required')
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'Must start with a letter and contain only letters, digits, "_" or "-"');

export interface StepOptions {
  /** Overrides the name taken from the function */
  name?: string;
  /** Retry policy; when absent the configured default applies */
  retry?: RetryPolicyInput;
  /** Execution placement (default: lightweight) */
  job?: JobOptionsInput;
  /** Flow-level parameters passed to the step (default: none) */
  params?: ParamSelection;
}

/**
 * Input captured by `invoke()` for a step at the head of a chain.
 */
export interface StepDefaults {
  input: unknown;
  params: FlowParams;
}
