import { FlowDefinitionError, formatIssues } from '../errors.js';
import {
  JobOptionsSchema,
  ParamSelectionSchema,
  StepNameSchema,
  type FlowParams,
  type JobOptions,
  type ParamSelection,
  type RetryPolicy,
  type StepFunction,
  type StepOptions,
} from '../types/step.js';
import { normalizeRetryPolicy } from './retry.js';
import { ChainArena, type MapHandle, type MapOptions, type StepHandle } from './chain.js';

/**
 * Holds the wrapped function behind a method so that definitions stay
 * assignable across input types once they are stored in a chain.
 */
interface StepBody<TInput, TOutput> {
  run(input: TInput, params: FlowParams): TOutput | Promise<TOutput>;
}

/**
 * An immutable, named unit of work. Definitions are declared once (usually at
 * module level) and can appear in any number of flows; linking them into a
 * chain never mutates the definition.
 */
export class StepDefinition<TInput = unknown, TOutput = unknown> {
  readonly name: string;
  /** Explicit retry policy; undefined means "use the configured default" */
  readonly retry?: RetryPolicy;
  readonly job: JobOptions;
  readonly params: ParamSelection;
  private readonly body: StepBody<TInput, TOutput>;

  constructor(
    name: string,
    fn: StepFunction<TInput, TOutput>,
    settings: { retry?: RetryPolicy; job: JobOptions; params: ParamSelection }
  ) {
    this.name = name;
    this.retry = settings.retry;
    this.job = settings.job;
    this.params = settings.params;
    this.body = { run: fn };
    Object.freeze(this);
  }

  get isHeavyweight(): boolean {
    return this.job.type === 'heavyweight';
  }

  /**
   * Call the wrapped function once. Synchronous throws become rejections.
   */
  async execute(input: TInput, params: FlowParams): Promise<TOutput> {
    return this.body.run(input, params);
  }

  /**
   * Start a chain with this step as its head, recording the input (and
   * parameters) it receives when nothing runs before it.
   */
  invoke(input?: TInput, params?: FlowParams): StepHandle<TOutput> {
    const defaults = input !== undefined || params !== undefined ? { input, params: params ?? {} } : undefined;
    return ChainArena.start<TOutput>(this, defaults);
  }

  next<TNext>(step: StepDefinition<TOutput, TNext>, bound?: FlowParams): StepHandle<TNext> {
    return this.invoke().next(step, bound);
  }

  map<TItemOut>(
    step: StepDefinition<ElementOf<TOutput>, TItemOut>,
    options?: MapOptions
  ): MapHandle<TItemOut> {
    return this.invoke().map(step, options);
  }

  agg(_step: StepDefinition): never {
    throw new FlowDefinitionError(
      'AGG_WITHOUT_MAP',
      `.agg() must be called on the result of .map(), not directly on step '${this.name}'`,
      this.name
    );
  }
}

function isStepFunction<TInput, TOutput>(
  value: StepFunction<TInput, TOutput> | StepOptions | undefined
): value is StepFunction<TInput, TOutput> {
  return typeof value === 'function';
}

export type ElementOf<T> = T extends readonly (infer E)[] ? E : unknown;

/**
 * Declare a step. The name comes from the function unless given explicitly.
 *
 * Bundlers and transpilers may rename a function expression whose name matches
 * the binding it is assigned to (`const sum = step(function sum ...)` can reach
 * here as `sum2`). Pass the name explicitly in that case.
 *
 * @example
 * const getItems = step(function get_items() { return [1, 2, 3]; });
 * const double = step('double', (x: number) => x * 2, { retry: { maxRetries: 2 } });
 */
export function step<TInput, TOutput>(
  fn: StepFunction<TInput, TOutput>,
  options?: StepOptions
): StepDefinition<TInput, TOutput>;
export function step<TInput, TOutput>(
  name: string,
  fn: StepFunction<TInput, TOutput>,
  options?: StepOptions
): StepDefinition<TInput, TOutput>;
export function step<TInput, TOutput>(
  nameOrFn: string | StepFunction<TInput, TOutput>,
  fnOrOptions?: StepFunction<TInput, TOutput> | StepOptions,
  maybeOptions?: StepOptions
): StepDefinition<TInput, TOutput> {
  let fn: StepFunction<TInput, TOutput>;
  let options: StepOptions;
  let name: string | undefined;

  if (typeof nameOrFn === 'string') {
    if (!isStepFunction(fnOrOptions)) {
      throw new FlowDefinitionError('INVALID_STEP', `Step '${nameOrFn}' needs a function`, nameOrFn);
    }
    fn = fnOrOptions;
    options = maybeOptions ?? {};
    name = nameOrFn;
  } else {
    if (isStepFunction(fnOrOptions)) {
      throw new FlowDefinitionError('INVALID_STEP', 'Pass either a name and a function, or a function and options');
    }
    fn = nameOrFn;
    options = fnOrOptions ?? {};
    name = options.name ?? nameOrFn.name;
  }

  const parsedName = StepNameSchema.safeParse(name);
  if (!parsedName.success) {
    throw new FlowDefinitionError(
      'INVALID_STEP',
      `Invalid step name '${name}': ${formatIssues(parsedName.error.issues)}`,
      name
    );
  }
  const stepName = parsedName.data;

  let retry: RetryPolicy | undefined;
  if (options.retry !== undefined) {
    try {
      retry = normalizeRetryPolicy(options.retry);
    } catch (error) {
      throw new FlowDefinitionError(
        'INVALID_STEP',
        `Step '${stepName}': ${error instanceof Error ? error.message : String(error)}`,
        stepName
      );
    }
  }

  const job = JobOptionsSchema.safeParse(options.job ?? {});
  if (!job.success) {
    throw new FlowDefinitionError(
      'INVALID_STEP',
      `Step '${stepName}': invalid job options: ${formatIssues(job.error.issues)}`,
      stepName
    );
  }

  const params = ParamSelectionSchema.safeParse(options.params ?? []);
  if (!params.success) {
    throw new FlowDefinitionError(
      'INVALID_STEP',
      `Step '${stepName}': params must be a list of names or '*'`,
      stepName
    );
  }

  return new StepDefinition(stepName, fn, { retry, job: job.data, params: params.data });
}

export function isStepDefinition(value: unknown): value is StepDefinition {
  return value instanceof StepDefinition;
}
