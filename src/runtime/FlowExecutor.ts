import { randomUUID } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { StoreError } from '../errors.js';
import { FanOutProgressLogger, StepLogger, createLogger, type Logger } from '../logging.js';
import { LocalStore } from '../store/LocalStore.js';
import { elementKey, type DataStore, type StoreKey } from '../store/types.js';
import { StepConfigSchema, type StepConfig, type StepConfigInput } from '../types/config.js';
import type { FanOutCloseEntry, FanOutOpenEntry, FlowGraph, ResolvedStep, TaskEntry } from '../types/graph.js';
import type { FlowParams } from '../types/step.js';
import { defaultWorkerCount, runBounded } from './pool.js';
import { StepExecutor, type Sleep } from './StepExecutor.js';

export interface RunOptions {
  config?: StepConfigInput;
  /** Store for intermediate values; a disposable LocalStore when absent */
  store?: DataStore;
  runId?: string;
  logger?: Logger;
  /** Bound on in-flight elements when a fan-out sets no limit of its own */
  maxWorkers?: number;
  /** Leave intermediate values behind after the run */
  keepIntermediate?: boolean;
  sleep?: Sleep;
}

interface RunState {
  readonly store: DataStore;
  readonly params: FlowParams;
  /** Latest output of every outer step */
  readonly outputs: Map<string, unknown>;
  /** Per-element outputs of the last inner step, by fan-out source */
  readonly waves: Map<string, unknown[]>;
}

/**
 * Runs a resolved flow on the local machine, entry by entry.
 */
export class FlowExecutor {
  readonly runId: string;
  private readonly config: StepConfig;
  private readonly logger: Logger;
  private readonly stepExecutor: StepExecutor;

  constructor(
    private readonly graph: FlowGraph,
    private readonly options: RunOptions = {}
  ) {
    this.config = StepConfigSchema.parse(options.config ?? {});
    this.runId = options.runId ?? `local-${randomUUID()}`;
    this.logger = options.logger ?? createLogger('stepline.runner', this.config.logging);
    this.stepExecutor = new StepExecutor({
      config: this.config,
      logger: this.logger,
      sleep: options.sleep ?? (ms => delay(ms)),
    });
  }

  /**
   * Execute every entry in order and return the output of the last one.
   *
   * Outputs travel between steps in memory; the store keeps a copy of each.
   */
  async execute(params: FlowParams = {}): Promise<unknown> {
    const ownsStore = this.options.store === undefined;
    const store = this.options.store ?? (await LocalStore.create(this.config.local.storeDir));
    const run: RunState = { store, params, outputs: new Map(), waves: new Map() };

    this.logger.info(`Starting flow '${this.graph.name}' (run_id=${this.runId})`, {
      event: 'flow_start',
      run_id: this.runId,
    });
    this.logger.debug(`Step order: ${this.graph.dag.stepOrder().join(' -> ')}`);
    if (Object.keys(params).length > 0) {
      this.logger.debug(`Input parameters: ${JSON.stringify(params)}`);
    }

    let result: unknown;
    let failed = false;
    try {
      for (const entry of this.graph.entries) {
        switch (entry.kind) {
          case 'task':
            result = await this.runTask(run, entry);
            break;
          case 'fan-out-open':
            await this.runFanOut(run, entry);
            break;
          case 'fan-out-close':
            result = await this.runAggregate(run, entry);
            break;
        }
      }
      this.logger.info(`Flow '${this.graph.name}' completed`, { event: 'flow_complete', run_id: this.runId });
      return result;
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      await this.release(store, ownsStore, failed);
    }
  }

  /**
   * Remove what this run wrote, unless asked to keep it. A cleanup failure
   * after a failed step is logged so the step's error is the one that surfaces.
   */
  private async release(store: DataStore, ownsStore: boolean, runFailed: boolean): Promise<void> {
    if (this.options.keepIntermediate) {
      if (store instanceof LocalStore) {
        this.logger.info(`Intermediate values kept under ${store.baseDir}`);
      }
      return;
    }
    if (!ownsStore) {
      return;
    }
    try {
      await store.cleanup();
    } catch (error) {
      if (!runFailed) throw error;
      this.logger.warn(
        `Failed to clean up intermediate values of run ${this.runId}`,
        { event: 'cleanup_failed', run_id: this.runId },
        error
      );
    }
  }

  private key(stepName: string): StoreKey {
    return { flowName: this.graph.name, runId: this.runId, stepName };
  }

  private async runTask(run: RunState, entry: TaskEntry): Promise<unknown> {
    const { step } = entry;
    const { input, stepParams } = this.resolveInput(run, step);
    const output = await this.runLogged(step, () => this.stepExecutor.execute(step, input, stepParams));
    await this.record(run, step.name, output);
    return output;
  }

  /**
   * Upstream output when there is one, else the input captured by `invoke`,
   * else nothing but the selected flow parameters.
   */
  private resolveInput(run: RunState, step: ResolvedStep): { input: unknown; stepParams: FlowParams } {
    const stepParams = this.stepExecutor.selectParams(step, run.params);

    const upstream = this.graph.dag.predecessorOf(step.name);
    if (upstream !== undefined && run.outputs.has(upstream.name)) {
      return { input: run.outputs.get(upstream.name), stepParams };
    }
    if (step.defaults) {
      return { input: step.defaults.input, stepParams: { ...step.defaults.params, ...step.bound } };
    }
    return { input: undefined, stepParams };
  }

  private async runFanOut(run: RunState, entry: FanOutOpenEntry): Promise<void> {
    const { store } = run;
    const source = entry.source.name;
    const produced = run.outputs.get(source);
    if (!Array.isArray(produced)) {
      throw new StoreError(
        'NOT_FOUND',
        store.locate(this.key(source), 'manifest'),
        `Step '${source}' did not return an array, so there is nothing to fan out`
      );
    }
    let values: unknown[] = produced;

    const limit = entry.concurrencyLimit ?? this.options.maxWorkers ?? this.config.local.maxWorkers ?? defaultWorkerCount();
    this.logger.debug(`Fanning out ${values.length} items from '${source}' (limit ${limit})`);

    for (const step of entry.innerSteps) {
      const stepParams = this.stepExecutor.selectParams(step, run.params);
      const progress = new FanOutProgressLogger(step.name, values.length, this.logger, this.config.logging.progressInterval);
      const current = values;

      values = await this.runLogged(step, async () => {
        progress.start();
        const outputs = await runBounded(current, limit, async (value, index) => {
          try {
            const output = await this.stepExecutor.execute(step, value, stepParams, `${step.name}[${index}]`);
            await store.write(elementKey(this.key(step.name), index), output);
            progress.update('completed');
            return output;
          } catch (error) {
            progress.update('failed');
            throw error;
          }
        });
        progress.complete();
        return outputs;
      });
    }
    run.waves.set(source, values);
  }

  private async runAggregate(run: RunState, entry: FanOutCloseEntry): Promise<unknown> {
    const step = entry.aggregate;
    const inputs = run.waves.get(entry.source) ?? [];

    const stepParams = this.stepExecutor.selectParams(step, run.params);
    const output = await this.runLogged(step, () => this.stepExecutor.execute(step, inputs, stepParams));
    await this.record(run, step.name, output);
    return output;
  }

  private async record(run: RunState, stepName: string, output: unknown): Promise<void> {
    run.outputs.set(stepName, output);
    await this.persist(run.store, stepName, output);
  }

  /**
   * Store a step output; array outputs also get one entry per element and a manifest.
   */
  private async persist(store: DataStore, stepName: string, output: unknown): Promise<void> {
    const key = this.key(stepName);
    await store.write(key, output);
    if (!Array.isArray(output)) {
      return;
    }
    const items = await Promise.all(
      output.map(async (element: unknown, index) => ({
        index,
        location: await store.write(elementKey(key, index), element),
      }))
    );
    await store.writeManifest(key, items);
  }

  private async runLogged<T>(step: ResolvedStep, run: () => Promise<T>): Promise<T> {
    const stepLogger = new StepLogger(step.name, this.logger);
    stepLogger.start();
    if (step.definition.isHeavyweight) {
      this.logger.info(`Running heavyweight step '${step.name}' in process`);
    }
    try {
      const output = await run();
      stepLogger.complete();
      return output;
    } catch (error) {
      stepLogger.fail(error);
      throw error;
    }
  }
}

/**
 * Run a resolved flow locally and return the output of its last step.
 *
 * @example
 * const total = await runFlow(numbers(), {}, { maxWorkers: 4 });
 */
export async function runFlow(graph: FlowGraph, params: FlowParams = {}, options: RunOptions = {}): Promise<unknown> {
  return new FlowExecutor(graph, options).execute(params);
}
