import { FlowDefinitionError } from './errors.js';
import { resolveChain } from './graph/resolver.js';
import { validateSchedule } from './schedule.js';
import { isChainHandle, type ChainHandle } from './steps/chain.js';
import type { FlowGraph } from './types/graph.js';
import type { FlowParams } from './types/step.js';
import { toKebabCase } from './utils.js';

export type FlowBuilder = (params: FlowParams) => ChainHandle;

export interface FlowOptions {
  /** cron(...) or rate(...) expression */
  schedule?: string;
}

/**
 * A declared flow. Calling it builds the chain in a fresh arena and
 * resolves it, so every call yields an independent graph.
 */
export interface Flow {
  (params?: FlowParams): FlowGraph;
  readonly flowName: string;
  readonly schedule?: string;
}

const flows = new WeakSet<object>();

/**
 * Declare a flow.
 *
 * @example
 * export const numbers = flow('numbers', () =>
 *   getItems.map(double).agg(sum)
 * );
 */
export function flow(name: string, build: FlowBuilder, options: FlowOptions = {}): Flow {
  const flowName = toKebabCase(name);
  if (!flowName) {
    throw new FlowDefinitionError('INVALID_CHAIN', `Invalid flow name '${name}'`);
  }
  const schedule = options.schedule === undefined ? undefined : validateSchedule(options.schedule);

  const resolve = (params: FlowParams = {}): FlowGraph => {
    const tail: unknown = build(params);
    if (!isChainHandle(tail)) {
      throw new FlowDefinitionError(
        'INVALID_CHAIN',
        `Flow '${flowName}' must return the result of a chain (.invoke(), .next(), .map() or .agg())`
      );
    }
    return resolveChain(flowName, tail, schedule);
  };

  const declared: Flow = Object.assign(resolve, { flowName, schedule });
  flows.add(declared);
  return declared;
}

export function isFlow(value: unknown): value is Flow {
  return typeof value === 'function' && flows.has(value);
}
