/**
 * Graph resolution.
 *
 * Turns the handle returned by a flow's build function into the ordered
 * entry list consumed by both the compiler and the local engine.
 */

import { mapStateName, stateName } from '../compiler/names.js';
import { FlowDefinitionError } from '../errors.js';
import type { ChainArena, ChainHandle, ChainNode } from '../steps/chain.js';
import type { FlowGraph, GraphEntry, ResolvedStep } from '../types/graph.js';
import { FlowDAG } from './dag.js';

/**
 * Resolve a chain into a flow graph.
 *
 * Walks backward from the handle to the head of the chain, then forward,
 * emitting a task per outer step and an open/close pair around every
 * fan-out region.
 */
export function resolveChain(name: string, tail: ChainHandle, schedule?: string): FlowGraph {
  const arena = tail.arena;
  const head = findHead(arena, tail.anchor);

  const entries: GraphEntry[] = [];
  const resolved: ResolvedStep[] = [];
  const seen = new Set<string>();
  // compiled state name -> what claimed it
  const claimed = new Map<string, string>();

  const claim = (state: string, owner: string, stepName: string): void => {
    const holder = claimed.get(state);
    if (holder !== undefined) {
      throw new FlowDefinitionError(
        'DUPLICATE_STEP',
        `${holder} and ${owner} both compile to state '${state}' in flow '${name}'`,
        stepName
      );
    }
    claimed.set(state, owner);
  };

  const resolve = (node: ChainNode): ResolvedStep => {
    if (seen.has(node.step.name)) {
      throw new FlowDefinitionError(
        'DUPLICATE_STEP',
        `Step '${node.step.name}' appears more than once in flow '${name}'`,
        node.step.name
      );
    }
    seen.add(node.step.name);
    claim(stateName(node.step.name), `step '${node.step.name}'`, node.step.name);
    const step: ResolvedStep = {
      name: node.step.name,
      definition: node.step,
      bound: node.bound,
      defaults: node.defaults,
      predecessor: node.prev === undefined ? undefined : arena.getNode(node.prev).step.name,
    };
    resolved.push(step);
    return step;
  };

  let current: ChainNode | undefined = arena.getNode(head);
  const visited = new Set<number>();
  while (current) {
    if (visited.has(current.id)) {
      throw new FlowDefinitionError('INVALID_CHAIN', `Flow '${name}' contains a cycle at step '${current.step.name}'`);
    }
    visited.add(current.id);

    const source = resolve(current);
    entries.push({ kind: 'task', step: source });

    if (current.opens === undefined) {
      current = current.next === undefined ? undefined : arena.getNode(current.next);
      continue;
    }

    const block = arena.getBlock(current.opens);
    const innerSteps: ResolvedStep[] = [];
    let inner: ChainNode | undefined = arena.getNode(block.innerHead);
    while (inner) {
      visited.add(inner.id);
      innerSteps.push(resolve(inner));
      inner = inner.id === block.innerTail || inner.next === undefined ? undefined : arena.getNode(inner.next);
    }
    claim(mapStateName(source.name), `the fan-out of step '${source.name}'`, source.name);
    entries.push({
      kind: 'fan-out-open',
      source,
      innerSteps,
      concurrencyLimit: block.concurrencyLimit,
    });

    if (block.close === undefined) {
      throw new FlowDefinitionError(
        'UNCLOSED_FAN_OUT',
        `flow ends with an open fan-out region opened by step \`${source.name}\`; close it with an aggregation step`,
        source.name
      );
    }

    const close = arena.getNode(block.close);
    visited.add(close.id);
    const lastInner = innerSteps[innerSteps.length - 1];
    entries.push({
      kind: 'fan-out-close',
      aggregate: resolve(close),
      source: source.name,
      lastInner: lastInner.name,
    });
    current = close.next === undefined ? undefined : arena.getNode(close.next);
  }

  return {
    name,
    entries,
    schedule,
    dag: new FlowDAG(resolved),
  };
}

function findHead(arena: ChainArena, start: number): number {
  const visited = new Set<number>();
  let id = start;
  for (;;) {
    if (visited.has(id)) {
      throw new FlowDefinitionError('INVALID_CHAIN', 'Chain links form a cycle');
    }
    visited.add(id);
    const node = arena.getNode(id);
    if (node.prev === undefined) {
      return id;
    }
    id = node.prev;
  }
}

/**
 * Names of every step in execution order.
 */
export function getStepNames(graph: FlowGraph): string[] {
  const names: string[] = [];
  for (const entry of graph.entries) {
    switch (entry.kind) {
      case 'task':
        names.push(entry.step.name);
        break;
      case 'fan-out-open':
        names.push(...entry.innerSteps.map(step => step.name));
        break;
      case 'fan-out-close':
        names.push(entry.aggregate.name);
        break;
    }
  }
  return names;
}

/**
 * One line per entry, e.g. `task get_items` / `fan-out get_items -> [double] (limit 4)`.
 */
export function formatGraph(graph: FlowGraph): string {
  const lines = graph.entries.map(entry => {
    switch (entry.kind) {
      case 'task':
        return `task ${entry.step.name}`;
      case 'fan-out-open': {
        const inner = entry.innerSteps.map(step => step.name).join(', ');
        const limit = entry.concurrencyLimit === undefined ? '' : ` (limit ${entry.concurrencyLimit})`;
        return `fan-out ${entry.source.name} -> [${inner}]${limit}`;
      }
      case 'fan-out-close':
        return `fan-in ${entry.lastInner} -> ${entry.aggregate.name}`;
    }
  });
  return lines.join('\n');
}
