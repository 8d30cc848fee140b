/**
 * Data dependencies of a resolved flow.
 *
 * An edge runs from every step to the step whose output becomes its input:
 * per-element steps hang off the step that produced the sequence, and an
 * aggregation step off the last per-element step. The local engine asks it
 * where a task's input comes from.
 */

import { DepGraph } from 'dependency-graph';
import { FlowDefinitionError } from '../errors.js';
import type { ResolvedStep } from '../types/graph.js';

export class FlowDAG {
  private readonly graph = new DepGraph<ResolvedStep>();

  constructor(steps: readonly ResolvedStep[]) {
    steps.forEach(step => this.graph.addNode(step.name, step));

    for (const { name, predecessor } of steps) {
      if (predecessor === undefined) continue;
      if (!this.graph.hasNode(predecessor)) {
        throw new FlowDefinitionError('INVALID_CHAIN', `Step '${name}' consumes unknown step '${predecessor}'`, name);
      }
      this.graph.addDependency(name, predecessor);
    }
  }

  /** The step whose output `stepName` consumes; undefined for the head or an unknown name. */
  predecessorOf(stepName: string): ResolvedStep | undefined {
    if (!this.graph.hasNode(stepName)) {
      return undefined;
    }
    const [upstream] = this.graph.directDependenciesOf(stepName);
    return upstream === undefined ? undefined : this.graph.getNodeData(upstream);
  }

  /** Step names, producers before consumers. */
  stepOrder(): string[] {
    return this.graph.overallOrder();
  }

  get size(): number {
    return this.graph.size();
  }
}
