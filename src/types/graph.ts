/**
 * Resolved graph types - the ordered intermediate representation shared by
 * the state-machine compiler and the local execution engine.
 */

import type { StepDefinition } from '../steps/step.js';
import type { FlowDAG } from '../graph/dag.js';
import type { FlowParams, StepDefaults } from './step.js';

/**
 * A step as it appears in one resolved flow.
 */
export interface ResolvedStep {
  readonly name: string;
  readonly definition: StepDefinition;
  /** Parameters bound when the step was linked into the chain */
  readonly bound: FlowParams;
  /** Input captured by `invoke()`, head of chain only */
  readonly defaults?: StepDefaults;
  /** Step whose output feeds this one, if any */
  readonly predecessor?: string;
}

export interface TaskEntry {
  readonly kind: 'task';
  readonly step: ResolvedStep;
}

export interface FanOutOpenEntry {
  readonly kind: 'fan-out-open';
  readonly source: ResolvedStep;
  /** Per-element chain in execution order */
  readonly innerSteps: readonly ResolvedStep[];
  readonly concurrencyLimit?: number;
}

export interface FanOutCloseEntry {
  readonly kind: 'fan-out-close';
  readonly aggregate: ResolvedStep;
  /** Name of the step whose sequence output was fanned out */
  readonly source: string;
  /** Name of the last per-element step; its outputs are collected */
  readonly lastInner: string;
}

export type GraphEntry = TaskEntry | FanOutOpenEntry | FanOutCloseEntry;

export type GraphEntryKind = GraphEntry['kind'];

export interface FlowGraph {
  /** Identifier-safe flow name (kebab-case) */
  readonly name: string;
  readonly entries: readonly GraphEntry[];
  /** cron(...) or rate(...) expression; absent means on demand only */
  readonly schedule?: string;
  readonly dag: FlowDAG;
}
