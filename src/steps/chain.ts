/**
 * Chain builder.
 *
 * Every chain lives in its own append-only arena. Linking records both the
 * forward (`next`) and backward (`prev`) adjacency, so the resolver can walk
 * from whichever handle the flow returns back to the head and then forward
 * again without touching the step definitions themselves.
 */

import { z } from 'zod';
import { FlowDefinitionError, formatIssues } from '../errors.js';
import type { FlowParams, StepDefaults } from '../types/step.js';
import type { ElementOf, StepDefinition } from './step.js';

export interface ChainNode {
  readonly id: number;
  readonly step: StepDefinition;
  /** Parameters bound at link time */
  readonly bound: FlowParams;
  readonly defaults?: StepDefaults;
  readonly prev?: number;
  readonly next?: number;
  /** Block opened by this node, when its output is fanned out */
  readonly opens?: number;
  /** Block this node runs inside of, for per-element steps */
  readonly within?: number;
}

export interface MapBlock {
  readonly id: number;
  readonly source: number;
  readonly innerHead: number;
  readonly innerTail: number;
  /** Aggregation node; absent while the block is open */
  readonly close?: number;
  readonly concurrencyLimit?: number;
}

export interface MapOptions {
  /** Upper bound on elements processed at once */
  concurrencyLimit?: number;
  /** Parameters bound to the per-element step */
  params?: FlowParams;
}

const MapOptionsSchema = z.object({
  concurrencyLimit: z.number().int().positive().optional(),
  params: z.record(z.string(), z.unknown()).optional(),
});

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export class ChainArena {
  private readonly nodes: Mutable<ChainNode>[] = [];
  private readonly blocks: Mutable<MapBlock>[] = [];
  private openBlock?: number;

  /**
   * Create an arena holding a single head node.
   */
  static start<TOut>(step: StepDefinition, defaults?: StepDefaults): StepHandle<TOut> {
    const arena = new ChainArena();
    const id = arena.addNode(step, {}, { defaults });
    return new StepHandle<TOut>(arena, id);
  }

  get size(): number {
    return this.nodes.length;
  }

  getNode(id: number): ChainNode {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`Unknown chain node ${id}`);
    }
    return node;
  }

  getBlock(id: number): MapBlock {
    const block = this.blocks[id];
    if (!block) {
      throw new Error(`Unknown map block ${id}`);
    }
    return block;
  }

  hasOpenBlock(): boolean {
    return this.openBlock !== undefined;
  }

  /** @internal */
  linkNext(fromId: number, step: StepDefinition, bound: FlowParams = {}): number {
    const from = this.mutableNode(fromId);
    this.assertTail(from);
    const id = this.addNode(step, bound, { prev: fromId, within: from.within });
    from.next = id;
    if (from.within !== undefined) {
      this.mutableBlock(from.within).innerTail = id;
    }
    return id;
  }

  /** @internal */
  openMap(sourceId: number, step: StepDefinition, options: MapOptions = {}): number {
    const parsed = MapOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new FlowDefinitionError(
        'INVALID_CHAIN',
        `Invalid map options for step '${step.name}': ${formatIssues(parsed.error.issues)}`,
        step.name
      );
    }

    const source = this.mutableNode(sourceId);
    if (this.openBlock !== undefined) {
      const openedBy = this.getNode(this.getBlock(this.openBlock).source).step.name;
      throw new FlowDefinitionError(
        'NESTED_FAN_OUT',
        `Cannot map '${step.name}': the fan-out opened by step '${openedBy}' is still open; close it with .agg() first`,
        step.name
      );
    }
    this.assertTail(source);

    const blockId = this.blocks.length;
    const innerId = this.addNode(step, parsed.data.params ?? {}, { prev: sourceId, within: blockId });
    this.blocks.push({
      id: blockId,
      source: sourceId,
      innerHead: innerId,
      innerTail: innerId,
      concurrencyLimit: parsed.data.concurrencyLimit,
    });
    source.opens = blockId;
    this.openBlock = blockId;
    return blockId;
  }

  /** @internal */
  extendMap(blockId: number, step: StepDefinition, bound: FlowParams = {}): void {
    const block = this.assertOpen(blockId, step);
    this.linkNext(block.innerTail, step, bound);
  }

  /** @internal */
  closeMap(blockId: number, step: StepDefinition, bound: FlowParams = {}): number {
    const block = this.assertOpen(blockId, step);
    const id = this.addNode(step, bound, { prev: block.innerTail });
    this.mutableNode(block.innerTail).next = id;
    block.close = id;
    this.openBlock = undefined;
    return id;
  }

  private addNode(
    step: StepDefinition,
    bound: FlowParams,
    links: { prev?: number; within?: number; defaults?: StepDefaults }
  ): number {
    const id = this.nodes.length;
    this.nodes.push({ id, step, bound: { ...bound }, ...links });
    return id;
  }

  private mutableNode(id: number): Mutable<ChainNode> {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`Unknown chain node ${id}`);
    }
    return node;
  }

  private mutableBlock(id: number): Mutable<MapBlock> {
    const block = this.blocks[id];
    if (!block) {
      throw new Error(`Unknown map block ${id}`);
    }
    return block;
  }

  private assertTail(node: ChainNode): void {
    if (node.next !== undefined || node.opens !== undefined) {
      throw new FlowDefinitionError(
        'INVALID_CHAIN',
        `Step '${node.step.name}' already has a successor; chains cannot branch`,
        node.step.name
      );
    }
  }

  private assertOpen(blockId: number, step: StepDefinition): Mutable<MapBlock> {
    const block = this.mutableBlock(blockId);
    if (block.close !== undefined) {
      const source = this.getNode(block.source).step.name;
      throw new FlowDefinitionError(
        'INVALID_CHAIN',
        `Cannot link '${step.name}': the fan-out opened by step '${source}' is already closed`,
        step.name
      );
    }
    return block;
  }
}

/**
 * Opaque reference into an arena, returned by every combinator.
 */
export abstract class ChainHandle {
  protected constructor(readonly arena: ChainArena) {}

  /** Node the resolver starts its backward walk from */
  abstract get anchor(): number;
}

export class StepHandle<TOut = unknown> extends ChainHandle {
  constructor(
    arena: ChainArena,
    readonly nodeId: number
  ) {
    super(arena);
  }

  get anchor(): number {
    return this.nodeId;
  }

  get stepName(): string {
    return this.arena.getNode(this.nodeId).step.name;
  }

  next<TNext>(step: StepDefinition<TOut, TNext>, bound?: FlowParams): StepHandle<TNext> {
    return new StepHandle<TNext>(this.arena, this.arena.linkNext(this.nodeId, step, bound));
  }

  /**
   * Fan the output of this step out: `step` runs once per element.
   */
  map<TItemOut>(step: StepDefinition<ElementOf<TOut>, TItemOut>, options?: MapOptions): MapHandle<TItemOut> {
    return new MapHandle<TItemOut>(this.arena, this.arena.openMap(this.nodeId, step, options));
  }

  agg(step: StepDefinition): never {
    throw new FlowDefinitionError(
      'AGG_WITHOUT_MAP',
      `.agg() must be called on the result of .map(); '${step.name}' follows step '${this.stepName}' which was not mapped`,
      step.name
    );
  }
}

/**
 * Handle on an open fan-out block. `map` and `next` both extend the
 * per-element chain of the same block; `agg` closes it.
 */
export class MapHandle<TItem = unknown> extends ChainHandle {
  constructor(
    arena: ChainArena,
    readonly blockId: number
  ) {
    super(arena);
  }

  get anchor(): number {
    return this.arena.getBlock(this.blockId).source;
  }

  map<TNext>(step: StepDefinition<TItem, TNext>, bound?: FlowParams): MapHandle<TNext> {
    this.arena.extendMap(this.blockId, step, bound);
    return new MapHandle<TNext>(this.arena, this.blockId);
  }

  next<TNext>(step: StepDefinition<TItem, TNext>, bound?: FlowParams): MapHandle<TNext> {
    return this.map(step, bound);
  }

  /**
   * Close the block; `step` receives the per-element results in element order.
   */
  agg<TOut>(step: StepDefinition<TItem[], TOut>, bound?: FlowParams): StepHandle<TOut> {
    return new StepHandle<TOut>(this.arena, this.arena.closeMap(this.blockId, step, bound));
  }
}

export function isChainHandle(value: unknown): value is ChainHandle {
  return value instanceof ChainHandle;
}
