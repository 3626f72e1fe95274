/**
 * Awaitable capability
 *
 * The contract every suspendable dependency (task, deferred result,
 * synchronization primitive) satisfies to take part in graph construction.
 */

import type { ExecutionFrame } from './frame.js';
import type { AsyncGraphNode } from './nodes.js';

/**
 * Sub-graph produced by expanding one awaitable
 *
 * - `tail`: "this awaitable reached this point"; its awaiters attach after it
 * - `head`: wired to whatever causally comes before the awaitable
 */
export type AsyncSubgraph = {
  readonly tail: AsyncGraphNode;
  readonly head: AsyncGraphNode;
};

export interface Awaitable {
  /**
   * Awaitables currently suspended on this one. Live view: registrations made
   * by the runtime show up without calling again.
   */
  getAwaiters(): ReadonlySet<Awaitable>;

  /** Called by the runtime when `awaiter` suspends on this awaitable */
  addAwaiter(awaiter: Awaitable): void;

  makeAsyncGraphNodes(): AsyncSubgraph;

  toString(): string;
}

/**
 * A unit of cooperative work owned by the scheduler
 */
export interface SchedulableUnit extends Awaitable {
  /** Outermost saved frame of the unit's suspended computation */
  getEntryFrame(): ExecutionFrame | null;
}

export function isSchedulableUnit(value: Awaitable): value is SchedulableUnit {
  return 'getEntryFrame' in value && typeof value.getEntryFrame === 'function';
}

/**
 * Awaiter bookkeeping shared by the concrete awaitable kinds
 *
 * Grows while its owner is pending and is frozen once the owner completes.
 * Nothing here ever removes an awaiter.
 */
export class AwaiterSet {
  private readonly awaiters = new Set<Awaitable>();
  private frozen = false;

  view(): ReadonlySet<Awaitable> {
    return this.awaiters;
  }

  /** No-op once the owner completed */
  add(awaiter: Awaitable): void {
    if (this.frozen) return;
    this.awaiters.add(awaiter);
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.awaiters.size;
  }
}
