/**
 * Concrete awaitable kinds
 *
 * Records the host runtime fills in while it schedules work. They hold no
 * scheduling logic of their own: the runtime registers awaiters, saves frames
 * and marks completion.
 */

import { AwaiterSet } from './awaitable.js';
import type { Awaitable, AsyncSubgraph, SchedulableUnit } from './awaitable.js';
import type { ExecutionFrame } from './frame.js';
import { AwaitableNode, FrameNode } from './nodes.js';

/**
 * Schedulable unit
 *
 * Expands to its saved call stack, innermost frame first, followed by a
 * vertex for the task itself.
 *
 * @example
 * const worker = new Task('worker').suspendAt(innerFrame, workerFrame);
 * const { tail, head } = worker.makeAsyncGraphNodes();
 * // head: FrameNode(innerFrame) -> ... -> FrameNode(workerFrame) -> tail
 */
export class Task implements SchedulableUnit {
  private readonly awaiters = new AwaiterSet();
  private innerFrame: ExecutionFrame | null = null;
  private entryFrame: ExecutionFrame | null = null;

  constructor(readonly label: string) {}

  /**
   * Record where the task's computation currently stands
   *
   * @param inner - Innermost saved (or running) frame
   * @param entry - Frame of the task's own computation; defaults to `inner`
   */
  suspendAt(inner: ExecutionFrame, entry: ExecutionFrame = inner): this {
    this.innerFrame = inner;
    this.entryFrame = entry;
    return this;
  }

  complete(): void {
    this.awaiters.freeze();
  }

  get done(): boolean {
    return this.awaiters.isFrozen;
  }

  getEntryFrame(): ExecutionFrame | null {
    return this.entryFrame;
  }

  getAwaiters(): ReadonlySet<Awaitable> {
    return this.awaiters.view();
  }

  addAwaiter(awaiter: Awaitable): void {
    this.awaiters.add(awaiter);
  }

  makeAsyncGraphNodes(): AsyncSubgraph {
    const taskNode = new AwaitableNode(this);
    let head: FrameNode | null = null;
    let last: FrameNode | null = null;

    // Entry frame missing from the chain: keep going to the end of it
    for (let frame = this.innerFrame; frame !== null; frame = frame.caller) {
      const node = new FrameNode(frame);
      if (last === null) {
        head = node;
      } else {
        last.awaitedBy.add(node);
      }
      last = node;
      if (frame === this.entryFrame) break;
    }

    if (head === null || last === null) {
      return { tail: taskNode, head: taskNode };
    }
    last.awaitedBy.add(taskNode);
    return { tail: taskNode, head };
  }

  toString(): string {
    return `Task<${this.label}>`;
  }
}

/**
 * Deferred result: a value that becomes available later
 */
export class Deferred<T = unknown> implements Awaitable {
  private readonly awaiters = new AwaiterSet();
  private settled: { value: T } | null = null;

  constructor(readonly label: string) {}

  resolve(value: T): void {
    if (this.settled) return;
    this.settled = { value };
    this.awaiters.freeze();
  }

  get done(): boolean {
    return this.settled !== null;
  }

  get value(): T | undefined {
    return this.settled?.value;
  }

  getAwaiters(): ReadonlySet<Awaitable> {
    return this.awaiters.view();
  }

  addAwaiter(awaiter: Awaitable): void {
    this.awaiters.add(awaiter);
  }

  makeAsyncGraphNodes(): AsyncSubgraph {
    const node = new AwaitableNode(this);
    return { tail: node, head: node };
  }

  toString(): string {
    return `Deferred<${this.label}>`;
  }
}

/**
 * Synchronization point released once `parties` arrivals are counted
 */
export class Gate implements Awaitable {
  private readonly awaiters = new AwaiterSet();
  private arrived = 0;

  constructor(readonly label: string, readonly parties: number) {
    if (!Number.isInteger(parties) || parties < 1) {
      throw new RangeError(`Gate parties must be a positive integer, got ${parties}`);
    }
  }

  /**
   * Count one arrival
   *
   * @returns true when this arrival opened the gate
   */
  arrive(): boolean {
    if (this.open) return false;
    this.arrived += 1;
    if (this.open) {
      this.awaiters.freeze();
      return true;
    }
    return false;
  }

  get open(): boolean {
    return this.arrived >= this.parties;
  }

  getAwaiters(): ReadonlySet<Awaitable> {
    return this.awaiters.view();
  }

  addAwaiter(awaiter: Awaitable): void {
    this.awaiters.add(awaiter);
  }

  makeAsyncGraphNodes(): AsyncSubgraph {
    const node = new AwaitableNode(this);
    return { tail: node, head: node };
  }

  toString(): string {
    return `Gate<${this.label}, parties=${this.parties}>`;
  }
}
