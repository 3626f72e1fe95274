/**
 * Graph vertices
 *
 * Edges live in `awaitedBy` and point forward in causal time: from the
 * earlier event to whatever later depended on it. Identity is per instance.
 */

import type { Awaitable } from './awaitable.js';
import type { ExecutionFrame } from './frame.js';

const NO_AWAITERS: ReadonlySet<Awaitable> = new Set();

abstract class BaseNode {
  readonly awaitedBy = new Set<AsyncGraphNode>();

  getAwaiters(): ReadonlySet<Awaitable> {
    return NO_AWAITERS;
  }

  abstract toString(): string;
}

export class FrameNode extends BaseNode {
  readonly kind = 'frame';

  constructor(readonly frame: ExecutionFrame) {
    super();
  }

  toString(): string {
    return String(this.frame);
  }
}

export class AwaitableNode extends BaseNode {
  readonly kind = 'awaitable';

  constructor(readonly awaitable: Awaitable) {
    super();
  }

  override getAwaiters(): ReadonlySet<Awaitable> {
    return this.awaitable.getAwaiters();
  }

  toString(): string {
    return String(this.awaitable);
  }
}

/**
 * Synthetic vertex marking a place where linkage could not be established
 */
export class ErrorNode extends BaseNode {
  readonly kind = 'error';
  private readonly awaiters: ReadonlySet<Awaitable>;

  constructor(readonly text: string, awaiters?: ReadonlySet<Awaitable>) {
    super();
    this.awaiters = awaiters ?? new Set();
  }

  override getAwaiters(): ReadonlySet<Awaitable> {
    return this.awaiters;
  }

  toString(): string {
    return this.text;
  }
}

export type AsyncGraphNode = FrameNode | AwaitableNode | ErrorNode;

/**
 * Chain frames innermost to outermost as FrameNodes, stopping before `until`
 *
 * @returns First and last node of the chain, or null when it is empty
 */
export function chainFrames(
  from: ExecutionFrame | null,
  until: ExecutionFrame | null = null
): { first: FrameNode; last: FrameNode } | null {
  let first: FrameNode | null = null;
  let last: FrameNode | null = null;

  for (let frame = from; frame !== null && frame !== until; frame = frame.caller) {
    const node = new FrameNode(frame);
    if (last === null) {
      first = node;
    } else {
      last.awaitedBy.add(node);
    }
    last = node;
  }

  return first && last ? { first, last } : null;
}
