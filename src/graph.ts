/**
 * Logical call graph construction
 *
 * Stitches the synchronous frame chain of the caller together with the
 * await relationships between suspended computations.
 */

import type { Awaitable, SchedulableUnit } from './awaitable.js';
import { AsyncGraphError, AsyncGraphInvariantError, ENTRY_POINT_NOT_FOUND, EXIT_FRAME_NOT_FOUND } from './errors.js';
import { captureFrames, type ExecutionFrame } from './frame.js';
import { getLogger, type Logger } from './logger.js';
import { chainFrames, ErrorNode, FrameNode, type AsyncGraphNode } from './nodes.js';

/**
 * Runtime hook answering "which schedulable unit is running right now"
 */
export type CurrentTaskHook = () => SchedulableUnit | null | undefined;

export type GetAsyncGraphOptions = {
  /** Frame of the diagnostic call site; defaults to the caller of getAsyncGraph */
  frame?: ExecutionFrame;
  /** Omitted, or returning nothing, means a plain stack walk */
  currentTask?: CurrentTaskHook;
  logger?: Logger;
};

/**
 * Build the logical call graph from the calling frame to the program entry
 *
 * Runs to completion without suspending: awaiter sets are read as a
 * snapshot. Returns the node at the top of the graph, i.e. the caller.
 *
 * @example
 * function printGraph() {
 *   console.log(asyncGraphToDot(getAsyncGraph({ currentTask: () => runtime.current })));
 * }
 * // printGraph -> worker -> Task<worker> -> ... -> main
 */
export function getAsyncGraph(options: GetAsyncGraphOptions = {}): AsyncGraphNode {
  const logger = options.logger ?? getLogger();
  const frame = options.frame ?? captureFrames(getAsyncGraph);
  if (frame === null) {
    throw new AsyncGraphError('Could not capture the calling frame');
  }

  // Not inside a scheduler: walk the stack the conventional way
  const currentTask = options.currentTask?.() ?? null;
  if (currentTask === null) {
    const headNode = new FrameNode(frame);
    let tailNode: AsyncGraphNode = headNode;
    for (let f = frame.caller; f !== null; f = f.caller) {
      const node = new FrameNode(f);
      tailNode.awaitedBy.add(node);
      tailNode = node;
    }
    return headNode;
  }

  const { tail: taskNode, head: taskHeadNode } = currentTask.makeAsyncGraphNodes();
  const { terminalNodes, expanded } = expandAwaiters(currentTask, taskNode, taskHeadNode);

  // Top of the graph: caller frames down to the first frame the task covers
  let headNode: AsyncGraphNode = taskHeadNode;
  let cursor: ExecutionFrame | null = frame;
  if (taskHeadNode.kind === 'frame') {
    const top = chainFrames(frame, taskHeadNode.frame);
    if (top !== null) {
      headNode = top.first;
      cursor = top.last.frame.caller;
      let tailNode: AsyncGraphNode = top.last;
      if (cursor === null) {
        logger.warn({ task: String(currentTask), exitFrame: String(taskHeadNode.frame) }, EXIT_FRAME_NOT_FOUND);
        const errorNode = new ErrorNode(EXIT_FRAME_NOT_FOUND);
        tailNode.awaitedBy.add(errorNode);
        tailNode = errorNode;
      }
      tailNode.awaitedBy.add(taskHeadNode);
    }
  }

  // Bottom of the graph: frames after the task's entry lead to the entry point
  const entryFrame = currentTask.getEntryFrame();
  let found = false;
  while (cursor !== null) {
    const f: ExecutionFrame = cursor;
    cursor = f.caller;
    if (f === entryFrame) {
      found = true;
      break;
    }
  }

  if (found) {
    const bottom = chainFrames(cursor);
    if (bottom !== null) {
      for (const terminal of terminalNodes) {
        terminal.awaitedBy.add(bottom.first);
      }
    }
  } else {
    logger.warn({ task: String(currentTask) }, ENTRY_POINT_NOT_FOUND);
    const errorNode = new ErrorNode(ENTRY_POINT_NOT_FOUND);
    for (const terminal of terminalNodes) {
      terminal.awaitedBy.add(errorNode);
    }
  }

  logger.debug(
    { task: String(currentTask), expanded, terminals: terminalNodes.size },
    'Built async graph'
  );
  return headNode;
}

/**
 * Expand every awaitable reachable from the current task, each exactly once
 *
 * The worklist is drained last-in first-out; no visiting order is implied.
 *
 * @returns Expanded nodes nothing else is waiting on, and how many awaitables
 *   were expanded (the current task included)
 */
function expandAwaiters(
  currentTask: SchedulableUnit,
  taskNode: AsyncGraphNode,
  taskHeadNode: AsyncGraphNode
): { terminalNodes: Set<AsyncGraphNode>; expanded: number } {
  const nodeQueue: AsyncGraphNode[] = [taskNode];
  const terminalNodes = new Set<AsyncGraphNode>();
  const awaitableToHeadNode = new Map<Awaitable, AsyncGraphNode>([[currentTask, taskHeadNode]]);

  for (let node = nodeQueue.pop(); node !== undefined; node = nodeQueue.pop()) {
    const awaiters = node.getAwaiters();
    if (awaiters.size === 0) {
      terminalNodes.add(node);
    }
    for (const awaiter of awaiters) {
      const known = awaitableToHeadNode.get(awaiter);
      if (known !== undefined) {
        node.awaitedBy.add(known);
        continue;
      }
      const { tail, head } = awaiter.makeAsyncGraphNodes();
      awaitableToHeadNode.set(awaiter, head);
      nodeQueue.push(tail);
      node.awaitedBy.add(head);
    }
  }

  if (terminalNodes.size === 0) {
    throw new AsyncGraphInvariantError(
      `No terminal node found while expanding awaiters of ${String(currentTask)} ` +
        `(${awaitableToHeadNode.size} awaitables expanded)`
    );
  }
  return { terminalNodes, expanded: awaitableToHeadNode.size };
}
