/**
 * async-graph - logical call graphs across awaits
 *
 * Reconstruct the chain of stack frames and suspended computations that
 * leads from a diagnostic call back to the program entry point.
 *
 * @example
 * import { getAsyncGraph, asyncGraphToDot } from 'async-graph';
 *
 * function printGraph() {
 *   const head = getAsyncGraph({ currentTask: () => runtime.currentTask() });
 *   console.log(asyncGraphToDot(head));
 * }
 */

export type { ExecutionFrame } from './frame.js';
export { StackFrame, frameChain, framesOf, captureFrames } from './frame.js';
export type { Awaitable, AsyncSubgraph, SchedulableUnit } from './awaitable.js';
export { AwaiterSet, isSchedulableUnit } from './awaitable.js';
export { Task, Deferred, Gate } from './awaitables.js';
export type { AsyncGraphNode } from './nodes.js';
export { FrameNode, AwaitableNode, ErrorNode } from './nodes.js';
export type { CurrentTaskHook, GetAsyncGraphOptions } from './graph.js';
export { getAsyncGraph } from './graph.js';
export { asyncGraphToDot, escapeDotLabel } from './dot.js';
export { getTrace, getEdges, countNodes } from './trace.js';
export {
  AsyncGraphError,
  AsyncGraphInvariantError,
  AsyncGraphConfigError,
  EXIT_FRAME_NOT_FOUND,
  ENTRY_POINT_NOT_FOUND
} from './errors.js';
export type { AsyncGraphConfig, LogLevel } from './config.js';
export { loadConfig } from './config.js';
export type { Logger } from './logger.js';
export { createLogger, getLogger } from './logger.js';
