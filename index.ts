/**
 * async-graph - logical call graphs across awaits
 *
 * Build the await graph from any call site and render it for GraphViz.
 *
 * @example
 * import { getAsyncGraph, asyncGraphToDot } from 'async-graph';
 *
 * console.log(asyncGraphToDot(getAsyncGraph()));
 */

export * from './src/index.js';
