/**
 * GraphViz rendering
 */

import type { AsyncGraphNode } from './nodes.js';

/**
 * Escape a label for a double-quoted dot string
 */
export function escapeDotLabel(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r\n|\r|\n/g, '\\n');
}

/**
 * Render a graph as a GraphViz dot document
 *
 * Every reachable node is emitted once and every edge once; shared
 * sub-graphs and cycles are visited a single time. Ids are assigned on
 * first encounter, starting at 1.
 *
 * @example
 * asyncGraphToDot(getAsyncGraph());
 * // digraph {
 * //   n1 [label="printGraph" shape=box];
 * // n1 -> n2;
 * // ...
 * // }
 */
export function asyncGraphToDot(head: AsyncGraphNode): string {
  const lines: string[] = ['digraph {'];
  const seen = new Set<AsyncGraphNode>();
  const nodeIds = new Map<AsyncGraphNode, number>();

  const nodeId = (node: AsyncGraphNode): number => {
    let id = nodeIds.get(node);
    if (id === undefined) {
      id = nodeIds.size + 1;
      nodeIds.set(node, id);
    }
    return id;
  };

  const queue: AsyncGraphNode[] = [head];
  for (let node = queue.pop(); node !== undefined; node = queue.pop()) {
    if (seen.has(node)) continue;
    seen.add(node);

    lines.push(`  n${nodeId(node)} [label="${escapeDotLabel(String(node))}" shape=box];`);
    for (const child of node.awaitedBy) {
      queue.push(child);
      lines.push(`n${nodeId(node)} -> n${nodeId(child)};`);
    }
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}
