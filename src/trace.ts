/**
 * Graph inspection utilities
 *
 * Extract readable structure from an async graph for debugging and tests.
 */

import type { AsyncGraphNode } from './nodes.js';

/**
 * Visit every node reachable from `head` once, nearest first
 */
function walk(head: AsyncGraphNode, visit: (node: AsyncGraphNode) => void): void {
  const visited = new Set<AsyncGraphNode>([head]);
  const queue: AsyncGraphNode[] = [head];

  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    visit(node);
    for (const next of node.awaitedBy) {
      // Shared sub-graphs and cycles are entered once
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
}

/**
 * Get the labels of every node reachable from `head`
 *
 * Shared nodes appear only once.
 *
 * @example
 * const path = getTrace(getAsyncGraph({ frame }));
 * // ['printGraph', 'worker', 'main']
 */
export function getTrace(head: AsyncGraphNode): string[] {
  const path: string[] = [];
  walk(head, (node) => path.push(String(node)));
  return path;
}

/**
 * Get graph edges as [from, to] label pairs
 *
 * @example
 * const edges = getEdges(head);
 * // [['printGraph', 'worker'], ['worker', 'main']]
 */
export function getEdges(head: AsyncGraphNode): Array<[string, string]> {
  const edges: Array<[string, string]> = [];
  walk(head, (node) => {
    for (const next of node.awaitedBy) {
      edges.push([String(node), String(next)]);
    }
  });
  return edges;
}

export function countNodes(head: AsyncGraphNode): number {
  let count = 0;
  walk(head, () => {
    count += 1;
  });
  return count;
}
