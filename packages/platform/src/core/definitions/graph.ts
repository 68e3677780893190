/**
 * Graph helpers shared by the validator and the analysis module.
 * Nodes are plain names; edges are adjacency lists keyed by node.
 */

export type Adjacency = ReadonlyMap<string, readonly string[]>;

/**
 * Finds cycles with a depth-first search that keeps the current path on a
 * stack. An edge back into the stack closes a cycle.
 *
 * Each cycle is returned as the path from its first node back to that same
 * node (e.g., ["A", "B", "A"]). A node with an edge to itself yields
 * ["A", "A"]. Edges to nodes outside `nodes` are ignored.
 */
export function findCycles(nodes: readonly string[], edges: Adjacency): string[][] {
  const known = new Set(nodes);
  const finished = new Set<string>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  function visit(node: string) {
    stack.push(node);
    onStack.add(node);

    for (const next of edges.get(node) ?? []) {
      if (!known.has(next) || finished.has(next)) continue;
      if (onStack.has(next)) {
        cycles.push([...stack.slice(stack.indexOf(next)), next]);
        continue;
      }
      visit(next);
    }

    stack.pop();
    onStack.delete(node);
    finished.add(node);
  }

  for (const node of nodes) {
    if (!finished.has(node)) visit(node);
  }

  return cycles;
}

/**
 * Every node reachable from `start` (inclusive), breadth first.
 */
export function reachableFrom(start: string, edges: Adjacency): Set<string> {
  const seen = new Set<string>([start]);
  const queue = [start];

  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    for (const next of edges.get(node) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }

  return seen;
}
