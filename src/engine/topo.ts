import type { NodeStore } from "./node-store";

interface Frame {
  index: number;
  cursor: number;
  parents: number[];
}

/**
 * Depth-first post-order over the parent relation starting at `root`.
 *
 * A node is marked visited when first entered and emitted once all of its
 * parents have been emitted, so every node appears after its parents and
 * shared ancestors appear once. Uses an explicit stack; the order matches
 * the recursive formulation (parents in operand order).
 *
 * Caller must hold the arena's access window.
 */
export function topologicalIndices(store: NodeStore, root: number): number[] {
  const ids = store.columns.ids;
  const order: number[] = [];
  const visited = new Set<number>([ids[root]]);
  const stack: Frame[] = [{ index: root, cursor: 0, parents: store.parentsOf(root) }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.cursor < frame.parents.length) {
      const parent = frame.parents[frame.cursor];
      frame.cursor += 1;
      const id = ids[parent];
      if (!visited.has(id)) {
        visited.add(id);
        stack.push({ index: parent, cursor: 0, parents: store.parentsOf(parent) });
      }
      continue;
    }
    stack.pop();
    order.push(frame.index);
  }

  return order;
}
