/** Outcome of a single depth-first pass over an index-based adjacency list. */
export type TraversalResult =
  | { readonly acyclic: true; readonly order: readonly number[] }
  | { readonly acyclic: false; readonly cycle: readonly number[] };

const UNVISITED = 0;
const ON_STACK = 1;
const DONE = 2;

/**
 * Runs one three-colour depth-first search computing both the cycle check and
 * the topological order. Roots are taken in index order and successors in
 * adjacency order, so the result is deterministic for a given insertion
 * history.
 *
 * The first back edge found (an edge to a vertex still on the stack) ends the
 * pass; the cycle runs from that vertex down the active path and repeats it at
 * the end. Without a back edge the reverse postorder is a topological order.
 *
 * The active path is kept on an explicit stack so deep chains do not exhaust
 * the call stack.
 */
export function depthFirstPass(adjacency: ReadonlyArray<readonly number[]>): TraversalResult {
  const state = new Uint8Array(adjacency.length);
  const postorder: number[] = [];
  const path: number[] = [];
  const cursors: number[] = [];

  for (let root = 0; root < adjacency.length; root += 1) {
    if (state[root] !== UNVISITED) {
      continue;
    }
    state[root] = ON_STACK;
    path.push(root);
    cursors.push(0);

    while (path.length > 0) {
      const depth = path.length - 1;
      const vertex = path[depth];
      const successors = adjacency[vertex];
      const cursor = cursors[depth];

      if (cursor < successors.length) {
        cursors[depth] = cursor + 1;
        const next = successors[cursor];
        if (state[next] === ON_STACK) {
          const start = path.indexOf(next);
          return { acyclic: false, cycle: [...path.slice(start), next] };
        }
        if (state[next] === UNVISITED) {
          state[next] = ON_STACK;
          path.push(next);
          cursors.push(0);
        }
        continue;
      }

      state[vertex] = DONE;
      postorder.push(vertex);
      path.pop();
      cursors.pop();
    }
  }

  return { acyclic: true, order: postorder.reverse() };
}
