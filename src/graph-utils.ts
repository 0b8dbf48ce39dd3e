/**
 * Cycle-safe traversal helpers shared by rule sets and flows.
 *
 * All walks are iterative and guarded by a visited set, so self-loops and
 * cycles back to the start terminate.
 */

export type Neighbours<T> = (node: T) => Iterable<T>;

export type WalkOptions<T> = {
  /**
   * Nodes matching this predicate are collected but never expanded.
   * Used to stop at start nodes reached through a cycle.
   */
  stopAt?: (node: T) => boolean;
};

/**
 * Collects every node reachable from `start` by one or more steps.
 * `start` itself is only included when a cycle leads back to it.
 */
export function walk<T>(
  start: T,
  next: Neighbours<T>,
  options: WalkOptions<T> = {}
): Set<T> {
  const visited = new Set<T>();
  const stack: T[] = [start];

  let node = stack.pop();
  while (node !== undefined) {
    for (const neighbour of next(node)) {
      if (visited.has(neighbour)) continue;
      visited.add(neighbour);
      if (options.stopAt && options.stopAt(neighbour)) continue;
      stack.push(neighbour);
    }
    node = stack.pop();
  }

  return visited;
}

/**
 * Every node reachable from any of `starts`, the starts included
 */
export function reachableFrom<T>(
  starts: Iterable<T>,
  next: Neighbours<T>
): Set<T> {
  const result = new Set<T>();
  for (const start of starts) {
    if (result.has(start)) continue;
    result.add(start);
    for (const node of walk(start, next)) result.add(node);
  }
  return result;
}

/**
 * Whether `target` can be reached from `from` (a node always reaches itself)
 */
export function isReachable<T>(from: T, target: T, next: Neighbours<T>): boolean {
  return from === target || walk(from, next).has(target);
}

/**
 * Strict descendants/ancestors: the walk result without the start node
 */
export function related<T>(
  start: T,
  next: Neighbours<T>,
  options: WalkOptions<T> = {}
): Set<T> {
  const result = walk(start, next, options);
  result.delete(start);
  return result;
}
