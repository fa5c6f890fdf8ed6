/**
 * Node Identifiers
 * Explicit id counter owned by a parse run
 */

/**
 * Source of node ids. Each call to `next()` returns a number strictly
 * greater than every previous one.
 */
export interface NodeIdGenerator {
  next(): number;
  /** Id the next call to `next()` will return */
  peek(): number;
}

/**
 * Create an id generator starting at `start`.
 *
 * Share one generator across several parses to keep ids unique within a
 * batch; create one per parse for reproducible numbering.
 */
export function createNodeIds(start = 1): NodeIdGenerator {
  let nextId = start;
  return {
    next: () => nextId++,
    peek: () => nextId,
  };
}
