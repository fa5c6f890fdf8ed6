/**
 * Syntax Tree Module
 * Node ids, structure and read-only traversals
 */

export { createNodeIds, type NodeIdGenerator } from './ids.js';
export { makeNodeList, makeTerminal } from './builders.js';
export { getChildren, nodeName } from './children.js';
export {
  collectNodes,
  countNodes,
  visitNode,
  type TreeVisitor,
} from './visitor.js';
export { printTree } from './print.js';
export {
  serializeTree,
  toJsonTree,
  type JsonBranch,
  type JsonNode,
  type JsonTerminal,
  type JsonToken,
} from './json.js';
