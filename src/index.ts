/**
 * begend Module
 * Exports lexer, parser, syntax-tree traversals and types
 */

export { LexerError, tokenize } from './lexer/index.js';
export {
  parse,
  parseTokens,
  Parser,
  type ParseOptions,
} from './parser/index.js';

// ============================================================
// SYNTAX TREE
// ============================================================
export {
  collectNodes,
  countNodes,
  createNodeIds,
  getChildren,
  nodeName,
  printTree,
  serializeTree,
  toJsonTree,
  visitNode,
  type JsonBranch,
  type JsonNode,
  type JsonTerminal,
  type JsonToken,
  type NodeIdGenerator,
  type TreeVisitor,
} from './ast/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type BegendConfig,
  type OutputConfig,
} from './config.js';

export * from './types.js';
