/**
 * JSON Serialization
 * Plain-object and string forms of a syntax tree
 */

import type { AstNode } from '../types.js';
import { getChildren, nodeName } from './children.js';

export interface JsonToken {
  readonly type: string;
  readonly lexeme: string;
  readonly line: number;
  readonly col: number;
}

export interface JsonTerminal {
  readonly id: number;
  readonly name: string;
  readonly token: JsonToken;
}

export interface JsonBranch {
  readonly id: number;
  readonly name: string;
  readonly children?: JsonNode[];
}

export type JsonNode = JsonTerminal | JsonBranch;

/**
 * Convert a node to its JSON shape.
 *
 * Terminal nodes carry their token instead of children; other nodes carry
 * `children` only when they have any.
 */
export function toJsonTree(node: AstNode): JsonNode {
  if (node.type === 'Terminal') {
    const { token } = node;
    return {
      id: node.id,
      name: node.label,
      token: {
        type: token.type,
        lexeme: token.value,
        line: token.span.start.line,
        col: token.span.start.column,
      },
    };
  }

  const children = getChildren(node);
  if (children.length === 0) {
    return { id: node.id, name: nodeName(node) };
  }
  return {
    id: node.id,
    name: nodeName(node),
    children: children.map(toJsonTree),
  };
}

/**
 * Serialize a tree to a JSON string.
 *
 * @param indent - Spaces per nesting level; 0 for a single line
 */
export function serializeTree(node: AstNode, indent = 2): string {
  return JSON.stringify(toJsonTree(node), null, indent);
}
