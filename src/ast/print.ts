/**
 * Tree Printer
 * Hierarchical text rendering of a syntax tree
 */

import type { AstNode } from '../types.js';
import { nodeName } from './children.js';
import { visitNode } from './visitor.js';

const INDENT = '  ';

/**
 * Render `<name> (ID: <id>)` per node, one node per line, indented two
 * spaces per level of depth below `node`.
 */
export function printTree(node: AstNode): string {
  const lines: string[] = [];
  visitNode(node, {
    enter(n, depth) {
      lines.push(`${INDENT.repeat(depth)}${nodeName(n)} (ID: ${n.id})`);
    },
  });
  return lines.join('\n');
}
