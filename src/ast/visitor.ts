/**
 * AST Visitor
 * Recursive traversal with enter/exit callbacks.
 */

import type { AstNode } from '../types.js';
import { getChildren } from './children.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Visitor pattern interface for syntax-tree traversal.
 * Callbacks receive the node's depth (0 for the node traversal started at).
 */
export interface TreeVisitor {
  /** Called before visiting node's children */
  enter(node: AstNode, depth: number): void;

  /** Called after visiting node's children */
  exit?(node: AstNode, depth: number): void;
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Visit a node and its descendants in source order.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode(
  node: AstNode,
  visitor: TreeVisitor,
  depth = 0
): void {
  visitor.enter(node, depth);
  for (const child of getChildren(node)) {
    visitNode(child, visitor, depth + 1);
  }
  visitor.exit?.(node, depth);
}

/** Count nodes in a subtree, including the root */
export function countNodes(node: AstNode): number {
  let count = 0;
  visitNode(node, {
    enter: () => {
      count++;
    },
  });
  return count;
}

/** Collect every node of a subtree in pre-order */
export function collectNodes(node: AstNode): AstNode[] {
  const nodes: AstNode[] = [];
  visitNode(node, {
    enter: (n) => {
      nodes.push(n);
    },
  });
  return nodes;
}
