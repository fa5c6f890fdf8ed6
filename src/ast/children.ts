/**
 * Node Structure
 * Display names and ordered child enumeration for every node variant
 */

import type { AstNode, NodeListNode } from '../types.js';

/**
 * Human-readable variant name. Helper nodes are named by their label.
 */
export function nodeName(node: AstNode): string {
  switch (node.type) {
    case 'Terminal':
    case 'NodeList':
      return node.label;
    case 'OrIfBranch':
      return 'OrIf';
    default:
      return node.type;
  }
}

function optionalList<T extends AstNode>(
  list: NodeListNode<T> | null
): AstNode[] {
  return list ? [list] : [];
}

/**
 * Immediate children in source order.
 */
export function getChildren(node: AstNode): readonly AstNode[] {
  switch (node.type) {
    case 'Program':
      return [...node.functions, ...node.enums, ...node.statements];

    case 'Enum':
      return [node.name, node.values];

    case 'EnumValue':
      return [node.name];

    case 'Function':
      return [node.name, node.params, node.returnType, node.body];

    case 'Param':
      return [node.name, node.paramType];

    case 'VarDecl':
      return [node.varType, node.dimensions, node.variables];

    case 'VarDeclItem':
      return [node.name];

    case 'Assignment':
      return [node.value, node.target];

    case 'Print':
    case 'ExpressionStatement':
      return [node.expression];

    case 'Read':
      return [node.target];

    case 'If': {
      const children: AstNode[] = [node.condition, node.thenBranch];
      children.push(...node.orIfBranches);
      if (node.elseBranch) children.push(node.elseBranch);
      return children;
    }

    case 'OrIfBranch':
      return [node.condition, node.body];

    case 'For':
      return [node.variable, node.from, node.to, node.body];

    case 'Return':
      return node.expression ? [node.expression] : [];

    case 'Block':
      return node.statements;

    case 'BinaryExpr':
      return [node.left, node.operator, node.right];

    case 'UnaryExpr':
      return [node.operator, node.operand];

    case 'Literal':
      return [node.value];

    case 'Variable':
      return [node.name, ...optionalList(node.indices)];

    case 'Call':
      return [node.name, ...optionalList(node.args)];

    case 'Terminal':
      // Leaf node - no children
      return [];

    case 'NodeList':
      return node.nodes;

    default: {
      // Exhaustive check: if we reach here, a node type is missing
      const _exhaustive: never = node;
      throw new Error(
        `Unhandled node type: ${(_exhaustive as AstNode).type}`
      );
    }
  }
}
