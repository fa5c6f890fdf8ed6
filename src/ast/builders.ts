/**
 * Helper Node Builders
 * Terminal and list-wrapper construction
 */

import type { NodeListNode, TerminalNode, Token } from '../types.js';
import type { NodeIdGenerator } from './ids.js';

export function makeTerminal(
  ids: NodeIdGenerator,
  token: Token,
  label: string
): TerminalNode {
  return { type: 'Terminal', id: ids.next(), label, token };
}

/** Wrap already-built siblings; the wrapper's id follows theirs */
export function makeNodeList<T>(
  ids: NodeIdGenerator,
  label: string,
  nodes: readonly T[]
): NodeListNode<T> {
  return { type: 'NodeList', id: ids.next(), label, nodes };
}
