/**
 * Node Id Tests
 * Uniqueness, construction order and sharing across parses
 */

import { describe, expect, it } from 'vitest';
import {
  collectNodes,
  countNodes,
  createNodeIds,
  getChildren,
  parse,
  type AstNode,
} from '../../src/index.js';

const PROGRAM = `enum Mode { FAST, SLOW }
function scale(x: real, k: int): real
begin
  return x * k;
end
int[4] v; real r;
for (i goes from 0 to 3) begin
  i -> v[i];
end for
if (v[1] > 0) print(scale(2.5, v[1])); or if (not (r = 0.0)) read(r); else print(-1);
`;

function everyNode(node: AstNode, check: (n: AstNode) => void): void {
  for (const n of collectNodes(node)) check(n);
}

describe('createNodeIds', () => {
  it('counts up from the start value', () => {
    const ids = createNodeIds(10);
    expect(ids.peek()).toBe(10);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([10, 11, 12]);
    expect(ids.peek()).toBe(13);
  });

  it('starts at 1 by default', () => {
    expect(createNodeIds().next()).toBe(1);
  });
});

describe('node ids', () => {
  it('numbers every node of a parse from 1 without gaps', () => {
    const program = parse(PROGRAM);
    const ids = collectNodes(program)
      .map((n) => n.id)
      .sort((a, b) => a - b);
    const count = countNodes(program);
    expect(ids).toEqual(Array.from({ length: count }, (_, i) => i + 1));
    expect(program.id).toBe(count);
  });

  it('builds children before their parent', () => {
    everyNode(parse(PROGRAM), (node) => {
      for (const child of getChildren(node)) {
        expect(child.id).toBeLessThan(node.id);
      }
    });
  });

  it('builds siblings in source order', () => {
    everyNode(parse(PROGRAM), (node) => {
      // Program children are grouped by kind; checked below
      if (node.type === 'Program') return;
      const childIds = getChildren(node).map((c) => c.id);
      expect(childIds).toEqual([...childIds].sort((a, b) => a - b));
    });
  });

  it('groups program children as functions, enums, statements', () => {
    const program = parse(PROGRAM);
    expect(getChildren(program).map((c) => c.type)).toEqual([
      'Function',
      'Enum',
      'VarDecl',
      'VarDecl',
      'For',
      'If',
    ]);
  });

  it('restarts numbering for each independent parse', () => {
    expect(parse('print(1);').id).toBe(parse('print(1);').id);
  });

  it('never reuses ids when parses share a generator', () => {
    const ids = createNodeIds();
    const first = parse('int a;', { ids });
    const second = parse('5 -> a;', { ids });
    const firstMax = Math.max(...collectNodes(first).map((n) => n.id));
    const secondMin = Math.min(...collectNodes(second).map((n) => n.id));
    expect(firstMax).toBe(7);
    expect(secondMin).toBe(8);
    expect(second.id).toBe(13);
    expect(ids.peek()).toBe(14);
  });
});
