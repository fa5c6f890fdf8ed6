/**
 * Parser Tests: Expressions
 * Precedence, associativity, unary operators and primaries
 */

import { describe, expect, it } from 'vitest';
import {
  getChildren,
  nodeName,
  parse,
  printTree,
  type ExpressionNode,
} from '../../src/index.js';
import { onlyStatement, parseError } from '../helpers/parse.js';

/** Parse `<source>;` and return the statement's expression */
function expr(source: string): ExpressionNode {
  const statement = onlyStatement(`${source};`);
  if (statement.type !== 'ExpressionStatement') {
    throw new Error(`Not an expression statement: ${source}`);
  }
  return statement.expression;
}

describe('precedence', () => {
  it('binds multiplication tighter than addition', () => {
    expect(expr('2 + 3 * 4')).toMatchObject({
      type: 'BinaryExpr',
      op: '+',
      left: { type: 'Literal', value: { token: { value: '2' } } },
      right: {
        type: 'BinaryExpr',
        op: '*',
        left: { type: 'Literal', value: { token: { value: '3' } } },
        right: { type: 'Literal', value: { token: { value: '4' } } },
      },
    });
  });

  it('places the product as the right child of the sum', () => {
    expect(printTree(parse('2 + 3 * 4;'))).toBe(
      [
        'Program (ID: 12)',
        '  ExpressionStatement (ID: 11)',
        '    BinaryExpr (ID: 10)',
        '      Literal (ID: 2)',
        '        Value (ID: 1)',
        '      Operator (ID: 3)',
        '      BinaryExpr (ID: 9)',
        '        Literal (ID: 5)',
        '          Value (ID: 4)',
        '        Operator (ID: 6)',
        '        Literal (ID: 8)',
        '          Value (ID: 7)',
      ].join('\n')
    );
  });

  it('overrides precedence with parentheses', () => {
    expect(expr('(2 + 3) * 4')).toMatchObject({
      op: '*',
      left: { type: 'BinaryExpr', op: '+' },
      right: { type: 'Literal' },
    });
  });

  it('orders or, and, equality and relational levels', () => {
    expect(expr('a or b and c = d')).toMatchObject({
      op: 'or',
      left: { type: 'Variable' },
      right: {
        op: 'and',
        left: { type: 'Variable' },
        right: { op: '=' },
      },
    });
    expect(expr('a < b + 1 != c')).toMatchObject({
      op: '!=',
      left: { op: '<', right: { op: '+' } },
      right: { type: 'Variable' },
    });
  });

  it('keeps operator tokens as Operator terminals', () => {
    const node = expr('x >= 0');
    expect(getChildren(node).map(nodeName)).toEqual([
      'Variable',
      'Operator',
      'Literal',
    ]);
    expect(node).toMatchObject({
      op: '>=',
      operator: { token: { type: 'GE', value: '>=' } },
    });
  });
});

describe('associativity', () => {
  it('groups subtraction to the left', () => {
    expect(expr('1 - 2 - 3')).toMatchObject({
      op: '-',
      left: { op: '-', right: { value: { token: { value: '2' } } } },
      right: { value: { token: { value: '3' } } },
    });
  });

  it('groups multiplicative operators to the left', () => {
    expect(expr('a * b % c / d')).toMatchObject({
      op: '/',
      left: { op: '%', left: { op: '*' } },
    });
  });
});

describe('unary operators', () => {
  it('nests repeated negation', () => {
    expect(expr('- - 1')).toMatchObject({
      type: 'UnaryExpr',
      op: '-',
      operand: {
        type: 'UnaryExpr',
        op: '-',
        operand: { type: 'Literal' },
      },
    });
  });

  it('binds tighter than binary operators', () => {
    expect(expr('not a and b')).toMatchObject({
      op: 'and',
      left: { type: 'UnaryExpr', op: 'not', operand: { type: 'Variable' } },
    });
    expect(expr('-a * b')).toMatchObject({
      op: '*',
      left: { type: 'UnaryExpr', op: '-' },
    });
  });
});

describe('primaries', () => {
  it('classifies literal kinds', () => {
    expect(expr('7')).toMatchObject({ type: 'Literal', kind: 'int' });
    expect(expr('2.5')).toMatchObject({ type: 'Literal', kind: 'real' });
    expect(expr('false')).toMatchObject({ type: 'Literal', kind: 'bool' });
  });

  it('parses calls with arguments', () => {
    const call = expr('f(1, x)');
    expect(call).toMatchObject({
      type: 'Call',
      name: { label: 'FunctionName', token: { value: 'f' } },
      args: {
        label: 'Arguments',
        nodes: [{ type: 'Literal' }, { type: 'Variable' }],
      },
    });
    expect(getChildren(call).map(nodeName)).toEqual([
      'FunctionName',
      'Arguments',
    ]);
  });

  it('leaves out the argument list of an empty call', () => {
    const call = expr('f()');
    expect(call).toMatchObject({ type: 'Call', args: null });
    expect(getChildren(call).map(nodeName)).toEqual(['FunctionName']);
  });

  it('parses nested calls', () => {
    expect(expr('g(h(1)) + 2')).toMatchObject({
      op: '+',
      left: {
        type: 'Call',
        args: { nodes: [{ type: 'Call', name: { token: { value: 'h' } } }] },
      },
    });
  });

  it('parses multi-dimensional array access', () => {
    const access = expr('m[i][j + 1]');
    expect(access).toMatchObject({
      type: 'Variable',
      indices: {
        nodes: [{ type: 'Variable' }, { type: 'BinaryExpr', op: '+' }],
      },
    });
    expect(getChildren(access).map(nodeName)).toEqual(['VarName', 'Indices']);
  });
});

describe('expression errors', () => {
  it('rejects a missing operand', () => {
    const err = parseError('print();');
    expect(err.code).toBe('PARSE_EXPECTED_EXPRESSION');
    expect(err.message).toBe('Expected expression at 1:7');
    expect(err.errorToken.value).toBe(')');
    expect(err.lastToken.value).toBe('(');
  });

  it('hints at an unclosed parenthesis at end of input', () => {
    const err = parseError('print(1');
    expect(err.message).toBe(
      "Expected ')' after expression. Hint: Check for unclosed parenthesis at 1:7"
    );
    expect(err.errorToken.value).toBe('1');
    expect(err.lastToken.value).toBe('1');
  });

  it('requires a closing bracket after an index', () => {
    expect(parseError('m[1;').message).toBe("Expected ']' after index at 1:4");
  });

  it('requires a closing parenthesis after arguments', () => {
    expect(parseError('f(1;').message).toBe(
      "Expected ')' after arguments at 1:4"
    );
  });
});
