/**
 * Parser Tests: Statements
 * Assignment, I/O, return, blocks and expression statements
 */

import { describe, expect, it } from 'vitest';
import { parse, printTree } from '../../src/index.js';
import { onlyStatement, parseError } from '../helpers/parse.js';

describe('assignment', () => {
  it('puts the value first and the target second', () => {
    expect(onlyStatement('5 -> a;')).toMatchObject({
      type: 'Assignment',
      value: {
        type: 'Literal',
        kind: 'int',
        value: { token: { value: '5' } },
      },
      target: {
        type: 'Variable',
        name: { label: 'VarName', token: { value: 'a' } },
        indices: null,
      },
    });
  });

  it('renders value before target', () => {
    expect(printTree(parse('5 -> a;'))).toBe(
      [
        'Program (ID: 6)',
        '  Assignment (ID: 5)',
        '    Literal (ID: 2)',
        '      Value (ID: 1)',
        '    Variable (ID: 4)',
        '      VarName (ID: 3)',
      ].join('\n')
    );
  });

  it('accepts array elements on both sides', () => {
    expect(onlyStatement('m[i] -> m[i + 1];')).toMatchObject({
      type: 'Assignment',
      value: { type: 'Variable', indices: { nodes: [{ type: 'Variable' }] } },
      target: {
        type: 'Variable',
        indices: { label: 'Indices', nodes: [{ type: 'BinaryExpr', op: '+' }] },
      },
    });
  });

  it('hints at a missing semicolon before the next statement', () => {
    const err = parseError('1 -> a print(a);');
    expect(err.message).toBe(
      "Expected ';' after assignment. Hint: Missing ';' at end of statement at 1:8"
    );
    expect(err.lastToken.value).toBe('a');
    expect(err.errorToken.value).toBe('print');
  });
});

describe('print and read', () => {
  it('parses print with an expression', () => {
    expect(onlyStatement('print(a + 1);')).toMatchObject({
      type: 'Print',
      expression: { type: 'BinaryExpr', op: '+' },
    });
  });

  it('parses read with a target', () => {
    expect(onlyStatement('read(v[2]);')).toMatchObject({
      type: 'Read',
      target: { type: 'Variable', name: { token: { value: 'v' } } },
    });
  });

  it("requires '(' after print", () => {
    const err = parseError('print 1;');
    expect(err.message).toBe("Expected '(' after 'print' at 1:7");
  });

  it('requires a semicolon after read', () => {
    const err = parseError('read(x)');
    expect(err.message).toBe("Expected ';' after read statement at 1:7");
    expect(err.errorToken.value).toBe(')');
  });
});

describe('return', () => {
  it('omits the value before a semicolon', () => {
    expect(onlyStatement('return;')).toMatchObject({
      type: 'Return',
      expression: null,
    });
  });

  it('drops the semicolon at end of input', () => {
    expect(onlyStatement('return x * 2')).toMatchObject({
      type: 'Return',
      expression: { type: 'BinaryExpr', op: '*' },
    });
  });

  it('drops value and semicolon before end', () => {
    expect(onlyStatement('begin return end')).toMatchObject({
      type: 'Block',
      statements: [{ type: 'Return', expression: null }],
    });
  });

  it('requires a semicolon before other statements', () => {
    const err = parseError('return 1 print(1);');
    expect(err.message).toBe(
      "Expected ';' after return statement. Hint: Missing ';' at end of statement at 1:10"
    );
  });
});

describe('blocks', () => {
  it('collects statements until end', () => {
    const block = onlyStatement('begin int a; 1 -> a; print(a); end');
    expect(block.type).toBe('Block');
    if (block.type !== 'Block') return;
    expect(block.statements.map((s) => s.type)).toEqual([
      'VarDecl',
      'Assignment',
      'Print',
    ]);
  });

  it('nests blocks', () => {
    expect(onlyStatement('begin begin end end')).toMatchObject({
      type: 'Block',
      statements: [{ type: 'Block', statements: [] }],
    });
  });

  it('reports an unclosed block at the last token', () => {
    const err = parseError('begin print(1);');
    expect(err.message).toBe(
      "Expected 'end'. Hint: Check for a 'begin' without matching 'end' at 1:15"
    );
    expect(err.errorToken.value).toBe(';');
    expect(err.lastToken.value).toBe(';');
  });
});

describe('expression statements', () => {
  it('wraps a bare call', () => {
    expect(onlyStatement('f(1);')).toMatchObject({
      type: 'ExpressionStatement',
      expression: { type: 'Call', name: { token: { value: 'f' } } },
    });
  });

  it('keeps top-level statements in source order', () => {
    const program = parse('int a; read(a); print(a);');
    expect(program.statements.map((s) => s.type)).toEqual([
      'VarDecl',
      'Read',
      'Print',
    ]);
  });
});
