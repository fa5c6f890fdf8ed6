/**
 * Parser Tests: Declarations
 * Variables, arrays, enums and functions
 */

import { describe, expect, it } from 'vitest';
import { parse, printTree } from '../../src/index.js';
import { onlyStatement, parseError } from '../helpers/parse.js';

describe('variable declarations', () => {
  it('parses a multi-variable declaration', () => {
    const program = parse('int a, b;');
    expect(printTree(program)).toBe(
      [
        'Program (ID: 9)',
        '  VarDecl (ID: 8)',
        '    Type (ID: 1)',
        '    Dimensions (ID: 2)',
        '    Variables (ID: 7)',
        '      VarDeclItem (ID: 4)',
        '        VarName (ID: 3)',
        '      VarDeclItem (ID: 6)',
        '        VarName (ID: 5)',
      ].join('\n')
    );
  });

  it('parses array dimensions as integer literals', () => {
    const statement = onlyStatement('real[3][4] m;');
    expect(statement).toMatchObject({
      type: 'VarDecl',
      varType: { label: 'Type', token: { type: 'REAL', value: 'real' } },
      dimensions: {
        label: 'Dimensions',
        nodes: [
          { type: 'Literal', kind: 'int', value: { token: { value: '3' } } },
          { type: 'Literal', kind: 'int', value: { token: { value: '4' } } },
        ],
      },
      variables: {
        nodes: [{ type: 'VarDeclItem', name: { token: { value: 'm' } } }],
      },
    });
  });

  it('rejects a dimension that is not an integer literal', () => {
    const err = parseError('int[n] m;');
    expect(err.code).toBe('PARSE_INVALID_DIMENSION');
    expect(err.message).toBe(
      'Expected integer literal for array dimension at 1:5'
    );
    expect(err.errorToken.value).toBe('n');
    expect(err.lastToken.value).toBe('[');
  });

  it('reports a missing variable name at the semicolon', () => {
    const err = parseError('int ;');
    expect(err.message).toBe('Expected variable name at 1:5');
    expect(err.errorToken.type).toBe('SEMICOLON');
    expect(err.errorToken.span.start).toEqual({
      line: 1,
      column: 5,
      offset: 4,
    });
    expect(err.lastToken.type).toBe('INT');
    expect(err.lastToken.span.start).toEqual({
      line: 1,
      column: 1,
      offset: 0,
    });
    expect(err.toData()).toEqual({
      code: 'PARSE_UNEXPECTED_TOKEN',
      message: 'Expected variable name',
      location: { line: 1, column: 5, offset: 4 },
      context: { expected: 'Expected variable name', found: ';' },
    });
  });
});

describe('enum declarations', () => {
  it('allows a type marker right after the closing brace', () => {
    const program = parse('enum Color { RED, GREEN, BLUE }\nint x;');
    expect(program.enums).toHaveLength(1);
    expect(program.statements).toHaveLength(1);
    expect(program.enums[0]).toMatchObject({
      type: 'Enum',
      id: 9,
      name: { label: 'EnumName', token: { value: 'Color' } },
      values: {
        id: 8,
        label: 'Values',
        nodes: [
          { type: 'EnumValue', id: 3, name: { id: 2, token: { value: 'RED' } } },
          { type: 'EnumValue', id: 5, name: { id: 4, token: { value: 'GREEN' } } },
          { type: 'EnumValue', id: 7, name: { id: 6, token: { value: 'BLUE' } } },
        ],
      },
    });
    expect(program.statements[0]).toMatchObject({ type: 'VarDecl', id: 15 });
  });

  it('accepts an explicit semicolon and an empty value list', () => {
    const program = parse('enum E {};');
    expect(program.enums[0]?.values.nodes).toEqual([]);
    expect(program.statements).toEqual([]);
  });

  it('allows end of input, function or enum after the brace', () => {
    expect(parse('enum A { X }').enums).toHaveLength(1);
    expect(parse('enum A { X } enum B { Y }').enums).toHaveLength(2);
    expect(
      parse('enum A { X } function f(): int return 1;').functions
    ).toHaveLength(1);
  });

  it('requires a semicolon before other statements', () => {
    const err = parseError('enum E { A } print(1);');
    expect(err.message).toBe(
      "Expected ';' after enum declaration. Hint: Missing ';' at end of statement at 1:14"
    );
    expect(err.lastToken.type).toBe('RBRACE');
    expect(err.errorToken.type).toBe('PRINT');
  });
});

describe('function declarations', () => {
  it('parses begin-wrapped and bare forms to the same node', () => {
    const wrapped = parse('begin function f(): int return 1; end function');
    const bare = parse('function f(): int return 1; end function');
    expect(printTree(wrapped)).toBe(printTree(bare));
    expect(printTree(bare)).toBe(
      [
        'Program (ID: 8)',
        '  Function (ID: 7)',
        '    FunctionName (ID: 1)',
        '    Params (ID: 2)',
        '    ReturnType (ID: 3)',
        '    Return (ID: 6)',
        '      Literal (ID: 5)',
        '        Value (ID: 4)',
      ].join('\n')
    );
  });

  it('makes end function optional without begin', () => {
    const program = parse('function f(): int return 1;\nprint(2);');
    expect(program.functions).toHaveLength(1);
    expect(program.statements).toHaveLength(1);
  });

  it('parses typed parameters', () => {
    const program = parse(
      'function add(x: int, y: real): real begin return x + y; end'
    );
    expect(program.functions[0]).toMatchObject({
      name: { token: { value: 'add' } },
      params: {
        nodes: [
          {
            type: 'Param',
            name: { label: 'ParamName', token: { value: 'x' } },
            paramType: { label: 'ParamType', token: { type: 'INT' } },
          },
          {
            type: 'Param',
            name: { token: { value: 'y' } },
            paramType: { token: { type: 'REAL' } },
          },
        ],
      },
      returnType: { token: { type: 'REAL' } },
      body: { type: 'Block' },
    });
  });

  it('lets the parameter list be omitted', () => {
    const program = parse(
      'begin function ready: bool begin return true; end function'
    );
    expect(program.functions[0]?.params.nodes).toEqual([]);
    expect(program.functions[0]?.body.type).toBe('Block');
  });

  it('requires function after end in the begin form', () => {
    const err = parseError('begin function f(): int return 1; end');
    expect(err.message).toBe("Expected 'function' after 'end' at 1:35");
    expect(err.errorToken.type).toBe('END');
    expect(err.lastToken.type).toBe('END');
  });

  it('requires end in the begin form when the body is not a block', () => {
    const err = parseError('begin function f(): int return 1; print(1);');
    expect(err.message).toBe("Expected 'end' after function body at 1:35");
    expect(err.errorToken.type).toBe('PRINT');
  });

  it('rejects an unknown return type', () => {
    const err = parseError('function f(): string return 1;');
    expect(err.code).toBe('PARSE_EXPECTED_TYPE');
    expect(err.message).toBe('Expected type (int, real or bool) at 1:15');
    expect(err.errorToken.value).toBe('string');
    expect(err.lastToken.type).toBe('COLON');
  });
});
