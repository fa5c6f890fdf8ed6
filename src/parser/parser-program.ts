/**
 * Parser Extension: Program Parsing
 * Top-level loop, function and enum declarations
 */

import { Parser } from './parser.js';
import { makeNodeList, makeTerminal } from '../ast/builders.js';
import type {
  EnumNode,
  EnumValueNode,
  FunctionNode,
  ParamNode,
  ProgramNode,
  StatementNode,
  TerminalNode,
} from '../types.js';
import { BEGEND_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  ENUM_TERMINATOR_OPTIONAL_BEFORE,
  TYPE_TOKENS,
  isFunctionStart,
} from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  fail,
  isAtEnd,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseFunction(): FunctionNode;
    parseParams(): ParamNode[];
    parseTypeMarker(label: string): TerminalNode;
    parseEnum(): EnumNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const functions: FunctionNode[] = [];
  const enums: EnumNode[] = [];
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    if (isFunctionStart(this.state)) {
      functions.push(this.parseFunction());
    } else if (check(this.state, TOKEN_TYPES.ENUM)) {
      enums.push(this.parseEnum());
    } else {
      statements.push(this.parseStatement());
    }
  }

  return {
    type: 'Program',
    id: this.nextId(),
    functions,
    enums,
    statements,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * ["begin"] "function" IDENT "(" params ")" ":" type stmt
 *
 * Opened with begin: closes with `end function`, or with `function` alone
 * when the body is a Block (the block already took the `end`).
 * Opened without begin: `end function` is optional.
 */
Parser.prototype.parseFunction = function (this: Parser): FunctionNode {
  const start = current(this.state).span.start;
  const hadBegin = match(this.state, TOKEN_TYPES.BEGIN) !== null;
  expect(this.state, TOKEN_TYPES.FUNCTION, "Expected 'function'");

  const name = makeTerminal(
    this.state.ids,
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected function name'),
    'FunctionName'
  );
  const params = makeNodeList(this.state.ids, 'Params', this.parseParams());
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after parameters");
  const returnType = this.parseTypeMarker('ReturnType');
  const body = this.parseStatement();

  if (hadBegin) {
    if (body.type !== 'Block') {
      expect(
        this.state,
        TOKEN_TYPES.END,
        "Expected 'end' after function body"
      );
    }
    expect(this.state, TOKEN_TYPES.FUNCTION, "Expected 'function' after 'end'");
  } else if (match(this.state, TOKEN_TYPES.END)) {
    expect(this.state, TOKEN_TYPES.FUNCTION, "Expected 'function' after 'end'");
  }

  return {
    type: 'Function',
    id: this.nextId(),
    name,
    params,
    returnType,
    body,
    span: spanFrom(this.state, start),
  };
};

/**
 * "(" [IDENT ":" type ("," IDENT ":" type)*] ")"
 * The whole parenthesized list may be omitted.
 */
Parser.prototype.parseParams = function (this: Parser): ParamNode[] {
  const params: ParamNode[] = [];
  if (!match(this.state, TOKEN_TYPES.LPAREN)) {
    return params;
  }
  if (match(this.state, TOKEN_TYPES.RPAREN)) {
    return params;
  }

  do {
    const start = current(this.state).span.start;
    const name = makeTerminal(
      this.state.ids,
      expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected parameter name'),
      'ParamName'
    );
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after parameter name");
    const paramType = this.parseTypeMarker('ParamType');
    params.push({
      type: 'Param',
      id: this.nextId(),
      name,
      paramType,
      span: spanFrom(this.state, start),
    });
  } while (match(this.state, TOKEN_TYPES.COMMA));

  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after parameters");
  return params;
};

Parser.prototype.parseTypeMarker = function (
  this: Parser,
  label: string
): TerminalNode {
  if (!check(this.state, ...TYPE_TOKENS)) {
    throw fail(
      this.state,
      'Expected type (int, real or bool)',
      BEGEND_ERROR_CODES.PARSE_EXPECTED_TYPE
    );
  }
  return makeTerminal(this.state.ids, advance(this.state), label);
};

// ============================================================
// ENUMS
// ============================================================

/**
 * "enum" IDENT "{" [IDENT ("," IDENT)*] "}" [";"]
 *
 * The ';' may be left out only before end of input or the start of another
 * declaration (function, enum, type marker).
 */
Parser.prototype.parseEnum = function (this: Parser): EnumNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.ENUM, "Expected 'enum'");
  const name = makeTerminal(
    this.state.ids,
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected enum name'),
    'EnumName'
  );
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after enum name");

  const values: EnumValueNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RBRACE)) {
    do {
      const token = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'Expected enum value name'
      );
      const valueName = makeTerminal(this.state.ids, token, 'ValueName');
      values.push({
        type: 'EnumValue',
        id: this.nextId(),
        name: valueName,
        span: token.span,
      });
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after enum values");
  const valueList = makeNodeList(this.state.ids, 'Values', values);

  if (!check(this.state, ...ENUM_TERMINATOR_OPTIONAL_BEFORE)) {
    expect(
      this.state,
      TOKEN_TYPES.SEMICOLON,
      "Expected ';' after enum declaration"
    );
  }

  return {
    type: 'Enum',
    id: this.nextId(),
    name,
    values: valueList,
    span: spanFrom(this.state, start),
  };
};
