/**
 * Parser Extension: Statement Parsing
 * Statement dispatch, declarations, I/O, return, blocks and assignments
 */

import { Parser } from './parser.js';
import { makeNodeList, makeTerminal } from '../ast/builders.js';
import type {
  AssignmentNode,
  BlockNode,
  ExpressionStatementNode,
  LiteralNode,
  PrintNode,
  ReadNode,
  ReturnNode,
  StatementNode,
  VarDeclItemNode,
  VarDeclNode,
} from '../types.js';
import { BEGEND_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  RETURN_VALUE_ABSENT_BEFORE,
  isBeginWrapped,
  isTypeStart,
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
    parseStatement(): StatementNode;
    parseVarDecl(): VarDeclNode;
    parseVarDeclItem(): VarDeclItemNode;
    parsePrint(): PrintNode;
    parseRead(): ReadNode;
    parseReturn(): ReturnNode;
    parseBlock(): BlockNode;
    parseAssignmentOrExpression(): AssignmentNode | ExpressionStatementNode;
  }
}

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  // begin if / begin for route to their own parsers, bare begin is a block
  if (isBeginWrapped(this.state, TOKEN_TYPES.IF)) {
    return this.parseIf();
  }
  if (isBeginWrapped(this.state, TOKEN_TYPES.FOR)) {
    return this.parseFor();
  }
  if (check(this.state, TOKEN_TYPES.BEGIN)) {
    return this.parseBlock();
  }

  if (isTypeStart(this.state)) {
    return this.parseVarDecl();
  }

  switch (current(this.state).type) {
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.READ:
      return this.parseRead();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    default:
      return this.parseAssignmentOrExpression();
  }
};

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * type ("[" INT_LITERAL "]")* IDENT ("," IDENT)* ";"
 */
Parser.prototype.parseVarDecl = function (this: Parser): VarDeclNode {
  const start = current(this.state).span.start;
  const varType = this.parseTypeMarker('Type');

  const dimensions: LiteralNode[] = [];
  while (match(this.state, TOKEN_TYPES.LBRACKET)) {
    if (!check(this.state, TOKEN_TYPES.INT_LITERAL)) {
      throw fail(
        this.state,
        'Expected integer literal for array dimension',
        BEGEND_ERROR_CODES.PARSE_INVALID_DIMENSION
      );
    }
    const token = advance(this.state);
    const value = makeTerminal(this.state.ids, token, 'Value');
    dimensions.push({
      type: 'Literal',
      id: this.nextId(),
      kind: 'int',
      value,
      span: token.span,
    });
    expect(
      this.state,
      TOKEN_TYPES.RBRACKET,
      "Expected ']' after array dimension"
    );
  }
  const dimensionList = makeNodeList(this.state.ids, 'Dimensions', dimensions);

  const items: VarDeclItemNode[] = [this.parseVarDeclItem()];
  while (match(this.state, TOKEN_TYPES.COMMA)) {
    items.push(this.parseVarDeclItem());
  }
  const variables = makeNodeList(this.state.ids, 'Variables', items);

  expect(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    "Expected ';' after variable declaration"
  );

  return {
    type: 'VarDecl',
    id: this.nextId(),
    varType,
    dimensions: dimensionList,
    variables,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseVarDeclItem = function (this: Parser): VarDeclItemNode {
  const token = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected variable name'
  );
  const name = makeTerminal(this.state.ids, token, 'VarName');
  return { type: 'VarDeclItem', id: this.nextId(), name, span: token.span };
};

// ============================================================
// I/O
// ============================================================

/** print "(" expr ")" ";" */
Parser.prototype.parsePrint = function (this: Parser): PrintNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.PRINT, "Expected 'print'");
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after 'print'");
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after expression");
  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after print statement");

  return {
    type: 'Print',
    id: this.nextId(),
    expression,
    span: spanFrom(this.state, start),
  };
};

/** read "(" expr ")" ";" */
Parser.prototype.parseRead = function (this: Parser): ReadNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.READ, "Expected 'read'");
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after 'read'");
  const target = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after expression");
  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after read statement");

  return {
    type: 'Read',
    id: this.nextId(),
    target,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// RETURN
// ============================================================

/**
 * return [expr] [";"]
 *
 * The value is absent before `;`, `end`, end of input, `else` and `or`.
 * The `;` may be dropped only before `end` or end of input.
 */
Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.RETURN, "Expected 'return'");

  const expression = check(this.state, ...RETURN_VALUE_ABSENT_BEFORE)
    ? null
    : this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.END) && !isAtEnd(this.state)) {
    expect(
      this.state,
      TOKEN_TYPES.SEMICOLON,
      "Expected ';' after return statement"
    );
  }

  return {
    type: 'Return',
    id: this.nextId(),
    expression,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOCKS
// ============================================================

/** "begin" stmt* "end" */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.BEGIN, "Expected 'begin'");

  const statements: StatementNode[] = [];
  while (!check(this.state, TOKEN_TYPES.END) && !isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }
  expect(this.state, TOKEN_TYPES.END, "Expected 'end'");

  return {
    type: 'Block',
    id: this.nextId(),
    statements,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ASSIGNMENT / EXPRESSION STATEMENT
// ============================================================

/**
 * expr "->" expr ";"   (value first, destination second)
 * expr ";"
 */
Parser.prototype.parseAssignmentOrExpression = function (
  this: Parser
): AssignmentNode | ExpressionStatementNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();

  if (match(this.state, TOKEN_TYPES.ARROW)) {
    const target = this.parseExpression();
    expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after assignment");
    return {
      type: 'Assignment',
      id: this.nextId(),
      value: expression,
      target,
      span: spanFrom(this.state, start),
    };
  }

  expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after expression");
  return {
    type: 'ExpressionStatement',
    id: this.nextId(),
    expression,
    span: spanFrom(this.state, start),
  };
};
