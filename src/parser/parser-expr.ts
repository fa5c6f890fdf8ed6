/**
 * Parser Extension: Expression Parsing
 * Precedence chain, unary operators and primary expressions
 */

import { Parser } from './parser.js';
import { makeNodeList, makeTerminal } from '../ast/builders.js';
import type {
  CallNode,
  ExpressionNode,
  LiteralNode,
  TokenType,
  VariableNode,
} from '../types.js';
import { BEGEND_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { BINARY_OPERATORS, LITERAL_KINDS, UNARY_OPERATORS } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  fail,
  makeSpan,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseBinaryLevel(
      operators: readonly TokenType[],
      operand: () => ExpressionNode
    ): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseRelational(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseLiteral(): LiteralNode;
    parseCallOrVariable(): CallNode | VariableNode;
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================
// Loosest to tightest: or, and, = !=, < <= > >=, + -, * / %, unary

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseLogicalOr();
};

/**
 * One left-associative binary level: operand (op operand)*
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: readonly TokenType[],
  operand: () => ExpressionNode
): ExpressionNode {
  let left = operand();

  while (check(this.state, ...operators)) {
    const opToken = advance(this.state);
    const op = BINARY_OPERATORS[opToken.type];
    if (op === undefined) {
      throw fail(this.state, `Unknown binary operator: ${opToken.value}`);
    }
    const operator = makeTerminal(this.state.ids, opToken, 'Operator');
    const right = operand();
    left = {
      type: 'BinaryExpr',
      id: this.nextId(),
      op,
      left,
      operator,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel([TOKEN_TYPES.OR], () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel([TOKEN_TYPES.AND], () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel([TOKEN_TYPES.EQ, TOKEN_TYPES.NE], () =>
    this.parseRelational()
  );
};

Parser.prototype.parseRelational = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(
    [TOKEN_TYPES.LT, TOKEN_TYPES.LE, TOKEN_TYPES.GT, TOKEN_TYPES.GE],
    () => this.parseAdditive()
  );
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel([TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS], () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseBinaryLevel(
    [TOKEN_TYPES.STAR, TOKEN_TYPES.SLASH, TOKEN_TYPES.PERCENT],
    () => this.parseUnary()
  );
};

// ============================================================
// UNARY
// ============================================================

/** ("-" | "not") unary | primary */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const opToken = match(this.state, TOKEN_TYPES.MINUS, TOKEN_TYPES.NOT);
  if (!opToken) {
    return this.parsePrimary();
  }

  const op = UNARY_OPERATORS[opToken.type];
  if (op === undefined) {
    throw fail(this.state, `Unknown unary operator: ${opToken.value}`);
  }
  const operator = makeTerminal(this.state.ids, opToken, 'Operator');
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    id: this.nextId(),
    op,
    operator,
    operand,
    span: makeSpan(opToken.span.start, operand.span.end),
  };
};

// ============================================================
// PRIMARY
// ============================================================

/** literal | call | variable | "(" expr ")" */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  if (
    check(
      this.state,
      TOKEN_TYPES.INT_LITERAL,
      TOKEN_TYPES.REAL_LITERAL,
      TOKEN_TYPES.BOOL_LITERAL
    )
  ) {
    return this.parseLiteral();
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    return this.parseCallOrVariable();
  }

  // Grouping has no node of its own
  if (match(this.state, TOKEN_TYPES.LPAREN)) {
    const expression = this.parseExpression();
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after expression");
    return expression;
  }

  throw fail(
    this.state,
    'Expected expression',
    BEGEND_ERROR_CODES.PARSE_EXPECTED_EXPRESSION
  );
};

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = advance(this.state);
  const kind = LITERAL_KINDS[token.type];
  if (kind === undefined) {
    throw fail(
      this.state,
      'Expected literal',
      BEGEND_ERROR_CODES.PARSE_EXPECTED_EXPRESSION
    );
  }
  const value = makeTerminal(this.state.ids, token, 'Value');
  return { type: 'Literal', id: this.nextId(), kind, value, span: token.span };
};

/**
 * IDENT "(" [expr ("," expr)*] ")"   call
 * IDENT ("[" expr "]")*               variable, array access with indices
 */
Parser.prototype.parseCallOrVariable = function (
  this: Parser
): CallNode | VariableNode {
  const start = current(this.state).span.start;
  const nameToken = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected identifier'
  );

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const name = makeTerminal(this.state.ids, nameToken, 'FunctionName');
    advance(this.state); // consume (
    const args: ExpressionNode[] = [];
    if (!check(this.state, TOKEN_TYPES.RPAREN)) {
      do {
        args.push(this.parseExpression());
      } while (match(this.state, TOKEN_TYPES.COMMA));
    }
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after arguments");
    const argList =
      args.length > 0 ? makeNodeList(this.state.ids, 'Arguments', args) : null;
    return {
      type: 'Call',
      id: this.nextId(),
      name,
      args: argList,
      span: spanFrom(this.state, start),
    };
  }

  const name = makeTerminal(this.state.ids, nameToken, 'VarName');
  const indices: ExpressionNode[] = [];
  while (match(this.state, TOKEN_TYPES.LBRACKET)) {
    indices.push(this.parseExpression());
    expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after index");
  }
  const indexList =
    indices.length > 0
      ? makeNodeList(this.state.ids, 'Indices', indices)
      : null;
  return {
    type: 'Variable',
    id: this.nextId(),
    name,
    indices: indexList,
    span: spanFrom(this.state, start),
  };
};
