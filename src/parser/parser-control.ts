/**
 * Parser Extension: Control Flow Parsing
 * If and for statements
 */

import { Parser } from './parser.js';
import { makeTerminal } from '../ast/builders.js';
import type {
  ExpressionNode,
  ForNode,
  IfNode,
  OrIfBranchNode,
  StatementNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { check, current, expect, match, spanFrom } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode;
    parseCondition(keyword: string): ExpressionNode;
    parseFor(): ForNode;
  }
}

// ============================================================
// IF
// ============================================================

/**
 * ["begin"] "if" "(" cond ")" stmt ("or" "if" "(" cond ")" stmt)*
 * ["else" stmt] ["end"]
 *
 * The closing `end` is bare and optional.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = current(this.state).span.start;
  match(this.state, TOKEN_TYPES.BEGIN);
  expect(this.state, TOKEN_TYPES.IF, "Expected 'if'");

  const condition = this.parseCondition('if');
  const thenBranch = this.parseStatement();

  const orIfBranches: OrIfBranchNode[] = [];
  while (check(this.state, TOKEN_TYPES.OR)) {
    const branchStart = current(this.state).span.start;
    expect(this.state, TOKEN_TYPES.OR, "Expected 'or'");
    expect(this.state, TOKEN_TYPES.IF, "Expected 'if' after 'or'");
    const branchCondition = this.parseCondition('if');
    const body = this.parseStatement();
    orIfBranches.push({
      type: 'OrIfBranch',
      id: this.nextId(),
      condition: branchCondition,
      body,
      span: spanFrom(this.state, branchStart),
    });
  }

  let elseBranch: StatementNode | null = null;
  if (match(this.state, TOKEN_TYPES.ELSE)) {
    elseBranch = this.parseStatement();
  }

  match(this.state, TOKEN_TYPES.END);

  return {
    type: 'If',
    id: this.nextId(),
    condition,
    thenBranch,
    orIfBranches,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

/** "(" expr ")" after a control keyword */
Parser.prototype.parseCondition = function (
  this: Parser,
  keyword: string
): ExpressionNode {
  expect(this.state, TOKEN_TYPES.LPAREN, `Expected '(' after '${keyword}'`);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after condition");
  return condition;
};

// ============================================================
// FOR
// ============================================================

/**
 * ["begin"] "for" "(" IDENT "goes" "from" expr "to" expr ")" stmt
 * ["end" "for"]
 */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = current(this.state).span.start;
  match(this.state, TOKEN_TYPES.BEGIN);
  expect(this.state, TOKEN_TYPES.FOR, "Expected 'for'");
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after 'for'");

  const variable = makeTerminal(
    this.state.ids,
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected loop variable name'),
    'VarName'
  );
  expect(this.state, TOKEN_TYPES.GOES, "Expected 'goes'");
  expect(this.state, TOKEN_TYPES.FROM, "Expected 'from'");
  const from = this.parseExpression();
  expect(this.state, TOKEN_TYPES.TO, "Expected 'to'");
  const to = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after loop range");

  const body = this.parseStatement();

  if (match(this.state, TOKEN_TYPES.END)) {
    expect(this.state, TOKEN_TYPES.FOR, "Expected 'for' after 'end'");
  }

  return {
    type: 'For',
    id: this.nextId(),
    variable,
    from,
    to,
    body,
    span: spanFrom(this.state, start),
  };
};
